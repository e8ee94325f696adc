/**
 * File utilities and run directory helpers
 * 统一管理输出结构与目录创建
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { AnalyticsErrors } from '../core/errors';
import { createModuleLogger } from './logger';
import * as timeUtils from './time';

const logger = createModuleLogger('FileUtils');

const DEFAULT_OUTPUT_ROOT = path.resolve(process.cwd(), 'output');
const DEFAULT_IDENTIFIER = 'unknown-account';

/**
 * 简单清理文件路径片段，避免非法字符
 */
export function sanitizeSegment(segment: string = ''): string {
  return (
    String(segment)
      .trim()
      .toLowerCase()
      .replace(/[^a-z0-9-_]+/gi, '-')
      .replace(/-{2,}/g, '-')
      .replace(/^-|-$/g, '') || DEFAULT_IDENTIFIER
  );
}

/**
 * 确保目录存在
 */
export async function ensureDirExists(dir: string): Promise<boolean> {
  if (!dir) {
    logger.error('ensureDirExists requires directory path');
    return false;
  }
  try {
    await fs.mkdir(dir, { recursive: true });
    return true;
  } catch (error: unknown) {
    logger.error(`Failed to create directory: ${dir}`, error instanceof Error ? error : undefined);
    return false;
  }
}

export function getDefaultOutputRoot(): string {
  return DEFAULT_OUTPUT_ROOT;
}

export interface RunContextOptions {
  handle?: string;
  baseOutputDir?: string;
  timestamp?: string;
  timezone?: string;
}

export interface RunContext {
  handle: string;
  outputRoot: string;
  runId: string;
  timezone: string;
  runTimestamp: string;
  runTimestampIso: string;
  runTimestampUtc: string;
  /** `<outputRoot>/<handle>/run-<timestamp>` */
  runDir: string;
}

/**
 * 创建一次分析任务的运行目录上下文
 */
export async function createRunContext(options: RunContextOptions = {}): Promise<RunContext> {
  const handle = sanitizeSegment(options.handle || DEFAULT_IDENTIFIER);
  const timezone = timeUtils.resolveTimezone(options.timezone);

  let sourceDate = new Date();
  if (options.timestamp) {
    const overrideDate = new Date(options.timestamp);
    if (!Number.isNaN(overrideDate.getTime())) {
      sourceDate = overrideDate;
    } else {
      logger.warn(`Invalid timestamp override "${options.timestamp}", using current time instead.`);
    }
  }

  const timestampInfo = timeUtils.formatZonedTimestamp(sourceDate, timezone, {
    includeMilliseconds: true,
    includeOffset: true,
  });

  const runTimestamp = timestampInfo.fileSafe;
  const runId = `run-${runTimestamp}`;
  const outputRoot = options.baseOutputDir ? path.resolve(options.baseOutputDir) : DEFAULT_OUTPUT_ROOT;
  const runDir = path.join(outputRoot, handle, runId);

  if (!(await ensureDirExists(runDir))) {
    throw AnalyticsErrors.fileSystem(`Cannot create run directory ${runDir}`, { path: runDir });
  }

  return {
    handle,
    outputRoot,
    runId,
    timezone,
    runTimestamp,
    runTimestampIso: timestampInfo.iso,
    runTimestampUtc: sourceDate.toISOString(),
    runDir,
  };
}
