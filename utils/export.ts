/**
 * Export utilities
 * 在运行目录中导出 CSV 与 JSON
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { CSV_FILENAMES, CSV_HEADERS, METRICS_FILENAME, SNAPSHOT_FILENAME } from '../config/constants';
import { classifyTweet } from '../core/content-analyzer';
import { AnalyticsErrors } from '../core/errors';
import { snapshotToJson, toMetricsJson } from '../core/metrics';
import type { ArchiveSnapshot, LikedTweet, Tweet } from '../types/archive';
import type { MetricsSnapshot } from '../types/metrics';
import * as fileUtils from './fileutils';
import { RunContext } from './fileutils';
import { createModuleLogger } from './logger';

const logger = createModuleLogger('Export');

export type CsvValue = string | number | boolean | null | undefined;

/**
 * RFC 4180: quote fields containing a comma, quote or line break; double embedded quotes
 */
export function escapeCsvField(value: CsvValue): string {
  if (value === null || value === undefined) return '';
  const text = typeof value === 'boolean' ? (value ? '1' : '0') : String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * Header row plus one row per record, `\n`-separated with a trailing newline
 */
export function toCsv(headers: readonly string[], rows: readonly (readonly CsvValue[])[]): string {
  const lines = [headers, ...rows].map((row) => row.map(escapeCsvField).join(','));
  return `${lines.join('\n')}\n`;
}

export function idRows(ids: Iterable<string>): CsvValue[][] {
  return Array.from(ids, (id) => [id]);
}

export function tweetRows(tweets: readonly Tweet[]): CsvValue[][] {
  return tweets.map((tweet) => [
    tweet.id,
    tweet.createdAt,
    classifyTweet(tweet),
    tweet.fullText,
    tweet.likeCount,
    tweet.retweetCount,
    tweet.hashtags.map((tag) => `#${tag}`).join(', '),
    tweet.mentions.map((handle) => `@${handle}`).join(', '),
  ]);
}

export function likeRows(likes: readonly LikedTweet[]): CsvValue[][] {
  return likes.map((like) => [
    like.id,
    like.originalAuthorHandle,
    like.fullText,
    like.expandedUrl,
    like.hashtags.map((tag) => `#${tag}`).join(', '),
  ]);
}

export interface ExportResult {
  runDir: string;
  files: string[];
}

async function writeFile(runDir: string, filename: string, content: string): Promise<string> {
  const filePath = path.join(runDir, filename);
  try {
    await fs.writeFile(filePath, content, 'utf-8');
  } catch (error: unknown) {
    throw AnalyticsErrors.fileSystem(
      `Failed to write ${filePath}`,
      { path: filePath },
      error instanceof Error ? error : undefined
    );
  }
  return filePath;
}

/**
 * Writes every CSV, metrics.json and snapshot.json into the run directory
 */
export async function exportAll(
  archive: ArchiveSnapshot,
  metrics: MetricsSnapshot,
  runContext: RunContext,
  options: { topN?: number } = {}
): Promise<ExportResult> {
  if (!runContext?.runDir) {
    throw AnalyticsErrors.invalidConfiguration('exportAll requires a valid runContext');
  }
  if (!(await fileUtils.ensureDirExists(runContext.runDir))) {
    throw AnalyticsErrors.fileSystem(`Cannot create ${runContext.runDir}`, { path: runContext.runDir });
  }

  const { relationships } = metrics;
  const csvFiles: Array<[string, string]> = [
    [CSV_FILENAMES.followers, toCsv(CSV_HEADERS.followers, idRows(archive.followers))],
    [CSV_FILENAMES.following, toCsv(CSV_HEADERS.following, idRows(archive.following))],
    [CSV_FILENAMES.mutual, toCsv(CSV_HEADERS.mutual, idRows(relationships.mutualIds))],
    [
      CSV_FILENAMES.oneSidedFollowers,
      toCsv(CSV_HEADERS.oneSidedFollowers, idRows(relationships.oneSidedFollowerIds)),
    ],
    [
      CSV_FILENAMES.oneSidedFollowing,
      toCsv(CSV_HEADERS.oneSidedFollowing, idRows(relationships.oneSidedFollowingIds)),
    ],
    [CSV_FILENAMES.tweets, toCsv(CSV_HEADERS.tweets, tweetRows(archive.tweets))],
    [CSV_FILENAMES.likes, toCsv(CSV_HEADERS.likes, likeRows(archive.likes))],
  ];

  const jsonFiles: Array<[string, string]> = [
    [METRICS_FILENAME, `${JSON.stringify(toMetricsJson(metrics, options.topN), null, 2)}\n`],
    [SNAPSHOT_FILENAME, `${JSON.stringify(snapshotToJson(metrics), null, 2)}\n`],
  ];

  const files = await Promise.all(
    [...csvFiles, ...jsonFiles].map(([filename, content]) => writeFile(runContext.runDir, filename, content))
  );

  logger.info('Export complete', { runDir: runContext.runDir, files: files.length });
  return { runDir: runContext.runDir, files };
}
