/**
 * Configuration manager
 *
 * Merges, in increasing precedence: built-in defaults, an optional JSON config file,
 * then environment variables. The merged result is validated with zod.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from '../core/errors';
import { Env, parseEnv } from '../core/env';
import {
  AnalysisConfig,
  AppConfig,
  DataServiceConfig,
  DEFAULT_CONFIG,
  LoggingConfig,
  OutputConfig,
  ScoringPolicy,
} from '../types/config';
import { isValidTimezone } from './time';

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

const WEIGHT_SUM_TOLERANCE = 1e-6;

const positive = z.number().positive();

export const appConfigSchema = z.object({
  analysis: z.object({
    timezone: z.string().refine(isValidTimezone, (value) => ({ message: `Unknown timezone "${value}"` })),
    topN: z.number().int().min(1),
    minKeywordLength: z.number().int().min(1),
  }),
  scoring: z.object({
    weights: z
      .object({ engagement: positive, followerRatio: positive, mutualShare: positive })
      .refine(
        (w) => Math.abs(w.engagement + w.followerRatio + w.mutualShare - 100) < WEIGHT_SUM_TOLERANCE,
        { message: 'Scoring weights must sum to 100' }
      ),
    ceilings: z.object({ engagementRate: positive, followerRatio: positive, mutualShare: positive }),
  }),
  output: z.object({
    baseDir: z.string().min(1),
  }),
  dataService: z.object({
    baseUrl: z.string().url(),
    cookies: z.string().optional(),
    pageSize: z.number().int().min(1).max(1000),
    maxPages: z.number().int().min(1),
    timeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().min(0),
    retryDelayMs: z.number().int().min(0),
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
    toFile: z.boolean(),
  }),
});

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeDeep(base: unknown, override: unknown): unknown {
  if (override === undefined) return base;
  if (!isPlainObject(base) || !isPlainObject(override)) return override;

  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    merged[key] = mergeDeep(base[key], value);
  }
  return merged;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Overrides taken from the environment. Only variables that are actually set apply.
 */
function parseEnvOrThrow(source: NodeJS.ProcessEnv): Env {
  try {
    return parseEnv(source);
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new ConfigError('Invalid environment variables', formatIssues(error));
    }
    throw error;
  }
}

function configFromEnv(source: NodeJS.ProcessEnv): DeepPartial<AppConfig> {
  const parsed = parseEnvOrThrow(source);
  return {
    analysis: { timezone: parsed.ANALYTICS_TIMEZONE, topN: parsed.TOP_N },
    output: { baseDir: parsed.OUTPUT_DIR },
    dataService: { baseUrl: parsed.DATA_SERVICE_URL, cookies: parsed.DATA_SERVICE_COOKIES },
    logging: {
      level: source.LOG_LEVEL !== undefined ? parsed.LOG_LEVEL : undefined,
      toFile: source.LOG_TO_FILE !== undefined ? parsed.LOG_TO_FILE : undefined,
    },
  };
}

function readConfigFile(configPath: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${configPath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${configPath} is not valid JSON`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  if (!isPlainObject(data)) {
    throw new ConfigError(`Config file ${configPath} must contain a JSON object`);
  }
  return data;
}

export class ConfigManager {
  private config: AppConfig;
  private readonly configPath?: string;

  /**
   * @param configPath JSON config file; defaults to `ANALYTICS_CONFIG`
   * @param envSource environment to read overrides from
   */
  constructor(configPath?: string, envSource: NodeJS.ProcessEnv = process.env) {
    const resolvedPath = configPath ?? envSource.ANALYTICS_CONFIG;
    this.configPath = resolvedPath ? path.resolve(resolvedPath) : undefined;

    const fileConfig = this.configPath ? readConfigFile(this.configPath) : {};
    const merged = mergeDeep(mergeDeep(DEFAULT_CONFIG, fileConfig), configFromEnv(envSource));
    this.config = this.validate(merged);
  }

  private validate(candidate: unknown): AppConfig {
    const result = appConfigSchema.safeParse(candidate);
    if (!result.success) {
      throw new ConfigError(
        `Invalid configuration${this.configPath ? ` (${this.configPath})` : ''}`,
        formatIssues(result.error)
      );
    }
    return result.data;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getConfigPath(): string | undefined {
    return this.configPath;
  }

  getAnalysisConfig(): AnalysisConfig {
    return this.config.analysis;
  }

  getScoringPolicy(): ScoringPolicy {
    return this.config.scoring;
  }

  getOutputConfig(): OutputConfig {
    return this.config.output;
  }

  getDataServiceConfig(): DataServiceConfig {
    return this.config.dataService;
  }

  getLoggingConfig(): LoggingConfig {
    return this.config.logging;
  }

  /**
   * Deep-merge a partial update; throws ConfigError and keeps the old config if invalid
   */
  updateConfig(update: DeepPartial<AppConfig>): void {
    this.config = this.validate(mergeDeep(this.config, update));
  }

  saveToFile(filePath: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, `${JSON.stringify(this.config, null, 2)}\n`, 'utf-8');
  }
}
