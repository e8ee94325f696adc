/**
 * Configuration types and interfaces
 * Centralized configuration for analysis, scoring and exports
 */

/**
 * Weights of the network quality score. Must sum to 100.
 */
export interface ScoringWeights {
  /** Share of mutual follows among followed accounts */
  engagement: number;
  followerRatio: number;
  /** Mutual follows relative to all unique connections */
  mutualShare: number;
}

/**
 * Value at which a score component earns its full weight
 */
export interface ScoringCeilings {
  /** Percentage, 0-100 */
  engagementRate: number;
  followerRatio: number;
  /** Fraction, 0-1 */
  mutualShare: number;
}

export interface ScoringPolicy {
  weights: ScoringWeights;
  ceilings: ScoringCeilings;
}

export interface AnalysisConfig {
  /** IANA timezone used for hour/day activity buckets */
  timezone: string;
  /** Length of top-N tables (hashtags, mentions, keywords) */
  topN: number;
  /** Shortest word counted as a keyword */
  minKeywordLength: number;
}

export interface OutputConfig {
  baseDir: string;
}

export interface DataServiceConfig {
  baseUrl: string;
  /** Forwarded as the service's cookie header, when set */
  cookies?: string;
  pageSize: number;
  maxPages: number;
  timeoutMs: number;
  /** Extra attempts for retryable failures (rate limits, 5xx, network) */
  maxRetries: number;
  /** Base delay, doubled on every further attempt */
  retryDelayMs: number;
}

export interface LoggingConfig {
  level: 'debug' | 'info' | 'warn' | 'error';
  toFile: boolean;
}

export interface AppConfig {
  analysis: AnalysisConfig;
  scoring: ScoringPolicy;
  output: OutputConfig;
  dataService: DataServiceConfig;
  logging: LoggingConfig;
}

/**
 * Default configuration values
 */
export const DEFAULT_SCORING_POLICY: ScoringPolicy = {
  weights: {
    engagement: 50,
    followerRatio: 30,
    mutualShare: 20,
  },
  ceilings: {
    engagementRate: 50,
    followerRatio: 1.5,
    mutualShare: 0.25,
  },
};

export const DEFAULT_CONFIG: AppConfig = {
  analysis: {
    timezone: 'UTC',
    topN: 10,
    minKeywordLength: 4,
  },
  scoring: DEFAULT_SCORING_POLICY,
  output: {
    baseDir: './output',
  },
  dataService: {
    baseUrl: 'http://localhost:3001',
    pageSize: 100,
    maxPages: 32,
    timeoutMs: 30000,
    maxRetries: 2,
    retryDelayMs: 1000,
  },
  logging: {
    level: 'info',
    toFile: true,
  },
};
