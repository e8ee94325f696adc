/**
 * Core module exports
 */

// Archive loading
export { loadArchive, parseArchiveFile, resolveEntityFiles, type LoadArchiveOptions } from './archive-loader';
export {
  coerceCount,
  extractHashtags,
  extractMentions,
  handleFromStatusUrl,
  normalizeAccount,
  normalizeAccountIds,
  normalizeLikes,
  normalizeTweets,
  type NormalizeResult,
} from './archive-records';
export { formatTwitterDate, parseTwitterDate } from './twitter-date';

// Analyzers
export { analyzeRelationships, computeEngagementRate, computeFollowerRatio } from './relationship-analyzer';
export { analyzeContent, classifyTweet, toPercentages, TWEET_TYPES, type ContentAnalysisOptions } from './content-analyzer';
export { analyzeInterests, extractKeywords, type InterestAnalysisOptions } from './interest-analyzer';
export { accountAgeInDays, analyzeBehavior } from './behavior-analyzer';
export { FrequencyTable } from './frequency-table';

// Scoring, recommendations, snapshots
export { computeNetworkQualityScore, describeScore, type ScoreInput } from './scoring';
export {
  evaluateRecommendations,
  evaluateRules,
  PROFILE_RULES,
  type ProfileContext,
  type RecommendationRule,
} from './recommendations';
export {
  buildMetricsSnapshot,
  parseSnapshotJson,
  snapshotToJson,
  toMetricsJson,
  type MetricsConfig,
  type MetricsJson,
  type SerializedSnapshot,
} from './metrics';
export { compareSnapshots, GROWTH_RULES, scalarDelta, trackGoals, type GrowthContext } from './growth-comparator';

// Data service
export {
  createDataServiceClient,
  DataServiceClient,
  type DataServiceClientOptions,
  type DataServiceTweet,
  type DataServiceUser,
} from './data-service-client';
export { adaptTweet, adaptUser, loadFromDataService, type LoadFromDataServiceOptions } from './data-service-adapter';

// Errors
export {
  AnalyticsError,
  AnalyticsErrors,
  ConfigError,
  ErrorClassifier,
  ErrorCode,
  MalformedRecordError,
  MissingArchiveError,
  SnapshotMismatchError,
  type ErrorContext,
} from './errors';

export type * from '../types/archive';
export type * from '../types/metrics';
