/**
 * Metrics snapshot builder
 *
 * Glues the analyzers, the score and the recommendation rules into one MetricsSnapshot,
 * and (de)serialises snapshots so a later run can compare against them.
 */

import { z } from 'zod';
import { DAY_NAMES, SNAPSHOT_FORMAT_VERSION } from '../config/constants';
import type { ArchiveSnapshot } from '../types/archive';
import type { AnalysisConfig, ScoringPolicy } from '../types/config';
import type { MetricsSnapshot } from '../types/metrics';
import { analyzeBehavior } from './behavior-analyzer';
import { analyzeContent } from './content-analyzer';
import { AnalyticsErrors } from './errors';
import { analyzeInterests } from './interest-analyzer';
import { evaluateRecommendations } from './recommendations';
import { analyzeRelationships } from './relationship-analyzer';
import { computeNetworkQualityScore } from './scoring';

export interface MetricsConfig {
  analysis: AnalysisConfig;
  scoring: ScoringPolicy;
}

export function buildMetricsSnapshot(
  archive: ArchiveSnapshot,
  config: MetricsConfig,
  now: Date = new Date()
): MetricsSnapshot {
  const { analysis, scoring } = config;

  const relationships = analyzeRelationships(archive.followers, archive.following);
  const content = analyzeContent(archive.tweets, { timezone: analysis.timezone });
  const interests = analyzeInterests(archive.tweets, archive.likes, {
    topN: analysis.topN,
    minKeywordLength: analysis.minKeywordLength,
  });
  const behavior = analyzeBehavior(archive, now);
  const score = computeNetworkQualityScore(relationships, scoring);
  const recommendations = evaluateRecommendations({ relationships, content });

  return {
    generatedAt: now.toISOString(),
    account: {
      accountId: archive.account?.accountId,
      handle: archive.account?.handle,
      displayName: archive.account?.displayName,
    },
    source: archive.source,
    relationships,
    content,
    interests,
    behavior,
    score,
    recommendations,
    tweetCount: archive.tweets.length,
    likeCount: archive.likes.length,
    followerIds: new Set(archive.followers),
    followingIds: new Set(archive.following),
  };
}

// ==================== 序列化 ====================

const frequencyEntrySchema = z.object({ value: z.string(), count: z.number().int().nonnegative() });
const contentMixSchema = z.object({
  original: z.number(),
  reply: z.number(),
  retweet: z.number(),
  quote: z.number(),
});

const relationshipSchema = z.object({
  followerCount: z.number().int().nonnegative(),
  followingCount: z.number().int().nonnegative(),
  mutualCount: z.number().int().nonnegative(),
  oneSidedFollowersCount: z.number().int().nonnegative(),
  oneSidedFollowingCount: z.number().int().nonnegative(),
  totalConnections: z.number().int().nonnegative(),
  followerRatio: z.number(),
  engagementRate: z.number(),
  mutualIds: z.array(z.string()),
  oneSidedFollowerIds: z.array(z.string()),
  oneSidedFollowingIds: z.array(z.string()),
});

const contentSchema = z.object({
  tweetCount: z.number().int().nonnegative(),
  mixCounts: contentMixSchema,
  mixPercentages: contentMixSchema,
  hashtags: z.array(frequencyEntrySchema),
  mentions: z.array(frequencyEntrySchema),
  hourHistogram: z.array(z.number()).length(24),
  dayHistogram: z.array(z.number()).length(7),
  peakHour: z.number().int().min(0).max(23).nullable(),
  peakDay: z.number().int().min(0).max(6).nullable(),
  datedTweetCount: z.number().int().nonnegative(),
  averageTextLength: z.number(),
  averageHashtags: z.number(),
  averageMentions: z.number(),
  averageMedia: z.number(),
  averageUrls: z.number(),
  activityPeriod: z.object({ first: z.string(), last: z.string(), spanDays: z.number() }).nullable(),
  topMonths: z.array(z.object({ month: z.string(), count: z.number() })),
});

const serializedSnapshotSchema = z.object({
  formatVersion: z.literal(SNAPSHOT_FORMAT_VERSION),
  generatedAt: z.string(),
  account: z.object({
    accountId: z.string().optional(),
    handle: z.string().optional(),
    displayName: z.string().optional(),
  }),
  source: z.enum(['archive', 'data-service']),
  relationships: relationshipSchema,
  content: contentSchema,
  interests: z.object({
    hashtags: z.array(frequencyEntrySchema),
    mentions: z.array(frequencyEntrySchema),
    likedAuthors: z.array(frequencyEntrySchema),
    keywords: z.array(frequencyEntrySchema),
  }),
  behavior: z.object({
    tweetCount: z.number(),
    likeCount: z.number(),
    likeToTweetRatio: z.number(),
    blockCount: z.number(),
    muteCount: z.number(),
    accountAgeDays: z.number().nullable(),
    tweetsPerDay: z.number(),
    tweetsPerMonth: z.number(),
    likesPerDay: z.number(),
  }),
  score: z.object({
    score: z.number().int().min(0).max(100),
    raw: z.number(),
    components: z.object({ engagement: z.number(), followerRatio: z.number(), mutualShare: z.number() }),
    band: z.enum(['excellent', 'good', 'fair', 'low']),
  }),
  recommendations: z.array(
    z.object({ id: z.string(), category: z.string(), insight: z.string(), action: z.string() })
  ),
  tweetCount: z.number().int().nonnegative(),
  likeCount: z.number().int().nonnegative(),
  followerIds: z.array(z.string()),
  followingIds: z.array(z.string()),
});

export type SerializedSnapshot = z.infer<typeof serializedSnapshotSchema>;

export function snapshotToJson(snapshot: MetricsSnapshot): SerializedSnapshot {
  return {
    formatVersion: SNAPSHOT_FORMAT_VERSION,
    ...snapshot,
    followerIds: [...snapshot.followerIds],
    followingIds: [...snapshot.followingIds],
  };
}

/**
 * Parse a serialised snapshot (a JSON string or an already-parsed value)
 */
export function parseSnapshotJson(input: unknown, source: string = 'snapshot'): MetricsSnapshot {
  let data = input;
  if (typeof input === 'string') {
    try {
      data = JSON.parse(input);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw AnalyticsErrors.invalidSnapshot(`${source} is not valid JSON: ${reason}`, { file: source });
    }
  }

  const result = serializedSnapshotSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw AnalyticsErrors.invalidSnapshot(`${source} is not a valid metrics snapshot: ${issues.join('; ')}`, {
      file: source,
    });
  }

  const { formatVersion: _version, followerIds, followingIds, ...rest } = result.data;
  return {
    ...rest,
    followerIds: new Set(followerIds),
    followingIds: new Set(followingIds),
  };
}

// ==================== metrics.json ====================

export interface MetricsJson {
  account_id: string | null;
  handle: string | null;
  follower_count: number;
  following_count: number;
  mutual_count: number;
  tweet_count: number;
  like_count: number;
  follower_ratio: number;
  engagement_rate: number;
  network_quality_score: number;
  top_hashtags: Array<{ hashtag: string; count: number }>;
  top_mentions: Array<{ handle: string; count: number }>;
  peak_hour: number | null;
  peak_day: string | null;
  content_mix: Record<string, number>;
  recommendations: Array<{ category: string; insight: string; action: string }>;
}

export function toMetricsJson(snapshot: MetricsSnapshot, topN: number = 10): MetricsJson {
  const { relationships, content } = snapshot;
  return {
    account_id: snapshot.account.accountId ?? null,
    handle: snapshot.account.handle ?? null,
    follower_count: relationships.followerCount,
    following_count: relationships.followingCount,
    mutual_count: relationships.mutualCount,
    tweet_count: snapshot.tweetCount,
    like_count: snapshot.likeCount,
    follower_ratio: relationships.followerRatio,
    engagement_rate: relationships.engagementRate,
    network_quality_score: snapshot.score.score,
    top_hashtags: content.hashtags.slice(0, topN).map((entry) => ({ hashtag: entry.value, count: entry.count })),
    top_mentions: content.mentions.slice(0, topN).map((entry) => ({ handle: entry.value, count: entry.count })),
    peak_hour: content.peakHour,
    peak_day: content.peakDay === null ? null : DAY_NAMES[content.peakDay] ?? null,
    content_mix: { ...content.mixPercentages },
    recommendations: snapshot.recommendations.map(({ category, insight, action }) => ({ category, insight, action })),
  };
}
