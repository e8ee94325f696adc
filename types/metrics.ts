/**
 * Derived metrics. Computed on demand from an ArchiveSnapshot, never mutated.
 */

import type { SnapshotSource, TweetType } from './archive';

export interface RelationshipMetrics {
  followerCount: number;
  followingCount: number;
  mutualCount: number;
  oneSidedFollowersCount: number;
  oneSidedFollowingCount: number;
  totalConnections: number;
  followerRatio: number;
  /** Percentage (0-100) of followed accounts that follow back */
  engagementRate: number;
  mutualIds: string[];
  oneSidedFollowerIds: string[];
  oneSidedFollowingIds: string[];
}

export type ContentMix = Record<TweetType, number>;

export interface FrequencyEntry {
  /** Display form: the most frequent casing, ties to the first seen */
  value: string;
  count: number;
}

export interface ActivityPeriod {
  first: string;
  last: string;
  spanDays: number;
}

export interface MonthActivity {
  /** YYYY-MM */
  month: string;
  count: number;
}

export interface ContentMetrics {
  tweetCount: number;
  mixCounts: ContentMix;
  /** Integer percentages; sum to 100 when tweetCount > 0 */
  mixPercentages: ContentMix;
  hashtags: FrequencyEntry[];
  mentions: FrequencyEntry[];
  hourHistogram: number[];
  dayHistogram: number[];
  peakHour: number | null;
  peakDay: number | null;
  datedTweetCount: number;
  averageTextLength: number;
  averageHashtags: number;
  averageMentions: number;
  averageMedia: number;
  averageUrls: number;
  activityPeriod: ActivityPeriod | null;
  topMonths: MonthActivity[];
}

export interface InterestMetrics {
  hashtags: FrequencyEntry[];
  mentions: FrequencyEntry[];
  likedAuthors: FrequencyEntry[];
  keywords: FrequencyEntry[];
}

export interface BehaviorMetrics {
  tweetCount: number;
  likeCount: number;
  likeToTweetRatio: number;
  blockCount: number;
  muteCount: number;
  accountAgeDays: number | null;
  tweetsPerDay: number;
  tweetsPerMonth: number;
  likesPerDay: number;
}

export interface ScoreComponents {
  engagement: number;
  followerRatio: number;
  mutualShare: number;
}

export interface ScoreBreakdown {
  score: number;
  raw: number;
  components: ScoreComponents;
  band: QualityBand;
}

export type QualityBand = 'excellent' | 'good' | 'fair' | 'low';

export interface Recommendation {
  id: string;
  category: string;
  insight: string;
  action: string;
}

export interface AccountIdentity {
  accountId?: string;
  handle?: string;
  displayName?: string;
}

export interface MetricsSnapshot {
  /** ISO timestamp of the analysis run */
  generatedAt: string;
  account: AccountIdentity;
  source: SnapshotSource;
  relationships: RelationshipMetrics;
  content: ContentMetrics;
  interests: InterestMetrics;
  behavior: BehaviorMetrics;
  score: ScoreBreakdown;
  recommendations: Recommendation[];
  tweetCount: number;
  likeCount: number;
  followerIds: ReadonlySet<string>;
  followingIds: ReadonlySet<string>;
}

export interface ScalarDelta {
  old: number;
  new: number;
  change: number;
  /** null when the old value is 0 */
  percentChange: number | null;
}

export interface GrowthReport {
  account: AccountIdentity;
  followers: ScalarDelta;
  following: ScalarDelta;
  mutual: ScalarDelta;
  tweets: ScalarDelta;
  likes: ScalarDelta;
  engagementRate: ScalarDelta;
  followerRatio: ScalarDelta;
  newFollowers: string[];
  lostFollowers: string[];
  newFollowing: string[];
  unfollowed: string[];
  recommendations: Recommendation[];
}

export interface GoalTargets {
  followers?: number;
  engagementRate?: number;
}

export interface FollowerGoalProgress {
  target: number;
  current: number;
  remaining: number;
  progressPercent: number;
  monthsAtTenPerMonth: number;
  monthsAtTwentyPerMonth: number;
}

export interface EngagementGoalProgress {
  target: number;
  current: number;
  remaining: number;
  mutualNeeded: number;
}

export interface GoalProgress {
  followers?: FollowerGoalProgress;
  engagement?: EngagementGoalProgress;
}
