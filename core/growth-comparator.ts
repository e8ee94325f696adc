/**
 * Growth Comparator
 * Compares two metrics snapshots of the same account and tracks goal progress.
 */

import type {
  AccountIdentity,
  EngagementGoalProgress,
  FollowerGoalProgress,
  GoalProgress,
  GoalTargets,
  GrowthReport,
  MetricsSnapshot,
  Recommendation,
  ScalarDelta,
} from '../types/metrics';
import { createModuleLogger } from '../utils/logger';
import { AnalyticsErrors, SnapshotMismatchError } from './errors';
import { evaluateRules, RecommendationRule } from './recommendations';

const logger = createModuleLogger('GrowthComparator');

export function scalarDelta(oldValue: number, newValue: number): ScalarDelta {
  return {
    old: oldValue,
    new: newValue,
    change: newValue - oldValue,
    percentChange: oldValue === 0 ? null : ((newValue - oldValue) / oldValue) * 100,
  };
}

/**
 * Members of `a` that are not in `b`, in `a`'s order
 */
function difference(a: ReadonlySet<string>, b: ReadonlySet<string>): string[] {
  const result: string[] = [];
  for (const id of a) {
    if (!b.has(id)) result.push(id);
  }
  return result;
}

function resolveAccount(oldSnapshot: MetricsSnapshot, newSnapshot: MetricsSnapshot): AccountIdentity {
  const oldId = oldSnapshot.account.accountId;
  const newId = newSnapshot.account.accountId;

  if (oldId === undefined && newId === undefined) {
    logger.warn('Neither snapshot carries an account id; assuming the same account');
  } else if (oldId !== newId) {
    throw new SnapshotMismatchError(oldId, newId);
  }

  return {
    accountId: newId ?? oldId,
    handle: newSnapshot.account.handle ?? oldSnapshot.account.handle,
    displayName: newSnapshot.account.displayName ?? oldSnapshot.account.displayName,
  };
}

export type GrowthContext = Omit<GrowthReport, 'recommendations'>;

export const GROWTH_RULES: readonly RecommendationRule<GrowthContext>[] = [
  {
    id: 'follower-decline',
    category: 'Follower Decline',
    priority: 10,
    condition: ({ followers }) => followers.change <= 0,
    insight: ({ followers }) =>
      followers.change < 0
        ? `You lost ${-followers.change} followers since the previous snapshot.`
        : 'Your follower count did not grow since the previous snapshot.',
    action: 'Post more engaging content more often and engage with your community.',
  },
  {
    id: 'slow-growth',
    category: 'Slow Growth',
    priority: 20,
    condition: ({ followers }) => followers.change > 0 && followers.change < 10,
    insight: ({ followers }) => `You gained ${followers.change} followers; there is room for improvement.`,
    action: 'Try posting at your peak hours and use relevant hashtags.',
  },
  {
    id: 'strong-growth',
    category: 'Great Growth',
    priority: 30,
    condition: ({ followers }) => followers.change >= 10,
    insight: ({ followers }) => `You gained ${followers.change} followers.`,
    action: 'Keep your current rhythm and keep engaging with your audience.',
  },
  {
    id: 'engagement-drop',
    category: 'Engagement',
    priority: 40,
    condition: ({ engagementRate }) => engagementRate.change < 0,
    insight: ({ engagementRate }) =>
      `Your engagement rate dropped by ${Math.abs(engagementRate.change).toFixed(1)} points.`,
    action: "Review who you're following and engage more with mutual connections.",
  },
  {
    id: 'low-content',
    category: 'Low Content Production',
    priority: 50,
    condition: ({ tweets }) => tweets.change < 5,
    insight: ({ tweets }) => `Only ${Math.max(tweets.change, 0)} new tweets since the previous snapshot.`,
    action: 'Aim for 3-5 tweets per week and share valuable insights.',
  },
];

export function compareSnapshots(
  oldSnapshot: MetricsSnapshot,
  newSnapshot: MetricsSnapshot,
  rules: readonly RecommendationRule<GrowthContext>[] = GROWTH_RULES
): GrowthReport {
  const account = resolveAccount(oldSnapshot, newSnapshot);
  const o = oldSnapshot.relationships;
  const n = newSnapshot.relationships;

  const context: GrowthContext = {
    account,
    followers: scalarDelta(o.followerCount, n.followerCount),
    following: scalarDelta(o.followingCount, n.followingCount),
    mutual: scalarDelta(o.mutualCount, n.mutualCount),
    tweets: scalarDelta(oldSnapshot.tweetCount, newSnapshot.tweetCount),
    likes: scalarDelta(oldSnapshot.likeCount, newSnapshot.likeCount),
    engagementRate: scalarDelta(o.engagementRate, n.engagementRate),
    followerRatio: scalarDelta(o.followerRatio, n.followerRatio),
    newFollowers: difference(newSnapshot.followerIds, oldSnapshot.followerIds),
    lostFollowers: difference(oldSnapshot.followerIds, newSnapshot.followerIds),
    newFollowing: difference(newSnapshot.followingIds, oldSnapshot.followingIds),
    unfollowed: difference(oldSnapshot.followingIds, newSnapshot.followingIds),
  };

  const recommendations: Recommendation[] = evaluateRules(context, rules);
  return { ...context, recommendations };
}

// ==================== 目标追踪 ====================

function followerGoal(target: number, current: number): FollowerGoalProgress {
  const remaining = Math.max(target - current, 0);
  return {
    target,
    current,
    remaining,
    progressPercent: (current / target) * 100,
    monthsAtTenPerMonth: remaining / 10,
    monthsAtTwentyPerMonth: remaining / 20,
  };
}

function engagementGoal(target: number, snapshot: MetricsSnapshot): EngagementGoalProgress {
  const { engagementRate, followingCount, mutualCount } = snapshot.relationships;
  const remaining = Math.max(target - engagementRate, 0);
  return {
    target,
    current: engagementRate,
    remaining,
    mutualNeeded: remaining > 0 ? Math.max(Math.ceil((target / 100) * followingCount - mutualCount), 0) : 0,
  };
}

export function trackGoals(snapshot: MetricsSnapshot, goals: GoalTargets): GoalProgress {
  const progress: GoalProgress = {};

  if (goals.followers !== undefined) {
    if (!Number.isFinite(goals.followers) || goals.followers <= 0) {
      throw AnalyticsErrors.invalidConfiguration(`Follower goal must be a positive number, got ${goals.followers}`);
    }
    progress.followers = followerGoal(goals.followers, snapshot.relationships.followerCount);
  }

  if (goals.engagementRate !== undefined) {
    if (!Number.isFinite(goals.engagementRate) || goals.engagementRate <= 0 || goals.engagementRate > 100) {
      throw AnalyticsErrors.invalidConfiguration(
        `Engagement goal must be a percentage in (0, 100], got ${goals.engagementRate}`
      );
    }
    progress.engagement = engagementGoal(goals.engagementRate, snapshot);
  }

  return progress;
}
