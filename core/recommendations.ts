/**
 * Rule-based recommendations
 *
 * Rules are plain data. Every rule is evaluated on its own; priority only decides
 * the order in which fired rules are shown.
 */

import type { ContentMetrics, Recommendation, RelationshipMetrics } from '../types/metrics';

export interface RecommendationRule<C> {
  id: string;
  category: string;
  /** Lower comes first */
  priority: number;
  condition: (context: C) => boolean;
  insight: string | ((context: C) => string);
  action: string;
}

export interface ProfileContext {
  relationships: RelationshipMetrics;
  content: ContentMetrics;
}

export function evaluateRules<C>(context: C, rules: readonly RecommendationRule<C>[]): Recommendation[] {
  return rules
    .filter((rule) => rule.condition(context))
    .sort((a, b) => a.priority - b.priority || a.id.localeCompare(b.id))
    .map((rule) => ({
      id: rule.id,
      category: rule.category,
      insight: typeof rule.insight === 'function' ? rule.insight(context) : rule.insight,
      action: rule.action,
    }));
}

export const PROFILE_RULES: readonly RecommendationRule<ProfileContext>[] = [
  {
    id: 'network-growth',
    category: 'Network Growth',
    priority: 10,
    condition: ({ relationships: r }) =>
      r.followingCount > 0 && r.followerCount < r.followingCount * 0.5,
    insight: 'Your follower count is low compared to the accounts you follow.',
    action: 'Focus on creating more engaging original content to attract followers.',
  },
  {
    id: 'growth-opportunity',
    category: 'Growth Opportunity',
    priority: 20,
    condition: ({ relationships: r }) =>
      r.followerCount > 0 && r.followingCount > 0 && r.followerCount < r.followingCount,
    insight: 'You follow more people than follow you.',
    action: 'Consider creating more engaging content to grow your follower base.',
  },
  {
    id: 'low-reciprocity',
    category: 'Engagement',
    priority: 30,
    condition: ({ relationships: r }) =>
      r.followerCount > 0 && r.followingCount > 0 && r.engagementRate < 20,
    insight: 'Low mutual connection rate detected.',
    action: 'Engage more with accounts you follow (reply, retweet, like) to build relationships.',
  },
  {
    id: 'network-cleanup',
    category: 'Network Cleanup',
    priority: 40,
    condition: ({ relationships: r }) =>
      r.followingCount > 0 && r.oneSidedFollowingCount / r.followingCount > 0.9,
    insight: 'Almost none of the accounts you follow follow you back.',
    action: 'Review the accounts you follow and unfollow the ones you no longer read.',
  },
  {
    id: 'review-one-sided',
    category: 'Engagement Tip',
    priority: 50,
    condition: ({ relationships: r }) => r.oneSidedFollowingCount > 0,
    insight: ({ relationships: r }) =>
      `${r.oneSidedFollowingCount} accounts you follow don't follow back.`,
    action: 'Review whether these connections are still valuable.',
  },
  {
    id: 'content-strategy',
    category: 'Content Strategy',
    priority: 60,
    condition: ({ content: c }) => c.tweetCount > 0 && c.mixCounts.original / c.tweetCount < 0.3,
    insight: 'Most of your tweets are replies, retweets or quotes.',
    action: 'Create more original content to establish your unique voice.',
  },
  {
    id: 'posting-rhythm',
    category: 'Posting Rhythm',
    priority: 70,
    condition: ({ content: c }) => c.tweetCount > 0 && c.datedTweetCount === 0,
    insight: 'No tweet carried a readable timestamp, so peak hours are unknown.',
    action: 'Re-export the archive to get activity-time insights.',
  },
  {
    id: 'hashtag-usage',
    category: 'Discoverability',
    priority: 80,
    condition: ({ content: c }) => c.tweetCount >= 10 && c.averageHashtags < 0.1,
    insight: 'You rarely use hashtags.',
    action: 'Add a relevant hashtag to posts you want new audiences to find.',
  },
];

export function evaluateRecommendations(
  context: ProfileContext,
  rules: readonly RecommendationRule<ProfileContext>[] = PROFILE_RULES
): Recommendation[] {
  return evaluateRules(context, rules);
}
