/**
 * Plain-text reports for the CLI
 */

import { DAY_NAMES } from '../config/constants';
import { TWEET_TYPES } from '../core/content-analyzer';
import type {
  AccountIdentity,
  FrequencyEntry,
  GoalProgress,
  GrowthReport,
  MetricsSnapshot,
  Recommendation,
  ScalarDelta,
} from '../types/metrics';

const RULE = '='.repeat(60);

export interface TextReportOptions {
  timezone?: string;
  /** Entries shown per top-N list */
  topN?: number;
}

export function formatAccount(account: AccountIdentity): string {
  if (account.handle && account.displayName && account.displayName !== account.handle) {
    return `@${account.handle} (${account.displayName})`;
  }
  if (account.handle) return `@${account.handle}`;
  return account.accountId ? `account ${account.accountId}` : 'unknown account';
}

function formatEntries(entries: readonly FrequencyEntry[], prefix: string, limit: number): string {
  if (entries.length === 0) return 'none';
  return entries
    .slice(0, limit)
    .map((entry) => `${prefix}${entry.value} (${entry.count})`)
    .join(', ');
}

function formatRecommendations(recommendations: readonly Recommendation[]): string[] {
  if (recommendations.length === 0) {
    return ['  No recommendations.'];
  }
  return recommendations.flatMap((rec, index) => [
    `  ${index + 1}. [${rec.category}] ${rec.insight}`,
    `     -> ${rec.action}`,
  ]);
}

function header(title: string): string[] {
  return [RULE, title, RULE];
}

export function renderTextReport(snapshot: MetricsSnapshot, options: TextReportOptions = {}): string {
  const timezone = options.timezone ?? 'UTC';
  const topN = options.topN ?? 5;
  const { relationships: r, content: c, interests, behavior: b, score } = snapshot;

  const mix = TWEET_TYPES.map((type) => `${type} ${c.mixPercentages[type]}%`).join(', ');
  const peakHour = c.peakHour === null ? 'n/a' : `${String(c.peakHour).padStart(2, '0')}:00 ${timezone}`;
  const peakDay = c.peakDay === null ? 'n/a' : DAY_NAMES[c.peakDay];

  const lines = [
    ...header(`Archive report: ${formatAccount(snapshot.account)}`),
    '',
    'Network',
    `  Followers: ${r.followerCount}`,
    `  Following: ${r.followingCount}`,
    `  Mutual: ${r.mutualCount}`,
    `  Followers you don't follow back: ${r.oneSidedFollowersCount}`,
    `  Following who don't follow back: ${r.oneSidedFollowingCount}`,
    `  Follower ratio: ${r.followerRatio.toFixed(2)}`,
    `  Engagement rate: ${r.engagementRate.toFixed(1)}%`,
    `  Network quality: ${score.score}/100 (${score.band})`,
    '',
    'Content',
    `  Tweets: ${c.tweetCount}`,
    `  Mix: ${mix}`,
    `  Top hashtags: ${formatEntries(c.hashtags, '#', topN)}`,
    `  Top mentions: ${formatEntries(c.mentions, '@', topN)}`,
    `  Peak hour: ${peakHour}`,
    `  Peak day: ${peakDay}`,
    `  Average length: ${c.averageTextLength.toFixed(1)} characters`,
  ];

  if (c.activityPeriod) {
    const { first, last, spanDays } = c.activityPeriod;
    lines.push(`  Active: ${first} to ${last} (${spanDays} days)`);
  }
  if (c.topMonths.length > 0) {
    lines.push(`  Busiest months: ${c.topMonths.map((m) => `${m.month} (${m.count})`).join(', ')}`);
  }

  lines.push(
    '',
    'Interests',
    `  Keywords: ${formatEntries(interests.keywords, '', topN)}`,
    `  Liked authors: ${formatEntries(interests.likedAuthors, '@', topN)}`,
    '',
    'Behavior',
    `  Likes: ${b.likeCount}`,
    `  Likes per tweet: ${b.likeToTweetRatio.toFixed(2)}`,
    `  Blocked: ${b.blockCount}, muted: ${b.muteCount}`,
    `  Account age: ${b.accountAgeDays === null ? 'unknown' : `${b.accountAgeDays} days`}`,
    `  Tweets per day: ${b.tweetsPerDay.toFixed(2)}`,
    '',
    'Recommendations',
    ...formatRecommendations(snapshot.recommendations),
    ''
  );

  return lines.join('\n');
}

// ==================== 增长报告 ====================

function signed(value: number, decimals: number): string {
  const text = value.toFixed(decimals);
  return value > 0 ? `+${text}` : text;
}

export function formatDelta(label: string, delta: ScalarDelta, decimals: number = 0, unit: string = ''): string {
  const from = `${delta.old.toFixed(decimals)}${unit}`;
  const to = `${delta.new.toFixed(decimals)}${unit}`;
  const percent = delta.percentChange === null ? 'n/a' : `${signed(delta.percentChange, 1)}%`;
  return `  ${label}: ${from} -> ${to} (${signed(delta.change, decimals)}, ${percent})`;
}

export function renderGrowthReport(report: GrowthReport): string {
  return [
    ...header(`Growth report: ${formatAccount(report.account)}`),
    '',
    'Network',
    formatDelta('Followers', report.followers),
    formatDelta('Following', report.following),
    formatDelta('Mutual', report.mutual),
    '',
    'Activity',
    formatDelta('Tweets', report.tweets),
    formatDelta('Likes', report.likes),
    '',
    'Performance',
    formatDelta('Engagement rate', report.engagementRate, 1, '%'),
    formatDelta('Follower ratio', report.followerRatio, 2),
    '',
    'Changes',
    `  New followers: ${report.newFollowers.length}`,
    `  Lost followers: ${report.lostFollowers.length}`,
    `  Newly followed: ${report.newFollowing.length}`,
    `  Unfollowed: ${report.unfollowed.length}`,
    '',
    'Recommendations',
    ...formatRecommendations(report.recommendations),
    '',
  ].join('\n');
}

// ==================== 目标 ====================

export function renderGoalReport(snapshot: MetricsSnapshot, progress: GoalProgress): string {
  const lines = [
    ...header(`Goal tracking: ${formatAccount(snapshot.account)}`),
    '',
    `  Followers: ${snapshot.relationships.followerCount}`,
    `  Engagement rate: ${snapshot.relationships.engagementRate.toFixed(1)}%`,
  ];

  if (progress.followers) {
    const f = progress.followers;
    lines.push('', `Follower goal: ${f.target}`, `  Progress: ${f.progressPercent.toFixed(1)}%`);
    if (f.remaining > 0) {
      lines.push(
        `  Remaining: ${f.remaining}`,
        `  At 10 followers/month: ${f.monthsAtTenPerMonth.toFixed(1)} months`,
        `  At 20 followers/month: ${f.monthsAtTwentyPerMonth.toFixed(1)} months`
      );
    } else {
      lines.push('  Goal reached.');
    }
  }

  if (progress.engagement) {
    const e = progress.engagement;
    lines.push('', `Engagement goal: ${e.target.toFixed(1)}%`, `  Current: ${e.current.toFixed(1)}%`);
    if (e.remaining > 0) {
      lines.push(
        `  Remaining: ${e.remaining.toFixed(1)} points`,
        `  Mutual connections needed: ${e.mutualNeeded}`
      );
    } else {
      lines.push('  Goal reached.');
    }
  }

  if (!progress.followers && !progress.engagement) {
    lines.push('', 'No goals given. Use --followers and/or --engagement.');
  }

  lines.push('');
  return lines.join('\n');
}
