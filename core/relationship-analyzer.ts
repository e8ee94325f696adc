/**
 * Relationship Analyzer
 * Set relationships between followers and followed accounts.
 */

import type { RelationshipMetrics } from '../types/metrics';

/**
 * followers / following; equals the follower count when nobody is followed
 */
export function computeFollowerRatio(followerCount: number, followingCount: number): number {
  if (followingCount === 0) {
    return followerCount;
  }
  return followerCount / followingCount;
}

/**
 * Percentage of followed accounts that follow back
 */
export function computeEngagementRate(mutualCount: number, followingCount: number): number {
  return (mutualCount / Math.max(followingCount, 1)) * 100;
}

export function analyzeRelationships(
  followers: ReadonlySet<string>,
  following: ReadonlySet<string>
): RelationshipMetrics {
  const mutualIds: string[] = [];
  const oneSidedFollowerIds: string[] = [];
  const oneSidedFollowingIds: string[] = [];

  for (const id of followers) {
    if (following.has(id)) {
      mutualIds.push(id);
    } else {
      oneSidedFollowerIds.push(id);
    }
  }
  for (const id of following) {
    if (!followers.has(id)) {
      oneSidedFollowingIds.push(id);
    }
  }

  const followerCount = followers.size;
  const followingCount = following.size;
  const mutualCount = mutualIds.length;

  return {
    followerCount,
    followingCount,
    mutualCount,
    oneSidedFollowersCount: oneSidedFollowerIds.length,
    oneSidedFollowingCount: oneSidedFollowingIds.length,
    totalConnections: followerCount + followingCount - mutualCount,
    followerRatio: computeFollowerRatio(followerCount, followingCount),
    engagementRate: computeEngagementRate(mutualCount, followingCount),
    mutualIds,
    oneSidedFollowerIds,
    oneSidedFollowingIds,
  };
}
