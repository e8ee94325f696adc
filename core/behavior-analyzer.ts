/**
 * Behaviour metrics: activity volume, privacy actions and account age
 */

import { MS_PER_DAY } from '../config/constants';
import type { ArchiveSnapshot } from '../types/archive';
import type { BehaviorMetrics } from '../types/metrics';

export function accountAgeInDays(createdAt: string | undefined, now: Date): number | null {
  if (!createdAt) return null;
  const created = Date.parse(createdAt);
  if (Number.isNaN(created) || created > now.getTime()) return null;
  return Math.floor((now.getTime() - created) / MS_PER_DAY);
}

export function analyzeBehavior(snapshot: ArchiveSnapshot, now: Date = new Date()): BehaviorMetrics {
  const tweetCount = snapshot.tweets.length;
  const likeCount = snapshot.likes.length;
  const accountAgeDays = accountAgeInDays(snapshot.account?.createdAt, now);
  const perDay = (count: number): number => (accountAgeDays ? count / accountAgeDays : 0);

  return {
    tweetCount,
    likeCount,
    likeToTweetRatio: tweetCount === 0 ? 0 : likeCount / tweetCount,
    blockCount: snapshot.blocks.size,
    muteCount: snapshot.mutes.size,
    accountAgeDays,
    tweetsPerDay: perDay(tweetCount),
    tweetsPerMonth: perDay(tweetCount) * 30,
    likesPerDay: perDay(likeCount),
  };
}
