/**
 * Content Analyzer
 * Tweet classification, hashtag/mention tables, activity histograms and averages.
 */

import { MS_PER_DAY } from '../config/constants';
import type { Tweet, TweetType } from '../types/archive';
import type { ContentMetrics, ContentMix, MonthActivity } from '../types/metrics';
import { formatDateOnly, getZonedParts } from '../utils/time';
import { FrequencyTable } from './frequency-table';
import { parseTwitterDate } from './twitter-date';

export const TWEET_TYPES: readonly TweetType[] = ['original', 'reply', 'retweet', 'quote'];

const TOP_MONTHS = 3;

export interface ContentAnalysisOptions {
  /** IANA timezone for the hour/day buckets */
  timezone?: string;
}

/**
 * First match wins: retweet, quote, reply, original
 */
export function classifyTweet(tweet: Tweet): TweetType {
  if (tweet.retweetOfId !== undefined || tweet.fullText.startsWith('RT @')) {
    return 'retweet';
  }
  if (tweet.quotedId !== undefined || tweet.isQuoteStatus) {
    return 'quote';
  }
  if (tweet.replyToId !== undefined) {
    return 'reply';
  }
  return 'original';
}

export function emptyContentMix(): ContentMix {
  return { original: 0, reply: 0, retweet: 0, quote: 0 };
}

/**
 * Integer percentages that add up to exactly 100 (largest remainder).
 * Remainder ties go to the earlier type in TWEET_TYPES.
 */
export function toPercentages(counts: ContentMix): ContentMix {
  const total = TWEET_TYPES.reduce((sum, type) => sum + counts[type], 0);
  const result = emptyContentMix();
  if (total === 0) {
    return result;
  }

  const shares = TWEET_TYPES.map((type, index) => {
    const exact = (counts[type] / total) * 100;
    return { type, index, floor: Math.floor(exact), remainder: exact - Math.floor(exact) };
  });

  let assigned = 0;
  for (const share of shares) {
    result[share.type] = share.floor;
    assigned += share.floor;
  }

  const byRemainder = [...shares].sort((a, b) => b.remainder - a.remainder || a.index - b.index);
  for (let i = 0; i < 100 - assigned; i++) {
    result[byRemainder[i].type] += 1;
  }

  return result;
}

/**
 * Index of the largest bucket, lowest index on ties; null when every bucket is empty
 */
export function peakIndex(histogram: readonly number[]): number | null {
  let best: number | null = null;
  for (let index = 0; index < histogram.length; index++) {
    if (histogram[index] > 0 && (best === null || histogram[index] > histogram[best])) {
      best = index;
    }
  }
  return best;
}

function average(total: number, count: number): number {
  return count === 0 ? 0 : total / count;
}

export function analyzeContent(tweets: readonly Tweet[], options: ContentAnalysisOptions = {}): ContentMetrics {
  const timezone = options.timezone ?? 'UTC';
  const mixCounts = emptyContentMix();
  const hashtags = new FrequencyTable();
  const mentions = new FrequencyTable();
  const hourHistogram = new Array<number>(24).fill(0);
  const dayHistogram = new Array<number>(7).fill(0);
  const months = new Map<string, number>();

  let datedTweetCount = 0;
  let firstTime: number | null = null;
  let lastTime: number | null = null;
  let textLength = 0;
  let hashtagTotal = 0;
  let mentionTotal = 0;
  let mediaTotal = 0;
  let urlTotal = 0;

  for (const tweet of tweets) {
    mixCounts[classifyTweet(tweet)]++;

    hashtags.addAll(tweet.hashtags);
    mentions.addAll(tweet.mentions);
    textLength += Array.from(tweet.fullText).length;
    hashtagTotal += tweet.hashtags.length;
    mentionTotal += tweet.mentions.length;
    mediaTotal += tweet.mediaCount;
    urlTotal += tweet.urlCount;

    const createdAt = parseTwitterDate(tweet.createdAt);
    if (!createdAt) continue;

    datedTweetCount++;
    const parts = getZonedParts(createdAt, timezone);
    hourHistogram[parts.hour]++;
    dayHistogram[parts.weekday]++;

    const month = `${parts.year}-${String(parts.month).padStart(2, '0')}`;
    months.set(month, (months.get(month) ?? 0) + 1);

    const time = createdAt.getTime();
    if (firstTime === null || time < firstTime) firstTime = time;
    if (lastTime === null || time > lastTime) lastTime = time;
  }

  const topMonths: MonthActivity[] = Array.from(months, ([month, count]) => ({ month, count }))
    .sort((a, b) => b.count - a.count || a.month.localeCompare(b.month))
    .slice(0, TOP_MONTHS);

  const count = tweets.length;

  return {
    tweetCount: count,
    mixCounts,
    mixPercentages: toPercentages(mixCounts),
    hashtags: hashtags.entries(),
    mentions: mentions.entries(),
    hourHistogram,
    dayHistogram,
    peakHour: peakIndex(hourHistogram),
    peakDay: peakIndex(dayHistogram),
    datedTweetCount,
    averageTextLength: average(textLength, count),
    averageHashtags: average(hashtagTotal, count),
    averageMentions: average(mentionTotal, count),
    averageMedia: average(mediaTotal, count),
    averageUrls: average(urlTotal, count),
    activityPeriod:
      firstTime !== null && lastTime !== null
        ? {
            first: formatDateOnly(new Date(firstTime), timezone),
            last: formatDateOnly(new Date(lastTime), timezone),
            spanDays: Math.round((lastTime - firstTime) / MS_PER_DAY),
          }
        : null,
    topMonths,
  };
}
