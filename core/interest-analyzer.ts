/**
 * Interest analysis over authored and liked content
 */

import stopWordList from '../config/stop-words.json';
import type { LikedTweet, Tweet } from '../types/archive';
import type { InterestMetrics } from '../types/metrics';
import { FrequencyTable } from './frequency-table';

const STOP_WORDS: ReadonlySet<string> = new Set(stopWordList);

const URL_PATTERN = /https?:\/\/\S+|www\.\S+/g;
const TAG_PATTERN = /[@#＃][\p{L}\p{N}_]+/gu;
const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

export interface InterestAnalysisOptions {
  topN?: number;
  minKeywordLength?: number;
}

/**
 * Lower-cased words of at least `minLength` characters, without URLs, hashtags,
 * mentions, numbers or stop words
 */
export function extractKeywords(text: string, minLength: number = 4): string[] {
  const stripped = text.replace(URL_PATTERN, ' ').replace(TAG_PATTERN, ' ');
  const words: string[] = [];
  for (const match of stripped.matchAll(WORD_PATTERN)) {
    const word = match[0].toLowerCase();
    if (Array.from(word).length < minLength || /^\d+$/.test(word) || STOP_WORDS.has(word)) {
      continue;
    }
    words.push(word);
  }
  return words;
}

export function analyzeInterests(
  tweets: readonly Tweet[],
  likes: readonly LikedTweet[],
  options: InterestAnalysisOptions = {}
): InterestMetrics {
  const topN = options.topN ?? 10;
  const minKeywordLength = options.minKeywordLength ?? 4;

  const hashtags = new FrequencyTable();
  const mentions = new FrequencyTable();
  const likedAuthors = new FrequencyTable();
  const keywords = new FrequencyTable();

  for (const tweet of tweets) {
    hashtags.addAll(tweet.hashtags);
    mentions.addAll(tweet.mentions);
    keywords.addAll(extractKeywords(tweet.fullText, minKeywordLength));
  }

  for (const like of likes) {
    hashtags.addAll(like.hashtags);
    mentions.addAll(like.mentions);
    if (like.originalAuthorHandle) {
      likedAuthors.add(like.originalAuthorHandle);
    }
  }

  return {
    hashtags: hashtags.entries(topN),
    mentions: mentions.entries(topN),
    likedAuthors: likedAuthors.entries(topN),
    keywords: keywords.entries(topN),
  };
}
