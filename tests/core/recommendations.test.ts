/**
 * Recommendations 单元测试
 */

import { describe, expect, test } from 'vitest';
import { analyzeContent } from '../../core/content-analyzer';
import {
  evaluateRecommendations,
  evaluateRules,
  ProfileContext,
  RecommendationRule,
} from '../../core/recommendations';
import { analyzeRelationships } from '../../core/relationship-analyzer';
import type { Tweet } from '../../types/archive';
import { makeTweet } from '../fixtures/builders';

function context(followers: string[], following: string[], tweets: Tweet[] = []): ProfileContext {
  return {
    relationships: analyzeRelationships(new Set(followers), new Set(following)),
    content: analyzeContent(tweets),
  };
}

describe('evaluateRecommendations', () => {
  test('should fire the sample rules in priority order', () => {
    const tweets = [
      makeTweet({ id: '1' }),
      makeTweet({ id: '2', replyToId: '900' }),
      makeTweet({ id: '3', fullText: 'RT @friend_two: hello' }),
      makeTweet({ id: '4', isQuoteStatus: true }),
    ];
    const result = evaluateRecommendations(context(['101', '102', '103'], ['102', '103', '104', '105'], tweets));

    expect(result.map((r) => r.id)).toEqual(['growth-opportunity', 'review-one-sided', 'content-strategy']);
    expect(result[1].insight).toBe("2 accounts you follow don't follow back.");
    expect(result[0].category).toBe('Growth Opportunity');
  });

  test('should flag a network nobody follows back', () => {
    const result = evaluateRecommendations(context([], ['1', '2']));
    expect(result.map((r) => r.id)).toEqual(['network-growth', 'network-cleanup', 'review-one-sided']);
  });

  test('should flag tweets without readable timestamps', () => {
    const result = evaluateRecommendations(context([], [], [makeTweet({ createdAt: 'unknown' })]));
    expect(result.map((r) => r.id)).toEqual(['posting-rhythm']);
  });

  test('should flag rare hashtag use', () => {
    const tweets = Array.from({ length: 10 }, (_, i) => makeTweet({ id: String(i) }));
    expect(evaluateRecommendations(context([], [], tweets)).map((r) => r.id)).toEqual(['hashtag-usage']);
  });

  test('should return nothing for an empty archive', () => {
    expect(evaluateRecommendations(context([], []))).toEqual([]);
  });
});

describe('evaluateRules', () => {
  test('should order by priority then id', () => {
    const rules: RecommendationRule<number>[] = [
      { id: 'b', category: 'B', priority: 2, condition: () => true, insight: 'b', action: 'b' },
      { id: 'a', category: 'A', priority: 2, condition: () => true, insight: 'a', action: 'a' },
      { id: 'c', category: 'C', priority: 1, condition: (n) => n > 5, insight: (n) => `n=${n}`, action: 'c' },
      { id: 'd', category: 'D', priority: 0, condition: () => false, insight: 'd', action: 'd' },
    ];

    expect(evaluateRules(7, rules)).toEqual([
      { id: 'c', category: 'C', insight: 'n=7', action: 'c' },
      { id: 'a', category: 'A', insight: 'a', action: 'a' },
      { id: 'b', category: 'B', insight: 'b', action: 'b' },
    ]);
  });
});
