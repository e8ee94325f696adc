/**
 * Network quality score 单元测试
 */

import { describe, expect, test } from 'vitest';
import { computeNetworkQualityScore, describeScore } from '../../core/scoring';

describe('computeNetworkQualityScore', () => {
  test('should score the sample network', () => {
    const result = computeNetworkQualityScore({ followerCount: 3, followingCount: 4, mutualCount: 2 });

    expect(result.components).toEqual({ engagement: 50, followerRatio: 15, mutualShare: 20 });
    expect(result.raw).toBe(85);
    expect(result.score).toBe(85);
    expect(result.band).toBe('excellent');
  });

  test('should be 0 without followers and mutuals', () => {
    expect(computeNetworkQualityScore({ followerCount: 0, followingCount: 0, mutualCount: 0 }).score).toBe(0);
    expect(computeNetworkQualityScore({ followerCount: 0, followingCount: 5, mutualCount: 0 }).score).toBe(0);
  });

  test('should be 100 when every component reaches its ceiling', () => {
    const result = computeNetworkQualityScore({ followerCount: 3, followingCount: 2, mutualCount: 2 });
    expect(result.score).toBe(100);
  });

  test('should never round a small positive score down to 0', () => {
    const result = computeNetworkQualityScore({ followerCount: 1, followingCount: 100, mutualCount: 0 });

    expect(result.raw).toBeGreaterThan(0);
    expect(result.score).toBe(1);
    expect(result.band).toBe('low');
  });

  test('should not decrease as mutual follows grow', () => {
    let previous = -1;
    for (let mutual = 0; mutual <= 10; mutual++) {
      const { score } = computeNetworkQualityScore({ followerCount: 10, followingCount: 10, mutualCount: mutual });
      expect(score).toBeGreaterThanOrEqual(previous);
      previous = score;
    }
  });

  test('should apply a custom policy', () => {
    const result = computeNetworkQualityScore(
      { followerCount: 4, followingCount: 4, mutualCount: 2 },
      {
        weights: { engagement: 100, followerRatio: 0, mutualShare: 0 },
        ceilings: { engagementRate: 100, followerRatio: 1, mutualShare: 1 },
      }
    );

    expect(result.score).toBe(50);
    expect(result.band).toBe('fair');
  });
});

describe('describeScore', () => {
  test('should map bands at their thresholds', () => {
    expect(describeScore(80)).toBe('excellent');
    expect(describeScore(79)).toBe('good');
    expect(describeScore(60)).toBe('good');
    expect(describeScore(40)).toBe('fair');
    expect(describeScore(39)).toBe('low');
  });
});
