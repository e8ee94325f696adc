/**
 * Network quality score
 *
 * Each component earns `weight × min(value / ceiling, 1)`; weights and ceilings are policy
 * (see ScoringPolicy). The integer score is 0 only for an account with no followers and no
 * mutual follows, and 100 only when every component reaches its ceiling.
 */

import { DEFAULT_SCORING_POLICY, ScoringPolicy } from '../types/config';
import type { QualityBand, ScoreBreakdown } from '../types/metrics';
import { computeEngagementRate, computeFollowerRatio } from './relationship-analyzer';

const FULL_SCORE_EPSILON = 1e-9;

export interface ScoreInput {
  followerCount: number;
  followingCount: number;
  mutualCount: number;
}

function component(value: number, ceiling: number, weight: number): number {
  return weight * Math.min(value / ceiling, 1);
}

export function describeScore(score: number): QualityBand {
  if (score >= 80) return 'excellent';
  if (score >= 60) return 'good';
  if (score >= 40) return 'fair';
  return 'low';
}

export function computeNetworkQualityScore(
  input: ScoreInput,
  policy: ScoringPolicy = DEFAULT_SCORING_POLICY
): ScoreBreakdown {
  const { followerCount, followingCount, mutualCount } = input;
  const { weights, ceilings } = policy;

  const totalConnections = followerCount + followingCount - mutualCount;
  const mutualShare = totalConnections > 0 ? mutualCount / totalConnections : 0;

  const components = {
    engagement: component(
      computeEngagementRate(mutualCount, followingCount),
      ceilings.engagementRate,
      weights.engagement
    ),
    followerRatio: component(
      computeFollowerRatio(followerCount, followingCount),
      ceilings.followerRatio,
      weights.followerRatio
    ),
    mutualShare: component(mutualShare, ceilings.mutualShare, weights.mutualShare),
  };

  const raw = components.engagement + components.followerRatio + components.mutualShare;

  let score: number;
  if (raw <= 0) {
    score = 0;
  } else if (raw >= 100 - FULL_SCORE_EPSILON) {
    score = 100;
  } else {
    score = Math.min(99, Math.max(1, Math.floor(raw)));
  }

  return { score, raw, components, band: describeScore(score) };
}
