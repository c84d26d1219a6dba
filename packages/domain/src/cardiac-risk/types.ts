/**
 * @fileoverview Cardiac Risk Domain Types
 *
 * Pure domain types for the likelihood × impact risk matrix.
 * No infrastructure dependencies.
 *
 * @module domain/cardiac-risk/types
 */

import type {
  HeatmapPosition,
  ImpactLevel,
  LikelihoodLevel,
  RecommendationItem,
  RiskCategory,
  ScoreFactor,
  VitalSignName,
} from '@cardiorisk/types';

/** A position on one axis of the 5×5 risk matrix */
export type RiskScale = 1 | 2 | 3 | 4 | 5;

export const LIKELIHOOD_LEVELS: Readonly<Record<RiskScale, LikelihoodLevel>> = {
  1: 'Improbable',
  2: 'Remote',
  3: 'Occasional',
  4: 'Probable',
  5: 'Very Probable',
};

export const IMPACT_LEVELS: Readonly<Record<RiskScale, ImpactLevel>> = {
  1: 'Negligible',
  2: 'Low',
  3: 'Moderate',
  4: 'Significant',
  5: 'Critical',
};

/**
 * Map a raw number onto the 1-5 scale, clamping at both ends
 */
export function toRiskScale(value: number): RiskScale {
  if (value <= 1) return 1;
  if (value <= 2) return 2;
  if (value <= 3) return 3;
  if (value <= 4) return 4;
  return 5;
}

/**
 * Output of the likelihood scorer
 */
export interface LikelihoodAssessment {
  readonly score: RiskScale;
  readonly level: LikelihoodLevel;
  /** Sum of rule points before banding (starts at 1) */
  readonly rawScore: number;
  readonly factors: readonly ScoreFactor[];
}

/**
 * Output of the impact scorer
 */
export interface ImpactAssessment {
  readonly score: RiskScale;
  readonly level: ImpactLevel;
  readonly factors: readonly ScoreFactor[];
  /** Vitals that were present but implausible, treated as not measured */
  readonly discardedVitals: readonly VitalSignName[];
}

/**
 * Output of the risk classifier
 */
export interface RiskClassification {
  readonly finalRiskScore: number;
  readonly riskCategory: RiskCategory;
  readonly heatmapPosition: HeatmapPosition;
}

/**
 * Output of the recommendation generator
 */
export interface RecommendationSet {
  readonly recommendedAction: string;
  readonly recommendations: readonly string[];
  readonly items: readonly RecommendationItem[];
}
