/**
 * @fileoverview Risk Classifier
 *
 * Places an assessment on the 5×5 likelihood × impact matrix.
 *
 * | Final score | Category |
 * |-------------|----------|
 * | 1-5         | Low      |
 * | 6-10        | Mild     |
 * | 11-15       | Moderate |
 * | 16-20       | High     |
 * | 21-25       | Critical |
 *
 * @module domain/cardiac-risk/risk-classifier
 */

import type { RiskCategory } from '@cardiorisk/types';

import type { RiskClassification, RiskScale } from './types.js';

export interface RiskCategoryBand {
  readonly category: RiskCategory;
  readonly min: number;
  readonly max: number;
}

export const RISK_CATEGORY_BANDS: readonly RiskCategoryBand[] = [
  { category: 'Low', min: 1, max: 5 },
  { category: 'Mild', min: 6, max: 10 },
  { category: 'Moderate', min: 11, max: 15 },
  { category: 'High', min: 16, max: 20 },
  { category: 'Critical', min: 21, max: 25 },
];

export const RISK_SCALE_VALUES: readonly RiskScale[] = [1, 2, 3, 4, 5];

/**
 * Category for a final risk score (1-25)
 */
export function categorizeRiskScore(finalRiskScore: number): RiskCategory {
  for (const band of RISK_CATEGORY_BANDS) {
    if (finalRiskScore <= band.max) return band.category;
  }
  return 'Critical';
}

/**
 * Combine likelihood and impact into the matrix cell
 */
export function classifyRisk(likelihood: RiskScale, impact: RiskScale): RiskClassification {
  const finalRiskScore = likelihood * impact;

  return {
    finalRiskScore,
    riskCategory: categorizeRiskScore(finalRiskScore),
    heatmapPosition: { x: likelihood - 1, y: impact - 1 },
  };
}

/**
 * Full 5×5 grid of categories for display.
 * Indexed as `matrix[y][x]`, i.e. `matrix[impact - 1][likelihood - 1]`,
 * matching `heatmapPosition`.
 */
export function buildRiskMatrix(): RiskCategory[][] {
  return RISK_SCALE_VALUES.map((impact) =>
    RISK_SCALE_VALUES.map((likelihood) => classifyRisk(likelihood, impact).riskCategory)
  );
}
