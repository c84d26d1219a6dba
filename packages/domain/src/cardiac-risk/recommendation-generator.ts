/**
 * @fileoverview Recommendation Generator
 *
 * Turns the risk category and the specific abnormal findings of an
 * assessment into a recommended action and an ordered advice list.
 *
 * Order is fixed and never re-sorted by severity:
 * 1. category-level advice (score summary first)
 * 2. vital-sign advice: blood pressure, heart rate, oxygen saturation, temperature
 * 3. risk-factor advice, in RISK_FACTOR_ORDER
 *
 * @module domain/cardiac-risk/recommendation-generator
 */

import type {
  PatientAssessmentInput,
  RecommendationItem,
  RecommendationSection,
  RiskCategory,
  RiskFactors,
} from '@cardiorisk/types';

import {
  CATEGORY_RECOMMENDATIONS,
  RECOMMENDATION_TEXT,
  RECOMMENDED_ACTIONS,
  type RecommendationKey,
} from './recommendation-catalog.js';
import type { RecommendationSet } from './types.js';
import {
  bloodPressureStatus,
  heartRateStatus,
  isOxygenSaturationLow,
  readPlausibleVitals,
  temperatureStatus,
} from './vital-signs.js';

export const SCORE_SUMMARY_KEY = 'category.scoreSummary';

export const RISK_FACTOR_ORDER: readonly (keyof RiskFactors)[] = [
  'previousHeartDisease',
  'hypertension',
  'diabetes',
  'chronicKidneyDisease',
  'highCholesterol',
  'smoking',
  'obesity',
  'familyHistory',
];

const RISK_FACTOR_KEYS: Readonly<Record<keyof RiskFactors, RecommendationKey>> = {
  previousHeartDisease: 'riskFactor.previousHeartDisease',
  hypertension: 'riskFactor.hypertension',
  diabetes: 'riskFactor.diabetes',
  chronicKidneyDisease: 'riskFactor.chronicKidneyDisease',
  highCholesterol: 'riskFactor.highCholesterol',
  smoking: 'riskFactor.smoking',
  obesity: 'riskFactor.obesity',
  familyHistory: 'riskFactor.familyHistory',
};

function item(key: RecommendationKey, section: RecommendationSection): RecommendationItem {
  return { key, section, text: RECOMMENDATION_TEXT[key] };
}

function vitalSignKeys(input: PatientAssessmentInput): RecommendationKey[] {
  const { readings } = readPlausibleVitals(input);
  const keys: RecommendationKey[] = [];

  switch (bloodPressureStatus(readings)) {
    case 'critical':
      keys.push('vital.bloodPressure.critical');
      break;
    case 'elevated':
      keys.push('vital.bloodPressure.elevated');
      break;
    case 'low':
      keys.push('vital.bloodPressure.low');
      break;
    default:
      break;
  }

  if (readings.heartRate !== undefined) {
    const status = heartRateStatus(readings.heartRate);
    if (status === 'high') keys.push('vital.heartRate.high');
    if (status === 'low') keys.push('vital.heartRate.low');
  }

  if (readings.oxygenSaturation !== undefined && isOxygenSaturationLow(readings.oxygenSaturation)) {
    keys.push('vital.oxygenSaturation.low');
  }

  if (readings.temperature !== undefined) {
    const status = temperatureStatus(readings.temperature);
    if (status === 'fever') keys.push('vital.temperature.fever');
    if (status === 'low') keys.push('vital.temperature.low');
  }

  return keys;
}

function riskFactorKeys(riskFactors: RiskFactors | undefined): RecommendationKey[] {
  if (!riskFactors) return [];
  return RISK_FACTOR_ORDER.filter((factor) => riskFactors[factor] === true).map(
    (factor) => RISK_FACTOR_KEYS[factor]
  );
}

/**
 * Build the recommended action and advice list for an assessment
 */
export function generateRecommendations(
  riskCategory: RiskCategory,
  finalRiskScore: number,
  input: PatientAssessmentInput
): RecommendationSet {
  const items: RecommendationItem[] = [
    {
      key: SCORE_SUMMARY_KEY,
      section: 'category',
      text: `Your overall risk score is ${finalRiskScore} out of 25 (${riskCategory}).`,
    },
    ...CATEGORY_RECOMMENDATIONS[riskCategory].map((key) => item(key, 'category')),
    ...vitalSignKeys(input).map((key) => item(key, 'vital-sign')),
    ...riskFactorKeys(input.riskFactors).map((key) => item(key, 'risk-factor')),
  ];

  return {
    recommendedAction: RECOMMENDED_ACTIONS[riskCategory],
    recommendations: items.map((i) => i.text),
    items,
  };
}
