/**
 * @fileoverview Impact Scorer
 *
 * Estimates the severity of physiological compromise from vital signs.
 * Each measured vital is placed in a severity tier (see vital-signs.ts) and
 * the impact score is the highest tier observed.
 *
 * Vitals that were not measured, or whose reading is implausible, contribute
 * nothing: with no usable vitals the impact stays at tier 1 (Negligible).
 *
 * Acute-symptom modifier: when the worst vital is already tier 3 or above,
 * severe breathlessness or chest pain lasting over 20 minutes raises the
 * impact by one tier (clamped to 5).
 *
 * @module domain/cardiac-risk/impact-scorer
 */

import type { PatientAssessmentInput, ScoreFactor, VitalSignName } from '@cardiorisk/types';

import { PROLONGED_CHEST_PAIN_MINUTES } from './likelihood-scorer.js';
import { IMPACT_LEVELS, toRiskScale, type ImpactAssessment, type RiskScale } from './types.js';
import {
  VITAL_SIGN_NAMES,
  VITAL_SIGN_UNITS,
  diastolicTier,
  hasBreathlessness,
  hasChestPain,
  heartRateTier,
  oxygenSaturationTier,
  readPlausibleVitals,
  systolicTier,
  temperatureTier,
} from './vital-signs.js';

const MODIFIER_THRESHOLD: RiskScale = 3;

function tierFor(name: VitalSignName, value: number, input: PatientAssessmentInput): RiskScale {
  switch (name) {
    case 'systolicBP':
      return systolicTier(value);
    case 'diastolicBP':
      return diastolicTier(value);
    case 'heartRate':
      return heartRateTier(value);
    case 'oxygenSaturation':
      return oxygenSaturationTier(value);
    case 'temperature':
      return temperatureTier(value, hasChestPain(input) || hasBreathlessness(input));
  }
}

function acuteSymptom(input: PatientAssessmentInput): string | null {
  if (input.shortnessOfBreathLevel === 'severe') {
    return 'severe shortness of breath';
  }
  if (hasChestPain(input) && (input.chestPainDurationMinutes ?? 0) > PROLONGED_CHEST_PAIN_MINUTES) {
    return `chest pain lasting over ${PROLONGED_CHEST_PAIN_MINUTES} minutes`;
  }
  return null;
}

/**
 * Score the physiological impact
 */
export function scoreImpact(input: PatientAssessmentInput): ImpactAssessment {
  const { readings, discarded } = readPlausibleVitals(input);
  const factors: ScoreFactor[] = [];
  let worstTier: RiskScale = 1;

  for (const name of VITAL_SIGN_NAMES) {
    const value = readings[name];
    if (value === undefined) continue;

    const tier = tierFor(name, value, input);
    factors.push({ factor: name, points: tier, detail: `${value} ${VITAL_SIGN_UNITS[name]}` });
    if (tier > worstTier) worstTier = tier;
  }

  let score: RiskScale = worstTier;
  const acute = worstTier >= MODIFIER_THRESHOLD ? acuteSymptom(input) : null;
  if (acute) {
    score = toRiskScale(worstTier + 1);
    factors.push({ factor: 'acuteSymptomModifier', points: 1, detail: acute });
  }

  return {
    score,
    level: IMPACT_LEVELS[score],
    factors,
    discardedVitals: discarded,
  };
}
