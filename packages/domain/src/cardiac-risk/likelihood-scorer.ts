/**
 * @fileoverview Likelihood Scorer
 *
 * Estimates how likely a cardiac event is from symptom and history evidence.
 *
 * SCORING ALGORITHM:
 * Raw score starts at 1.0 (Improbable); every rule below only adds points.
 *
 * 1. Chest pain character (one of)
 *    - Typical (explicit, or pressure/crushing + >10 min + radiating + exertional): +2
 *    - Pressure / crushing otherwise: +1.5
 *    - Sharp / burning / aching / other: +0.5
 * 2. Chest pain lasting more than 20 minutes: +1
 * 3. Chest pain brought on by exertion: +1
 * 4. Shortness of breath: severe +2, moderate +1
 * 5. Syncope or fainting: +2
 * 6. Neurological symptoms: +2
 * 7. Palpitations with heart rate >120 bpm or irregular rhythm: +1
 * 8. Two or more of sweating, nausea, dizziness, leg swelling: +1
 * 9. Two or more major risk factors: +1
 * 10. Male aged 55+ or female aged 65+: +1
 *
 * Bands: <=1 → 1, <=3 → 2, <=5 → 3, <=7 → 4, otherwise 5.
 *
 * Absent fields count as the lowest severity. Age and sex, when unknown,
 * contribute nothing.
 *
 * @module domain/cardiac-risk/likelihood-scorer
 */

import type { PatientAssessmentInput, RiskFactors, ScoreFactor } from '@cardiorisk/types';

import { LIKELIHOOD_LEVELS, type LikelihoodAssessment, type RiskScale } from './types.js';
import { hasChestPain, readPlausibleVitals } from './vital-signs.js';

const BASELINE = 1;

/** Minutes of chest pain beyond which the episode counts as prolonged */
export const PROLONGED_CHEST_PAIN_MINUTES = 20;

const MAJOR_RISK_FACTORS: readonly (keyof RiskFactors)[] = [
  'diabetes',
  'hypertension',
  'chronicKidneyDisease',
  'highCholesterol',
  'previousHeartDisease',
  'smoking',
];

/**
 * Map the raw likelihood score onto the 1-5 scale
 */
export function bandLikelihood(rawScore: number): RiskScale {
  if (rawScore <= 1) return 1;
  if (rawScore <= 3) return 2;
  if (rawScore <= 5) return 3;
  if (rawScore <= 7) return 4;
  return 5;
}

function scoreChestPainCharacter(input: PatientAssessmentInput): ScoreFactor | null {
  const type = input.chestPainType;
  if (type === undefined || type === 'none') return null;

  if (type === 'typical') {
    return { factor: 'chestPain', points: 2, detail: 'typical chest pain' };
  }

  if (type === 'pressure' || type === 'crushing') {
    const typicalPattern =
      (input.chestPainDurationMinutes ?? 0) > 10 &&
      input.chestPainRadiation === true &&
      input.chestPainExertional === true;

    return typicalPattern
      ? { factor: 'chestPain', points: 2, detail: `${type} pain with typical pattern` }
      : { factor: 'chestPain', points: 1.5, detail: `${type} pain` };
  }

  return { factor: 'chestPain', points: 0.5, detail: `${type} pain` };
}

function scoreBreathlessness(input: PatientAssessmentInput): ScoreFactor | null {
  switch (input.shortnessOfBreathLevel) {
    case 'severe':
      return { factor: 'shortnessOfBreath', points: 2, detail: 'severe shortness of breath' };
    case 'moderate':
      return { factor: 'shortnessOfBreath', points: 1, detail: 'moderate shortness of breath' };
    default:
      return null;
  }
}

function scorePalpitations(input: PatientAssessmentInput): ScoreFactor | null {
  if (input.palpitations !== true) return null;

  const { heartRate } = readPlausibleVitals(input).readings;
  const tachycardic = heartRate !== undefined && heartRate > 120;
  if (!tachycardic && input.palpitationsIrregular !== true) return null;

  return {
    factor: 'palpitations',
    points: 1,
    detail: tachycardic ? 'palpitations with heart rate above 120 bpm' : 'irregular palpitations',
  };
}

function countAssociatedSymptoms(input: PatientAssessmentInput): number {
  return [input.sweating, input.nausea, input.dizziness, input.legSwelling].filter(
    (present) => present === true
  ).length;
}

export function countMajorRiskFactors(riskFactors: RiskFactors | undefined): number {
  if (!riskFactors) return 0;
  return MAJOR_RISK_FACTORS.filter((factor) => riskFactors[factor] === true).length;
}

function scoreDemographics(input: PatientAssessmentInput): ScoreFactor | null {
  const { age, sex } = input;
  if (age === undefined || age === null) return null;

  if (sex === 'male' && age >= 55) {
    return { factor: 'ageSex', points: 1, detail: 'male aged 55 or over' };
  }
  if (sex === 'female' && age >= 65) {
    return { factor: 'ageSex', points: 1, detail: 'female aged 65 or over' };
  }
  return null;
}

/**
 * Score the likelihood of a cardiac event
 */
export function scoreLikelihood(input: PatientAssessmentInput): LikelihoodAssessment {
  const factors: ScoreFactor[] = [];
  const add = (factor: ScoreFactor | null): void => {
    if (factor) factors.push(factor);
  };

  add(scoreChestPainCharacter(input));

  if (hasChestPain(input) && (input.chestPainDurationMinutes ?? 0) > PROLONGED_CHEST_PAIN_MINUTES) {
    add({
      factor: 'chestPainDuration',
      points: 1,
      detail: `chest pain lasting over ${PROLONGED_CHEST_PAIN_MINUTES} minutes`,
    });
  }

  if (hasChestPain(input) && input.chestPainExertional === true) {
    add({ factor: 'chestPainExertional', points: 1, detail: 'chest pain on exertion' });
  }

  add(scoreBreathlessness(input));

  if (input.syncope === true || input.fainting === true) {
    add({ factor: 'syncope', points: 2, detail: 'syncope or fainting' });
  }

  if (input.neurologicalSymptoms === true) {
    add({ factor: 'neurologicalSymptoms', points: 2, detail: 'neurological symptoms' });
  }

  add(scorePalpitations(input));

  const associated = countAssociatedSymptoms(input);
  if (associated >= 2) {
    add({
      factor: 'associatedSymptoms',
      points: 1,
      detail: `${associated} associated symptoms`,
    });
  }

  const majorRiskFactors = countMajorRiskFactors(input.riskFactors);
  if (majorRiskFactors >= 2) {
    add({
      factor: 'riskFactors',
      points: 1,
      detail: `${majorRiskFactors} major risk factors`,
    });
  }

  add(scoreDemographics(input));

  const rawScore = factors.reduce((sum, f) => sum + f.points, BASELINE);
  const score = bandLikelihood(rawScore);

  return {
    score,
    level: LIKELIHOOD_LEVELS[score],
    rawScore,
    factors,
  };
}
