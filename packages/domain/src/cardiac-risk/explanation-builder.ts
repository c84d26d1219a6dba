/**
 * @fileoverview Explanation Builder
 *
 * Human-readable rationale naming the findings that drove the result.
 *
 * @module domain/cardiac-risk/explanation-builder
 */

import type { PatientAssessmentInput } from '@cardiorisk/types';

import { PROLONGED_CHEST_PAIN_MINUTES } from './likelihood-scorer.js';
import type { RiskScale } from './types.js';
import { hasChestPain } from './vital-signs.js';

export const NEUTRAL_EXPLANATION =
  'Based on your current symptoms and vital signs, your risk level has been assessed.';

export function buildExplanation(
  input: PatientAssessmentInput,
  likelihood: RiskScale,
  impact: RiskScale
): string {
  const findings: string[] = [];

  if (likelihood >= 4) {
    findings.push('your pattern suggests a cardiac condition');
  } else if (likelihood >= 3) {
    findings.push('your pattern may indicate a cardiac condition');
  }

  if (impact >= 4) {
    findings.push('physiologic impact appears critical');
  } else if (impact >= 3) {
    findings.push('physiologic impact shows concerning signs');
  }

  const type = input.chestPainType;
  if (type === 'typical' || type === 'pressure' || type === 'crushing') {
    findings.push('you reported typical chest pain symptoms');
  }

  if (hasChestPain(input) && (input.chestPainDurationMinutes ?? 0) > PROLONGED_CHEST_PAIN_MINUTES) {
    findings.push(`your chest pain has lasted over ${PROLONGED_CHEST_PAIN_MINUTES} minutes`);
  }

  if (input.shortnessOfBreathLevel === 'severe') {
    findings.push('you have severe shortness of breath');
  }

  if (input.syncope === true || input.fainting === true) {
    findings.push('you experienced syncope or fainting');
  }

  if (findings.length === 0) {
    return NEUTRAL_EXPLANATION;
  }

  return `Based on your assessment: ${findings.join(', ')}. This contributes to your overall risk level.`;
}
