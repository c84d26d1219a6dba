/**
 * @fileoverview Demographic preconditions
 *
 * Age and sex materially change the baseline likelihood, so an assessment
 * without them is either rejected or scored with no demographic contribution.
 *
 * @module domain/cardiac-risk/demographics
 */

import type { PatientAssessmentInput } from '@cardiorisk/types';

export const MIN_AGE = 0;
export const MAX_AGE = 120;

export type DemographicField = 'age' | 'sex';

/**
 * Clamp a reported age into [0, 120]; null when unknown or not a number
 */
export function normalizeAge(age: number | null | undefined): number | null {
  if (age === null || age === undefined || !Number.isFinite(age)) return null;
  return Math.min(MAX_AGE, Math.max(MIN_AGE, Math.round(age)));
}

/**
 * Demographic fields the assessment cannot be scored without
 */
export function missingDemographicFields(input: PatientAssessmentInput): DemographicField[] {
  const missing: DemographicField[] = [];
  if (normalizeAge(input.age) === null) missing.push('age');
  if (input.sex === null || input.sex === undefined) missing.push('sex');
  return missing;
}
