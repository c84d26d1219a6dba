/**
 * @fileoverview Vital Sign Ranges
 *
 * Plausibility bounds, severity tiers and normal ranges for the five vital
 * signs collected by the assessment form.
 *
 * SEVERITY TIERS (1 = normal, 5 = critical):
 *
 * | Vital        | 1         | 2                    | 3          | 4                  | 5                |
 * |--------------|-----------|----------------------|------------|--------------------|------------------|
 * | Systolic BP  | 90-129    | 130-139              | 140-159    | 160-180            | <90 or >180      |
 * | Diastolic BP | <80       | 80-89                | 90-109     | 110-120            | >120             |
 * | Heart rate   | 60-100    | 50-59                | 101-120    | 40-49 or 121-130   | <40 or >130      |
 * | SpO2         | >=95      |                      | 90-94      | 85-89              | <85              |
 * | Temperature  | 36.0-37.9 | 35.0-35.9, 38.0-38.5 | >38.5 (*)  | >=40.0 or <35.0    |                  |
 *
 * (*) only with chest pain or breathlessness; an isolated fever stays at tier 2.
 *
 * @module domain/cardiac-risk/vital-signs
 */

import {
  VitalSignNameSchema,
  type PatientAssessmentInput,
  type VitalSignName,
} from '@cardiorisk/types';

import type { RiskScale } from './types.js';

export const VITAL_SIGN_NAMES: readonly VitalSignName[] = VitalSignNameSchema.options;

/**
 * Physiologically plausible bounds. Readings outside are data-entry errors
 * and are treated as not measured.
 */
export const PLAUSIBLE_RANGES: Readonly<Record<VitalSignName, { min: number; max: number }>> = {
  systolicBP: { min: 50, max: 300 },
  diastolicBP: { min: 30, max: 200 },
  heartRate: { min: 30, max: 250 },
  oxygenSaturation: { min: 70, max: 100 },
  temperature: { min: 30, max: 45 },
};

export const VITAL_SIGN_UNITS: Readonly<Record<VitalSignName, string>> = {
  systolicBP: 'mmHg',
  diastolicBP: 'mmHg',
  heartRate: 'bpm',
  oxygenSaturation: '%',
  temperature: '°C',
};

export type VitalSignReadings = Partial<Record<VitalSignName, number>>;

export interface PlausibleVitals {
  readonly readings: VitalSignReadings;
  readonly discarded: readonly VitalSignName[];
}

/**
 * Split the input's vitals into usable readings and discarded ones
 */
export function readPlausibleVitals(input: PatientAssessmentInput): PlausibleVitals {
  const readings: VitalSignReadings = {};
  const discarded: VitalSignName[] = [];

  for (const name of VITAL_SIGN_NAMES) {
    const value = input[name];
    if (value === undefined) continue;

    const range = PLAUSIBLE_RANGES[name];
    if (!Number.isFinite(value) || value < range.min || value > range.max) {
      discarded.push(name);
      continue;
    }
    readings[name] = value;
  }

  return { readings, discarded };
}

export function hasChestPain(input: PatientAssessmentInput): boolean {
  return input.chestPainType !== undefined && input.chestPainType !== 'none';
}

export function hasBreathlessness(input: PatientAssessmentInput): boolean {
  return input.shortnessOfBreathLevel !== undefined && input.shortnessOfBreathLevel !== 'none';
}

// ============================================================================
// SEVERITY TIERS
// ============================================================================

export function systolicTier(mmHg: number): RiskScale {
  if (mmHg < 90 || mmHg > 180) return 5;
  if (mmHg >= 160) return 4;
  if (mmHg >= 140) return 3;
  if (mmHg >= 130) return 2;
  return 1;
}

export function diastolicTier(mmHg: number): RiskScale {
  if (mmHg > 120) return 5;
  if (mmHg >= 110) return 4;
  if (mmHg >= 90) return 3;
  if (mmHg >= 80) return 2;
  return 1;
}

export function heartRateTier(bpm: number): RiskScale {
  if (bpm < 40 || bpm > 130) return 5;
  if (bpm < 50 || bpm > 120) return 4;
  if (bpm > 100) return 3;
  if (bpm < 60) return 2;
  return 1;
}

export function oxygenSaturationTier(percent: number): RiskScale {
  if (percent < 85) return 5;
  if (percent < 90) return 4;
  if (percent < 95) return 3;
  return 1;
}

export function temperatureTier(celsius: number, cardioRespiratorySymptoms: boolean): RiskScale {
  if (celsius >= 40 || celsius < 35) return 4;
  if (celsius > 38.5) return cardioRespiratorySymptoms ? 3 : 2;
  if (celsius >= 38 || celsius < 36) return 2;
  return 1;
}

// ============================================================================
// NORMAL RANGES (used for patient-facing advice)
// ============================================================================

export type BloodPressureStatus = 'critical' | 'elevated' | 'low' | 'normal';

/**
 * Classify blood pressure for advice purposes. Either reading may be absent;
 * returns null when neither is available.
 */
export function bloodPressureStatus(readings: VitalSignReadings): BloodPressureStatus | null {
  const { systolicBP, diastolicBP } = readings;
  if (systolicBP === undefined && diastolicBP === undefined) return null;

  const sys = systolicBP ?? Number.NaN;
  const dia = diastolicBP ?? Number.NaN;

  // NaN comparisons are always false, so an absent reading never matches
  if (sys >= 180 || dia >= 110) return 'critical';
  if (sys >= 140 || dia >= 90) return 'elevated';
  if (sys < 90 || dia < 60) return 'low';
  return 'normal';
}

export type HeartRateStatus = 'high' | 'low' | 'normal';

export function heartRateStatus(bpm: number): HeartRateStatus {
  if (bpm >= 100) return 'high';
  if (bpm <= 50) return 'low';
  return 'normal';
}

export function isOxygenSaturationLow(percent: number): boolean {
  return percent < 95;
}

export type TemperatureStatus = 'fever' | 'low' | 'normal';

export function temperatureStatus(celsius: number): TemperatureStatus {
  if (celsius >= 38) return 'fever';
  if (celsius < 35) return 'low';
  return 'normal';
}
