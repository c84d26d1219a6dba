/**
 * @fileoverview Assessment History Records
 *
 * Snapshot of a scored assessment as kept by the history collaborator.
 * Persistence itself lives outside the domain; only the port is declared here.
 *
 * @module domain/assessment-history/assessment-record
 */

import type {
  AssessmentRecord,
  AssessmentResult,
  PatientAssessmentInput,
  SymptomSnapshot,
} from '@cardiorisk/types';

import { normalizeAge } from '../cardiac-risk/demographics.js';
import { RISK_FACTOR_ORDER } from '../cardiac-risk/recommendation-generator.js';
import { readPlausibleVitals } from '../cardiac-risk/vital-signs.js';

/**
 * History store port
 *
 * Implementations decide where records live and how many are retained.
 */
export interface AssessmentHistoryStore {
  save(record: AssessmentRecord): Promise<void>;
  /** All stored records, in any order */
  list(): Promise<readonly AssessmentRecord[]>;
  /** Remove every stored record */
  clear(): Promise<void>;
}

export interface AssessmentRecordMetadata {
  readonly id: string;
  readonly assessedAt: Date;
}

function snapshotSymptoms(input: PatientAssessmentInput): SymptomSnapshot {
  return {
    chestPainType: input.chestPainType ?? 'none',
    chestPainDurationMinutes: input.chestPainDurationMinutes ?? null,
    shortnessOfBreathLevel: input.shortnessOfBreathLevel ?? 'none',
    palpitations: input.palpitations === true,
    syncope: input.syncope === true || input.fainting === true,
    neurologicalSymptoms: input.neurologicalSymptoms === true,
    legSwelling: input.legSwelling === true,
    sweating: input.sweating === true,
    dizziness: input.dizziness === true,
    nausea: input.nausea === true,
  };
}

/**
 * Build the history record for a scored assessment.
 * Implausible vitals are stored as null, like unmeasured ones.
 */
export function toAssessmentRecord(
  input: PatientAssessmentInput,
  result: AssessmentResult,
  metadata: AssessmentRecordMetadata
): AssessmentRecord {
  const { readings } = readPlausibleVitals(input);

  return {
    id: metadata.id,
    date: metadata.assessedAt.toISOString(),
    finalRiskScore: result.finalRiskScore,
    likelihoodScore: result.likelihoodScore,
    impactScore: result.impactScore,
    riskCategory: result.riskCategory,
    likelihoodLevel: result.likelihoodLevel,
    impactLevel: result.impactLevel,
    recommendedAction: result.recommendedAction,
    systolicBP: readings.systolicBP ?? null,
    diastolicBP: readings.diastolicBP ?? null,
    heartRate: readings.heartRate ?? null,
    oxygenSaturation: readings.oxygenSaturation ?? null,
    temperature: readings.temperature ?? null,
    symptoms: snapshotSymptoms(input),
    riskFactors: Object.fromEntries(
      RISK_FACTOR_ORDER.map((factor) => [factor, input.riskFactors?.[factor] === true])
    ),
    age: normalizeAge(input.age),
    sex: input.sex ?? null,
  };
}
