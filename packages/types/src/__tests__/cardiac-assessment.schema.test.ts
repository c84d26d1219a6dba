/**
 * Cardiac Assessment Schema Tests
 */

import { describe, it, expect } from 'vitest';
import {
  AssessmentRecordSchema,
  ChestPainTypeSchema,
  PatientAssessmentInputSchema,
  RiskCategorySchema,
} from '../cardiac-assessment.schema.js';

describe('PatientAssessmentInputSchema', () => {
  it('should accept a complete assessment', () => {
    const input = {
      age: 58,
      sex: 'female',
      chestPainType: 'pressure',
      chestPainDurationMinutes: 25,
      chestPainRadiation: true,
      chestPainExertional: false,
      shortnessOfBreathLevel: 'moderate',
      palpitations: true,
      palpitationsIrregular: true,
      systolicBP: 142,
      diastolicBP: 91,
      heartRate: 96,
      oxygenSaturation: 97,
      temperature: 37.1,
      riskFactors: { hypertension: true, smoking: false },
    };

    expect(PatientAssessmentInputSchema.parse(input)).toEqual(input);
  });

  it('should accept an empty form so the core can report missing demographics', () => {
    expect(PatientAssessmentInputSchema.safeParse({}).success).toBe(true);
    expect(PatientAssessmentInputSchema.safeParse({ age: null, sex: null }).success).toBe(true);
  });

  it('should accept out-of-range vitals', () => {
    expect(PatientAssessmentInputSchema.safeParse({ systolicBP: 400 }).success).toBe(true);
  });

  it('should reject a fractional age', () => {
    expect(PatientAssessmentInputSchema.safeParse({ age: 45.5 }).success).toBe(false);
  });

  it('should reject a negative chest pain duration', () => {
    expect(PatientAssessmentInputSchema.safeParse({ chestPainDurationMinutes: -1 }).success).toBe(
      false
    );
  });

  it('should reject an unknown breathlessness level', () => {
    expect(
      PatientAssessmentInputSchema.safeParse({ shortnessOfBreathLevel: 'extreme' }).success
    ).toBe(false);
  });
});

describe('enumerations', () => {
  it('should list the chest pain types', () => {
    expect(ChestPainTypeSchema.options).toEqual([
      'none',
      'typical',
      'pressure',
      'crushing',
      'sharp',
      'burning',
      'aching',
      'other',
    ]);
  });

  it('should order risk categories from Low to Critical', () => {
    expect(RiskCategorySchema.options).toEqual(['Low', 'Mild', 'Moderate', 'High', 'Critical']);
  });
});

describe('AssessmentRecordSchema', () => {
  const record = {
    id: 'assessment-1',
    date: '2026-02-14T08:30:00.000Z',
    finalRiskScore: 8,
    likelihoodScore: 2,
    impactScore: 4,
    riskCategory: 'Mild',
    likelihoodLevel: 'Remote',
    impactLevel: 'Significant',
    recommendedAction: 'Monitor symptoms and book a routine check-up',
    systolicBP: 165,
    diastolicBP: null,
    heartRate: null,
    oxygenSaturation: null,
    temperature: null,
    symptoms: {
      chestPainType: 'none',
      chestPainDurationMinutes: null,
      shortnessOfBreathLevel: 'none',
      palpitations: false,
      syncope: false,
      neurologicalSymptoms: false,
      legSwelling: false,
      sweating: false,
      dizziness: false,
      nausea: false,
    },
    riskFactors: { hypertension: true },
    age: 66,
    sex: 'male',
  };

  it('should accept a stored record', () => {
    expect(AssessmentRecordSchema.safeParse(record).success).toBe(true);
  });

  it('should reject a date that is not ISO 8601', () => {
    expect(AssessmentRecordSchema.safeParse({ ...record, date: '14/02/2026' }).success).toBe(false);
  });

  it('should reject a score outside the matrix', () => {
    expect(AssessmentRecordSchema.safeParse({ ...record, finalRiskScore: 30 }).success).toBe(false);
  });
});
