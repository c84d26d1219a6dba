import { z } from 'zod';

/**
 * Cardiac Risk Assessment Schemas
 *
 * Shapes exchanged between the assessment form, the scoring core, the history
 * store and the report generators. Range checks on vital signs are NOT part of
 * these schemas: the scoring core treats implausible readings as unknown.
 */

// =============================================================================
// Enumerations
// =============================================================================

export const SexSchema = z.enum(['male', 'female']);

export const ChestPainTypeSchema = z.enum([
  'none',
  'typical',
  'pressure',
  'crushing',
  'sharp',
  'burning',
  'aching',
  'other',
]);

export const ShortnessOfBreathLevelSchema = z.enum(['none', 'mild', 'moderate', 'severe']);

export const LikelihoodLevelSchema = z.enum([
  'Improbable',
  'Remote',
  'Occasional',
  'Probable',
  'Very Probable',
]);

export const ImpactLevelSchema = z.enum(['Negligible', 'Low', 'Moderate', 'Significant', 'Critical']);

export const RiskCategorySchema = z.enum(['Low', 'Mild', 'Moderate', 'High', 'Critical']);

export const VitalSignNameSchema = z.enum([
  'systolicBP',
  'diastolicBP',
  'heartRate',
  'oxygenSaturation',
  'temperature',
]);

export const RecommendationSectionSchema = z.enum(['category', 'vital-sign', 'risk-factor']);

// =============================================================================
// Input
// =============================================================================

export const RiskFactorsSchema = z.object({
  hypertension: z.boolean().optional(),
  diabetes: z.boolean().optional(),
  chronicKidneyDisease: z.boolean().optional(),
  highCholesterol: z.boolean().optional(),
  smoking: z.boolean().optional(),
  obesity: z.boolean().optional(),
  familyHistory: z.boolean().optional(),
  previousHeartDisease: z.boolean().optional(),
});

/**
 * Patient assessment as collected by the questionnaire.
 *
 * `age` and `sex` are nullable here so that an incomplete form still parses;
 * the scoring core rejects it with a precondition failure instead.
 */
export const PatientAssessmentInputSchema = z.object({
  age: z.number().int().nullable().optional(),
  sex: SexSchema.nullable().optional(),

  // Symptoms
  chestPainType: ChestPainTypeSchema.optional(),
  chestPainDurationMinutes: z.number().int().nonnegative().optional(),
  chestPainRadiation: z.boolean().optional(),
  chestPainExertional: z.boolean().optional(),
  shortnessOfBreathLevel: ShortnessOfBreathLevelSchema.optional(),
  palpitations: z.boolean().optional(),
  palpitationsIrregular: z.boolean().optional(),
  syncope: z.boolean().optional(),
  fainting: z.boolean().optional(),
  neurologicalSymptoms: z.boolean().optional(),
  legSwelling: z.boolean().optional(),
  sweating: z.boolean().optional(),
  dizziness: z.boolean().optional(),
  nausea: z.boolean().optional(),

  // Vital signs
  systolicBP: z.number().int().optional(), // mmHg
  diastolicBP: z.number().int().optional(), // mmHg
  heartRate: z.number().int().optional(), // bpm
  oxygenSaturation: z.number().int().optional(), // %
  temperature: z.number().optional(), // °C

  riskFactors: RiskFactorsSchema.optional(),
});

// =============================================================================
// Output
// =============================================================================

export const HeatmapPositionSchema = z.object({
  x: z.number().int().min(0).max(4),
  y: z.number().int().min(0).max(4),
});

export const RecommendationItemSchema = z.object({
  key: z.string(), // canonical localization key, e.g. "vital.bloodPressure.elevated"
  section: RecommendationSectionSchema,
  text: z.string(),
});

export const ScoreFactorSchema = z.object({
  factor: z.string(),
  points: z.number(),
  detail: z.string(),
});

export const AssessmentResultSchema = z.object({
  likelihoodScore: z.number().int().min(1).max(5),
  likelihoodLevel: LikelihoodLevelSchema,
  impactScore: z.number().int().min(1).max(5),
  impactLevel: ImpactLevelSchema,
  finalRiskScore: z.number().int().min(1).max(25),
  riskCategory: RiskCategorySchema,
  heatmapPosition: HeatmapPositionSchema,
  recommendedAction: z.string(),
  explanation: z.string(),
  recommendations: z.array(z.string()),
  recommendationItems: z.array(RecommendationItemSchema),
  likelihoodFactors: z.array(ScoreFactorSchema),
  impactFactors: z.array(ScoreFactorSchema),
  discardedVitals: z.array(VitalSignNameSchema),
  safetyMessage: z.string(),
  algorithmVersion: z.string(),
});

// =============================================================================
// History record
// =============================================================================

export const SymptomSnapshotSchema = z.object({
  chestPainType: ChestPainTypeSchema,
  chestPainDurationMinutes: z.number().int().nonnegative().nullable(),
  shortnessOfBreathLevel: ShortnessOfBreathLevelSchema,
  palpitations: z.boolean(),
  syncope: z.boolean(),
  neurologicalSymptoms: z.boolean(),
  legSwelling: z.boolean(),
  sweating: z.boolean(),
  dizziness: z.boolean(),
  nausea: z.boolean(),
});

/**
 * One entry in the patient's assessment history, as persisted by the
 * history store and read back for trend analytics.
 */
export const AssessmentRecordSchema = z.object({
  id: z.string().min(1),
  date: z.string().datetime(),
  finalRiskScore: z.number().int().min(1).max(25),
  likelihoodScore: z.number().int().min(1).max(5),
  impactScore: z.number().int().min(1).max(5),
  riskCategory: RiskCategorySchema,
  likelihoodLevel: LikelihoodLevelSchema,
  impactLevel: ImpactLevelSchema,
  recommendedAction: z.string(),
  systolicBP: z.number().int().nullable(),
  diastolicBP: z.number().int().nullable(),
  heartRate: z.number().int().nullable(),
  oxygenSaturation: z.number().int().nullable(),
  temperature: z.number().nullable(),
  symptoms: SymptomSnapshotSchema,
  riskFactors: z.record(z.string(), z.boolean()),
  age: z.number().int().min(0).max(120).nullable(),
  sex: SexSchema.nullable(),
});

// =============================================================================
// Inferred types
// =============================================================================

export type Sex = z.infer<typeof SexSchema>;
export type ChestPainType = z.infer<typeof ChestPainTypeSchema>;
export type ShortnessOfBreathLevel = z.infer<typeof ShortnessOfBreathLevelSchema>;
export type LikelihoodLevel = z.infer<typeof LikelihoodLevelSchema>;
export type ImpactLevel = z.infer<typeof ImpactLevelSchema>;
export type RiskCategory = z.infer<typeof RiskCategorySchema>;
export type VitalSignName = z.infer<typeof VitalSignNameSchema>;
export type RecommendationSection = z.infer<typeof RecommendationSectionSchema>;
export type RiskFactors = z.infer<typeof RiskFactorsSchema>;
export type PatientAssessmentInput = z.infer<typeof PatientAssessmentInputSchema>;
export type HeatmapPosition = z.infer<typeof HeatmapPositionSchema>;
export type RecommendationItem = z.infer<typeof RecommendationItemSchema>;
export type ScoreFactor = z.infer<typeof ScoreFactorSchema>;
export type AssessmentResult = z.infer<typeof AssessmentResultSchema>;
export type SymptomSnapshot = z.infer<typeof SymptomSnapshotSchema>;
export type AssessmentRecord = z.infer<typeof AssessmentRecordSchema>;
