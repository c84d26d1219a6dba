/**
 * CardioRisk Types Package
 *
 * Zod schemas and inferred TypeScript types for cardiovascular risk
 * assessments. Schemas are the single source of truth for every enumeration
 * shared between the scoring core and its collaborators.
 *
 * @module @cardiorisk/types
 */

export {
  // Enumerations
  SexSchema,
  ChestPainTypeSchema,
  ShortnessOfBreathLevelSchema,
  LikelihoodLevelSchema,
  ImpactLevelSchema,
  RiskCategorySchema,
  VitalSignNameSchema,
  RecommendationSectionSchema,
  type Sex,
  type ChestPainType,
  type ShortnessOfBreathLevel,
  type LikelihoodLevel,
  type ImpactLevel,
  type RiskCategory,
  type VitalSignName,
  type RecommendationSection,

  // Input
  RiskFactorsSchema,
  PatientAssessmentInputSchema,
  type RiskFactors,
  type PatientAssessmentInput,

  // Output
  HeatmapPositionSchema,
  RecommendationItemSchema,
  ScoreFactorSchema,
  AssessmentResultSchema,
  type HeatmapPosition,
  type RecommendationItem,
  type ScoreFactor,
  type AssessmentResult,

  // History
  SymptomSnapshotSchema,
  AssessmentRecordSchema,
  type SymptomSnapshot,
  type AssessmentRecord,
} from './cardiac-assessment.schema.js';
