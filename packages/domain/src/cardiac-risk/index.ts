/**
 * @fileoverview Cardiac Risk Module
 *
 * Likelihood × impact scoring on a 5×5 risk matrix, with recommendations
 * and a plain-language explanation.
 *
 * @module domain/cardiac-risk
 */

// Types
export {
  LIKELIHOOD_LEVELS,
  IMPACT_LEVELS,
  toRiskScale,
  type RiskScale,
  type LikelihoodAssessment,
  type ImpactAssessment,
  type RiskClassification,
  type RecommendationSet,
} from './types.js';

// Vital signs
export {
  VITAL_SIGN_NAMES,
  VITAL_SIGN_UNITS,
  PLAUSIBLE_RANGES,
  readPlausibleVitals,
  systolicTier,
  diastolicTier,
  heartRateTier,
  oxygenSaturationTier,
  temperatureTier,
  type VitalSignReadings,
  type PlausibleVitals,
} from './vital-signs.js';

// Demographics
export {
  MIN_AGE,
  MAX_AGE,
  normalizeAge,
  missingDemographicFields,
  type DemographicField,
} from './demographics.js';

// Scorers
export {
  scoreLikelihood,
  bandLikelihood,
  countMajorRiskFactors,
  PROLONGED_CHEST_PAIN_MINUTES,
} from './likelihood-scorer.js';
export { scoreImpact } from './impact-scorer.js';

// Classification
export {
  classifyRisk,
  categorizeRiskScore,
  buildRiskMatrix,
  RISK_CATEGORY_BANDS,
  RISK_SCALE_VALUES,
  type RiskCategoryBand,
} from './risk-classifier.js';

// Recommendations
export {
  RECOMMENDATION_TEXT,
  CATEGORY_RECOMMENDATIONS,
  RECOMMENDED_ACTIONS,
  SAFETY_MESSAGE,
  type RecommendationKey,
} from './recommendation-catalog.js';
export {
  generateRecommendations,
  RISK_FACTOR_ORDER,
  SCORE_SUMMARY_KEY,
} from './recommendation-generator.js';
export { buildExplanation, NEUTRAL_EXPLANATION } from './explanation-builder.js';

// Service
export {
  assessCardiacRisk,
  CardiacRiskAssessmentService,
  createCardiacRiskAssessmentService,
  ALGORITHM_VERSION,
  type AssessmentOptions,
  type CardiacRiskAssessmentServiceConfig,
  type CardiacRiskAssessmentServiceDeps,
  type RecordAssessmentOptions,
  type RecordedAssessment,
  type RiskTrendReport,
} from './cardiac-risk-service.js';
