/**
 * @fileoverview Assessment History Module
 *
 * @module domain/assessment-history
 */

export {
  toAssessmentRecord,
  type AssessmentHistoryStore,
  type AssessmentRecordMetadata,
} from './assessment-record.js';

export {
  InMemoryAssessmentHistoryStore,
  DEFAULT_HISTORY_LIMIT,
} from './in-memory-history-store.js';

export {
  calculateRiskTrendStats,
  getRiskCategoryDistribution,
  latestAssessment,
  buildVitalSignTrends,
  analyzeRiskFactorContributions,
  formatFactorName,
  TREND_NORMAL_RANGES,
  type RiskTrendDirection,
  type RiskTrendStats,
  type RiskCategoryDistribution,
  type VitalSignTrendPoint,
  type VitalSignTrends,
  type RiskFactorStatus,
  type RiskFactorContribution,
  type RiskFactorAnalysis,
} from './trend-analytics.js';

export {
  generateHealthInsights,
  ELEVATED_SYSTOLIC_BP,
  ELEVATED_HEART_RATE,
  type HealthInsight,
  type HealthInsightKey,
  type HealthInsightTone,
} from './health-insights.js';
