/**
 * @fileoverview Cardiac Risk Assessment Service
 *
 * Entry point of the scoring core. `assessCardiacRisk` is pure and
 * synchronous: identical input always yields a deep-equal result.
 * `CardiacRiskAssessmentService` adds boundary parsing, structured logging and
 * the optional history collaborator around it.
 *
 * @module domain/cardiac-risk/cardiac-risk-service
 */

import {
  AssessmentPreconditionError,
  HistoryStoreError,
  ValidationError,
  createLogger,
  loadAssessmentConfig,
  withCorrelation,
  type Logger,
  type MissingDemographicsPolicy,
} from '@cardiorisk/core';
import {
  PatientAssessmentInputSchema,
  type AssessmentRecord,
  type AssessmentResult,
  type PatientAssessmentInput,
} from '@cardiorisk/types';

import {
  toAssessmentRecord,
  type AssessmentHistoryStore,
  type AssessmentRecordMetadata,
} from '../assessment-history/assessment-record.js';
import {
  generateHealthInsights,
  type HealthInsight,
} from '../assessment-history/health-insights.js';
import {
  analyzeRiskFactorContributions,
  buildVitalSignTrends,
  calculateRiskTrendStats,
  getRiskCategoryDistribution,
  type RiskCategoryDistribution,
  type RiskFactorAnalysis,
  type RiskTrendStats,
  type VitalSignTrends,
} from '../assessment-history/trend-analytics.js';
import { err, isErr, ok, type Result } from '../shared/types.js';

import { missingDemographicFields, normalizeAge } from './demographics.js';
import { buildExplanation } from './explanation-builder.js';
import { scoreImpact } from './impact-scorer.js';
import { scoreLikelihood } from './likelihood-scorer.js';
import { SAFETY_MESSAGE } from './recommendation-catalog.js';
import { generateRecommendations } from './recommendation-generator.js';
import { classifyRisk } from './risk-classifier.js';

/** Version of the scoring rule set, stored with every result */
export const ALGORITHM_VERSION = '2.0.0';

export interface AssessmentOptions {
  /** Default: 'reject' */
  missingDemographics?: MissingDemographicsPolicy;
}

// ============================================================================
// PURE ENTRY POINT
// ============================================================================

/**
 * Score a patient assessment.
 *
 * Missing age or sex is returned as an AssessmentPreconditionError unless the
 * 'assume-minimum-risk' policy is selected, in which case the assessment is
 * scored without any demographic contribution. Never throws.
 */
export function assessCardiacRisk(
  input: PatientAssessmentInput,
  options: AssessmentOptions = {}
): Result<AssessmentResult, AssessmentPreconditionError> {
  const policy = options.missingDemographics ?? 'reject';
  const missing = missingDemographicFields(input);

  if (missing.length > 0 && policy === 'reject') {
    return err(new AssessmentPreconditionError(missing));
  }

  const normalized: PatientAssessmentInput = { ...input, age: normalizeAge(input.age) };

  const likelihood = scoreLikelihood(normalized);
  const impact = scoreImpact(normalized);
  const classification = classifyRisk(likelihood.score, impact.score);
  const recommendations = generateRecommendations(
    classification.riskCategory,
    classification.finalRiskScore,
    normalized
  );

  return ok({
    likelihoodScore: likelihood.score,
    likelihoodLevel: likelihood.level,
    impactScore: impact.score,
    impactLevel: impact.level,
    finalRiskScore: classification.finalRiskScore,
    riskCategory: classification.riskCategory,
    heatmapPosition: classification.heatmapPosition,
    recommendedAction: recommendations.recommendedAction,
    explanation: buildExplanation(normalized, likelihood.score, impact.score),
    recommendations: [...recommendations.recommendations],
    recommendationItems: [...recommendations.items],
    likelihoodFactors: [...likelihood.factors],
    impactFactors: [...impact.factors],
    discardedVitals: [...impact.discardedVitals],
    safetyMessage: SAFETY_MESSAGE,
    algorithmVersion: ALGORITHM_VERSION,
  });
}

// ============================================================================
// SERVICE
// ============================================================================

export interface CardiacRiskAssessmentServiceConfig {
  missingDemographics?: MissingDemographicsPolicy;
}

export interface CardiacRiskAssessmentServiceDeps {
  /** Required only by assessAndRecord and getRiskTrends */
  historyStore?: AssessmentHistoryStore;
  logger?: Logger;
}

export interface RecordAssessmentOptions extends AssessmentRecordMetadata {
  readonly correlationId?: string;
}

export interface RecordedAssessment {
  readonly result: AssessmentResult;
  readonly record: AssessmentRecord;
}

export interface RiskTrendReport {
  readonly stats: RiskTrendStats;
  readonly categoryDistribution: RiskCategoryDistribution;
  readonly vitalSigns: VitalSignTrends;
  readonly riskFactors: RiskFactorAnalysis;
  readonly insights: readonly HealthInsight[];
}

/**
 * Cardiac Risk Assessment Service
 *
 * Log entries carry scores and categories only; inputs are never logged.
 */
export class CardiacRiskAssessmentService {
  private readonly config: Required<CardiacRiskAssessmentServiceConfig>;
  private readonly historyStore: AssessmentHistoryStore | undefined;
  private readonly logger: Logger;

  constructor(
    config?: CardiacRiskAssessmentServiceConfig,
    deps?: CardiacRiskAssessmentServiceDeps
  ) {
    this.config = {
      missingDemographics: config?.missingDemographics ?? 'reject',
    };
    this.historyStore = deps?.historyStore;
    this.logger = deps?.logger ?? createLogger({ name: 'cardiac-risk-service' });
  }

  /**
   * Score an already-typed assessment
   */
  assess(
    input: PatientAssessmentInput,
    logger: Logger = this.logger
  ): Result<AssessmentResult, AssessmentPreconditionError> {
    const outcome = assessCardiacRisk(input, this.config);

    if (isErr(outcome)) {
      logger.info(
        { code: outcome.error.code, missingFields: outcome.error.missingFields },
        'Assessment rejected: demographics missing'
      );
      return outcome;
    }

    const result = outcome.value;
    if (result.discardedVitals.length > 0) {
      logger.warn({ discardedVitals: result.discardedVitals }, 'Implausible vital signs discarded');
    }
    logger.info(
      {
        likelihoodScore: result.likelihoodScore,
        impactScore: result.impactScore,
        finalRiskScore: result.finalRiskScore,
        riskCategory: result.riskCategory,
        algorithmVersion: result.algorithmVersion,
      },
      'Cardiac risk assessed'
    );
    return outcome;
  }

  /**
   * Parse an untrusted payload, then score it
   */
  assessUnknown(
    payload: unknown
  ): Result<AssessmentResult, ValidationError | AssessmentPreconditionError> {
    const parsed = PatientAssessmentInputSchema.safeParse(payload);

    if (!parsed.success) {
      const details = parsed.error.flatten();
      this.logger.warn(
        { invalidFields: Object.keys(details.fieldErrors) },
        'Assessment payload failed validation'
      );
      return err(new ValidationError('Invalid assessment input', details));
    }

    return this.assess(parsed.data);
  }

  /**
   * Score an assessment and append it to the history store
   */
  async assessAndRecord(
    input: PatientAssessmentInput,
    options: RecordAssessmentOptions
  ): Promise<
    Result<RecordedAssessment, AssessmentPreconditionError | HistoryStoreError>
  > {
    const logger = withCorrelation(this.logger, options.correlationId ?? options.id, {
      assessmentId: options.id,
    });

    const store = this.historyStore;
    if (!store) {
      return err(new HistoryStoreError('no history store configured'));
    }

    const outcome = this.assess(input, logger);
    if (isErr(outcome)) return outcome;

    const record = toAssessmentRecord(input, outcome.value, options);

    try {
      await store.save(record);
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      logger.error({ err: cause }, 'Failed to record assessment');
      return err(new HistoryStoreError('failed to save assessment', cause));
    }

    logger.debug('Assessment recorded');
    return ok({ result: outcome.value, record });
  }

  /**
   * Trend analytics over the stored history
   */
  async getRiskTrends(): Promise<Result<RiskTrendReport, HistoryStoreError>> {
    const store = this.historyStore;
    if (!store) {
      return err(new HistoryStoreError('no history store configured'));
    }

    let records: readonly AssessmentRecord[];
    try {
      records = await store.list();
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      this.logger.error({ err: cause }, 'Failed to load assessment history');
      return err(new HistoryStoreError('failed to load assessment history', cause));
    }

    return ok({
      stats: calculateRiskTrendStats(records),
      categoryDistribution: getRiskCategoryDistribution(records),
      vitalSigns: buildVitalSignTrends(records),
      riskFactors: analyzeRiskFactorContributions(records),
      insights: generateHealthInsights(records),
    });
  }

  /**
   * Delete the stored history
   */
  async clearHistory(): Promise<Result<void, HistoryStoreError>> {
    const store = this.historyStore;
    if (!store) {
      return err(new HistoryStoreError('no history store configured'));
    }

    try {
      await store.clear();
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      this.logger.error({ err: cause }, 'Failed to clear assessment history');
      return err(new HistoryStoreError('failed to clear assessment history', cause));
    }

    this.logger.info('Assessment history cleared');
    return ok(undefined);
  }
}

// ============================================================================
// FACTORY FUNCTION
// ============================================================================

/**
 * Create a cardiac risk assessment service instance
 *
 * Unset options fall back to the environment: ASSESSMENT_MISSING_DEMOGRAPHICS
 * selects the policy, LOG_LEVEL and SERVICE_NAME configure the logger.
 *
 * @throws ConfigurationError when the environment is invalid
 */
export function createCardiacRiskAssessmentService(
  config?: CardiacRiskAssessmentServiceConfig,
  deps?: CardiacRiskAssessmentServiceDeps
): CardiacRiskAssessmentService {
  const env = loadAssessmentConfig();

  return new CardiacRiskAssessmentService(
    { missingDemographics: config?.missingDemographics ?? env.missingDemographics },
    {
      ...deps,
      logger:
        deps?.logger ??
        createLogger({
          name: 'cardiac-risk-service',
          level: env.logLevel,
          serviceName: env.serviceName,
        }),
    }
  );
}
