/**
 * @module @cardiorisk/core
 * @description Cross-cutting infrastructure for the assessment packages
 *
 * Exports:
 * - Pino logger with PHI redaction
 * - AppError hierarchy with safe error details
 * - Zod-validated environment configuration
 */

export {
  createLogger,
  createChildLogger,
  withCorrelation,
  REDACTION_PATHS,
  PHI_FIELDS,
  type Logger,
  type LoggerOptions,
  type LoggerConfig,
  type LogContext,
} from './logger/index.js';

export {
  AppError,
  ValidationError,
  AssessmentPreconditionError,
  HistoryStoreError,
  ConfigurationError,
  isOperationalError,
  toSafeErrorResponse,
  type SafeErrorDetails,
} from './errors.js';

export {
  MissingDemographicsPolicySchema,
  AssessmentEnvSchema,
  loadAssessmentConfig,
  type MissingDemographicsPolicy,
  type AssessmentEnv,
  type AssessmentConfig,
} from './env.js';
