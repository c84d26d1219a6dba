import { z } from 'zod';

import { ConfigurationError } from './errors.js';

/**
 * Environment Variable Validation
 * Resolves the runtime configuration of the assessment service at boot time
 */

/**
 * How an assessment without age or sex is handled.
 * - `reject`: precondition failure returned to the caller (default)
 * - `assume-minimum-risk`: legacy behaviour, scored with no demographic contribution
 */
export const MissingDemographicsPolicySchema = z.enum(['reject', 'assume-minimum-risk']);

export const AssessmentEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .optional(),
  SERVICE_NAME: z.string().min(1).default('cardiorisk'),
  ASSESSMENT_MISSING_DEMOGRAPHICS: MissingDemographicsPolicySchema.default('reject'),
});

export type MissingDemographicsPolicy = z.infer<typeof MissingDemographicsPolicySchema>;
export type AssessmentEnv = z.infer<typeof AssessmentEnvSchema>;

/**
 * Resolved configuration consumed by the assessment service
 */
export interface AssessmentConfig {
  readonly environment: AssessmentEnv['NODE_ENV'];
  readonly logLevel: string;
  readonly serviceName: string;
  readonly missingDemographics: MissingDemographicsPolicy;
}

/**
 * Log level used when LOG_LEVEL is unset
 */
export function defaultLogLevel(environment: string | undefined): string {
  switch (environment) {
    case 'production':
      return 'info';
    case 'test':
      return 'silent';
    default:
      return 'debug';
  }
}

/**
 * Validate environment variables and resolve the assessment configuration
 *
 * @throws ConfigurationError listing every invalid variable
 */
export function loadAssessmentConfig(
  env: Record<string, string | undefined> = process.env
): AssessmentConfig {
  const result = AssessmentEnvSchema.safeParse(env);

  if (!result.success) {
    const errors = result.error.flatten().fieldErrors;
    const issues = Object.entries(errors).map(
      ([field, messages]) => `${field}: ${(messages ?? []).join(', ')}`
    );
    throw new ConfigurationError(issues);
  }

  const parsed = result.data;
  return {
    environment: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL ?? defaultLogLevel(parsed.NODE_ENV),
    serviceName: parsed.SERVICE_NAME,
    missingDemographics: parsed.ASSESSMENT_MISSING_DEMOGRAPHICS,
  };
}
