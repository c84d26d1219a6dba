/**
 * @fileoverview Domain Package Exports
 *
 * Central export point for the cardiac risk scoring core, the assessment
 * history analytics and the shared Result type.
 *
 * @module @cardiorisk/domain
 *
 * @example
 * ```typescript
 * import { assessCardiacRisk, isOk } from '@cardiorisk/domain';
 *
 * const outcome = assessCardiacRisk({ age: 45, sex: 'male' });
 * if (isOk(outcome)) {
 *   console.log(outcome.value.riskCategory); // 'Low'
 * }
 * ```
 */

export * from './shared/index.js';
export * from './cardiac-risk/index.js';
export * from './assessment-history/index.js';
