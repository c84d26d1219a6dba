/**
 * PHI redaction rules for assessment logging
 *
 * Every field of a patient assessment is protected health information.
 * Paths are enumerated explicitly instead of using wildcards so that the set
 * of redacted fields stays predictable and auditable.
 */

/**
 * Assessment fields that carry PHI.
 *
 * IMPORTANT: When adding a field to PatientAssessmentInputSchema or
 * AssessmentRecordSchema, add it here as well.
 */
export const PHI_FIELDS: readonly string[] = [
  // Demographics
  'age',
  'sex',

  // Symptoms
  'chestPainType',
  'chestPainDurationMinutes',
  'chestPainRadiation',
  'chestPainExertional',
  'shortnessOfBreathLevel',
  'palpitations',
  'palpitationsIrregular',
  'syncope',
  'fainting',
  'neurologicalSymptoms',
  'legSwelling',
  'sweating',
  'dizziness',
  'nausea',
  'symptoms',

  // Vital signs
  'systolicBP',
  'diastolicBP',
  'heartRate',
  'oxygenSaturation',
  'temperature',

  // History
  'riskFactors',
];

/**
 * Objects under which assessment payloads are usually logged
 */
const PHI_CONTAINERS = ['input', 'record', 'assessment'] as const;

/**
 * Standard paths to redact in log objects
 */
export const REDACTION_PATHS: string[] = [
  ...PHI_FIELDS,
  ...PHI_CONTAINERS.flatMap((container) => PHI_FIELDS.map((field) => `${container}.${field}`)),

  // Identity of the person assessed
  'userId',
  'userName',
  'email',
  'phone',
  'record.userId',
  'record.userName',
];

/**
 * Create redaction censor function
 * Returns a masked value that indicates redaction occurred
 */
export function createCensor(_value: unknown, path: string[]): string {
  const fieldName = path[path.length - 1] ?? 'unknown';
  return `[REDACTED:${fieldName}]`;
}
