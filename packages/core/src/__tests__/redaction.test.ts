/**
 * Redaction Tests
 * PHI paths and censor output for assessment logging
 */
import { describe, it, expect } from 'vitest';
import { PHI_FIELDS, REDACTION_PATHS, createCensor } from '../logger/redaction.js';

describe('Redaction Module', () => {
  describe('PHI_FIELDS', () => {
    it('should include demographics', () => {
      expect(PHI_FIELDS).toContain('age');
      expect(PHI_FIELDS).toContain('sex');
    });

    it('should include every vital sign', () => {
      for (const vital of ['systolicBP', 'diastolicBP', 'heartRate', 'oxygenSaturation', 'temperature']) {
        expect(PHI_FIELDS).toContain(vital);
      }
    });

    it('should include symptoms and risk factors', () => {
      expect(PHI_FIELDS).toContain('chestPainType');
      expect(PHI_FIELDS).toContain('syncope');
      expect(PHI_FIELDS).toContain('symptoms');
      expect(PHI_FIELDS).toContain('riskFactors');
    });
  });

  describe('REDACTION_PATHS', () => {
    it('should include top-level PHI fields', () => {
      expect(REDACTION_PATHS).toContain('heartRate');
    });

    it('should include PHI nested under assessment containers', () => {
      expect(REDACTION_PATHS).toContain('input.age');
      expect(REDACTION_PATHS).toContain('record.symptoms');
      expect(REDACTION_PATHS).toContain('assessment.riskFactors');
    });

    it('should include the identity of the person assessed', () => {
      expect(REDACTION_PATHS).toContain('userId');
      expect(REDACTION_PATHS).toContain('email');
      expect(REDACTION_PATHS).toContain('record.userName');
    });

    it('should not contain duplicates', () => {
      expect(new Set(REDACTION_PATHS).size).toBe(REDACTION_PATHS.length);
    });
  });

  describe('createCensor', () => {
    it('should create redacted string with field name', () => {
      expect(createCensor(62, ['input', 'age'])).toBe('[REDACTED:age]');
    });

    it('should handle single element path', () => {
      expect(createCensor('male', ['sex'])).toBe('[REDACTED:sex]');
    });

    it('should handle empty path', () => {
      expect(createCensor('value', [])).toBe('[REDACTED:unknown]');
    });
  });
});
