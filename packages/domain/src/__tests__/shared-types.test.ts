/**
 * @fileoverview Tests for Shared Domain Types Utilities
 * Tests Result pattern helpers
 */

import { describe, it, expect } from 'vitest';
import { AssessmentPreconditionError } from '@cardiorisk/core';
import { ok, err, isOk, isErr, unwrap, unwrapOr, type Result } from '../shared/types.js';

describe('Result Pattern Utilities', () => {
  describe('ok', () => {
    it('should create success result', () => {
      const result = ok('success value');

      expect(result.success).toBe(true);
      expect(result.value).toBe('success value');
      expect(result.error).toBeUndefined();
    });
  });

  describe('err', () => {
    it('should create failure result', () => {
      const error = new AssessmentPreconditionError(['age']);
      const result = err(error);

      expect(result.success).toBe(false);
      expect(result.error).toBe(error);
      expect(result.value).toBeUndefined();
    });
  });

  describe('isOk / isErr', () => {
    it('should narrow a success', () => {
      const result: Result<number, string> = ok(3);

      expect(isOk(result)).toBe(true);
      expect(isErr(result)).toBe(false);
    });

    it('should narrow a failure', () => {
      const result: Result<number, string> = err('missing');

      expect(isOk(result)).toBe(false);
      expect(isErr(result)).toBe(true);
    });
  });

  describe('unwrap', () => {
    it('should return the value of a success', () => {
      expect(unwrap(ok(25))).toBe(25);
    });

    it('should throw the error of a failure', () => {
      const error = new AssessmentPreconditionError(['sex']);

      expect(() => unwrap(err(error))).toThrow(error);
    });
  });

  describe('unwrapOr', () => {
    it('should return the value of a success', () => {
      expect(unwrapOr(ok(4), 1)).toBe(4);
    });

    it('should return the default for a failure', () => {
      const result: Result<number, AssessmentPreconditionError> = err(
        new AssessmentPreconditionError(['age', 'sex'])
      );

      expect(unwrapOr(result, 1)).toBe(1);
    });
  });
});
