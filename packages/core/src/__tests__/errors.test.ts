import { describe, it, expect } from 'vitest';
import {
  AppError,
  ValidationError,
  AssessmentPreconditionError,
  HistoryStoreError,
  ConfigurationError,
  isOperationalError,
  toSafeErrorResponse,
} from '../errors.js';

describe('AppError', () => {
  it('should create error with correct properties', () => {
    const error = new AppError('Test error', 'TEST_CODE', 400);

    expect(error.message).toBe('Test error');
    expect(error.code).toBe('TEST_CODE');
    expect(error.statusCode).toBe(400);
    expect(error.isOperational).toBe(true);
    expect(error).toBeInstanceOf(Error);
  });

  it('should default to 500 status code', () => {
    const error = new AppError('Test', 'CODE');
    expect(error.statusCode).toBe(500);
  });

  it('should produce safe error details', () => {
    const error = new AppError('Something failed', 'CODE', 400);

    expect(error.toSafeError()).toEqual({
      code: 'CODE',
      message: 'Something failed',
      statusCode: 400,
    });
  });
});

describe('ValidationError', () => {
  it('should have 400 status code', () => {
    const error = new ValidationError('Invalid input');
    expect(error.statusCode).toBe(400);
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.name).toBe('ValidationError');
  });

  it('should store validation details', () => {
    const details = { fieldErrors: { age: ['Expected number, received string'] } };
    const error = new ValidationError('Invalid input', details);
    expect(error.details).toBe(details);
  });
});

describe('AssessmentPreconditionError', () => {
  it('should list the missing fields', () => {
    const error = new AssessmentPreconditionError(['age', 'sex']);

    expect(error.code).toBe('ASSESSMENT_PRECONDITION_FAILED');
    expect(error.statusCode).toBe(422);
    expect(error.missingFields).toEqual(['age', 'sex']);
    expect(error.message).toBe('Assessment requires age and sex to compute a risk score');
  });

  it('should word a single missing field', () => {
    expect(new AssessmentPreconditionError(['sex']).message).toBe(
      'Assessment requires sex to compute a risk score'
    );
  });
});

describe('HistoryStoreError', () => {
  it('should keep the original error', () => {
    const cause = new Error('disk full');
    const error = new HistoryStoreError('failed to save assessment', cause);

    expect(error.code).toBe('HISTORY_STORE_ERROR');
    expect(error.statusCode).toBe(503);
    expect(error.message).toBe('Assessment history store error: failed to save assessment');
    expect(error.originalError).toBe(cause);
  });
});

describe('ConfigurationError', () => {
  it('should join the issues into the message', () => {
    const error = new ConfigurationError(['NODE_ENV: Invalid enum value', 'SERVICE_NAME: Required']);

    expect(error.code).toBe('CONFIGURATION_ERROR');
    expect(error.message).toBe(
      'Invalid configuration: NODE_ENV: Invalid enum value; SERVICE_NAME: Required'
    );
  });
});

describe('isOperationalError', () => {
  it('should return true for AppError subclasses', () => {
    expect(isOperationalError(new AssessmentPreconditionError(['age']))).toBe(true);
    expect(isOperationalError(new HistoryStoreError('down'))).toBe(true);
  });

  it('should return false for regular errors and other values', () => {
    expect(isOperationalError(new Error('boom'))).toBe(false);
    expect(isOperationalError('boom')).toBe(false);
    expect(isOperationalError(null)).toBe(false);
  });
});

describe('toSafeErrorResponse', () => {
  it('should expose operational error details', () => {
    expect(toSafeErrorResponse(new ValidationError('Invalid assessment input'))).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'Invalid assessment input',
      statusCode: 400,
    });
  });

  it('should hide unexpected errors', () => {
    expect(toSafeErrorResponse(new TypeError('x is undefined'))).toEqual({
      code: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
      statusCode: 500,
    });
  });
});
