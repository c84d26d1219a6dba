import { describe, it, expect } from 'vitest';
import { loadAssessmentConfig } from '../env.js';
import { ConfigurationError } from '../errors.js';

describe('loadAssessmentConfig', () => {
  it('should apply defaults to an empty environment', () => {
    expect(loadAssessmentConfig({})).toEqual({
      environment: 'development',
      logLevel: 'debug',
      serviceName: 'cardiorisk',
      missingDemographics: 'reject',
    });
  });

  it('should derive the log level from NODE_ENV', () => {
    expect(loadAssessmentConfig({ NODE_ENV: 'production' }).logLevel).toBe('info');
    expect(loadAssessmentConfig({ NODE_ENV: 'test' }).logLevel).toBe('silent');
    expect(loadAssessmentConfig({ NODE_ENV: 'staging' }).logLevel).toBe('debug');
  });

  it('should prefer an explicit LOG_LEVEL', () => {
    expect(loadAssessmentConfig({ NODE_ENV: 'production', LOG_LEVEL: 'warn' }).logLevel).toBe(
      'warn'
    );
  });

  it('should read the missing demographics policy', () => {
    const config = loadAssessmentConfig({
      ASSESSMENT_MISSING_DEMOGRAPHICS: 'assume-minimum-risk',
      SERVICE_NAME: 'cardiorisk-kiosk',
    });

    expect(config.missingDemographics).toBe('assume-minimum-risk');
    expect(config.serviceName).toBe('cardiorisk-kiosk');
  });

  it('should throw a ConfigurationError naming every invalid variable', () => {
    const load = (): unknown =>
      loadAssessmentConfig({ NODE_ENV: 'qa', ASSESSMENT_MISSING_DEMOGRAPHICS: 'ignore' });

    expect(load).toThrow(ConfigurationError);
    try {
      load();
    } catch (error) {
      expect(error instanceof ConfigurationError && error.issues.map((i) => i.split(':')[0])).toEqual(
        ['NODE_ENV', 'ASSESSMENT_MISSING_DEMOGRAPHICS']
      );
    }
  });
});
