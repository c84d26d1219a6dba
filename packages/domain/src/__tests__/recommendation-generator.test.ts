import { describe, it, expect } from 'vitest';
import {
  RECOMMENDATION_TEXT,
  RECOMMENDED_ACTIONS,
} from '../cardiac-risk/recommendation-catalog.js';
import {
  generateRecommendations,
  SCORE_SUMMARY_KEY,
} from '../cardiac-risk/recommendation-generator.js';

describe('generateRecommendations', () => {
  it('should give low-risk advice only when nothing is abnormal', () => {
    const result = generateRecommendations('Low', 1, { age: 45, sex: 'male' });

    expect(result.recommendedAction).toBe('Self-care / monitor');
    expect(result.recommendations).toEqual([
      'Your overall risk score is 1 out of 25 (Low).',
      'Your risk level is low. Keep up the good work and continue to maintain a healthy lifestyle.',
    ]);
  });

  it('should order category, vital-sign, then risk-factor advice', () => {
    const result = generateRecommendations('Moderate', 12, {
      systolicBP: 150,
      heartRate: 110,
      oxygenSaturation: 92,
      temperature: 38.5,
      riskFactors: { smoking: true, previousHeartDisease: true, obesity: true },
    });

    expect(result.items.map((i) => i.key)).toEqual([
      SCORE_SUMMARY_KEY,
      'category.moderate.consult',
      'category.moderate.symptomDiary',
      'vital.bloodPressure.elevated',
      'vital.heartRate.high',
      'vital.oxygenSaturation.low',
      'vital.temperature.fever',
      'riskFactor.previousHeartDisease',
      'riskFactor.smoking',
      'riskFactor.obesity',
    ]);
    expect(result.items.map((i) => i.section)).toEqual([
      'category',
      'category',
      'category',
      'vital-sign',
      'vital-sign',
      'vital-sign',
      'vital-sign',
      'risk-factor',
      'risk-factor',
      'risk-factor',
    ]);
    expect(result.recommendations).toEqual(result.items.map((i) => i.text));
  });

  it('should key the action strictly off the category', () => {
    const input = { systolicBP: 120 };

    expect(generateRecommendations('Critical', 25, input).recommendedAction).toBe(
      'Go to emergency room immediately'
    );
    expect(generateRecommendations('High', 16, input).recommendedAction).toBe(
      RECOMMENDED_ACTIONS.High
    );
  });

  describe('blood pressure', () => {
    it('should flag a critical diastolic reading on its own', () => {
      const result = generateRecommendations('Low', 5, { diastolicBP: 115 });

      expect(result.recommendations).toContain(RECOMMENDATION_TEXT['vital.bloodPressure.critical']);
    });

    it('should flag low blood pressure', () => {
      const keys = generateRecommendations('Low', 5, { systolicBP: 85, diastolicBP: 70 }).items.map(
        (i) => i.key
      );

      expect(keys).toContain('vital.bloodPressure.low');
    });

    it('should say nothing for normal blood pressure', () => {
      const result = generateRecommendations('Low', 1, { systolicBP: 125, diastolicBP: 82 });

      expect(result.items.filter((i) => i.section === 'vital-sign')).toEqual([]);
    });
  });

  it('should flag a heart rate of 50 as low but not 51', () => {
    const at50 = generateRecommendations('Low', 1, { heartRate: 50 }).items.map((i) => i.key);
    const at51 = generateRecommendations('Low', 1, { heartRate: 51 }).items.map((i) => i.key);

    expect(at50).toContain('vital.heartRate.low');
    expect(at51).not.toContain('vital.heartRate.low');
  });

  it('should flag a low body temperature', () => {
    const keys = generateRecommendations('Low', 1, { temperature: 34.5 }).items.map((i) => i.key);

    expect(keys).toContain('vital.temperature.low');
  });

  it('should not advise on implausible vitals', () => {
    const result = generateRecommendations('Low', 1, { heartRate: 300 });

    expect(result.items.filter((i) => i.section === 'vital-sign')).toEqual([]);
  });

  it('should skip risk factors reported as false', () => {
    const result = generateRecommendations('Low', 1, {
      riskFactors: { diabetes: false, familyHistory: true },
    });

    expect(result.items.filter((i) => i.section === 'risk-factor').map((i) => i.key)).toEqual([
      'riskFactor.familyHistory',
    ]);
  });
});
