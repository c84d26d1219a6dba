import { describe, it, expect } from 'vitest';
import { scoreImpact } from '../cardiac-risk/impact-scorer.js';
import {
  diastolicTier,
  heartRateTier,
  oxygenSaturationTier,
  readPlausibleVitals,
  systolicTier,
  temperatureTier,
} from '../cardiac-risk/vital-signs.js';

describe('scoreImpact', () => {
  it('should be Negligible when no vitals were measured', () => {
    const result = scoreImpact({ age: 45, sex: 'male', shortnessOfBreathLevel: 'severe' });

    expect(result.score).toBe(1);
    expect(result.level).toBe('Negligible');
    expect(result.factors).toEqual([]);
    expect(result.discardedVitals).toEqual([]);
  });

  it('should take the worst tier across several severe vitals', () => {
    const result = scoreImpact({
      systolicBP: 190,
      diastolicBP: 110,
      heartRate: 130,
      oxygenSaturation: 88,
    });

    expect(result.score).toBe(5);
    expect(result.level).toBe('Critical');
    expect(result.factors).toEqual([
      { factor: 'systolicBP', points: 5, detail: '190 mmHg' },
      { factor: 'diastolicBP', points: 4, detail: '110 mmHg' },
      { factor: 'heartRate', points: 4, detail: '130 bpm' },
      { factor: 'oxygenSaturation', points: 4, detail: '88 %' },
    ]);
  });

  it('should stay at 1 for normal vitals', () => {
    const result = scoreImpact({
      systolicBP: 118,
      diastolicBP: 76,
      heartRate: 72,
      oxygenSaturation: 98,
      temperature: 36.8,
    });

    expect(result.score).toBe(1);
    expect(result.factors.every((f) => f.points === 1)).toBe(true);
  });

  it('should discard implausible readings instead of scoring them', () => {
    const result = scoreImpact({ systolicBP: 400, heartRate: 72 });

    expect(result.score).toBe(1);
    expect(result.discardedVitals).toEqual(['systolicBP']);
    expect(result.factors.map((f) => f.factor)).toEqual(['heartRate']);
  });

  describe('acute symptom modifier', () => {
    it('should raise a tier 3 vital by one with severe breathlessness', () => {
      const result = scoreImpact({ oxygenSaturation: 92, shortnessOfBreathLevel: 'severe' });

      expect(result.score).toBe(4);
      expect(result.level).toBe('Significant');
      expect(result.factors).toContainEqual({
        factor: 'acuteSymptomModifier',
        points: 1,
        detail: 'severe shortness of breath',
      });
    });

    it('should raise a tier 3 vital by one with prolonged chest pain', () => {
      const result = scoreImpact({
        systolicBP: 150,
        chestPainType: 'aching',
        chestPainDurationMinutes: 25,
      });

      expect(result.score).toBe(4);
    });

    it('should not apply below tier 3', () => {
      const result = scoreImpact({ systolicBP: 135, shortnessOfBreathLevel: 'severe' });

      expect(result.score).toBe(2);
    });

    it('should clamp at 5', () => {
      const result = scoreImpact({ systolicBP: 200, shortnessOfBreathLevel: 'severe' });

      expect(result.score).toBe(5);
    });
  });

  it('should score fever higher only with cardio-respiratory symptoms', () => {
    expect(scoreImpact({ temperature: 39 }).score).toBe(2);
    expect(scoreImpact({ temperature: 39, chestPainType: 'sharp' }).score).toBe(3);
  });
});

describe('vital sign tiers', () => {
  it.each([
    [89, 5],
    [90, 1],
    [129, 1],
    [130, 2],
    [140, 3],
    [160, 4],
    [180, 4],
    [181, 5],
  ])('systolic %d mmHg is tier %d', (value, tier) => {
    expect(systolicTier(value)).toBe(tier);
  });

  it.each([
    [79, 1],
    [80, 2],
    [90, 3],
    [110, 4],
    [120, 4],
    [121, 5],
  ])('diastolic %d mmHg is tier %d', (value, tier) => {
    expect(diastolicTier(value)).toBe(tier);
  });

  it.each([
    [39, 5],
    [40, 4],
    [49, 4],
    [50, 2],
    [59, 2],
    [60, 1],
    [100, 1],
    [101, 3],
    [120, 3],
    [121, 4],
    [130, 4],
    [131, 5],
  ])('heart rate %d bpm is tier %d', (value, tier) => {
    expect(heartRateTier(value)).toBe(tier);
  });

  it.each([
    [95, 1],
    [94, 3],
    [89, 4],
    [84, 5],
  ])('oxygen saturation %d%% is tier %d', (value, tier) => {
    expect(oxygenSaturationTier(value)).toBe(tier);
  });

  it('should tier temperature', () => {
    expect(temperatureTier(34.9, false)).toBe(4);
    expect(temperatureTier(35.5, false)).toBe(2);
    expect(temperatureTier(37, false)).toBe(1);
    expect(temperatureTier(38, false)).toBe(2);
    expect(temperatureTier(38.6, false)).toBe(2);
    expect(temperatureTier(38.6, true)).toBe(3);
    expect(temperatureTier(40, true)).toBe(4);
  });
});

describe('readPlausibleVitals', () => {
  it('should split readings from implausible values', () => {
    const { readings, discarded } = readPlausibleVitals({
      systolicBP: 120,
      diastolicBP: 20,
      oxygenSaturation: 101,
      temperature: Number.NaN,
    });

    expect(readings).toEqual({ systolicBP: 120 });
    expect(discarded).toEqual(['diastolicBP', 'oxygenSaturation', 'temperature']);
  });
});
