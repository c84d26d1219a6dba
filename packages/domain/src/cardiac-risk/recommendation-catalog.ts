/**
 * @fileoverview Recommendation Catalog
 *
 * Canonical recommendation keys with their default English text. The
 * presentation layer translates by key; the text here is the fallback.
 *
 * @module domain/cardiac-risk/recommendation-catalog
 */

import type { RiskCategory } from '@cardiorisk/types';

export const RECOMMENDATION_TEXT = {
  // Category level
  'category.low.maintain':
    'Your risk level is low. Keep up the good work and continue to maintain a healthy lifestyle.',
  'category.mild.monitor':
    'Your risk level is mild. Monitor your symptoms and follow heart-healthy lifestyle advice.',
  'category.mild.checkup': 'Schedule a routine check-up with your primary care doctor.',
  'category.moderate.consult':
    'Your risk level is moderate. Book a clinic visit or teleconsultation within the next 48 hours.',
  'category.moderate.symptomDiary':
    'Keep a record of when your symptoms occur and how long they last to share with your doctor.',
  'category.high.urgentCare':
    'Your risk level is high. Seek medical attention at an urgent care clinic or emergency room within 6 to 24 hours.',
  'category.high.avoidExertion':
    'Avoid strenuous activity until you have been assessed by a doctor.',
  'category.critical.emergency':
    'Your risk level is critical. Call your local emergency number or go to the nearest emergency room now.',
  'category.critical.doNotDrive':
    'Do not drive yourself. Ask someone to take you or wait for emergency services.',

  // Vital signs
  'vital.bloodPressure.critical':
    'Your blood pressure is critically high. Seek immediate medical attention and avoid activities that could raise it further.',
  'vital.bloodPressure.elevated':
    'Your blood pressure reading is elevated. Monitor it regularly and discuss management with your doctor.',
  'vital.bloodPressure.low':
    'Your blood pressure reading is low. Sit or lie down if you feel dizzy and contact your doctor if it persists.',
  'vital.heartRate.high':
    'Your heart rate is elevated. Avoid caffeine and stimulants, rest, and consult your doctor if a rapid heart rate persists.',
  'vital.heartRate.low':
    'Your heart rate is low. Watch for dizziness or fainting and consult your doctor if these occur.',
  'vital.oxygenSaturation.low':
    'Your oxygen saturation is below normal. Seek medical attention, as this may indicate a serious respiratory or cardiac condition.',
  'vital.temperature.fever':
    'You have a fever, which may indicate an infection. Rest, stay hydrated, and consult your doctor if it persists or worsens.',
  'vital.temperature.low':
    'Your body temperature is below normal. Keep warm and seek medical advice if it does not recover.',

  // Risk factors
  'riskFactor.previousHeartDisease':
    'Heart disease history: visit your cardiologist regularly, take prescribed medications, and report any new or worsening symptoms.',
  'riskFactor.hypertension':
    'High blood pressure: follow your treatment plan, check your blood pressure regularly, and keep a low-sodium diet.',
  'riskFactor.diabetes':
    'Diabetes: manage it through diet, exercise and medication as prescribed, and monitor your blood sugar regularly.',
  'riskFactor.chronicKidneyDisease':
    'Kidney disease: keep your nephrology follow-ups and ask your doctor before taking new medications or supplements.',
  'riskFactor.highCholesterol':
    'High cholesterol: eat a diet low in saturated fats, exercise regularly, and take cholesterol medication as prescribed.',
  'riskFactor.smoking':
    'Smoking: quitting is the single most effective way to lower your heart risk. Ask your doctor about cessation support.',
  'riskFactor.obesity':
    'Weight: aim for a healthy weight through a balanced diet and regular activity, with a plan agreed with your doctor.',
  'riskFactor.familyHistory':
    'Family history: tell your doctor about relatives with heart disease so screening can start early.',
} as const satisfies Record<string, string>;

export type RecommendationKey = keyof typeof RECOMMENDATION_TEXT;

/**
 * Category-level advice, in display order
 */
export const CATEGORY_RECOMMENDATIONS: Readonly<Record<RiskCategory, readonly RecommendationKey[]>> = {
  Low: ['category.low.maintain'],
  Mild: ['category.mild.monitor', 'category.mild.checkup'],
  Moderate: ['category.moderate.consult', 'category.moderate.symptomDiary'],
  High: ['category.high.urgentCare', 'category.high.avoidExertion'],
  Critical: ['category.critical.emergency', 'category.critical.doNotDrive'],
};

/**
 * Directive shown with the result, keyed strictly off the category
 */
export const RECOMMENDED_ACTIONS: Readonly<Record<RiskCategory, string>> = {
  Low: 'Self-care / monitor',
  Mild: 'Monitor symptoms and book a routine check-up',
  Moderate: 'Consult doctor within 48 hours',
  High: 'Seek medical attention within 6–24 hours',
  Critical: 'Go to emergency room immediately',
};

export const SAFETY_MESSAGE =
  'If you experience severe chest pain, fainting, or difficulty breathing, seek emergency care immediately.';
