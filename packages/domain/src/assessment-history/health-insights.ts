/**
 * @fileoverview Health Insights
 *
 * Encouragement and alerts derived from the assessment history. Like the
 * recommendations, each insight carries a canonical key for translation and
 * default English text.
 *
 * RULES (in output order):
 * - Empty history: a single `gettingStarted` insight
 * - Trend: improving, worsening or stable
 * - Latest result High or Critical: medical attention alert
 * - Latest systolic BP > 130, latest heart rate > 100
 * - Latest risk factors: smoking, hypertension
 * - 3 or more assessments, 5 or more assessments
 *
 * @module domain/assessment-history/health-insights
 */

import type { AssessmentRecord } from '@cardiorisk/types';

import {
  calculateRiskTrendStats,
  latestAssessment,
  type RiskTrendDirection,
} from './trend-analytics.js';

export type HealthInsightTone = 'positive' | 'neutral' | 'warning' | 'critical';

const INSIGHTS = {
  gettingStarted: {
    tone: 'neutral',
    title: 'Start your journey',
    message: 'Complete your first assessment to start tracking your heart health.',
  },
  'trend.improving': {
    tone: 'positive',
    title: 'Great progress',
    message: 'Your heart risk is improving. Keep monitoring and keep up your healthy habits.',
  },
  'trend.worsening': {
    tone: 'warning',
    title: 'Needs attention',
    message: 'Your risk has been rising. Talk to your doctor for advice; it is not too late to act.',
  },
  'trend.stable': {
    tone: 'neutral',
    title: 'Keep monitoring',
    message: 'Keep tracking your heart health. Consistency is key.',
  },
  'latest.highRisk': {
    tone: 'critical',
    title: 'Medical attention needed',
    message: 'Your latest assessment shows a high risk. Consult a doctor as soon as possible.',
  },
  'vitals.elevatedBloodPressure': {
    tone: 'warning',
    title: 'High blood pressure',
    message: 'Your blood pressure is high. Cut down on salty food and drink plenty of water.',
  },
  'vitals.elevatedHeartRate': {
    tone: 'warning',
    title: 'High heart rate',
    message: 'Make time to relax and exercise regularly. Deep breathing exercises can help.',
  },
  'lifestyle.smoking': {
    tone: 'positive',
    title: 'Quit for your family',
    message: 'Stopping smoking is something you do for the people you love. You can do it.',
  },
  'lifestyle.hypertension': {
    tone: 'positive',
    title: 'Eat well',
    message: 'Eat more vegetables and fruit, and avoid processed foods.',
  },
  'milestone.consistentMonitoring': {
    tone: 'positive',
    title: 'Consistent monitoring',
    message: 'Well done on checking in regularly. Keep it up.',
  },
  'milestone.healthChampion': {
    tone: 'positive',
    title: 'Health champion',
    message: 'You are a health champion. Keep taking care of your heart.',
  },
} as const satisfies Record<string, { tone: HealthInsightTone; title: string; message: string }>;

export type HealthInsightKey = keyof typeof INSIGHTS;

export interface HealthInsight {
  readonly key: HealthInsightKey;
  readonly tone: HealthInsightTone;
  readonly title: string;
  readonly message: string;
}

const TREND_INSIGHTS: Readonly<Record<RiskTrendDirection, HealthInsightKey>> = {
  improving: 'trend.improving',
  worsening: 'trend.worsening',
  stable: 'trend.stable',
};

export const ELEVATED_SYSTOLIC_BP = 130;
export const ELEVATED_HEART_RATE = 100;
const CONSISTENT_MONITORING_COUNT = 3;
const HEALTH_CHAMPION_COUNT = 5;

function insight(key: HealthInsightKey): HealthInsight {
  return { key, ...INSIGHTS[key] };
}

/**
 * Personalized insights for the history, most general first
 */
export function generateHealthInsights(records: readonly AssessmentRecord[]): HealthInsight[] {
  const latest = latestAssessment(records);
  if (!latest) {
    return [insight('gettingStarted')];
  }

  const stats = calculateRiskTrendStats(records);
  const keys: HealthInsightKey[] = [TREND_INSIGHTS[stats.trendDirection]];

  if (latest.riskCategory === 'High' || latest.riskCategory === 'Critical') {
    keys.push('latest.highRisk');
  }
  if (latest.systolicBP !== null && latest.systolicBP > ELEVATED_SYSTOLIC_BP) {
    keys.push('vitals.elevatedBloodPressure');
  }
  if (latest.heartRate !== null && latest.heartRate > ELEVATED_HEART_RATE) {
    keys.push('vitals.elevatedHeartRate');
  }
  if (latest.riskFactors['smoking'] === true) {
    keys.push('lifestyle.smoking');
  }
  if (latest.riskFactors['hypertension'] === true) {
    keys.push('lifestyle.hypertension');
  }
  if (stats.totalAssessments >= CONSISTENT_MONITORING_COUNT) {
    keys.push('milestone.consistentMonitoring');
  }
  if (stats.totalAssessments >= HEALTH_CHAMPION_COUNT) {
    keys.push('milestone.healthChampion');
  }

  return keys.map(insight);
}
