/**
 * @fileoverview Assessment Trend Analytics
 *
 * Read-only analytics over a patient's assessment history: risk score trend,
 * category distribution, per-vital series and how each risk factor evolved.
 *
 * TREND ALGORITHM:
 * - Records are ordered by date (oldest first)
 * - The mean of the most recent 3 records (the last one with fewer than 3)
 *   is compared with the mean of the records before them
 * - Change below -5% is improving, above +5% worsening, otherwise stable
 *
 * @module domain/assessment-history/trend-analytics
 */

import type { AssessmentRecord, RiskCategory, VitalSignName } from '@cardiorisk/types';

import { VITAL_SIGN_NAMES } from '../cardiac-risk/vital-signs.js';

// ============================================================================
// TYPES
// ============================================================================

export type RiskTrendDirection = 'improving' | 'worsening' | 'stable';

export interface RiskTrendStats {
  readonly averageRiskScore: number;
  readonly trendDirection: RiskTrendDirection;
  /** Absolute percentage change of recent vs earlier mean score */
  readonly changePercent: number;
  readonly totalAssessments: number;
  readonly lastAssessmentDate: string | null;
  readonly mostCommonCategory: RiskCategory | 'N/A';
}

export type RiskCategoryDistribution = Record<RiskCategory, number>;

export interface VitalSignTrendPoint {
  readonly date: string;
  readonly value: number;
  readonly isNormal: boolean;
}

export type VitalSignTrends = Record<VitalSignName, VitalSignTrendPoint[]>;

export type RiskFactorStatus = 'contributor' | 'improved' | 'stable';

export interface RiskFactorContribution {
  readonly factor: string;
  readonly factorName: string;
  readonly occurrences: number;
  readonly status: RiskFactorStatus;
  readonly description: string;
}

export interface RiskFactorAnalysis {
  readonly contributors: readonly RiskFactorContribution[];
  readonly improved: readonly RiskFactorContribution[];
  readonly stable: readonly RiskFactorContribution[];
}

// ============================================================================
// CONSTANTS
// ============================================================================

const RECENT_WINDOW = 3;
const TREND_THRESHOLD_PERCENT = 5;

/** Healthy ranges used to flag trend points (narrower than the advice ranges) */
export const TREND_NORMAL_RANGES: Readonly<Record<VitalSignName, { min: number; max: number }>> =
  {
    systolicBP: { min: 90, max: 120 },
    diastolicBP: { min: 60, max: 80 },
    heartRate: { min: 60, max: 100 },
    oxygenSaturation: { min: 95, max: Number.POSITIVE_INFINITY },
    temperature: { min: 36.1, max: 37.2 },
  };

const CONTRIBUTION_LIMITS: Readonly<Record<RiskFactorStatus, number>> = {
  contributor: 5,
  improved: 3,
  stable: 3,
};

const FACTOR_DESCRIPTIONS: Readonly<Record<RiskFactorStatus, string>> = {
  improved: 'Great! This risk factor has been addressed.',
  contributor: 'Currently affecting your heart health.',
  stable: 'Well managed and stable.',
};

// ============================================================================
// HELPERS
// ============================================================================

function chronological(records: readonly AssessmentRecord[]): AssessmentRecord[] {
  return [...records].sort((a, b) => Date.parse(a.date) - Date.parse(b.date));
}

/**
 * Most recent record; with equal dates, the one stored last
 */
export function latestAssessment(
  records: readonly AssessmentRecord[]
): AssessmentRecord | undefined {
  const history = chronological(records);
  return history[history.length - 1];
}

function meanScore(records: readonly AssessmentRecord[]): number {
  if (records.length === 0) return 0;
  return records.reduce((sum, r) => sum + r.finalRiskScore, 0) / records.length;
}

function mostCommonCategory(records: readonly AssessmentRecord[]): RiskCategory | 'N/A' {
  const counts = new Map<RiskCategory, number>();
  for (const record of records) {
    counts.set(record.riskCategory, (counts.get(record.riskCategory) ?? 0) + 1);
  }

  let best: RiskCategory | 'N/A' = 'N/A';
  let bestCount = 0;
  // Map keeps insertion order, so the first category seen wins a tie
  for (const [category, count] of counts) {
    if (count > bestCount) {
      best = category;
      bestCount = count;
    }
  }
  return best;
}

/**
 * "chronicKidneyDisease" → "Chronic Kidney Disease"
 */
export function formatFactorName(factor: string): string {
  const spaced = factor.replace(/^risk_/, '').replace(/([A-Z])/g, ' $1');
  return spaced.charAt(0).toUpperCase() + spaced.slice(1);
}

// ============================================================================
// ANALYTICS
// ============================================================================

/**
 * Summary statistics of the risk score over time
 */
export function calculateRiskTrendStats(records: readonly AssessmentRecord[]): RiskTrendStats {
  if (records.length === 0) {
    return {
      averageRiskScore: 0,
      trendDirection: 'stable',
      changePercent: 0,
      totalAssessments: 0,
      lastAssessmentDate: null,
      mostCommonCategory: 'N/A',
    };
  }

  const history = chronological(records);
  let trendDirection: RiskTrendDirection = 'stable';
  let changePercent = 0;

  if (history.length >= 2) {
    const recentCount = history.length < RECENT_WINDOW ? 1 : RECENT_WINDOW;
    const recent = history.slice(-recentCount);
    const earlier = history.length <= recentCount ? recent : history.slice(0, -recentCount);

    const recentMean = meanScore(recent);
    const earlierMean = meanScore(earlier);

    if (earlierMean > 0) {
      changePercent = ((recentMean - earlierMean) / earlierMean) * 100;
      if (changePercent < -TREND_THRESHOLD_PERCENT) {
        trendDirection = 'improving';
      } else if (changePercent > TREND_THRESHOLD_PERCENT) {
        trendDirection = 'worsening';
      }
    }
  }

  return {
    averageRiskScore: meanScore(history),
    trendDirection,
    changePercent: Math.abs(changePercent),
    totalAssessments: history.length,
    lastAssessmentDate: history[history.length - 1]?.date ?? null,
    mostCommonCategory: mostCommonCategory(history),
  };
}

/**
 * Number of assessments per risk category, zero for categories never seen
 */
export function getRiskCategoryDistribution(
  records: readonly AssessmentRecord[]
): RiskCategoryDistribution {
  const distribution: RiskCategoryDistribution = {
    Low: 0,
    Mild: 0,
    Moderate: 0,
    High: 0,
    Critical: 0,
  };
  for (const record of records) {
    distribution[record.riskCategory] += 1;
  }
  return distribution;
}

/**
 * Per-vital time series, skipping records where the vital was not measured
 */
export function buildVitalSignTrends(records: readonly AssessmentRecord[]): VitalSignTrends {
  const trends: VitalSignTrends = {
    systolicBP: [],
    diastolicBP: [],
    heartRate: [],
    oxygenSaturation: [],
    temperature: [],
  };

  for (const record of chronological(records)) {
    for (const name of VITAL_SIGN_NAMES) {
      const value = record[name];
      if (value === null) continue;

      const range = TREND_NORMAL_RANGES[name];
      trends[name].push({
        date: record.date,
        value,
        isNormal: value >= range.min && value <= range.max,
      });
    }
  }

  return trends;
}

/**
 * Classify each risk factor that was ever reported:
 * - improved: present in the second-to-last record, absent in the last
 * - contributor: present in at least 2 of the last 3 records (any, with fewer)
 * - stable: otherwise
 *
 * Each group is sorted by occurrences and capped (5 / 3 / 3).
 */
export function analyzeRiskFactorContributions(
  records: readonly AssessmentRecord[]
): RiskFactorAnalysis {
  const occurrences = new Map<string, number>();
  const presence = new Map<string, boolean[]>();

  for (const record of chronological(records)) {
    for (const [factor, present] of Object.entries(record.riskFactors)) {
      const series = presence.get(factor) ?? [];
      series.push(present);
      presence.set(factor, series);
      if (present) occurrences.set(factor, (occurrences.get(factor) ?? 0) + 1);
    }
  }

  const groups: Record<RiskFactorStatus, RiskFactorContribution[]> = {
    contributor: [],
    improved: [],
    stable: [],
  };

  for (const [factor, count] of occurrences) {
    const series = presence.get(factor) ?? [];
    const last = series[series.length - 1];
    const previous = series[series.length - 2];

    const improved = series.length >= 2 && last === false && previous === true;
    const recentlyPresent =
      series.length >= RECENT_WINDOW
        ? series.slice(-RECENT_WINDOW).filter(Boolean).length >= 2
        : series.some(Boolean);

    const status: RiskFactorStatus = improved
      ? 'improved'
      : recentlyPresent
        ? 'contributor'
        : 'stable';

    groups[status].push({
      factor,
      factorName: formatFactorName(factor),
      occurrences: count,
      status,
      description: FACTOR_DESCRIPTIONS[status],
    });
  }

  const rank = (status: RiskFactorStatus): RiskFactorContribution[] =>
    groups[status]
      .sort((a, b) => b.occurrences - a.occurrences)
      .slice(0, CONTRIBUTION_LIMITS[status]);

  return {
    contributors: rank('contributor'),
    improved: rank('improved'),
    stable: rank('stable'),
  };
}
