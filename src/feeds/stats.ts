/**
 * ThreatLedger — Rolling Statistics
 *
 * Window counts and the overall threat level, recomputed once per
 * monitor cycle from the indicator store.
 */

import type { IndicatorStore } from '../store/indicator-store';
import { zeroBreakdown } from '../store/indicator-store';
import type { RollingStats, ThreatLevel } from '../types';

const HOUR_MS = 60 * 60 * 1000;

/**
 * Overall threat level from last-hour tier counts.
 * Thresholds are checked from the most severe down.
 */
export function deriveThreatLevel(criticalLastHour: number, highLastHour: number): ThreatLevel {
  if (criticalLastHour > 5) return 'critical';
  if (criticalLastHour > 0 || highLastHour > 10) return 'high';
  if (highLastHour > 0) return 'medium';
  return 'low';
}

export function emptyRollingStats(computedAt = new Date(0)): RollingStats {
  return {
    threatsLastHour: 0,
    threatsLast24h: 0,
    criticalLastHour: 0,
    highLastHour: 0,
    byClassification: zeroBreakdown(),
    totalIndicators: 0,
    threatLevel: 'low',
    computedAt: computedAt.toISOString(),
  };
}

/**
 * Read every count the snapshot needs. Rejects with
 * StorageUnavailableError if any read fails; callers decide how to degrade.
 */
export async function computeRollingStats(store: IndicatorStore, now: number): Promise<RollingStats> {
  const hourAgo = new Date(now - HOUR_MS);
  const dayAgo = new Date(now - 24 * HOUR_MS);

  const [
    threatsLastHour,
    threatsLast24h,
    criticalLastHour,
    highLastHour,
    byClassification,
    totalIndicators,
  ] = await Promise.all([
    store.statsSince(hourAgo),
    store.statsSince(dayAgo),
    store.statsSince(hourAgo, 'critical'),
    store.statsSince(hourAgo, 'high'),
    store.classificationBreakdown(),
    store.totalCount(),
  ]);

  return {
    threatsLastHour,
    threatsLast24h,
    criticalLastHour,
    highLastHour,
    byClassification,
    totalIndicators,
    threatLevel: deriveThreatLevel(criticalLastHour, highLastHour),
    computedAt: new Date(now).toISOString(),
  };
}
