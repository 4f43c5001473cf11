/**
 * ThreatLedger — Rolling Statistics Types
 */

import { z } from 'zod';
import type { Classification } from './indicator';

export const ThreatLevelSchema = z.enum(['low', 'medium', 'high', 'critical']);
export type ThreatLevel = z.infer<typeof ThreatLevelSchema>;

/**
 * Snapshot recomputed by the feed monitor once per cycle.
 * Replaced as a whole; never mutated after it is cached.
 */
export interface RollingStats {
  threatsLastHour: number;
  threatsLast24h: number;
  criticalLastHour: number;
  highLastHour: number;
  byClassification: Record<Classification, number>;
  totalIndicators: number;
  threatLevel: ThreatLevel;
  computedAt: string; // ISO 8601
}

export interface CachedStats {
  snapshot: RollingStats;
  /** Epoch ms of the computation, 0 when nothing has been computed yet. */
  computedAt: number;
  isStale: boolean;
}

export interface TrendPoint {
  date: string; // YYYY-MM-DD
  classification: Classification;
  count: number;
}
