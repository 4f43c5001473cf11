/**
 * ThreatLedger — Stats Cache
 *
 * Holds the latest RollingStats snapshot. Writers swap in a new frozen
 * object; readers get whatever is current, flagged stale once two
 * cycles have been missed.
 */

import type { CachedStats, RollingStats } from '../types';
import { emptyRollingStats } from './stats';

export interface StatsCacheOptions {
  /** Monitor cadence; a snapshot older than twice this is stale. */
  cadenceMs: number;
  clock?: () => number;
}

export class StatsCache {
  private snapshot: Readonly<RollingStats> = freeze(emptyRollingStats());
  private computedAt = 0;
  private cadenceMs: number;
  private clock: () => number;

  constructor(options: StatsCacheOptions) {
    this.cadenceMs = options.cadenceMs;
    this.clock = options.clock ?? Date.now;
  }

  set(snapshot: RollingStats): void {
    this.snapshot = freeze(snapshot);
    this.computedAt = this.clock();
  }

  get(): CachedStats {
    const isStale = this.computedAt === 0 || this.clock() - this.computedAt > this.cadenceMs * 2;
    return { snapshot: this.snapshot, computedAt: this.computedAt, isStale };
  }
}

function freeze(stats: RollingStats): Readonly<RollingStats> {
  return Object.freeze({ ...stats, byClassification: Object.freeze({ ...stats.byClassification }) });
}
