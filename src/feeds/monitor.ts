/**
 * ThreatLedger — Feed Monitor
 *
 * Background loop: idle → running → stopped (terminal).
 *
 * Each cycle:
 * 1. Ask the producer for new observations
 * 2. Record each one, isolated from the others
 * 3. Recompute rolling stats into the StatsCache
 * 4. Publish recorded observations and the snapshot
 * 5. Sleep the cadence, or the backoff after any error in steps 1-4
 */

import { logger } from '../lib/logger';
import { toErrorMessage } from '../lib/errors';
import type { AggregationEngine } from '../engine/aggregation';
import type { IndicatorStore } from '../store/indicator-store';
import type {
  NewObservationEvent,
  Observation,
  Publisher,
  RollingStats,
} from '../types';
import type { StatsCache } from './stats-cache';
import { computeRollingStats } from './stats';

const log = logger.child({ component: 'feed-monitor' });

export const DEFAULT_INTERVAL_MS = 10_000;
export const DEFAULT_ERROR_BACKOFF_MS = 30_000;

// ============================================================
// TYPES
// ============================================================

/**
 * Source of new observations for each cycle: real feeds in production,
 * SyntheticThreatGenerator in demo mode.
 */
export interface ObservationProducer {
  produce(): Promise<Observation[]>;
}

export type MonitorState = 'idle' | 'running' | 'stopped';

export interface CycleResult {
  observations: number;
  recorded: number;
  failed: number;
  /** True when any recorded observation created a record or moved its score. */
  changed: boolean;
  stats: RollingStats;
  /** True when stats could not be recomputed and the last snapshot was reused. */
  degraded: boolean;
}

export interface FeedMonitorOptions {
  engine: AggregationEngine;
  store: IndicatorStore;
  producer: ObservationProducer;
  statsCache: StatsCache;
  publisher: Publisher;
  intervalMs?: number;
  errorBackoffMs?: number;
  clock?: () => number;
}

// ============================================================
// MONITOR
// ============================================================

export class FeedMonitor {
  private engine: AggregationEngine;
  private store: IndicatorStore;
  private producer: ObservationProducer;
  private statsCache: StatsCache;
  private publisher: Publisher;
  private intervalMs: number;
  private errorBackoffMs: number;
  private clock: () => number;

  private _state: MonitorState = 'idle';
  private loop: Promise<void> | null = null;
  private wake: (() => void) | null = null;

  constructor(options: FeedMonitorOptions) {
    this.engine = options.engine;
    this.store = options.store;
    this.producer = options.producer;
    this.statsCache = options.statsCache;
    this.publisher = options.publisher;
    this.intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.errorBackoffMs = options.errorBackoffMs ?? DEFAULT_ERROR_BACKOFF_MS;
    this.clock = options.clock ?? Date.now;
  }

  get state(): MonitorState {
    return this._state;
  }

  /**
   * Launch the loop. No-op while running; a stopped monitor stays stopped.
   */
  start(): void {
    if (this._state !== 'idle') {
      log.debug('Start ignored', { state: this._state });
      return;
    }

    this._state = 'running';
    log.info('Feed monitor started', { intervalMs: this.intervalMs });
    this.loop = this.run();
  }

  /**
   * Stop the loop. Resolves once the in-flight cycle has finished the
   * observation it was recording; no further cycle starts.
   */
  async stop(): Promise<void> {
    if (this._state !== 'stopped') {
      this._state = 'stopped';
      this.wake?.();
      log.info('Feed monitor stopping');
    }

    await this.loop;
  }

  /**
   * Run one cycle. Throws only when the cycle as a whole fails
   * (the producer itself failing).
   */
  async runCycle(): Promise<CycleResult> {
    const observations = await this.producer.produce();

    const recorded: NewObservationEvent[] = [];
    let failed = 0;

    for (const observation of observations) {
      if (this._state === 'stopped') break;

      try {
        const result = await this.engine.record(observation);
        recorded.push({
          observation,
          indicator: result.indicator,
          changed: result.changed,
          timestamp: new Date(this.clock()).toISOString(),
        });
      } catch (error) {
        failed++;
        log.warn('Observation failed', {
          value: observation.value,
          kind: observation.kind,
          source: observation.source,
          error: toErrorMessage(error),
        });
      }
    }

    const { stats, degraded } = await this.refreshStats();

    for (const event of recorded) {
      this.publisher.publish('new-observation', event);
    }
    if (!degraded) {
      this.publisher.publish('stats-update', stats);
    }

    const changed = recorded.some(e => e.changed);

    log.info('Cycle completed', {
      observations: observations.length,
      recorded: recorded.length,
      failed,
      changed,
      threatLevel: stats.threatLevel,
      degraded,
    });

    return {
      observations: observations.length,
      recorded: recorded.length,
      failed,
      changed,
      stats,
      degraded,
    };
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  private async run(): Promise<void> {
    while (this._state === 'running') {
      let delay = this.intervalMs;

      try {
        const result = await this.runCycle();
        if (result.failed > 0 || result.degraded) {
          delay = this.errorBackoffMs;
          log.warn('Cycle had errors, backing off', {
            failed: result.failed,
            degraded: result.degraded,
            backoffMs: delay,
          });
        }
      } catch (error) {
        delay = this.errorBackoffMs;
        log.error('Cycle failed, backing off', {
          error: toErrorMessage(error),
          backoffMs: delay,
        });
      }

      if (this._state !== 'running') break;
      await this.sleep(delay);
    }

    log.info('Feed monitor stopped');
  }

  /**
   * Recompute the snapshot. A storage read failure keeps the previous
   * snapshot (or the zeroed default) in place.
   */
  private async refreshStats(): Promise<{ stats: RollingStats; degraded: boolean }> {
    try {
      const stats = await computeRollingStats(this.store, this.clock());
      this.statsCache.set(stats);
      return { stats, degraded: false };
    } catch (error) {
      log.warn('Stats recompute failed, serving last snapshot', {
        error: toErrorMessage(error),
      });
      return { stats: this.statsCache.get().snapshot, degraded: true };
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      const done = (): void => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.wake = done;
    });
  }
}
