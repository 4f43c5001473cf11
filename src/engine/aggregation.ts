/**
 * ThreatLedger — Aggregation Engine
 *
 * Two ways in:
 * - lookupOrFetch: interactive path; serves fresh cached records and
 *   otherwise fans out to every source that supports the kind.
 * - record: ingestion path; every observation is normalized and merged.
 */

import { toErrorMessage, ValidationError } from '../lib/errors';
import { logger, timeOperation } from '../lib/logger';
import { normalize } from '../scoring/normalizer';
import { ObservationSchema } from '../types';
import type {
  Indicator,
  IndicatorKind,
  IndicatorUpdate,
  SourceObservation,
  UpsertResult,
} from '../types';
import type { SourceLookup, SourceResult } from '../sources/base';
import type { IndicatorStore } from '../store/indicator-store';

const log = logger.child({ component: 'aggregation-engine' });

export const DEFAULT_FRESHNESS_WINDOW_MS = 60 * 60 * 1000;
export const DEFAULT_SOURCE_TIMEOUT_MS = 10_000;

export interface AggregationEngineOptions {
  store: IndicatorStore;
  sources: SourceLookup[];
  freshnessWindowMs?: number;
  sourceTimeoutMs?: number;
  clock?: () => number;
}

export class AggregationEngine {
  private store: IndicatorStore;
  private sources: SourceLookup[];
  private freshnessWindowMs: number;
  private sourceTimeoutMs: number;
  private clock: () => number;

  constructor(options: AggregationEngineOptions) {
    this.store = options.store;
    this.sources = options.sources;
    this.freshnessWindowMs = options.freshnessWindowMs ?? DEFAULT_FRESHNESS_WINDOW_MS;
    this.sourceTimeoutMs = options.sourceTimeoutMs ?? DEFAULT_SOURCE_TIMEOUT_MS;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Return the record for (value, kind), refreshing it from the sources
   * when it is missing or older than the freshness window.
   * Returns null when no source has data on an unknown indicator.
   */
  async lookupOrFetch(value: string, kind: IndicatorKind): Promise<Indicator | null> {
    const cached = await this.readCached(value, kind);

    if (cached && this.clock() - Date.parse(cached.lastSeen) < this.freshnessWindowMs) {
      log.debug('Serving cached indicator', { kind, value });
      return cached;
    }

    const eligible = this.sources.filter(source => source.supports(kind));

    const results = await timeOperation(
      'Source fan-out',
      () => Promise.all(eligible.map(source => source.safeLookup(value, kind, this.sourceTimeoutMs))),
      { kind, sources: eligible.length }
    );

    const answered = results.filter((r): r is SourceResult => r !== null);

    if (answered.length === 0) {
      log.info('No source returned data', { kind, value, queried: eligible.length });
      return null;
    }

    const observedAt = new Date(this.clock()).toISOString();
    const observations = answered.map(result => toSourceObservation(result, observedAt));

    const update: IndicatorUpdate = {
      value,
      kind,
      score: Math.max(...observations.map(o => o.score)),
      sources: observations.map(o => o.source),
      observations,
      description: `${kind.toUpperCase()}: ${value.trim()}`,
    };

    const { indicator } = await this.store.upsert(update);
    return indicator;
  }

  /**
   * Validate, normalize and merge one observation. No freshness check:
   * every observation lands.
   */
  async record(input: unknown): Promise<UpsertResult> {
    const parsed = ObservationSchema.safeParse(input);
    if (!parsed.success) {
      throw ValidationError.fromZod('Invalid observation', parsed.error.issues);
    }

    const observation = parsed.data;
    const normalized = normalize(observation.source, observation.rawScore);

    const sourceObservation: SourceObservation = {
      source: observation.source,
      score: normalized.score,
      classification: normalized.classification,
      scoreModel: normalized.model,
      observedAt: new Date(this.clock()).toISOString(),
      details: observation.details ?? {},
    };

    return this.store.upsert({
      value: observation.value,
      kind: observation.kind,
      score: normalized.score,
      sources: [observation.source],
      observations: [sourceObservation],
      tags: observation.tags,
      description: observation.description,
    });
  }

  /**
   * Cache read for the freshness check. A failed read is treated as a
   * cache miss; the write that follows will surface a real outage.
   */
  private async readCached(value: string, kind: IndicatorKind): Promise<Indicator | null> {
    try {
      return await this.store.get(value, kind);
    } catch (error) {
      log.warn('Cache read failed, fetching from sources', {
        kind,
        value,
        error: toErrorMessage(error),
      });
      return null;
    }
  }
}

function toSourceObservation(result: SourceResult, observedAt: string): SourceObservation {
  const normalized = normalize(result.source, result.rawScore);
  return {
    source: result.source,
    score: normalized.score,
    classification: normalized.classification,
    scoreModel: normalized.model,
    observedAt,
    details: result.details,
  };
}
