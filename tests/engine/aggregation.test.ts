/**
 * Tests for Aggregation Engine
 *
 * Sources are in-process fakes; storage is the in-memory backend.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AggregationEngine } from '../../src/engine/aggregation';
import { IndicatorStore } from '../../src/store/indicator-store';
import { MemoryIndicatorBackend } from '../../src/db/memory-backend';
import { SourceLookup, type SourceResult } from '../../src/sources/base';
import { StorageUnavailableError, ValidationError } from '../../src/lib/errors';
import type { IndicatorKind, RawScore } from '../../src/types';

const T0 = Date.parse('2026-03-01T12:00:00.000Z');
const MINUTE = 60 * 1000;

type Behaviour = (value: string) => Promise<SourceResult | null>;

class FakeSource extends SourceLookup {
  calls = 0;

  constructor(
    readonly name: string,
    readonly supportedKinds: readonly IndicatorKind[],
    private behaviour: Behaviour
  ) {
    super();
  }

  async lookup(value: string): Promise<SourceResult | null> {
    this.calls++;
    return this.behaviour(value);
  }
}

function answering(name: string, rawScore: RawScore, kinds: IndicatorKind[] = ['ip']): FakeSource {
  return new FakeSource(name, kinds, async () => ({ source: name, rawScore, details: { engine: name } }));
}

function failing(name: string, kinds: IndicatorKind[] = ['ip']): FakeSource {
  return new FakeSource(name, kinds, async () => {
    throw new Error('upstream 502');
  });
}

describe('AggregationEngine', () => {
  let now: number;
  let backend: MemoryIndicatorBackend;
  let store: IndicatorStore;

  const createEngine = (sources: SourceLookup[], sourceTimeoutMs = 1000) =>
    new AggregationEngine({
      store,
      sources,
      freshnessWindowMs: 60 * MINUTE,
      sourceTimeoutMs,
      clock: () => now,
    });

  beforeEach(() => {
    now = T0;
    backend = new MemoryIndicatorBackend();
    store = new IndicatorStore({ backend, clock: () => now });
  });

  // ============================================================
  // lookupOrFetch Tests
  // ============================================================

  describe('lookupOrFetch', () => {
    it('should merge answering sources and ignore a failing one', async () => {
      const engine = createEngine([answering('A', 72), answering('B', 90), failing('C')]);

      const indicator = await engine.lookupOrFetch('198.51.100.7', 'ip');

      expect(indicator?.threatScore).toBe(90);
      expect(indicator?.classification).toBe('critical');
      expect(indicator?.sources).toEqual(['A', 'B']);
      expect(indicator?.sourceObservations.map(o => o.score)).toEqual([72, 90]);
      expect(indicator?.description).toBe('IP: 198.51.100.7');
    });

    it('should serve a fresh record without calling any source', async () => {
      const source = answering('A', 50);
      const engine = createEngine([source]);

      await engine.lookupOrFetch('198.51.100.7', 'ip');
      expect(source.calls).toBe(1);

      now = T0 + 10 * MINUTE;
      const cached = await engine.lookupOrFetch('198.51.100.7', 'ip');

      expect(source.calls).toBe(1);
      expect(cached?.threatScore).toBe(50);
    });

    it('should refresh a record older than the freshness window', async () => {
      const source = answering('A', 50);
      const engine = createEngine([source]);

      await engine.lookupOrFetch('198.51.100.7', 'ip');
      now = T0 + 61 * MINUTE;
      const refreshed = await engine.lookupOrFetch('198.51.100.7', 'ip');

      expect(source.calls).toBe(2);
      expect(refreshed?.sourceObservations).toHaveLength(2);
      expect(refreshed?.lastSeen).toBe('2026-03-01T13:01:00.000Z');
    });

    it('should return null and create nothing when no source answers', async () => {
      const engine = createEngine([failing('A'), new FakeSource('B', ['ip'], async () => null)]);

      const result = await engine.lookupOrFetch('198.51.100.7', 'ip');

      expect(result).toBeNull();
      expect(backend.size).toBe(0);
    });

    it('should only query sources that support the kind', async () => {
      const ipOnly = answering('ip-only', 40, ['ip']);
      const domains = answering('domains', 65, ['domain']);
      const engine = createEngine([ipOnly, domains]);

      const indicator = await engine.lookupOrFetch('bad.example', 'domain');

      expect(ipOnly.calls).toBe(0);
      expect(domains.calls).toBe(1);
      expect(indicator?.sources).toEqual(['domains']);
    });

    it('should treat a source that exceeds the timeout as no data', async () => {
      const hanging = new FakeSource('slow', ['ip'], () => new Promise(() => undefined));
      const engine = createEngine([hanging, answering('A', 35)], 20);

      const indicator = await engine.lookupOrFetch('198.51.100.7', 'ip');

      expect(indicator?.sources).toEqual(['A']);
      expect(indicator?.threatScore).toBe(35);
    });

    it('should fall back to the sources when the cache read fails', async () => {
      const source = answering('A', 50);
      const engine = createEngine([source]);
      vi.spyOn(store, 'get').mockRejectedValueOnce(new StorageUnavailableError('get', new Error('timeout')));

      const indicator = await engine.lookupOrFetch('198.51.100.7', 'ip');

      expect(source.calls).toBe(1);
      expect(indicator?.threatScore).toBe(50);
    });

    it('should propagate a write failure', async () => {
      const engine = createEngine([answering('A', 50)]);
      vi.spyOn(store, 'upsert').mockRejectedValueOnce(
        new StorageUnavailableError('upsert', new Error('disk full'))
      );

      await expect(engine.lookupOrFetch('198.51.100.7', 'ip')).rejects.toBeInstanceOf(StorageUnavailableError);
    });
  });

  // ============================================================
  // record Tests
  // ============================================================

  describe('record', () => {
    it('should normalize and persist an observation', async () => {
      const engine = createEngine([]);

      const result = await engine.record({
        value: '198.51.100.7',
        kind: 'ip',
        source: 'abuseipdb',
        rawScore: { type: 'confidence', percent: 85 },
        tags: ['botnet'],
        description: 'Botnet C2 server detected by network_monitor',
      });

      expect(result.created).toBe(true);
      expect(result.changed).toBe(true);
      expect(result.indicator.threatScore).toBe(85);
      expect(result.indicator.classification).toBe('critical');
      expect(result.indicator.tags).toEqual(['botnet']);
      expect(result.indicator.sourceObservations[0]).toEqual({
        source: 'abuseipdb',
        score: 85,
        classification: 'critical',
        scoreModel: 'confidence',
        observedAt: '2026-03-01T12:00:00.000Z',
        details: {},
      });
    });

    it('should merge a confidence and a detection-ratio report into one critical record', async () => {
      const engine = createEngine([]);

      await engine.record({
        value: '198.51.100.7',
        kind: 'ip',
        source: 'A',
        rawScore: { type: 'confidence', percent: 90 },
      });
      const { indicator } = await engine.record({
        value: '198.51.100.7',
        kind: 'ip',
        source: 'B',
        rawScore: { type: 'detection_ratio', positives: 3, total: 10 },
      });

      expect(indicator.threatScore).toBe(90);
      expect(indicator.classification).toBe('critical');
      expect(indicator.sources).toEqual(['A', 'B']);
      expect(indicator.sourceObservations.map(o => [o.score, o.scoreModel])).toEqual([
        [90, 'confidence'],
        [30, 'detection_ratio'],
      ]);
      expect(backend.size).toBe(1);
    });

    const arrivalOrders: Array<[number[]]> = [
      [[12, 35, 64, 90]],
      [[90, 64, 35, 12]],
      [[35, 90, 12, 64]],
      [[64, 12, 90, 35]],
    ];

    it.each(arrivalOrders)('should keep the maximum score for arrival order %j', async scores => {
      const engine = createEngine([]);
      const seen: number[] = [];

      for (const [i, score] of scores.entries()) {
        const { indicator } = await engine.record({
          value: '198.51.100.7',
          kind: 'ip',
          source: `feed-${i}`,
          rawScore: score,
        });
        seen.push(indicator.threatScore);
      }

      expect(seen).toEqual(seen.map((_, i) => Math.max(...scores.slice(0, i + 1))));
      expect(seen[seen.length - 1]).toBe(90);
      const record = await store.get('198.51.100.7', 'ip');
      expect(record?.classification).toBe('critical');
      expect(record?.sourceObservations).toHaveLength(4);
    });

    it('should land every observation regardless of freshness', async () => {
      const engine = createEngine([]);
      const observation = { value: '198.51.100.7', kind: 'ip', source: 'honeypot', rawScore: 40 };

      await engine.record(observation);
      const second = await engine.record(observation);

      expect(second.changed).toBe(false);
      expect(second.indicator.sourceObservations).toHaveLength(2);
    });

    it('should reject a malformed observation before persisting anything', async () => {
      const engine = createEngine([]);

      await expect(
        engine.record({ value: '   ', kind: 'ip', source: 'honeypot', rawScore: 40 })
      ).rejects.toBeInstanceOf(ValidationError);
      await expect(
        engine.record({ value: '198.51.100.7', kind: 'mac', source: 'honeypot', rawScore: 40 })
      ).rejects.toBeInstanceOf(ValidationError);

      expect(backend.size).toBe(0);
    });

    it('should list the failing fields', async () => {
      const engine = createEngine([]);

      const error = await engine.record({ kind: 'ip', rawScore: 'high' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues.map(i => i.path)).toEqual(['value', 'source', 'rawScore']);
      }
    });
  });
});
