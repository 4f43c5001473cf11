/**
 * Tests for Feed Monitor
 *
 * Cycles are driven directly through runCycle(); the loop tests use
 * fake timers to step through cadence and backoff.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { FeedMonitor, type ObservationProducer } from '../../src/feeds/monitor';
import { StatsCache } from '../../src/feeds/stats-cache';
import { AggregationEngine } from '../../src/engine/aggregation';
import { IndicatorStore } from '../../src/store/indicator-store';
import { MemoryIndicatorBackend } from '../../src/db/memory-backend';
import { StorageUnavailableError } from '../../src/lib/errors';
import type { PersistenceBackend } from '../../src/db/backend';
import type { Observation, Publisher } from '../../src/types';

function observation(value: string, percent: number): Observation {
  return {
    value,
    kind: 'ip',
    source: 'network_monitor',
    rawScore: { type: 'confidence', percent },
    tags: ['botnet'],
  };
}

function producerOf(...batches: Observation[][]): ObservationProducer & { calls: number } {
  const producer = {
    calls: 0,
    async produce(): Promise<Observation[]> {
      const batch = batches[Math.min(producer.calls, batches.length - 1)] ?? [];
      producer.calls++;
      return batch;
    },
  };
  return producer;
}

describe('FeedMonitor', () => {
  let store: IndicatorStore;
  let engine: AggregationEngine;
  let statsCache: StatsCache;
  let publisher: Publisher & { publish: ReturnType<typeof vi.fn> };

  const createMonitor = (producer: ObservationProducer) =>
    new FeedMonitor({
      engine,
      store,
      producer,
      statsCache,
      publisher,
      intervalMs: 1_000,
      errorBackoffMs: 30_000,
    });

  beforeEach(() => {
    store = new IndicatorStore({ backend: new MemoryIndicatorBackend() });
    engine = new AggregationEngine({ store, sources: [] });
    statsCache = new StatsCache({ cadenceMs: 1_000 });
    publisher = { publish: vi.fn() };
  });

  // ============================================================
  // Cycle Tests
  // ============================================================

  describe('runCycle', () => {
    it('should isolate a failing observation from the rest of the cycle', async () => {
      const monitor = createMonitor(
        producerOf([observation('192.0.2.1', 90), observation('', 50), observation('192.0.2.3', 65)])
      );

      const result = await monitor.runCycle();

      expect(result.observations).toBe(3);
      expect(result.recorded).toBe(2);
      expect(result.failed).toBe(1);
      expect(result.degraded).toBe(false);
      expect(result.stats.totalIndicators).toBe(2);
      expect(result.stats.criticalLastHour).toBe(1);
      expect(result.stats.highLastHour).toBe(1);
      expect(result.stats.threatLevel).toBe('high');
    });

    it('should store the new snapshot in the stats cache', async () => {
      const monitor = createMonitor(producerOf([observation('192.0.2.1', 90)]));

      const result = await monitor.runCycle();

      expect(statsCache.get().snapshot).toEqual(result.stats);
      expect(statsCache.get().isStale).toBe(false);
    });

    it('should publish each recorded observation and the snapshot', async () => {
      const monitor = createMonitor(producerOf([observation('192.0.2.1', 90), observation('192.0.2.2', 20)]));

      const result = await monitor.runCycle();

      const events = publisher.publish.mock.calls.map(call => call[0]);
      expect(events).toEqual(['new-observation', 'new-observation', 'stats-update']);
      expect(publisher.publish.mock.calls[0][1]).toMatchObject({
        indicator: { value: '192.0.2.1', threatScore: 90 },
        changed: true,
      });
      expect(publisher.publish.mock.calls[2][1]).toEqual(result.stats);
    });

    it('should report whether any observation changed a record', async () => {
      const monitor = createMonitor(producerOf([observation('192.0.2.1', 90)], [observation('192.0.2.1', 40)]));

      expect((await monitor.runCycle()).changed).toBe(true);
      expect((await monitor.runCycle()).changed).toBe(false);
    });

    it('should count storage failures on record as failed observations', async () => {
      const monitor = createMonitor(producerOf([observation('192.0.2.1', 90), observation('192.0.2.2', 90)]));
      const record = engine.record.bind(engine);
      vi.spyOn(engine, 'record')
        .mockRejectedValueOnce(new StorageUnavailableError('upsert', new Error('connection reset')))
        .mockImplementation(record);

      const result = await monitor.runCycle();

      expect(result.failed).toBe(1);
      expect(result.recorded).toBe(1);
    });

    it('should serve the last snapshot when stats cannot be recomputed', async () => {
      const monitor = createMonitor(producerOf([observation('192.0.2.1', 90)], [observation('192.0.2.2', 90)]));
      const first = await monitor.runCycle();
      publisher.publish.mockClear();

      vi.spyOn(store, 'statsSince').mockRejectedValue(new StorageUnavailableError('statsSince', new Error('timeout')));
      const second = await monitor.runCycle();

      expect(second.degraded).toBe(true);
      expect(second.recorded).toBe(1);
      expect(second.stats).toEqual(first.stats);
      expect(publisher.publish.mock.calls.map(call => call[0])).toEqual(['new-observation']);
    });

    it('should fail the cycle when the producer fails', async () => {
      const monitor = createMonitor({
        produce: async () => {
          throw new Error('feed unreachable');
        },
      });

      await expect(monitor.runCycle()).rejects.toThrow('feed unreachable');
    });

    it('should stop recording once stop is requested mid-cycle', async () => {
      const monitor = createMonitor(
        producerOf([observation('192.0.2.1', 90), observation('192.0.2.2', 90), observation('192.0.2.3', 90)])
      );
      const record = engine.record.bind(engine);
      let stopping: Promise<void> | undefined;
      vi.spyOn(engine, 'record').mockImplementation(async input => {
        stopping ??= monitor.stop();
        return record(input);
      });

      const result = await monitor.runCycle();
      await stopping;

      expect(result.recorded).toBe(1);
      expect(monitor.state).toBe('stopped');
      expect(await store.get('192.0.2.2', 'ip')).toBeNull();
    });
  });

  // ============================================================
  // Loop & State Tests
  // ============================================================

  describe('loop', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should run a cycle per interval until stopped', async () => {
      const producer = producerOf([observation('192.0.2.1', 50)]);
      const monitor = createMonitor(producer);

      monitor.start();
      await vi.advanceTimersByTimeAsync(0);
      expect(producer.calls).toBe(1);
      expect(monitor.state).toBe('running');

      await vi.advanceTimersByTimeAsync(1_000);
      expect(producer.calls).toBe(2);

      await monitor.stop();
      await vi.advanceTimersByTimeAsync(5_000);

      expect(producer.calls).toBe(2);
      expect(monitor.state).toBe('stopped');
    });

    it('should back off after a failed cycle, then resume the cadence', async () => {
      let calls = 0;
      const monitor = createMonitor({
        produce: async () => {
          calls++;
          if (calls === 1) throw new Error('feed unreachable');
          return [];
        },
      });

      monitor.start();
      await vi.advanceTimersByTimeAsync(0);
      expect(calls).toBe(1);

      await vi.advanceTimersByTimeAsync(1_000);
      expect(calls).toBe(1);

      await vi.advanceTimersByTimeAsync(29_000);
      expect(calls).toBe(2);

      await vi.advanceTimersByTimeAsync(1_000);
      expect(calls).toBe(3);

      await monitor.stop();
    });

    it('should back off while storage is unavailable', async () => {
      const unavailable = async (): Promise<never> => {
        throw new Error('connection refused');
      };
      const deadBackend: PersistenceBackend = {
        upsert: unavailable,
        findOne: unavailable,
        findMany: unavailable,
        countMatching: unavailable,
        aggregate: unavailable,
      };
      store = new IndicatorStore({ backend: deadBackend });
      engine = new AggregationEngine({ store, sources: [] });
      const producer = producerOf([observation('192.0.2.1', 90)]);
      const monitor = createMonitor(producer);

      monitor.start();
      await vi.advanceTimersByTimeAsync(0);
      expect(producer.calls).toBe(1);

      await vi.advanceTimersByTimeAsync(1_000);
      expect(producer.calls).toBe(1);

      await vi.advanceTimersByTimeAsync(29_000);
      expect(producer.calls).toBe(2);

      await monitor.stop();
    });

    it('should back off after a cycle with a failed observation', async () => {
      const producer = producerOf([observation('', 50)], []);
      const monitor = createMonitor(producer);

      monitor.start();
      await vi.advanceTimersByTimeAsync(1_000);
      expect(producer.calls).toBe(1);

      await vi.advanceTimersByTimeAsync(29_000);
      expect(producer.calls).toBe(2);

      await vi.advanceTimersByTimeAsync(1_000);
      expect(producer.calls).toBe(3);

      await monitor.stop();
    });

    it('should ignore a second start while running', async () => {
      const producer = producerOf([]);
      const monitor = createMonitor(producer);

      monitor.start();
      monitor.start();
      await vi.advanceTimersByTimeAsync(0);

      expect(producer.calls).toBe(1);
      await monitor.stop();
    });

    it('should stay stopped once stopped', async () => {
      const producer = producerOf([]);
      const monitor = createMonitor(producer);

      await monitor.stop();
      monitor.start();
      await vi.advanceTimersByTimeAsync(5_000);

      expect(monitor.state).toBe('stopped');
      expect(producer.calls).toBe(0);
    });
  });
});
