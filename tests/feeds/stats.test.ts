/**
 * Tests for Rolling Statistics
 */

import { describe, it, expect } from 'vitest';
import { computeRollingStats, deriveThreatLevel, emptyRollingStats } from '../../src/feeds/stats';
import { IndicatorStore } from '../../src/store/indicator-store';
import { MemoryIndicatorBackend } from '../../src/db/memory-backend';
import type { ThreatLevel } from '../../src/types';

const T0 = Date.parse('2026-03-01T12:00:00.000Z');
const HOUR = 60 * 60 * 1000;

describe('deriveThreatLevel', () => {
  const cases: Array<[number, number, ThreatLevel]> = [
    [6, 0, 'critical'],
    [5, 0, 'high'],
    [1, 0, 'high'],
    [0, 11, 'high'],
    [0, 10, 'medium'],
    [0, 1, 'medium'],
    [0, 0, 'low'],
  ];

  it.each(cases)('should map %i critical and %i high to %s', (critical, high, expected) => {
    expect(deriveThreatLevel(critical, high)).toBe(expected);
  });
});

describe('emptyRollingStats', () => {
  it('should be all zeros at the epoch', () => {
    const stats = emptyRollingStats();

    expect(stats.threatsLastHour).toBe(0);
    expect(stats.totalIndicators).toBe(0);
    expect(stats.byClassification).toEqual({ clean: 0, low: 0, medium: 0, high: 0, critical: 0 });
    expect(stats.threatLevel).toBe('low');
    expect(stats.computedAt).toBe('1970-01-01T00:00:00.000Z');
  });
});

describe('computeRollingStats', () => {
  it('should count the hour and day windows and derive the level', async () => {
    let now = T0;
    const store = new IndicatorStore({ backend: new MemoryIndicatorBackend(), clock: () => now });
    const add = (value: string, score: number) =>
      store.upsert({ value, kind: 'ip', score, sources: ['honeypot'], observations: [] });

    now = T0 - 30 * HOUR;
    await add('192.0.2.1', 95);
    now = T0 - 5 * HOUR;
    await add('192.0.2.2', 65);
    now = T0 - 10 * 60 * 1000;
    await add('192.0.2.3', 90);
    await add('192.0.2.4', 70);
    await add('192.0.2.5', 10);

    const stats = await computeRollingStats(store, T0);

    expect(stats).toEqual({
      threatsLastHour: 3,
      threatsLast24h: 4,
      criticalLastHour: 1,
      highLastHour: 1,
      byClassification: { clean: 0, low: 1, medium: 0, high: 2, critical: 2 },
      totalIndicators: 5,
      threatLevel: 'high',
      computedAt: '2026-03-01T12:00:00.000Z',
    });
  });
});
