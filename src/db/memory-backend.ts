/**
 * ThreatLedger — In-Memory Backend
 *
 * Map-backed PersistenceBackend for tests and the demo mode.
 * Records are copied on the way in and out so callers never share
 * references with stored state.
 */

import type { Indicator } from '../types';
import {
  compareIndicators,
  groupKey,
  matchesFilter,
  type GroupCount,
  type GroupSpec,
  type IndicatorFilter,
  type IndicatorSort,
  type MergeFn,
  type PersistenceBackend,
} from './backend';

export class MemoryIndicatorBackend implements PersistenceBackend {
  private records = new Map<string, Indicator>();

  async upsert(key: string, merge: MergeFn): Promise<{ record: Indicator; created: boolean }> {
    const existing = this.records.get(key);
    const next = merge(existing ? structuredClone(existing) : null);

    this.records.set(key, structuredClone(next));

    return { record: structuredClone(next), created: existing === undefined };
  }

  async findOne(key: string): Promise<Indicator | null> {
    const record = this.records.get(key);
    return record ? structuredClone(record) : null;
  }

  async findMany(
    filter: IndicatorFilter,
    sort: IndicatorSort,
    skip: number,
    limit: number
  ): Promise<{ records: Indicator[]; total: number }> {
    const matching = this.matching(filter).sort((a, b) => compareIndicators(a, b, sort));

    return {
      records: matching.slice(skip, skip + limit).map(r => structuredClone(r)),
      total: matching.length,
    };
  }

  async countMatching(filter: IndicatorFilter): Promise<number> {
    return this.matching(filter).length;
  }

  async aggregate(spec: GroupSpec): Promise<GroupCount[]> {
    const counts = new Map<string, number>();

    for (const record of this.matching(spec.filter ?? {})) {
      const key = groupKey(record, spec.by);
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }

    return Array.from(counts, ([key, count]) => ({ key, count }));
  }

  /** Number of stored records. */
  get size(): number {
    return this.records.size;
  }

  private matching(filter: IndicatorFilter): Indicator[] {
    return Array.from(this.records.values()).filter(r => matchesFilter(r, filter));
  }
}
