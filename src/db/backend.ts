/**
 * ThreatLedger — Persistence Backend Capability
 *
 * The narrow interface IndicatorStore needs from a document store.
 * Implementations: MemoryIndicatorBackend (tests, demo) and
 * SupabaseIndicatorBackend (production).
 */

import type { Classification, Indicator, IndicatorKind } from '../types';

// ============================================================
// QUERY TYPES
// ============================================================

export interface IndicatorFilter {
  /** Case-insensitive substring match on value or description. */
  search?: string;
  /** Exact tag membership. */
  tag?: string;
  kind?: IndicatorKind;
  classifications?: Classification[];
  /** Inclusive lower bound on firstSeen (ISO 8601). */
  firstSeenSince?: string;
}

export type IndicatorSortField = 'firstSeen' | 'lastSeen' | 'threatScore';

export interface IndicatorSort {
  field: IndicatorSortField;
  direction: 'asc' | 'desc';
}

export interface GroupSpec {
  by: 'classification' | 'kind' | 'firstSeenDay';
  filter?: IndicatorFilter;
}

export interface GroupCount {
  key: string;
  count: number;
}

export type MergeFn = (existing: Indicator | null) => Indicator;

// ============================================================
// CAPABILITY
// ============================================================

export interface PersistenceBackend {
  /**
   * Read the record at `key`, apply `merge`, write the result.
   * Callers serialize concurrent upserts to the same key.
   */
  upsert(key: string, merge: MergeFn): Promise<{ record: Indicator; created: boolean }>;
  findOne(key: string): Promise<Indicator | null>;
  findMany(
    filter: IndicatorFilter,
    sort: IndicatorSort,
    skip: number,
    limit: number
  ): Promise<{ records: Indicator[]; total: number }>;
  countMatching(filter: IndicatorFilter): Promise<number>;
  aggregate(spec: GroupSpec): Promise<GroupCount[]>;
}

// ============================================================
// SHARED HELPERS
// ============================================================

/**
 * In-process evaluation of a filter. Used by the memory backend and
 * by the Supabase backend for the parts PostgREST cannot express.
 */
export function matchesFilter(indicator: Indicator, filter: IndicatorFilter): boolean {
  if (filter.kind && indicator.kind !== filter.kind) return false;

  if (filter.tag && !indicator.tags.includes(filter.tag)) return false;

  if (filter.classifications && !filter.classifications.includes(indicator.classification)) {
    return false;
  }

  if (filter.firstSeenSince && Date.parse(indicator.firstSeen) < Date.parse(filter.firstSeenSince)) {
    return false;
  }

  if (filter.search) {
    const needle = filter.search.toLowerCase();
    const inValue = indicator.value.toLowerCase().includes(needle);
    const inDescription = indicator.description.toLowerCase().includes(needle);
    if (!inValue && !inDescription) return false;
  }

  return true;
}

export function compareIndicators(a: Indicator, b: Indicator, sort: IndicatorSort): number {
  const sign = sort.direction === 'asc' ? 1 : -1;

  if (sort.field === 'threatScore') {
    return (a.threatScore - b.threatScore) * sign;
  }

  return (Date.parse(a[sort.field]) - Date.parse(b[sort.field])) * sign;
}

export function groupKey(indicator: Pick<Indicator, 'classification' | 'kind' | 'firstSeen'>, by: GroupSpec['by']): string {
  switch (by) {
    case 'classification':
      return indicator.classification;
    case 'kind':
      return indicator.kind;
    case 'firstSeenDay':
      return indicator.firstSeen.slice(0, 10); // YYYY-MM-DD
  }
}
