/**
 * ThreatLedger — Indicator Store
 *
 * One canonical record per (value, kind). Writes to the same key are
 * serialized through a keyed mutex; writes to different keys never wait
 * on each other. Backend failures surface as StorageUnavailableError.
 */

import { KeyedMutex } from '../lib/keyed-mutex';
import { StorageUnavailableError } from '../lib/errors';
import { logger } from '../lib/logger';
import { CLASSIFICATIONS, IndicatorKindSchema, indicatorKey } from '../types';
import type {
  Classification,
  Indicator,
  IndicatorKind,
  IndicatorUpdate,
  SourceObservation,
  TrendPoint,
  UpsertResult,
} from '../types';
import type { GroupSpec, IndicatorFilter, PersistenceBackend } from '../db/backend';
import { mergeIndicator, mergeTags } from './merge';

const log = logger.child({ component: 'indicator-store' });

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_PAGE_SIZE = 50;

// ============================================================
// TYPES
// ============================================================

export interface IndicatorQuery {
  search?: string;
  tag?: string;
  kind?: IndicatorKind;
}

export interface PageOptions {
  sortByRecency?: boolean;
  page?: number;
  pageSize?: number;
}

export interface IndicatorPage {
  records: Indicator[];
  total: number;
  page: number;
  pageSize: number;
  pages: number;
}

export interface IndicatorStoreOptions {
  backend: PersistenceBackend;
  /** Epoch-ms clock, injectable for tests. */
  clock?: () => number;
}

// ============================================================
// STORE
// ============================================================

export class IndicatorStore {
  private backend: PersistenceBackend;
  private clock: () => number;
  private mutex = new KeyedMutex();

  constructor(options: IndicatorStoreOptions) {
    this.backend = options.backend;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Merge evidence into the canonical record for (value, kind).
   */
  async upsert(update: IndicatorUpdate): Promise<UpsertResult> {
    const key = indicatorKey(update.value, update.kind);

    return this.mutex.runExclusive(key, async () => {
      let previous: Indicator | null = null;
      const now = new Date(this.clock()).toISOString();

      const { record, created } = await this.call('upsert', () =>
        this.backend.upsert(key, existing => {
          previous = existing;
          return mergeIndicator(existing, update, now);
        })
      );

      const changed = created || hasMoved(previous, record);

      log.debug('Indicator upserted', {
        key,
        created,
        changed,
        threatScore: record.threatScore,
      });

      return { indicator: record, created, changed };
    });
  }

  async get(value: string, kind: IndicatorKind): Promise<Indicator | null> {
    return this.call('get', () => this.backend.findOne(indicatorKey(value, kind)));
  }

  /**
   * Page through records matching `query`. Pages are 1-indexed; a page
   * below 1 is treated as the first page.
   */
  async queryPage(query: IndicatorQuery, options: PageOptions = {}): Promise<IndicatorPage> {
    const pageSize = Math.max(1, Math.floor(options.pageSize ?? DEFAULT_PAGE_SIZE));
    const page = Math.max(1, Math.floor(options.page ?? 1));

    const filter: IndicatorFilter = {
      search: query.search?.trim() || undefined,
      tag: query.tag?.trim() || undefined,
      kind: query.kind,
    };

    const sort = options.sortByRecency
      ? { field: 'lastSeen' as const, direction: 'desc' as const }
      : { field: 'threatScore' as const, direction: 'desc' as const };

    const { records, total } = await this.call('queryPage', () =>
      this.backend.findMany(filter, sort, (page - 1) * pageSize, pageSize)
    );

    return { records, total, page, pageSize, pages: Math.ceil(total / pageSize) };
  }

  /**
   * Count records first seen at or after `cutoff`.
   */
  async statsSince(cutoff: Date, classification?: Classification): Promise<number> {
    return this.call('statsSince', () =>
      this.backend.countMatching({
        firstSeenSince: cutoff.toISOString(),
        classifications: classification ? [classification] : undefined,
      })
    );
  }

  // ============================================================
  // SUPPLEMENTARY OPERATIONS
  // ============================================================

  /**
   * Union tags into an existing record. Returns null when there is no
   * record for (value, kind); tagging never creates one.
   */
  async addTags(value: string, kind: IndicatorKind, tags: string[]): Promise<Indicator | null> {
    const key = indicatorKey(value, kind);

    return this.mutex.runExclusive(key, async () => {
      const current = await this.call('addTags', () => this.backend.findOne(key));
      if (!current) return null;

      const { record } = await this.call('addTags', () =>
        this.backend.upsert(key, existing => mergeTags(existing ?? current, tags))
      );
      return record;
    });
  }

  /** All-time record count per classification tier, zero-filled. */
  async classificationBreakdown(): Promise<Record<Classification, number>> {
    const groups = await this.aggregate({ by: 'classification' });
    const breakdown = zeroBreakdown();

    for (const { key, count } of groups) {
      const tier = CLASSIFICATIONS.find(c => c === key);
      if (tier) breakdown[tier] = count;
    }
    return breakdown;
  }

  /** All-time record count per indicator kind, zero-filled. */
  async kindBreakdown(): Promise<Record<IndicatorKind, number>> {
    const groups = await this.aggregate({ by: 'kind' });
    const breakdown: Record<IndicatorKind, number> = { ip: 0, domain: 0, hash: 0, url: 0 };

    for (const { key, count } of groups) {
      const kind = IndicatorKindSchema.safeParse(key);
      if (kind.success) breakdown[kind.data] = count;
    }
    return breakdown;
  }

  async totalCount(): Promise<number> {
    return this.call('totalCount', () => this.backend.countMatching({}));
  }

  /**
   * Highest-scoring high and critical records.
   */
  async topThreats(limit: number, kind?: IndicatorKind): Promise<Indicator[]> {
    const { records } = await this.call('topThreats', () =>
      this.backend.findMany(
        { kind, classifications: ['high', 'critical'] },
        { field: 'threatScore', direction: 'desc' },
        0,
        limit
      )
    );
    return records;
  }

  /**
   * Newly seen indicators per day and tier over the last `days` days
   * (UTC days, oldest first).
   */
  async trends(days: number): Promise<TrendPoint[]> {
    const since = new Date(this.clock() - days * DAY_MS);
    since.setUTCHours(0, 0, 0, 0);

    const points: TrendPoint[] = [];

    for (const classification of CLASSIFICATIONS) {
      const groups = await this.aggregate({
        by: 'firstSeenDay',
        filter: { firstSeenSince: since.toISOString(), classifications: [classification] },
      });
      for (const { key, count } of groups) {
        points.push({ date: key, classification, count });
      }
    }

    return points.sort((a, b) => a.date.localeCompare(b.date));
  }

  /**
   * Source observations for one record, newest first.
   */
  async timeline(value: string, kind: IndicatorKind): Promise<SourceObservation[] | null> {
    const record = await this.get(value, kind);
    if (!record) return null;

    return [...record.sourceObservations].sort(
      (a, b) => Date.parse(b.observedAt) - Date.parse(a.observedAt)
    );
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  private aggregate(spec: GroupSpec) {
    return this.call('aggregate', () => this.backend.aggregate(spec));
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof StorageUnavailableError) throw error;
      throw new StorageUnavailableError(operation, error);
    }
  }
}

function hasMoved(previous: Indicator | null, next: Indicator): boolean {
  if (!previous) return true;
  return (
    previous.threatScore !== next.threatScore ||
    previous.classification !== next.classification
  );
}

export function zeroBreakdown(): Record<Classification, number> {
  return { clean: 0, low: 0, medium: 0, high: 0, critical: 0 };
}
