/**
 * ThreatLedger — Supabase Backend
 *
 * PersistenceBackend over a Postgres table reached through PostgREST.
 * Rows use snake_case columns; the table has a unique (value, kind) index.
 * Rows read back are validated before they become Indicators.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { ClassificationSchema, IndicatorKindSchema, parseIndicatorKey } from '../types';
import type { Indicator } from '../types';
import { handleSupabaseError, NOT_FOUND_CODE } from './client';
import {
  groupKey,
  type GroupCount,
  type GroupSpec,
  type IndicatorFilter,
  type IndicatorSort,
  type MergeFn,
  type PersistenceBackend,
} from './backend';

// ============================================================
// ROW SCHEMA
// ============================================================

const SourceObservationRowSchema = z.object({
  source: z.string(),
  score: z.number(),
  classification: ClassificationSchema,
  scoreModel: z.enum(['detection_ratio', 'confidence', 'clamped']),
  observedAt: z.string(),
  details: z.record(z.unknown()).default({}),
});

export const IndicatorRowSchema = z.object({
  id: z.string(),
  value: z.string(),
  kind: IndicatorKindSchema,
  threat_score: z.number(),
  classification: ClassificationSchema,
  sources: z.array(z.string()).default([]),
  source_observations: z.array(SourceObservationRowSchema).default([]),
  tags: z.array(z.string()).default([]),
  first_seen: z.string(),
  last_seen: z.string(),
  description: z.string().nullable().default(''),
});
export type IndicatorRow = z.infer<typeof IndicatorRowSchema>;

const GroupRowSchema = IndicatorRowSchema.pick({ classification: true, kind: true, first_seen: true });

const SORT_COLUMNS: Record<IndicatorSort['field'], string> = {
  firstSeen: 'first_seen',
  lastSeen: 'last_seen',
  threatScore: 'threat_score',
};

export function rowToIndicator(row: IndicatorRow): Indicator {
  return {
    id: row.id,
    value: row.value,
    kind: row.kind,
    threatScore: row.threat_score,
    classification: row.classification,
    sources: row.sources,
    sourceObservations: row.source_observations,
    tags: row.tags,
    firstSeen: row.first_seen,
    lastSeen: row.last_seen,
    description: row.description ?? '',
  };
}

export function indicatorToRow(indicator: Indicator): IndicatorRow {
  return {
    id: indicator.id,
    value: indicator.value,
    kind: indicator.kind,
    threat_score: indicator.threatScore,
    classification: indicator.classification,
    sources: indicator.sources,
    source_observations: indicator.sourceObservations,
    tags: indicator.tags,
    first_seen: indicator.firstSeen,
    last_seen: indicator.lastSeen,
    description: indicator.description,
  };
}

/**
 * Strip characters that carry meaning inside a PostgREST `or` filter.
 */
export function sanitizeSearch(search: string): string {
  return search.replace(/[,()%*\\]/g, ' ').trim();
}

// ============================================================
// BACKEND
// ============================================================

interface SelectOptions {
  columns: string;
  count?: boolean;
  head?: boolean;
  sort?: IndicatorSort;
  skip?: number;
  limit?: number;
}

export class SupabaseIndicatorBackend implements PersistenceBackend {
  constructor(
    private client: SupabaseClient,
    private table = 'indicators'
  ) {}

  async upsert(key: string, merge: MergeFn): Promise<{ record: Indicator; created: boolean }> {
    const existing = await this.findOne(key);
    const next = merge(existing);

    const { data, error } = await this.client
      .from(this.table)
      .upsert(indicatorToRow(next), { onConflict: 'value,kind' })
      .select()
      .single();

    if (error) throw handleSupabaseError('upsert', error);

    return { record: this.parseRow(data), created: existing === null };
  }

  async findOne(key: string): Promise<Indicator | null> {
    const parsed = parseIndicatorKey(key);
    if (!parsed) return null;

    const { data, error } = await this.client
      .from(this.table)
      .select('*')
      .eq('kind', parsed.kind)
      .eq('value', parsed.value)
      .single();

    if (error) {
      if (error.code === NOT_FOUND_CODE) return null; // Not found
      throw handleSupabaseError('findOne', error);
    }
    return this.parseRow(data);
  }

  async findMany(
    filter: IndicatorFilter,
    sort: IndicatorSort,
    skip: number,
    limit: number
  ): Promise<{ records: Indicator[]; total: number }> {
    const { rows, count } = await this.select('findMany', filter, {
      columns: '*',
      count: true,
      sort,
      skip,
      limit,
    });

    return {
      records: z.array(IndicatorRowSchema).parse(rows).map(rowToIndicator),
      total: count,
    };
  }

  async countMatching(filter: IndicatorFilter): Promise<number> {
    const { count } = await this.select('countMatching', filter, {
      columns: 'id',
      count: true,
      head: true,
    });
    return count;
  }

  /**
   * PostgREST has no GROUP BY; the grouped columns are fetched and
   * counted here.
   */
  async aggregate(spec: GroupSpec): Promise<GroupCount[]> {
    const { rows } = await this.select('aggregate', spec.filter ?? {}, {
      columns: 'classification, kind, first_seen',
    });

    const counts = new Map<string, number>();
    for (const row of z.array(GroupRowSchema).parse(rows)) {
      const key = groupKey(
        { classification: row.classification, kind: row.kind, firstSeen: row.first_seen },
        spec.by
      );
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }

    return Array.from(counts, ([key, count]) => ({ key, count }));
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  private async select(
    operation: string,
    filter: IndicatorFilter,
    options: SelectOptions
  ): Promise<{ rows: unknown[]; count: number }> {
    let query = this.client
      .from(this.table)
      .select(options.columns, { count: options.count ? 'exact' : undefined, head: options.head });

    if (filter.kind) query = query.eq('kind', filter.kind);
    if (filter.tag) query = query.contains('tags', [filter.tag]);
    if (filter.classifications) query = query.in('classification', filter.classifications);
    if (filter.firstSeenSince) query = query.gte('first_seen', filter.firstSeenSince);

    const search = filter.search ? sanitizeSearch(filter.search) : '';
    if (search) {
      query = query.or(`value.ilike.%${search}%,description.ilike.%${search}%`);
    }

    if (options.sort) {
      query = query.order(SORT_COLUMNS[options.sort.field], {
        ascending: options.sort.direction === 'asc',
      });
    }

    if (options.limit !== undefined) {
      const from = options.skip ?? 0;
      query = query.range(from, from + options.limit - 1);
    }

    const { data, error, count } = await query;
    if (error) throw handleSupabaseError(operation, error);

    const rows: unknown = data;
    return { rows: Array.isArray(rows) ? rows : [], count: count ?? 0 };
  }

  private parseRow(data: unknown): Indicator {
    return rowToIndicator(IndicatorRowSchema.parse(data));
  }
}
