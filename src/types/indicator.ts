/**
 * ThreatLedger — Indicator Types v1.0
 *
 * Canonical IOC records and the observations that feed them.
 * Every observation is validated against these schemas before it is
 * normalized or persisted.
 */

import { z } from 'zod';

// ============================================================
// KIND & CLASSIFICATION
// ============================================================

export const IndicatorKindSchema = z.enum(['ip', 'domain', 'hash', 'url']);
export type IndicatorKind = z.infer<typeof IndicatorKindSchema>;

export const ClassificationSchema = z.enum(['clean', 'low', 'medium', 'high', 'critical']);
export type Classification = z.infer<typeof ClassificationSchema>;

export const CLASSIFICATIONS: readonly Classification[] = ClassificationSchema.options;

// ============================================================
// RAW SCORES
// ============================================================

/**
 * Score as reported by a source, before normalization.
 * Sources report either a bare number, a confidence percentage,
 * or a detection ratio (positives out of total engines).
 */
export const RawScoreSchema = z.union([
  z.number(),
  z.object({
    type: z.literal('confidence'),
    percent: z.number(),
  }),
  z.object({
    type: z.literal('detection_ratio'),
    positives: z.number().int().min(0),
    total: z.number().int().min(0),
  }),
]);
export type RawScore = z.infer<typeof RawScoreSchema>;

// ============================================================
// OBSERVATION
// ============================================================

export const ObservationSchema = z.object({
  value: z.string().trim().min(1, 'value is required'),
  kind: IndicatorKindSchema,
  source: z.string().trim().min(1, 'source is required'),
  rawScore: RawScoreSchema,
  tags: z.array(z.string().min(1)).optional(),
  description: z.string().optional(),
  details: z.record(z.unknown()).optional(),
});
export type Observation = z.infer<typeof ObservationSchema>;

/** How a normalized score was derived from the raw one. */
export type ScoreModel = 'detection_ratio' | 'confidence' | 'clamped';

/**
 * One source's normalized report, as kept in the record's history.
 */
export interface SourceObservation {
  source: string;
  score: number;
  classification: Classification;
  scoreModel: ScoreModel;
  observedAt: string; // ISO 8601
  details: Record<string, unknown>;
}

// ============================================================
// CANONICAL RECORD
// ============================================================

export interface Indicator {
  id: string;
  value: string;
  kind: IndicatorKind;
  threatScore: number;
  classification: Classification;
  sources: string[];
  sourceObservations: SourceObservation[];
  tags: string[];
  firstSeen: string; // ISO 8601, immutable
  lastSeen: string;  // ISO 8601
  description: string;
}

/**
 * Evidence to merge into a canonical record.
 * Produced by the engine from one observation (Record path) or from
 * several source answers at once (LookupOrFetch path).
 */
export interface IndicatorUpdate {
  value: string;
  kind: IndicatorKind;
  score: number;
  sources: string[];
  observations: SourceObservation[];
  tags?: string[];
  description?: string;
}

export interface UpsertResult {
  indicator: Indicator;
  created: boolean;
  /** True when the write created the record or moved its score or tier. */
  changed: boolean;
}

/**
 * Canonical form of an indicator value.
 * Domains and hashes are case-insensitive identifiers.
 */
export function canonicalValue(value: string, kind: IndicatorKind): string {
  const trimmed = value.trim();
  return kind === 'domain' || kind === 'hash' ? trimmed.toLowerCase() : trimmed;
}

export function indicatorKey(value: string, kind: IndicatorKind): string {
  return `${kind}:${canonicalValue(value, kind)}`;
}

/**
 * Inverse of indicatorKey. Returns null for keys it did not produce.
 */
export function parseIndicatorKey(key: string): { kind: IndicatorKind; value: string } | null {
  const separator = key.indexOf(':');
  if (separator <= 0) return null;

  const kind = IndicatorKindSchema.safeParse(key.slice(0, separator));
  const value = key.slice(separator + 1);
  if (!kind.success || value.length === 0) return null;

  return { kind: kind.data, value };
}
