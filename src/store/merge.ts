/**
 * ThreatLedger — Indicator Merge
 *
 * Pure merge of new evidence into a canonical record. The store runs it
 * inside the backend's read-merge-write; it never touches I/O.
 */

import { nanoid } from 'nanoid';
import { classify } from '../scoring/normalizer';
import { canonicalValue } from '../types';
import type { Indicator, IndicatorUpdate } from '../types';

function union(current: readonly string[], incoming: readonly string[] = []): string[] {
  const merged = [...current];
  for (const item of incoming) {
    if (!merged.includes(item)) merged.push(item);
  }
  return merged;
}

function laterOf(a: string, b: string): string {
  return Date.parse(a) >= Date.parse(b) ? a : b;
}

/**
 * Merge `update` into `existing` (or create a record from it).
 *
 * - threatScore only moves up (max of stored and incoming)
 * - classification is always recomputed from threatScore
 * - sources and tags are unions; observations are appended
 * - firstSeen is fixed at creation; lastSeen never precedes it
 * - description is replaced only by a non-empty one
 */
export function mergeIndicator(
  existing: Indicator | null,
  update: IndicatorUpdate,
  now: string
): Indicator {
  const description = update.description?.trim() ?? '';

  if (!existing) {
    const threatScore = update.score;
    return {
      id: nanoid(),
      value: canonicalValue(update.value, update.kind),
      kind: update.kind,
      threatScore,
      classification: classify(threatScore),
      sources: union([], update.sources),
      sourceObservations: [...update.observations],
      tags: union([], update.tags),
      firstSeen: now,
      lastSeen: now,
      description,
    };
  }

  const threatScore = Math.max(existing.threatScore, update.score);

  return {
    ...existing,
    threatScore,
    classification: classify(threatScore),
    sources: union(existing.sources, update.sources),
    sourceObservations: [...existing.sourceObservations, ...update.observations],
    tags: union(existing.tags, update.tags),
    lastSeen: laterOf(now, existing.firstSeen),
    description: description || existing.description,
  };
}

/**
 * Union tags into a record. Scores, sources and timestamps are untouched.
 */
export function mergeTags(existing: Indicator, tags: readonly string[]): Indicator {
  return { ...existing, tags: union(existing.tags, tags) };
}
