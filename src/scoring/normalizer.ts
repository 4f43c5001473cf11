/**
 * ThreatLedger — Score Normalizer
 *
 * Maps each source's native score representation onto one 0–100
 * integer scale and a classification tier. All score math lives here.
 */

import type { Classification, RawScore, ScoreModel } from '../types';

export interface NormalizedScore {
  score: number;
  classification: Classification;
  /** How the score was derived; recorded with each source observation. */
  model: ScoreModel;
}

// ============================================================
// CLASSIFICATION
// ============================================================

/** Lower bounds, highest tier first. Boundary values belong to the upper tier. */
const TIER_THRESHOLDS: ReadonlyArray<[number, Classification]> = [
  [80, 'critical'],
  [60, 'high'],
  [30, 'medium'],
];

export function classify(score: number): Classification {
  for (const [threshold, tier] of TIER_THRESHOLDS) {
    if (score >= threshold) return tier;
  }
  return score > 0 ? 'low' : 'clean';
}

// ============================================================
// NORMALIZATION
// ============================================================

function clamp(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(100, Math.round(value)));
}

function fromDetectionRatio(positives: number, total: number): number {
  if (total <= 0) return 0;
  return Math.min(100, Math.round((positives / total) * 100));
}

/**
 * Normalize a raw score reported by `_source`. The shape of the raw
 * score, not the reporter, decides the model: a bare number is clamped
 * whoever sent it.
 */
export function normalize(_source: string, rawScore: RawScore): NormalizedScore {
  let score: number;
  let model: ScoreModel;

  if (typeof rawScore === 'number') {
    score = clamp(rawScore);
    model = 'clamped';
  } else if (rawScore.type === 'detection_ratio') {
    score = clamp(fromDetectionRatio(rawScore.positives, rawScore.total));
    model = 'detection_ratio';
  } else {
    score = clamp(rawScore.percent);
    model = 'confidence';
  }

  return { score, classification: classify(score), model };
}
