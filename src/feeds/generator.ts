/**
 * ThreatLedger — Synthetic Threat Generator
 *
 * Demo-mode ObservationProducer. Each cycle it invents 1–4 observations
 * from the threat templates in data/threat-templates.json: public IPs,
 * look-alike domains or sample hashes, each scored as a confidence
 * percentage by the template's detecting source.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { IndicatorKindSchema } from '../types';
import type { Observation } from '../types';
import type { ObservationProducer } from './monitor';

// ============================================================
// TEMPLATE SCHEMA
// ============================================================

const RangeSchema = z
  .tuple([z.number().int(), z.number().int()])
  .refine(([min, max]) => min <= max, 'range minimum must not exceed maximum');

const VariantSchema = z.object({
  kind: IndicatorKindSchema,
  weight: z.number().positive(),
  score: RangeSchema,
  tags: z.array(z.string()),
  description: z.string(),
  detectionMethod: z.string(),
  names: z.array(z.string()).min(1).optional(),
  suffixRange: RangeSchema.optional(),
  tlds: z.array(z.string()).min(1).optional(),
  choices: z.record(z.array(z.string()).min(1)).default({}),
});

const TemplateSchema = z.object({
  type: z.string(),
  source: z.string(),
  variants: z.array(VariantSchema).min(1),
});

export const ThreatTemplatesSchema = z.object({
  /** Chance that a template with an IP variant is forced to produce an IP. */
  ipBias: z.number().min(0).max(1),
  templates: z.array(TemplateSchema).min(1),
});

export type ThreatTemplates = z.infer<typeof ThreatTemplatesSchema>;
type ThreatVariant = z.infer<typeof VariantSchema>;

export function loadThreatTemplates(
  url: URL = new URL('./data/threat-templates.json', import.meta.url)
): ThreatTemplates {
  return ThreatTemplatesSchema.parse(JSON.parse(readFileSync(url, 'utf-8')));
}

// ============================================================
// GENERATOR
// ============================================================

export interface SyntheticThreatGeneratorOptions {
  templates?: ThreatTemplates;
  /** Uniform [0, 1) source, injectable for deterministic tests. */
  random?: () => number;
  minPerCycle?: number;
  maxPerCycle?: number;
}

const HEX = '0123456789abcdef';

/** First-octet bands for generated addresses (class A, B and C space). */
const FIRST_OCTET_BANDS: ReadonlyArray<[number, number]> = [
  [1, 126],
  [128, 191],
  [192, 223],
];

export class SyntheticThreatGenerator implements ObservationProducer {
  private templates: ThreatTemplates;
  private random: () => number;
  private minPerCycle: number;
  private maxPerCycle: number;

  constructor(options: SyntheticThreatGeneratorOptions = {}) {
    this.templates = options.templates ?? loadThreatTemplates();
    this.random = options.random ?? Math.random;
    this.minPerCycle = options.minPerCycle ?? 1;
    this.maxPerCycle = options.maxPerCycle ?? 4;
  }

  async produce(): Promise<Observation[]> {
    const count = this.int(this.minPerCycle, this.maxPerCycle);
    const observations: Observation[] = [];

    for (let i = 0; i < count; i++) {
      observations.push(this.generate());
    }
    return observations;
  }

  /**
   * One observation from a randomly chosen template.
   */
  generate(): Observation {
    const template = this.pick(this.templates.templates);
    const forceIp = this.random() < this.templates.ipBias;
    const ipVariant = template.variants.find(v => v.kind === 'ip');
    const variant = forceIp && ipVariant ? ipVariant : this.pickWeighted(template.variants);

    const details: Record<string, unknown> = {
      detectionMethod: variant.detectionMethod,
      threatType: template.type,
    };
    for (const [key, options] of Object.entries(variant.choices)) {
      details[key] = this.pick(options);
    }

    return {
      value: this.valueFor(variant),
      kind: variant.kind,
      source: template.source,
      rawScore: { type: 'confidence', percent: this.int(variant.score[0], variant.score[1]) },
      tags: [...variant.tags],
      description: variant.description.replace('{source}', template.source),
      details,
    };
  }

  // ============================================================
  // VALUE GENERATION
  // ============================================================

  private valueFor(variant: ThreatVariant): string {
    switch (variant.kind) {
      case 'ip':
        return this.publicIp();
      case 'hash':
        return Array.from({ length: 64 }, () => HEX[this.int(0, 15)]).join('');
      case 'domain':
      case 'url': {
        const [min, max] = variant.suffixRange ?? [1, 999];
        const domain = `${this.pick(variant.names ?? ['threat-host'])}${this.int(min, max)}${this.pick(variant.tlds ?? ['.com'])}`;
        return variant.kind === 'url' ? `http://${domain}/` : domain;
      }
    }
  }

  /**
   * Random address outside private, loopback and link-local space.
   */
  publicIp(): string {
    for (;;) {
      const [low, high] = this.pick(FIRST_OCTET_BANDS);
      const octets = [this.int(low, high), this.int(1, 255), this.int(1, 255), this.int(1, 255)];
      if (!isReservedAddress(octets)) return octets.join('.');
    }
  }

  private int(min: number, max: number): number {
    return min + Math.floor(this.random() * (max - min + 1));
  }

  private pick<T>(items: readonly T[]): T {
    return items[Math.min(items.length - 1, Math.floor(this.random() * items.length))];
  }

  private pickWeighted(variants: readonly ThreatVariant[]): ThreatVariant {
    const total = variants.reduce((sum, v) => sum + v.weight, 0);
    let roll = this.random() * total;

    for (const variant of variants) {
      roll -= variant.weight;
      if (roll < 0) return variant;
    }
    return variants[variants.length - 1];
  }
}

export function isReservedAddress(octets: readonly number[]): boolean {
  const [a, b] = octets;
  return (
    a === 10 ||
    a === 127 ||
    (a === 169 && b === 254) ||
    (a === 172 && b >= 16 && b <= 31) ||
    (a === 192 && b === 168)
  );
}
