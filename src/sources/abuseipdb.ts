/**
 * ThreatLedger — AbuseIPDB Source
 *
 * IP reputation from AbuseIPDB's check endpoint.
 * The abuse confidence percentage is reported as-is.
 */

import { z } from 'zod';
import { SourceLookup, type SourceResult } from './base';
import type { IndicatorKind } from '../types';

const ABUSEIPDB_BASE_URL = 'https://api.abuseipdb.com/api/v2';
const MAX_AGE_DAYS = 90;

const CheckResponseSchema = z.object({
  data: z.object({
    abuseConfidencePercentage: z.number().default(0),
    countryCode: z.string().nullable().optional(),
    usageType: z.string().nullable().optional(),
    isp: z.string().nullable().optional(),
    totalReports: z.number().default(0),
  }),
});

export class AbuseIpDbSource extends SourceLookup {
  readonly name = 'abuseipdb';
  readonly supportedKinds: readonly IndicatorKind[] = ['ip'];

  private readonly apiKey?: string;
  private readonly baseUrl: string;

  constructor(options: { apiKey?: string; baseUrl?: string } = {}) {
    super();
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? ABUSEIPDB_BASE_URL;
  }

  async lookup(value: string, kind: IndicatorKind, signal?: AbortSignal): Promise<SourceResult | null> {
    if (!this.apiKey || kind !== 'ip') return null;

    const params = new URLSearchParams({
      ipAddress: value,
      maxAgeInDays: String(MAX_AGE_DAYS),
      verbose: '',
    });

    const res = await fetch(`${this.baseUrl}/check?${params}`, {
      headers: {
        Key: this.apiKey,
        Accept: 'application/json',
      },
      signal,
    });

    if (!res.ok) {
      throw new Error(`AbuseIPDB API error: ${res.status}`);
    }

    const { data } = CheckResponseSchema.parse(await res.json());

    return {
      source: this.name,
      rawScore: { type: 'confidence', percent: data.abuseConfidencePercentage },
      details: {
        abuseConfidence: data.abuseConfidencePercentage,
        countryCode: data.countryCode ?? 'Unknown',
        usageType: data.usageType ?? 'Unknown',
        isp: data.isp ?? 'Unknown',
        totalReports: data.totalReports,
      },
    };
  }
}
