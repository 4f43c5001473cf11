/**
 * ThreatLedger — VirusTotal Source
 *
 * Reputation lookups against the VirusTotal v2 public API.
 * File reports carry a detection ratio (positives out of engines);
 * IP and domain reports are scored from their detected URL count.
 */

import { z } from 'zod';
import { SourceLookup, type SourceResult } from './base';
import type { IndicatorKind } from '../types';

const VT_BASE_URL = 'https://www.virustotal.com/vtapi/v2';

/** Points per detected URL in an IP or domain report. */
const IP_URL_WEIGHT = 10;
const DOMAIN_URL_WEIGHT = 5;

const DetectedUrlsSchema = z.array(z.unknown()).default([]);

const IpReportSchema = z.object({
  response_code: z.number(),
  detected_urls: DetectedUrlsSchema,
  country: z.string().optional(),
  as_owner: z.string().optional(),
});

const DomainReportSchema = z.object({
  response_code: z.number(),
  detected_urls: DetectedUrlsSchema,
  categories: z.array(z.string()).optional(),
});

const FileReportSchema = z.object({
  response_code: z.number(),
  positives: z.number().int().min(0).optional(),
  total: z.number().int().min(0).optional(),
  scan_date: z.string().optional(),
});

/**
 * VirusTotal reputation source.
 * Without an API key every lookup returns no data.
 */
export class VirusTotalSource extends SourceLookup {
  readonly name = 'virustotal';
  readonly supportedKinds: readonly IndicatorKind[] = ['ip', 'domain', 'hash'];

  private readonly apiKey?: string;
  private readonly baseUrl: string;

  constructor(options: { apiKey?: string; baseUrl?: string } = {}) {
    super();
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? VT_BASE_URL;
  }

  async lookup(value: string, kind: IndicatorKind, signal?: AbortSignal): Promise<SourceResult | null> {
    if (!this.apiKey) return null;

    switch (kind) {
      case 'ip':
        return this.lookupIp(this.apiKey, value, signal);
      case 'domain':
        return this.lookupDomain(this.apiKey, value, signal);
      case 'hash':
        return this.lookupFile(this.apiKey, value, signal);
      default:
        return null;
    }
  }

  private async lookupIp(apiKey: string, ip: string, signal?: AbortSignal): Promise<SourceResult | null> {
    const report = IpReportSchema.parse(
      await this.get('ip-address/report', { apikey: apiKey, ip }, signal)
    );
    if (report.response_code !== 1) return null;

    return {
      source: this.name,
      rawScore: report.detected_urls.length * IP_URL_WEIGHT,
      details: {
        detectedUrls: report.detected_urls.length,
        country: report.country ?? 'Unknown',
        asOwner: report.as_owner ?? 'Unknown',
      },
    };
  }

  private async lookupDomain(apiKey: string, domain: string, signal?: AbortSignal): Promise<SourceResult | null> {
    const report = DomainReportSchema.parse(
      await this.get('domain/report', { apikey: apiKey, domain }, signal)
    );
    if (report.response_code !== 1) return null;

    return {
      source: this.name,
      rawScore: report.detected_urls.length * DOMAIN_URL_WEIGHT,
      details: {
        detectedUrls: report.detected_urls.length,
        categories: report.categories ?? [],
      },
    };
  }

  private async lookupFile(apiKey: string, hash: string, signal?: AbortSignal): Promise<SourceResult | null> {
    const report = FileReportSchema.parse(
      await this.get('file/report', { apikey: apiKey, resource: hash }, signal)
    );
    if (report.response_code !== 1 || report.total === undefined) return null;

    const positives = report.positives ?? 0;

    return {
      source: this.name,
      rawScore: { type: 'detection_ratio', positives, total: report.total },
      details: {
        positives,
        total: report.total,
        scanDate: report.scan_date,
      },
    };
  }

  private async get(path: string, query: Record<string, string>, signal?: AbortSignal): Promise<unknown> {
    const params = new URLSearchParams(query);
    const res = await fetch(`${this.baseUrl}/${path}?${params}`, { signal });

    if (!res.ok) {
      throw new Error(`VirusTotal API error: ${res.status}`);
    }

    return res.json();
  }
}
