/**
 * ThreatLedger — Reputation Sources
 */

export { SourceLookup } from './base';
export type { SourceResult } from './base';
export { VirusTotalSource } from './virustotal';
export { AbuseIpDbSource } from './abuseipdb';

import type { SourceLookup } from './base';
import { VirusTotalSource } from './virustotal';
import { AbuseIpDbSource } from './abuseipdb';

/**
 * Build the source list for the configured API keys.
 * Sources without a key are left out rather than queried for nothing.
 */
export function createSources(keys: { virustotalApiKey?: string; abuseIpDbApiKey?: string }): SourceLookup[] {
  const sources: SourceLookup[] = [];

  if (keys.virustotalApiKey) {
    sources.push(new VirusTotalSource({ apiKey: keys.virustotalApiKey }));
  }
  if (keys.abuseIpDbApiKey) {
    sources.push(new AbuseIpDbSource({ apiKey: keys.abuseIpDbApiKey }));
  }

  return sources;
}
