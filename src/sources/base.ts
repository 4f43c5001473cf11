/**
 * ThreatLedger — Source Lookup Base
 *
 * Abstract base class for reputation sources.
 * Each source implements lookup(); callers go through safeLookup(),
 * which bounds the call with a timeout and never throws.
 */

import type { IndicatorKind, RawScore } from '../types';
import { SourceTimeoutError, toErrorMessage } from '../lib/errors';
import { logger } from '../lib/logger';

/**
 * One source's answer about one indicator, before normalization.
 */
export interface SourceResult {
  source: string;
  rawScore: RawScore;
  details: Record<string, unknown>;
}

/**
 * Abstract base class for reputation sources.
 */
export abstract class SourceLookup {
  abstract readonly name: string;
  abstract readonly supportedKinds: readonly IndicatorKind[];

  protected logger = logger.child({ source: this.constructor.name });

  supports(kind: IndicatorKind): boolean {
    return this.supportedKinds.includes(kind);
  }

  /**
   * Query the source. Returns null when the source has nothing to say
   * about the indicator. May throw on transport or provider errors.
   */
  abstract lookup(value: string, kind: IndicatorKind, signal?: AbortSignal): Promise<SourceResult | null>;

  /**
   * Execute lookup with a timeout, error handling and logging.
   * Any failure is reported as "no data".
   */
  async safeLookup(value: string, kind: IndicatorKind, timeoutMs: number): Promise<SourceResult | null> {
    const startTime = Date.now();
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new SourceTimeoutError(this.name, timeoutMs));
      }, timeoutMs);
    });

    try {
      const result = await Promise.race([this.lookup(value, kind, controller.signal), timeout]);

      this.logger.debug('Lookup completed', {
        kind,
        answered: result !== null,
        durationMs: Date.now() - startTime,
      });

      return result;
    } catch (error) {
      this.logger.warn('Lookup failed', {
        kind,
        value,
        error: toErrorMessage(error),
        durationMs: Date.now() - startTime,
      });
      return null;
    } finally {
      clearTimeout(timer);
    }
  }
}
