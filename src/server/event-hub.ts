/**
 * ThreatLedger — Event Hub
 *
 * In-process Publisher. Subscribers (SSE connections, tests, the
 * bootstrap logger) register listeners; each delivery runs on its own
 * microtask so publish() returns immediately and a failing listener
 * only affects itself.
 */

import { EventEmitter } from 'node:events';
import { logger } from '../lib/logger';
import { toErrorMessage } from '../lib/errors';
import type { Publisher, ThreatEventMap, ThreatEventName } from '../types';

const log = logger.child({ component: 'event-hub' });

export type ThreatListener<E extends ThreatEventName> = (
  payload: ThreatEventMap[E]
) => void | Promise<void>;

export class EventHub implements Publisher {
  private emitter = new EventEmitter();

  constructor() {
    // One listener per open stream; no fixed ceiling.
    this.emitter.setMaxListeners(0);
  }

  publish<E extends ThreatEventName>(event: E, payload: ThreatEventMap[E]): void {
    this.emitter.emit(event, payload);
  }

  /**
   * Register a listener. Returns a function that removes it.
   */
  subscribe<E extends ThreatEventName>(event: E, listener: ThreatListener<E>): () => void {
    const deliver = (payload: ThreatEventMap[E]): void => {
      void Promise.resolve()
        .then(() => listener(payload))
        .catch((error: unknown) => {
          log.warn('Subscriber failed', { event, error: toErrorMessage(error) });
        });
    };

    this.emitter.on(event, deliver);
    return () => {
      this.emitter.off(event, deliver);
    };
  }

  listenerCount(event: ThreatEventName): number {
    return this.emitter.listenerCount(event);
  }
}
