/**
 * ThreatLedger — Notification Events
 *
 * Payloads pushed to subscribers by the feed monitor.
 */

import type { Indicator, Observation } from './indicator';
import type { RollingStats } from './stats';

export interface NewObservationEvent {
  observation: Observation;
  indicator: Indicator;
  changed: boolean;
  timestamp: string; // ISO 8601
}

export interface ThreatEventMap {
  'new-observation': NewObservationEvent;
  'stats-update': RollingStats;
}

export type ThreatEventName = keyof ThreatEventMap;

/**
 * Fire-and-forget notification sink. publish() never waits on
 * subscribers and never reports their failures back.
 */
export interface Publisher {
  publish<E extends ThreatEventName>(event: E, payload: ThreatEventMap[E]): void;
}
