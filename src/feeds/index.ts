/**
 * ThreatLedger — Feeds Module
 *
 * Background ingestion: observation producers, the feed monitor loop,
 * and the rolling statistics it maintains.
 */

export {
  FeedMonitor,
  DEFAULT_INTERVAL_MS,
  DEFAULT_ERROR_BACKOFF_MS,
  type ObservationProducer,
  type MonitorState,
  type CycleResult,
  type FeedMonitorOptions,
} from './monitor';

export {
  SyntheticThreatGenerator,
  loadThreatTemplates,
  isReservedAddress,
  type ThreatTemplates,
} from './generator';

export { StatsCache } from './stats-cache';

export { computeRollingStats, deriveThreatLevel, emptyRollingStats } from './stats';
