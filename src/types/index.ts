/**
 * ThreatLedger — Type Exports
 *
 * Re-exports all types from the types module.
 */

// Indicators & observations
export {
  IndicatorKindSchema,
  ClassificationSchema,
  CLASSIFICATIONS,
  RawScoreSchema,
  ObservationSchema,
  canonicalValue,
  indicatorKey,
  parseIndicatorKey,
} from './indicator';
export type {
  IndicatorKind,
  Classification,
  RawScore,
  ScoreModel,
  Observation,
  SourceObservation,
  Indicator,
  IndicatorUpdate,
  UpsertResult,
} from './indicator';

// Rolling statistics
export { ThreatLevelSchema } from './stats';
export type {
  ThreatLevel,
  RollingStats,
  CachedStats,
  TrendPoint,
} from './stats';

// Notification events
export type {
  NewObservationEvent,
  ThreatEventMap,
  ThreatEventName,
  Publisher,
} from './events';
