/**
 * ThreatLedger — Monitor & API Bootstrap
 *
 * Wires storage, sources, engine, stats cache, event hub and feed
 * monitor, then serves the HTTP API until SIGINT/SIGTERM.
 *
 * Usage:
 *   npm run monitor
 *
 * With THREATLEDGER_SYNTHETIC_FEED=false the monitor only recomputes
 * statistics; observations arrive through the API lookups.
 */

import 'dotenv/config';
import type { Server } from 'node:http';
import { loadConfig } from '../src/lib/config';
import { configureLogger, logger } from '../src/lib/logger';
import { toErrorMessage } from '../src/lib/errors';
import type { PersistenceBackend } from '../src/db/backend';
import { MemoryIndicatorBackend } from '../src/db/memory-backend';
import { SupabaseIndicatorBackend } from '../src/db/supabase-backend';
import { checkDatabaseHealth, createSupabaseClient } from '../src/db/client';
import { IndicatorStore } from '../src/store/indicator-store';
import { createSources } from '../src/sources';
import { AggregationEngine } from '../src/engine/aggregation';
import {
  FeedMonitor,
  StatsCache,
  SyntheticThreatGenerator,
  type ObservationProducer,
} from '../src/feeds';
import { EventHub } from '../src/server/event-hub';
import { closeServer, createApp } from '../src/server/api';

async function main(): Promise<void> {
  const config = loadConfig();
  configureLogger({ level: config.logLevel });

  // ============================================================
  // STORAGE
  // ============================================================

  let backend: PersistenceBackend;
  let healthCheck: (() => ReturnType<typeof checkDatabaseHealth>) | undefined;

  if (config.storage.driver === 'supabase' && config.storage.supabaseUrl && config.storage.supabaseKey) {
    const client = createSupabaseClient({
      url: config.storage.supabaseUrl,
      serviceRoleKey: config.storage.supabaseKey,
    });
    backend = new SupabaseIndicatorBackend(client, config.storage.table);
    healthCheck = () => checkDatabaseHealth(client, config.storage.table);
  } else {
    backend = new MemoryIndicatorBackend();
  }

  // ============================================================
  // CORE
  // ============================================================

  const store = new IndicatorStore({ backend });
  const sources = createSources(config.sources);
  const engine = new AggregationEngine({
    store,
    sources,
    freshnessWindowMs: config.aggregation.freshnessWindowMs,
    sourceTimeoutMs: config.aggregation.sourceTimeoutMs,
  });

  const statsCache = new StatsCache({ cadenceMs: config.monitor.intervalMs });
  const hub = new EventHub();

  const producer: ObservationProducer = config.monitor.synthetic
    ? new SyntheticThreatGenerator()
    : { produce: async () => [] };

  const monitor = new FeedMonitor({
    engine,
    store,
    producer,
    statsCache,
    publisher: hub,
    intervalMs: config.monitor.intervalMs,
    errorBackoffMs: config.monitor.errorBackoffMs,
  });

  hub.subscribe('new-observation', event => {
    logger.info('New threat observed', {
      value: event.indicator.value,
      kind: event.indicator.kind,
      classification: event.indicator.classification,
      source: event.observation.source,
    });
  });

  // ============================================================
  // SERVE
  // ============================================================

  const app = createApp({ engine, store, statsCache, hub, healthCheck });
  const server: Server = app.listen(config.server.port, () => {
    logger.info(`ThreatLedger API listening on port ${config.server.port}`, {
      storage: config.storage.driver,
      sources: sources.map(s => s.name),
      synthetic: config.monitor.synthetic,
    });
  });

  monitor.start();

  const shutdown = async (signal: string): Promise<void> => {
    logger.info('Shutting down', { signal });
    await monitor.stop();
    await closeServer(server);
    logger.info('Server closed');
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch(error => {
      logger.error('Shutdown failed', { error: toErrorMessage(error) });
      process.exit(1);
    });
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
}

main().catch(error => {
  logger.error('Startup failed', { error: toErrorMessage(error) });
  process.exit(1);
});
