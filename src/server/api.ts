/**
 * ThreatLedger — HTTP API
 *
 * Thin Express transport over the engine, store and stats cache.
 *
 * Endpoints:
 * - GET  /health                         — Health check for monitoring
 * - POST /api/lookup                     — Cached lookup / source fan-out
 * - GET  /api/iocs                       — Paginated indicator search
 * - POST /api/iocs/tags                  — Add tags to an indicator
 * - GET  /api/realtime/stats             — Latest rolling stats snapshot
 * - GET  /api/visuals/dashboard          — Dashboard summary
 * - GET  /api/visuals/trends             — Daily counts per tier
 * - GET  /api/threat-ips                 — Top IP threats
 * - GET  /api/threat-ips/:ip/timeline    — Source observations for one IP
 * - GET  /api/stream                     — Server-sent events
 */

import type { Server } from 'node:http';
import express, { Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { logger } from '../lib/logger';
import { StorageUnavailableError, ValidationError, toErrorMessage } from '../lib/errors';
import { IndicatorKindSchema } from '../types';
import type { Classification, ThreatEventName, TrendPoint } from '../types';
import type { AggregationEngine } from '../engine/aggregation';
import type { IndicatorStore } from '../store/indicator-store';
import type { StatsCache } from '../feeds/stats-cache';
import type { EventHub } from './event-hub';

const log = logger.child({ component: 'api' });

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================================
// REQUEST SCHEMAS
// ============================================================

const LookupBodySchema = z.object({
  value: z.string().trim().min(1),
  kind: IndicatorKindSchema,
});

const IocQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(200).default(50),
  search: z.string().optional(),
  tag: z.string().optional(),
  kind: IndicatorKindSchema.optional(),
  sort: z.enum(['recent', 'score']).default('recent'),
});

const TagBodySchema = z.object({
  value: z.string().trim().min(1),
  kind: IndicatorKindSchema,
  tags: z.array(z.string().trim().min(1)).min(1),
});

const TrendQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(90).default(7),
});

const LimitQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

function parse<S extends z.ZodTypeAny>(schema: S, input: unknown, what: string): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw ValidationError.fromZod(`Invalid ${what}`, result.error.issues);
  }
  return result.data;
}

// ============================================================
// PRESENTATION HELPERS
// ============================================================

export interface TrendChart {
  dates: string[];
  datasets: Record<Classification, number[]>;
}

/**
 * Shape trend points into one series per tier over `days + 1` dates,
 * oldest first, zero-filled.
 */
export function toTrendChart(points: TrendPoint[], days: number, now: number): TrendChart {
  const dates: string[] = [];
  for (let i = days; i >= 0; i--) {
    dates.push(new Date(now - i * DAY_MS).toISOString().slice(0, 10));
  }

  const zeros = (): number[] => dates.map(() => 0);
  const datasets: Record<Classification, number[]> = {
    clean: zeros(),
    low: zeros(),
    medium: zeros(),
    high: zeros(),
    critical: zeros(),
  };

  for (const point of points) {
    const index = dates.indexOf(point.date);
    if (index >= 0) datasets[point.classification][index] = point.count;
  }

  return { dates, datasets };
}

export function formatSseMessage(event: string, data: unknown): string {
  return `event: ${event}\ndata: ${JSON.stringify(data)}\n\n`;
}

export interface SseSink {
  readonly writableNeedDrain: boolean;
  write(chunk: string): boolean;
}

/**
 * Write one event unless the client has not drained the previous ones.
 * Returns false when the event was dropped.
 */
export function writeSseEvent(sink: SseSink, event: string, data: unknown): boolean {
  if (sink.writableNeedDrain) return false;
  sink.write(formatSseMessage(event, data));
  return true;
}

/**
 * Stop accepting connections and drop the open ones. Event-stream
 * clients hold their connection until they leave, so close() alone
 * would never finish.
 */
export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
    server.closeAllConnections();
  });
}

// ============================================================
// EXPRESS APP
// ============================================================

export interface ApiDependencies {
  engine: AggregationEngine;
  store: IndicatorStore;
  statsCache: StatsCache;
  hub: EventHub;
  /** Storage probe reported by /health. */
  healthCheck?: () => Promise<{ healthy: boolean; latencyMs: number; error?: string }>;
  clock?: () => number;
}

const STREAM_EVENTS: ThreatEventName[] = ['new-observation', 'stats-update'];

export function createApp(deps: ApiDependencies): express.Express {
  const { engine, store, statsCache, hub } = deps;
  const clock = deps.clock ?? Date.now;

  const app = express();
  app.use(express.json());

  // ============================================================
  // HEALTH ENDPOINT
  // ============================================================

  app.get('/health', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const storage = deps.healthCheck ? await deps.healthCheck() : undefined;
      res.status(storage && !storage.healthy ? 503 : 200).json({
        status: storage && !storage.healthy ? 'degraded' : 'healthy',
        timestamp: new Date(clock()).toISOString(),
        service: 'threatledger',
        version: '1.0.0',
        storage,
      });
    } catch (error) {
      next(error);
    }
  });

  // ============================================================
  // INDICATORS
  // ============================================================

  app.post('/api/lookup', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { value, kind } = parse(LookupBodySchema, req.body, 'lookup request');
      const indicator = await engine.lookupOrFetch(value, kind);

      if (!indicator) {
        res.status(404).json({ error: 'No threat intelligence found', value, kind });
        return;
      }
      res.json(indicator);
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/iocs', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parse(IocQuerySchema, req.query, 'query');
      const page = await store.queryPage(
        { search: query.search, tag: query.tag, kind: query.kind },
        { sortByRecency: query.sort === 'recent', page: query.page, pageSize: query.limit }
      );
      res.json(page);
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/iocs/tags', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { value, kind, tags } = parse(TagBodySchema, req.body, 'tag request');
      const indicator = await store.addTags(value, kind, tags);

      if (!indicator) {
        res.status(404).json({ error: 'Indicator not found', value, kind });
        return;
      }
      res.json(indicator);
    } catch (error) {
      next(error);
    }
  });

  // ============================================================
  // STATS & VISUALS
  // ============================================================

  app.get('/api/realtime/stats', (_req: Request, res: Response) => {
    const cached = statsCache.get();
    res.json({
      stats: cached.snapshot,
      computedAt: cached.computedAt > 0 ? new Date(cached.computedAt).toISOString() : null,
      isStale: cached.isStale,
    });
  });

  app.get('/api/visuals/dashboard', async (_req: Request, res: Response, next: NextFunction) => {
    const cached = statsCache.get();

    try {
      const [breakdown, kinds, recent24h, total, topIps] = await Promise.all([
        store.classificationBreakdown(),
        store.kindBreakdown(),
        store.statsSince(new Date(clock() - DAY_MS)),
        store.totalCount(),
        store.topThreats(5, 'ip'),
      ]);

      res.json({
        threatLevel: cached.snapshot.threatLevel,
        totalIndicators: total,
        recent24h,
        classificationBreakdown: breakdown,
        kindBreakdown: kinds,
        topMaliciousIps: topIps.map(i => i.value),
        isStale: cached.isStale,
        degraded: false,
        lastUpdated: new Date(clock()).toISOString(),
      });
    } catch (error) {
      if (!(error instanceof StorageUnavailableError)) {
        next(error);
        return;
      }

      log.warn('Dashboard read failed, serving cached stats', { error: error.message });
      res.json({
        threatLevel: cached.snapshot.threatLevel,
        totalIndicators: cached.snapshot.totalIndicators,
        recent24h: cached.snapshot.threatsLast24h,
        classificationBreakdown: cached.snapshot.byClassification,
        kindBreakdown: null,
        topMaliciousIps: [],
        isStale: cached.isStale,
        degraded: true,
        lastUpdated: new Date(clock()).toISOString(),
      });
    }
  });

  app.get('/api/visuals/trends', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { days } = parse(TrendQuerySchema, req.query, 'query');
      const points = await store.trends(days);
      res.json(toTrendChart(points, days, clock()));
    } catch (error) {
      next(error);
    }
  });

  // ============================================================
  // THREAT IPS
  // ============================================================

  app.get('/api/threat-ips', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { limit } = parse(LimitQuerySchema, req.query, 'query');
      const threats = await store.topThreats(limit, 'ip');

      res.json({
        threats: threats.map(i => ({
          ip: i.value,
          threatScore: i.threatScore,
          classification: i.classification,
          sources: i.sources,
          tags: i.tags,
          firstSeen: i.firstSeen,
          lastSeen: i.lastSeen,
        })),
        total: threats.length,
      });
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/threat-ips/:ip/timeline', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const ip = req.params.ip;
      const timeline = await store.timeline(ip, 'ip');

      if (!timeline) {
        res.status(404).json({ error: 'Indicator not found', value: ip, kind: 'ip' });
        return;
      }
      res.json({ ip, timeline });
    } catch (error) {
      next(error);
    }
  });

  // ============================================================
  // SERVER-SENT EVENTS
  // ============================================================

  app.get('/api/stream', (req: Request, res: Response) => {
    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });
    res.write(formatSseMessage('stats-update', statsCache.get().snapshot));

    const unsubscribers = STREAM_EVENTS.map(event =>
      hub.subscribe(event, payload => {
        if (!writeSseEvent(res, event, payload)) {
          log.debug('Stream client behind, event dropped', { event });
        }
      })
    );

    req.on('close', () => {
      for (const unsubscribe of unsubscribers) unsubscribe();
      log.debug('Stream client disconnected');
    });
  });

  // ============================================================
  // ERROR HANDLER
  // ============================================================

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ValidationError) {
      res.status(400).json({ error: err.message, code: err.code, issues: err.issues });
      return;
    }
    if (err instanceof StorageUnavailableError) {
      log.error('Storage unavailable', { error: err.message });
      res.status(503).json({ error: 'Storage unavailable', code: err.code });
      return;
    }
    if (err instanceof SyntaxError) {
      // express.json() rejects malformed bodies with a SyntaxError
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }

    log.error('Unhandled error in API', { error: toErrorMessage(err) });
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
