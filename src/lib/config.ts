/**
 * ThreatLedger — Configuration
 *
 * Reads configuration from environment variables and validates it.
 * The bootstrap script loads `.env` with dotenv before calling loadConfig().
 */

import { z } from 'zod';
import { ValidationError } from './errors';

// ============================================================
// SCHEMA
// ============================================================

const booleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform(v => v === 'true' || v === '1');

export const ConfigSchema = z
  .object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

    monitor: z
      .object({
        intervalMs: z.coerce.number().int().positive().default(10_000),
        errorBackoffMs: z.coerce.number().int().positive().default(30_000),
        synthetic: booleanFromEnv.default('true'),
      })
      .default({}),

    aggregation: z
      .object({
        freshnessWindowMs: z.coerce.number().int().nonnegative().default(60 * 60 * 1000),
        sourceTimeoutMs: z.coerce.number().int().positive().default(10_000),
      })
      .default({}),

    sources: z
      .object({
        virustotalApiKey: z.string().min(1).optional(),
        abuseIpDbApiKey: z.string().min(1).optional(),
      })
      .default({}),

    storage: z
      .object({
        driver: z.enum(['memory', 'supabase']).default('memory'),
        supabaseUrl: z.string().url().optional(),
        supabaseKey: z.string().min(1).optional(),
        table: z.string().min(1).default('indicators'),
      })
      .default({}),

    server: z
      .object({
        port: z.coerce.number().int().min(0).max(65535).default(3001),
      })
      .default({}),
  })
  .refine(
    cfg => cfg.storage.driver !== 'supabase' || (cfg.storage.supabaseUrl && cfg.storage.supabaseKey),
    {
      message: 'SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for the supabase storage driver',
      path: ['storage'],
    }
  );

export type ThreatLedgerConfig = z.infer<typeof ConfigSchema>;

// ============================================================
// LOADING
// ============================================================

type Env = Record<string, string | undefined>;

/**
 * Drop unset and empty variables so schema defaults apply.
 */
function pick(env: Env, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Load configuration from environment variables.
 * Throws ValidationError listing every invalid setting.
 */
export function loadConfig(env: Env = process.env): ThreatLedgerConfig {
  const raw = {
    logLevel: pick(env, 'LOG_LEVEL'),
    monitor: {
      intervalMs: pick(env, 'THREATLEDGER_MONITOR_INTERVAL_MS'),
      errorBackoffMs: pick(env, 'THREATLEDGER_MONITOR_BACKOFF_MS'),
      synthetic: pick(env, 'THREATLEDGER_SYNTHETIC_FEED'),
    },
    aggregation: {
      freshnessWindowMs: pick(env, 'THREATLEDGER_FRESHNESS_WINDOW_MS'),
      sourceTimeoutMs: pick(env, 'THREATLEDGER_SOURCE_TIMEOUT_MS'),
    },
    sources: {
      virustotalApiKey: pick(env, 'VIRUSTOTAL_API_KEY'),
      abuseIpDbApiKey: pick(env, 'ABUSEIPDB_API_KEY'),
    },
    storage: {
      driver: pick(env, 'THREATLEDGER_STORAGE'),
      supabaseUrl: pick(env, 'SUPABASE_URL'),
      supabaseKey: pick(env, 'SUPABASE_SERVICE_ROLE_KEY'),
      table: pick(env, 'THREATLEDGER_TABLE'),
    },
    server: {
      port: pick(env, 'THREATLEDGER_PORT'),
    },
  };

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    throw ValidationError.fromZod('Invalid configuration', result.error.issues);
  }

  return result.data;
}
