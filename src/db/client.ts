/**
 * ThreatLedger — Supabase Client
 *
 * Builds the service-role client used by the Supabase backend.
 * The indicator table is expected to carry a unique (value, kind) index
 * and an index on first_seen.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { StorageUnavailableError } from '../lib/errors';

// ============================================================
// CLIENT
// ============================================================

export interface SupabaseSettings {
  url: string;
  serviceRoleKey: string;
}

/**
 * Service client for the background monitor and API.
 * No session persistence: the process is a server, not a browser.
 */
export function createSupabaseClient(settings: SupabaseSettings): SupabaseClient {
  return createClient(settings.url, settings.serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}

// ============================================================
// UTILITY FUNCTIONS
// ============================================================

/**
 * Check if the database connection is healthy
 */
export async function checkDatabaseHealth(
  client: SupabaseClient,
  table: string
): Promise<{
  healthy: boolean;
  latencyMs: number;
  error?: string;
}> {
  const start = Date.now();
  try {
    const { error } = await client.from(table).select('id').limit(1);
    const latencyMs = Date.now() - start;

    if (error) {
      return { healthy: false, latencyMs, error: error.message };
    }

    return { healthy: true, latencyMs };
  } catch (err) {
    const latencyMs = Date.now() - start;
    return {
      healthy: false,
      latencyMs,
      error: err instanceof Error ? err.message : 'Unknown error',
    };
  }
}

/**
 * Handle Supabase errors consistently
 */
export function handleSupabaseError(operation: string, error: unknown): StorageUnavailableError {
  if (error && typeof error === 'object' && 'message' in error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    const message = String(error.message);
    return new StorageUnavailableError(
      operation,
      new Error(`Supabase error: ${message}${code ? ` (code: ${code})` : ''}`)
    );
  }
  return new StorageUnavailableError(operation, new Error('Unknown Supabase error'));
}

/** PostgREST code for "no rows" on .single(). */
export const NOT_FOUND_CODE = 'PGRST116';
