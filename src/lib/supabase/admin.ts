import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import ws from 'ws';
import { AppError } from '@/src/lib/errors/app-error';
import { getConciergeConfig, type ConciergeConfig } from '@/src/lib/config/concierge.config';

export type AdminClientOptions = {
  /** Replaces global fetch (tests use an in-process stand-in) */
  fetch?: typeof fetch;
};

/**
 * Supabase admin client (service role) for the long-term memory table.
 * Server-side only: the service role key bypasses row level security.
 */
export function createAdminClient(
  config: ConciergeConfig['supabase'] = getConciergeConfig().supabase,
  options: AdminClientOptions = {},
): SupabaseClient {
  const { url, serviceRoleKey } = config;

  if (!url || !serviceRoleKey) {
    throw new AppError(
      'CONFIG_ERROR',
      'SUPABASE_SERVICE_ROLE_KEY (and SUPABASE_URL) must be set for admin client',
    );
  }

  return createClient(url, serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    // Node 20 has no global WebSocket for the realtime client
    realtime: { transport: ws },
    ...(options.fetch && { global: { fetch: options.fetch } }),
  });
}
