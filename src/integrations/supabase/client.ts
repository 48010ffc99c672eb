import { createClient, type SupabaseClient } from '@supabase/supabase-js';

// One client per project URL and key
const clients = new Map<string, SupabaseClient>();

/**
 * Shared client built from SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY
 * (falling back to SUPABASE_ANON_KEY). Created on first use for each
 * URL and key pair.
 */
export function getSupabaseClient(env: NodeJS.ProcessEnv = process.env): SupabaseClient {
  const supabaseUrl = env.SUPABASE_URL;
  const supabaseKey = env.SUPABASE_SERVICE_ROLE_KEY ?? env.SUPABASE_ANON_KEY;
  if (!supabaseUrl || !supabaseKey) {
    throw new Error('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY (or SUPABASE_ANON_KEY) must be set');
  }

  const cacheKey = `${supabaseUrl}|${supabaseKey}`;
  const cached = clients.get(cacheKey);
  if (cached) return cached;

  const client = createClient(supabaseUrl, supabaseKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  clients.set(cacheKey, client);
  return client;
}
