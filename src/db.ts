/**
 * Supabase client factory for the hosted ontology store.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { ValidationError } from './errors.js';

let client: SupabaseClient | null = null;

export function getSupabaseClient(
  env: Record<string, string | undefined> = process.env
): SupabaseClient {
  if (client) return client;

  const url = env.SUPABASE_URL;
  const key = env.SUPABASE_SERVICE_ROLE_KEY;
  if (!url || !key) {
    throw new ValidationError('Missing SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY');
  }

  client = createClient(url, key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return client;
}
