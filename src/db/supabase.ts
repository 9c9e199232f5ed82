// ============================================
// Supabase client — service-role access to the vector tables
// ============================================

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { config } from "../config/env.js";
import { configError } from "../lib/errors.js";

let client: SupabaseClient | undefined;

/**
 * Shared Supabase client, created on first use.
 * Throws a CONFIG_ERROR when the Supabase credentials are not set.
 */
export function getSupabase(): SupabaseClient {
  if (client) return client;

  const { url, serviceRoleKey } = config.supabase;
  if (!url || !serviceRoleKey) {
    throw configError("SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for the vector index");
  }

  client = createClient(url, serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return client;
}
