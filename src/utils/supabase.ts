/**
 * Supabase Client
 *
 * One shared SupabaseClient for the process, built from the relay config.
 * Returns null when SUPABASE_URL or SUPABASE_ANON_KEY are not configured so
 * callers can skip the message log.
 */

import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import type { RelayConfig } from "../config/relayConfig.ts";

export function createSupabaseClient(config: Pick<RelayConfig, "supabase">): SupabaseClient | null {
  if (!config.supabase) {
    console.warn("Supabase credentials not configured — message log disabled");
    return null;
  }
  return createClient(config.supabase.url, config.supabase.anonKey);
}
