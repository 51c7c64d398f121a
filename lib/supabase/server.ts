import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { loadSupabaseSettings, resolveSupabaseUrl, serverClientOptions } from "./config";

/**
 * Service-role Supabase client for trusted server-side code (scripts,
 * workers). Bypasses RLS.
 *
 * @see lib/supabase/config.ts for the environment variables it reads
 */
export function getServiceSupabase(
  env: NodeJS.ProcessEnv = process.env,
  baseFetch?: typeof fetch
): SupabaseClient {
  const settings = loadSupabaseSettings(env);
  return createClient(
    resolveSupabaseUrl(settings),
    settings.serviceRoleKey,
    serverClientOptions(settings, baseFetch)
  );
}
