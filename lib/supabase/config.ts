/**
 * Supabase Connection Settings
 *
 * Environment variables:
 * - SUPABASE_URL: Project URL (required)
 * - SUPABASE_SERVICE_ROLE_KEY: Service role key (required)
 * - SUPABASE_USE_POOLER / SUPABASE_POOLER_URL: Route through a pooled endpoint
 * - SUPABASE_REQUEST_TIMEOUT: Per-request timeout in ms (default: 30000)
 * - SUPABASE_KEEP_ALIVE: HTTP keepalive (default: true)
 * - SUPABASE_SCHEMA: Database schema (default: public)
 */

import type { SupabaseClientOptions } from "@supabase/supabase-js";
import { z } from "zod";
import { PipelineError } from "../errors";

const connectionSettingsSchema = z.object({
  url: z.string({ required_error: "Missing SUPABASE_URL environment variable" }).url(),
  serviceRoleKey: z
    .string({ required_error: "Missing SUPABASE_SERVICE_ROLE_KEY environment variable" })
    .min(1, "Missing SUPABASE_SERVICE_ROLE_KEY environment variable"),
  poolerUrl: z.string().url().optional(),
  requestTimeoutMs: z.number().int().positive().default(30_000),
  keepAlive: z.boolean().default(true),
  schema: z.string().min(1).default("public"),
});

export type SupabaseConnectionSettings = z.output<typeof connectionSettingsSchema>;

/**
 * Read connection settings from the environment.
 * Throws CONFIGURATION_ERROR naming the first missing or invalid variable.
 */
export function loadSupabaseSettings(
  env: NodeJS.ProcessEnv = process.env
): SupabaseConnectionSettings {
  // The pooled endpoint is only used when explicitly switched on
  const poolerUrl = env.SUPABASE_USE_POOLER === "true" ? env.SUPABASE_POOLER_URL : undefined;

  const parsed = connectionSettingsSchema.safeParse({
    url: env.SUPABASE_URL || undefined,
    serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY,
    ...(poolerUrl ? { poolerUrl } : {}),
    requestTimeoutMs: env.SUPABASE_REQUEST_TIMEOUT ? Number(env.SUPABASE_REQUEST_TIMEOUT) : undefined,
    keepAlive: env.SUPABASE_KEEP_ALIVE ? env.SUPABASE_KEEP_ALIVE !== "false" : undefined,
    schema: env.SUPABASE_SCHEMA || undefined,
  });

  if (!parsed.success) {
    throw new PipelineError("CONFIGURATION_ERROR", parsed.error.issues[0].message, {
      details: parsed.error.issues.map((issue) => issue.path.join(".")),
    });
  }
  return parsed.data;
}

/**
 * Endpoint the client talks to: the pooler when configured, else the project URL
 */
export function resolveSupabaseUrl(settings: SupabaseConnectionSettings): string {
  return settings.poolerUrl ?? settings.url;
}

/**
 * Wrap fetch with keepalive and a per-request timeout.
 * A caller's own abort signal still cancels the request.
 */
export function createTimeoutFetch(
  settings: Pick<SupabaseConnectionSettings, "requestTimeoutMs" | "keepAlive">,
  baseFetch: typeof fetch = fetch
): typeof fetch {
  return (input: Parameters<typeof fetch>[0], init?: RequestInit) => {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), settings.requestTimeoutMs);

    const callerSignal = init?.signal;
    if (callerSignal?.aborted) {
      controller.abort();
    } else {
      callerSignal?.addEventListener("abort", () => controller.abort(), { once: true });
    }

    return baseFetch(input, {
      ...init,
      signal: controller.signal,
      keepalive: settings.keepAlive,
    }).finally(() => clearTimeout(timeoutId));
  };
}

/**
 * Client options for scripts and workers: no session persistence,
 * timeout-wrapped fetch, configured schema.
 */
export function serverClientOptions(
  settings: SupabaseConnectionSettings,
  baseFetch?: typeof fetch
): SupabaseClientOptions<"public"> {
  return {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
    global: {
      fetch: createTimeoutFetch(settings, baseFetch),
      headers: {
        "X-Client-Info": `doc-qa-pipeline/${process.env.npm_package_version || "0.1.0"}`,
      },
    },
    db: {
      schema: settings.schema as "public",
    },
  };
}
