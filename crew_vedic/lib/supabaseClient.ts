import { createClient, type SupabaseClient } from "@supabase/supabase-js";

function supabaseKey(env: NodeJS.ProcessEnv): string | undefined {
  return env.SUPABASE_SERVICE_ROLE_KEY ?? env.SUPABASE_ANON_KEY ?? env.SUPABASE_KEY;
}

export function hasSupabaseEnv(env: NodeJS.ProcessEnv = process.env): boolean {
  return Boolean(env.SUPABASE_URL && supabaseKey(env));
}

let client: SupabaseClient | null = null;

// Created on first use so that commands which never persist run without env.
export function getSupabase(): SupabaseClient {
  if (client) return client;

  const url = process.env.SUPABASE_URL;
  const key = supabaseKey(process.env);
  if (!url || !key) {
    throw new Error(
      "Missing Supabase env vars: SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY (or SUPABASE_ANON_KEY / SUPABASE_KEY)"
    );
  }

  client = createClient(url, key, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  });
  return client;
}
