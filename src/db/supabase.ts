import { createClient, type SupabaseClient } from "@supabase/supabase-js";

let client: SupabaseClient | null = null;

/**
 * Supabase client for server/backend only. Uses the service role key so RLS
 * is bypassed and the app has full access. Do not use the anon key here.
 */
export function getSupabase(): SupabaseClient {
  const url = process.env.SUPABASE_URL;
  const serviceRoleKey = process.env.SUPABASE_SERVICE_ROLE_KEY;
  if (!url || !serviceRoleKey) {
    throw new Error(
      "Missing Supabase env: set SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY (required for RLS tables)"
    );
  }
  if (!client) {
    client = createClient(url, serviceRoleKey);
  }
  return client;
}

export type DigestRunRow = {
  id: string;
  fetched: number;
  digest_count: number;
  degraded_count: number;
  classification_failures: number;
  per_label: Record<string, number>;
  diagnostics: unknown[];
  message_ids: string[];
  marked_read: boolean;
  classifier_prompt_version_id: string | null;
  created_at: string;
};

export type DigestRow = {
  id: string;
  run_id: string;
  label: string;
  title: string;
  record_count: number;
  text: string;
  degraded: boolean;
  prompt_version_id: string | null;
  created_at: string;
};

export type PromptVersionRow = {
  id: string;
  name: string;
  version: string;
  content_hash: string;
  content: string | null;
  created_at: string;
};
