import { createHash } from "node:crypto";
import { getSupabase } from "./supabase.js";
import {
  DIGEST_PROMPTS,
  PROMPT_NAMES,
  type PromptName,
  type PromptTemplates,
} from "../config/loader.js";
import { findTopic } from "../config/taxonomy.js";
import type { DigestRunResult, TaxonomyConfig } from "../types/pipeline.js";

export function contentHash(content: string): string {
  return createHash("sha256").update(content, "utf8").digest("hex");
}

/**
 * Ensure a prompt version row exists; return its id.
 * Uses name + content_hash as unique key.
 */
export async function ensurePromptVersion(
  name: string,
  content: string
): Promise<string> {
  const hash = contentHash(content);
  const version = hash.slice(0, 16);
  const supabase = getSupabase();

  const { data: existing } = await supabase
    .from("prompt_versions")
    .select("id")
    .eq("name", name)
    .eq("content_hash", hash)
    .limit(1)
    .maybeSingle();

  if (existing?.id) return existing.id;

  const { data: inserted, error } = await supabase
    .from("prompt_versions")
    .insert({
      name,
      version,
      content_hash: hash,
      content,
    })
    .select("id")
    .single();

  if (error) throw new Error(`Failed to insert prompt_version: ${error.message}`);
  if (!inserted?.id) throw new Error("No id returned from prompt_versions insert");
  return inserted.id;
}

/** Prompt version id for every template used by this run. */
export async function resolvePromptVersionIds(
  prompts: PromptTemplates
): Promise<Map<PromptName, string>> {
  const ids = await Promise.all(
    PROMPT_NAMES.map((name) => ensurePromptVersion(name, prompts[name]))
  );
  return new Map(PROMPT_NAMES.map((name, i) => [name, ids[i]]));
}

export type RecordDigestRunParams = {
  result: DigestRunResult;
  taxonomy: TaxonomyConfig;
  prompts: PromptTemplates;
  /** Ids of every message included in the run. */
  messageIds: string[];
  markedRead: boolean;
};

/**
 * Insert a digest_runs row and one digests row per topic, linking each to the prompt
 * version that produced it. Returns the run id.
 */
export async function recordDigestRun(params: RecordDigestRunParams): Promise<string> {
  const { result, taxonomy, prompts } = params;
  const promptIds = await resolvePromptVersionIds(prompts);
  const supabase = getSupabase();

  const { data: run, error: runError } = await supabase
    .from("digest_runs")
    .insert({
      fetched: result.stats.fetched,
      digest_count: result.stats.digests,
      degraded_count: result.stats.degradedDigests,
      classification_failures: result.stats.classificationFailures,
      per_label: result.stats.perLabel,
      diagnostics: result.diagnostics,
      message_ids: params.messageIds,
      marked_read: params.markedRead,
      classifier_prompt_version_id: promptIds.get("classifier.md") ?? null,
    })
    .select("id")
    .single();

  if (runError) throw new Error(`Failed to record digest_run: ${runError.message}`);
  if (!run?.id) throw new Error("No id returned from digest_runs insert");

  if (result.digests.length > 0) {
    const { error } = await supabase.from("digests").insert(
      result.digests.map((d) => ({
        run_id: run.id,
        label: d.label,
        title: d.title,
        record_count: d.recordCount,
        text: d.text,
        degraded: d.degraded,
        prompt_version_id:
          promptIds.get(DIGEST_PROMPTS[findTopic(d.label, taxonomy).family]) ?? null,
      }))
    );
    if (error) throw new Error(`Failed to record digests: ${error.message}`);
  }
  return run.id;
}
