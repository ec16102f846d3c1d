import { logger } from "@trigger.dev/sdk/v3";
import { DIGEST_PROMPTS } from "../config/loader.js";
import { findTopic } from "../config/taxonomy.js";
import type { Digest, ExtractedRecord, PipelineSettings, TopicGroup } from "../types/pipeline.js";
import type { DigestDeps } from "./deps.js";
import { interpolate, mapInBatches, truncate } from "./template.js";

/**
 * One `--- Email i ---` block per record (body cut to `digest.bodyChars`), joined by blank
 * lines. When the whole exceeds `digest.maxPromptChars` it is cut there and the truncation
 * marker appended.
 */
export function buildEmailBlocks(
  records: readonly ExtractedRecord[],
  settings: Pick<PipelineSettings, "digest">
): string {
  const { bodyChars, maxPromptChars, truncationMarker } = settings.digest;
  const joined = records
    .map(
      (r, i) =>
        `--- Email ${i + 1} ---\nSubject: ${r.subject}\nFrom: ${r.sender}\n\n${truncate(r.body, bodyChars)}`
    )
    .join("\n\n");
  if (joined.length <= maxPromptChars) return joined;
  return `${truncate(joined, maxPromptChars)}\n\n${truncationMarker}`;
}

export function buildDigestPrompt(
  group: TopicGroup,
  deps: Pick<DigestDeps, "taxonomy" | "settings" | "prompts">
): string {
  const topic = findTopic(group.label, deps.taxonomy);
  return interpolate(deps.prompts[DIGEST_PROMPTS[topic.family]], {
    title: topic.title,
    label: topic.label,
    count: String(group.records.length),
    emails: buildEmailBlocks(group.records, deps.settings),
  });
}

export function digestFailureText(title: string, label: string, error: string): string {
  return `Error generating digest for ${title} (${label}): ${error}`;
}

/** Summarize one group. Never rejects: a failed call yields a degraded digest carrying the error. */
export async function summarizeGroup(group: TopicGroup, deps: DigestDeps): Promise<Digest> {
  const topic = findTopic(group.label, deps.taxonomy);
  const base = { label: group.label, title: topic.title, recordCount: group.records.length };
  try {
    const text = await deps.model.complete(buildDigestPrompt(group, deps), {
      maxOutputTokens: deps.settings.digest.maxOutputTokens,
    });
    return { ...base, text: text.trim(), degraded: false };
  } catch (e) {
    const errorMessage = e instanceof Error ? e.message : String(e);
    logger.error("Digest generation failed", {
      label: group.label,
      recordCount: group.records.length,
      errorMessage,
    });
    return { ...base, text: digestFailureText(topic.title, group.label, errorMessage), degraded: true };
  }
}

/** One digest per group, `digest.concurrency` at a time, in group order. */
export function summarizeAll(
  groups: readonly TopicGroup[],
  deps: DigestDeps
): Promise<Digest[]> {
  return mapInBatches(groups, deps.settings.digest.concurrency, (group) =>
    summarizeGroup(group, deps)
  );
}
