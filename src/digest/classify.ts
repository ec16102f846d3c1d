import { logger } from "@trigger.dev/sdk/v3";
import { describeTaxonomy, parseLabel, taxonomyLabels } from "../config/taxonomy.js";
import type { ExtractedRecord, Label } from "../types/pipeline.js";
import type { DigestDeps } from "./deps.js";
import { interpolate, mapInBatches, truncate } from "./template.js";

/**
 * - ok: reply was exactly a taxonomy label (after trim + lowercase)
 * - coerced: reply was outside the taxonomy; catch-all used
 * - failed: model call failed; catch-all used
 */
export type ClassificationStatus = "ok" | "coerced" | "failed";

export interface ClassificationOutcome {
  id: string;
  label: Label;
  status: ClassificationStatus;
  error?: string;
}

export function buildClassifierPrompt(
  record: ExtractedRecord,
  deps: Pick<DigestDeps, "taxonomy" | "settings" | "prompts">
): string {
  const { taxonomy, settings, prompts } = deps;
  return interpolate(prompts["classifier.md"], {
    taxonomy: describeTaxonomy(taxonomy),
    labels_list: taxonomyLabels(taxonomy).join(", "),
    subject: record.subject,
    sender: record.sender,
    body: truncate(record.body, settings.classifier.bodyChars),
  });
}

/** Classify one record. Never rejects: failures and stray replies map to the catch-all label. */
export async function classifyRecord(
  record: ExtractedRecord,
  deps: DigestDeps
): Promise<ClassificationOutcome> {
  const { taxonomy, settings } = deps;
  const subject = record.subject.slice(0, 80);
  try {
    const raw = await deps.model.complete(buildClassifierPrompt(record, deps), {
      maxOutputTokens: settings.classifier.maxOutputTokens,
      temperature: 0,
    });
    const label = parseLabel(raw, taxonomy);
    if (raw.trim().toLowerCase() !== label) {
      logger.info("Classifier reply outside taxonomy; using catch-all", {
        messageId: record.id,
        subject,
        reply: raw.slice(0, 80),
        label,
      });
      return { id: record.id, label, status: "coerced" };
    }
    return { id: record.id, label, status: "ok" };
  } catch (e) {
    const errorMessage = e instanceof Error ? e.message : String(e);
    logger.warn("Classification failed; using catch-all", {
      messageId: record.id,
      subject,
      label: taxonomy.catchAll,
      errorMessage,
    });
    return { id: record.id, label: taxonomy.catchAll, status: "failed", error: errorMessage };
  }
}

/** Classify every record, `classifier.concurrency` at a time. Output is in record order. */
export function classifyAll(
  records: readonly ExtractedRecord[],
  deps: DigestDeps
): Promise<ClassificationOutcome[]> {
  return mapInBatches(records, deps.settings.classifier.concurrency, (record) =>
    classifyRecord(record, deps)
  );
}
