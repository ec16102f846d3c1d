import { logger } from "@trigger.dev/sdk/v3";
import { extractRecord } from "../email/parse.js";
import { classifyAll } from "../digest/classify.js";
import { aggregate } from "../digest/aggregate.js";
import { summarizeAll } from "../digest/summarize.js";
import type { DigestDeps } from "../digest/deps.js";
import type { Diagnostic } from "../types/pipeline.js";
import type { DigestRunStateType } from "./state.js";

type DigestNode = (state: DigestRunStateType) => Promise<Partial<DigestRunStateType>>;

export const NODE_EXTRACT = "extract";
export const NODE_CLASSIFY = "classify";
export const NODE_AGGREGATE = "aggregate";
export const NODE_SUMMARIZE = "summarize";

/** Node: flatten every raw message into {id, subject, sender, body}. */
export async function extractNode(
  state: DigestRunStateType
): Promise<Partial<DigestRunStateType>> {
  const records = state.rawMessages.map(extractRecord);
  const emptyBodies = records.filter((r) => !r.body).length;
  logger.info("Extracted messages", {
    node: NODE_EXTRACT,
    count: records.length,
    emptyBodies,
  });
  return { records };
}

/** Node: one label per record; failures already degraded to the catch-all. */
export function makeClassifyNode(deps: DigestDeps): DigestNode {
  return async (state) => {
    const classifications = await classifyAll(state.records, deps);
    const diagnostics: Diagnostic[] = classifications
      .filter((c) => c.status === "failed")
      .map((c) => ({
        stage: "classify",
        messageId: c.id,
        label: c.label,
        message: c.error ?? "classification failed",
      }));
    logger.info("Classified messages", {
      node: NODE_CLASSIFY,
      count: classifications.length,
      failed: diagnostics.length,
      coerced: classifications.filter((c) => c.status === "coerced").length,
    });
    return { classifications, diagnostics };
  };
}

/**
 * Node: group records by label. Labels are matched to records by index and the
 * carried id is checked, so a reordering bug cannot silently mislabel mail.
 */
export async function aggregateNode(
  state: DigestRunStateType
): Promise<Partial<DigestRunStateType>> {
  const { records, classifications } = state;
  const labels = records.map((record, i) => {
    const c = classifications[i];
    if (!c || c.id !== record.id) {
      throw new Error(`Classification ${i} does not belong to message ${record.id}`);
    }
    return c.label;
  });
  const groups = aggregate(records, labels);
  logger.info("Aggregated messages", {
    node: NODE_AGGREGATE,
    groups: groups.map((g) => `${g.label}: ${g.records.length}`),
  });
  return { groups };
}

/** Node: one digest per non-empty group, in first-seen label order. */
export function makeSummarizeNode(deps: DigestDeps): DigestNode {
  return async (state) => {
    const digests = await summarizeAll(state.groups, deps);
    const diagnostics: Diagnostic[] = digests
      .filter((d) => d.degraded)
      .map((d) => ({ stage: "summarize", label: d.label, message: d.text }));
    logger.info("Generated digests", {
      node: NODE_SUMMARIZE,
      count: digests.length,
      degraded: diagnostics.length,
    });
    return { digests, diagnostics };
  };
}
