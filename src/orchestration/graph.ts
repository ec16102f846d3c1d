import { logger } from "@trigger.dev/sdk/v3";
import { StateGraph, START, END } from "@langchain/langgraph";
import { DigestRunState } from "./state.js";
import type { DigestRunStateType } from "./state.js";
import {
  extractNode,
  makeClassifyNode,
  aggregateNode,
  makeSummarizeNode,
} from "./nodes.js";
import { countByLabel } from "../digest/aggregate.js";
import type { DigestDeps } from "../digest/deps.js";
import {
  INVALID_GRANT_MESSAGE,
  isInvalidGrantError,
  type GmailMessage,
  type MessageSource,
} from "../gmail/client.js";
import type { Diagnostic, DigestRunResult, PipelineStats } from "../types/pipeline.js";

/**
 * Compiled LangGraph for one digest run:
 *   START → extract → classify → aggregate → summarize → END
 *
 * Built per run so nodes close over that run's model client and config.
 */
export function createDigestGraph(deps: DigestDeps) {
  return new StateGraph(DigestRunState)
    .addNode("extract", extractNode)
    .addNode("classify", makeClassifyNode(deps))
    .addNode("aggregate", aggregateNode)
    .addNode("summarize", makeSummarizeNode(deps))
    .addEdge(START, "extract")
    .addEdge("extract", "classify")
    .addEdge("classify", "aggregate")
    .addEdge("aggregate", "summarize")
    .addEdge("summarize", END)
    .compile();
}

export function computeStats(state: DigestRunStateType): PipelineStats {
  return {
    fetched: state.rawMessages.length,
    perLabel: countByLabel(state.groups),
    digests: state.digests.length,
    degradedDigests: state.digests.filter((d) => d.degraded).length,
    classificationFailures: state.classifications.filter((c) => c.status === "failed").length,
  };
}

/**
 * Run extract → classify → aggregate → summarize over already-fetched messages.
 */
export async function runDigestPipeline(
  rawMessages: GmailMessage[],
  deps: DigestDeps
): Promise<DigestRunResult> {
  const graph = createDigestGraph(deps);
  const state = (await graph.invoke({ rawMessages })) as DigestRunStateType;
  const stats = computeStats(state);
  logger.info("Digest pipeline finished", {
    trace: "digest_run",
    provider: deps.model.provider,
    model: deps.model.model,
    ...stats,
    diagnostics: state.diagnostics.length,
  });
  return {
    digests: state.digests,
    classifications: state.classifications.map(({ id, label }) => ({ id, label })),
    stats,
    diagnostics: state.diagnostics,
  };
}

/**
 * Fetch up to `maxResults` unread messages and run the pipeline. A fetch failure is a
 * run with zero messages plus a fetch diagnostic.
 */
export async function runUnreadDigest(
  source: MessageSource,
  deps: DigestDeps
): Promise<DigestRunResult> {
  const { maxResults } = deps.settings;
  const fetchDiagnostics: Diagnostic[] = [];
  let rawMessages: GmailMessage[] = [];
  try {
    rawMessages = (await source.listUnread(maxResults)).slice(0, maxResults);
  } catch (err) {
    const message = isInvalidGrantError(err)
      ? INVALID_GRANT_MESSAGE
      : err instanceof Error
        ? err.message
        : String(err);
    logger.error("Fetching unread messages failed; continuing with none", {
      trace: "digest_run",
      errorMessage: message,
    });
    fetchDiagnostics.push({ stage: "fetch", message });
  }
  if (rawMessages.length === 0) {
    logger.info("No unread messages found", { trace: "digest_run" });
  } else {
    logger.info("Fetched unread messages", { trace: "digest_run", count: rawMessages.length });
  }

  const result = await runDigestPipeline(rawMessages, deps);
  return { ...result, diagnostics: [...fetchDiagnostics, ...result.diagnostics] };
}
