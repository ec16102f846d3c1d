import { Annotation } from "@langchain/langgraph";
import type { GmailMessage } from "../gmail/client.js";
import type { ClassificationOutcome } from "../digest/classify.js";
import type { Diagnostic, Digest, ExtractedRecord, TopicGroup } from "../types/pipeline.js";

/** Replace semantics: take the update (right) as new value. */
const replace = <T>(_: T, right: T): T => right;

/** Append semantics: each node adds its own diagnostics. */
const append = <T>(left: T[], right: T[]): T[] => left.concat(right);

/**
 * Graph state for one digest run. Each node returns a partial update; LangGraph
 * merges it into the shared state. Stages only ever produce new arrays.
 */
export const DigestRunState = Annotation.Root({
  rawMessages: Annotation<GmailMessage[]>({
    reducer: replace,
    default: () => [],
  }),
  records: Annotation<ExtractedRecord[]>({
    reducer: replace,
    default: () => [],
  }),
  /** One per record, same order, carrying the record id. */
  classifications: Annotation<ClassificationOutcome[]>({
    reducer: replace,
    default: () => [],
  }),
  groups: Annotation<TopicGroup[]>({
    reducer: replace,
    default: () => [],
  }),
  digests: Annotation<Digest[]>({
    reducer: replace,
    default: () => [],
  }),
  diagnostics: Annotation<Diagnostic[]>({
    reducer: append,
    default: () => [],
  }),
});

export type DigestRunStateType = typeof DigestRunState.State;
