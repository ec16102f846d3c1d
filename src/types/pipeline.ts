/** A label from the configured taxonomy (see config/taxonomy.json). */
export type Label = string;

/** Digest instruction style a topic uses. */
export type DigestFamily = "events" | "outreach" | "postings" | "general";

export interface TopicDefinition {
  label: Label;
  /** Human-readable name used in digests and prompts. */
  title: string;
  /** One-line description shown to the classifier. */
  description: string;
  /** Illustrative sub-cases shown to the classifier. */
  examples: string[];
  family: DigestFamily;
}

export interface TaxonomyConfig {
  /** Label used when the model reply is missing, malformed, or out of set. */
  catchAll: Label;
  topics: TopicDefinition[];
}

export type ModelProviderName = "anthropic" | "gemini";

export type DeliveryChannel = "log" | "email";

export interface PipelineSettings {
  provider: ModelProviderName;
  /** Upper bound on messages fetched per run. */
  maxResults: number;
  /** Gmail search query for the run (default "is:unread"). */
  query: string;
  markAsRead: boolean;
  classifier: {
    bodyChars: number;
    maxOutputTokens: number;
    concurrency: number;
  };
  digest: {
    bodyChars: number;
    maxOutputTokens: number;
    concurrency: number;
    /** Cap on one group's concatenated email text. */
    maxPromptChars: number;
    truncationMarker: string;
  };
  delivery: {
    channels: DeliveryChannel[];
    subjectPrefix: string;
  };
}

/** Flat record extracted from one raw message. */
export interface ExtractedRecord {
  id: string;
  subject: string;
  sender: string;
  body: string;
}

export interface Classification {
  id: string;
  label: Label;
}

export interface TopicGroup {
  label: Label;
  records: ExtractedRecord[];
}

export interface Digest {
  label: Label;
  title: string;
  recordCount: number;
  text: string;
  /** True when text is the failure placeholder rather than a model summary. */
  degraded: boolean;
}

export type DiagnosticStage = "fetch" | "classify" | "summarize";

/** Degradation reported next to (never inside) the digest output. */
export interface Diagnostic {
  stage: DiagnosticStage;
  message: string;
  messageId?: string;
  label?: Label;
}

export interface PipelineStats {
  fetched: number;
  perLabel: Record<Label, number>;
  digests: number;
  degradedDigests: number;
  classificationFailures: number;
}

export interface DigestRunResult {
  digests: Digest[];
  classifications: Classification[];
  stats: PipelineStats;
  diagnostics: Diagnostic[];
}
