import type { ModelProviderName } from "../types/pipeline.js";

export interface CompletionOptions {
  maxOutputTokens: number;
  temperature?: number;
}

/** Text completion over one prompt. Rejects with ModelError once retries are exhausted. */
export interface ModelClient {
  readonly provider: ModelProviderName;
  readonly model: string;
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

/** HTTP-ish status carried by SDK errors (`status` or numeric `code`), if any. */
export function errorStatus(e: unknown): number | null {
  if (typeof e !== "object" || e === null) return null;
  if ("status" in e && typeof e.status === "number") return e.status;
  if ("code" in e && typeof e.code === "number") return e.code;
  return null;
}

export class ModelError extends Error {
  readonly provider: ModelProviderName;
  readonly status: number | null;

  constructor(provider: ModelProviderName, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${provider} completion failed: ${detail}`, { cause });
    this.name = "ModelError";
    this.provider = provider;
    this.status = errorStatus(cause);
  }
}
