import { logger } from "@trigger.dev/sdk/v3";
import type { ModelProviderName } from "../types/pipeline.js";
import { ModelError, errorStatus } from "./types.js";

/** Total attempts; backoff used for rate/transient errors only. */
export const MAX_ATTEMPTS = 5;

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

function jitter(baseMs: number): number {
  return Math.floor(baseMs * (0.5 + Math.random() * 0.5));
}

/**
 * True if error is 429, rate limited, overloaded, resource exhausted, timeout, or 5xx.
 * Any other 4xx is permanent, whatever its message says.
 */
export function isRetryableRateOrTransientError(e: unknown): boolean {
  const msg = e instanceof Error ? e.message.toLowerCase() : "";
  const status = errorStatus(e);
  if (status === 429) return true;
  if (status !== null && status >= 400 && status < 500) return false;
  return (
    msg.includes("429") ||
    msg.includes("rate limit") ||
    msg.includes("rate_limit") ||
    msg.includes("too many requests") ||
    msg.includes("resource exhausted") ||
    msg.includes("resource_exhausted") ||
    msg.includes("overloaded") ||
    msg.includes("timeout") ||
    msg.includes("unavailable") ||
    (e instanceof Error && e.name === "AbortError") ||
    (status !== null && status >= 500)
  );
}

export function runWithTimeout<T>(p: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, rej) => {
    timer = setTimeout(() => rej(new Error("Timeout")), ms);
  });
  return Promise.race([p, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Run one completion attempt up to MAX_ATTEMPTS times with jittered exponential backoff
 * on rate/transient errors. Anything else fails immediately. Always rejects with ModelError.
 */
export async function withRetries(
  provider: ModelProviderName,
  model: string,
  attempt: () => Promise<string>
): Promise<string> {
  let lastError: unknown = null;
  for (let i = 0; i < MAX_ATTEMPTS; i++) {
    try {
      return await attempt();
    } catch (e) {
      lastError = e;
      const willRetry = isRetryableRateOrTransientError(e) && i < MAX_ATTEMPTS - 1;
      logger.warn("Model completion: attempt failed", {
        provider,
        model,
        attempt: i + 1,
        errorMessage: e instanceof Error ? e.message : String(e),
        errorName: e instanceof Error ? e.name : null,
        status: errorStatus(e),
        willRetry,
      });
      if (!willRetry) break;
      await sleep(jitter(1000 * Math.pow(2, i)));
    }
  }
  throw new ModelError(provider, lastError);
}
