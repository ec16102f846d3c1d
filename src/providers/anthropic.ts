import Anthropic from "@anthropic-ai/sdk";
import type { ModelClient } from "./types.js";
import { withRetries } from "./retry.js";

const DEFAULT_MODEL = "claude-haiku-4-5";
const TIMEOUT_MS = 60_000;

export interface AnthropicOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
}

/** Anthropic Messages API as a plain-text ModelClient. */
export function createAnthropicClient(options: AnthropicOptions = {}): ModelClient {
  const apiKey = options.apiKey ?? process.env.ANTHROPIC_API_KEY;
  if (!apiKey) throw new Error("ANTHROPIC_API_KEY is required");
  const model = options.model || process.env.DEFAULT_ANTHROPIC_MODEL || DEFAULT_MODEL;
  const timeoutMs = options.timeoutMs ?? TIMEOUT_MS;
  const client = new Anthropic({ apiKey, maxRetries: 0 });

  return {
    provider: "anthropic",
    model,
    complete: (prompt, { maxOutputTokens, temperature }) =>
      withRetries("anthropic", model, async () => {
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), timeoutMs);
        try {
          const response = await client.messages.create(
            {
              model,
              max_tokens: maxOutputTokens,
              temperature,
              messages: [{ role: "user", content: prompt }],
            },
            { signal: controller.signal }
          );
          let text = "";
          for (const block of response.content) {
            if (block.type === "text") text += block.text;
          }
          if (!text.trim()) {
            throw new Error("Anthropic returned empty or non-text content");
          }
          return text;
        } finally {
          clearTimeout(timeout);
        }
      }),
  };
}
