import { GoogleGenerativeAI } from "@google/generative-ai";
import type { ModelClient } from "./types.js";
import { runWithTimeout, withRetries } from "./retry.js";

/** Non-thinking model: thinking tokens would count against the small classifier budget. */
const DEFAULT_MODEL = "gemini-2.0-flash";
const TIMEOUT_MS = 30_000;

export interface GeminiOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
}

/** Gemini generateContent as a plain-text ModelClient. */
export function createGeminiClient(options: GeminiOptions = {}): ModelClient {
  const apiKey = options.apiKey ?? process.env.GEMINI_API_KEY;
  if (!apiKey) throw new Error("GEMINI_API_KEY is required");
  const modelId = options.model || process.env.DEFAULT_GEMINI_MODEL || DEFAULT_MODEL;
  const timeoutMs = options.timeoutMs ?? TIMEOUT_MS;
  const model = new GoogleGenerativeAI(apiKey).getGenerativeModel({ model: modelId });

  return {
    provider: "gemini",
    model: modelId,
    complete: (prompt, { maxOutputTokens, temperature }) =>
      withRetries("gemini", modelId, async () => {
        const result = await runWithTimeout(
          model.generateContent({
            contents: [{ role: "user", parts: [{ text: prompt }] }],
            generationConfig: { maxOutputTokens, temperature },
          }),
          timeoutMs
        );
        const text = result.response.text();
        if (!text.trim()) throw new Error("Gemini returned empty content");
        return text;
      }),
  };
}
