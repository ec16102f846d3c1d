import type { ModelProviderName } from "../types/pipeline.js";
import { createAnthropicClient } from "./anthropic.js";
import { createGeminiClient } from "./gemini.js";
import type { ModelClient } from "./types.js";

export type { CompletionOptions, ModelClient } from "./types.js";
export { ModelError } from "./types.js";

/** Build the client for the configured provider; API keys and model ids come from env. */
export function createModelClient(provider: ModelProviderName): ModelClient {
  switch (provider) {
    case "anthropic":
      return createAnthropicClient();
    case "gemini":
      return createGeminiClient();
  }
}
