import { loadAndValidateAll } from "../config/loader.js";
import type { DigestDeps } from "../digest/deps.js";
import { createModelClient } from "../providers/index.js";
import type { ModelClient } from "../providers/types.js";

/** Load config, prompts, and the configured model client for one run. */
export function loadDigestDeps(model?: ModelClient): DigestDeps {
  const { taxonomy, settings, prompts } = loadAndValidateAll();
  return {
    model: model ?? createModelClient(settings.provider),
    taxonomy,
    settings,
    prompts,
  };
}
