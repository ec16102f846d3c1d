import type { PromptTemplates } from "../config/loader.js";
import type { ModelClient } from "../providers/types.js";
import type { PipelineSettings, TaxonomyConfig } from "../types/pipeline.js";

export type { PromptTemplates };

/** Everything a run needs besides its messages. Built once per run; read-only. */
export interface DigestDeps {
  model: ModelClient;
  taxonomy: TaxonomyConfig;
  settings: PipelineSettings;
  prompts: PromptTemplates;
}
