import { readFileSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import AjvModule from "ajv";
import type { SchemaObject } from "ajv";
import type {
  DigestFamily,
  ModelProviderName,
  PipelineSettings,
  TaxonomyConfig,
} from "../types/pipeline.js";
import { assertTaxonomyConsistent } from "./taxonomy.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Project root: src/config (tsx, vitest), dist/src/config (build), or cwd (Trigger.dev deploy). */
function getRoot(): string {
  const candidates = [
    join(__dirname, "..", ".."),
    join(__dirname, "..", "..", ".."),
    process.cwd(),
  ];
  for (const dir of candidates) {
    if (existsSync(join(dir, "config", "taxonomy.json"))) return dir;
  }
  return candidates[0];
}
const ROOT = getRoot();

const CONFIG_FILES = ["taxonomy.json", "pipeline.json"] as const;

const PROMPT_FILES = [
  "classifier.md",
  "digest_events.md",
  "digest_outreach.md",
  "digest_postings.md",
  "digest_general.md",
] as const;

export type ConfigName = (typeof CONFIG_FILES)[number];
export type PromptName = (typeof PROMPT_FILES)[number];

export type PromptTemplates = Record<PromptName, string>;

export const PROMPT_NAMES: readonly PromptName[] = PROMPT_FILES;

/** Digest prompt template per topic family. */
export const DIGEST_PROMPTS: Record<DigestFamily, PromptName> = {
  events: "digest_events.md",
  outreach: "digest_outreach.md",
  postings: "digest_postings.md",
  general: "digest_general.md",
};

const configDir = (usePrivate: boolean) =>
  usePrivate ? join(ROOT, "private", "config") : join(ROOT, "config");
const promptDir = (usePrivate: boolean) =>
  usePrivate ? join(ROOT, "private", "prompts") : join(ROOT, "prompts");

function loadJson(path: string): unknown {
  const raw = readFileSync(path, "utf-8");
  try {
    return JSON.parse(raw);
  } catch (e: unknown) {
    throw new Error(`Invalid JSON at ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

/** Resolve path: private first, then default config/prompts. */
function resolvePath(
  kind: "config" | "prompts",
  filename: string,
  usePrivate: boolean
): string {
  const dir = kind === "config" ? configDir(usePrivate) : promptDir(usePrivate);
  return join(dir, filename);
}

/** Load a config file (unvalidated) with precedence: private/config > config/. */
export function loadConfig(name: ConfigName): unknown {
  const privatePath = resolvePath("config", name, true);
  const defaultPath = resolvePath("config", name, false);
  const path = existsSync(privatePath) ? privatePath : defaultPath;
  if (existsSync(path)) return loadJson(path);
  throw new Error(`Config file not found: ${name} (checked private/config and config/)`);
}

/** Load a prompt template with precedence: private/prompts > prompts/. */
export function loadPrompt(name: PromptName): string {
  const privatePath = resolvePath("prompts", name, true);
  const defaultPath = resolvePath("prompts", name, false);
  const path = existsSync(privatePath) ? privatePath : defaultPath;
  if (existsSync(path)) return readFileSync(path, "utf-8");
  throw new Error(`Prompt file not found: ${name} (checked private/prompts and prompts/)`);
}

// ESM default export can be module namespace; Ajv class may be at .default
type AjvInstance = import("ajv").default;
type AjvConstructor = new (opts?: object) => AjvInstance;
const AjvClass =
  ((AjvModule as unknown) as { default?: AjvConstructor }).default ??
  ((AjvModule as unknown) as AjvConstructor);
const ajv = new AjvClass({ strict: false, allErrors: true });

function loadSchema(schemaName: string): SchemaObject {
  const path = join(ROOT, "schemas", schemaName);
  if (!existsSync(path)) throw new Error(`Schema not found: ${schemaName}`);
  const schema: SchemaObject = JSON.parse(readFileSync(path, "utf-8"));
  return schema;
}

/**
 * Validate a config object against schemas/<name>. Throws with the failing paths if invalid.
 */
export function validateConfig<T>(name: ConfigName, data: unknown): T {
  const validate = ajv.compile<T>(loadSchema(name));
  if (validate(data)) return data;
  const errors = (validate.errors ?? [])
    .map((err) => `${err.instancePath || "/"} ${err.message ?? "is invalid"}`)
    .join("; ");
  throw new Error(`Config validation failed for ${name}: ${errors || "unknown error"}`);
}

function isProviderName(value: string): value is ModelProviderName {
  return value === "anthropic" || value === "gemini";
}

/** Apply env overrides (MODEL_PROVIDER) on top of pipeline.json. */
export function applyEnvOverrides(
  settings: PipelineSettings,
  env: NodeJS.ProcessEnv = process.env
): PipelineSettings {
  const provider = env.MODEL_PROVIDER?.trim().toLowerCase();
  if (!provider) return settings;
  if (!isProviderName(provider)) {
    throw new Error(`MODEL_PROVIDER must be "anthropic" or "gemini" (got "${env.MODEL_PROVIDER}")`);
  }
  return { ...settings, provider };
}

export function loadTaxonomy(): TaxonomyConfig {
  const taxonomy = validateConfig<TaxonomyConfig>("taxonomy.json", loadConfig("taxonomy.json"));
  assertTaxonomyConsistent(taxonomy);
  return taxonomy;
}

export function loadPipelineSettings(): PipelineSettings {
  const settings = validateConfig<PipelineSettings>("pipeline.json", loadConfig("pipeline.json"));
  return applyEnvOverrides(settings);
}

export function loadPromptTemplates(): PromptTemplates {
  return {
    "classifier.md": loadPrompt("classifier.md"),
    "digest_events.md": loadPrompt("digest_events.md"),
    "digest_outreach.md": loadPrompt("digest_outreach.md"),
    "digest_postings.md": loadPrompt("digest_postings.md"),
    "digest_general.md": loadPrompt("digest_general.md"),
  };
}

/** Load and validate all configs and prompt templates. */
export function loadAndValidateAll(): {
  taxonomy: TaxonomyConfig;
  settings: PipelineSettings;
  prompts: PromptTemplates;
} {
  return {
    taxonomy: loadTaxonomy(),
    settings: loadPipelineSettings(),
    prompts: loadPromptTemplates(),
  };
}
