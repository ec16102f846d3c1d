import { describe, it, expect } from "vitest";
import {
  applyEnvOverrides,
  DIGEST_PROMPTS,
  loadConfig,
  loadPromptTemplates,
  loadTaxonomy,
  validateConfig,
} from "./loader.js";
import { parseLabel } from "./taxonomy.js";
import type { PipelineSettings } from "../types/pipeline.js";
import { testSettings } from "../testing/fakes.js";

describe("loadTaxonomy", () => {
  it("loads the shipped taxonomy with its catch-all", () => {
    const taxonomy = loadTaxonomy();
    expect(taxonomy.catchAll).toBe("other");
    expect(taxonomy.topics.map((t) => t.label)).toContain("social_events");
    expect(taxonomy.topics.find((t) => t.label === "other")?.family).toBe("general");
  });

  it("maps a mixed-case reply onto the shipped label", () => {
    const taxonomy = loadTaxonomy();
    expect(parseLabel("Social_Events", taxonomy)).toBe("social_events");
    expect(parseLabel("Social Events", taxonomy)).toBe("other");
  });
});

describe("pipeline.json", () => {
  it("ships the documented bounds", () => {
    const settings = validateConfig<PipelineSettings>("pipeline.json", loadConfig("pipeline.json"));
    expect(settings.maxResults).toBe(50);
    expect(settings.classifier.bodyChars).toBe(1000);
    expect(settings.digest.bodyChars).toBe(2500);
    expect(settings.digest.maxOutputTokens).toBe(800);
    expect(settings.digest.maxPromptChars).toBe(50000);
  });

  it("rejects settings that break the schema", () => {
    const bad = { ...testSettings, classifier: { ...testSettings.classifier, concurrency: 0 } };
    expect(() => validateConfig("pipeline.json", bad)).toThrow(
      "Config validation failed for pipeline.json: /classifier/concurrency must be >= 1"
    );
  });

  it("rejects an unknown provider", () => {
    expect(() => validateConfig("pipeline.json", { ...testSettings, provider: "llama" })).toThrow(
      /Config validation failed for pipeline\.json: \/provider/
    );
  });
});

describe("taxonomy.json schema", () => {
  it("rejects uppercase labels", () => {
    const bad = {
      catchAll: "other",
      topics: [{ label: "Other", title: "Other", description: "x", examples: [], family: "general" }],
    };
    expect(() => validateConfig("taxonomy.json", bad)).toThrow(
      /Config validation failed for taxonomy\.json: \/topics\/0\/label/
    );
  });
});

describe("applyEnvOverrides", () => {
  it("leaves settings alone without MODEL_PROVIDER", () => {
    expect(applyEnvOverrides(testSettings, {})).toBe(testSettings);
  });

  it("switches provider from MODEL_PROVIDER", () => {
    expect(applyEnvOverrides(testSettings, { MODEL_PROVIDER: " Gemini " }).provider).toBe("gemini");
  });

  it("rejects an unknown MODEL_PROVIDER", () => {
    expect(() => applyEnvOverrides(testSettings, { MODEL_PROVIDER: "llama" })).toThrow(
      'MODEL_PROVIDER must be "anthropic" or "gemini" (got "llama")'
    );
  });
});

describe("loadPromptTemplates", () => {
  it("loads every template with its placeholders", () => {
    const prompts = loadPromptTemplates();
    expect(prompts["classifier.md"]).toContain("{{labels_list}}");
    expect(prompts["classifier.md"]).toContain("{{body}}");
    for (const name of Object.values(DIGEST_PROMPTS)) {
      expect(prompts[name]).toContain("{{emails}}");
    }
  });
});
