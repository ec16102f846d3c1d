import type { Label, TaxonomyConfig, TopicDefinition } from "../types/pipeline.js";

/** All labels in taxonomy order. */
export function taxonomyLabels(taxonomy: TaxonomyConfig): Label[] {
  return taxonomy.topics.map((t) => t.label);
}

/**
 * Map free-form model output to a taxonomy label.
 *
 * Only trims and lowercases; no underscore/space folding and no substring search, so
 * "Social_Events" matches "social_events" but "social events" or
 * "social_events\nbecause…" fall back to the catch-all.
 */
export function parseLabel(raw: string | null | undefined, taxonomy: TaxonomyConfig): Label {
  const candidate = (raw ?? "").trim().toLowerCase();
  const match = taxonomy.topics.find((t) => t.label === candidate);
  return match ? match.label : taxonomy.catchAll;
}

export function isTaxonomyLabel(value: string, taxonomy: TaxonomyConfig): boolean {
  return taxonomy.topics.some((t) => t.label === value);
}

/** Topic definition for a label; the catch-all's definition for unknown labels. */
export function findTopic(label: Label, taxonomy: TaxonomyConfig): TopicDefinition {
  const topic =
    taxonomy.topics.find((t) => t.label === label) ??
    taxonomy.topics.find((t) => t.label === taxonomy.catchAll);
  if (!topic) {
    throw new Error(`Catch-all label "${taxonomy.catchAll}" is not defined in the taxonomy`);
  }
  return topic;
}

/**
 * Taxonomy block for the classifier prompt, one topic per paragraph:
 *
 *   social_events
 *   → Invitations to parties… (e.g. birthday party invite; alumni mixer)
 */
export function describeTaxonomy(taxonomy: TaxonomyConfig): string {
  return taxonomy.topics
    .map((t) => {
      const examples = t.examples.length ? ` (e.g. ${t.examples.join("; ")})` : "";
      return `${t.label}\n→ ${t.description}${examples}`;
    })
    .join("\n\n");
}

/** Throws when labels repeat or the catch-all is not one of them. */
export function assertTaxonomyConsistent(taxonomy: TaxonomyConfig): void {
  const seen = new Set<string>();
  for (const topic of taxonomy.topics) {
    if (seen.has(topic.label)) {
      throw new Error(`taxonomy.json lists label "${topic.label}" more than once`);
    }
    seen.add(topic.label);
  }
  if (!seen.has(taxonomy.catchAll)) {
    throw new Error(
      `taxonomy.json catchAll "${taxonomy.catchAll}" is not one of the topic labels`
    );
  }
}
