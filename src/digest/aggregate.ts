import type { ExtractedRecord, Label, TopicGroup } from "../types/pipeline.js";

/**
 * Group records by label. `labels[i]` is the label of `records[i]`.
 * Groups appear in first-seen label order; members keep input order.
 */
export function aggregate(
  records: readonly ExtractedRecord[],
  labels: readonly Label[]
): TopicGroup[] {
  if (records.length !== labels.length) {
    throw new Error(
      `aggregate: got ${records.length} records but ${labels.length} labels`
    );
  }
  const byLabel = new Map<Label, ExtractedRecord[]>();
  records.forEach((record, i) => {
    const label = labels[i];
    const members = byLabel.get(label);
    if (members) members.push(record);
    else byLabel.set(label, [record]);
  });
  return [...byLabel].map(([label, members]) => ({ label, records: members }));
}

/** Member count per label, in group order. */
export function countByLabel(groups: readonly TopicGroup[]): Record<Label, number> {
  const counts: Record<Label, number> = {};
  for (const group of groups) counts[group.label] = group.records.length;
  return counts;
}
