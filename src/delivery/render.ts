import type { Digest, PipelineStats } from "../types/pipeline.js";

const BANNER = "=".repeat(60);
const RULE = "-".repeat(60);

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

/** Plain-text digest: banner, one section per topic, closing banner. */
export function renderDigestText(digests: readonly Digest[], stats: PipelineStats): string {
  if (digests.length === 0) {
    return [BANNER, "INBOX DIGEST", BANNER, "No unread emails found.", BANNER].join("\n");
  }
  const lines = [
    BANNER,
    `INBOX DIGEST: ${plural(stats.fetched, "unread email")} in ${plural(digests.length, "topic")}`,
    BANNER,
  ];
  digests.forEach((digest, i) => {
    if (i > 0) lines.push("", RULE);
    lines.push("", `${digest.title} (${plural(digest.recordCount, "email")})`, "", digest.text);
  });
  lines.push("", BANNER);
  return lines.join("\n");
}

/** e.g. "Inbox digest: 12 unread emails (2024-05-03)" */
export function digestSubject(prefix: string, stats: PipelineStats, date: Date): string {
  return `${prefix}: ${plural(stats.fetched, "unread email")} (${date.toISOString().slice(0, 10)})`;
}
