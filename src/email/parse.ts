import type { GmailHeader, GmailMessage, GmailMessagePart } from "../gmail/client.js";
import type { ExtractedRecord } from "../types/pipeline.js";

export const DEFAULT_SUBJECT = "No Subject";
export const DEFAULT_SENDER = "Unknown Sender";

const TAG_PATTERN = /<[^>]+>/g;

/** URL-safe base64 → UTF-8; invalid byte sequences become U+FFFD. */
export function decodeBase64Url(data: string | null | undefined): string {
  if (!data) return "";
  const base64 = data.replace(/-/g, "+").replace(/_/g, "/");
  return Buffer.from(base64, "base64").toString("utf-8");
}

/**
 * Remove every `<...>` run with at least one character inside (not nesting-aware).
 * A stray `<` or an empty `<>` is left as text.
 */
export function stripTags(html: string): string {
  return html.replace(TAG_PATTERN, "");
}

/** Trim, then collapse each run of blank lines to a single blank line. */
export function normalizeBody(text: string): string {
  return text.trim().replace(/\n\s*\n/g, "\n\n");
}

/** First header with exactly this name (case-sensitive). */
function findHeader(
  headers: Array<GmailHeader | null> | null | undefined,
  name: string
): string | undefined {
  const header = (headers ?? []).find((h) => h?.name === name);
  return header?.value ?? undefined;
}

function leafText(part: GmailMessagePart): string | null {
  const mime = (part.mimeType ?? "").toLowerCase();
  if (mime !== "text/plain" && mime !== "text/html") return null;
  const data = part.body?.data;
  if (!data) return null;
  const decoded = decodeBase64Url(data);
  return mime === "text/html" ? stripTags(decoded) : decoded;
}

/**
 * Text of every text/plain and text/html leaf, depth-first in document order,
 * each followed by a line break. Walks with an explicit stack.
 */
export function collectBodyText(root: GmailMessagePart | null | undefined): string {
  if (!root) return "";
  const stack: Array<GmailMessagePart | null> = [root];
  const chunks: string[] = [];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) continue;
    if (Array.isArray(node.parts)) {
      for (let i = node.parts.length - 1; i >= 0; i--) {
        stack.push(node.parts[i]);
      }
      continue;
    }
    const text = leafText(node);
    if (text !== null) chunks.push(`${text}\n`);
  }
  return chunks.join("");
}

/** Flatten a Gmail message into subject, sender, and plain-text body. Never throws. */
export function extractRecord(msg: GmailMessage): ExtractedRecord {
  const headers = msg.payload?.headers;
  return {
    id: msg.id ?? "",
    subject: findHeader(headers, "Subject") ?? DEFAULT_SUBJECT,
    sender: findHeader(headers, "From") ?? DEFAULT_SENDER,
    body: normalizeBody(collectBodyText(msg.payload)),
  };
}
