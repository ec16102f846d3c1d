import { google } from "googleapis";
import type { gmail_v1 } from "googleapis";

export interface GmailClientOptions {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

let cachedOAuth2Client: InstanceType<typeof google.auth.OAuth2> | null = null;
let cachedGmail: gmail_v1.Gmail | null = null;

function getOAuth2Client(options: GmailClientOptions) {
  if (!cachedOAuth2Client) {
    const oauth2 = new google.auth.OAuth2(
      options.clientId,
      options.clientSecret,
      "https://developers.google.com/oauthplayground"
    );
    oauth2.setCredentials({ refresh_token: options.refreshToken });
    cachedOAuth2Client = oauth2;
  }
  return cachedOAuth2Client;
}

export function getGmailClient(options: GmailClientOptions): gmail_v1.Gmail {
  if (!cachedGmail) {
    const auth = getOAuth2Client(options);
    cachedGmail = google.gmail({ version: "v1", auth });
  }
  return cachedGmail;
}

/** Read Gmail OAuth settings from env; throws when any is missing. */
export function getGmailOptionsFromEnv(): GmailClientOptions {
  const clientId = process.env.GMAIL_CLIENT_ID;
  const clientSecret = process.env.GMAIL_CLIENT_SECRET;
  const refreshToken = process.env.GMAIL_REFRESH_TOKEN;
  if (!clientId || !clientSecret || !refreshToken) {
    throw new Error(
      "Missing Gmail OAuth env: GMAIL_CLIENT_ID, GMAIL_CLIENT_SECRET, GMAIL_REFRESH_TOKEN"
    );
  }
  return { clientId, clientSecret, refreshToken };
}

export interface GmailHeader {
  name?: string | null;
  value?: string | null;
}

/**
 * One node of a message's part tree. A node with a `parts` array is a container;
 * without one it is a leaf whose content is inline (`body.data`) or an attachment reference.
 * Arrays may hold null entries when the payload is malformed.
 */
export interface GmailMessagePart {
  mimeType?: string | null;
  filename?: string | null;
  headers?: Array<GmailHeader | null> | null;
  body?: { data?: string | null; attachmentId?: string | null; size?: number | null } | null;
  parts?: Array<GmailMessagePart | null> | null;
}

export interface GmailMessage {
  id?: string | null;
  threadId?: string | null;
  labelIds?: string[] | null;
  snippet?: string | null;
  payload?: GmailMessagePart | null;
  internalDate?: string | null;
}

/** Where a run's messages come from. */
export interface MessageSource {
  listUnread(maxResults: number): Promise<GmailMessage[]>;
}

export const INVALID_GRANT_MESSAGE =
  "Gmail refresh token was rejected (invalid_grant). Generate a new GMAIL_REFRESH_TOKEN and update the environment.";

/** True when Google rejected the refresh token (expired or revoked). */
export function isInvalidGrantError(err: unknown): boolean {
  if (!err || typeof err !== "object") return false;
  const message = err instanceof Error ? err.message : "";
  const body = (err as { response?: { data?: { error?: unknown } } }).response?.data?.error;
  return message.includes("invalid_grant") || body === "invalid_grant";
}

export async function fetchMessage(
  gmail: gmail_v1.Gmail,
  userId: string,
  messageId: string
): Promise<GmailMessage> {
  const res = await gmail.users.messages.get({
    userId,
    id: messageId,
    format: "full",
  });
  if (!res.data.id) throw new Error("Message has no id");
  return res.data;
}

/** List message IDs matching a query (e.g. "is:unread"). */
export async function listMessageIds(
  gmail: gmail_v1.Gmail,
  userId: string,
  query: string,
  maxResults = 50
): Promise<string[]> {
  const res = await gmail.users.messages.list({
    userId,
    q: query,
    maxResults,
  });
  return (res.data.messages ?? [])
    .map((m) => m.id)
    .filter((id): id is string => Boolean(id));
}

/**
 * Fetch full messages matching `query`, in list order, 10 at a time.
 */
export async function listFullMessages(
  gmail: gmail_v1.Gmail,
  userId: string,
  query: string,
  maxResults: number
): Promise<GmailMessage[]> {
  const ids = await listMessageIds(gmail, userId, query, maxResults);
  const out: GmailMessage[] = [];
  const batchSize = 10;
  for (let i = 0; i < ids.length; i += batchSize) {
    const batch = ids.slice(i, i + batchSize);
    const messages = await Promise.all(batch.map((id) => fetchMessage(gmail, userId, id)));
    out.push(...messages);
  }
  return out;
}

export function createGmailMessageSource(
  gmail: gmail_v1.Gmail,
  userId: string,
  query = "is:unread"
): MessageSource {
  return {
    listUnread: (maxResults) => listFullMessages(gmail, userId, query, maxResults),
  };
}

/** Remove UNREAD from the given messages (batchModify takes at most 1000 ids). */
export async function markMessagesRead(
  gmail: gmail_v1.Gmail,
  userId: string,
  messageIds: string[]
): Promise<void> {
  const chunkSize = 1000;
  for (let i = 0; i < messageIds.length; i += chunkSize) {
    await gmail.users.messages.batchModify({
      userId,
      requestBody: {
        ids: messageIds.slice(i, i + chunkSize),
        removeLabelIds: ["UNREAD"],
      },
    });
  }
}

/** Email address of the authenticated account. */
export async function getProfileEmail(
  gmail: gmail_v1.Gmail,
  userId: string
): Promise<string> {
  const res = await gmail.users.getProfile({ userId });
  if (!res.data.emailAddress) throw new Error("Gmail profile has no email address");
  return res.data.emailAddress;
}

export interface OutgoingEmail {
  to: string;
  subject: string;
  text: string;
}

/** RFC 2047 encoded-word for non-ASCII subjects. */
function encodeHeaderValue(value: string): string {
  if (/^[\x20-\x7e]*$/.test(value)) return value;
  return `=?UTF-8?B?${Buffer.from(value, "utf-8").toString("base64")}?=`;
}

/**
 * Build a plain-text RFC 822 message, base64url-encoded for `users.messages.send`.
 */
export function encodeRawEmail(email: OutgoingEmail): string {
  const lines = [
    `To: ${email.to}`,
    `Subject: ${encodeHeaderValue(email.subject)}`,
    "MIME-Version: 1.0",
    'Content-Type: text/plain; charset="UTF-8"',
    "Content-Transfer-Encoding: base64",
    "",
    Buffer.from(email.text, "utf-8").toString("base64"),
  ];
  return Buffer.from(lines.join("\r\n"), "utf-8")
    .toString("base64")
    .replace(/\+/g, "-")
    .replace(/\//g, "_")
    .replace(/=+$/, "");
}

export async function sendEmail(
  gmail: gmail_v1.Gmail,
  userId: string,
  email: OutgoingEmail
): Promise<string> {
  const res = await gmail.users.messages.send({
    userId,
    requestBody: { raw: encodeRawEmail(email) },
  });
  return res.data.id ?? "";
}
