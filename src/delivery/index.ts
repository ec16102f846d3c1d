import { logger } from "@trigger.dev/sdk/v3";
import type { gmail_v1 } from "googleapis";
import { getProfileEmail, sendEmail } from "../gmail/client.js";
import type { DeliveryChannel, DigestRunResult, PipelineSettings } from "../types/pipeline.js";
import { digestSubject, renderDigestText } from "./render.js";

export { renderDigestText, digestSubject } from "./render.js";

/** Sends the rendered digest somewhere; resolves to the sent message id. */
export interface DigestMailer {
  send(subject: string, text: string): Promise<string>;
}

/** Mail the digest through Gmail to `recipient`, or to the authenticated account. */
export function createGmailMailer(
  gmail: gmail_v1.Gmail,
  userId: string,
  recipient?: string
): DigestMailer {
  return {
    send: async (subject, text) => {
      const to = recipient || (await getProfileEmail(gmail, userId));
      return sendEmail(gmail, userId, { to, subject, text });
    },
  };
}

export type DeliveryOutcome =
  | { channel: DeliveryChannel; ok: true; skipped?: boolean; messageId?: string }
  | { channel: DeliveryChannel; ok: false; error: string };

export interface DeliveryOptions {
  channels: readonly DeliveryChannel[];
  settings: Pick<PipelineSettings, "delivery">;
  mailer?: DigestMailer;
  now?: Date;
}

/**
 * Hand the run's digests to each channel. A failing channel is logged and reported in the
 * outcome list; it never stops the others.
 */
export async function deliverDigest(
  result: DigestRunResult,
  options: DeliveryOptions
): Promise<DeliveryOutcome[]> {
  const text = renderDigestText(result.digests, result.stats);
  const outcomes: DeliveryOutcome[] = [];

  for (const channel of options.channels) {
    try {
      if (channel === "log") {
        logger.info("Inbox digest", { channel, digests: result.digests.length, text });
        outcomes.push({ channel, ok: true });
        continue;
      }
      if (result.digests.length === 0) {
        outcomes.push({ channel, ok: true, skipped: true });
        continue;
      }
      if (!options.mailer) throw new Error("email delivery requested but no mailer configured");
      const subject = digestSubject(
        options.settings.delivery.subjectPrefix,
        result.stats,
        options.now ?? new Date()
      );
      const messageId = await options.mailer.send(subject, text);
      logger.info("Digest email sent", { channel, messageId, subject });
      outcomes.push({ channel, ok: true, messageId });
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      logger.warn("Digest delivery failed (non-fatal)", { channel, error });
      outcomes.push({ channel, ok: false, error });
    }
  }
  return outcomes;
}
