import { logger, schedules, task } from "@trigger.dev/sdk/v3";
import {
  createGmailMessageSource,
  getGmailClient,
  getGmailOptionsFromEnv,
  markMessagesRead,
} from "../gmail/client.js";
import { loadDigestDeps, runUnreadDigest } from "../orchestration/index.js";
import { createGmailMailer, deliverDigest, type DeliveryOutcome } from "../delivery/index.js";
import { recordDigestRun } from "../db/index.js";
import type {
  DeliveryChannel,
  Diagnostic,
  Digest,
  PipelineStats,
} from "../types/pipeline.js";

const GMAIL_USER = process.env.GMAIL_USER_ID ?? "me";

export type UnreadDigestPayload = {
  /** Overrides pipeline.json maxResults. */
  maxResults?: number;
  /** Overrides pipeline.json markAsRead. */
  markAsRead?: boolean;
  /** Overrides pipeline.json delivery.channels. */
  channels?: DeliveryChannel[];
};

export type UnreadDigestOutput = {
  stats: PipelineStats;
  digests: Digest[];
  diagnostics: Diagnostic[];
  delivery: DeliveryOutcome[];
  markedRead: number;
  runId: string | null;
};

/**
 * Fetch unread mail → extract → classify → aggregate → digest, then deliver, optionally
 * mark the messages read, and record the run (if SUPABASE_URL).
 *
 * Messages are marked read only after at least one delivery channel succeeded. Delivery,
 * mark-read, and DB failures are logged and reported; they never fail the task.
 */
export const unreadDigestTask = task({
  id: "unread-digest",
  machine: "small-2x",
  run: async (payload: UnreadDigestPayload): Promise<UnreadDigestOutput> => {
    const base = loadDigestDeps();
    const deps = {
      ...base,
      settings: {
        ...base.settings,
        maxResults: payload.maxResults ?? base.settings.maxResults,
        markAsRead: payload.markAsRead ?? base.settings.markAsRead,
      },
    };
    const channels = payload.channels ?? deps.settings.delivery.channels;
    logger.info("unread-digest started", {
      provider: deps.model.provider,
      model: deps.model.model,
      maxResults: deps.settings.maxResults,
      markAsRead: deps.settings.markAsRead,
      channels,
    });

    const gmail = getGmailClient(getGmailOptionsFromEnv());
    const source = createGmailMessageSource(gmail, GMAIL_USER, deps.settings.query);
    const result = await runUnreadDigest(source, deps);
    const messageIds = result.classifications.map((c) => c.id).filter(Boolean);

    const delivery = await deliverDigest(result, {
      channels,
      settings: deps.settings,
      mailer: createGmailMailer(gmail, GMAIL_USER, process.env.DIGEST_RECIPIENT),
    });

    let markedRead = 0;
    const delivered = delivery.some((d) => d.ok);
    if (deps.settings.markAsRead && delivered && messageIds.length > 0) {
      try {
        await markMessagesRead(gmail, GMAIL_USER, messageIds);
        markedRead = messageIds.length;
        logger.info("Marked messages read", { count: markedRead });
      } catch (err) {
        logger.warn("Mark as read failed (non-fatal)", {
          count: messageIds.length,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    let runId: string | null = null;
    if (process.env.SUPABASE_URL) {
      try {
        runId = await recordDigestRun({
          result,
          taxonomy: deps.taxonomy,
          prompts: deps.prompts,
          messageIds,
          markedRead: markedRead > 0,
        });
      } catch (dbErr) {
        logger.warn("DB record digest_run failed (non-fatal)", {
          error: dbErr instanceof Error ? dbErr.message : String(dbErr),
        });
      }
    }

    return {
      stats: result.stats,
      digests: result.digests,
      diagnostics: result.diagnostics,
      delivery,
      markedRead,
      runId,
    };
  },
});

/**
 * Scheduled entry point: triggers unread-digest with pipeline.json defaults.
 * Add a schedule (e.g. daily at 07:00) in the Trigger.dev dashboard.
 */
export const unreadDigestScheduledTask = schedules.task({
  id: "unread-digest-scheduled",
  run: async () => {
    const handle = await unreadDigestTask.trigger({});
    return { triggered: handle.id };
  },
});
