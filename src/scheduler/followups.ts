import type { Logger } from "../logging/logger.js";
import { DAY_MS } from "../memory/derive.js";
import type { ItemStore } from "../store/items.js";
import type { Item } from "../store/types.js";
import type { TriggerSink } from "../triggers/types.js";

const CANDIDATE_LIMIT = 50;

export interface FollowupResult {
  readonly published: number;
  readonly replied: number;
}

export function followUpDraft(subject: string): string {
  return `Following up on "${subject || "(no subject)"}": do you have an update?\n\nThanks!`;
}

/**
 * Publishes `no_reply_after_n_days` for reply-tracked messages nobody has
 * answered within `days`. Items answered in the meantime drop out of
 * tracking instead.
 */
export async function emitFollowups(
  deps: { items: ItemStore; sink: TriggerSink; logger: Logger },
  days: number,
  now: number,
): Promise<FollowupResult> {
  if (days <= 0) return { published: 0, replied: 0 };
  const { items, sink, logger } = deps;

  let published = 0;
  let replied = 0;
  for (const item of items.listFollowupCandidates(now - days * DAY_MS, CANDIDATE_LIMIT)) {
    if (item.conversationId !== null && items.hasLaterOutbound(item.conversationId, item.receivedAt)) {
      if (items.markReplied(item.id)) replied++;
      continue;
    }
    try {
      await sink.publish({ type: "no_reply_after_n_days", primaryId: item.id, payload: followupPayload(item, days, now) });
    } catch (err) {
      logger.error({ err, itemId: item.id }, "Follow-up publish failed");
      continue;
    }
    if (items.markFollowupScheduled(item.id, now)) published++;
  }

  if (published + replied > 0) {
    logger.info({ published, replied }, "Follow-ups processed");
  }
  return { published, replied };
}

function followupPayload(item: Item, days: number, now: number): Record<string, unknown> {
  return {
    message_id: item.id,
    subject: item.subject,
    sender: item.sender,
    last_activity_at: new Date(item.receivedAt).toISOString(),
    days_waiting: Math.max(days, Math.floor((now - item.receivedAt) / DAY_MS)),
    follow_up_draft: followUpDraft(item.subject),
  };
}
