import type { PublishRequest } from "../triggers/types.js";
import { urgencyRank, type Item, type Urgency } from "../store/types.js";
import type { Classification } from "./schema.js";

export const DEFAULT_MEETING_MINUTES = 30;

export interface ClassificationTriggerOptions {
  readonly urgentAt: Urgency;
  readonly timezone: string;
}

/**
 * Triggers a classified message raises. Every dedupe key ends in the item id,
 * so re-running a crashed item does not notify twice.
 */
export function classificationTriggers(
  item: Item,
  c: Classification,
  opts: ClassificationTriggerOptions,
): PublishRequest[] {
  const receivedAt = new Date(item.receivedAt).toISOString();
  const requests: PublishRequest[] = [];

  if (urgencyRank(c.urgency) >= urgencyRank(opts.urgentAt)) {
    requests.push({
      type: "urgent_email",
      primaryId: item.id,
      payload: {
        subject: item.subject,
        sender: item.sender,
        message_id: item.id,
        received_at: receivedAt,
        reason: c.reason,
      },
    });
  }

  if (c.requiresReply) {
    requests.push({
      type: "reply_needed",
      primaryId: item.id,
      payload: {
        message_id: item.id,
        subject: item.subject,
        sender: item.sender,
        received_at: receivedAt,
        reason: c.replyReason ?? c.reason,
      },
    });
  }

  if (c.availability) {
    const a = c.availability;
    requests.push({
      type: "availability_requested",
      primaryId: item.id,
      payload: {
        message_id: item.id,
        subject: item.subject,
        time_window: a.timeWindow ?? null,
        duration_minutes: a.durationMinutes ?? DEFAULT_MEETING_MINUTES,
        timezone: a.timezone ?? opts.timezone,
        constraints: a.constraints ?? null,
        proposed_slots: a.proposedSlots,
        requester: item.sender,
      },
    });
  }

  return requests;
}
