import type { Weekday } from "../config/types.js";
import { WEEKDAYS } from "../config/schema.js";
import type { Logger } from "../logging/logger.js";
import { DAY_MS } from "../memory/derive.js";
import type { ItemStore } from "../store/items.js";
import type { PollStateStore } from "../store/poll-state.js";
import type { Item } from "../store/types.js";
import type { TriggerSink } from "../triggers/types.js";
import { localTime, parseTimeOfDay, shiftDate } from "./local-time.js";

export const DIGEST_STATE = "weekly_digest";
export const MAX_TOP_ITEMS = 15;
export const MAX_RECOMMENDED_ACTIONS = 20;
export const ACTION_REQUIRED = "Action Required";
const SCAN_LIMIT = 500;

export interface DigestSettings {
  readonly enabled: boolean;
  readonly day: Weekday;
  /** Local time of day, HH:MM. */
  readonly time: string;
  readonly windowMinutes: number;
  readonly timezone: string;
}

export interface DigestWindow {
  /** Monday of the local week, YYYY-MM-DD. */
  readonly weekStart: string;
  readonly weekEnd: string;
}

export type DigestStatus = "disabled" | "outside_window" | "already_sent" | "sent" | "lost_race";

/**
 * The local week the digest covers, or null when `now` is outside
 * `[day time, day time + windowMinutes]` in the owner's timezone.
 */
export function digestWindow(now: number, settings: DigestSettings): DigestWindow | null {
  const local = localTime(now, settings.timezone);
  if (WEEKDAYS[local.weekday] !== settings.day) return null;

  const start = parseTimeOfDay(settings.time);
  if (local.minutes < start || local.minutes > start + settings.windowMinutes) return null;

  const weekStart = shiftDate(local.date, -local.weekday);
  return { weekStart, weekEnd: shiftDate(weekStart, 6) };
}

export function buildDigestPayload(
  items: readonly Item[],
  window: DigestWindow,
  timezone: string,
): Record<string, unknown> {
  const topItems: Record<string, unknown>[] = [];
  const recommendedActions: string[] = [];

  for (const item of items) {
    const date = localTime(item.receivedAt, timezone).date;
    if (date < window.weekStart || date > window.weekEnd) continue;

    if (item.urgency === "immediate" || item.urgency === "today" || item.categories.includes(ACTION_REQUIRED)) {
      recommendedActions.push(item.subject);
    }
    if (topItems.length < MAX_TOP_ITEMS) {
      const categories = item.categories.length > 0 ? item.categories.join(", ") : "uncategorized";
      topItems.push({
        title: item.subject,
        why_it_matters: `From ${item.sender} (${categories})`,
        links: [item.id],
      });
    }
  }

  return {
    week_start: window.weekStart,
    week_end: window.weekEnd,
    top_items: topItems,
    recommended_actions: recommendedActions.slice(0, MAX_RECOMMENDED_ACTIONS),
  };
}

/** Sends at most one digest per local week, guarded by a versioned poll-state row. */
export async function emitWeeklyDigest(
  deps: { items: ItemStore; pollState: PollStateStore; sink: TriggerSink; logger: Logger },
  settings: DigestSettings,
  now: number,
): Promise<DigestStatus> {
  if (!settings.enabled) return "disabled";
  const window = digestWindow(now, settings);
  if (!window) return "outside_window";

  const state = deps.pollState.get(DIGEST_STATE);
  if (state.value === window.weekStart) return "already_sent";

  const recent = deps.items.listItems({ since: now - 8 * DAY_MS, limit: SCAN_LIMIT });
  await deps.sink.publish({
    type: "weekly_digest_ready",
    primaryId: window.weekStart,
    payload: buildDigestPayload(recent, window, settings.timezone),
  });

  if (!deps.pollState.compareAndSet(DIGEST_STATE, state.version, window.weekStart)) {
    deps.logger.warn({ weekStart: window.weekStart }, "Digest state moved by another runner");
    return "lost_race";
  }
  deps.logger.info({ weekStart: window.weekStart }, "Weekly digest published");
  return "sent";
}
