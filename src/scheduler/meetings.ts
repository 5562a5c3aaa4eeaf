import { z } from "zod";
import type { MeetingRuleConfig, MeetingsConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { DAY_MS } from "../memory/derive.js";
import type { MemoryStore } from "../memory/store.js";
import type { ItemStore } from "../store/items.js";
import type { PollStateStore } from "../store/poll-state.js";
import type { Item } from "../store/types.js";
import type { TriggerSink } from "../triggers/types.js";
import type { DigestStatus } from "./digest.js";
import { formatClock, localTime, parseTimeOfDay } from "./local-time.js";

export const MEETING_PREPS_STATE = "meeting_preps";
export const DAILY_BRIEFING_STATE = "daily_briefing";
const MINUTE_MS = 60_000;
const BACK_TO_BACK_MINUTES = 5;
const HEAVY_LOAD_HOURS = 6;
const MAX_CONTACT_NOTES = 3;

export interface MeetingSettings extends MeetingsConfig {
  readonly owner: string;
  readonly timezone: string;
}

export interface MeetingDeps {
  items: ItemStore;
  memory: MemoryStore;
  pollState: PollStateStore;
  sink: TriggerSink;
  logger: Logger;
}

export type MeetingPrepStatus = "disabled" | "none_due" | "sent" | "lost_race";

export interface MeetingPrepResult {
  readonly status: MeetingPrepStatus;
  readonly published: number;
}

/** Event id to the start time a prep was sent for. */
const prepStateSchema = z.record(z.number());

function domainOf(address: string): string {
  return address.slice(address.lastIndexOf("@") + 1).toLowerCase();
}

/** True when the address is outside the owner's domain. */
export function isExternal(address: string, owner: string): boolean {
  return domainOf(address) !== domainOf(owner);
}

function durationMinutes(event: Item): number {
  if (event.startAt === null || event.endAt === null) return 0;
  return Math.round((event.endAt - event.startAt) / MINUTE_MS);
}

function round1(value: number): number {
  return Math.round(value * 10) / 10;
}

function clockAt(at: number, timezone: string): string {
  return formatClock(localTime(at, timezone).minutes);
}

/** First rule with any passing test, or null for events too short to prepare for. */
export function matchMeetingRule(
  event: Item,
  settings: Pick<MeetingSettings, "owner" | "rules" | "minDurationMinutes">,
): MeetingRuleConfig | null {
  if (event.kind !== "event" || durationMinutes(event) < settings.minDurationMinutes) return null;

  const subject = event.subject.toLowerCase();
  const attendees = new Set(event.attendees);
  const organizerDomain = event.organizer ? domainOf(event.organizer) : null;
  const hasExternal = event.attendees.some((a) => isExternal(a, settings.owner));

  const rule = settings.rules.find(
    (r) =>
      (r.externalOnly && hasExternal) ||
      (r.minAttendees > 0 && event.attendees.length >= r.minAttendees) ||
      r.keywords.some((k) => subject.includes(k.toLowerCase())) ||
      r.organizerDomains.some((d) => d.toLowerCase() === organizerDomain) ||
      r.vipAttendees.some((v) => attendees.has(v.toLowerCase())),
  );
  return rule ?? null;
}

/** Attendee context, preparation notes and a one-line summary for an event. */
export function prepareMeeting(
  deps: Pick<MeetingDeps, "items" | "memory">,
  event: Item,
  settings: Pick<MeetingSettings, "owner" | "rules" | "minDurationMinutes" | "contextDays">,
  now: number,
): Record<string, unknown> {
  const owner = settings.owner.toLowerCase();
  const since = now - settings.contextDays * DAY_MS;
  const contexts = event.attendees
    .filter((email) => email !== owner)
    .map((email) => {
      const mail = deps.items.correspondenceWith(email, since);
      return {
        email,
        name: deps.memory.getContact(email)?.name ?? null,
        isExternal: isExternal(email, owner),
        recentEmailCount: mail.count,
        lastEmailSubject: mail.lastSubject,
      };
    });
  const externalCount = event.attendees.filter((a) => isExternal(a, owner)).length;

  const notes: string[] = [];
  if (externalCount > 0) notes.push(`${externalCount} external attendee(s)`);
  for (const c of contexts.filter((c) => c.recentEmailCount > 0).slice(0, MAX_CONTACT_NOTES)) {
    notes.push(`Recent emails with ${c.name ?? c.email}: ${c.recentEmailCount} in last ${settings.contextDays} days`);
    if (c.lastEmailSubject) notes.push(`  Last: "${c.lastEmailSubject}"`);
  }
  const quiet = contexts.filter((c) => c.recentEmailCount === 0);
  if (quiet.length > 0 && quiet.length <= MAX_CONTACT_NOTES) {
    for (const c of quiet) notes.push(`No recent emails with ${c.name ?? c.email}`);
  }

  const summary = [`${durationMinutes(event)}-minute meeting`];
  if (event.location) summary.push(`at ${event.location}`);
  if (externalCount > 0) summary.push(`with ${externalCount} external attendee(s)`);

  const iso = (at: number | null): string | null => (at === null ? null : new Date(at).toISOString());
  return {
    event_id: event.id,
    subject: event.subject,
    start_at: iso(event.startAt),
    end_at: iso(event.endAt),
    location: event.location,
    organizer: event.organizer,
    rule_matched: matchMeetingRule(event, settings)?.name ?? null,
    attendee_count: event.attendees.length,
    external_attendee_count: externalCount,
    attendees: contexts.map((c) => ({
      email: c.email,
      name: c.name,
      is_external: c.isExternal,
      recent_email_count: c.recentEmailCount,
      last_email_subject: c.lastEmailSubject,
    })),
    preparation_notes: notes,
    briefing_summary: summary.join(" "),
  };
}

function readPrepState(value: string | null, logger: Logger): Record<string, number> {
  if (value === null) return {};
  let raw: unknown;
  try {
    raw = JSON.parse(value);
  } catch (err) {
    logger.warn({ err }, "Meeting prep state is not JSON, starting over");
    return {};
  }
  const parsed = prepStateSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn("Meeting prep state has an unexpected shape, starting over");
    return {};
  }
  return parsed.data;
}

/**
 * Publishes `meeting_prep_ready` for matching events that start within their
 * rule's lead time. Sent preps are recorded per start time in a versioned
 * poll-state row, so a rescheduled event is prepared again.
 */
export async function emitMeetingPreps(
  deps: MeetingDeps,
  settings: MeetingSettings,
  now: number,
): Promise<MeetingPrepResult> {
  if (!settings.enabled) return { status: "disabled", published: 0 };

  const leadMs = Math.max(0, ...settings.rules.map((r) => r.prepMinutesBefore)) * MINUTE_MS;
  const state = deps.pollState.get(MEETING_PREPS_STATE);
  const sent = readPrepState(state.value, deps.logger);

  let published = 0;
  for (const event of deps.items.listEventsStarting(now, now + leadMs)) {
    if (event.startAt === null || sent[event.id] === event.startAt) continue;
    const rule = matchMeetingRule(event, settings);
    if (!rule || event.startAt - now > rule.prepMinutesBefore * MINUTE_MS) continue;

    await deps.sink.publish({
      type: "meeting_prep_ready",
      primaryId: event.id,
      payload: prepareMeeting(deps, event, settings, now),
    });
    sent[event.id] = event.startAt;
    published++;
  }
  if (published === 0) return { status: "none_due", published };

  const kept = Object.fromEntries(Object.entries(sent).filter(([, startAt]) => startAt >= now - DAY_MS));
  if (!deps.pollState.compareAndSet(MEETING_PREPS_STATE, state.version, JSON.stringify(kept))) {
    deps.logger.warn({ published }, "Meeting prep state moved by another runner");
    return { status: "lost_race", published };
  }
  deps.logger.info({ published }, "Meeting preps published");
  return { status: "sent", published };
}

/** The day's schedule, busy and free hours, preps for matching events and schedule alerts. */
export function buildDailyBriefing(
  deps: Pick<MeetingDeps, "items" | "memory">,
  events: readonly Item[],
  settings: MeetingSettings,
  date: string,
  now: number,
): Record<string, unknown> {
  const tz = settings.timezone;
  const scheduled = events.flatMap((e) =>
    e.startAt === null ? [] : [{ item: e, start: e.startAt, end: e.endAt ?? e.startAt }],
  );
  scheduled.sort((a, b) => a.start - b.start);

  const busyMinutes = scheduled.reduce((sum, e) => sum + (e.end - e.start) / MINUTE_MS, 0);
  const busyHours = round1(busyMinutes / 60);
  const workdayStart = parseTimeOfDay(settings.workdayStart);
  const workHours = (parseTimeOfDay(settings.workdayEnd) - workdayStart) / 60;
  const freeHours = round1(workHours - busyHours);

  const first = scheduled[0];
  const firstTime = first ? clockAt(first.start, tz) : null;

  let summary: string;
  if (scheduled.length === 0) {
    summary = "No meetings scheduled for today.";
  } else if (scheduled.length === 1) {
    summary = `1 meeting today, starting at ${firstTime}.`;
  } else {
    summary =
      `${scheduled.length} meetings today. First at ${firstTime}. ` +
      `~${busyHours}h busy, ~${freeHours}h available.`;
  }

  const preps = scheduled
    .filter((e) => matchMeetingRule(e.item, settings) !== null)
    .map((e) => prepareMeeting(deps, e.item, settings, now));

  const alerts: string[] = [];
  for (let i = 0; i < scheduled.length - 1; i++) {
    const current = scheduled[i];
    const next = scheduled[i + 1];
    if (!current || !next) continue;
    if ((next.start - current.end) / MINUTE_MS < BACK_TO_BACK_MINUTES) {
      alerts.push(
        `Back-to-back: ${current.item.subject} ends at ${clockAt(current.end, tz)}, ` +
          `${next.item.subject} starts immediately after`,
      );
    }
  }
  if (first && localTime(first.start, tz).minutes < workdayStart) {
    alerts.push(`Early meeting at ${firstTime} (before working hours)`);
  }
  if (busyHours > HEAVY_LOAD_HOURS) {
    alerts.push(`Heavy meeting load today (${busyHours}h scheduled)`);
  }

  return {
    date,
    timezone: tz,
    total_meetings: scheduled.length,
    meetings_needing_prep: preps.length,
    schedule_summary: summary,
    first_meeting_time: firstTime,
    busy_hours: busyHours,
    free_hours: freeHours,
    meeting_preps: preps,
    alerts,
  };
}

/** Sends at most one briefing per local day, inside `[briefingTime, + briefingWindowMinutes]`. */
export async function emitDailyBriefing(
  deps: MeetingDeps,
  settings: MeetingSettings,
  now: number,
): Promise<DigestStatus> {
  if (!settings.enabled) return "disabled";
  const local = localTime(now, settings.timezone);
  const start = parseTimeOfDay(settings.briefingTime);
  if (local.minutes < start || local.minutes > start + settings.briefingWindowMinutes) return "outside_window";

  const state = deps.pollState.get(DAILY_BRIEFING_STATE);
  if (state.value === local.date) return "already_sent";

  const events = deps.items
    .listEventsStarting(now - DAY_MS, now + 2 * DAY_MS)
    .filter((e) => e.startAt !== null && localTime(e.startAt, settings.timezone).date === local.date);
  await deps.sink.publish({
    type: "daily_briefing",
    primaryId: local.date,
    payload: buildDailyBriefing(deps, events, settings, local.date, now),
  });

  if (!deps.pollState.compareAndSet(DAILY_BRIEFING_STATE, state.version, local.date)) {
    deps.logger.warn({ date: local.date }, "Briefing state moved by another runner");
    return "lost_race";
  }
  deps.logger.info({ date: local.date }, "Daily briefing published");
  return "sent";
}
