import { urgencyRank, type Urgency } from "../store/types.js";
import type { AlertCondition, AlertEvent, AlertPredicate } from "./types.js";

export interface PredicateResult {
  readonly passed: boolean;
  readonly reason: string;
}

export interface ConditionResult {
  readonly matched: boolean;
  readonly reasons: readonly string[];
}

/**
 * `*` is a wildcard; anything else matches literally. Patterns without a
 * wildcard are substring matches. Both ignore case.
 */
export function globMatch(pattern: string, value: string): boolean {
  const p = pattern.toLowerCase();
  const v = value.toLowerCase();
  if (p === "" || v === "") return false;
  if (!p.includes("*")) return v.includes(p);
  const source = p
    .split("*")
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
    .join(".*");
  return new RegExp(source).test(v);
}

function containsAny(keywords: readonly string[], haystack: string | null): string | null {
  if (!haystack) return null;
  const lower = haystack.toLowerCase();
  return keywords.find((kw) => lower.includes(kw.toLowerCase())) ?? null;
}

function matchAnyPattern(patterns: readonly string[], values: readonly (string | null)[]): string | null {
  for (const pattern of patterns) {
    if (values.some((v) => v !== null && globMatch(pattern, v))) return pattern;
  }
  return null;
}

const notApplicable = (kind: string, event: AlertEvent): PredicateResult => ({
  passed: false,
  reason: `${kind} does not apply to ${event.type}`,
});

function senderOf(event: AlertEvent): (string | null)[] | null {
  switch (event.type) {
    case "email_received":
    case "email_sent":
    case "calendar_event":
      return [event.item.sender, event.item.senderName];
    case "wm_thread":
      return [event.thread.lastSender];
    case "wm_decision":
      return [event.decision.requester];
    case "wm_commitment":
      return null;
  }
}

function subjectOf(event: AlertEvent): string {
  switch (event.type) {
    case "email_received":
    case "email_sent":
    case "calendar_event":
      return event.item.subject;
    case "wm_thread":
      return event.thread.subject;
    case "wm_decision":
      return event.decision.question;
    case "wm_commitment":
      return event.commitment.description;
  }
}

function bodyOf(event: AlertEvent): string | null {
  switch (event.type) {
    case "email_received":
    case "email_sent":
      return event.item.bodyText ?? event.item.bodyPreview;
    case "calendar_event":
      return [event.item.bodyText ?? event.item.bodyPreview, event.item.location ?? ""].join("\n");
    case "wm_decision":
      return event.decision.context;
    case "wm_thread":
    case "wm_commitment":
      return null;
  }
}

function urgencyOf(event: AlertEvent): Urgency | null {
  switch (event.type) {
    case "email_received":
    case "email_sent":
    case "calendar_event":
      return event.item.urgency;
    case "wm_thread":
      return event.thread.urgency;
    case "wm_decision":
      return event.decision.urgency;
    case "wm_commitment":
      return event.commitment.urgency;
  }
}

function isOverdue(event: AlertEvent): boolean | null {
  switch (event.type) {
    case "wm_thread":
      return event.thread.needsReply && event.thread.status !== "active";
    case "wm_decision":
    case "wm_commitment":
      return event.overdue;
    case "email_received":
    case "email_sent":
    case "calendar_event":
      return null;
  }
}

export function evaluatePredicate(predicate: AlertPredicate, event: AlertEvent): PredicateResult {
  switch (predicate.kind) {
    case "sender": {
      const senders = senderOf(event);
      if (senders === null) return notApplicable(predicate.kind, event);
      const hit = matchAnyPattern(predicate.patterns, senders);
      return hit
        ? { passed: true, reason: `Sender matches '${hit}'` }
        : { passed: false, reason: "Sender does not match" };
    }
    case "recipient": {
      if (event.type !== "email_received" && event.type !== "email_sent" && event.type !== "calendar_event") {
        return notApplicable(predicate.kind, event);
      }
      const recipients =
        event.type === "calendar_event"
          ? event.item.attendees
          : [...event.item.toRecipients, ...event.item.ccRecipients];
      const hit = matchAnyPattern(predicate.patterns, recipients);
      return hit
        ? { passed: true, reason: `Recipient matches '${hit}'` }
        : { passed: false, reason: "No recipient matches" };
    }
    case "subject_keyword": {
      const hit = containsAny(predicate.keywords, subjectOf(event));
      return hit
        ? { passed: true, reason: `Subject contains '${hit}'` }
        : { passed: false, reason: "Subject has no keyword" };
    }
    case "body_keyword": {
      const body = bodyOf(event);
      if (body === null) return notApplicable(predicate.kind, event);
      const hit = containsAny(predicate.keywords, body);
      return hit
        ? { passed: true, reason: `Body contains '${hit}'` }
        : { passed: false, reason: "Body has no keyword" };
    }
    case "urgency_at_least": {
      const urgency = urgencyOf(event);
      if (urgency === null) return { passed: false, reason: "No urgency" };
      return urgencyRank(urgency) >= urgencyRank(predicate.level)
        ? { passed: true, reason: `Urgency ${urgency} >= ${predicate.level}` }
        : { passed: false, reason: `Urgency ${urgency} < ${predicate.level}` };
    }
    case "label": {
      if (event.type !== "email_received" && event.type !== "email_sent" && event.type !== "calendar_event") {
        return notApplicable(predicate.kind, event);
      }
      const have = new Set(event.labels.map((l) => l.toLowerCase()));
      const hit = predicate.labels.find((l) => have.has(l.toLowerCase()));
      return hit ? { passed: true, reason: `Has label '${hit}'` } : { passed: false, reason: "No matching label" };
    }
    case "category": {
      if (event.type !== "email_received" && event.type !== "email_sent" && event.type !== "calendar_event") {
        return notApplicable(predicate.kind, event);
      }
      const have = new Set(event.item.categories.map((c) => c.toLowerCase()));
      const hit = predicate.categories.find((c) => have.has(c.toLowerCase()));
      return hit
        ? { passed: true, reason: `Has category '${hit}'` }
        : { passed: false, reason: "No matching category" };
    }
    case "organizer": {
      if (event.type !== "calendar_event") return notApplicable(predicate.kind, event);
      const hit = matchAnyPattern(predicate.patterns, [event.item.organizer]);
      return hit
        ? { passed: true, reason: `Organizer matches '${hit}'` }
        : { passed: false, reason: "Organizer does not match" };
    }
    case "min_attendees": {
      if (event.type !== "calendar_event") return notApplicable(predicate.kind, event);
      const n = event.item.attendees.length;
      return n >= predicate.count
        ? { passed: true, reason: `Has ${n} attendees (>= ${predicate.count})` }
        : { passed: false, reason: `Only ${n} attendees (< ${predicate.count})` };
    }
    case "overdue": {
      const overdue = isOverdue(event);
      if (overdue === null) return notApplicable(predicate.kind, event);
      return overdue ? { passed: true, reason: "Item is overdue" } : { passed: false, reason: "Item is not overdue" };
    }
    default: {
      const unreachable: never = predicate;
      return unreachable;
    }
  }
}

/** Conjunction of every predicate; stops at the first failure. */
export function evaluateCondition(condition: AlertCondition, event: AlertEvent): ConditionResult {
  if (!condition.eventTypes.includes(event.type)) {
    return { matched: false, reasons: [`Event type ${event.type} not watched`] };
  }
  const reasons: string[] = [];
  for (const predicate of condition.predicates) {
    const result = evaluatePredicate(predicate, event);
    if (!result.passed) return { matched: false, reasons: [result.reason] };
    reasons.push(result.reason);
  }
  if (reasons.length === 0) reasons.push(`Matches ${event.type} event`);
  return { matched: true, reasons };
}

/** Flat summary of an event for trigger payloads and the semantic matcher. */
export function summarizeEvent(event: AlertEvent): Record<string, unknown> {
  switch (event.type) {
    case "email_received":
    case "email_sent":
    case "calendar_event":
      return {
        subject: event.item.subject,
        sender: event.item.sender,
        received_at: new Date(event.item.receivedAt).toISOString(),
        body_preview: event.item.bodyPreview,
        urgency: event.item.urgency,
        categories: event.item.categories,
        labels: event.labels,
        ...(event.type === "calendar_event"
          ? { organizer: event.item.organizer, attendees: event.item.attendees, location: event.item.location }
          : {}),
      };
    case "wm_thread":
      return {
        subject: event.thread.subject,
        sender: event.thread.lastSender,
        status: event.thread.status,
        needs_reply: event.thread.needsReply,
        urgency: event.thread.urgency,
      };
    case "wm_commitment":
      return {
        description: event.commitment.description,
        to_whom: event.commitment.toWhom,
        due_by: event.commitment.dueBy === null ? null : new Date(event.commitment.dueBy).toISOString(),
        urgency: event.commitment.urgency,
        overdue: event.overdue,
      };
    case "wm_decision":
      return {
        question: event.decision.question,
        requester: event.decision.requester,
        urgency: event.decision.urgency,
        overdue: event.overdue,
      };
  }
}
