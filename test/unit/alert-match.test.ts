import { describe, it, expect } from "vitest";
import { evaluateCondition, evaluatePredicate, globMatch, summarizeEvent } from "../../src/alerts/match.js";
import type { AlertEvent } from "../../src/alerts/types.js";
import type { Commitment, Thread } from "../../src/memory/types.js";
import { DAY, T0, itemRecord } from "../helpers/fixtures.js";

const email: AlertEvent = {
  type: "email_received",
  id: "msg-1",
  item: itemRecord({
    sender: "counsel@legal.example",
    senderName: "Dana Counsel",
    subject: "Contract redlines",
    bodyText: "Please sign the attached contract.",
    urgency: "today",
    categories: ["Action Required"],
    ccRecipients: ["team@corp.example"],
  }),
  labels: ["vip"],
};

const meeting: AlertEvent = {
  type: "calendar_event",
  id: "evt-1",
  item: itemRecord({
    id: "evt-1",
    kind: "event",
    subject: "Planning offsite",
    organizer: "ceo@corp.example",
    attendees: ["a@corp.example", "b@corp.example", "c@corp.example"],
    location: "Room 4",
    bodyText: "Agenda to follow",
  }),
  labels: [],
};

const thread: Thread = {
  conversationId: "conv-9",
  subject: "Vendor renewal",
  status: "stale",
  needsReply: true,
  urgency: "today",
  lastActivityAt: T0 - 4 * DAY,
  lastSender: "vendor@supplier.example",
  messageCount: 3,
  participants: ["vendor@supplier.example"],
  lastNudgedAt: null,
};

const commitment: Commitment = {
  id: "c-1",
  sourceItemId: "msg-1",
  conversationId: "conv-1",
  description: "Send the signed budget",
  toWhom: "alice@example.com",
  dueBy: T0 - 3 * DAY,
  initialUrgency: "this_week",
  urgency: "today",
  isCompleted: false,
  resolution: null,
  completedAt: null,
  createdAt: T0 - 5 * DAY,
  lastNudgedAt: null,
};

describe("globMatch", () => {
  it("treats * as a wildcard anchored at neither end", () => {
    expect(globMatch("*@legal.example", "counsel@legal.example")).toBe(true);
    expect(globMatch("*@legal.example", "counsel@legalxexample")).toBe(false);
    expect(globMatch("ceo*", "ceo@corp.example")).toBe(true);
  });

  it("matches plain patterns as case-insensitive substrings", () => {
    expect(globMatch("LEGAL", "counsel@legal.example")).toBe(true);
    expect(globMatch("", "x")).toBe(false);
  });
});

describe("evaluatePredicate", () => {
  it("matches senders by address or display name", () => {
    expect(evaluatePredicate({ kind: "sender", patterns: ["*@legal.example"] }, email)).toEqual({
      passed: true,
      reason: "Sender matches '*@legal.example'",
    });
    expect(evaluatePredicate({ kind: "sender", patterns: ["dana"] }, email).passed).toBe(true);
    expect(evaluatePredicate({ kind: "sender", patterns: ["*@other.example"] }, email)).toEqual({
      passed: false,
      reason: "Sender does not match",
    });
  });

  it("checks recipients, including cc", () => {
    expect(evaluatePredicate({ kind: "recipient", patterns: ["team@"] }, email).passed).toBe(true);
  });

  it("checks subject and body keywords", () => {
    expect(evaluatePredicate({ kind: "subject_keyword", keywords: ["invoice", "contract"] }, email)).toEqual({
      passed: true,
      reason: "Subject contains 'contract'",
    });
    expect(evaluatePredicate({ kind: "body_keyword", keywords: ["SIGN"] }, email)).toEqual({
      passed: true,
      reason: "Body contains 'SIGN'",
    });
    expect(evaluatePredicate({ kind: "body_keyword", keywords: ["room 4"] }, meeting).passed).toBe(true);
  });

  it("compares urgency by rank", () => {
    expect(evaluatePredicate({ kind: "urgency_at_least", level: "this_week" }, email)).toEqual({
      passed: true,
      reason: "Urgency today >= this_week",
    });
    expect(evaluatePredicate({ kind: "urgency_at_least", level: "immediate" }, email)).toEqual({
      passed: false,
      reason: "Urgency today < immediate",
    });
    expect(evaluatePredicate({ kind: "urgency_at_least", level: "someday" }, meeting)).toEqual({
      passed: false,
      reason: "No urgency",
    });
  });

  it("checks labels and categories case-insensitively", () => {
    expect(evaluatePredicate({ kind: "label", labels: ["VIP"] }, email).passed).toBe(true);
    expect(evaluatePredicate({ kind: "category", categories: ["action required"] }, email).passed).toBe(true);
    expect(evaluatePredicate({ kind: "category", categories: ["FYI"] }, email)).toEqual({
      passed: false,
      reason: "No matching category",
    });
  });

  it("checks meeting organizer and size", () => {
    expect(evaluatePredicate({ kind: "organizer", patterns: ["ceo@*"] }, meeting).passed).toBe(true);
    expect(evaluatePredicate({ kind: "min_attendees", count: 3 }, meeting)).toEqual({
      passed: true,
      reason: "Has 3 attendees (>= 3)",
    });
    expect(evaluatePredicate({ kind: "min_attendees", count: 4 }, meeting)).toEqual({
      passed: false,
      reason: "Only 3 attendees (< 4)",
    });
  });

  it("reports predicates that do not apply to the event type", () => {
    expect(evaluatePredicate({ kind: "min_attendees", count: 2 }, email)).toEqual({
      passed: false,
      reason: "min_attendees does not apply to email_received",
    });
    expect(evaluatePredicate({ kind: "overdue" }, email)).toEqual({
      passed: false,
      reason: "overdue does not apply to email_received",
    });
  });

  it("treats stale threads awaiting a reply and late commitments as overdue", () => {
    const threadEvent: AlertEvent = { type: "wm_thread", id: "conv-9", thread };
    const commitmentEvent: AlertEvent = { type: "wm_commitment", id: "c-1", commitment, overdue: true };
    expect(evaluatePredicate({ kind: "overdue" }, threadEvent).passed).toBe(true);
    expect(evaluatePredicate({ kind: "overdue" }, commitmentEvent).passed).toBe(true);
    expect(evaluatePredicate({ kind: "sender", patterns: ["*"] }, commitmentEvent).reason).toBe(
      "sender does not apply to wm_commitment",
    );
  });
});

describe("evaluateCondition", () => {
  it("requires every predicate and collects their reasons", () => {
    expect(
      evaluateCondition(
        {
          eventTypes: ["email_received"],
          predicates: [
            { kind: "sender", patterns: ["*@legal.example"] },
            { kind: "subject_keyword", keywords: ["contract"] },
          ],
          semantic: false,
        },
        email,
      ),
    ).toEqual({ matched: true, reasons: ["Sender matches '*@legal.example'", "Subject contains 'contract'"] });
  });

  it("stops at the first failing predicate", () => {
    expect(
      evaluateCondition(
        {
          eventTypes: ["email_received"],
          predicates: [
            { kind: "label", labels: ["finance"] },
            { kind: "subject_keyword", keywords: ["contract"] },
          ],
          semantic: false,
        },
        email,
      ),
    ).toEqual({ matched: false, reasons: ["No matching label"] });
  });

  it("ignores events of types the rule does not watch", () => {
    expect(evaluateCondition({ eventTypes: ["calendar_event"], predicates: [], semantic: true }, email)).toEqual({
      matched: false,
      reasons: ["Event type email_received not watched"],
    });
  });

  it("matches a semantic-only rule on type alone", () => {
    expect(evaluateCondition({ eventTypes: ["email_received"], predicates: [], semantic: true }, email)).toEqual({
      matched: true,
      reasons: ["Matches email_received event"],
    });
  });
});

describe("summarizeEvent", () => {
  it("flattens an email", () => {
    expect(summarizeEvent(email)).toEqual({
      subject: "Contract redlines",
      sender: "counsel@legal.example",
      received_at: "2024-03-04T09:00:00.000Z",
      body_preview: "Can you approve the quarterly budget?",
      urgency: "today",
      categories: ["Action Required"],
      labels: ["vip"],
    });
  });

  it("adds meeting details for calendar events", () => {
    expect(summarizeEvent(meeting)).toMatchObject({
      organizer: "ceo@corp.example",
      attendees: ["a@corp.example", "b@corp.example", "c@corp.example"],
      location: "Room 4",
    });
  });

  it("flattens a commitment", () => {
    expect(summarizeEvent({ type: "wm_commitment", id: "c-1", commitment, overdue: true })).toEqual({
      description: "Send the signed budget",
      to_whom: "alice@example.com",
      due_by: "2024-03-01T09:00:00.000Z",
      urgency: "today",
      overdue: true,
    });
  });
});
