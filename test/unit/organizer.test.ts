import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { AlertEngine } from "../../src/alerts/engine.js";
import { RuleParser } from "../../src/alerts/parser.js";
import { AlertStore } from "../../src/alerts/store.js";
import { buildTagAction, flagFor, rankCategories } from "../../src/organizer/actions.js";
import { Organizer, classificationText, isVipSender } from "../../src/organizer/organizer.js";
import { classificationSchema } from "../../src/organizer/schema.js";
import { InvalidTransitionError, isTerminal, nextState } from "../../src/organizer/state.js";
import { classificationTriggers } from "../../src/organizer/triggers.js";
import { ValidationError } from "../../src/utils/errors.js";
import {
  DAY,
  FakeClassifier,
  FakeProvider,
  OWNER,
  RecordingSink,
  T0,
  classification,
  itemRecord,
  makeItem,
  openStore,
  silentLogger,
  testConfig,
  type StoreFixture,
} from "../helpers/fixtures.js";

describe("item state machine", () => {
  it("walks a claimed item to processed", () => {
    expect(nextState("unprocessed", "claim")).toBe("classifying");
    expect(nextState("classifying", "reclaim")).toBe("classifying");
    expect(nextState("classifying", "succeed")).toBe("actioned");
    expect(nextState("classifying", "fail")).toBe("failed");
    expect(nextState("actioned", "commit")).toBe("processed");
    expect(nextState("failed", "commit")).toBe("processed");
    expect(isTerminal("processed")).toBe(true);
    expect(isTerminal("actioned")).toBe(false);
  });

  it("rejects transitions out of order", () => {
    expect(() => nextState("processed", "claim")).toThrow(InvalidTransitionError);
    expect(() => nextState("unprocessed", "commit")).toThrow("Invalid transition: commit from unprocessed");
  });
});

describe("provider actions", () => {
  it("flags by urgency", () => {
    expect(flagFor("immediate")).toEqual({ status: "flagged", due: "today" });
    expect(flagFor("this_week")).toEqual({ status: "flagged", due: "this_week" });
    expect(flagFor("someday")).toBeNull();
  });

  it("orders categories by priority and keeps unknown ones last", () => {
    expect(rankCategories(["FYI", "Travel", "Action Required", "FYI", "Hobby"], ["Action Required", "FYI"])).toEqual([
      "Action Required",
      "FYI",
      "Travel",
      "Hobby",
    ]);
  });

  it("builds nothing when there is nothing to apply", () => {
    expect(buildTagAction([], "someday")).toBeNull();
    expect(buildTagAction(["FYI"], "someday")).toEqual({ type: "tag", categories: ["FYI"], flag: null });
  });
});

describe("classificationTriggers", () => {
  const item = itemRecord();

  it("raises urgent and reply triggers keyed by the item", () => {
    const c = classificationSchema.parse(
      classification({ urgency: "today", requiresReply: true, replyReason: "Asked a direct question" }),
    );
    const requests = classificationTriggers(item, c, { urgentAt: "today", timezone: "UTC" });
    expect(requests).toEqual([
      {
        type: "urgent_email",
        primaryId: "msg-1",
        payload: {
          subject: "Quarterly budget",
          sender: "alice@example.com",
          message_id: "msg-1",
          received_at: "2024-03-04T09:00:00.000Z",
          reason: "Routine update",
        },
      },
      {
        type: "reply_needed",
        primaryId: "msg-1",
        payload: {
          message_id: "msg-1",
          subject: "Quarterly budget",
          sender: "alice@example.com",
          received_at: "2024-03-04T09:00:00.000Z",
          reason: "Asked a direct question",
        },
      },
    ]);
  });

  it("stays quiet below the urgency threshold", () => {
    const c = classificationSchema.parse(classification({ urgency: "today" }));
    expect(classificationTriggers(item, c, { urgentAt: "immediate", timezone: "UTC" })).toEqual([]);
  });

  it("fills availability defaults", () => {
    const c = classificationSchema.parse(
      classification({ availability: { timeWindow: "next week", proposedSlots: ["Tue 10:00"] } }),
    );
    const [request] = classificationTriggers(item, c, { urgentAt: "immediate", timezone: "Europe/Berlin" });
    expect(request).toEqual({
      type: "availability_requested",
      primaryId: "msg-1",
      payload: {
        message_id: "msg-1",
        subject: "Quarterly budget",
        time_window: "next week",
        duration_minutes: 30,
        timezone: "Europe/Berlin",
        constraints: null,
        proposed_slots: ["Tue 10:00"],
        requester: "alice@example.com",
      },
    });
  });
});

describe("classificationText", () => {
  it("puts headers above the body", () => {
    expect(classificationText(itemRecord({ ccRecipients: ["bob@example.com"] }))).toBe(
      "Subject: Quarterly budget\n" +
        "From: Alice <alice@example.com>\n" +
        "To: owner@example.com\n" +
        "Cc: bob@example.com\n\n" +
        "Can you approve the quarterly budget by Friday?",
    );
  });

  it("matches VIP senders exactly or by glob", () => {
    expect(isVipSender("Boss@Example.com", ["boss@example.com"])).toBe(true);
    expect(isVipSender("chair@board.example", ["*@board.example"])).toBe(true);
    expect(isVipSender("alice@example.com", undefined)).toBe(false);
  });
});

describe("Organizer", () => {
  let fx: StoreFixture;
  let sink: RecordingSink;

  beforeEach(() => {
    fx = openStore();
    sink = new RecordingSink();
  });

  afterEach(() => {
    fx.close();
  });

  function makeOrganizer(opts: {
    classifier: FakeClassifier;
    provider?: FakeProvider;
    alerts?: AlertEngine;
    backfill?: boolean;
    organizer?: Record<string, unknown>;
  }): Organizer {
    const config = testConfig({ organizer: { retryBaseDelayMs: 0, maxAttempts: 2, ...opts.organizer } });
    return new Organizer({
      store: fx.store,
      items: fx.items,
      memory: fx.memory,
      sink,
      classifier: opts.classifier,
      ...(opts.provider ? { provider: opts.provider } : {}),
      ...(opts.alerts ? { alerts: opts.alerts } : {}),
      preferences: fx.preferences,
      config: config.organizer,
      owner: OWNER,
      backfill: opts.backfill ?? false,
      defaultTimezone: "UTC",
      actionTimeoutMs: 1000,
      logger: silentLogger,
      workerId: "w1",
      clock: fx.clock.now,
    });
  }

  it("returns an empty result when nothing is waiting", async () => {
    const organizer = makeOrganizer({ classifier: new FakeClassifier(() => classification()) });
    expect(await organizer.runCycle()).toEqual({ claimed: 0, actioned: 0, failed: 0, lost: 0 });
  });

  it("classifies, tags, notifies and commits an urgent message", async () => {
    fx.items.upsertItem(makeItem());
    const provider = new FakeProvider();
    const classifier = new FakeClassifier(() =>
      classification({
        categories: ["Work", "Action Required"],
        urgency: "immediate",
        requiresReply: true,
        replyReason: "Needs approval",
      }),
    );
    const organizer = makeOrganizer({ classifier, provider });

    expect(await organizer.runCycle()).toEqual({ claimed: 1, actioned: 1, failed: 0, lost: 0 });

    expect(sink.types()).toEqual(["urgent_email", "reply_needed"]);
    expect(provider.actions).toEqual([
      {
        itemId: "msg-1",
        action: { type: "tag", categories: ["Action Required", "Work"], flag: { status: "flagged", due: "today" } },
      },
    ]);

    const item = fx.items.getItem("msg-1");
    expect(item).toMatchObject({
      state: "processed",
      outcome: "actioned",
      processedAt: T0,
      categories: ["Action Required", "Work"],
      urgency: "immediate",
      requiresReply: true,
      lastError: null,
    });
    expect(fx.items.listTriageLog("msg-1").map((e) => [e.outcome, e.urgency, e.categories])).toEqual([
      ["actioned", "immediate", ["Action Required", "Work"]],
    ]);
    expect(fx.items.getReplyTracking("msg-1")).toEqual({
      itemId: "msg-1",
      requiresReply: true,
      reason: "Needs approval",
      lastActivityAt: T0,
      nudgeScheduledAt: null,
    });

    expect(classifier.calls[0]?.context).toMatchObject({ kind: "message", direction: "inbound", ccMode: false });
    expect(await organizer.runCycle()).toEqual({ claimed: 0, actioned: 0, failed: 0, lost: 0 });
  });

  it("records extracted facts against the source message", async () => {
    fx.items.upsertItem(makeItem());
    const organizer = makeOrganizer({
      classifier: new FakeClassifier(() =>
        classification({
          facts: {
            decisions: [{ question: "Approve the budget?", options: ["yes", "no"] }],
            commitments: [{ description: "Send figures", dueBy: "2024-03-08T17:00:00Z" }],
            observations: [{ type: "deadline_mentioned", content: "Budget due Friday", importance: 0.7 }],
          },
        }),
      ),
    });

    await organizer.runCycle();

    expect(fx.memory.listDecisions()).toMatchObject([
      {
        sourceItemId: "msg-1",
        conversationId: "conv-1",
        question: "Approve the budget?",
        requester: "alice@example.com",
        options: ["yes", "no"],
        dueBy: null,
        urgency: "this_week",
        createdAt: T0,
      },
    ]);
    expect(fx.memory.listCommitments()).toMatchObject([
      { description: "Send figures", toWhom: "alice@example.com", dueBy: Date.UTC(2024, 2, 8, 17, 0, 0) },
    ]);
    expect(fx.memory.listObservations().map((o) => [o.type, o.content, o.importance])).toEqual([
      ["deadline_mentioned", "Budget due Friday", 0.7],
    ]);
  });

  it("only observes messages where the owner is on Cc", async () => {
    fx.items.upsertItem(makeItem({ toRecipients: ["team@example.com"], ccRecipients: [OWNER] }));
    const classifier = new FakeClassifier(() =>
      classification({
        urgency: "immediate",
        requiresReply: true,
        facts: { decisions: [{ question: "Ship it?" }] },
      }),
    );
    const organizer = makeOrganizer({ classifier });

    expect((await organizer.runCycle()).actioned).toBe(1);

    expect(classifier.calls[0]?.context.ccMode).toBe(true);
    expect(sink.requests).toEqual([]);
    expect(fx.items.getReplyTracking("msg-1")).toBeNull();
    expect(fx.memory.listDecisions()).toEqual([]);
    expect(fx.memory.listObservations().map((o) => [o.type, o.content, o.importance])).toEqual([
      ["context_learned", "Observed thread: Quarterly budget", 0.3],
    ]);
  });

  it("retries malformed output and fails once attempts run out", async () => {
    fx.items.upsertItem(makeItem());
    const classifier = new FakeClassifier(() => ({ urgency: "asap" }));
    const organizer = makeOrganizer({ classifier });

    expect(await organizer.runCycle()).toEqual({ claimed: 1, actioned: 0, failed: 1, lost: 0 });
    expect(classifier.calls).toHaveLength(2);

    const item = fx.items.getItem("msg-1");
    expect(item?.outcome).toBe("failed");
    expect(item?.processedAt).toBe(T0);
    expect(item?.urgency).toBeNull();
    expect(item?.lastError?.startsWith("Malformed classifier output: ")).toBe(true);
    expect(fx.items.listTriageLog("msg-1").map((e) => [e.outcome, e.urgency])).toEqual([["failed", null]]);
  });

  it("accepts output that becomes valid on a retry", async () => {
    fx.items.upsertItem(makeItem());
    let attempts = 0;
    const classifier = new FakeClassifier(() => (++attempts === 1 ? "not json" : classification()));
    expect((await makeOrganizer({ classifier }).runCycle()).actioned).toBe(1);
    expect(classifier.calls).toHaveLength(2);
  });

  it("retries a classifier call that exceeds its timeout", async () => {
    fx.items.upsertItem(makeItem());
    let attempts = 0;
    const classifier = new FakeClassifier(() =>
      ++attempts === 1 ? new Promise<never>(() => undefined) : classification(),
    );
    const organizer = makeOrganizer({ classifier, organizer: { classifyTimeoutMs: 20 } });

    expect(await organizer.runCycle()).toEqual({ claimed: 1, actioned: 1, failed: 0, lost: 0 });
    expect(classifier.calls).toHaveLength(2);
    expect(fx.items.getItem("msg-1")?.outcome).toBe("actioned");
  });

  it("fails a processed item when every classifier call times out", async () => {
    fx.items.upsertItem(makeItem());
    const classifier = new FakeClassifier(() => new Promise<never>(() => undefined));
    const organizer = makeOrganizer({ classifier, organizer: { classifyTimeoutMs: 20 } });

    expect(await organizer.runCycle()).toEqual({ claimed: 1, actioned: 0, failed: 1, lost: 0 });
    expect(classifier.calls).toHaveLength(2);
    const item = fx.items.getItem("msg-1");
    expect(item?.outcome).toBe("failed");
    expect(item?.processedAt).toBe(T0);
    expect(item?.lastError).toBe("classify timed out after 20ms");
  });

  it("does not retry a classifier error that is not transient", async () => {
    fx.items.upsertItem(makeItem());
    const classifier = new FakeClassifier(() => {
      throw new ValidationError("classifier rejected the request");
    });

    expect(await makeOrganizer({ classifier }).runCycle()).toEqual({ claimed: 1, actioned: 0, failed: 1, lost: 0 });
    expect(classifier.calls).toHaveLength(1);
    expect(fx.items.getItem("msg-1")?.lastError).toBe("classifier rejected the request");
  });

  it("fails poison items without classifying them", async () => {
    fx.items.upsertItem(makeItem());
    fx.items.claimBatch("crashed-worker", 10, 1000);
    fx.clock.advance(1000);
    const classifier = new FakeClassifier(() => classification());
    const organizer = makeOrganizer({ classifier, organizer: { maxClaims: 1 } });

    expect(await organizer.runCycle()).toEqual({ claimed: 1, actioned: 0, failed: 1, lost: 0 });
    expect(classifier.calls).toEqual([]);
    expect(fx.items.getItem("msg-1")?.lastError).toBe("Exceeded 1 claims");
  });

  it("fails the item when the provider rejects the action", async () => {
    fx.items.upsertItem(makeItem());
    const provider = new FakeProvider();
    provider.failActions = true;
    const organizer = makeOrganizer({ classifier: new FakeClassifier(() => classification()), provider });

    expect(await organizer.runCycle()).toEqual({ claimed: 1, actioned: 0, failed: 1, lost: 0 });
    const item = fx.items.getItem("msg-1");
    expect(item?.lastError).toBe("Provider action failed: provider rejected action");
    expect(item?.urgency).toBe("this_week");
    expect(provider.actionAttempts).toBe(2);
  });

  it("labels VIP senders", async () => {
    await fx.preferences.set(OWNER, "vipSenders", ["alice@example.com"]);
    fx.items.upsertItem(makeItem());
    const classifier = new FakeClassifier(() => classification({ labels: ["Finance", "finance"], confidence: 0.8 }));

    await makeOrganizer({ classifier }).runCycle();

    expect(classifier.calls[0]?.context.vip).toBe(true);
    expect(fx.items.listLabels("msg-1")).toEqual([
      { label: "finance", confidence: 0.8 },
      { label: "vip", confidence: 0.8 },
    ]);
  });

  it("sends no triggers while backfilling", async () => {
    fx.items.upsertItem(makeItem());
    const classifier = new FakeClassifier(() => classification({ urgency: "immediate", requiresReply: true }));

    expect((await makeOrganizer({ classifier, backfill: true }).runCycle()).actioned).toBe(1);
    expect(sink.requests).toEqual([]);
    expect(fx.items.getReplyTracking("msg-1")?.requiresReply).toBe(true);
  });

  it("neither tags nor notifies for calendar events", async () => {
    fx.items.upsertItem(
      makeItem({ id: "evt-1", kind: "event", organizer: "ceo@corp.example", startAt: T0 + DAY, subject: "Offsite" }),
    );
    const provider = new FakeProvider();
    const classifier = new FakeClassifier(() => classification({ urgency: "immediate" }));

    expect((await makeOrganizer({ classifier, provider }).runCycle()).actioned).toBe(1);
    expect(provider.actions).toEqual([]);
    expect(sink.requests).toEqual([]);
    expect(classifier.calls[0]?.text.split("\n").slice(0, 2)).toEqual(["Subject: Offsite", "From: Alice <alice@example.com>"]);
  });

  it("discards the result when another worker took the lease", async () => {
    fx.items.upsertItem(makeItem());
    const classifier = new FakeClassifier(() => {
      fx.items.releaseLease("msg-1", "w1", null);
      fx.items.claimBatch("w2", 1, 60_000);
      return classification();
    });

    expect(await makeOrganizer({ classifier }).runCycle()).toEqual({ claimed: 1, actioned: 0, failed: 0, lost: 1 });
    expect(fx.items.getItem("msg-1")?.state).toBe("classifying");
    expect(fx.items.listTriageLog("msg-1")).toEqual([]);
  });

  it("evaluates alert rules after commit for direct messages only", async () => {
    const alertStore = new AlertStore(fx.store, fx.clock.now);
    const alerts = new AlertEngine({
      store: alertStore,
      sink,
      parser: new RuleParser({ timeoutMs: 100, logger: silentLogger }),
      semanticTimeoutMs: 100,
      defaultCooldownMinutes: 30,
      logger: silentLogger,
      clock: fx.clock.now,
    });
    await alerts.addRule("subject contains budget");
    fx.items.upsertItem(makeItem());
    fx.items.upsertItem(
      makeItem({ id: "msg-2", receivedAt: T0 + 1, toRecipients: ["team@example.com"], ccRecipients: [OWNER] }),
    );

    await makeOrganizer({ classifier: new FakeClassifier(() => classification()), alerts }).runCycle();

    expect(sink.types()).toEqual(["alert_rule_triggered"]);
    expect(alertStore.listHistory().map((h) => h.eventId)).toEqual(["msg-1"]);
  });
});
