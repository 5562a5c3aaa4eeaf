import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { RetrievalIndex } from "../../src/search/index.js";
import { count } from "../../src/store/rows.js";
import {
  DAY,
  HOUR,
  OWNER,
  T0,
  makeItem,
  openStore,
  silentLogger,
  testConfig,
  type StoreFixture,
} from "../helpers/fixtures.js";

const CLASSIFIED = {
  categories: ["Work", "Finance"],
  urgency: "today",
  requiresReply: true,
  cleanupAction: "keep",
  reason: "Budget sign-off",
  confidence: 0.8,
} as const;

function tableCount(fx: StoreFixture, table: string): number {
  return count(fx.store.raw().prepare(`SELECT COUNT(*) AS cnt FROM ${table}`).get());
}

describe("ItemStore", () => {
  let fx: StoreFixture;

  beforeEach(() => {
    fx = openStore();
  });

  afterEach(() => {
    fx.close();
  });

  describe("upsertItem", () => {
    it("inserts then updates by external id", () => {
      expect(fx.items.upsertItem(makeItem())).toBe("inserted");
      expect(fx.items.upsertItem(makeItem({ subject: "Quarterly budget v2" }))).toBe("updated");
      expect(fx.items.getItem("msg-1")?.subject).toBe("Quarterly budget v2");
      expect(tableCount(fx, "items")).toBe(1);
    });

    it("normalises addresses and derives direction", () => {
      fx.items.upsertItem(makeItem({ sender: "  Alice@Example.COM ", toRecipients: ["Owner@Example.com"] }));
      fx.items.upsertItem(makeItem({ id: "msg-2", sender: OWNER, toRecipients: ["alice@example.com"] }));

      const inbound = fx.items.getItem("msg-1");
      expect(inbound?.sender).toBe("alice@example.com");
      expect(inbound?.toRecipients).toEqual([OWNER]);
      expect(inbound?.direction).toBe("inbound");
      expect(inbound?.isCc).toBe(false);
      expect(fx.items.getItem("msg-2")?.direction).toBe("outbound");
    });

    it("marks the owner-only-on-cc case", () => {
      fx.items.upsertItem(makeItem({ toRecipients: ["bob@example.com"], ccRecipients: [OWNER] }));
      expect(fx.items.getItem("msg-1")?.isCc).toBe(true);
    });

    it("treats an event organised by the owner as outbound", () => {
      fx.items.upsertItem(
        makeItem({ id: "evt-1", kind: "event", sender: "calendar@example.com", organizer: OWNER, startAt: T0 + DAY }),
      );
      const event = fx.items.getItem("evt-1");
      expect(event?.kind).toBe("event");
      expect(event?.direction).toBe("outbound");
      expect(event?.startAt).toBe(T0 + DAY);
    });

    it("starts new items unprocessed and never resets classification on update", () => {
      fx.items.upsertItem(makeItem());
      expect(fx.items.getItem("msg-1")?.state).toBe("unprocessed");

      fx.items.claimBatch("w1", 10, 60_000);
      fx.items.finalize({ itemId: "msg-1", leaseOwner: "w1", outcome: "actioned", classification: CLASSIFIED, error: null });
      fx.items.upsertItem(makeItem({ bodyText: "Edited body" }));

      const item = fx.items.getItem("msg-1");
      expect(item?.state).toBe("processed");
      expect(item?.urgency).toBe("today");
      expect(item?.categories).toEqual(["Work", "Finance"]);
      expect(item?.bodyText).toBe("Edited body");
    });

    it("stores attachments, pending until text is extracted", () => {
      fx.items.upsertItem(
        makeItem({
          attachments: [
            { id: "att-2", filename: "scan.pdf" },
            { id: "att-1", filename: "notes.txt", contentType: "text/plain", size: 12, extractedText: "meeting notes" },
          ],
        }),
      );
      const attachments = fx.items.listAttachments("msg-1");
      expect(attachments.map((a) => [a.id, a.extractionStatus])).toEqual([
        ["att-1", "complete"],
        ["att-2", "pending"],
      ]);
      expect(attachments[0]?.size).toBe(12);
    });

    it("clears the index mark when content changes", () => {
      fx.items.upsertItem(makeItem());
      fx.items.markIndexed("msg-1", T0);
      fx.items.upsertItem(makeItem());
      expect(fx.items.getItem("msg-1")?.indexedAt).toBe(T0);

      fx.items.upsertItem(makeItem({ bodyText: "Changed" }));
      expect(fx.items.getItem("msg-1")?.indexedAt).toBeNull();
    });
  });

  describe("deleteItem", () => {
    async function indexWithAttachments(): Promise<void> {
      fx.items.upsertItem(
        makeItem({
          attachments: [
            { id: "att-1", filename: "budget.xlsx", extractedText: "Budget line items for the quarter" },
            { id: "att-2", filename: "memo.pdf", extractedText: "Memo about travel spending" },
          ],
        }),
      );
      const index = new RetrievalIndex({
        store: fx.store,
        items: fx.items,
        embedTimeoutMs: 1000,
        config: testConfig().search,
        logger: silentLogger,
        clock: fx.clock.now,
      });
      await index.indexPending();
    }

    it("hard-deletes the item with its attachments, chunks and derived rows", async () => {
      await indexWithAttachments();
      fx.items.setLabels("msg-1", [{ label: "finance", confidence: 0.9 }]);
      fx.items.appendTriageLog("msg-1", "actioned", CLASSIFIED, null);
      fx.items.trackReply("msg-1", "Needs approval", T0);
      expect(tableCount(fx, "chunks")).toBe(3);

      expect(fx.items.deleteItem("msg-1")).toEqual({ removed: true, attachments: 2, chunks: 3 });

      for (const table of ["items", "attachments", "chunks", "labels", "triage_log", "reply_tracking"]) {
        expect(tableCount(fx, table)).toBe(0);
      }
      const fts = fx.store.raw().prepare("SELECT COUNT(*) AS cnt FROM chunks_fts WHERE chunks_fts MATCH 'budget'").get();
      expect(count(fts)).toBe(0);
    });

    it("soft-deletes by hiding the row and dropping its chunks", async () => {
      await indexWithAttachments();
      fx.clock.advance(HOUR);

      expect(fx.items.deleteItem("msg-1", "soft")).toEqual({ removed: true, attachments: 0, chunks: 3 });
      expect(fx.items.getItem("msg-1")).toBeNull();
      expect(fx.items.getItem("msg-1", true)?.deletedAt).toBe(T0 + HOUR);
      expect(tableCount(fx, "attachments")).toBe(2);
      expect(tableCount(fx, "chunks")).toBe(0);

      expect(fx.items.deleteItem("msg-1", "soft").removed).toBe(false);
    });

    it("drops obligations and reply tracking sourced from a soft-deleted item", () => {
      fx.items.upsertItem(makeItem());
      fx.items.upsertItem(makeItem({ id: "msg-2" }));
      fx.items.trackReply("msg-1", "Needs approval", T0);
      fx.memory.addCommitment({
        sourceItemId: "msg-1",
        conversationId: "conv-1",
        description: "Send the signed budget",
        dueBy: T0 - 3 * DAY,
        urgency: "this_week",
        createdAt: T0 - 5 * DAY,
      });
      fx.memory.addDecision({
        sourceItemId: "msg-1",
        conversationId: "conv-1",
        question: "Approve the budget?",
        urgency: "today",
        createdAt: T0 - 5 * DAY,
      });
      fx.memory.addObservation({
        sourceItemId: "msg-1",
        conversationId: "conv-1",
        type: "status_update",
        content: "Budget under review",
        importance: 0.5,
        createdAt: T0,
      });
      const kept = fx.memory.addDecision({
        sourceItemId: "msg-2",
        conversationId: "conv-1",
        question: "Book the venue?",
        urgency: "today",
        createdAt: T0,
      });
      fx.items.setLabels("msg-1", [{ label: "finance", confidence: 0.9 }]);

      expect(fx.items.deleteItem("msg-1", "soft").removed).toBe(true);

      expect(fx.memory.listCommitments()).toEqual([]);
      expect(fx.memory.listDecisions().map((d) => d.id)).toEqual([kept]);
      expect(fx.memory.listObservations()).toEqual([]);
      expect(fx.items.getReplyTracking("msg-1")).toBeNull();
      expect(tableCount(fx, "labels")).toBe(1);
    });

    it("revives a soft-deleted item on re-sync", () => {
      fx.items.upsertItem(makeItem());
      fx.items.deleteItem("msg-1", "soft");
      expect(fx.items.upsertItem(makeItem())).toBe("updated");
      expect(fx.items.getItem("msg-1")?.deletedAt).toBeNull();
    });

    it("reports nothing removed for an unknown id", () => {
      expect(fx.items.deleteItem("nope")).toEqual({ removed: false, attachments: 0, chunks: 0 });
    });
  });

  describe("claiming and finalizing", () => {
    beforeEach(() => {
      fx.items.upsertItem(makeItem({ id: "a", receivedAt: T0 }));
      fx.items.upsertItem(makeItem({ id: "b", receivedAt: T0 + 1000 }));
    });

    it("hands concurrent workers disjoint batches, oldest first", () => {
      const first = fx.items.claimBatch("w1", 1, 60_000);
      const second = fx.items.claimBatch("w2", 5, 60_000);
      expect(first.map((i) => i.id)).toEqual(["a"]);
      expect(second.map((i) => i.id)).toEqual(["b"]);
      expect(first[0]?.state).toBe("classifying");
      expect(first[0]?.claims).toBe(1);
      expect(fx.items.claimBatch("w3", 5, 60_000)).toEqual([]);
    });

    it("lets another worker reclaim after the lease expires", () => {
      fx.items.claimBatch("w1", 1, 60_000);
      fx.clock.advance(60_000);
      const reclaimed = fx.items.claimBatch("w2", 1, 60_000);
      expect(reclaimed.map((i) => [i.id, i.claims])).toEqual([["a", 2]]);
      expect(
        fx.items.finalize({ itemId: "a", leaseOwner: "w1", outcome: "actioned", classification: null, error: null }),
      ).toBe(false);
    });

    it("sets processed_at exactly once", () => {
      fx.items.claimBatch("w1", 1, 60_000);
      const params = { itemId: "a", leaseOwner: "w1", outcome: "actioned", classification: CLASSIFIED, error: null } as const;

      expect(fx.items.finalize(params)).toBe(true);
      fx.clock.advance(5000);
      expect(fx.items.finalize(params)).toBe(false);

      const item = fx.items.getItem("a");
      expect(item?.processedAt).toBe(T0);
      expect(item?.outcome).toBe("actioned");
      expect(item?.requiresReply).toBe(true);
      expect(item?.classificationReason).toBe("Budget sign-off");
      expect(fx.items.claimBatch("w1", 5, 60_000).map((i) => i.id)).toEqual(["b"]);
    });

    it("records a failure without classification fields", () => {
      fx.items.claimBatch("w1", 1, 60_000);
      fx.items.finalize({ itemId: "a", leaseOwner: "w1", outcome: "failed", classification: null, error: "classifier down" });
      const item = fx.items.getItem("a");
      expect(item?.outcome).toBe("failed");
      expect(item?.lastError).toBe("classifier down");
      expect(item?.urgency).toBeNull();
    });

    it("releases a lease back to unprocessed", () => {
      fx.items.claimBatch("w1", 1, 60_000);
      expect(fx.items.releaseLease("a", "w2", "wrong owner")).toBe(false);
      expect(fx.items.releaseLease("a", "w1", "timeout")).toBe(true);
      const item = fx.items.getItem("a");
      expect(item?.state).toBe("unprocessed");
      expect(item?.lastError).toBe("timeout");
      expect(fx.items.claimBatch("w2", 1, 60_000).map((i) => i.id)).toEqual(["a"]);
    });

    it("counts items per state", () => {
      fx.items.claimBatch("w1", 1, 60_000);
      expect(fx.items.countByState()).toEqual({
        unprocessed: 1,
        classifying: 1,
        actioned: 0,
        failed: 0,
        processed: 0,
      });
    });
  });

  describe("labels and triage log", () => {
    beforeEach(() => {
      fx.items.upsertItem(makeItem());
    });

    it("lists labels sorted and updates confidence in place", () => {
      fx.items.setLabels("msg-1", [
        { label: "vip", confidence: 1 },
        { label: "finance", confidence: 0.6 },
      ]);
      fx.items.setLabels("msg-1", [{ label: "finance", confidence: 0.9 }]);
      expect(fx.items.listLabels("msg-1")).toEqual([
        { label: "finance", confidence: 0.9 },
        { label: "vip", confidence: 1 },
      ]);
    });

    it("appends triage rows", () => {
      fx.items.appendTriageLog("msg-1", "actioned", CLASSIFIED, null);
      fx.clock.advance(1000);
      fx.items.appendTriageLog("msg-1", "failed", null, "boom");
      const log = fx.items.listTriageLog("msg-1");
      expect(log.map((e) => [e.outcome, e.urgency, e.reason, e.error, e.createdAt])).toEqual([
        ["actioned", "today", "Budget sign-off", null, T0],
        ["failed", null, null, "boom", T0 + 1000],
      ]);
      expect(log[0]?.categories).toEqual(["Work", "Finance"]);
      expect(log[1]?.categories).toEqual([]);
    });
  });

  describe("reply tracking", () => {
    beforeEach(() => {
      fx.items.upsertItem(makeItem({ id: "in-1", receivedAt: T0 - 3 * DAY }));
      fx.items.upsertItem(makeItem({ id: "in-2", receivedAt: T0 - HOUR }));
      fx.items.trackReply("in-1", "Asked for approval", T0 - 3 * DAY);
      fx.items.trackReply("in-2", null, T0 - HOUR);
    });

    it("lists old enough candidates until a follow-up is scheduled", () => {
      expect(fx.items.listFollowupCandidates(T0 - 2 * DAY, 10).map((i) => i.id)).toEqual(["in-1"]);
      expect(fx.items.markFollowupScheduled("in-1", T0)).toBe(true);
      expect(fx.items.markFollowupScheduled("in-1", T0 + 1)).toBe(false);
      expect(fx.items.getReplyTracking("in-1")?.nudgeScheduledAt).toBe(T0);
      expect(fx.items.listFollowupCandidates(T0, 10).map((i) => i.id)).toEqual(["in-2"]);
    });

    it("stops tracking once replied", () => {
      expect(fx.items.markReplied("in-1")).toBe(true);
      expect(fx.items.markReplied("in-1")).toBe(false);
      expect(fx.items.getReplyTracking("in-1")).toEqual({
        itemId: "in-1",
        requiresReply: false,
        reason: "Asked for approval",
        lastActivityAt: T0 - 3 * DAY,
        nudgeScheduledAt: null,
      });
      expect(fx.items.listFollowupCandidates(T0, 10).map((i) => i.id)).toEqual(["in-2"]);
    });

    it("detects a later outbound message in the conversation", () => {
      expect(fx.items.hasLaterOutbound("conv-1", T0 - 3 * DAY)).toBe(false);
      fx.items.upsertItem(makeItem({ id: "out-1", sender: OWNER, toRecipients: ["alice@example.com"], receivedAt: T0 - DAY }));
      expect(fx.items.hasLaterOutbound("conv-1", T0 - 3 * DAY)).toBe(true);
      expect(fx.items.hasLaterOutbound("conv-1", T0 - DAY)).toBe(false);
    });
  });

  describe("listItems", () => {
    beforeEach(() => {
      fx.items.upsertItem(makeItem({ id: "old", receivedAt: T0 - DAY }));
      fx.items.upsertItem(makeItem({ id: "new", receivedAt: T0, conversationId: "conv-2" }));
      fx.items.upsertItem(makeItem({ id: "mid", receivedAt: T0 - HOUR }));
      fx.items.claimBatch("w1", 1, 60_000);
      fx.items.finalize({ itemId: "old", leaseOwner: "w1", outcome: "actioned", classification: CLASSIFIED, error: null });
    });

    it("returns newest first", () => {
      expect(fx.items.listItems().map((i) => i.id)).toEqual(["new", "mid", "old"]);
    });

    it("filters by state, category, conversation and time", () => {
      expect(fx.items.listItems({ state: "processed" }).map((i) => i.id)).toEqual(["old"]);
      expect(fx.items.listItems({ category: "Finance" }).map((i) => i.id)).toEqual(["old"]);
      expect(fx.items.listItems({ conversationId: "conv-2" }).map((i) => i.id)).toEqual(["new"]);
      expect(fx.items.listItems({ since: T0 - HOUR }).map((i) => i.id)).toEqual(["new", "mid"]);
      expect(fx.items.listItems({ limit: 1 }).map((i) => i.id)).toEqual(["new"]);
    });

    it("hides soft-deleted items unless asked", () => {
      fx.items.deleteItem("mid", "soft");
      expect(fx.items.listItems().map((i) => i.id)).toEqual(["new", "old"]);
      expect(fx.items.listItems({ includeDeleted: true }).map((i) => i.id)).toEqual(["new", "mid", "old"]);
    });
  });
});

describe("PollStateStore", () => {
  let fx: StoreFixture;

  beforeEach(() => {
    fx = openStore();
  });

  afterEach(() => {
    fx.close();
  });

  it("reports version 0 for a missing row", () => {
    expect(fx.pollState.get("cursor")).toEqual({ name: "cursor", value: null, version: 0, updatedAt: 0 });
  });

  it("advances only from the expected version", () => {
    expect(fx.pollState.compareAndSet("cursor", 0, "c1")).toBe(true);
    expect(fx.pollState.compareAndSet("cursor", 0, "stale")).toBe(false);
    fx.clock.advance(10);
    expect(fx.pollState.compareAndSet("cursor", 1, "c2")).toBe(true);
    expect(fx.pollState.compareAndSet("cursor", 1, "c3")).toBe(false);
    expect(fx.pollState.get("cursor")).toEqual({ name: "cursor", value: "c2", version: 2, updatedAt: T0 + 10 });
  });
});

describe("EventStore", () => {
  it("reports whether it is open and closes once", () => {
    const fx = openStore();
    expect(fx.store.isOpen()).toBe(true);
    fx.close();
    expect(fx.store.isOpen()).toBe(false);
  });

  it("rolls back a failed transaction", () => {
    const fx = openStore();
    try {
      expect(() =>
        fx.store.transaction(() => {
          fx.items.upsertItem(makeItem());
          throw new Error("abort");
        }),
      ).toThrow("abort");
      expect(fx.items.getItem("msg-1")).toBeNull();
    } finally {
      fx.close();
    }
  });
});
