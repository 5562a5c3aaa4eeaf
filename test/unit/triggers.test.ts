import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, readFileSync, readdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { TriggerConsumer } from "../../src/triggers/consumer.js";
import { TriggerPublisher, makeDedupeKey } from "../../src/triggers/publisher.js";
import { triggerEnvelopeSchema, type TriggerEnvelope } from "../../src/triggers/types.js";
import { DAY, ManualClock, OWNER, makeTempDir, removeDir, silentLogger } from "../helpers/fixtures.js";

describe("trigger queue", () => {
  let dir: string;
  let clock: ManualClock;
  let publisher: TriggerPublisher;
  let consumer: TriggerConsumer;

  beforeEach(() => {
    dir = makeTempDir();
    clock = new ManualClock();
    publisher = new TriggerPublisher({
      dir,
      capability: "steward",
      user: OWNER,
      dedupeTtlDays: 7,
      defaultRouting: { channel: "default" },
      logger: silentLogger,
      clock: clock.now,
    });
    consumer = new TriggerConsumer(dir, silentLogger, clock.now);
  });

  afterEach(() => {
    removeDir(dir);
  });

  describe("TriggerPublisher", () => {
    it("builds the dedupe key from capability, type, user and entity", () => {
      expect(makeDedupeKey("steward", "urgent_email", OWNER, "msg-1")).toBe(
        "steward:urgent_email:owner@example.com:msg-1",
      );
    });

    it("writes a complete envelope into outbox/", async () => {
      const result = await publisher.publish({ type: "urgent_email", primaryId: "msg-1", payload: { subject: "Hi" } });
      expect(result.published).toBe(true);

      const files = readdirSync(join(dir, "outbox"));
      expect(files).toEqual([`${result.trigger.id}.json`]);

      const written: unknown = JSON.parse(readFileSync(join(dir, "outbox", files[0] ?? ""), "utf-8"));
      const envelope = triggerEnvelopeSchema.parse(written);
      expect(envelope).toEqual({
        id: result.trigger.id,
        capability: "steward",
        user: OWNER,
        type: "urgent_email",
        created_at: "2024-03-04T09:00:00.000Z",
        dedupe_key: "steward:urgent_email:owner@example.com:msg-1",
        payload: { subject: "Hi" },
        routing: { channel: "default" },
      });
    });

    it("suppresses a repeat within the dedupe window and allows it after", async () => {
      const request = { type: "reply_needed", primaryId: "msg-1", payload: {} } as const;
      expect((await publisher.publish(request)).published).toBe(true);

      clock.advance(6 * DAY);
      expect((await publisher.publish(request)).published).toBe(false);
      expect(readdirSync(join(dir, "outbox"))).toHaveLength(1);

      clock.advance(DAY);
      expect((await publisher.publish(request)).published).toBe(true);
      expect(readdirSync(join(dir, "outbox"))).toHaveLength(2);
    });

    it("dedupes per type and entity", async () => {
      await publisher.publish({ type: "reply_needed", primaryId: "msg-1", payload: {} });
      expect((await publisher.publish({ type: "urgent_email", primaryId: "msg-1", payload: {} })).published).toBe(true);
      expect((await publisher.publish({ type: "reply_needed", primaryId: "msg-2", payload: {} })).published).toBe(true);
    });

    it("bypasses markers on request and after release", async () => {
      const request = { type: "alert_rule_triggered", primaryId: "rule:x", payload: {} } as const;
      await publisher.publish(request);
      expect((await publisher.publish({ ...request, skipDedupe: true })).published).toBe(true);

      await publisher.releaseMarker(makeDedupeKey("steward", request.type, OWNER, request.primaryId));
      expect((await publisher.publish(request)).published).toBe(true);
    });

    it("uses per-request routing over the default", async () => {
      const result = await publisher.publish({
        type: "urgent_email",
        primaryId: "msg-9",
        payload: {},
        routing: { channel: "sms", target: "+100" },
      });
      expect(result.trigger.routing).toEqual({ channel: "sms", target: "+100" });
    });

    it("leaves no temp file or marker behind when the final rename fails", async () => {
      const fixed = new TriggerPublisher({
        dir,
        capability: "steward",
        user: OWNER,
        dedupeTtlDays: 7,
        logger: silentLogger,
        clock: clock.now,
        newId: () => "trigger-1",
      });
      const blocker = join(dir, "outbox", "trigger-1.json");
      mkdirSync(join(blocker, "occupied"), { recursive: true });
      const request = { type: "urgent_email", primaryId: "msg-1", payload: {} } as const;

      await expect(fixed.publish(request)).rejects.toThrow();
      expect(readdirSync(join(dir, "outbox"))).toEqual(["trigger-1.json"]);
      expect(readdirSync(join(dir, "dedupe"))).toEqual([]);

      rmSync(blocker, { recursive: true });
      expect((await fixed.publish(request)).published).toBe(true);
      expect(readdirSync(join(dir, "outbox"))).toEqual(["trigger-1.json"]);
    });

    it("keeps keys with slashes inside the dedupe directory", async () => {
      await publisher.publish({ type: "urgent_email", primaryId: "a/b", payload: {} });
      expect(readdirSync(join(dir, "dedupe"))).toEqual(["steward:urgent_email:owner@example.com:a_b"]);
    });
  });

  describe("TriggerConsumer", () => {
    it("claims, completes and lists triggers by state", async () => {
      const { trigger } = await publisher.publish({ type: "urgent_email", primaryId: "msg-1", payload: {} });

      const claim = await consumer.claimNext();
      expect(claim?.envelope.id).toBe(trigger.id);
      expect(await consumer.list("outbox")).toEqual([]);
      expect((await consumer.list("processing")).map((f) => f.id)).toEqual([trigger.id]);
      expect(await consumer.claimNext()).toBeNull();

      if (claim) await consumer.complete(claim);
      expect((await consumer.list("done")).map((f) => f.id)).toEqual([trigger.id]);
    });

    it("lets only one claimant win", async () => {
      const { trigger } = await publisher.publish({ type: "urgent_email", primaryId: "msg-1", payload: {} });
      const [a, b] = await Promise.all([consumer.claim(trigger.id), consumer.claim(trigger.id)]);
      expect([a, b].filter((c) => c !== null)).toHaveLength(1);
    });

    it("moves malformed files to rejected/", async () => {
      mkdirSync(join(dir, "outbox"), { recursive: true });
      writeFileSync(join(dir, "outbox", "bad.json"), "{ not json");
      writeFileSync(join(dir, "outbox", "partial.json.tmp"), "{}");

      expect(await consumer.drain(async () => {})).toEqual({ completed: 0, failed: 0, rejected: 1 });
      expect(existsSync(join(dir, "rejected", "bad.json"))).toBe(true);
      expect(existsSync(join(dir, "outbox", "partial.json.tmp"))).toBe(true);
    });

    it("releases triggers whose handler fails", async () => {
      await publisher.publish({ type: "urgent_email", primaryId: "msg-1", payload: {} });
      await publisher.publish({ type: "urgent_email", primaryId: "msg-2", payload: {} });
      const seen: TriggerEnvelope[] = [];

      const result = await consumer.drain(async (t) => {
        seen.push(t);
        if (t.dedupe_key.endsWith(":msg-2")) throw new Error("downstream busy");
      });

      expect(result).toEqual({ completed: 1, failed: 1, rejected: 0 });
      expect(seen).toHaveLength(2);
      const remaining = await consumer.list("outbox");
      expect(remaining).toHaveLength(1);
      expect((await consumer.list("done")).length).toBe(1);
    });

    it("recovers claims abandoned for longer than the lease", async () => {
      const { trigger } = await publisher.publish({ type: "urgent_email", primaryId: "msg-1", payload: {} });
      await consumer.claim(trigger.id);

      clock.advance(59_000);
      expect(await consumer.recoverStale(60_000)).toBe(0);
      clock.advance(1_000);
      expect(await consumer.recoverStale(60_000)).toBe(1);
      expect((await consumer.list("outbox")).map((f) => f.id)).toEqual([trigger.id]);
    });

    it("requeues finished triggers", async () => {
      const { trigger } = await publisher.publish({ type: "urgent_email", primaryId: "msg-1", payload: {} });
      await consumer.drain(async () => {});
      expect(await consumer.requeue(trigger.id)).toBe(true);
      expect((await consumer.list("outbox")).map((f) => f.id)).toEqual([trigger.id]);
      expect(await consumer.requeue("unknown")).toBe(false);
    });

    it("reports paths per state", () => {
      expect(consumer.pathFor("done")).toBe(join(dir, "done"));
      expect(consumer.pathFor("outbox", "abc")).toBe(join(dir, "outbox", "abc.json"));
    });
  });
});
