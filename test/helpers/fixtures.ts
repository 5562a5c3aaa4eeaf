import { randomUUID } from "node:crypto";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import pino from "pino";
import type { CommandRunner } from "../../src/adapters/command-runner.js";
import type { SemanticMatch, SemanticMatchPort } from "../../src/alerts/types.js";
import { parseConfig } from "../../src/config/schema.js";
import type { StewardConfig } from "../../src/config/types.js";
import { MemoryStore } from "../../src/memory/store.js";
import type {
  ClassificationInput,
  ClassificationPort,
  ProviderAction,
  ProviderActionPort,
} from "../../src/organizer/types.js";
import { PreferenceStore } from "../../src/preferences/store.js";
import type { EmbeddingPort } from "../../src/search/embeddings.js";
import { EventStore } from "../../src/store/db.js";
import { ItemStore, type UpsertItemParams } from "../../src/store/items.js";
import { PollStateStore } from "../../src/store/poll-state.js";
import type { ProviderSyncPort } from "../../src/sync/service.js";
import { makeDedupeKey } from "../../src/triggers/publisher.js";
import type { PublishRequest, PublishResult, TriggerSink } from "../../src/triggers/types.js";
import type { Item } from "../../src/store/types.js";
import { TransientError } from "../../src/utils/errors.js";

export const silentLogger = pino({ level: "silent" });

export const OWNER = "owner@example.com";
export const HOUR = 3_600_000;
export const DAY = 24 * HOUR;
/** Monday 2024-03-04 09:00 UTC. */
export const T0 = Date.UTC(2024, 2, 4, 9, 0, 0);

export function makeTempDir(prefix = "steward-test-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export class ManualClock {
  constructor(public current: number = T0) {}

  readonly now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }

  set(at: number): void {
    this.current = at;
  }
}

export function testConfig(raw: Record<string, unknown> = {}): StewardConfig {
  return parseConfig({ mailbox: { owner: OWNER }, logging: { level: "silent" }, ...raw });
}

export interface StoreFixture {
  readonly dir: string;
  readonly clock: ManualClock;
  readonly store: EventStore;
  readonly items: ItemStore;
  readonly memory: MemoryStore;
  readonly pollState: PollStateStore;
  readonly preferences: PreferenceStore;
  close(): void;
}

/** A fresh event store in a temp directory, on a manual clock starting at T0. */
export function openStore(start: number = T0): StoreFixture {
  const dir = makeTempDir();
  const clock = new ManualClock(start);
  const store = new EventStore(dir);
  return {
    dir,
    clock,
    store,
    items: new ItemStore(store, OWNER, clock.now),
    memory: new MemoryStore(store),
    pollState: new PollStateStore(store, clock.now),
    preferences: new PreferenceStore(join(dir, "preferences")),
    close: () => {
      store.close();
      removeDir(dir);
    },
  };
}

/** A direct inbound message to the owner. */
export function makeItem(overrides: Partial<UpsertItemParams> = {}): UpsertItemParams {
  return {
    id: "msg-1",
    kind: "message",
    conversationId: "conv-1",
    sender: "alice@example.com",
    senderName: "Alice",
    toRecipients: [OWNER],
    ccRecipients: [],
    subject: "Quarterly budget",
    bodyPreview: "Can you approve the quarterly budget?",
    bodyText: "Can you approve the quarterly budget by Friday?",
    receivedAt: T0,
    ...overrides,
  };
}

/** A stored item as the stores return it, for code that never touches the database. */
export function itemRecord(overrides: Partial<Item> = {}): Item {
  return {
    id: "msg-1",
    kind: "message",
    conversationId: "conv-1",
    sender: "alice@example.com",
    senderName: "Alice",
    toRecipients: [OWNER],
    ccRecipients: [],
    direction: "inbound",
    isCc: false,
    subject: "Quarterly budget",
    bodyPreview: "Can you approve the quarterly budget?",
    bodyText: "Can you approve the quarterly budget by Friday?",
    receivedAt: T0,
    organizer: null,
    attendees: [],
    location: null,
    startAt: null,
    endAt: null,
    categories: [],
    urgency: null,
    requiresReply: false,
    cleanupAction: null,
    classificationReason: null,
    confidence: null,
    state: "unprocessed",
    outcome: null,
    processedAt: null,
    claims: 0,
    lastError: null,
    extractionStatus: "complete",
    indexedAt: null,
    deletedAt: null,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

/** Records every publish; fails while `failing` is set. */
export class RecordingSink implements TriggerSink {
  readonly requests: PublishRequest[] = [];
  failing = false;

  async publish(request: PublishRequest): Promise<PublishResult> {
    if (this.failing) throw new Error("sink unavailable");
    this.requests.push(request);
    return {
      trigger: {
        id: randomUUID(),
        capability: "steward",
        user: OWNER,
        type: request.type,
        created_at: new Date(T0).toISOString(),
        dedupe_key: makeDedupeKey("steward", request.type, OWNER, request.primaryId),
        payload: request.payload,
      },
      published: true,
    };
  }

  types(): string[] {
    return this.requests.map((r) => r.type);
  }
}

export class FakeClassifier implements ClassificationPort {
  readonly calls: ClassificationInput[] = [];

  constructor(private readonly respond: (input: ClassificationInput) => unknown | Promise<unknown>) {}

  async classify(input: ClassificationInput): Promise<unknown> {
    this.calls.push(input);
    return this.respond(input);
  }
}

/** Output shaped like a real classifier reply, with nothing actionable. */
export function classification(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    categories: ["Work"],
    urgency: "this_week",
    requiresReply: false,
    cleanupAction: "keep",
    reason: "Routine update",
    labels: [],
    confidence: 0.9,
    ...overrides,
  };
}

export class FakeSemantic implements SemanticMatchPort {
  readonly calls: { rule: string; event: Record<string, unknown> }[] = [];

  constructor(private readonly verdict: SemanticMatch | Error) {}

  async match(input: { rule: string; event: Record<string, unknown> }): Promise<SemanticMatch> {
    this.calls.push(input);
    if (this.verdict instanceof Error) throw this.verdict;
    return this.verdict;
  }
}

/** Embeds by keyword presence, so related texts land close together. */
export class KeywordEmbedder implements EmbeddingPort {
  calls = 0;
  failing = false;

  constructor(private readonly vocabulary: readonly string[]) {}

  async embed(texts: readonly string[]): Promise<number[][]> {
    this.calls++;
    if (this.failing) throw new Error("embedder unavailable");
    return texts.map((t) => {
      const lower = t.toLowerCase();
      return this.vocabulary.map((word) => (lower.includes(word) ? 1 : 0));
    });
  }
}

export class FakeProvider implements ProviderSyncPort, ProviderActionPort {
  readonly sinceSeen: (string | null)[] = [];
  readonly actions: { itemId: string; action: ProviderAction }[] = [];
  failActions = false;
  actionAttempts = 0;

  constructor(private readonly batches: unknown[] = []) {}

  async listChanges(since: string | null): Promise<unknown> {
    this.sinceSeen.push(since);
    return this.batches.shift() ?? { items: [], deletions: [], cursor: since };
  }

  async applyAction(itemId: string, action: ProviderAction): Promise<void> {
    this.actionAttempts++;
    if (this.failActions) throw new TransientError("provider rejected action");
    this.actions.push({ itemId, action });
  }
}

/** Answers each request with the reply registered for its `op`. */
export class FakeRunner implements CommandRunner {
  readonly requests: Record<string, unknown>[] = [];

  constructor(private readonly replies: Record<string, unknown>) {}

  async run(request: Record<string, unknown>): Promise<unknown> {
    this.requests.push(request);
    const op = request["op"];
    if (typeof op !== "string" || !(op in this.replies)) {
      throw new Error(`unexpected op ${String(op)}`);
    }
    return this.replies[op];
  }
}
