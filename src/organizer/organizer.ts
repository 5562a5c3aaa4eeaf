import { randomUUID } from "node:crypto";
import type { AlertEngine } from "../alerts/engine.js";
import { globMatch } from "../alerts/match.js";
import type { ItemAlertEvent } from "../alerts/types.js";
import type { OrganizerConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { recordFacts } from "../memory/recorder.js";
import type { MemoryStore } from "../memory/store.js";
import type { PreferenceStore, Preferences } from "../preferences/store.js";
import { stripQuotedReplies } from "../search/chunker.js";
import type { EventStore } from "../store/db.js";
import type { ClassificationFields, ItemStore } from "../store/items.js";
import type { Item, ItemOutcome, ItemState } from "../store/types.js";
import type { TriggerSink } from "../triggers/types.js";
import { errorMessage, isTransient, TransientError } from "../utils/errors.js";
import { mapWithConcurrency } from "../utils/pool.js";
import { retry } from "../utils/retry.js";
import { withTimeout } from "../utils/timeout.js";
import { buildTagAction, rankCategories } from "./actions.js";
import { classificationSchema, type Classification } from "./schema.js";
import { nextState } from "./state.js";
import { classificationTriggers } from "./triggers.js";
import type { ClassificationPort, ProviderActionPort } from "./types.js";

export const VIP_LABEL = "vip";
const MAX_TEXT_LENGTH = 8000;

export interface OrganizerDeps {
  store: EventStore;
  items: ItemStore;
  memory: MemoryStore;
  sink: TriggerSink;
  classifier: ClassificationPort;
  provider?: ProviderActionPort;
  alerts?: AlertEngine;
  preferences: PreferenceStore;
  config: OrganizerConfig;
  owner: string;
  backfill: boolean;
  defaultTimezone: string;
  actionTimeoutMs: number;
  logger: Logger;
  workerId?: string;
  clock?: () => number;
}

export interface ItemResult {
  readonly itemId: string;
  readonly state: ItemState;
  readonly outcome: ItemOutcome;
  /** False when another worker finished the item first. */
  readonly persisted: boolean;
  readonly triggers: number;
}

export interface OrganizeResult {
  readonly claimed: number;
  readonly actioned: number;
  readonly failed: number;
  readonly lost: number;
}

interface CycleContext {
  readonly prefs: Preferences;
}

/** The text sent to the classifier: headers plus the body without quoted history. */
export function classificationText(item: Item): string {
  const header = [
    `Subject: ${item.subject}`,
    `From: ${item.senderName ? `${item.senderName} <${item.sender}>` : item.sender}`,
    item.toRecipients.length > 0 ? `To: ${item.toRecipients.join(", ")}` : null,
    item.ccRecipients.length > 0 ? `Cc: ${item.ccRecipients.join(", ")}` : null,
    item.kind === "event" && item.startAt !== null ? `Starts: ${new Date(item.startAt).toISOString()}` : null,
    item.location ? `Location: ${item.location}` : null,
  ].filter((line): line is string => line !== null);
  const body = stripQuotedReplies(item.bodyText ?? item.bodyPreview);
  return `${header.join("\n")}\n\n${body}`.slice(0, MAX_TEXT_LENGTH);
}

export function isVipSender(sender: string, vipSenders: readonly string[] | undefined): boolean {
  const address = sender.toLowerCase();
  return (vipSenders ?? []).some((pattern) =>
    pattern.includes("*") ? globMatch(pattern, address) : pattern.toLowerCase() === address,
  );
}

/**
 * Claims unprocessed items, classifies them outside any transaction, applies
 * one provider action, emits triggers, then commits the terminal state.
 */
export class Organizer {
  private readonly logger: Logger;
  private readonly clock: () => number;
  readonly workerId: string;

  constructor(private readonly deps: OrganizerDeps) {
    this.logger = deps.logger.child({ component: "organizer" });
    this.clock = deps.clock ?? Date.now;
    this.workerId = deps.workerId ?? `organizer-${process.pid}-${randomUUID().slice(0, 8)}`;
  }

  async runCycle(): Promise<OrganizeResult> {
    const { config } = this.deps;
    const ctx: CycleContext = { prefs: await this.deps.preferences.get(this.deps.owner) };
    const batch = this.deps.items.claimBatch(this.workerId, config.batchSize, config.leaseMs);
    if (batch.length === 0) {
      return { claimed: 0, actioned: 0, failed: 0, lost: 0 };
    }
    this.logger.debug({ claimed: batch.length }, "Claimed items");

    const results = await mapWithConcurrency(batch, config.concurrency, (item) => this.processSafely(item, ctx));

    let actioned = 0;
    let failed = 0;
    let lost = 0;
    for (const r of results) {
      if (r === null || !r.persisted) lost++;
      else if (r.outcome === "actioned") actioned++;
      else failed++;
    }
    this.logger.info({ claimed: batch.length, actioned, failed, lost }, "Organizer cycle complete");
    return { claimed: batch.length, actioned, failed, lost };
  }

  private async processSafely(item: Item, ctx: CycleContext): Promise<ItemResult | null> {
    try {
      return await this.processItem(item, ctx);
    } catch (err) {
      this.logger.error({ err, itemId: item.id }, "Item processing crashed, releasing lease");
      this.deps.items.releaseLease(item.id, this.workerId, errorMessage(err));
      return null;
    }
  }

  private async processItem(item: Item, ctx: CycleContext): Promise<ItemResult> {
    const { config } = this.deps;
    let state: ItemState = item.state;
    let classification: Classification | null = null;
    let error: string | null = null;

    if (item.claims > config.maxClaims) {
      error = `Exceeded ${config.maxClaims} claims`;
      this.logger.warn({ itemId: item.id, claims: item.claims }, "Poison item, marking failed");
    } else {
      try {
        classification = await this.classify(item, ctx);
      } catch (err) {
        error = errorMessage(err);
        this.logger.warn({ err, itemId: item.id }, "Classification exhausted retries");
      }
    }

    let fields: ClassificationFields | null = null;
    let labels: string[] = [];
    let triggers = 0;
    if (classification) {
      const categories = rankCategories(classification.categories, config.categoryPriority);
      fields = {
        categories,
        urgency: classification.urgency,
        requiresReply: classification.requiresReply,
        cleanupAction: classification.cleanupAction,
        reason: classification.reason,
        confidence: classification.confidence,
      };
      labels = [...new Set(classification.labels.map((l) => l.toLowerCase()))];
      if (isVipSender(item.sender, ctx.prefs.vipSenders) && !labels.includes(VIP_LABEL)) {
        labels.push(VIP_LABEL);
      }

      if (item.kind === "message") {
        error = await this.applyAction(item, categories, classification);
        if (!item.isCc && !this.deps.backfill) {
          triggers = await this.emitTriggers(item, classification, ctx);
        }
      }
    }

    const outcome: ItemOutcome = classification && error === null ? "actioned" : "failed";
    state = nextState(state, outcome === "actioned" ? "succeed" : "fail");

    const persisted = this.persist(item, outcome, fields, labels, classification, error);
    if (!persisted) {
      this.logger.warn({ itemId: item.id }, "Lease lost before commit, discarding result");
      return { itemId: item.id, state, outcome, persisted, triggers };
    }
    state = nextState(state, "commit");

    if (!item.isCc && this.deps.alerts) {
      await this.evaluateAlerts(item.id);
    }
    return { itemId: item.id, state, outcome, persisted, triggers };
  }

  private async classify(item: Item, ctx: CycleContext): Promise<Classification> {
    const { config, classifier } = this.deps;
    const input = {
      itemId: item.id,
      text: classificationText(item),
      context: {
        kind: item.kind,
        direction: item.direction,
        ccMode: item.isCc,
        vip: isVipSender(item.sender, ctx.prefs.vipSenders),
        sender: item.sender,
        subject: item.subject,
        categories: config.categories,
      },
    };

    return retry(
      async () => {
        const raw = await withTimeout("classify", config.classifyTimeoutMs, (signal) =>
          classifier.classify(input, signal),
        );
        const parsed = classificationSchema.safeParse(raw);
        if (!parsed.success) {
          throw new TransientError(`Malformed classifier output: ${parsed.error.issues[0]?.message ?? "invalid"}`, {
            itemId: item.id,
          });
        }
        return parsed.data;
      },
      {
        maxAttempts: config.maxAttempts,
        baseDelayMs: config.retryBaseDelayMs,
        shouldRetry: isTransient,
        onRetry: (err, attempt, delayMs) =>
          this.logger.debug({ err, itemId: item.id, attempt, delayMs }, "Retrying classification"),
      },
    );
  }

  /** Returns the error message when the action could not be applied. */
  private async applyAction(item: Item, categories: string[], c: Classification): Promise<string | null> {
    const provider = this.deps.provider;
    const action = buildTagAction(categories, c.urgency);
    if (!provider || !action) return null;
    try {
      await retry(
        () =>
          withTimeout("provider action", this.deps.actionTimeoutMs, (signal) =>
            provider.applyAction(item.id, action, signal),
          ),
        {
          maxAttempts: this.deps.config.maxAttempts,
          baseDelayMs: this.deps.config.retryBaseDelayMs,
          shouldRetry: isTransient,
        },
      );
      return null;
    } catch (err) {
      this.logger.warn({ err, itemId: item.id }, "Provider action failed");
      return `Provider action failed: ${errorMessage(err)}`;
    }
  }

  private async emitTriggers(item: Item, c: Classification, ctx: CycleContext): Promise<number> {
    const requests = classificationTriggers(item, c, {
      urgentAt: this.deps.config.urgentAt,
      timezone: ctx.prefs.timezone ?? this.deps.defaultTimezone,
    });
    let published = 0;
    for (const request of requests) {
      try {
        const result = await this.deps.sink.publish(request);
        if (result.published) published++;
      } catch (err) {
        this.logger.error({ err, itemId: item.id, type: request.type }, "Trigger publish failed");
      }
    }
    return published;
  }

  private persist(
    item: Item,
    outcome: ItemOutcome,
    fields: ClassificationFields | null,
    labels: string[],
    classification: Classification | null,
    error: string | null,
  ): boolean {
    const { items, memory } = this.deps;
    return this.deps.store.transaction(() => {
      const won = items.finalize({ itemId: item.id, leaseOwner: this.workerId, outcome, classification: fields, error });
      if (!won) return false;
      items.appendTriageLog(item.id, outcome, fields, error);
      if (classification) {
        const confidence = classification.confidence;
        items.setLabels(
          item.id,
          labels.map((label) => ({ label, confidence })),
        );
        if (classification.requiresReply && item.direction === "inbound" && !item.isCc) {
          items.trackReply(item.id, classification.replyReason ?? classification.reason, item.receivedAt);
        }
        recordFacts(memory, item, classification.facts, this.clock());
      }
      return true;
    });
  }

  private async evaluateAlerts(itemId: string): Promise<void> {
    const alerts = this.deps.alerts;
    const item = this.deps.items.getItem(itemId);
    if (!alerts || !item) return;
    const type: ItemAlertEvent["type"] =
      item.kind === "event" ? "calendar_event" : item.direction === "outbound" ? "email_sent" : "email_received";
    try {
      await alerts.evaluate({
        type,
        id: item.id,
        item,
        labels: this.deps.items.listLabels(item.id).map((l) => l.label),
      });
    } catch (err) {
      this.logger.error({ err, itemId }, "Alert evaluation failed");
    }
  }
}
