import type { AlertEngine } from "../alerts/engine.js";
import type { AlertEvent } from "../alerts/types.js";
import type { MemoryConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import { isVipSender } from "../organizer/organizer.js";
import type { PreferenceStore, Preferences } from "../preferences/store.js";
import type { EventStore } from "../store/db.js";
import type { ItemStore } from "../store/items.js";
import type { TriggerSink } from "../triggers/types.js";
import { contactFingerprint, DAY_MS, deriveContacts, deriveThreads, HOUR_MS, threadFingerprint } from "./derive.js";
import { escalateCommitment, escalateDecision, isOverdue, type EscalationPolicy } from "./escalation.js";
import { nudgeEntity, selectNudges, type NudgePolicy } from "./nudges.js";
import type { MemoryStore } from "./store.js";
import type { Nudge, Thread } from "./types.js";

export interface MemoryEngineDeps {
  store: EventStore;
  items: ItemStore;
  memory: MemoryStore;
  sink: TriggerSink;
  alerts?: AlertEngine;
  preferences: PreferenceStore;
  config: MemoryConfig;
  owner: string;
  logger: Logger;
  clock?: () => number;
}

export interface MemoryCycleResult {
  readonly threadsChanged: number;
  readonly threadsRemoved: number;
  readonly contactsChanged: number;
  readonly escalated: number;
  readonly resolved: number;
  readonly nudges: number;
  readonly alertEvents: number;
  readonly observationsPruned: number;
}

interface ObligationChanges {
  escalated: number;
  resolved: number;
}

export interface RebuildResult extends ObligationChanges {
  readonly threads: number;
  readonly contacts: number;
  readonly reindex: number;
}

/**
 * Recomputes working memory from the event log and raises nudges. Every step
 * is a function of stored rows and the clock, so a repeated cycle with no new
 * items writes nothing and publishes nothing.
 */
export class MemoryEngine {
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(private readonly deps: MemoryEngineDeps) {
    this.logger = deps.logger.child({ component: "memory-engine" });
    this.clock = deps.clock ?? Date.now;
  }

  async runCycle(): Promise<MemoryCycleResult> {
    const now = this.clock();
    const prefs = await this.deps.preferences.get(this.deps.owner);

    const { changed, removed } = this.recomputeThreads(now);
    const contactsChanged = this.recomputeContacts(prefs);
    const obligations = this.updateObligations(now, prefs);

    const evaluated = new Set<string>();
    const nudges = await this.emitNudges(now, prefs, evaluated);
    let alertEvents = evaluated.size;
    alertEvents += await this.evaluateChanges(changed, now, evaluated);

    const observationsPruned = this.deps.memory.pruneObservations(
      now - this.deps.config.observationRetentionDays * DAY_MS,
    );

    const result: MemoryCycleResult = {
      threadsChanged: changed.length,
      threadsRemoved: removed,
      contactsChanged,
      escalated: obligations.escalated,
      resolved: obligations.resolved,
      nudges,
      alertEvents,
      observationsPruned,
    };
    this.logger.info(result, "Memory cycle complete");
    return result;
  }

  /** Drops and rewrites threads and contacts, re-escalates obligations and queues every item for re-indexing. */
  async rebuild(): Promise<RebuildResult> {
    const now = this.clock();
    const prefs = await this.deps.preferences.get(this.deps.owner);
    const { memory } = this.deps;
    this.deps.store.transaction(() => {
      for (const t of memory.listThreads()) memory.deleteThread(t.conversationId);
      for (const c of memory.listContacts(-1)) memory.deleteContact(c.email);
    });
    const { changed } = this.recomputeThreads(now);
    const contacts = this.recomputeContacts(prefs);
    const obligations = this.updateObligations(now, prefs);
    const reindex = this.deps.items.resetIndex();
    this.logger.info({ threads: changed.length, contacts, reindex }, "Derived state rebuilt");
    return { threads: changed.length, contacts, ...obligations, reindex };
  }

  // ── Derived rows ──

  private recomputeThreads(now: number): { changed: Thread[]; removed: number } {
    const { memory, items, config, owner } = this.deps;
    const derived = deriveThreads(items.listDirectMessages(), owner, now, config);

    return this.deps.store.transaction(() => {
      const existing = new Map(memory.listThreads().map((t) => [t.conversationId, t]));
      const changed: Thread[] = [];
      for (const thread of derived) {
        const current = existing.get(thread.conversationId);
        existing.delete(thread.conversationId);
        if (current && threadFingerprint(current) === threadFingerprint(thread)) continue;
        memory.saveThread(thread);
        changed.push({ ...thread, lastNudgedAt: current?.lastNudgedAt ?? null });
      }
      for (const stale of existing.keys()) memory.deleteThread(stale);
      return { changed, removed: existing.size };
    });
  }

  private recomputeContacts(prefs: Preferences): number {
    const { memory, items, owner } = this.deps;
    const derived = deriveContacts(items.listDirectMessages(), owner, (email) =>
      isVipSender(email, prefs.vipSenders),
    );

    return this.deps.store.transaction(() => {
      const existing = new Map(memory.listContacts(-1).map((c) => [c.email, c]));
      let changed = 0;
      for (const contact of derived) {
        const current = existing.get(contact.email);
        existing.delete(contact.email);
        if (current && contactFingerprint(current) === contactFingerprint(contact)) continue;
        memory.saveContact(contact);
        changed++;
      }
      for (const gone of existing.keys()) memory.deleteContact(gone);
      return changed;
    });
  }

  private escalationPolicy(prefs: Preferences): EscalationPolicy {
    return {
      decisionNudgeDays: prefs.decisionNudgeDays ?? this.deps.config.decisionNudgeDays,
      escalateAfterDays: this.deps.config.escalateAfterDays,
    };
  }

  /** Resolves replied or expired obligations and escalates the rest. */
  private updateObligations(now: number, prefs: Preferences): ObligationChanges {
    const { memory, items, config } = this.deps;
    const policy = this.escalationPolicy(prefs);
    const expireMs = config.expireAfterDays * DAY_MS;

    return this.deps.store.transaction(() => {
      const changes: ObligationChanges = { escalated: 0, resolved: 0 };

      for (const d of memory.listDecisions({ open: true })) {
        if (d.conversationId !== null && items.hasLaterOutbound(d.conversationId, d.createdAt)) {
          if (memory.resolveDecision(d.id, "replied", now)) changes.resolved++;
        } else if (now - d.createdAt >= expireMs) {
          if (memory.resolveDecision(d.id, "expired", now)) changes.resolved++;
        } else {
          const urgency = escalateDecision(d, now, policy);
          if (urgency !== d.urgency) {
            memory.setDecisionUrgency(d.id, urgency);
            changes.escalated++;
          }
        }
      }

      for (const c of memory.listCommitments({ open: true })) {
        if (now - c.createdAt >= expireMs) {
          if (memory.completeCommitment(c.id, "expired", now)) changes.resolved++;
          continue;
        }
        const urgency = escalateCommitment(c, now, policy);
        if (urgency !== c.urgency) {
          memory.setCommitmentUrgency(c.id, urgency);
          changes.escalated++;
        }
      }
      return changes;
    });
  }

  // ── Nudges ──

  private nudgePolicy(prefs: Preferences): NudgePolicy {
    const { config } = this.deps;
    return {
      replyNudgeDays: prefs.replyNudgeDays ?? config.replyNudgeDays,
      decisionNudgeDays: prefs.decisionNudgeDays ?? config.decisionNudgeDays,
      urgentStaleHours: config.urgentStaleHours,
      cooldownMs: config.nudgeCooldownHours * HOUR_MS,
      maxPerKind: config.maxNudgesPerKind,
    };
  }

  /** Publish, then evaluate alert rules, then commit `last_nudged_at`. */
  private async emitNudges(now: number, prefs: Preferences, evaluated: Set<string>): Promise<number> {
    const { memory } = this.deps;
    const policy = this.nudgePolicy(prefs);
    const nudges = selectNudges(
      {
        threads: memory.listThreads(),
        commitments: memory.listCommitments({ open: true }),
        decisions: memory.listDecisions({ open: true }),
      },
      now,
      policy,
    );

    let sent = 0;
    for (const nudge of nudges) {
      try {
        await this.deps.sink.publish({
          type: "working_memory_nudge",
          primaryId: `${nudge.kind}:${nudge.entityId}:${Math.floor(now / policy.cooldownMs)}`,
          payload: { nudge_type: nudge.kind, urgency: nudge.urgency, ...nudge.payload },
        });
      } catch (err) {
        this.logger.error({ err, kind: nudge.kind, entityId: nudge.entityId }, "Nudge publish failed");
        continue;
      }

      const event = this.nudgeEvent(nudge, now);
      if (event) {
        evaluated.add(`${event.type}:${event.id}`);
        await this.evaluate(event);
      }
      this.commitNudge(nudge, now);
      sent++;
    }
    return sent;
  }

  private nudgeEvent(nudge: Nudge, now: number): AlertEvent | null {
    const { memory } = this.deps;
    switch (nudgeEntity(nudge.kind)) {
      case "thread": {
        const thread = memory.getThread(nudge.entityId);
        return thread ? { type: "wm_thread", id: thread.conversationId, thread } : null;
      }
      case "commitment": {
        const commitment = memory.getCommitment(nudge.entityId);
        return commitment
          ? { type: "wm_commitment", id: commitment.id, commitment, overdue: isOverdue(commitment.dueBy, now) }
          : null;
      }
      case "decision": {
        const decision = memory.getDecision(nudge.entityId);
        return decision
          ? { type: "wm_decision", id: decision.id, decision, overdue: isOverdue(decision.dueBy, now) }
          : null;
      }
    }
  }

  private commitNudge(nudge: Nudge, now: number): void {
    const { memory } = this.deps;
    switch (nudgeEntity(nudge.kind)) {
      case "thread":
        memory.markThreadNudged(nudge.entityId, now);
        break;
      case "commitment":
        memory.markCommitmentNudged(nudge.entityId, now);
        break;
      case "decision":
        memory.markDecisionNudged(nudge.entityId, now);
        break;
    }
  }

  // ── Alert evaluation of changes ──

  private async evaluateChanges(changedThreads: readonly Thread[], now: number, evaluated: Set<string>): Promise<number> {
    const { memory } = this.deps;
    let events = 0;

    for (const thread of changedThreads) {
      if (evaluated.has(`wm_thread:${thread.conversationId}`)) continue;
      await this.evaluate({ type: "wm_thread", id: thread.conversationId, thread });
      events++;
    }
    for (const decision of memory.listUnseenDecisions()) {
      if (!evaluated.has(`wm_decision:${decision.id}`)) {
        await this.evaluate({ type: "wm_decision", id: decision.id, decision, overdue: isOverdue(decision.dueBy, now) });
        events++;
      }
      memory.markDecisionSeen(decision.id);
    }
    for (const commitment of memory.listUnseenCommitments()) {
      if (!evaluated.has(`wm_commitment:${commitment.id}`)) {
        await this.evaluate({
          type: "wm_commitment",
          id: commitment.id,
          commitment,
          overdue: isOverdue(commitment.dueBy, now),
        });
        events++;
      }
      memory.markCommitmentSeen(commitment.id);
    }
    return events;
  }

  private async evaluate(event: AlertEvent): Promise<void> {
    const alerts = this.deps.alerts;
    if (!alerts) return;
    try {
      await alerts.evaluate(event);
    } catch (err) {
      this.logger.error({ err, eventType: event.type, eventId: event.id }, "Alert evaluation failed");
    }
  }
}
