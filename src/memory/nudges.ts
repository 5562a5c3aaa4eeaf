import { DAY_MS, HOUR_MS } from "./derive.js";
import { isOverdue } from "./escalation.js";
import type { Commitment, Decision, Nudge, NudgeKind, Thread } from "./types.js";

export interface NudgePolicy {
  readonly replyNudgeDays: number;
  readonly decisionNudgeDays: number;
  readonly urgentStaleHours: number;
  readonly cooldownMs: number;
  readonly maxPerKind: number;
}

export interface NudgeCandidates {
  readonly threads: readonly Thread[];
  readonly commitments: readonly Commitment[];
  readonly decisions: readonly Decision[];
}

const SNIPPET_LENGTH = 50;

function snippet(value: string): string {
  return value.slice(0, SNIPPET_LENGTH);
}

function coolingDown(lastNudgedAt: number | null, now: number, cooldownMs: number): boolean {
  return lastNudgedAt !== null && now - lastNudgedAt < cooldownMs;
}

/** Where a nudge's entity keeps its `last_nudged_at`. */
export function nudgeEntity(kind: NudgeKind): "thread" | "commitment" | "decision" {
  switch (kind) {
    case "reply_overdue":
    case "urgent_thread_stale":
      return "thread";
    case "commitment_overdue":
      return "commitment";
    case "decision_pending":
      return "decision";
  }
}

/**
 * Picks this cycle's nudges. Entities nudged within the cooldown are skipped,
 * each kind is capped at `maxPerKind`, and a thread gets at most one nudge
 * per cycle (the stale-urgent one wins).
 */
export function selectNudges(candidates: NudgeCandidates, now: number, policy: NudgePolicy): Nudge[] {
  const nudges: Nudge[] = [];
  const nudgedThreads = new Set<string>();

  const openThreads = candidates.threads
    .filter((t) => t.needsReply && t.status !== "closed" && !coolingDown(t.lastNudgedAt, now, policy.cooldownMs))
    .sort((a, b) => a.lastActivityAt - b.lastActivityAt || a.conversationId.localeCompare(b.conversationId));

  const staleBefore = now - policy.urgentStaleHours * HOUR_MS;
  for (const t of openThreads
    .filter((t) => (t.urgency === "immediate" || t.urgency === "today") && t.lastActivityAt <= staleBefore)
    .slice(0, policy.maxPerKind)) {
    nudgedThreads.add(t.conversationId);
    nudges.push({
      kind: "urgent_thread_stale",
      entityId: t.conversationId,
      urgency: t.urgency ?? "today",
      payload: {
        thread_id: t.conversationId,
        subject: t.subject,
        last_sender: t.lastSender,
        hours_idle: Math.floor((now - t.lastActivityAt) / HOUR_MS),
        message: `Urgent thread has no activity for ${policy.urgentStaleHours}h: ${snippet(t.subject)}`,
      },
    });
  }

  const replyBefore = now - policy.replyNudgeDays * DAY_MS;
  for (const t of openThreads
    .filter((t) => !nudgedThreads.has(t.conversationId) && t.lastActivityAt <= replyBefore)
    .slice(0, policy.maxPerKind)) {
    const daysWaiting = Math.floor((now - t.lastActivityAt) / DAY_MS);
    nudges.push({
      kind: "reply_overdue",
      entityId: t.conversationId,
      urgency: "today",
      payload: {
        thread_id: t.conversationId,
        subject: t.subject,
        last_sender: t.lastSender,
        days_waiting: daysWaiting,
        message: `No reply sent for ${daysWaiting} days: ${snippet(t.subject)}`,
      },
    });
  }

  for (const c of candidates.commitments
    .filter((c) => !c.isCompleted && isOverdue(c.dueBy, now) && !coolingDown(c.lastNudgedAt, now, policy.cooldownMs))
    .sort((a, b) => (a.dueBy ?? 0) - (b.dueBy ?? 0) || a.id.localeCompare(b.id))
    .slice(0, policy.maxPerKind)) {
    nudges.push({
      kind: "commitment_overdue",
      entityId: c.id,
      urgency: "immediate",
      payload: {
        commitment_id: c.id,
        description: c.description,
        to_whom: c.toWhom ?? "unknown",
        due_by: c.dueBy === null ? null : new Date(c.dueBy).toISOString(),
        message: `Overdue commitment: ${snippet(c.description)}`,
      },
    });
  }

  const decisionBefore = now - policy.decisionNudgeDays * DAY_MS;
  for (const d of candidates.decisions
    .filter((d) => !d.isResolved && d.createdAt <= decisionBefore && !coolingDown(d.lastNudgedAt, now, policy.cooldownMs))
    .sort((a, b) => a.createdAt - b.createdAt || a.id.localeCompare(b.id))
    .slice(0, policy.maxPerKind)) {
    const requester = d.requester ?? "unknown";
    nudges.push({
      kind: "decision_pending",
      entityId: d.id,
      urgency: "today",
      payload: {
        decision_id: d.id,
        question: d.question,
        requester,
        options: d.options,
        message: `Decision pending from ${requester}: ${snippet(d.question)}`,
      },
    });
  }

  return nudges;
}
