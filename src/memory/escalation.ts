import { maxUrgency, type Urgency } from "../store/types.js";
import { DAY_MS } from "./derive.js";
import type { Commitment, Decision } from "./types.js";

export interface EscalationPolicy {
  readonly decisionNudgeDays: number;
  readonly escalateAfterDays: number;
}

function overdueBy(dueBy: number | null, now: number): number | null {
  return dueBy === null ? null : now - dueBy;
}

/** Decisions escalate by how long they have been open or past due. */
export function escalateDecision(d: Decision, now: number, policy: EscalationPolicy): Urgency {
  const open = now - d.createdAt;
  const overdue = overdueBy(d.dueBy, now);
  const nudgeMs = policy.decisionNudgeDays * DAY_MS;

  let urgency: Urgency = d.initialUrgency;
  if ((overdue !== null && overdue >= 0) || open >= nudgeMs) {
    urgency = maxUrgency(urgency, "today") ?? urgency;
  }
  if ((overdue !== null && overdue >= policy.escalateAfterDays * DAY_MS) || open >= 2 * nudgeMs) {
    urgency = "immediate";
  }
  return urgency;
}

/** Commitments escalate only once they are past due. */
export function escalateCommitment(c: Commitment, now: number, policy: EscalationPolicy): Urgency {
  const overdue = overdueBy(c.dueBy, now);
  if (overdue === null || overdue < 0) return c.initialUrgency;
  if (overdue >= policy.escalateAfterDays * DAY_MS) return "immediate";
  return maxUrgency(c.initialUrgency, "today") ?? c.initialUrgency;
}

export function isOverdue(dueBy: number | null, now: number): boolean {
  return dueBy !== null && dueBy < now;
}
