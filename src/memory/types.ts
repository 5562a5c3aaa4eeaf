import type { Urgency } from "../store/types.js";

export const THREAD_STATUSES = ["active", "stale", "closed"] as const;
export type ThreadStatus = (typeof THREAD_STATUSES)[number];

export const OBSERVATION_TYPES = [
  "project_mention",
  "decision_made",
  "deadline_mentioned",
  "person_introduced",
  "status_update",
  "meeting_scheduled",
  "commitment_made",
  "context_learned",
] as const;
export type ObservationType = (typeof OBSERVATION_TYPES)[number];

export const RESOLUTIONS = ["replied", "expired"] as const;
export type Resolution = (typeof RESOLUTIONS)[number];

export const NUDGE_KINDS = ["reply_overdue", "urgent_thread_stale", "commitment_overdue", "decision_pending"] as const;
export type NudgeKind = (typeof NUDGE_KINDS)[number];

export interface Thread {
  readonly conversationId: string;
  readonly subject: string;
  readonly status: ThreadStatus;
  readonly needsReply: boolean;
  readonly urgency: Urgency | null;
  readonly lastActivityAt: number;
  readonly lastSender: string;
  readonly messageCount: number;
  readonly participants: readonly string[];
  readonly lastNudgedAt: number | null;
}

/** The fields the engine derives; `lastNudgedAt` is owned by the nudge step. */
export type DerivedThread = Omit<Thread, "lastNudgedAt">;

export interface Contact {
  readonly email: string;
  readonly name: string | null;
  readonly firstSeen: number;
  readonly lastInteraction: number;
  readonly totalMessages: number;
  readonly userInitiated: number;
  readonly theyInitiated: number;
  readonly ccCount: number;
  readonly isVip: boolean;
}

export interface Decision {
  readonly id: string;
  readonly sourceItemId: string;
  readonly conversationId: string | null;
  readonly question: string;
  readonly context: string | null;
  readonly requester: string | null;
  readonly options: readonly string[];
  readonly dueBy: number | null;
  readonly initialUrgency: Urgency;
  readonly urgency: Urgency;
  readonly isResolved: boolean;
  readonly resolution: Resolution | null;
  readonly resolvedAt: number | null;
  readonly createdAt: number;
  readonly lastNudgedAt: number | null;
}

export interface Commitment {
  readonly id: string;
  readonly sourceItemId: string;
  readonly conversationId: string | null;
  readonly description: string;
  readonly toWhom: string | null;
  readonly dueBy: number | null;
  readonly initialUrgency: Urgency;
  readonly urgency: Urgency;
  readonly isCompleted: boolean;
  readonly resolution: Resolution | null;
  readonly completedAt: number | null;
  readonly createdAt: number;
  readonly lastNudgedAt: number | null;
}

export interface Observation {
  readonly id: string;
  readonly sourceItemId: string | null;
  readonly conversationId: string | null;
  readonly type: ObservationType;
  readonly content: string;
  readonly importance: number;
  readonly createdAt: number;
}

export interface Nudge {
  readonly kind: NudgeKind;
  /** Thread conversation id, commitment id or decision id. */
  readonly entityId: string;
  readonly urgency: Urgency;
  readonly payload: Record<string, unknown>;
}
