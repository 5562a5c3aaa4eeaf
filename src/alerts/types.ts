import type { Commitment, Decision, Thread } from "../memory/types.js";
import type { Item } from "../store/types.js";
import type { AlertCondition, AlertEventType } from "./schema.js";

export type { AlertCondition, AlertEventType, AlertPredicate } from "./schema.js";

export interface ItemAlertEvent {
  readonly type: "email_received" | "email_sent" | "calendar_event";
  readonly id: string;
  readonly item: Item;
  readonly labels: readonly string[];
}

export interface ThreadAlertEvent {
  readonly type: "wm_thread";
  readonly id: string;
  readonly thread: Thread;
}

export interface CommitmentAlertEvent {
  readonly type: "wm_commitment";
  readonly id: string;
  readonly commitment: Commitment;
  readonly overdue: boolean;
}

export interface DecisionAlertEvent {
  readonly type: "wm_decision";
  readonly id: string;
  readonly decision: Decision;
  readonly overdue: boolean;
}

export type AlertEvent = ItemAlertEvent | ThreadAlertEvent | CommitmentAlertEvent | DecisionAlertEvent;

export interface AlertRule {
  readonly id: string;
  readonly naturalLanguageRule: string;
  readonly condition: AlertCondition;
  readonly enabled: boolean;
  readonly cooldownMinutes: number;
  readonly channel: string | null;
  readonly channelTarget: string | null;
  readonly createdAt: number;
  readonly updatedAt: number;
  readonly lastTriggeredAt: number | null;
}

export interface AlertHistoryEntry {
  readonly id: string;
  readonly ruleId: string;
  readonly eventType: AlertEventType;
  readonly eventId: string;
  readonly matchReason: string | null;
  readonly triggeredAt: number;
}

export interface SemanticMatch {
  readonly matches: boolean;
  readonly reason: string;
  readonly confidence: number;
}

/** Judges whether an event matches a rule's intent beyond keyword checks. */
export interface SemanticMatchPort {
  match(input: { rule: string; event: Record<string, unknown> }, signal: AbortSignal): Promise<SemanticMatch>;
}

/** Turns rule text into a raw condition; the result is validated before use. */
export interface RuleParserPort {
  parse(text: string, signal: AbortSignal): Promise<unknown>;
}
