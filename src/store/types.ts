export const URGENCY_LEVELS = ["immediate", "today", "this_week", "someday"] as const;
export type Urgency = (typeof URGENCY_LEVELS)[number];

const URGENCY_RANK: Record<Urgency, number> = {
  someday: 0,
  this_week: 1,
  today: 2,
  immediate: 3,
};

export function urgencyRank(urgency: Urgency): number {
  return URGENCY_RANK[urgency];
}

export function maxUrgency(a: Urgency | null, b: Urgency | null): Urgency | null {
  if (a === null) return b;
  if (b === null) return a;
  return URGENCY_RANK[a] >= URGENCY_RANK[b] ? a : b;
}

export const ITEM_STATES = ["unprocessed", "classifying", "actioned", "failed", "processed"] as const;
export type ItemState = (typeof ITEM_STATES)[number];

export type ItemOutcome = "actioned" | "failed";
export type ItemKind = "message" | "event";
export type ItemDirection = "inbound" | "outbound";
export type CleanupAction = "keep" | "archive" | "delete";
export type ExtractionStatus = "pending" | "complete";

export interface Item {
  readonly id: string;
  readonly kind: ItemKind;
  readonly conversationId: string | null;
  readonly sender: string;
  readonly senderName: string | null;
  readonly toRecipients: readonly string[];
  readonly ccRecipients: readonly string[];
  readonly direction: ItemDirection;
  readonly isCc: boolean;
  readonly subject: string;
  readonly bodyPreview: string;
  readonly bodyText: string | null;
  readonly receivedAt: number;
  readonly organizer: string | null;
  readonly attendees: readonly string[];
  readonly location: string | null;
  readonly startAt: number | null;
  readonly endAt: number | null;
  readonly categories: readonly string[];
  readonly urgency: Urgency | null;
  readonly requiresReply: boolean;
  readonly cleanupAction: CleanupAction | null;
  readonly classificationReason: string | null;
  readonly confidence: number | null;
  readonly state: ItemState;
  readonly outcome: ItemOutcome | null;
  readonly processedAt: number | null;
  readonly claims: number;
  readonly lastError: string | null;
  readonly extractionStatus: ExtractionStatus;
  readonly indexedAt: number | null;
  readonly deletedAt: number | null;
  readonly createdAt: number;
  readonly updatedAt: number;
}

export interface Attachment {
  readonly id: string;
  readonly itemId: string;
  readonly filename: string;
  readonly contentType: string | null;
  readonly size: number;
  readonly extractedText: string | null;
  readonly extractionStatus: ExtractionStatus;
}

export interface TriageLogEntry {
  readonly id: number;
  readonly itemId: string;
  readonly categories: readonly string[];
  readonly urgency: Urgency | null;
  readonly reason: string | null;
  readonly outcome: ItemOutcome;
  readonly error: string | null;
  readonly createdAt: number;
}
