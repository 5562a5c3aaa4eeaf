import { randomUUID } from "node:crypto";
import type { EventStore } from "../store/db.js";
import {
  bool,
  count,
  num,
  numOrNull,
  oneOf,
  oneOfOrNull,
  stringList,
  text,
  textOrNull,
  toRow,
  toRows,
  type Row,
} from "../store/rows.js";
import { URGENCY_LEVELS, type Urgency } from "../store/types.js";
import {
  OBSERVATION_TYPES,
  RESOLUTIONS,
  THREAD_STATUSES,
  type Commitment,
  type Contact,
  type Decision,
  type DerivedThread,
  type Observation,
  type ObservationType,
  type Resolution,
  type Thread,
  type ThreadStatus,
} from "./types.js";

export interface AddDecisionParams {
  sourceItemId: string;
  conversationId: string | null;
  question: string;
  context?: string | null;
  requester?: string | null;
  options?: readonly string[];
  dueBy?: number | null;
  urgency: Urgency;
  createdAt: number;
}

export interface AddCommitmentParams {
  sourceItemId: string;
  conversationId: string | null;
  description: string;
  toWhom?: string | null;
  dueBy?: number | null;
  urgency: Urgency;
  createdAt: number;
}

export interface AddObservationParams {
  sourceItemId: string | null;
  conversationId: string | null;
  type: ObservationType;
  content: string;
  importance: number;
  createdAt: number;
}

export interface ListObligationsParams {
  open?: boolean;
  limit?: number;
}

export interface ListThreadsParams {
  status?: ThreadStatus;
  needsReply?: boolean;
  limit?: number;
}

/** Working-memory rows: threads, contacts, decisions, commitments, observations. */
export class MemoryStore {
  private readonly db;

  constructor(store: EventStore) {
    this.db = store.raw();
  }

  // ── Threads ──

  getThread(conversationId: string): Thread | null {
    const row = toRow(this.db.prepare("SELECT * FROM threads WHERE conversation_id = ?").get(conversationId));
    return row ? this.toThread(row) : null;
  }

  listThreads(params: ListThreadsParams = {}): Thread[] {
    const conditions: string[] = [];
    const values: unknown[] = [];
    if (params.status) {
      conditions.push("status = ?");
      values.push(params.status);
    }
    if (params.needsReply !== undefined) {
      conditions.push("needs_reply = ?");
      values.push(params.needsReply ? 1 : 0);
    }
    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const limit = params.limit === undefined ? "" : "LIMIT ?";
    if (params.limit !== undefined) values.push(params.limit);
    const rows = this.db
      .prepare(`SELECT * FROM threads ${where} ORDER BY last_activity_at DESC, conversation_id ASC ${limit}`)
      .all(...values);
    return toRows(rows).map((r) => this.toThread(r));
  }

  /** Writes derived fields, keeping `last_nudged_at`. */
  saveThread(thread: DerivedThread): void {
    this.db
      .prepare(
        `INSERT INTO threads (conversation_id, subject, status, needs_reply, urgency, last_activity_at, last_sender,
           message_count, participants)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(conversation_id) DO UPDATE SET
           subject = excluded.subject,
           status = excluded.status,
           needs_reply = excluded.needs_reply,
           urgency = excluded.urgency,
           last_activity_at = excluded.last_activity_at,
           last_sender = excluded.last_sender,
           message_count = excluded.message_count,
           participants = excluded.participants`,
      )
      .run(
        thread.conversationId,
        thread.subject,
        thread.status,
        thread.needsReply ? 1 : 0,
        thread.urgency,
        thread.lastActivityAt,
        thread.lastSender,
        thread.messageCount,
        JSON.stringify(thread.participants),
      );
  }

  deleteThread(conversationId: string): void {
    this.db.prepare("DELETE FROM threads WHERE conversation_id = ?").run(conversationId);
  }

  markThreadNudged(conversationId: string, at: number): void {
    this.db.prepare("UPDATE threads SET last_nudged_at = ? WHERE conversation_id = ?").run(at, conversationId);
  }

  // ── Contacts ──

  getContact(email: string): Contact | null {
    const row = toRow(this.db.prepare("SELECT * FROM contacts WHERE email = ?").get(email));
    return row ? this.toContact(row) : null;
  }

  listContacts(limit = 100): Contact[] {
    const rows = this.db
      .prepare("SELECT * FROM contacts ORDER BY last_interaction DESC, email ASC LIMIT ?")
      .all(limit);
    return toRows(rows).map((r) => this.toContact(r));
  }

  saveContact(contact: Contact): void {
    this.db
      .prepare(
        `INSERT INTO contacts (email, name, first_seen, last_interaction, total_messages, user_initiated,
           they_initiated, cc_count, is_vip)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(email) DO UPDATE SET
           name = excluded.name,
           first_seen = excluded.first_seen,
           last_interaction = excluded.last_interaction,
           total_messages = excluded.total_messages,
           user_initiated = excluded.user_initiated,
           they_initiated = excluded.they_initiated,
           cc_count = excluded.cc_count,
           is_vip = excluded.is_vip`,
      )
      .run(
        contact.email,
        contact.name,
        contact.firstSeen,
        contact.lastInteraction,
        contact.totalMessages,
        contact.userInitiated,
        contact.theyInitiated,
        contact.ccCount,
        contact.isVip ? 1 : 0,
      );
  }

  deleteContact(email: string): void {
    this.db.prepare("DELETE FROM contacts WHERE email = ?").run(email);
  }

  // ── Decisions ──

  addDecision(params: AddDecisionParams): string {
    const id = randomUUID();
    this.db
      .prepare(
        `INSERT INTO decisions (id, source_item_id, conversation_id, question, context, requester, options, due_by,
           initial_urgency, urgency, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        params.sourceItemId,
        params.conversationId,
        params.question,
        params.context ?? null,
        params.requester ?? null,
        JSON.stringify(params.options ?? []),
        params.dueBy ?? null,
        params.urgency,
        params.urgency,
        params.createdAt,
      );
    return id;
  }

  getDecision(id: string): Decision | null {
    const row = toRow(this.db.prepare("SELECT * FROM decisions WHERE id = ?").get(id));
    return row ? this.toDecision(row) : null;
  }

  listDecisions(params: ListObligationsParams = {}): Decision[] {
    const where = params.open === undefined ? "" : `WHERE is_resolved = ${params.open ? 0 : 1}`;
    const rows = this.db
      .prepare(`SELECT * FROM decisions ${where} ORDER BY created_at ASC, id ASC LIMIT ?`)
      .all(params.limit ?? -1);
    return toRows(rows).map((r) => this.toDecision(r));
  }

  /** Changes urgency and marks the row unseen so alert rules see the change. */
  setDecisionUrgency(id: string, urgency: Urgency): void {
    this.db.prepare("UPDATE decisions SET urgency = ?, seen = 0 WHERE id = ? AND urgency != ?").run(urgency, id, urgency);
  }

  resolveDecision(id: string, resolution: Resolution, at: number): boolean {
    const result = this.db
      .prepare("UPDATE decisions SET is_resolved = 1, resolution = ?, resolved_at = ?, seen = 0 WHERE id = ? AND is_resolved = 0")
      .run(resolution, at, id);
    return result.changes > 0;
  }

  markDecisionNudged(id: string, at: number): void {
    this.db.prepare("UPDATE decisions SET last_nudged_at = ? WHERE id = ?").run(at, id);
  }

  listUnseenDecisions(): Decision[] {
    const rows = this.db.prepare("SELECT * FROM decisions WHERE seen = 0 ORDER BY created_at ASC, id ASC").all();
    return toRows(rows).map((r) => this.toDecision(r));
  }

  markDecisionSeen(id: string): void {
    this.db.prepare("UPDATE decisions SET seen = 1 WHERE id = ?").run(id);
  }

  // ── Commitments ──

  addCommitment(params: AddCommitmentParams): string {
    const id = randomUUID();
    this.db
      .prepare(
        `INSERT INTO commitments (id, source_item_id, conversation_id, description, to_whom, due_by,
           initial_urgency, urgency, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        params.sourceItemId,
        params.conversationId,
        params.description,
        params.toWhom ?? null,
        params.dueBy ?? null,
        params.urgency,
        params.urgency,
        params.createdAt,
      );
    return id;
  }

  getCommitment(id: string): Commitment | null {
    const row = toRow(this.db.prepare("SELECT * FROM commitments WHERE id = ?").get(id));
    return row ? this.toCommitment(row) : null;
  }

  listCommitments(params: ListObligationsParams = {}): Commitment[] {
    const where = params.open === undefined ? "" : `WHERE is_completed = ${params.open ? 0 : 1}`;
    const rows = this.db
      .prepare(
        `SELECT * FROM commitments ${where}
         ORDER BY due_by IS NULL, due_by ASC, created_at ASC, id ASC LIMIT ?`,
      )
      .all(params.limit ?? -1);
    return toRows(rows).map((r) => this.toCommitment(r));
  }

  setCommitmentUrgency(id: string, urgency: Urgency): void {
    this.db
      .prepare("UPDATE commitments SET urgency = ?, seen = 0 WHERE id = ? AND urgency != ?")
      .run(urgency, id, urgency);
  }

  completeCommitment(id: string, resolution: Resolution, at: number): boolean {
    const result = this.db
      .prepare(
        "UPDATE commitments SET is_completed = 1, resolution = ?, completed_at = ?, seen = 0 WHERE id = ? AND is_completed = 0",
      )
      .run(resolution, at, id);
    return result.changes > 0;
  }

  markCommitmentNudged(id: string, at: number): void {
    this.db.prepare("UPDATE commitments SET last_nudged_at = ? WHERE id = ?").run(at, id);
  }

  listUnseenCommitments(): Commitment[] {
    const rows = this.db.prepare("SELECT * FROM commitments WHERE seen = 0 ORDER BY created_at ASC, id ASC").all();
    return toRows(rows).map((r) => this.toCommitment(r));
  }

  markCommitmentSeen(id: string): void {
    this.db.prepare("UPDATE commitments SET seen = 1 WHERE id = ?").run(id);
  }

  // ── Observations ──

  addObservation(params: AddObservationParams): string {
    const id = randomUUID();
    this.db
      .prepare(
        `INSERT INTO observations (id, source_item_id, conversation_id, type, content, importance, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        params.sourceItemId,
        params.conversationId,
        params.type,
        params.content,
        params.importance,
        params.createdAt,
      );
    return id;
  }

  listObservations(params: { conversationId?: string; limit?: number } = {}): Observation[] {
    const where = params.conversationId ? "WHERE conversation_id = ?" : "";
    const values: unknown[] = params.conversationId ? [params.conversationId] : [];
    const rows = this.db
      .prepare(`SELECT * FROM observations ${where} ORDER BY created_at DESC, id ASC LIMIT ?`)
      .all(...values, params.limit ?? 50);
    return toRows(rows).map((r) => this.toObservation(r));
  }

  pruneObservations(before: number): number {
    return this.db.prepare("DELETE FROM observations WHERE created_at < ?").run(before).changes;
  }

  countObservations(): number {
    return count(this.db.prepare("SELECT COUNT(*) AS cnt FROM observations").get());
  }

  // ── Mappers ──

  private toThread(row: Row): Thread {
    return {
      conversationId: text(row, "conversation_id"),
      subject: text(row, "subject"),
      status: oneOf(row, "status", THREAD_STATUSES),
      needsReply: bool(row, "needs_reply"),
      urgency: oneOfOrNull(row, "urgency", URGENCY_LEVELS),
      lastActivityAt: num(row, "last_activity_at"),
      lastSender: text(row, "last_sender"),
      messageCount: num(row, "message_count"),
      participants: stringList(row, "participants"),
      lastNudgedAt: numOrNull(row, "last_nudged_at"),
    };
  }

  private toContact(row: Row): Contact {
    return {
      email: text(row, "email"),
      name: textOrNull(row, "name"),
      firstSeen: num(row, "first_seen"),
      lastInteraction: num(row, "last_interaction"),
      totalMessages: num(row, "total_messages"),
      userInitiated: num(row, "user_initiated"),
      theyInitiated: num(row, "they_initiated"),
      ccCount: num(row, "cc_count"),
      isVip: bool(row, "is_vip"),
    };
  }

  private toDecision(row: Row): Decision {
    return {
      id: text(row, "id"),
      sourceItemId: text(row, "source_item_id"),
      conversationId: textOrNull(row, "conversation_id"),
      question: text(row, "question"),
      context: textOrNull(row, "context"),
      requester: textOrNull(row, "requester"),
      options: stringList(row, "options"),
      dueBy: numOrNull(row, "due_by"),
      initialUrgency: oneOf(row, "initial_urgency", URGENCY_LEVELS),
      urgency: oneOf(row, "urgency", URGENCY_LEVELS),
      isResolved: bool(row, "is_resolved"),
      resolution: oneOfOrNull(row, "resolution", RESOLUTIONS),
      resolvedAt: numOrNull(row, "resolved_at"),
      createdAt: num(row, "created_at"),
      lastNudgedAt: numOrNull(row, "last_nudged_at"),
    };
  }

  private toCommitment(row: Row): Commitment {
    return {
      id: text(row, "id"),
      sourceItemId: text(row, "source_item_id"),
      conversationId: textOrNull(row, "conversation_id"),
      description: text(row, "description"),
      toWhom: textOrNull(row, "to_whom"),
      dueBy: numOrNull(row, "due_by"),
      initialUrgency: oneOf(row, "initial_urgency", URGENCY_LEVELS),
      urgency: oneOf(row, "urgency", URGENCY_LEVELS),
      isCompleted: bool(row, "is_completed"),
      resolution: oneOfOrNull(row, "resolution", RESOLUTIONS),
      completedAt: numOrNull(row, "completed_at"),
      createdAt: num(row, "created_at"),
      lastNudgedAt: numOrNull(row, "last_nudged_at"),
    };
  }

  private toObservation(row: Row): Observation {
    return {
      id: text(row, "id"),
      sourceItemId: textOrNull(row, "source_item_id"),
      conversationId: textOrNull(row, "conversation_id"),
      type: oneOf(row, "type", OBSERVATION_TYPES),
      content: text(row, "content"),
      importance: num(row, "importance"),
      createdAt: num(row, "created_at"),
    };
  }
}
