import type { EventStore } from "./db.js";
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
} from "./rows.js";
import {
  ITEM_STATES,
  URGENCY_LEVELS,
  type Attachment,
  type CleanupAction,
  type ExtractionStatus,
  type Item,
  type ItemKind,
  type ItemOutcome,
  type ItemState,
  type TriageLogEntry,
  type Urgency,
} from "./types.js";

export interface UpsertAttachmentParams {
  id: string;
  filename: string;
  contentType?: string | null;
  size?: number;
  extractedText?: string | null;
  extractionStatus?: ExtractionStatus;
}

export interface UpsertItemParams {
  id: string;
  kind: ItemKind;
  conversationId?: string | null;
  sender: string;
  senderName?: string | null;
  toRecipients?: readonly string[];
  ccRecipients?: readonly string[];
  subject?: string;
  bodyPreview?: string;
  bodyText?: string | null;
  receivedAt: number;
  organizer?: string | null;
  attendees?: readonly string[];
  location?: string | null;
  startAt?: number | null;
  endAt?: number | null;
  extractionStatus?: ExtractionStatus;
  attachments?: readonly UpsertAttachmentParams[];
}

export type UpsertOutcome = "inserted" | "updated";

export interface ListItemsParams {
  state?: ItemState;
  category?: string;
  conversationId?: string;
  since?: number;
  includeDeleted?: boolean;
  limit?: number;
}

export interface ClassificationFields {
  categories: readonly string[];
  urgency: Urgency;
  requiresReply: boolean;
  cleanupAction: CleanupAction;
  reason: string;
  confidence: number;
}

export interface FinalizeParams {
  itemId: string;
  leaseOwner: string;
  outcome: ItemOutcome;
  classification: ClassificationFields | null;
  error: string | null;
}

export type DeleteMode = "hard" | "soft";

export interface DeleteResult {
  readonly removed: boolean;
  readonly attachments: number;
  readonly chunks: number;
}

export interface ReplyTracking {
  readonly itemId: string;
  readonly requiresReply: boolean;
  readonly reason: string | null;
  readonly lastActivityAt: number;
  readonly nudgeScheduledAt: number | null;
}

export interface Label {
  readonly label: string;
  readonly confidence: number;
}

const OUTCOMES: readonly ItemOutcome[] = ["actioned", "failed"];
const CLEANUP_ACTIONS: readonly CleanupAction[] = ["keep", "archive", "delete"];
const EXTRACTION_STATUSES: readonly ExtractionStatus[] = ["pending", "complete"];

function normalizeAddress(address: string): string {
  return address.trim().toLowerCase();
}

function json(list: readonly string[] | undefined): string {
  return JSON.stringify(list ?? []);
}

/**
 * Items, attachments and the per-item rows the Organizer writes. Upserts are
 * keyed by external id and never touch classification or processing fields.
 */
export class ItemStore {
  private readonly db;
  private readonly owner: string;

  constructor(
    private readonly store: EventStore,
    owner: string,
    private readonly clock: () => number = Date.now,
  ) {
    this.db = store.raw();
    this.owner = normalizeAddress(owner);
  }

  // ── Ingestion ──

  upsertItem(params: UpsertItemParams): UpsertOutcome {
    return this.store.transaction(() => {
      const now = this.clock();
      const sender = normalizeAddress(params.sender);
      const to = (params.toRecipients ?? []).map(normalizeAddress);
      const cc = (params.ccRecipients ?? []).map(normalizeAddress);
      const organizer = params.organizer ? normalizeAddress(params.organizer) : null;
      const ownSender = this.owner !== "" && (sender === this.owner || organizer === this.owner);
      const direction = ownSender ? "outbound" : "inbound";
      const isCc = this.owner !== "" && !ownSender && cc.includes(this.owner) && !to.includes(this.owner);
      const existed = count(this.db.prepare("SELECT COUNT(*) AS cnt FROM items WHERE id = ?").get(params.id)) > 0;

      this.db
        .prepare(
          `INSERT INTO items (id, kind, conversation_id, sender, sender_name, to_recipients, cc_recipients,
             direction, is_cc, subject, body_preview, body_text, received_at, organizer, attendees, location,
             start_at, end_at, extraction_status, created_at, updated_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT(id) DO UPDATE SET
             kind = excluded.kind,
             conversation_id = excluded.conversation_id,
             sender = excluded.sender,
             sender_name = COALESCE(excluded.sender_name, items.sender_name),
             to_recipients = excluded.to_recipients,
             cc_recipients = excluded.cc_recipients,
             direction = excluded.direction,
             is_cc = excluded.is_cc,
             subject = excluded.subject,
             body_preview = excluded.body_preview,
             body_text = excluded.body_text,
             received_at = excluded.received_at,
             organizer = excluded.organizer,
             attendees = excluded.attendees,
             location = excluded.location,
             start_at = excluded.start_at,
             end_at = excluded.end_at,
             extraction_status = excluded.extraction_status,
             indexed_at = CASE
               WHEN items.deleted_at IS NOT NULL
                 OR items.subject IS NOT excluded.subject
                 OR items.body_preview IS NOT excluded.body_preview
                 OR items.body_text IS NOT excluded.body_text
                 OR items.extraction_status IS NOT excluded.extraction_status
               THEN NULL ELSE items.indexed_at END,
             deleted_at = NULL,
             updated_at = excluded.updated_at`,
        )
        .run(
          params.id,
          params.kind,
          params.conversationId ?? null,
          sender,
          params.senderName ?? null,
          json(to),
          json(cc),
          direction,
          isCc ? 1 : 0,
          params.subject ?? "",
          params.bodyPreview ?? "",
          params.bodyText ?? null,
          params.receivedAt,
          organizer,
          json((params.attendees ?? []).map(normalizeAddress)),
          params.location ?? null,
          params.startAt ?? null,
          params.endAt ?? null,
          params.extractionStatus ?? "complete",
          now,
          now,
        );

      for (const attachment of params.attachments ?? []) {
        this.upsertAttachment(params.id, attachment);
      }
      return existed ? "updated" : "inserted";
    });
  }

  private upsertAttachment(itemId: string, params: UpsertAttachmentParams): void {
    const previous = toRow(
      this.db.prepare("SELECT extracted_text, extraction_status FROM attachments WHERE id = ?").get(params.id),
    );
    const extractedText = params.extractedText ?? null;
    const status = params.extractionStatus ?? (extractedText === null ? "pending" : "complete");
    this.db
      .prepare(
        `INSERT INTO attachments (id, item_id, filename, content_type, size, extracted_text, extraction_status)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           filename = excluded.filename,
           content_type = excluded.content_type,
           size = excluded.size,
           extracted_text = excluded.extracted_text,
           extraction_status = excluded.extraction_status`,
      )
      .run(params.id, itemId, params.filename, params.contentType ?? null, params.size ?? 0, extractedText, status);

    const changed =
      !previous ||
      textOrNull(previous, "extracted_text") !== extractedText ||
      text(previous, "extraction_status") !== status;
    if (changed) {
      this.db.prepare("UPDATE items SET indexed_at = NULL WHERE id = ?").run(itemId);
    }
  }

  // ── Deletion ──

  /**
   * Removes an item and everything derived from it in one transaction. A soft
   * delete keeps the row (hidden by `deleted_at`) with its attachments and
   * labels, and drops its chunks, reply tracking and working-memory facts.
   */
  deleteItem(id: string, mode: DeleteMode = "hard"): DeleteResult {
    return this.store.transaction(() => {
      const attachments = count(
        this.db.prepare("SELECT COUNT(*) AS cnt FROM attachments WHERE item_id = ?").get(id),
      );
      const chunks = count(this.db.prepare("SELECT COUNT(*) AS cnt FROM chunks WHERE item_id = ?").get(id));

      if (mode === "hard") {
        const result = this.db.prepare("DELETE FROM items WHERE id = ?").run(id);
        return { removed: result.changes > 0, attachments, chunks };
      }

      const result = this.db
        .prepare("UPDATE items SET deleted_at = ?, indexed_at = NULL, updated_at = ? WHERE id = ? AND deleted_at IS NULL")
        .run(this.clock(), this.clock(), id);
      if (result.changes === 0) return { removed: false, attachments: 0, chunks: 0 };
      for (const table of ["chunks", "reply_tracking"]) {
        this.db.prepare(`DELETE FROM ${table} WHERE item_id = ?`).run(id);
      }
      for (const table of ["decisions", "commitments", "observations"]) {
        this.db.prepare(`DELETE FROM ${table} WHERE source_item_id = ?`).run(id);
      }
      return { removed: true, attachments: 0, chunks };
    });
  }

  // ── Claiming ──

  /**
   * Leases up to `limit` unprocessed items to `leaseOwner`. One conditional
   * UPDATE, so concurrent workers always receive disjoint batches.
   */
  claimBatch(leaseOwner: string, limit: number, leaseMs: number): Item[] {
    const now = this.clock();
    const rows = this.db
      .prepare(
        `UPDATE items
         SET state = 'classifying', lease_owner = ?, lease_expires_at = ?, claims = claims + 1, updated_at = ?
         WHERE id IN (
           SELECT id FROM items
           WHERE processed_at IS NULL AND deleted_at IS NULL
             AND (lease_owner IS NULL OR lease_expires_at IS NULL OR lease_expires_at <= ?)
           ORDER BY received_at ASC, id ASC
           LIMIT ?
         )
         AND processed_at IS NULL
         RETURNING *`,
      )
      .all(leaseOwner, now + leaseMs, now, now, limit);
    return toRows(rows)
      .map((r) => this.toItem(r))
      .sort((a, b) => a.receivedAt - b.receivedAt || a.id.localeCompare(b.id));
  }

  releaseLease(itemId: string, leaseOwner: string, error: string | null): boolean {
    const result = this.db
      .prepare(
        `UPDATE items SET state = 'unprocessed', lease_owner = NULL, lease_expires_at = NULL, last_error = ?, updated_at = ?
         WHERE id = ? AND lease_owner = ? AND processed_at IS NULL`,
      )
      .run(error, this.clock(), itemId, leaseOwner);
    return result.changes > 0;
  }

  /**
   * Writes the terminal state. Guarded by `processed_at IS NULL` and the lease
   * owner, so it succeeds at most once per item. Must run inside the caller's
   * transaction together with the triage-log row.
   */
  finalize(params: FinalizeParams): boolean {
    const now = this.clock();
    const c = params.classification;
    const result = this.db
      .prepare(
        `UPDATE items SET
           categories = COALESCE(?, categories),
           urgency = COALESCE(?, urgency),
           requires_reply = COALESCE(?, requires_reply),
           cleanup_action = COALESCE(?, cleanup_action),
           classification_reason = COALESCE(?, classification_reason),
           confidence = COALESCE(?, confidence),
           state = 'processed', outcome = ?, processed_at = ?, last_error = ?,
           lease_owner = NULL, lease_expires_at = NULL, updated_at = ?
         WHERE id = ? AND processed_at IS NULL AND lease_owner = ?`,
      )
      .run(
        c ? JSON.stringify(c.categories) : null,
        c ? c.urgency : null,
        c ? (c.requiresReply ? 1 : 0) : null,
        c ? c.cleanupAction : null,
        c ? c.reason : null,
        c ? c.confidence : null,
        params.outcome,
        now,
        params.error,
        now,
        params.itemId,
        params.leaseOwner,
      );
    return result.changes === 1;
  }

  appendTriageLog(itemId: string, outcome: ItemOutcome, c: ClassificationFields | null, error: string | null): void {
    this.db
      .prepare(
        `INSERT INTO triage_log (item_id, categories, urgency, reason, outcome, error, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        itemId,
        JSON.stringify(c?.categories ?? []),
        c?.urgency ?? null,
        c?.reason ?? null,
        outcome,
        error,
        this.clock(),
      );
  }

  // ── Labels & reply tracking ──

  setLabels(itemId: string, labels: readonly Label[]): void {
    const insert = this.db.prepare(
      `INSERT INTO labels (item_id, label, confidence) VALUES (?, ?, ?)
       ON CONFLICT(item_id, label) DO UPDATE SET confidence = excluded.confidence`,
    );
    for (const l of labels) {
      insert.run(itemId, l.label, l.confidence);
    }
  }

  listLabels(itemId: string): Label[] {
    const rows = this.db.prepare("SELECT label, confidence FROM labels WHERE item_id = ? ORDER BY label").all(itemId);
    return toRows(rows).map((r) => ({ label: text(r, "label"), confidence: num(r, "confidence") }));
  }

  trackReply(itemId: string, reason: string | null, lastActivityAt: number): void {
    this.db
      .prepare(
        `INSERT INTO reply_tracking (item_id, requires_reply, reason, last_activity_at)
         VALUES (?, 1, ?, ?)
         ON CONFLICT(item_id) DO UPDATE SET reason = excluded.reason, last_activity_at = excluded.last_activity_at`,
      )
      .run(itemId, reason, lastActivityAt);
  }

  /** The owner answered; the item no longer needs a follow-up. */
  markReplied(itemId: string): boolean {
    const result = this.db
      .prepare("UPDATE reply_tracking SET requires_reply = 0 WHERE item_id = ? AND requires_reply = 1")
      .run(itemId);
    return result.changes > 0;
  }

  getReplyTracking(itemId: string): ReplyTracking | null {
    const row = toRow(this.db.prepare("SELECT * FROM reply_tracking WHERE item_id = ?").get(itemId));
    return row ? this.toReplyTracking(row) : null;
  }

  /** Reply-tracked inbound items older than `before` with no follow-up scheduled yet. */
  listFollowupCandidates(before: number, limit: number): Item[] {
    const rows = this.db
      .prepare(
        `SELECT i.* FROM items i
         JOIN reply_tracking r ON r.item_id = i.id
         WHERE r.requires_reply = 1 AND r.nudge_scheduled_at IS NULL
           AND i.deleted_at IS NULL AND i.direction = 'inbound' AND i.is_cc = 0
           AND i.received_at <= ?
         ORDER BY i.received_at ASC
         LIMIT ?`,
      )
      .all(before, limit);
    return toRows(rows).map((r) => this.toItem(r));
  }

  hasLaterOutbound(conversationId: string, after: number): boolean {
    return (
      count(
        this.db
          .prepare(
            `SELECT COUNT(*) AS cnt FROM items
             WHERE conversation_id = ? AND direction = 'outbound' AND deleted_at IS NULL AND received_at > ?`,
          )
          .get(conversationId, after),
      ) > 0
    );
  }

  markFollowupScheduled(itemId: string, at: number): boolean {
    const result = this.db
      .prepare("UPDATE reply_tracking SET nudge_scheduled_at = ? WHERE item_id = ? AND nudge_scheduled_at IS NULL")
      .run(at, itemId);
    return result.changes > 0;
  }

  // ── Reads ──

  getItem(id: string, includeDeleted = false): Item | null {
    const row = toRow(
      this.db
        .prepare(`SELECT * FROM items WHERE id = ? ${includeDeleted ? "" : "AND deleted_at IS NULL"}`)
        .get(id),
    );
    return row ? this.toItem(row) : null;
  }

  listItems(params: ListItemsParams = {}): Item[] {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (!params.includeDeleted) {
      conditions.push("deleted_at IS NULL");
    }
    if (params.state) {
      conditions.push("state = ?");
      values.push(params.state);
    }
    if (params.category) {
      conditions.push("EXISTS (SELECT 1 FROM json_each(items.categories) WHERE json_each.value = ?)");
      values.push(params.category);
    }
    if (params.conversationId) {
      conditions.push("conversation_id = ?");
      values.push(params.conversationId);
    }
    if (params.since !== undefined) {
      conditions.push("received_at >= ?");
      values.push(params.since);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
    const rows = this.db
      .prepare(`SELECT * FROM items ${where} ORDER BY received_at DESC, id ASC LIMIT ?`)
      .all(...values, params.limit ?? 50);
    return toRows(rows).map((r) => this.toItem(r));
  }

  /** Every live, direct or outbound message, oldest first. */
  listDirectMessages(): Item[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM items
         WHERE deleted_at IS NULL AND is_cc = 0 AND kind = 'message'
         ORDER BY received_at ASC, id ASC`,
      )
      .all();
    return toRows(rows).map((r) => this.toItem(r));
  }

  /** Live calendar events starting in `[from, to]`, earliest first. */
  listEventsStarting(from: number, to: number): Item[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM items
         WHERE kind = 'event' AND deleted_at IS NULL AND start_at >= ? AND start_at <= ?
         ORDER BY start_at ASC, id ASC`,
      )
      .all(from, to);
    return toRows(rows).map((r) => this.toItem(r));
  }

  /** Live messages from, to or copied to `address` since `since`. */
  correspondenceWith(address: string, since: number): { count: number; lastSubject: string | null } {
    const match = `deleted_at IS NULL AND kind = 'message' AND received_at >= ? AND (
      sender = ?
      OR EXISTS (SELECT 1 FROM json_each(items.to_recipients) WHERE json_each.value = ?)
      OR EXISTS (SELECT 1 FROM json_each(items.cc_recipients) WHERE json_each.value = ?))`;
    const addr = normalizeAddress(address);
    const args = [since, addr, addr, addr];
    const total = count(this.db.prepare(`SELECT COUNT(*) AS cnt FROM items WHERE ${match}`).get(...args));
    const latest = toRow(
      this.db.prepare(`SELECT subject FROM items WHERE ${match} ORDER BY received_at DESC, id ASC LIMIT 1`).get(...args),
    );
    return { count: total, lastSubject: latest ? text(latest, "subject") : null };
  }

  listUnindexed(limit: number): Item[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM items
         WHERE indexed_at IS NULL AND deleted_at IS NULL AND extraction_status = 'complete'
         ORDER BY received_at ASC LIMIT ?`,
      )
      .all(limit);
    return toRows(rows).map((r) => this.toItem(r));
  }

  markIndexed(itemId: string, at: number): void {
    this.db.prepare("UPDATE items SET indexed_at = ? WHERE id = ?").run(at, itemId);
  }

  resetIndex(): number {
    return this.db.prepare("UPDATE items SET indexed_at = NULL WHERE indexed_at IS NOT NULL").run().changes;
  }

  listAttachments(itemId: string): Attachment[] {
    const rows = this.db.prepare("SELECT * FROM attachments WHERE item_id = ? ORDER BY id").all(itemId);
    return toRows(rows).map((r) => this.toAttachment(r));
  }

  listTriageLog(itemId: string): TriageLogEntry[] {
    const rows = this.db.prepare("SELECT * FROM triage_log WHERE item_id = ? ORDER BY id").all(itemId);
    return toRows(rows).map((r) => this.toTriageLog(r));
  }

  countByState(): Record<ItemState, number> {
    const counts: Record<ItemState, number> = {
      unprocessed: 0,
      classifying: 0,
      actioned: 0,
      failed: 0,
      processed: 0,
    };
    const rows = this.db
      .prepare("SELECT state, COUNT(*) AS cnt FROM items WHERE deleted_at IS NULL GROUP BY state")
      .all();
    for (const row of toRows(rows)) {
      counts[oneOf(row, "state", ITEM_STATES)] = num(row, "cnt");
    }
    return counts;
  }

  // ── Mappers ──

  private toItem(row: Row): Item {
    return {
      id: text(row, "id"),
      kind: oneOf(row, "kind", ["message", "event"] as const),
      conversationId: textOrNull(row, "conversation_id"),
      sender: text(row, "sender"),
      senderName: textOrNull(row, "sender_name"),
      toRecipients: stringList(row, "to_recipients"),
      ccRecipients: stringList(row, "cc_recipients"),
      direction: oneOf(row, "direction", ["inbound", "outbound"] as const),
      isCc: bool(row, "is_cc"),
      subject: text(row, "subject"),
      bodyPreview: text(row, "body_preview"),
      bodyText: textOrNull(row, "body_text"),
      receivedAt: num(row, "received_at"),
      organizer: textOrNull(row, "organizer"),
      attendees: stringList(row, "attendees"),
      location: textOrNull(row, "location"),
      startAt: numOrNull(row, "start_at"),
      endAt: numOrNull(row, "end_at"),
      categories: stringList(row, "categories"),
      urgency: oneOfOrNull(row, "urgency", URGENCY_LEVELS),
      requiresReply: bool(row, "requires_reply"),
      cleanupAction: oneOfOrNull(row, "cleanup_action", CLEANUP_ACTIONS),
      classificationReason: textOrNull(row, "classification_reason"),
      confidence: numOrNull(row, "confidence"),
      state: oneOf(row, "state", ITEM_STATES),
      outcome: oneOfOrNull(row, "outcome", OUTCOMES),
      processedAt: numOrNull(row, "processed_at"),
      claims: num(row, "claims"),
      lastError: textOrNull(row, "last_error"),
      extractionStatus: oneOf(row, "extraction_status", EXTRACTION_STATUSES),
      indexedAt: numOrNull(row, "indexed_at"),
      deletedAt: numOrNull(row, "deleted_at"),
      createdAt: num(row, "created_at"),
      updatedAt: num(row, "updated_at"),
    };
  }

  private toAttachment(row: Row): Attachment {
    return {
      id: text(row, "id"),
      itemId: text(row, "item_id"),
      filename: text(row, "filename"),
      contentType: textOrNull(row, "content_type"),
      size: num(row, "size"),
      extractedText: textOrNull(row, "extracted_text"),
      extractionStatus: oneOf(row, "extraction_status", EXTRACTION_STATUSES),
    };
  }

  private toTriageLog(row: Row): TriageLogEntry {
    return {
      id: num(row, "id"),
      itemId: text(row, "item_id"),
      categories: stringList(row, "categories"),
      urgency: oneOfOrNull(row, "urgency", URGENCY_LEVELS),
      reason: textOrNull(row, "reason"),
      outcome: oneOf(row, "outcome", OUTCOMES),
      error: textOrNull(row, "error"),
      createdAt: num(row, "created_at"),
    };
  }

  private toReplyTracking(row: Row): ReplyTracking {
    return {
      itemId: text(row, "item_id"),
      requiresReply: bool(row, "requires_reply"),
      reason: textOrNull(row, "reason"),
      lastActivityAt: num(row, "last_activity_at"),
      nudgeScheduledAt: numOrNull(row, "nudge_scheduled_at"),
    };
  }
}
