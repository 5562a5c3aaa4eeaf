import { randomUUID } from "node:crypto";
import type { EventStore } from "../store/db.js";
import { bool, count, num, numOrNull, oneOf, text, textOrNull, toRow, toRows, type Row } from "../store/rows.js";
import { IntegrityError, NotFoundError } from "../utils/errors.js";
import { ALERT_EVENT_TYPES, alertConditionSchema, type AlertCondition, type AlertEventType } from "./schema.js";
import type { AlertHistoryEntry, AlertRule } from "./types.js";

export interface CreateRuleParams {
  naturalLanguageRule: string;
  condition: AlertCondition;
  cooldownMinutes: number;
  channel?: string | null;
  channelTarget?: string | null;
}

export interface UpdateRuleParams {
  enabled?: boolean;
  cooldownMinutes?: number;
  channel?: string | null;
  channelTarget?: string | null;
}

export interface RecordMatchParams {
  ruleId: string;
  eventType: AlertEventType;
  eventId: string;
  matchReason: string;
  payload: Record<string, unknown>;
  cooldownMs: number;
}

/** Alert rules and their trigger history. */
export class AlertStore {
  private readonly db;

  constructor(
    private readonly store: EventStore,
    private readonly clock: () => number = Date.now,
  ) {
    this.db = store.raw();
  }

  // ── Rules ──

  createRule(params: CreateRuleParams): AlertRule {
    const id = randomUUID();
    const now = this.clock();
    this.db
      .prepare(
        `INSERT INTO alert_rules (id, natural_language_rule, condition, enabled, cooldown_minutes, channel,
           channel_target, created_at, updated_at)
         VALUES (?, ?, ?, 1, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        params.naturalLanguageRule,
        JSON.stringify(params.condition),
        params.cooldownMinutes,
        params.channel ?? null,
        params.channelTarget ?? null,
        now,
        now,
      );
    const rule = this.getRule(id);
    if (!rule) throw new IntegrityError("Rule vanished after insert", { ruleId: id });
    return rule;
  }

  getRule(id: string): AlertRule | null {
    const row = toRow(this.db.prepare("SELECT * FROM alert_rules WHERE id = ?").get(id));
    return row ? this.toRule(row) : null;
  }

  listRules(params: { enabledOnly?: boolean } = {}): AlertRule[] {
    const where = params.enabledOnly ? "WHERE enabled = 1" : "";
    const rows = this.db.prepare(`SELECT * FROM alert_rules ${where} ORDER BY created_at ASC, id ASC`).all();
    return toRows(rows).map((r) => this.toRule(r));
  }

  updateRule(id: string, params: UpdateRuleParams): AlertRule {
    const sets: string[] = [];
    const values: unknown[] = [];
    if (params.enabled !== undefined) {
      sets.push("enabled = ?");
      values.push(params.enabled ? 1 : 0);
    }
    if (params.cooldownMinutes !== undefined) {
      sets.push("cooldown_minutes = ?");
      values.push(params.cooldownMinutes);
    }
    if (params.channel !== undefined) {
      sets.push("channel = ?");
      values.push(params.channel);
    }
    if (params.channelTarget !== undefined) {
      sets.push("channel_target = ?");
      values.push(params.channelTarget);
    }
    sets.push("updated_at = ?");
    values.push(this.clock());

    const result = this.db.prepare(`UPDATE alert_rules SET ${sets.join(", ")} WHERE id = ?`).run(...values, id);
    const rule = result.changes > 0 ? this.getRule(id) : null;
    if (!rule) throw new NotFoundError(`No alert rule ${id}`, { ruleId: id });
    return rule;
  }

  deleteRule(id: string): boolean {
    return this.db.prepare("DELETE FROM alert_rules WHERE id = ?").run(id).changes > 0;
  }

  // ── History ──

  /** True when (rule, event type, event id) already fired at or after `since`. */
  hasRecentMatch(ruleId: string, eventType: AlertEventType, eventId: string, since: number): boolean {
    return (
      count(
        this.db
          .prepare(
            `SELECT COUNT(*) AS cnt FROM alert_history
             WHERE rule_id = ? AND event_type = ? AND event_id = ? AND triggered_at > ?`,
          )
          .get(ruleId, eventType, eventId, since),
      ) > 0
    );
  }

  /**
   * Checks the cooldown and inserts the history row in one transaction.
   * Returns the new row id, or null when a row inside the cooldown exists.
   */
  recordMatch(params: RecordMatchParams): string | null {
    return this.store.transaction(() => {
      const now = this.clock();
      if (this.hasRecentMatch(params.ruleId, params.eventType, params.eventId, now - params.cooldownMs)) {
        return null;
      }
      const id = randomUUID();
      this.db
        .prepare(
          `INSERT INTO alert_history (id, rule_id, event_type, event_id, match_reason, payload, triggered_at)
           VALUES (?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          id,
          params.ruleId,
          params.eventType,
          params.eventId,
          params.matchReason,
          JSON.stringify(params.payload),
          now,
        );
      this.db.prepare("UPDATE alert_rules SET last_triggered_at = ? WHERE id = ?").run(now, params.ruleId);
      return id;
    });
  }

  /** Compensates a history row whose trigger could not be published. */
  removeHistory(id: string): void {
    this.db.prepare("DELETE FROM alert_history WHERE id = ?").run(id);
  }

  listHistory(params: { ruleId?: string; limit?: number } = {}): AlertHistoryEntry[] {
    const where = params.ruleId ? "WHERE rule_id = ?" : "";
    const values: unknown[] = params.ruleId ? [params.ruleId] : [];
    const rows = this.db
      .prepare(`SELECT * FROM alert_history ${where} ORDER BY triggered_at DESC, id ASC LIMIT ?`)
      .all(...values, params.limit ?? 50);
    return toRows(rows).map((r) => ({
      id: text(r, "id"),
      ruleId: text(r, "rule_id"),
      eventType: oneOf(r, "event_type", ALERT_EVENT_TYPES),
      eventId: text(r, "event_id"),
      matchReason: textOrNull(r, "match_reason"),
      triggeredAt: num(r, "triggered_at"),
    }));
  }

  // ── Mappers ──

  private toRule(row: Row): AlertRule {
    const condition = alertConditionSchema.safeParse(JSON.parse(text(row, "condition")));
    if (!condition.success) {
      throw new IntegrityError("Stored alert condition is invalid", { ruleId: text(row, "id") });
    }
    return {
      id: text(row, "id"),
      naturalLanguageRule: text(row, "natural_language_rule"),
      condition: condition.data,
      enabled: bool(row, "enabled"),
      cooldownMinutes: num(row, "cooldown_minutes"),
      channel: textOrNull(row, "channel"),
      channelTarget: textOrNull(row, "channel_target"),
      createdAt: num(row, "created_at"),
      updatedAt: num(row, "updated_at"),
      lastTriggeredAt: numOrNull(row, "last_triggered_at"),
    };
  }
}
