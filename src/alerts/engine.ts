import type { Logger } from "../logging/logger.js";
import type { TriggerSink } from "../triggers/types.js";
import { errorMessage } from "../utils/errors.js";
import { withTimeout } from "../utils/timeout.js";
import { evaluateCondition, summarizeEvent } from "./match.js";
import { validateCondition, type RuleParser } from "./parser.js";
import type { AlertStore } from "./store.js";
import type { AlertEvent, AlertRule, SemanticMatchPort } from "./types.js";

export type AlertStatus = "triggered" | "no_match" | "cooldown" | "semantic_rejected" | "publish_failed";

export interface AlertEvaluation {
  readonly ruleId: string;
  readonly status: AlertStatus;
  readonly reason: string;
}

export interface AddRuleOptions {
  cooldownMinutes?: number;
  channel?: string | null;
  channelTarget?: string | null;
  /** A structured condition to store instead of parsing the text. */
  condition?: unknown;
}

export interface AlertEngineDeps {
  store: AlertStore;
  sink: TriggerSink;
  parser: RuleParser;
  semantic?: SemanticMatchPort;
  semanticTimeoutMs: number;
  defaultCooldownMinutes: number;
  logger: Logger;
  clock?: () => number;
}

/**
 * Matches rules against events. Cheap predicates run first, then the history
 * check, then the semantic matcher; the history row is written atomically with
 * its cooldown check and removed again if the trigger cannot be published.
 */
export class AlertEngine {
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(private readonly deps: AlertEngineDeps) {
    this.logger = deps.logger.child({ component: "alert-engine" });
    this.clock = deps.clock ?? Date.now;
  }

  async addRule(naturalLanguageRule: string, opts: AddRuleOptions = {}): Promise<AlertRule> {
    const condition =
      opts.condition === undefined
        ? await this.deps.parser.parse(naturalLanguageRule)
        : validateCondition(opts.condition);
    const rule = this.deps.store.createRule({
      naturalLanguageRule: naturalLanguageRule.trim(),
      condition,
      cooldownMinutes: opts.cooldownMinutes ?? this.deps.defaultCooldownMinutes,
      channel: opts.channel ?? null,
      channelTarget: opts.channelTarget ?? null,
    });
    this.logger.info({ ruleId: rule.id, eventTypes: condition.eventTypes }, "Alert rule created");
    return rule;
  }

  async evaluate(event: AlertEvent): Promise<AlertEvaluation[]> {
    const results: AlertEvaluation[] = [];
    for (const rule of this.deps.store.listRules({ enabledOnly: true })) {
      if (!rule.condition.eventTypes.includes(event.type)) continue;
      try {
        results.push(await this.evaluateRule(rule, event));
      } catch (err) {
        this.logger.error({ err, ruleId: rule.id, eventId: event.id }, "Alert rule evaluation failed");
      }
    }
    return results;
  }

  private async evaluateRule(rule: AlertRule, event: AlertEvent): Promise<AlertEvaluation> {
    const result = evaluateCondition(rule.condition, event);
    if (!result.matched) {
      return { ruleId: rule.id, status: "no_match", reason: result.reasons.join("; ") };
    }

    const cooldownMs = rule.cooldownMinutes * 60_000;
    if (this.deps.store.hasRecentMatch(rule.id, event.type, event.id, this.clock() - cooldownMs)) {
      return { ruleId: rule.id, status: "cooldown", reason: "Already triggered within cooldown" };
    }

    const summary = summarizeEvent(event);
    const reasons = [...result.reasons];
    if (rule.condition.semantic) {
      const verdict = await this.semanticMatch(rule, summary);
      if (!verdict.matches) {
        return { ruleId: rule.id, status: "semantic_rejected", reason: verdict.reason };
      }
      reasons.push(verdict.reason);
    }

    const matchReason = reasons.join("; ");
    const payload: Record<string, unknown> = {
      rule_id: rule.id,
      rule_text: rule.naturalLanguageRule,
      event_type: event.type,
      event_id: event.id,
      match_reason: matchReason,
      ...summary,
    };

    const historyId = this.deps.store.recordMatch({
      ruleId: rule.id,
      eventType: event.type,
      eventId: event.id,
      matchReason,
      payload,
      cooldownMs,
    });
    if (historyId === null) {
      return { ruleId: rule.id, status: "cooldown", reason: "Already triggered within cooldown" };
    }

    try {
      await this.deps.sink.publish({
        type: "alert_rule_triggered",
        primaryId: `${rule.id}:${event.type}:${event.id}:${historyId}`,
        payload,
        skipDedupe: true,
        ...(rule.channel
          ? { routing: { channel: rule.channel, ...(rule.channelTarget ? { target: rule.channelTarget } : {}) } }
          : {}),
      });
    } catch (err) {
      this.deps.store.removeHistory(historyId);
      this.logger.error({ err, ruleId: rule.id, eventId: event.id }, "Alert trigger publish failed");
      return { ruleId: rule.id, status: "publish_failed", reason: errorMessage(err) };
    }

    this.logger.info({ ruleId: rule.id, eventType: event.type, eventId: event.id }, "Alert rule triggered");
    return { ruleId: rule.id, status: "triggered", reason: matchReason };
  }

  private async semanticMatch(
    rule: AlertRule,
    summary: Record<string, unknown>,
  ): Promise<{ matches: boolean; reason: string }> {
    const port = this.deps.semantic;
    if (!port) {
      return { matches: false, reason: "No semantic matcher configured" };
    }
    try {
      const verdict = await withTimeout("semantic match", this.deps.semanticTimeoutMs, (signal) =>
        port.match({ rule: rule.naturalLanguageRule, event: summary }, signal),
      );
      return { matches: verdict.matches, reason: verdict.reason || "Semantic match" };
    } catch (err) {
      this.logger.warn({ err, ruleId: rule.id }, "Semantic match failed, suppressing");
      return { matches: false, reason: `Semantic match failed: ${errorMessage(err)}` };
    }
  }
}
