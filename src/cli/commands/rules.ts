import { Command, Option } from "clipanion";
import * as t from "typanion";
import { NotFoundError, ok, ValidationError } from "../../utils/errors.js";
import { StewardCommand } from "./base.js";

function parseCondition(raw: string | undefined): unknown {
  if (raw === undefined) return undefined;
  try {
    return JSON.parse(raw);
  } catch {
    throw new ValidationError("--condition must be JSON");
  }
}

export class RulesAddCommand extends StewardCommand {
  static override paths = [["rules", "add"]];

  static override usage = Command.Usage({
    description: "Add an alert rule from a natural-language description",
    examples: [
      ["Alert on a sender", 'steward rules add "alert me when boss@example.com emails about budget"'],
      ["Structured condition", `steward rules add "urgent mail" --condition '{"eventTypes":["email_received"],"predicates":[{"kind":"urgency_at_least","level":"immediate"}]}'`],
    ],
  });

  rule = Option.String({ name: "rule", required: true });
  cooldown = Option.String("--cooldown", {
    description: "Cooldown in minutes",
    validator: t.cascade(t.isNumber(), [t.isInteger(), t.isAtLeast(0)]),
  });
  channel = Option.String("--channel", { description: "Routing channel override" });
  target = Option.String("--target", { description: "Routing target override" });
  condition = Option.String("--condition", { description: "Condition as JSON, skipping the parser" });

  async execute(): Promise<number> {
    return this.withContext(async (ctx) => {
      const condition = parseCondition(this.condition);
      return ok(
        await ctx.alerts.addRule(this.rule, {
          ...(this.cooldown === undefined ? {} : { cooldownMinutes: this.cooldown }),
          ...(this.channel === undefined ? {} : { channel: this.channel }),
          ...(this.target === undefined ? {} : { channelTarget: this.target }),
          ...(condition === undefined ? {} : { condition }),
        }),
      );
    });
  }
}

export class RulesListCommand extends StewardCommand {
  static override paths = [["rules", "list"]];

  static override usage = Command.Usage({
    description: "List alert rules",
    examples: [["List enabled rules", "steward rules list --enabled"]],
  });

  enabled = Option.Boolean("--enabled", false, { description: "Only enabled rules" });

  async execute(): Promise<number> {
    return this.withContext((ctx) => ok(ctx.alertStore.listRules({ enabledOnly: this.enabled })));
  }
}

export class RulesRemoveCommand extends StewardCommand {
  static override paths = [["rules", "remove"]];

  static override usage = Command.Usage({
    description: "Remove an alert rule and its history",
    examples: [["Remove a rule", "steward rules remove <rule-id>"]],
  });

  id = Option.String({ name: "id", required: true });

  async execute(): Promise<number> {
    return this.withContext((ctx) => {
      if (!ctx.alertStore.deleteRule(this.id)) {
        throw new NotFoundError(`Rule not found: ${this.id}`, { ruleId: this.id });
      }
      return ok({ removed: this.id });
    });
  }
}

export class RulesEnableCommand extends StewardCommand {
  static override paths = [["rules", "enable"]];

  static override usage = Command.Usage({
    description: "Enable an alert rule",
    examples: [["Enable a rule", "steward rules enable <rule-id>"]],
  });

  id = Option.String({ name: "id", required: true });

  async execute(): Promise<number> {
    return this.withContext((ctx) => ok(ctx.alertStore.updateRule(this.id, { enabled: true })));
  }
}

export class RulesDisableCommand extends StewardCommand {
  static override paths = [["rules", "disable"]];

  static override usage = Command.Usage({
    description: "Disable an alert rule",
    examples: [["Disable a rule", "steward rules disable <rule-id>"]],
  });

  id = Option.String({ name: "id", required: true });

  async execute(): Promise<number> {
    return this.withContext((ctx) => ok(ctx.alertStore.updateRule(this.id, { enabled: false })));
  }
}
