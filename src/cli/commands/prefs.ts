import { Command, Option } from "clipanion";
import type { AppContext } from "../../runtime/context.js";
import { ok, ValidationError } from "../../utils/errors.js";
import { StewardCommand } from "./base.js";

/** Values are JSON where they parse as JSON, otherwise plain strings. */
export function parsePreferenceValue(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}

function resolveUser(ctx: AppContext, user: string | undefined): string {
  const resolved = user ?? ctx.config.mailbox.owner;
  if (!resolved) throw new ValidationError("No user given and mailbox.owner is not configured");
  return resolved;
}

export class PrefsGetCommand extends StewardCommand {
  static override paths = [["prefs", "get"]];

  static override usage = Command.Usage({
    description: "Show stored preferences",
    examples: [["Show preferences for the mailbox owner", "steward prefs get"]],
  });

  user = Option.String("--user", { description: "Defaults to mailbox.owner" });

  async execute(): Promise<number> {
    return this.withContext(async (ctx) => ok(await ctx.preferences.get(resolveUser(ctx, this.user))));
  }
}

export class PrefsSetCommand extends StewardCommand {
  static override paths = [["prefs", "set"]];

  static override usage = Command.Usage({
    description: "Set one preference; takes effect on the next cycle",
    examples: [
      ["Set the timezone", "steward prefs set timezone Europe/Berlin"],
      ["Set VIP senders", `steward prefs set vipSenders '["ceo@example.com"]'`],
    ],
  });

  key = Option.String({ name: "key", required: true });
  value = Option.String({ name: "value", required: true });
  user = Option.String("--user", { description: "Defaults to mailbox.owner" });

  async execute(): Promise<number> {
    return this.withContext(async (ctx) =>
      ok(await ctx.preferences.set(resolveUser(ctx, this.user), this.key, parsePreferenceValue(this.value))),
    );
  }
}

export class PrefsUnsetCommand extends StewardCommand {
  static override paths = [["prefs", "unset"]];

  static override usage = Command.Usage({
    description: "Remove one preference, falling back to configuration",
    examples: [["Unset the timezone", "steward prefs unset timezone"]],
  });

  key = Option.String({ name: "key", required: true });
  user = Option.String("--user", { description: "Defaults to mailbox.owner" });

  async execute(): Promise<number> {
    return this.withContext(async (ctx) => ok(await ctx.preferences.unset(resolveUser(ctx, this.user), this.key)));
  }
}
