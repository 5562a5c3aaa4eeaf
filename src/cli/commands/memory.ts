import { Command } from "clipanion";
import { ok } from "../../utils/errors.js";
import { StewardCommand } from "./base.js";

export class MemoryCycleCommand extends StewardCommand {
  static override paths = [["memory", "cycle"]];

  static override usage = Command.Usage({
    description: "Run one working-memory cycle now",
    examples: [["Run a cycle", "steward memory cycle"]],
  });

  async execute(): Promise<number> {
    return this.withContext(async (ctx) => ok(await ctx.memoryEngine.runCycle()));
  }
}

export class RebuildCommand extends StewardCommand {
  static override paths = [["rebuild"]];

  static override usage = Command.Usage({
    description: "Recompute threads and contacts from items and reset the retrieval index",
    examples: [["Rebuild derived state", "steward rebuild"]],
  });

  async execute(): Promise<number> {
    return this.withContext(async (ctx) => ok(await ctx.memoryEngine.rebuild()));
  }
}
