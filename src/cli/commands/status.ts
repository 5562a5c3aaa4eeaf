import { Command } from "clipanion";
import { getConfigPath } from "../../config/paths.js";
import { ok } from "../../utils/errors.js";
import { StewardCommand } from "./base.js";

export class StatusCommand extends StewardCommand {
  static override paths = [["status"]];

  static override usage = Command.Usage({
    description: "Show item counts, queue depth and configured ports",
    examples: [["Show status", "steward status"]],
  });

  async execute(): Promise<number> {
    return this.withContext(async (ctx) => {
      const outbox = {
        outbox: (await ctx.consumer.list("outbox")).length,
        processing: (await ctx.consumer.list("processing")).length,
        done: (await ctx.consumer.list("done")).length,
        rejected: (await ctx.consumer.list("rejected")).length,
      };
      return ok({
        configPath: this.config ?? getConfigPath(),
        stateDir: ctx.stateDir,
        owner: ctx.config.mailbox.owner || null,
        ports: {
          classifier: ctx.config.classifier.command !== undefined,
          provider: ctx.config.provider.command !== undefined,
          embeddings: ctx.config.embeddings.command !== undefined,
        },
        items: ctx.items.countByState(),
        indexedChunks: ctx.index.countChunks(),
        openDecisions: ctx.memory.listDecisions({ open: true, limit: 500 }).length,
        openCommitments: ctx.memory.listCommitments({ open: true, limit: 500 }).length,
        rules: ctx.alertStore.listRules().length,
        triggers: outbox,
      });
    });
  }
}
