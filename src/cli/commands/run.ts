import { Command } from "clipanion";
import { startService } from "../../runtime/lifecycle.js";
import { errorMessage } from "../../utils/errors.js";
import { StewardCommand } from "./base.js";

export class RunCommand extends StewardCommand {
  static override paths = [["run"], Command.Default];

  static override usage = Command.Usage({
    description: "Start the organizer and memory loops, and the query server when enabled",
    examples: [
      ["Start with default config", "steward run"],
      ["Start with custom config", "steward run --config ./steward.config.json"],
    ],
  });

  async execute(): Promise<number> {
    try {
      const handle = await startService(this.config === undefined ? {} : { configPath: this.config });
      await handle.stopped;
      return 0;
    } catch (err) {
      this.context.stderr.write(`Failed to start steward: ${errorMessage(err)}\n`);
      return 1;
    }
  }
}
