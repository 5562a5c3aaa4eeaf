import { Command, Option } from "clipanion";
import * as t from "typanion";
import { limitOption, StewardCommand } from "./base.js";

export class ThreadsListCommand extends StewardCommand {
  static override paths = [["threads", "list"]];

  static override usage = Command.Usage({
    description: "List derived conversation threads",
    examples: [["Threads waiting on a reply", "steward threads list --needs-reply"]],
  });

  status = Option.String("--status", {
    description: "active, stale or closed",
    validator: t.isEnum(["active", "stale", "closed"] as const),
  });
  needsReply = Option.Boolean("--needs-reply", { description: "Only threads whose last message is inbound" });
  limit = limitOption("Maximum number of threads");

  async execute(): Promise<number> {
    return this.withContext((ctx) =>
      ctx.query.listThreads({ status: this.status, needsReply: this.needsReply, limit: this.limit }),
    );
  }
}

export class ThreadsShowCommand extends StewardCommand {
  static override paths = [["threads", "show"]];

  static override usage = Command.Usage({
    description: "Show a thread and its items",
    examples: [["Show a thread", "steward threads show conv-1"]],
  });

  id = Option.String({ name: "conversation-id", required: true });

  async execute(): Promise<number> {
    return this.withContext((ctx) => ctx.query.getThread(this.id));
  }
}
