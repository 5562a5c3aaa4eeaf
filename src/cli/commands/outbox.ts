import { Command, Option } from "clipanion";
import * as t from "typanion";
import { NotFoundError, ok } from "../../utils/errors.js";
import { StewardCommand } from "./base.js";

export class OutboxListCommand extends StewardCommand {
  static override paths = [["outbox", "list"]];

  static override usage = Command.Usage({
    description: "List trigger files in a queue directory",
    examples: [
      ["Pending triggers", "steward outbox list"],
      ["Rejected triggers", "steward outbox list --state rejected"],
    ],
  });

  state = Option.String("--state", "outbox", {
    description: "outbox, processing, done or rejected",
    validator: t.isEnum(["outbox", "processing", "done", "rejected"] as const),
  });

  async execute(): Promise<number> {
    return this.withContext(async (ctx) => ok(await ctx.consumer.list(this.state)));
  }
}

export class OutboxRequeueCommand extends StewardCommand {
  static override paths = [["outbox", "requeue"]];

  static override usage = Command.Usage({
    description: "Move a done, rejected or stuck trigger back to the outbox",
    examples: [["Requeue a trigger", "steward outbox requeue <trigger-id>"]],
  });

  id = Option.String({ name: "id", required: true });

  async execute(): Promise<number> {
    return this.withContext(async (ctx) => {
      if (!(await ctx.consumer.requeue(this.id))) {
        throw new NotFoundError(`Trigger not found: ${this.id}`, { triggerId: this.id });
      }
      return ok({ requeued: this.id });
    });
  }
}
