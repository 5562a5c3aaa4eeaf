import { Command, Option } from "clipanion";
import * as t from "typanion";
import { ITEM_STATES } from "../../store/types.js";
import { limitOption, StewardCommand } from "./base.js";

export class ItemsListCommand extends StewardCommand {
  static override paths = [["items", "list"]];

  static override usage = Command.Usage({
    description: "List items, newest first",
    examples: [
      ["List unprocessed items", "steward items list --state unprocessed"],
      ["List one conversation", "steward items list --conversation conv-1"],
    ],
  });

  state = Option.String("--state", { description: "Filter by state", validator: t.isEnum(ITEM_STATES) });
  category = Option.String("--category", { description: "Filter by primary category" });
  conversation = Option.String("--conversation", { description: "Filter by conversation id" });
  since = Option.String("--since", { description: "Received at or after (epoch ms)", validator: t.isNumber() });
  limit = limitOption("Maximum number of items");

  async execute(): Promise<number> {
    return this.withContext((ctx) =>
      ctx.query.listItems({
        state: this.state,
        category: this.category,
        conversationId: this.conversation,
        since: this.since,
        limit: this.limit,
      }),
    );
  }
}

export class ItemsShowCommand extends StewardCommand {
  static override paths = [["items", "show"]];

  static override usage = Command.Usage({
    description: "Show an item with its labels, attachments and triage log",
    examples: [["Show an item", "steward items show msg-1"]],
  });

  id = Option.String({ name: "id", required: true });

  async execute(): Promise<number> {
    return this.withContext((ctx) => ctx.query.getItem(this.id));
  }
}
