import { Command, Option } from "clipanion";
import * as t from "typanion";
import { SEARCH_MODES } from "../../search/index.js";
import { limitOption, StewardCommand } from "./base.js";

export class SearchCommand extends StewardCommand {
  static override paths = [["search"]];

  static override usage = Command.Usage({
    description: "Search indexed items",
    examples: [
      ["Hybrid search", 'steward search "quarterly budget"'],
      ["Keyword only", 'steward search "invoice 4411" --mode lexical'],
    ],
  });

  query = Option.String({ name: "query", required: true });
  mode = Option.String("--mode", { description: "lexical, vector or hybrid", validator: t.isEnum(SEARCH_MODES) });
  limit = limitOption("Maximum number of hits");

  async execute(): Promise<number> {
    return this.withContext((ctx) => ctx.query.search({ q: this.query, mode: this.mode, limit: this.limit }));
  }
}
