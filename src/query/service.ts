import { z } from "zod";
import type { Logger } from "../logging/logger.js";
import type { MemoryStore } from "../memory/store.js";
import type { Commitment, Decision, Thread } from "../memory/types.js";
import { SEARCH_MODES, type RetrievalIndex, type SearchHit } from "../search/index.js";
import type { ItemStore, Label } from "../store/items.js";
import { ITEM_STATES, type Attachment, type Item, type TriageLogEntry } from "../store/types.js";
import { fail, NotFoundError, ok, toQueryError, ValidationError, type Result } from "../utils/errors.js";

const limitSchema = z.coerce.number().int().min(1).max(500);
const flagSchema = z.union([z.boolean(), z.enum(["true", "false"]).transform((v) => v === "true")]);

export const listItemsQuerySchema = z.object({
  state: z.enum(ITEM_STATES).optional(),
  category: z.string().min(1).optional(),
  conversationId: z.string().min(1).optional(),
  since: z.coerce.number().int().nonnegative().optional(),
  limit: limitSchema.default(50),
});

export const listThreadsQuerySchema = z.object({
  status: z.enum(["active", "stale", "closed"]).optional(),
  needsReply: flagSchema.optional(),
  limit: limitSchema.default(50),
});

export const listObligationsQuerySchema = z.object({
  open: flagSchema.default(true),
  limit: limitSchema.default(50),
});

export const searchQuerySchema = z.object({
  q: z.string().trim().min(1, "Query must not be empty"),
  mode: z.enum(SEARCH_MODES).default("hybrid"),
  limit: limitSchema.optional(),
});

export interface ItemDetail {
  readonly item: Item;
  readonly labels: readonly Label[];
  readonly attachments: readonly Attachment[];
  readonly triageLog: readonly TriageLogEntry[];
}

export interface ThreadDetail {
  readonly thread: Thread;
  readonly items: readonly Item[];
}

function parse<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw new ValidationError(`Invalid query: ${where}${issue?.message ?? "invalid"}`);
  }
  return result.data;
}

/**
 * Read-only views over the store. Every operation returns a Result; an
 * error is never reported as an empty success.
 */
export class QueryService {
  private readonly logger: Logger;

  constructor(
    private readonly deps: { items: ItemStore; memory: MemoryStore; index: RetrievalIndex; logger: Logger },
  ) {
    this.logger = deps.logger.child({ component: "query" });
  }

  getItem(id: string): Result<ItemDetail> {
    return this.run("getItem", () => {
      const item = this.deps.items.getItem(id);
      if (!item) throw new NotFoundError(`Item not found: ${id}`, { itemId: id });
      return {
        item,
        labels: this.deps.items.listLabels(id),
        attachments: this.deps.items.listAttachments(id),
        triageLog: this.deps.items.listTriageLog(id),
      };
    });
  }

  listItems(params?: unknown): Result<Item[]> {
    return this.run("listItems", () => this.deps.items.listItems(parse(listItemsQuerySchema, params)));
  }

  getThread(conversationId: string): Result<ThreadDetail> {
    return this.run("getThread", () => {
      const thread = this.deps.memory.getThread(conversationId);
      if (!thread) throw new NotFoundError(`Thread not found: ${conversationId}`, { conversationId });
      return { thread, items: this.deps.items.listItems({ conversationId, limit: 200 }) };
    });
  }

  listThreads(params?: unknown): Result<Thread[]> {
    return this.run("listThreads", () => this.deps.memory.listThreads(parse(listThreadsQuerySchema, params)));
  }

  listDecisions(params?: unknown): Result<Decision[]> {
    return this.run("listDecisions", () => this.deps.memory.listDecisions(parse(listObligationsQuerySchema, params)));
  }

  listCommitments(params?: unknown): Result<Commitment[]> {
    return this.run("listCommitments", () =>
      this.deps.memory.listCommitments(parse(listObligationsQuerySchema, params)),
    );
  }

  async search(params?: unknown): Promise<Result<SearchHit[]>> {
    try {
      const { q, mode, limit } = parse(searchQuerySchema, params);
      return ok(await this.deps.index.search(q, { mode, ...(limit === undefined ? {} : { limit }) }));
    } catch (err) {
      return this.failure("search", err);
    }
  }

  private run<T>(operation: string, fn: () => T): Result<T> {
    try {
      return ok(fn());
    } catch (err) {
      return this.failure(operation, err);
    }
  }

  private failure<T>(operation: string, err: unknown): Result<T> {
    const error = toQueryError(err);
    if (error.kind === "transient") {
      this.logger.error({ err, operation }, "Query failed");
    }
    return fail(error.kind, error.message);
  }
}
