import type { Logger } from "../logging/logger.js";
import type { ItemStore } from "../store/items.js";
import type { PollStateStore } from "../store/poll-state.js";
import { ValidationError } from "../utils/errors.js";
import { withTimeout } from "../utils/timeout.js";
import { incomingItemSchema, syncBatchSchema } from "./schema.js";

export const SYNC_CURSOR = "sync_cursor";

/** Reads provider changes since an opaque cursor (null on first sync). */
export interface ProviderSyncPort {
  listChanges(since: string | null, signal: AbortSignal): Promise<unknown>;
}

export interface SyncResult {
  readonly inserted: number;
  readonly updated: number;
  readonly invalid: number;
  readonly failed: number;
  readonly deleted: number;
  readonly cursorAdvanced: boolean;
}

export interface SyncServiceDeps {
  port: ProviderSyncPort;
  items: ItemStore;
  pollState: PollStateStore;
  timeoutMs: number;
  logger: Logger;
}

export class SyncService {
  private readonly logger: Logger;

  constructor(private readonly deps: SyncServiceDeps) {
    this.logger = deps.logger.child({ component: "sync" });
  }

  async runOnce(): Promise<SyncResult> {
    const { items, pollState, port } = this.deps;
    const cursor = pollState.get(SYNC_CURSOR);

    const raw = await withTimeout("list changes", this.deps.timeoutMs, (signal) => port.listChanges(cursor.value, signal));
    const parsed = syncBatchSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(`Malformed sync batch: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    const batch = parsed.data;

    let inserted = 0;
    let updated = 0;
    let invalid = 0;
    let failed = 0;
    for (const [index, candidate] of batch.items.entries()) {
      const item = incomingItemSchema.safeParse(candidate);
      if (!item.success) {
        invalid++;
        this.logger.warn({ index, issues: item.error.issues }, "Invalid item from provider, skipped");
        continue;
      }
      try {
        if (items.upsertItem(item.data) === "inserted") inserted++;
        else updated++;
      } catch (err) {
        failed++;
        this.logger.error({ err, itemId: item.data.id }, "Item upsert failed");
      }
    }

    let deleted = 0;
    for (const deletion of batch.deletions) {
      try {
        if (items.deleteItem(deletion.id, deletion.mode).removed) deleted++;
      } catch (err) {
        failed++;
        this.logger.error({ err, itemId: deletion.id, mode: deletion.mode }, "Item deletion failed");
      }
    }

    let cursorAdvanced = false;
    if (batch.cursor !== null && batch.cursor !== cursor.value) {
      cursorAdvanced = pollState.compareAndSet(SYNC_CURSOR, cursor.version, batch.cursor);
      if (!cursorAdvanced) {
        this.logger.warn({ cursor: batch.cursor }, "Sync cursor moved by another runner, not advancing");
      }
    }

    const result: SyncResult = { inserted, updated, invalid, failed, deleted, cursorAdvanced };
    if (inserted + updated + invalid + failed + deleted > 0) {
      this.logger.info(result, "Sync complete");
    }
    return result;
  }

  /** Forgets the cursor so the next run starts from a full sync. */
  resetCursor(): boolean {
    const cursor = this.deps.pollState.get(SYNC_CURSOR);
    return this.deps.pollState.compareAndSet(SYNC_CURSOR, cursor.version, null);
  }
}
