import type { EventStore } from "./db.js";
import { num, text, textOrNull, toRow } from "./rows.js";

export interface PollState {
  readonly name: string;
  readonly value: string | null;
  readonly version: number;
  readonly updatedAt: number;
}

/**
 * Named, versioned rows for scheduler state (sync cursor, digest window).
 * Writers read a version and update conditionally on it; a lost race returns
 * false instead of overwriting another runner's value.
 */
export class PollStateStore {
  private readonly db;

  constructor(
    store: EventStore,
    private readonly clock: () => number = Date.now,
  ) {
    this.db = store.raw();
  }

  get(name: string): PollState {
    const row = toRow(this.db.prepare("SELECT * FROM poll_state WHERE name = ?").get(name));
    if (!row) {
      return { name, value: null, version: 0, updatedAt: 0 };
    }
    return {
      name: text(row, "name"),
      value: textOrNull(row, "value"),
      version: num(row, "version"),
      updatedAt: num(row, "updated_at"),
    };
  }

  /** Sets `value` if the stored version still equals `expectedVersion`. */
  compareAndSet(name: string, expectedVersion: number, value: string | null): boolean {
    const now = this.clock();
    if (expectedVersion === 0) {
      const inserted = this.db
        .prepare(
          `INSERT INTO poll_state (name, value, version, updated_at) VALUES (?, ?, 1, ?)
           ON CONFLICT(name) DO NOTHING`,
        )
        .run(name, value, now);
      if (inserted.changes > 0) return true;
    }
    const result = this.db
      .prepare("UPDATE poll_state SET value = ?, version = version + 1, updated_at = ? WHERE name = ? AND version = ?")
      .run(value, now, name, expectedVersion);
    return result.changes > 0;
  }
}
