import { mkdir, readFile, readdir, rename, stat, utimes } from "node:fs/promises";
import { basename, join } from "node:path";
import type { Logger } from "../logging/logger.js";
import { errorMessage } from "../utils/errors.js";
import { triggerEnvelopeSchema, type TriggerEnvelope } from "./types.js";

export type QueueState = "outbox" | "processing" | "done" | "rejected";

export interface ClaimedTrigger {
  readonly envelope: TriggerEnvelope;
  readonly path: string;
}

export interface DrainResult {
  readonly completed: number;
  readonly failed: number;
  readonly rejected: number;
}

export interface QueuedFile {
  readonly id: string;
  readonly state: QueueState;
  readonly path: string;
  readonly modifiedAt: number;
}

function isCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

/**
 * Consumer side of the trigger file queue. A file is claimed by renaming it
 * out of outbox/; whoever loses the rename race skips it.
 */
export class TriggerConsumer {
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(
    private readonly dir: string,
    logger: Logger,
    clock: () => number = Date.now,
  ) {
    this.logger = logger.child({ component: "trigger-consumer" });
    this.clock = clock;
  }

  pathFor(state: QueueState, id?: string): string {
    return id === undefined ? join(this.dir, state) : join(this.dir, state, `${id}.json`);
  }

  async list(state: QueueState): Promise<QueuedFile[]> {
    const files = await this.jsonFiles(state);
    const out: QueuedFile[] = [];
    for (const file of files) {
      const path = join(this.pathFor(state), file);
      try {
        const info = await stat(path);
        out.push({ id: basename(file, ".json"), state, path, modifiedAt: info.mtimeMs });
      } catch (err) {
        // Claimed by someone else between readdir and stat.
        if (!isCode(err, "ENOENT")) throw err;
      }
    }
    return out.sort((a, b) => a.modifiedAt - b.modifiedAt || a.id.localeCompare(b.id));
  }

  /** Claims the oldest valid trigger, moving invalid files to rejected/. */
  async claimNext(): Promise<ClaimedTrigger | null> {
    for (const file of await this.list("outbox")) {
      const claimed = await this.claim(file.id);
      if (claimed) return claimed;
    }
    return null;
  }

  async claim(id: string): Promise<ClaimedTrigger | null> {
    const source = this.pathFor("outbox", id);
    const target = this.pathFor("processing", id);
    await mkdir(this.pathFor("processing"), { recursive: true });
    try {
      await rename(source, target);
    } catch (err) {
      if (isCode(err, "ENOENT")) return null;
      throw err;
    }
    const claimedAt = this.clock() / 1000;
    await utimes(target, claimedAt, claimedAt);

    const parsed = triggerEnvelopeSchema.safeParse(await this.readJson(target));
    if (!parsed.success) {
      this.logger.warn({ triggerId: id, issues: parsed.error.issues.length }, "Rejected malformed trigger");
      await this.move(target, "rejected", id);
      return null;
    }
    return { envelope: parsed.data, path: target };
  }

  async complete(claim: ClaimedTrigger): Promise<void> {
    await this.move(claim.path, "done", claim.envelope.id);
  }

  /** Returns a claimed trigger to outbox/ for another attempt. */
  async release(claim: ClaimedTrigger): Promise<void> {
    await this.move(claim.path, "outbox", claim.envelope.id);
  }

  /** Moves claims older than `olderThanMs` back to outbox/. */
  async recoverStale(olderThanMs: number): Promise<number> {
    let recovered = 0;
    const cutoff = this.clock() - olderThanMs;
    for (const file of await this.list("processing")) {
      if (file.modifiedAt > cutoff) continue;
      try {
        await rename(file.path, this.pathFor("outbox", file.id));
        recovered++;
      } catch (err) {
        if (!isCode(err, "ENOENT")) throw err;
      }
    }
    if (recovered > 0) {
      this.logger.info({ recovered }, "Recovered stale trigger claims");
    }
    return recovered;
  }

  /** Moves a finished or rejected trigger back to outbox/. */
  async requeue(id: string): Promise<boolean> {
    for (const state of ["done", "rejected", "processing"] as const) {
      try {
        await rename(this.pathFor(state, id), this.pathFor("outbox", id));
        return true;
      } catch (err) {
        if (!isCode(err, "ENOENT")) throw err;
      }
    }
    return false;
  }

  /**
   * Handles every trigger currently in outbox/ once. A handler failure puts the
   * file back in outbox/ for the next drain.
   */
  async drain(handler: (trigger: TriggerEnvelope) => Promise<void>): Promise<DrainResult> {
    let completed = 0;
    let failed = 0;
    let rejected = 0;
    for (const file of await this.list("outbox")) {
      const claim = await this.claim(file.id);
      if (!claim) {
        if (await this.exists("rejected", file.id)) rejected++;
        continue;
      }
      try {
        await handler(claim.envelope);
        await this.complete(claim);
        completed++;
      } catch (err) {
        this.logger.warn({ err, triggerId: claim.envelope.id }, "Trigger handler failed, releasing");
        await this.release(claim);
        failed++;
      }
    }
    return { completed, failed, rejected };
  }

  private async move(from: string, state: QueueState, id: string): Promise<void> {
    await mkdir(this.pathFor(state), { recursive: true });
    await rename(from, this.pathFor(state, id));
  }

  private async exists(state: QueueState, id: string): Promise<boolean> {
    try {
      await stat(this.pathFor(state, id));
      return true;
    } catch (err) {
      if (isCode(err, "ENOENT")) return false;
      throw err;
    }
  }

  private async jsonFiles(state: QueueState): Promise<string[]> {
    try {
      const entries = await readdir(this.pathFor(state));
      return entries.filter((name) => name.endsWith(".json"));
    } catch (err) {
      if (isCode(err, "ENOENT")) return [];
      throw err;
    }
  }

  private async readJson(path: string): Promise<unknown> {
    const raw = await readFile(path, "utf-8");
    try {
      return JSON.parse(raw);
    } catch (err) {
      this.logger.debug({ path, error: errorMessage(err) }, "Trigger file is not valid JSON");
      return null;
    }
  }
}
