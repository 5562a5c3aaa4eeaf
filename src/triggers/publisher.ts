import { randomUUID } from "node:crypto";
import { mkdir, open, rename, rm, stat, unlink, writeFile, type FileHandle } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "../logging/logger.js";
import type { PublishRequest, PublishResult, Routing, TriggerEnvelope, TriggerSink, TriggerType } from "./types.js";

export interface TriggerPublisherOptions {
  /** Root directory; holds outbox/, processing/, done/, rejected/ and dedupe/. */
  dir: string;
  capability: string;
  user: string;
  dedupeTtlDays: number;
  defaultRouting?: Routing;
  logger: Logger;
  clock?: () => number;
  newId?: () => string;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export function makeDedupeKey(capability: string, type: TriggerType, user: string, primaryId: string): string {
  return `${capability}:${type}:${user}:${primaryId}`;
}

function markerName(key: string): string {
  return key.replace(/[\\/]/g, "_");
}

function isCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

/**
 * Writes one JSON file per trigger: `<id>.json.tmp` first, then renamed to
 * `<id>.json`, so a polling consumer never sees a partial file.
 */
export class TriggerPublisher implements TriggerSink {
  readonly outboxDir: string;
  readonly dedupeDir: string;
  private readonly clock: () => number;
  private readonly logger: Logger;

  constructor(private readonly opts: TriggerPublisherOptions) {
    this.outboxDir = join(opts.dir, "outbox");
    this.dedupeDir = join(opts.dir, "dedupe");
    this.clock = opts.clock ?? Date.now;
    this.logger = opts.logger.child({ component: "trigger-publisher" });
  }

  async publish(request: PublishRequest): Promise<PublishResult> {
    const id = (this.opts.newId ?? randomUUID)();
    const dedupeKey = makeDedupeKey(this.opts.capability, request.type, this.opts.user, request.primaryId);
    const routing = request.routing ?? this.opts.defaultRouting;
    const trigger: TriggerEnvelope = {
      id,
      capability: this.opts.capability,
      user: this.opts.user,
      type: request.type,
      created_at: new Date(this.clock()).toISOString(),
      dedupe_key: dedupeKey,
      payload: request.payload,
      ...(routing ? { routing } : {}),
    };

    const useMarker = !request.skipDedupe && this.opts.dedupeTtlDays > 0;
    if (useMarker && !(await this.claimMarker(dedupeKey, id))) {
      this.logger.debug({ dedupeKey, type: request.type }, "Trigger suppressed by dedupe marker");
      return { trigger, published: false };
    }

    const finalPath = join(this.outboxDir, `${id}.json`);
    const tmpPath = `${finalPath}.tmp`;
    try {
      await mkdir(this.outboxDir, { recursive: true });
      await writeFile(tmpPath, JSON.stringify(trigger, null, 2) + "\n", "utf-8");
      await rename(tmpPath, finalPath);
    } catch (err) {
      await rm(tmpPath, { force: true });
      // A marker without a file would suppress the retry.
      if (useMarker) await this.releaseMarker(dedupeKey);
      throw err;
    }

    this.logger.info({ triggerId: id, type: request.type, dedupeKey }, "Trigger published");
    return { trigger, published: true };
  }

  /** Deletes the marker for a key so the next publish goes through. */
  async releaseMarker(dedupeKey: string): Promise<void> {
    await rm(join(this.dedupeDir, markerName(dedupeKey)), { force: true });
  }

  private async claimMarker(dedupeKey: string, triggerId: string): Promise<boolean> {
    const marker = join(this.dedupeDir, markerName(dedupeKey));
    const ttlMs = this.opts.dedupeTtlDays * DAY_MS;

    try {
      const info = await stat(marker);
      if (this.clock() - info.mtimeMs < ttlMs) return false;
      await unlink(marker);
    } catch (err) {
      if (!isCode(err, "ENOENT")) throw err;
    }

    await mkdir(this.dedupeDir, { recursive: true });
    let handle: FileHandle;
    try {
      handle = await open(marker, "wx");
    } catch (err) {
      if (isCode(err, "EEXIST")) return false;
      throw err;
    }
    const now = this.clock();
    try {
      await handle.writeFile(
        JSON.stringify({ dedupe_key: dedupeKey, trigger_id: triggerId, created_at: new Date(now).toISOString() }) + "\n",
      );
      // The TTL check reads mtime, so it must be on the same clock.
      await handle.utimes(now / 1000, now / 1000);
    } finally {
      await handle.close();
    }
    return true;
  }
}
