import { Cron } from "croner";
import type { DigestConfig, MeetingsConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { MemoryEngine } from "../memory/engine.js";
import type { MemoryStore } from "../memory/store.js";
import type { Organizer } from "../organizer/organizer.js";
import type { PreferenceStore } from "../preferences/store.js";
import type { RetrievalIndex } from "../search/index.js";
import type { ItemStore } from "../store/items.js";
import type { PollStateStore } from "../store/poll-state.js";
import type { SyncService } from "../sync/service.js";
import type { TriggerSink } from "../triggers/types.js";
import { emitWeeklyDigest, type DigestSettings } from "./digest.js";
import { emitFollowups } from "./followups.js";
import { emitDailyBriefing, emitMeetingPreps, type MeetingSettings } from "./meetings.js";

export interface OrganizerLoopDeps {
  organizer: Organizer;
  index: RetrievalIndex;
  sync?: SyncService;
  items: ItemStore;
  memory: MemoryStore;
  pollState: PollStateStore;
  sink: TriggerSink;
  preferences: PreferenceStore;
  owner: string;
  intervalMs: number;
  followupDays: number;
  digest: DigestConfig;
  meetings: MeetingsConfig;
  logger: Logger;
  clock?: () => number;
}

/**
 * Sync, organize, index and the scheduled notices on a fixed interval. A tick
 * that is still running when the timer fires again is not overlapped.
 */
export class OrganizerLoop {
  private readonly logger: Logger;
  private readonly clock: () => number;
  private timer: ReturnType<typeof setInterval> | null = null;
  private running: Promise<void> | null = null;

  constructor(private readonly deps: OrganizerLoopDeps) {
    this.logger = deps.logger.child({ component: "organizer-loop" });
    this.clock = deps.clock ?? Date.now;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.tick().catch((err) => {
        this.logger.error({ err }, "Organizer tick error");
      });
    }, this.deps.intervalMs);
    this.timer.unref();
    this.logger.info({ intervalMs: this.deps.intervalMs }, "Organizer loop started");
  }

  /** Stops the timer and waits for an in-flight tick. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.running;
    this.logger.info("Organizer loop stopped");
  }

  /** Returns false when a tick was already in flight. */
  async tick(): Promise<boolean> {
    if (this.running) {
      this.logger.debug("Previous tick still running, skipping");
      return false;
    }
    this.running = this.runSteps();
    try {
      await this.running;
    } finally {
      this.running = null;
    }
    return true;
  }

  private async runSteps(): Promise<void> {
    const { sync, organizer, index } = this.deps;
    if (sync) {
      await this.step("sync", () => sync.runOnce());
    }
    await this.step("organize", () => organizer.runCycle());
    await this.step("index", () => index.indexPending());

    const prefs = await this.deps.preferences.get(this.deps.owner);
    const now = this.clock();
    await this.step("follow-ups", () => emitFollowups(this.deps, prefs.followupDays ?? this.deps.followupDays, now));

    const digest: DigestSettings = {
      enabled: prefs.digestEnabled ?? this.deps.digest.enabled,
      day: prefs.digestDay ?? this.deps.digest.day,
      time: prefs.digestTime ?? this.deps.digest.time,
      windowMinutes: this.deps.digest.windowMinutes,
      timezone: prefs.timezone ?? this.deps.digest.timezone,
    };
    await this.step("digest", () => emitWeeklyDigest(this.deps, digest, now));

    const meetings: MeetingSettings = { ...this.deps.meetings, owner: this.deps.owner, timezone: digest.timezone };
    await this.step("meeting-preps", () => emitMeetingPreps(this.deps, meetings, now));
    await this.step("daily-briefing", () => emitDailyBriefing(this.deps, meetings, now));
  }

  /** One failing step is logged and does not stop the ones after it. */
  private async step(name: string, fn: () => Promise<unknown>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      this.logger.error({ err, step: name }, "Organizer step failed");
    }
  }
}

export interface MemoryLoopDeps {
  engine: MemoryEngine;
  schedule: string;
  logger: Logger;
}

/** Runs the working-memory cycle on a cron schedule; croner's `protect` prevents overlap. */
export class MemoryLoop {
  private readonly logger: Logger;
  private job: Cron | null = null;
  private running: Promise<void> | null = null;

  constructor(private readonly deps: MemoryLoopDeps) {
    this.logger = deps.logger.child({ component: "memory-loop" });
  }

  start(): void {
    if (this.job) return;
    this.job = new Cron(this.deps.schedule, { protect: true, unref: true }, async () => {
      this.running = this.runCycle();
      try {
        await this.running;
      } finally {
        this.running = null;
      }
    });
    this.logger.info({ schedule: this.deps.schedule, next: this.job.nextRun()?.toISOString() }, "Memory loop started");
  }

  /** Stops the schedule and waits for an in-flight cycle. */
  async stop(): Promise<void> {
    if (this.job) {
      this.job.stop();
      this.job = null;
    }
    await this.running;
    this.logger.info("Memory loop stopped");
  }

  private async runCycle(): Promise<void> {
    try {
      await this.deps.engine.runCycle();
    } catch (err) {
      this.logger.error({ err }, "Memory cycle error");
    }
  }
}
