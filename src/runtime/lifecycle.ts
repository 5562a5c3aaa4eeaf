import type { Logger } from "../logging/logger.js";
import { QueryServer, type HealthStatus } from "../query/server.js";
import { MemoryLoop, OrganizerLoop } from "../scheduler/loops.js";
import { ValidationError } from "../utils/errors.js";
import { createContext, type AppContext, type ContextOptions } from "./context.js";

const SHUTDOWN_TIMEOUT_MS = 15_000;

export interface ServiceHandle {
  readonly ctx: AppContext;
  readonly organizerLoop: OrganizerLoop;
  readonly memoryLoop: MemoryLoop;
  readonly queryServer: QueryServer | null;
  /** Resolves once shutdown has completed. */
  readonly stopped: Promise<void>;
  stop(): Promise<void>;
}

export function healthProbe(ctx: AppContext): () => HealthStatus {
  return () => {
    if (!ctx.store.isOpen()) return { status: "degraded", store: "closed" };
    return {
      status: "ok",
      store: "open",
      items: ctx.items.countByState(),
      observations: ctx.memory.countObservations(),
    };
  };
}

export async function startService(opts: ContextOptions = {}): Promise<ServiceHandle> {
  const ctx = createContext(opts);
  const { config, logger } = ctx;

  if (!config.mailbox.owner) {
    ctx.close();
    throw new ValidationError("mailbox.owner must be configured");
  }
  const organizer = ctx.organizer;
  if (!organizer) {
    ctx.close();
    throw new ValidationError("classifier.command must be configured");
  }

  const organizerLoop = new OrganizerLoop({
    organizer,
    index: ctx.index,
    ...(ctx.sync ? { sync: ctx.sync } : {}),
    items: ctx.items,
    memory: ctx.memory,
    pollState: ctx.pollState,
    sink: ctx.publisher,
    preferences: ctx.preferences,
    owner: config.mailbox.owner,
    intervalMs: config.organizer.intervalMs,
    followupDays: config.followups.days,
    digest: config.digest,
    meetings: config.meetings,
    logger,
  });
  const memoryLoop = new MemoryLoop({ engine: ctx.memoryEngine, schedule: config.memory.schedule, logger });

  const queryServer = config.query.enabled
    ? new QueryServer(ctx.query, healthProbe(ctx), config.query.port, config.query.hostname, logger)
    : null;

  await ctx.consumer.recoverStale(config.organizer.leaseMs);

  organizerLoop.start();
  memoryLoop.start();
  queryServer?.start();

  let resolveStopped: () => void = () => {};
  const stopped = new Promise<void>((resolve) => {
    resolveStopped = resolve;
  });
  let shutdownInProgress: Promise<void> | null = null;

  const stop = (): Promise<void> => {
    if (shutdownInProgress) return shutdownInProgress;
    shutdownInProgress = shutdown(ctx, organizerLoop, memoryLoop, queryServer, logger).finally(resolveStopped);
    return shutdownInProgress;
  };

  const onSignal = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, "Shutting down gracefully...");
    const forceExit = setTimeout(() => {
      logger.warn("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();
    stop()
      .catch((err) => {
        logger.error({ err }, "Shutdown failed");
        process.exitCode = 1;
      })
      .finally(() => clearTimeout(forceExit));
  };

  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);

  logger.info({ owner: config.mailbox.owner, sync: ctx.sync !== null }, "Steward started");
  return { ctx, organizerLoop, memoryLoop, queryServer, stopped, stop };
}

async function shutdown(
  ctx: AppContext,
  organizerLoop: OrganizerLoop,
  memoryLoop: MemoryLoop,
  queryServer: QueryServer | null,
  logger: Logger,
): Promise<void> {
  await organizerLoop.stop();
  await memoryLoop.stop();
  if (queryServer) {
    try {
      await queryServer.stop();
    } catch (err) {
      logger.error({ err }, "Error stopping query server");
    }
  }
  ctx.close();
  logger.info("Shutdown complete");
}
