import { CommandClassifier } from "../adapters/classifier.js";
import { commandRunnerFor } from "../adapters/command-runner.js";
import { CommandEmbedder } from "../adapters/embedder.js";
import { CommandProvider } from "../adapters/provider.js";
import { AlertEngine } from "../alerts/engine.js";
import { RuleParser } from "../alerts/parser.js";
import { AlertStore } from "../alerts/store.js";
import { loadConfig } from "../config/loader.js";
import { ensureDir, getPreferencesDir, getStateDir, getTriggersDir } from "../config/paths.js";
import type { StewardConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { MemoryEngine } from "../memory/engine.js";
import { MemoryStore } from "../memory/store.js";
import { Organizer } from "../organizer/organizer.js";
import { PreferenceStore } from "../preferences/store.js";
import { QueryService } from "../query/service.js";
import { RetrievalIndex } from "../search/index.js";
import { EventStore } from "../store/db.js";
import { ItemStore } from "../store/items.js";
import { PollStateStore } from "../store/poll-state.js";
import { SyncService } from "../sync/service.js";
import { TriggerConsumer } from "../triggers/consumer.js";
import { TriggerPublisher } from "../triggers/publisher.js";

export interface ContextOptions {
  configPath?: string;
  config?: StewardConfig;
  stateDir?: string;
  logger?: Logger;
  clock?: () => number;
}

export interface AppContext {
  readonly config: StewardConfig;
  readonly logger: Logger;
  readonly stateDir: string;
  readonly store: EventStore;
  readonly items: ItemStore;
  readonly memory: MemoryStore;
  readonly pollState: PollStateStore;
  readonly preferences: PreferenceStore;
  readonly publisher: TriggerPublisher;
  readonly consumer: TriggerConsumer;
  readonly alertStore: AlertStore;
  readonly alerts: AlertEngine;
  readonly index: RetrievalIndex;
  readonly memoryEngine: MemoryEngine;
  /** Null when no classifier command is configured. */
  readonly organizer: Organizer | null;
  /** Null when no provider command is configured. */
  readonly sync: SyncService | null;
  readonly query: QueryService;
  close(): void;
}

/** Opens the store and wires every component from configuration. */
export function createContext(opts: ContextOptions = {}): AppContext {
  const config = opts.config ?? loadConfig(opts.configPath);
  const logger = opts.logger ?? createLogger(config.logging);
  const clock = opts.clock ?? Date.now;
  const stateDir = ensureDir(opts.stateDir ?? getStateDir());
  const owner = config.mailbox.owner;

  const store = new EventStore(stateDir);
  const items = new ItemStore(store, owner, clock);
  const memory = new MemoryStore(store);
  const pollState = new PollStateStore(store, clock);
  const preferences = new PreferenceStore(ensureDir(getPreferencesDir(stateDir)));

  const triggersDir = ensureDir(getTriggersDir(config, stateDir));
  const publisher = new TriggerPublisher({
    dir: triggersDir,
    capability: config.triggers.capability,
    user: owner,
    dedupeTtlDays: config.triggers.dedupeTtlDays,
    defaultRouting: {
      channel: config.triggers.channel,
      ...(config.triggers.target ? { target: config.triggers.target } : {}),
    },
    logger,
    clock,
  });
  const consumer = new TriggerConsumer(triggersDir, logger, clock);

  const classifierRunner = commandRunnerFor("classifier", config.classifier, logger);
  const providerRunner = commandRunnerFor("provider", config.provider, logger);
  const embeddingsRunner = commandRunnerFor("embeddings", config.embeddings, logger);
  const classifier = classifierRunner ? new CommandClassifier(classifierRunner) : null;
  const provider = providerRunner ? new CommandProvider(providerRunner) : null;

  const alertStore = new AlertStore(store, clock);
  const alerts = new AlertEngine({
    store: alertStore,
    sink: publisher,
    parser: new RuleParser({
      ...(classifier ? { port: classifier } : {}),
      timeoutMs: config.alerts.semanticTimeoutMs,
      logger,
    }),
    ...(classifier ? { semantic: classifier } : {}),
    semanticTimeoutMs: config.alerts.semanticTimeoutMs,
    defaultCooldownMinutes: config.alerts.defaultCooldownMinutes,
    logger,
    clock,
  });

  const index = new RetrievalIndex({
    store,
    items,
    ...(embeddingsRunner ? { embedder: new CommandEmbedder(embeddingsRunner) } : {}),
    embedTimeoutMs: config.embeddings.timeoutMs,
    config: config.search,
    logger,
    clock,
  });

  const memoryEngine = new MemoryEngine({
    store,
    items,
    memory,
    sink: publisher,
    alerts,
    preferences,
    config: config.memory,
    owner,
    logger,
    clock,
  });

  const organizer = classifier
    ? new Organizer({
        store,
        items,
        memory,
        sink: publisher,
        classifier,
        ...(provider ? { provider } : {}),
        alerts,
        preferences,
        config: config.organizer,
        owner,
        backfill: config.mailbox.backfill,
        defaultTimezone: config.digest.timezone,
        actionTimeoutMs: config.provider.timeoutMs,
        logger,
        clock,
      })
    : null;

  const sync = provider
    ? new SyncService({ port: provider, items, pollState, timeoutMs: config.provider.timeoutMs, logger })
    : null;

  const query = new QueryService({ items, memory, index, logger });

  return {
    config,
    logger,
    stateDir,
    store,
    items,
    memory,
    pollState,
    preferences,
    publisher,
    consumer,
    alertStore,
    alerts,
    index,
    memoryEngine,
    organizer,
    sync,
    query,
    close: () => {
      if (store.isOpen()) store.close();
    },
  };
}
