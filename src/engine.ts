import { prepareStateDir } from "./config/paths.js";
import type { KestrelConfig } from "./config/types.js";
import type { Logger } from "./logging/logger.js";
import { MaintenanceScheduler } from "./maintenance/scheduler.js";
import { SqliteKeywordIndex } from "./memory/keyword-index.js";
import { MemoryStore } from "./memory/store.js";
import type {
  ConflictDetector,
  ConflictResolver,
  ContentExtractor,
  DuplicateDetector,
  Memory,
  RetrievalBackend,
} from "./memory/types.js";
import { KestrelDB } from "./persistence/db.js";
import { FileRecordStore } from "./persistence/file-store.js";
import { SqliteRecordStore } from "./persistence/sqlite-store.js";
import type { RecordNamespace, RecordStore } from "./persistence/types.js";
import { SessionStore } from "./session/store.js";
import type { Message, MessageRole } from "./session/types.js";
import { BackgroundCoordinator } from "./tasks/coordinator.js";
import { TaskQueue } from "./tasks/task-queue.js";

/** Capabilities supplied by the embedding application. All optional. */
export interface EngineDependencies {
  readonly sessionRecords?: RecordStore;
  readonly memoryRecords?: RecordStore;
  /** Added after the built-in keyword index, when that is enabled. */
  readonly backends?: readonly RetrievalBackend[];
  readonly extractor?: ContentExtractor;
  readonly duplicateDetector?: DuplicateDetector;
  readonly conflictDetector?: ConflictDetector;
  readonly conflictResolver?: ConflictResolver;
  readonly now?: () => number;
}

export interface SessionApi {
  create(userId: string, initialContext?: string): Promise<string>;
  append(sessionId: string, userId: string, role: MessageRole, content: string): Promise<boolean>;
  history(sessionId: string, userId: string, limit?: number): Promise<Message[]>;
  end(sessionId: string, userId: string): Promise<boolean>;
}

export interface MemoryApi {
  retrieveContext(userId: string, query: string, topK?: number): Promise<Memory[]>;
  fromTranscript(userId: string, transcriptText: string, topics: readonly string[]): Promise<string | null>;
}

export interface Engine {
  readonly session: SessionApi;
  readonly memory: MemoryApi;
  readonly sessions: SessionStore;
  readonly memories: MemoryStore;
  readonly coordinator: BackgroundCoordinator;
  readonly scheduler: MaintenanceScheduler;
  close(): Promise<void>;
}

/**
 * Composition root. Builds one set of services around the configured
 * storage; nothing here is process-global.
 */
export function createEngine(
  config: KestrelConfig,
  stateDir: string,
  logger: Logger,
  deps: EngineDependencies = {},
): Engine {
  const layout = prepareStateDir(stateDir);

  const needsDb =
    config.memory.keywordIndex ||
    (config.storage.driver === "sqlite" && (!deps.sessionRecords || !deps.memoryRecords));
  const db = needsDb ? new KestrelDB(layout.root) : null;

  const recordsFor = (namespace: RecordNamespace): RecordStore =>
    db && config.storage.driver === "sqlite"
      ? new SqliteRecordStore(db, namespace)
      : new FileRecordStore(layout.recordsDir(namespace));

  const backends: RetrievalBackend[] = [];
  if (db && config.memory.keywordIndex) backends.push(new SqliteKeywordIndex(db));
  backends.push(...(deps.backends ?? []));

  const sessions = new SessionStore({
    records: deps.sessionRecords ?? recordsFor("sessions"),
    logger,
    maxTokenLimit: config.session.maxTokenLimit,
    ttlDays: config.session.ttlDays,
    timeoutMs: config.storage.timeoutMs,
    now: deps.now,
  });

  const memories = new MemoryStore({
    records: deps.memoryRecords ?? recordsFor("memories"),
    logger,
    backends,
    extractor: deps.extractor,
    duplicateDetector: deps.duplicateDetector,
    conflictDetector: deps.conflictDetector,
    conflictResolver: deps.conflictResolver,
    pruneRule: {
      importanceBelow: config.memory.lowImportanceThreshold,
      olderThanDays: config.memory.pruneAfterDays,
    },
    cacheSize: config.memory.cacheSize,
    timeoutMs: config.storage.timeoutMs,
    now: deps.now,
  });

  const queue = new TaskQueue(logger.child({ component: "task-queue" }), {
    concurrency: config.tasks.concurrency,
    maxSize: config.tasks.maxQueueSize,
  });
  const coordinator = new BackgroundCoordinator(
    sessions,
    memories,
    queue,
    config.memory.topics,
    logger,
  );
  coordinator.attach();

  const scheduler = new MaintenanceScheduler(config.maintenance, sessions, memories, logger);
  scheduler.start();

  const session: SessionApi = {
    async create(userId, initialContext = "") {
      const created = await sessions.createSession(userId, initialContext);
      return created.id;
    },
    async append(sessionId, userId, role, content) {
      const outcome = await sessions.addMessage(sessionId, userId, { role, content });
      return outcome.ok;
    },
    history: (sessionId, userId, limit) => sessions.getHistory(sessionId, userId, limit),
    async end(sessionId, userId) {
      const outcome = await sessions.endSession(sessionId, userId);
      return outcome.ok;
    },
  };

  const memory: MemoryApi = {
    retrieveContext: (userId, query, topK = 5) => memories.retrieve(userId, query, { topK }),
    async fromTranscript(userId, transcriptText, topics) {
      const generated = await memories.generateMemory(userId, transcriptText, topics);
      return generated?.id ?? null;
    },
  };

  return {
    session,
    memory,
    sessions,
    memories,
    coordinator,
    scheduler,
    async close() {
      scheduler.stop();
      coordinator.stop();
      await coordinator.flush();
      await sessions.flush();
      db?.close();
      logger.debug("Engine closed");
    },
  };
}
