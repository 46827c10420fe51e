export { createEngine } from "./engine.js";
export type { Engine, EngineDependencies, MemoryApi, SessionApi } from "./engine.js";

export { loadConfig, resolveConfig, substituteEnv } from "./config/loader.js";
export type { LoadedConfig } from "./config/loader.js";
export { DEFAULT_TOPICS, kestrelConfigSchema, parseConfig } from "./config/schema.js";
export { getConfigPath, getStateDir, prepareStateDir } from "./config/paths.js";
export type { StateLayout } from "./config/paths.js";
export type * from "./config/types.js";

export { createLogger } from "./logging/logger.js";
export type { Logger } from "./logging/logger.js";

export {
  fail,
  OK,
  RecordDecodeError,
  StorageError,
  TimeoutError,
  ValidationError,
} from "./errors.js";
export type { FailureReason, Outcome } from "./errors.js";

export { detect, redact, validateSensitiveContext } from "./privacy/redactor.js";
export type { Redactor } from "./privacy/redactor.js";
export { PII_RULES } from "./privacy/rules.js";
export type { PiiMatch, PiiRule, PiiType } from "./privacy/types.js";

export { FileRecordStore } from "./persistence/file-store.js";
export { SqliteRecordStore } from "./persistence/sqlite-store.js";
export { KestrelDB } from "./persistence/db.js";
export type { RecordNamespace, RecordStore } from "./persistence/types.js";

export { SessionStore } from "./session/store.js";
export type { SessionStoreOptions } from "./session/store.js";
export { estimateTokens, truncateHistory } from "./session/context-window.js";
export type {
  Message,
  MessageAddedEvent,
  MessageInput,
  MessageRole,
  Session,
  SessionEvents,
  SessionStatus,
} from "./session/types.js";

export { MemoryStore } from "./memory/store.js";
export type { MemoryStoreOptions } from "./memory/store.js";
export { SqliteKeywordIndex } from "./memory/keyword-index.js";
export { TopicMatchExtractor } from "./memory/extractor.js";
export { NormalizedContentDetector, NoConflictDetector } from "./memory/consolidation.js";
export type { PruneRule } from "./memory/consolidation.js";
export type * from "./memory/types.js";

export { TaskQueue } from "./tasks/task-queue.js";
export { BackgroundCoordinator } from "./tasks/coordinator.js";
export { MaintenanceScheduler } from "./maintenance/scheduler.js";
export type { MaintenanceJob, MaintenanceRun } from "./maintenance/scheduler.js";
