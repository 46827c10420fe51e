export type StorageDriver = "file" | "sqlite";

export interface KestrelConfig {
  readonly storage: StorageConfig;
  readonly session: SessionConfig;
  readonly memory: MemoryConfig;
  readonly tasks: TasksConfig;
  readonly maintenance: MaintenanceConfig;
  readonly logging?: LoggingConfig;
}

export interface StorageConfig {
  readonly driver: StorageDriver;
  /** Upper bound for a single backend call, in milliseconds. */
  readonly timeoutMs: number;
}

export interface SessionConfig {
  /** Budget for the estimated token count of a session's history. */
  readonly maxTokenLimit: number;
  /** Days of inactivity before the sweep archives a session. */
  readonly ttlDays: number;
}

export interface MemoryConfig {
  /** Topic definitions handed to the extractor after every turn. */
  readonly topics: string[];
  /** Index memories in the SQLite FTS5 keyword backend. */
  readonly keywordIndex: boolean;
  /** Maximum number of cached retrieval results. */
  readonly cacheSize: number;
  readonly lowImportanceThreshold: number;
  readonly pruneAfterDays: number;
}

export interface TasksConfig {
  readonly concurrency: number;
  readonly maxQueueSize: number;
}

export interface MaintenanceConfig {
  readonly enabled: boolean;
  readonly sweepSchedule: string;
  readonly consolidateSchedule: string;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}
