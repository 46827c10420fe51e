/**
 * Durable key/value capability. Values are JSON documents; a driver never
 * interprets them. One store instance holds one kind of record.
 */
export interface RecordStore {
  get(key: string): Promise<unknown>;
  set(key: string, record: unknown): Promise<void>;
  /** Resolves false when the key was not present. */
  delete(key: string): Promise<boolean>;
  keys(): Promise<string[]>;
}

export type RecordNamespace = "sessions" | "memories";
