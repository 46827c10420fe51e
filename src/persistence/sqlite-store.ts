import { RecordDecodeError, StorageError } from "../errors.js";
import type { KestrelDB } from "./db.js";
import type { RecordNamespace, RecordStore } from "./types.js";

export class SqliteRecordStore implements RecordStore {
  private readonly db;

  constructor(
    kestrelDb: KestrelDB,
    private readonly namespace: RecordNamespace,
  ) {
    this.db = kestrelDb.raw();
  }

  async get(key: string): Promise<unknown> {
    let row: { body: string } | undefined;
    try {
      row = this.db
        .prepare("SELECT body FROM records WHERE namespace = ? AND key = ?")
        .get(this.namespace, key) as { body: string } | undefined;
    } catch (err) {
      throw new StorageError(`Failed to read record ${key}`, key, { cause: err });
    }
    if (!row) return undefined;

    try {
      return JSON.parse(row.body) as unknown;
    } catch {
      throw new RecordDecodeError(`Record ${key} is not valid JSON`, key);
    }
  }

  async set(key: string, record: unknown): Promise<void> {
    try {
      this.db
        .prepare(
          `INSERT INTO records (namespace, key, body, updated_at) VALUES (?, ?, ?, ?)
           ON CONFLICT(namespace, key) DO UPDATE SET
             body = excluded.body,
             updated_at = excluded.updated_at`,
        )
        .run(this.namespace, key, JSON.stringify(record), Date.now());
    } catch (err) {
      throw new StorageError(`Failed to write record ${key}`, key, { cause: err });
    }
  }

  async delete(key: string): Promise<boolean> {
    try {
      const result = this.db
        .prepare("DELETE FROM records WHERE namespace = ? AND key = ?")
        .run(this.namespace, key);
      return result.changes > 0;
    } catch (err) {
      throw new StorageError(`Failed to delete record ${key}`, key, { cause: err });
    }
  }

  async keys(): Promise<string[]> {
    const rows = this.db
      .prepare("SELECT key FROM records WHERE namespace = ? ORDER BY key")
      .all(this.namespace) as Array<{ key: string }>;
    return rows.map((r) => r.key);
  }
}
