import Database from "better-sqlite3";
import { join } from "node:path";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS records (
  namespace   TEXT NOT NULL,
  key         TEXT NOT NULL,
  body        TEXT NOT NULL,
  updated_at  INTEGER NOT NULL,
  PRIMARY KEY (namespace, key)
);

CREATE TABLE IF NOT EXISTS memory_index (
  id          TEXT PRIMARY KEY,
  user_id     TEXT NOT NULL,
  content     TEXT NOT NULL,
  body        TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_memory_index_user ON memory_index(user_id);

CREATE VIRTUAL TABLE IF NOT EXISTS memory_index_fts USING fts5(
  content,
  content='memory_index',
  content_rowid='rowid',
  tokenize='porter unicode61'
);

CREATE TRIGGER IF NOT EXISTS memory_index_ai AFTER INSERT ON memory_index BEGIN
  INSERT INTO memory_index_fts(rowid, content) VALUES (new.rowid, new.content);
END;

CREATE TRIGGER IF NOT EXISTS memory_index_ad AFTER DELETE ON memory_index BEGIN
  INSERT INTO memory_index_fts(memory_index_fts, rowid, content) VALUES('delete', old.rowid, old.content);
END;

CREATE TRIGGER IF NOT EXISTS memory_index_au AFTER UPDATE ON memory_index BEGIN
  INSERT INTO memory_index_fts(memory_index_fts, rowid, content) VALUES('delete', old.rowid, old.content);
  INSERT INTO memory_index_fts(rowid, content) VALUES (new.rowid, new.content);
END;
`;

export const DB_FILENAME = "kestrel.db";

/** Shared SQLite handle for the record store and the keyword index. */
export class KestrelDB {
  private db: Database.Database;

  constructor(stateDir: string, filename = DB_FILENAME) {
    this.db = new Database(filename === ":memory:" ? filename : join(stateDir, filename));
    this.db.pragma("journal_mode = WAL");
    this.db.exec(SCHEMA_SQL);
  }

  raw(): Database.Database {
    return this.db;
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
