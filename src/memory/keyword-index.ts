import type { KestrelDB } from "../persistence/db.js";
import { decodeMemory, encodeMemory } from "./codec.js";
import type { Memory, RetrievalBackend, RetrievalCandidate } from "./types.js";

/** Quoted terms joined with OR, so user text never reaches FTS5 syntax. */
export function toMatchQuery(query: string): string | null {
  const terms = query
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((term) => term.length > 1);
  if (terms.length === 0) return null;
  return [...new Set(terms)].map((term) => `"${term}"`).join(" OR ");
}

/** Maps an FTS5 bm25 rank (negative, lower is better) into [0, 1). */
export function rankToRelevance(rank: number): number {
  const magnitude = Math.abs(rank);
  return magnitude / (1 + magnitude);
}

/** Full-text keyword backend over SQLite FTS5. */
export class SqliteKeywordIndex implements RetrievalBackend {
  readonly name = "keyword";
  private readonly db;

  constructor(kestrelDb: KestrelDB) {
    this.db = kestrelDb.raw();
  }

  async index(memory: Memory): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO memory_index (id, user_id, content, body) VALUES (?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           user_id = excluded.user_id,
           content = excluded.content,
           body = excluded.body`,
      )
      .run(memory.id, memory.userId, memory.content, JSON.stringify(encodeMemory(memory)));
  }

  async remove(memoryId: string): Promise<void> {
    this.db.prepare("DELETE FROM memory_index WHERE id = ?").run(memoryId);
  }

  async search(userId: string, query: string, topK: number): Promise<RetrievalCandidate[]> {
    const match = toMatchQuery(query);
    if (!match) return [];

    const rows = this.db
      .prepare(
        `SELECT m.id, m.body, fts.rank AS rank FROM memory_index_fts fts
         JOIN memory_index m ON m.rowid = fts.rowid
         WHERE memory_index_fts MATCH ?
         AND m.user_id = ?
         ORDER BY fts.rank
         LIMIT ?`,
      )
      .all(match, userId, topK) as Array<{ id: string; body: string; rank: number }>;

    return rows.map((row) => ({
      memory: decodeMemory(JSON.parse(row.body), row.id),
      relevance: rankToRelevance(row.rank),
    }));
  }
}
