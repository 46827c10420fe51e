import type { Memory } from "./types.js";

const DEFAULT_MAX_SIZE = 500;

/**
 * Bounded cache of ranked retrieval results. Keys embed a per-user
 * generation; bumping it on every write makes older entries unreachable,
 * and they age out through the size bound.
 */
export class RetrievalCache {
  private readonly entries = new Map<string, Memory[]>();
  private readonly generations = new Map<string, number>();

  constructor(private readonly maxSize = DEFAULT_MAX_SIZE) {}

  keyFor(userId: string, query: string, parts: readonly unknown[]): string {
    const generation = this.generations.get(userId) ?? 0;
    return JSON.stringify([userId, generation, query, ...parts]);
  }

  get(key: string): Memory[] | undefined {
    const hit = this.entries.get(key);
    if (hit) {
      // refresh recency
      this.entries.delete(key);
      this.entries.set(key, hit);
    }
    return hit;
  }

  set(key: string, memories: Memory[]): void {
    if (!this.entries.has(key) && this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next().value;
      if (oldest !== undefined) this.entries.delete(oldest);
    }
    this.entries.set(key, memories);
  }

  invalidateUser(userId: string): void {
    this.generations.set(userId, (this.generations.get(userId) ?? 0) + 1);
  }
}
