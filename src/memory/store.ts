import { randomBytes } from "node:crypto";
import { fail, OK, type Outcome } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { RecordStore } from "../persistence/types.js";
import { KeyedMutex } from "../utils/keyed-mutex.js";
import { withTimeout } from "../utils/timeout.js";
import { assessImportance, classifyMemoryType } from "./classifier.js";
import { decodeMemory, encodeMemory } from "./codec.js";
import {
  DEFAULT_PRUNE_RULE,
  NoConflictDetector,
  NormalizedContentDetector,
  planConsolidation,
  type PruneRule,
} from "./consolidation.js";
import { TopicMatchExtractor } from "./extractor.js";
import { RetrievalCache } from "./retrieval-cache.js";
import { ageInWholeDays, clamp01, rankCandidates } from "./scoring.js";
import type {
  ConflictDetector,
  ConflictResolver,
  ConsolidationReport,
  ContentExtractor,
  DuplicateDetector,
  Memory,
  RetrievalBackend,
  RetrievalCandidate,
  RetrieveOptions,
} from "./types.js";

const DEFAULT_TOP_K = 5;
const DEFAULT_TIMEOUT_MS = 5_000;
/** Backends are asked for more than topK so filtering does not starve the result. */
const CANDIDATE_FACTOR = 3;
export const GENERATED_PROVENANCE = "conversation_etl";

export interface MemoryStoreOptions {
  readonly records: RecordStore;
  readonly logger: Logger;
  readonly backends?: readonly RetrievalBackend[];
  readonly extractor?: ContentExtractor;
  readonly duplicateDetector?: DuplicateDetector;
  readonly conflictDetector?: ConflictDetector;
  readonly conflictResolver?: ConflictResolver;
  readonly pruneRule?: PruneRule;
  readonly cacheSize?: number;
  readonly timeoutMs?: number;
  readonly now?: () => number;
}

export function createMemoryId(userId: string, createdAt: number): string {
  return `mem_${createdAt}_${userId}_${randomBytes(4).toString("hex")}`;
}

function isValidMemory(memory: Memory): boolean {
  return (
    memory.id.length > 0 &&
    memory.userId.length > 0 &&
    Number.isFinite(memory.importance) &&
    memory.importance >= 0 &&
    memory.importance <= 1 &&
    Number.isFinite(memory.createdAt)
  );
}

/**
 * Owns long-term memories. Writes for one user are serialized, so a
 * consolidation pass never interleaves with a store or remove for the same
 * user.
 */
export class MemoryStore {
  private readonly records: RecordStore;
  private readonly backends: readonly RetrievalBackend[];
  private readonly extractor: ContentExtractor;
  private readonly duplicateDetector: DuplicateDetector;
  private readonly conflictDetector: ConflictDetector;
  private readonly conflictResolver: ConflictResolver | undefined;
  private readonly pruneRule: PruneRule;
  private readonly cache: RetrievalCache;
  private readonly locks = new KeyedMutex();
  private readonly logger: Logger;
  private readonly timeoutMs: number;
  private readonly now: () => number;

  constructor(options: MemoryStoreOptions) {
    this.records = options.records;
    this.backends = options.backends ?? [];
    this.extractor = options.extractor ?? new TopicMatchExtractor();
    this.duplicateDetector = options.duplicateDetector ?? new NormalizedContentDetector();
    this.conflictDetector = options.conflictDetector ?? new NoConflictDetector();
    this.conflictResolver = options.conflictResolver;
    this.pruneRule = options.pruneRule ?? DEFAULT_PRUNE_RULE;
    this.cache = new RetrievalCache(options.cacheSize);
    this.logger = options.logger.child({ component: "memory-store" });
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
  }

  /** Extracts, classifies, scores and stores one memory. Never throws. */
  async generateMemory(
    userId: string,
    conversationText: string,
    topicDefinitions: readonly string[],
  ): Promise<Memory | null> {
    try {
      const content = await withTimeout(
        this.extractor.extract(conversationText, topicDefinitions),
        this.timeoutMs,
        "memory extraction",
      );
      if (!content) return null;

      const now = this.now();
      const memory: Memory = {
        id: createMemoryId(userId, now),
        userId,
        content,
        memoryType: classifyMemoryType(content),
        importance: assessImportance(content),
        createdAt: now,
        lastAccessed: now,
        provenance: GENERATED_PROVENANCE,
        tags: [],
        relatedMemories: [],
      };

      const outcome = await this.store(memory);
      if (!outcome.ok) return null;

      this.logger.info(
        { memoryId: memory.id, userId, memoryType: memory.memoryType, importance: memory.importance },
        "Generated memory",
      );
      return memory;
    } catch (err) {
      this.logger.error({ err, userId }, "Failed to generate memory");
      return null;
    }
  }

  async store(memory: Memory): Promise<Outcome> {
    if (!isValidMemory(memory)) {
      this.logger.warn({ memoryId: memory.id, importance: memory.importance }, "Rejected invalid memory");
      return fail("validation");
    }

    return this.locks.run(memory.userId, async () => {
      try {
        await withTimeout(
          this.records.set(memory.id, encodeMemory(memory)),
          this.timeoutMs,
          "memory write",
        );
        for (const backend of this.backends) {
          await withTimeout(backend.index(memory), this.timeoutMs, `${backend.name} index`);
        }
        return OK;
      } catch (err) {
        this.logger.error({ err, memoryId: memory.id }, "Failed to store memory");
        return fail("storage");
      } finally {
        this.cache.invalidateUser(memory.userId);
      }
    });
  }

  async retrieve(userId: string, query: string, options: RetrieveOptions = {}): Promise<Memory[]> {
    const topK = options.topK ?? DEFAULT_TOP_K;
    const minImportance = options.minImportance ?? 0;
    const cacheKey = this.cache.keyFor(userId, query, [
      topK,
      options.memoryTypes ? [...options.memoryTypes].sort() : null,
      minImportance,
      options.maxAgeDays ?? null,
    ]);

    const cached = this.cache.get(cacheKey);
    if (cached) return [...cached];

    try {
      const now = this.now();
      const candidates = (await this.gatherCandidates(userId, query, topK)).filter(
        ({ memory }) =>
          (!options.memoryTypes || options.memoryTypes.includes(memory.memoryType)) &&
          memory.importance >= minImportance &&
          (options.maxAgeDays === undefined ||
            ageInWholeDays(memory.createdAt, now) <= options.maxAgeDays),
      );

      const result = rankCandidates(candidates, now, topK);
      this.cache.set(cacheKey, result);
      this.logger.debug({ userId, count: result.length }, "Retrieved memories");
      return [...result];
    } catch (err) {
      this.logger.error({ err, userId }, "Failed to retrieve memories");
      return [];
    }
  }

  async consolidate(userId: string): Promise<ConsolidationReport | null> {
    try {
      return await this.locks.run(userId, async () => {
        const memories = await this.listMemories(userId);
        const plan = planConsolidation(
          memories,
          this.duplicateDetector,
          this.conflictDetector,
          this.now(),
          this.pruneRule,
        );

        for (const id of [...plan.duplicateRemovals, ...plan.pruneRemovals]) {
          await this.removeUnlocked(id);
        }

        const conflictRemovals: string[] = [];
        if (plan.conflicts.length > 0) {
          if (this.conflictResolver) {
            const gone = new Set([...plan.duplicateRemovals, ...plan.pruneRemovals]);
            for (const conflict of plan.conflicts) {
              const resolution = await this.conflictResolver(conflict);
              if (resolution.action !== "remove") continue;
              for (const id of resolution.memoryIds) {
                if (gone.has(id)) continue;
                await this.removeUnlocked(id);
                gone.add(id);
                conflictRemovals.push(id);
              }
            }
          } else {
            this.logger.warn(
              { userId, conflicts: plan.conflicts.length },
              "Conflicting memories flagged; no resolver configured",
            );
          }
        }

        this.cache.invalidateUser(userId);
        const report: ConsolidationReport = {
          userId,
          examined: memories.length,
          duplicatesRemoved: plan.duplicateRemovals,
          pruned: plan.pruneRemovals,
          conflicts: plan.conflicts,
          conflictRemovals,
        };
        this.logger.info(
          {
            userId,
            examined: report.examined,
            duplicatesRemoved: report.duplicatesRemoved.length,
            pruned: report.pruned.length,
            conflicts: report.conflicts.length,
          },
          "Consolidated memories",
        );
        return report;
      });
    } catch (err) {
      this.logger.error({ err, userId }, "Failed to consolidate memories");
      return null;
    }
  }

  /** Removing an id that does not exist succeeds. */
  async remove(memoryId: string): Promise<Outcome> {
    try {
      const existing = await this.load(memoryId);
      if (!existing) {
        await this.removeUnlocked(memoryId);
        return OK;
      }
      await this.locks.run(existing.userId, async () => {
        await this.removeUnlocked(memoryId);
        this.cache.invalidateUser(existing.userId);
      });
      return OK;
    } catch (err) {
      this.logger.error({ err, memoryId }, "Failed to remove memory");
      return fail("storage");
    }
  }

  async getMemory(memoryId: string): Promise<Memory | null> {
    try {
      return await this.load(memoryId);
    } catch (err) {
      this.logger.error({ err, memoryId }, "Failed to load memory");
      return null;
    }
  }

  /** Every readable memory of the user, oldest first. */
  async listMemories(userId: string): Promise<Memory[]> {
    const memories = await this.loadAll();
    return memories.filter((m) => m.userId === userId);
  }

  async listUsers(): Promise<string[]> {
    const memories = await this.loadAll();
    return [...new Set(memories.map((m) => m.userId))].sort();
  }

  private async gatherCandidates(
    userId: string,
    query: string,
    topK: number,
  ): Promise<RetrievalCandidate[]> {
    if (this.backends.length === 0) {
      const memories = await this.listMemories(userId);
      return memories.map((memory) => ({ memory }));
    }

    const merged = new Map<string, RetrievalCandidate>();
    for (const backend of this.backends) {
      let results: RetrievalCandidate[];
      try {
        results = await withTimeout(
          backend.search(userId, query, topK * CANDIDATE_FACTOR),
          this.timeoutMs,
          `${backend.name} search`,
        );
      } catch (err) {
        this.logger.warn({ err, backend: backend.name, userId }, "Retrieval backend failed");
        continue;
      }

      for (const candidate of results) {
        if (candidate.memory.userId !== userId) continue;
        const relevance =
          candidate.relevance === undefined ? undefined : clamp01(candidate.relevance);
        const existing = merged.get(candidate.memory.id);
        if (!existing) {
          merged.set(candidate.memory.id, { memory: candidate.memory, relevance });
        } else if ((relevance ?? -1) > (existing.relevance ?? -1)) {
          merged.set(candidate.memory.id, { memory: existing.memory, relevance });
        }
      }
    }
    return [...merged.values()];
  }

  private async removeUnlocked(memoryId: string): Promise<void> {
    await withTimeout(this.records.delete(memoryId), this.timeoutMs, "memory delete");
    for (const backend of this.backends) {
      await withTimeout(backend.remove(memoryId), this.timeoutMs, `${backend.name} remove`);
    }
  }

  private async load(memoryId: string): Promise<Memory | null> {
    const raw = await withTimeout(this.records.get(memoryId), this.timeoutMs, "memory read");
    if (raw === undefined || raw === null) return null;
    return decodeMemory(raw, memoryId);
  }

  private async loadAll(): Promise<Memory[]> {
    const ids = await withTimeout(this.records.keys(), this.timeoutMs, "memory list");
    const memories: Memory[] = [];
    for (const id of ids) {
      try {
        const memory = await this.load(id);
        if (memory) memories.push(memory);
      } catch (err) {
        this.logger.warn({ err, memoryId: id }, "Skipping unreadable memory record");
      }
    }
    return memories.sort((a, b) => a.createdAt - b.createdAt);
  }
}
