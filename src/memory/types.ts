export type MemoryType = "declarative" | "procedural";

export interface Memory {
  /** `mem_<createdAt>_<userId>_<nonce>`; never derived from content. */
  readonly id: string;
  readonly userId: string;
  readonly content: string;
  readonly memoryType: MemoryType;
  /** Always within [0, 1]. */
  readonly importance: number;
  readonly createdAt: number;
  readonly lastAccessed: number;
  readonly provenance: string;
  readonly tags: readonly string[];
  /** Soft references to other memory ids. */
  readonly relatedMemories: readonly string[];
}

export interface RetrievalCandidate {
  readonly memory: Memory;
  /** Backend-reported relevance in [0, 1]; absent when the source has none. */
  readonly relevance?: number;
}

/**
 * A semantic retrieval provider (vector index, graph store, keyword index).
 * Every configured backend receives every stored memory.
 */
export interface RetrievalBackend {
  readonly name: string;
  index(memory: Memory): Promise<void>;
  remove(memoryId: string): Promise<void>;
  search(userId: string, query: string, topK: number): Promise<RetrievalCandidate[]>;
}

/** Pulls the part of a conversation worth remembering, or null. */
export interface ContentExtractor {
  extract(conversationText: string, topics: readonly string[]): Promise<string | null>;
}

export interface DuplicateDetector {
  /** Groups of two or more memories that say the same thing. */
  findDuplicates(memories: readonly Memory[]): Memory[][];
}

export interface MemoryConflict {
  readonly memories: readonly [Memory, Memory];
  readonly reason: string;
}

export interface ConflictDetector {
  findConflicts(memories: readonly Memory[]): MemoryConflict[];
}

export type ConflictResolution =
  | { readonly action: "keep_all" }
  | { readonly action: "remove"; readonly memoryIds: readonly string[] };

export type ConflictResolver = (
  conflict: MemoryConflict,
) => ConflictResolution | Promise<ConflictResolution>;

export interface RetrieveOptions {
  readonly topK?: number;
  readonly memoryTypes?: readonly MemoryType[];
  readonly minImportance?: number;
  readonly maxAgeDays?: number;
}

export interface ConsolidationReport {
  readonly userId: string;
  readonly examined: number;
  readonly duplicatesRemoved: string[];
  readonly pruned: string[];
  /** Conflicts found; acted on only when a resolver is configured. */
  readonly conflicts: MemoryConflict[];
  readonly conflictRemovals: string[];
}
