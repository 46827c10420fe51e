import type {
  ConflictDetector,
  DuplicateDetector,
  Memory,
  MemoryConflict,
} from "./types.js";

const DAY_MS = 86_400_000;

export function normalizeContent(content: string): string {
  return content
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, "")
    .replace(/\s+/g, " ")
    .trim();
}

/** Memories whose content matches after case, punctuation and spacing are ignored. */
export class NormalizedContentDetector implements DuplicateDetector {
  findDuplicates(memories: readonly Memory[]): Memory[][] {
    const groups = new Map<string, Memory[]>();
    for (const memory of memories) {
      const key = normalizeContent(memory.content);
      const group = groups.get(key);
      if (group) {
        group.push(memory);
      } else {
        groups.set(key, [memory]);
      }
    }
    return [...groups.values()].filter((group) => group.length > 1);
  }
}

/**
 * Contradiction detection needs a model that understands the content; the
 * default finds nothing. Supply a detector to flag conflicts.
 */
export class NoConflictDetector implements ConflictDetector {
  findConflicts(): MemoryConflict[] {
    return [];
  }
}

/** The memory with the highest `(importance, createdAt)`. */
export function pickSurvivor(group: readonly Memory[]): Memory {
  let best = group[0];
  for (const memory of group.slice(1)) {
    if (
      memory.importance > best.importance ||
      (memory.importance === best.importance && memory.createdAt > best.createdAt)
    ) {
      best = memory;
    }
  }
  return best;
}

export interface PruneRule {
  readonly importanceBelow: number;
  readonly olderThanDays: number;
}

export const DEFAULT_PRUNE_RULE: PruneRule = {
  importanceBelow: 0.3,
  olderThanDays: 30,
};

export function findLowConfidence(
  memories: readonly Memory[],
  now: number,
  rule: PruneRule = DEFAULT_PRUNE_RULE,
): Memory[] {
  const threshold = now - rule.olderThanDays * DAY_MS;
  return memories.filter((m) => m.importance < rule.importanceBelow && m.createdAt < threshold);
}

export interface ConsolidationPlan {
  readonly duplicateRemovals: string[];
  readonly pruneRemovals: string[];
  readonly conflicts: MemoryConflict[];
}

/** Decides what consolidation removes without touching storage. */
export function planConsolidation(
  memories: readonly Memory[],
  duplicates: DuplicateDetector,
  conflicts: ConflictDetector,
  now: number,
  rule: PruneRule = DEFAULT_PRUNE_RULE,
): ConsolidationPlan {
  const duplicateRemovals: string[] = [];
  for (const group of duplicates.findDuplicates(memories)) {
    const survivor = pickSurvivor(group);
    for (const memory of group) {
      if (memory.id !== survivor.id) duplicateRemovals.push(memory.id);
    }
  }

  const removed = new Set(duplicateRemovals);
  const pruneRemovals = findLowConfidence(memories, now, rule)
    .map((m) => m.id)
    .filter((id) => !removed.has(id));

  return {
    duplicateRemovals,
    pruneRemovals,
    conflicts: conflicts.findConflicts(memories),
  };
}
