import { Command, Option } from "clipanion";
import type { Memory } from "../../memory/types.js";
import { openEngine, parsePositiveInt } from "../context.js";

function formatMemory(memory: Memory): string {
  const created = new Date(memory.createdAt).toISOString();
  return (
    `  ${memory.id}\n` +
    `    type: ${memory.memoryType}  importance: ${memory.importance.toFixed(2)}  created: ${created}\n` +
    `    ${memory.content.replace(/\s+/g, " ").slice(0, 160)}\n`
  );
}

export class MemoryListCommand extends Command {
  static override paths = [["memory", "list"]];

  static override usage = Command.Usage({
    description: "List every stored memory of a user",
    examples: [["List memories", "kestrel memory list u1"]],
  });

  userId = Option.String({ name: "userId", required: true });

  async execute(): Promise<void> {
    const engine = openEngine();
    try {
      const memories = await engine.memories.listMemories(this.userId);
      if (memories.length === 0) {
        this.context.stdout.write("No memories stored.\n");
        return;
      }
      this.context.stdout.write(`Memories (${memories.length}):\n`);
      for (const memory of memories) this.context.stdout.write(formatMemory(memory));
    } finally {
      await engine.close();
    }
  }
}

export class MemorySearchCommand extends Command {
  static override paths = [["memory", "search"]];

  static override usage = Command.Usage({
    description: "Rank a user's memories against a query",
    examples: [["Top 3 matches", 'kestrel memory search u1 "travel plans" --top-k 3']],
  });

  userId = Option.String({ name: "userId", required: true });
  query = Option.String({ name: "query", required: true });

  topK = Option.String("--top-k", {
    description: "Number of memories to return (default 5)",
  });

  async execute(): Promise<void> {
    const engine = openEngine();
    try {
      const topK = parsePositiveInt(this.topK, 5);
      const memories = await engine.memories.retrieve(this.userId, this.query, { topK });
      if (memories.length === 0) {
        this.context.stdout.write("No matching memories.\n");
        return;
      }
      for (const memory of memories) this.context.stdout.write(formatMemory(memory));
    } finally {
      await engine.close();
    }
  }
}

export class MemoryConsolidateCommand extends Command {
  static override paths = [["memory", "consolidate"]];

  static override usage = Command.Usage({
    description: "Remove duplicate and stale low-importance memories of a user",
    examples: [["Consolidate one user", "kestrel memory consolidate u1"]],
  });

  userId = Option.String({ name: "userId", required: true });

  async execute(): Promise<void> {
    const engine = openEngine();
    try {
      const report = await engine.memories.consolidate(this.userId);
      if (!report) {
        this.context.stdout.write("Consolidation failed, see logs.\n");
        process.exitCode = 1;
        return;
      }
      this.context.stdout.write(
        `Examined ${report.examined}, removed ${report.duplicatesRemoved.length} duplicate(s), ` +
          `pruned ${report.pruned.length}, flagged ${report.conflicts.length} conflict(s).\n`,
      );
    } finally {
      await engine.close();
    }
  }
}
