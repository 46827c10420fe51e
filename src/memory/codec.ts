import { z } from "zod";
import { RecordDecodeError } from "../errors.js";
import type { Memory } from "./types.js";

export const MEMORY_RECORD_VERSION = 1;

const memoryRecordSchema = z.object({
  kind: z.literal("memory"),
  version: z.literal(MEMORY_RECORD_VERSION),
  id: z.string().min(1),
  userId: z.string().min(1),
  content: z.string(),
  memoryType: z.enum(["declarative", "procedural"]),
  importance: z.number().min(0).max(1),
  createdAt: z.string().datetime(),
  lastAccessed: z.string().datetime(),
  provenance: z.string(),
  tags: z.array(z.string()).default([]),
  relatedMemories: z.array(z.string()).default([]),
});

export type MemoryRecord = z.infer<typeof memoryRecordSchema>;

export function encodeMemory(memory: Memory): MemoryRecord {
  return {
    kind: "memory",
    version: MEMORY_RECORD_VERSION,
    id: memory.id,
    userId: memory.userId,
    content: memory.content,
    memoryType: memory.memoryType,
    importance: memory.importance,
    createdAt: new Date(memory.createdAt).toISOString(),
    lastAccessed: new Date(memory.lastAccessed).toISOString(),
    provenance: memory.provenance,
    tags: [...memory.tags],
    relatedMemories: [...memory.relatedMemories],
  };
}

export function decodeMemory(raw: unknown, key?: string): Memory {
  const parsed = memoryRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
      .join("; ");
    throw new RecordDecodeError(`Unreadable memory record: ${issues}`, key);
  }
  const record = parsed.data;
  return {
    id: record.id,
    userId: record.userId,
    content: record.content,
    memoryType: record.memoryType,
    importance: record.importance,
    createdAt: Date.parse(record.createdAt),
    lastAccessed: Date.parse(record.lastAccessed),
    provenance: record.provenance,
    tags: record.tags,
    relatedMemories: record.relatedMemories,
  };
}
