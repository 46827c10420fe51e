import { vi } from "vitest";
import { parseConfig } from "../../src/config/schema.js";
import type { KestrelConfig } from "../../src/config/types.js";
import type { Logger } from "../../src/logging/logger.js";
import type { Memory } from "../../src/memory/types.js";
import type { RecordStore } from "../../src/persistence/types.js";

export function mockLogger(): Logger {
  const logger = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn().mockReturnThis(),
    fatal: vi.fn(),
  };
  return logger as unknown as Logger;
}

/** RecordStore over a Map; values are copied through JSON like a real driver. */
export class InMemoryRecordStore implements RecordStore {
  readonly data = new Map<string, string>();

  async get(key: string): Promise<unknown> {
    const raw = this.data.get(key);
    return raw === undefined ? undefined : (JSON.parse(raw) as unknown);
  }

  async set(key: string, record: unknown): Promise<void> {
    this.data.set(key, JSON.stringify(record));
  }

  async delete(key: string): Promise<boolean> {
    return this.data.delete(key);
  }

  async keys(): Promise<string[]> {
    return [...this.data.keys()].sort();
  }
}

export const BASE_TIME = Date.parse("2026-01-01T00:00:00.000Z");
export const HOUR_MS = 3_600_000;
export const DAY_MS = 86_400_000;

let memorySeq = 0;

export function makeMemory(overrides: Partial<Memory> = {}): Memory {
  memorySeq++;
  return {
    id: `mem_test_${memorySeq}`,
    userId: "user-1",
    content: `memory number ${memorySeq}`,
    memoryType: "declarative",
    importance: 0.5,
    createdAt: BASE_TIME,
    lastAccessed: BASE_TIME,
    provenance: "test",
    tags: [],
    relatedMemories: [],
    ...overrides,
  };
}

export function makeConfig(overrides: Record<string, unknown> = {}): KestrelConfig {
  return parseConfig(overrides);
}
