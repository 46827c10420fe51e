import { z } from "zod";
import { ValidationError } from "../errors.js";
import type { KestrelConfig } from "./types.js";

export const DEFAULT_TOPICS = [
  "preference",
  "important decisions",
  "name",
  "birthday",
  "allergy",
  "requirement",
  "how to",
];

const storageSchema = z.object({
  driver: z.enum(["file", "sqlite"]).default("file"),
  timeoutMs: z.number().int().positive().default(5_000),
});

const sessionSchema = z.object({
  maxTokenLimit: z.number().int().positive().default(3_000),
  ttlDays: z.number().positive().default(7),
});

const memorySchema = z.object({
  topics: z.array(z.string().min(1)).default(DEFAULT_TOPICS),
  keywordIndex: z.boolean().default(true),
  cacheSize: z.number().int().positive().default(500),
  lowImportanceThreshold: z.number().min(0).max(1).default(0.3),
  pruneAfterDays: z.number().positive().default(30),
});

const tasksSchema = z.object({
  concurrency: z.number().int().positive().default(2),
  maxQueueSize: z.number().int().positive().default(200),
});

const maintenanceSchema = z.object({
  enabled: z.boolean().default(false),
  sweepSchedule: z.string().min(1).default("0 3 * * *"),
  consolidateSchedule: z.string().min(1).default("30 3 * * *"),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

export const kestrelConfigSchema = z.object({
  storage: storageSchema.default({}),
  session: sessionSchema.default({}),
  memory: memorySchema.default({}),
  tasks: tasksSchema.default({}),
  maintenance: maintenanceSchema.default({}),
  logging: loggingSchema.default({}),
});

export function parseConfig(raw: unknown): KestrelConfig {
  const result = kestrelConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new ValidationError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}
