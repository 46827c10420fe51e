import { z } from "zod";
import { RecordDecodeError } from "../errors.js";
import type { Message, Session } from "./types.js";

export const SESSION_RECORD_VERSION = 1;

const isoTimestamp = z.string().datetime();
const toolPayloads = z.array(z.record(z.unknown())).optional();

const messageRecordSchema = z.object({
  id: z.string().min(1),
  role: z.enum(["system", "user", "assistant", "tool"]),
  content: z.string(),
  timestamp: isoTimestamp,
  toolCalls: toolPayloads,
  toolResponses: toolPayloads,
});

const sessionRecordSchema = z.object({
  kind: z.literal("session"),
  version: z.literal(SESSION_RECORD_VERSION),
  id: z.string().min(1),
  userId: z.string().min(1),
  createdAt: isoTimestamp,
  lastAccessed: isoTimestamp,
  status: z.enum(["active", "inactive", "archived"]),
  history: z.array(messageRecordSchema),
  metadata: z.record(z.unknown()),
});

export type SessionRecord = z.infer<typeof sessionRecordSchema>;
type MessageRecord = z.infer<typeof messageRecordSchema>;

function encodeMessage(message: Message): MessageRecord {
  return {
    id: message.id,
    role: message.role,
    content: message.content,
    timestamp: new Date(message.timestamp).toISOString(),
    ...(message.toolCalls ? { toolCalls: message.toolCalls } : {}),
    ...(message.toolResponses ? { toolResponses: message.toolResponses } : {}),
  };
}

function decodeMessage(record: MessageRecord): Message {
  return {
    id: record.id,
    role: record.role,
    content: record.content,
    timestamp: Date.parse(record.timestamp),
    ...(record.toolCalls ? { toolCalls: record.toolCalls } : {}),
    ...(record.toolResponses ? { toolResponses: record.toolResponses } : {}),
  };
}

export function encodeSession(session: Session): SessionRecord {
  return {
    kind: "session",
    version: SESSION_RECORD_VERSION,
    id: session.id,
    userId: session.userId,
    createdAt: new Date(session.createdAt).toISOString(),
    lastAccessed: new Date(session.lastAccessed).toISOString(),
    status: session.status,
    history: session.history.map(encodeMessage),
    metadata: { ...session.metadata },
  };
}

export function decodeSession(raw: unknown, key?: string): Session {
  const parsed = sessionRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`)
      .join("; ");
    throw new RecordDecodeError(`Unreadable session record: ${issues}`, key);
  }
  const record = parsed.data;
  return {
    id: record.id,
    userId: record.userId,
    createdAt: Date.parse(record.createdAt),
    lastAccessed: Date.parse(record.lastAccessed),
    status: record.status,
    history: record.history.map(decodeMessage),
    metadata: record.metadata,
  };
}
