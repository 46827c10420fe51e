import { randomUUID } from "node:crypto";
import { z } from "zod";
import { fail, OK, type Outcome } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import type { RecordStore } from "../persistence/types.js";
import { redact, type Redactor } from "../privacy/redactor.js";
import { KeyedMutex } from "../utils/keyed-mutex.js";
import { withTimeout } from "../utils/timeout.js";
import { TypedEventEmitter } from "../utils/typed-emitter.js";
import { decodeSession, encodeSession } from "./codec.js";
import { countChars, estimateTokensFromChars, truncateHistory } from "./context-window.js";
import {
  canTransition,
  type Message,
  type MessageInput,
  type Session,
  type SessionEvents,
} from "./types.js";

const DAY_MS = 86_400_000;
const DEFAULT_TIMEOUT_MS = 5_000;

const messageInputSchema = z.object({
  role: z.enum(["system", "user", "assistant", "tool"]),
  content: z.string(),
  toolCalls: z.array(z.record(z.unknown())).optional(),
  toolResponses: z.array(z.record(z.unknown())).optional(),
});

export interface SessionStoreOptions {
  readonly records: RecordStore;
  readonly logger: Logger;
  readonly maxTokenLimit: number;
  readonly ttlDays: number;
  readonly redactor?: Redactor;
  readonly timeoutMs?: number;
  readonly now?: () => number;
}

function isAccessible(session: Session, userId: string): boolean {
  return session.userId === userId && session.status === "active";
}

/**
 * Owns session lifetime. Every mutation of a session runs under that
 * session's mutex, so concurrent turns cannot break the token budget or
 * reorder history.
 */
export class SessionStore {
  readonly events: TypedEventEmitter<SessionEvents>;
  readonly maxTokenLimit: number;
  readonly ttlDays: number;

  private readonly cache = new Map<string, Session>();
  private readonly pendingWrites = new Set<Promise<void>>();
  private readonly locks = new KeyedMutex();
  private readonly records: RecordStore;
  private readonly logger: Logger;
  private readonly redactor: Redactor;
  private readonly timeoutMs: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions) {
    this.records = options.records;
    this.logger = options.logger.child({ component: "session-store" });
    this.maxTokenLimit = options.maxTokenLimit;
    this.ttlDays = options.ttlDays;
    this.redactor = options.redactor ?? ((text) => redact(text));
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
    this.events = new TypedEventEmitter<SessionEvents>((event, err) => {
      this.logger.error({ err, event }, "Session event listener failed");
    });
  }

  /** Throws `StorageError` when the new session cannot be written. */
  async createSession(userId: string, initialContext = ""): Promise<Session> {
    const now = this.now();
    const history: Message[] = [];
    if (initialContext) {
      history.push({
        id: `msg_${randomUUID()}`,
        role: "system",
        content: this.redactor(initialContext),
        timestamp: now,
      });
    }

    const session: Session = {
      id: `session_${randomUUID()}`,
      userId,
      createdAt: now,
      lastAccessed: now,
      status: "active",
      history,
      metadata: {},
    };

    await this.persist(session);
    this.cache.set(session.id, session);
    this.logger.info({ sessionId: session.id, userId }, "Session created");
    this.events.emit("session:created", session);
    return session;
  }

  /**
   * Returns the session only to its owner and only while active. Any other
   * case reads as not found. A cold load runs under the session lock so it
   * cannot overwrite a mutation that lands while the read is in flight.
   */
  async getSession(sessionId: string, userId: string): Promise<Session | null> {
    const cached = this.cache.get(sessionId);
    if (cached) {
      return isAccessible(cached, userId) ? cached : null;
    }

    return this.locks.run(sessionId, async () => {
      const current = this.cache.get(sessionId);
      if (current) {
        return isAccessible(current, userId) ? current : null;
      }

      const loaded = await this.loadQuietly(sessionId);
      if (!loaded || !isAccessible(loaded, userId)) return null;

      const touched: Session = { ...loaded, lastAccessed: this.now() };
      this.cache.set(sessionId, touched);
      this.scheduleWriteBack(touched);
      return touched;
    });
  }

  async addMessage(sessionId: string, userId: string, input: MessageInput): Promise<Outcome> {
    const parsed = messageInputSchema.safeParse(input);
    if (!parsed.success) {
      this.logger.warn(
        { sessionId, issues: parsed.error.issues.map((i) => i.message) },
        "Rejected malformed message",
      );
      return fail("validation");
    }

    return this.locks.run(sessionId, async () => {
      const session = await this.resolveForUpdate(sessionId, userId);
      if (!session) return fail("not_found");

      const content = this.redactor(parsed.data.content);
      const systemChars = countChars(session.history.filter((m) => m.role === "system"));
      if (estimateTokensFromChars(systemChars + content.length) > this.maxTokenLimit) {
        this.logger.warn(
          { sessionId, chars: content.length, maxTokenLimit: this.maxTokenLimit },
          "Rejected message larger than the context window",
        );
        return fail("validation");
      }

      const now = this.now();
      const message: Message = {
        id: `msg_${randomUUID()}`,
        role: parsed.data.role,
        content,
        timestamp: now,
        ...(parsed.data.toolCalls ? { toolCalls: parsed.data.toolCalls } : {}),
        ...(parsed.data.toolResponses ? { toolResponses: parsed.data.toolResponses } : {}),
      };

      const history = truncateHistory([...session.history, message], this.maxTokenLimit);
      const turn = messageCount(session) + 1;
      const updated: Session = {
        ...session,
        history,
        lastAccessed: now,
        metadata: { ...session.metadata, messageCount: turn },
      };

      try {
        await this.persist(updated);
      } catch (err) {
        this.logger.error({ err, sessionId }, "Failed to persist session");
        return fail("storage");
      }

      this.cache.set(sessionId, updated);
      const dropped = session.history.length + 1 - history.length;
      if (dropped > 0) {
        this.logger.debug({ sessionId, dropped }, "Truncated session history");
      }
      this.events.emit("message:added", { sessionId, userId, turn, message });
      return OK;
    });
  }

  async getHistory(sessionId: string, userId: string, limit?: number): Promise<Message[]> {
    const session = await this.getSession(sessionId, userId);
    if (!session) return [];
    if (limit && limit > 0) return session.history.slice(-limit);
    return [...session.history];
  }

  async endSession(sessionId: string, userId: string): Promise<Outcome> {
    return this.locks.run(sessionId, async () => {
      const session = await this.resolveForUpdate(sessionId, userId);
      if (!session) return fail("not_found");

      const ended: Session = { ...session, status: "inactive", lastAccessed: this.now() };
      try {
        await this.persist(ended);
      } catch (err) {
        this.logger.error({ err, sessionId }, "Failed to persist ended session");
        return fail("storage");
      }

      this.cache.delete(sessionId);
      this.logger.info({ sessionId, userId }, "Session ended");
      this.events.emit("session:ended", sessionId, userId);
      return OK;
    });
  }

  /**
   * Archives every session idle since before `now - ttlDays`. A session that
   * cannot be read or written is logged and skipped.
   */
  async sweepExpired(now = this.now(), ttlDays = this.ttlDays): Promise<number> {
    const cutoff = now - ttlDays * DAY_MS;

    let ids: string[];
    try {
      ids = await withTimeout(this.records.keys(), this.timeoutMs, "session list");
    } catch (err) {
      this.logger.error({ err }, "Failed to list sessions for sweep");
      return 0;
    }

    let archived = 0;
    for (const id of ids) {
      try {
        const changed = await this.locks.run(id, () => this.archiveIfExpired(id, cutoff));
        if (changed) archived++;
      } catch (err) {
        this.logger.warn({ err, sessionId: id }, "Failed to archive session");
      }
    }

    this.logger.info({ archived, scanned: ids.length }, "Session sweep finished");
    return archived;
  }

  private async archiveIfExpired(sessionId: string, cutoff: number): Promise<boolean> {
    const session = this.cache.get(sessionId) ?? (await this.load(sessionId));
    if (!session) return false;
    if (session.lastAccessed >= cutoff || !canTransition(session.status, "archived")) {
      return false;
    }

    await this.persist({ ...session, status: "archived" });
    this.cache.delete(sessionId);
    this.events.emit("session:archived", sessionId, session.userId);
    return true;
  }

  /** Like `getSession`, minus the write-back: the caller persists anyway. */
  private async resolveForUpdate(sessionId: string, userId: string): Promise<Session | null> {
    const session = this.cache.get(sessionId) ?? (await this.loadQuietly(sessionId));
    return session && isAccessible(session, userId) ? session : null;
  }

  /** Resolves once every background write-back has settled. */
  async flush(): Promise<void> {
    await Promise.all([...this.pendingWrites]);
  }

  /**
   * Persists the refreshed access time of a freshly loaded session. Skipped
   * once anything else has replaced or evicted the cached entry: that
   * mutation already wrote a newer record.
   */
  private scheduleWriteBack(touched: Session): void {
    const sessionId = touched.id;
    const write = this.locks
      .run(sessionId, async () => {
        if (this.cache.get(sessionId) !== touched || touched.status !== "active") return;
        await this.persist(touched);
      })
      .catch((err: unknown) => {
        this.logger.warn({ err, sessionId }, "Background session write-back failed");
      })
      .finally(() => {
        this.pendingWrites.delete(write);
      });
    this.pendingWrites.add(write);
  }

  private async load(sessionId: string): Promise<Session | null> {
    const raw = await withTimeout(this.records.get(sessionId), this.timeoutMs, "session read");
    if (raw === undefined || raw === null) return null;
    return decodeSession(raw, sessionId);
  }

  private async loadQuietly(sessionId: string): Promise<Session | null> {
    try {
      return await this.load(sessionId);
    } catch (err) {
      this.logger.error({ err, sessionId }, "Failed to load session");
      return null;
    }
  }

  private async persist(session: Session): Promise<void> {
    await withTimeout(
      this.records.set(session.id, encodeSession(session)),
      this.timeoutMs,
      "session write",
    );
  }
}

function messageCount(session: Session): number {
  const value = session.metadata["messageCount"];
  return typeof value === "number" ? value : 0;
}
