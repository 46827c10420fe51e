import type { Logger } from "../logging/logger.js";
import type { MemoryStore } from "../memory/store.js";
import type { SessionStore } from "../session/store.js";
import type { Message, MessageAddedEvent } from "../session/types.js";
import type { TaskQueue } from "./task-queue.js";

export function formatTranscript(messages: readonly Message[]): string {
  return messages.map((m) => `${m.role}: ${m.content}`).join("\n");
}

export function generationTaskKey(sessionId: string, turn: number): string {
  return `memory:${sessionId}:${turn}`;
}

/**
 * Turns every stored turn into one detached memory-generation task.
 * Delivery is best effort: the turn never waits for, or learns about, the
 * outcome. Rapid turns may produce overlapping tasks.
 */
export class BackgroundCoordinator {
  private readonly logger: Logger;
  private detach: (() => void) | null = null;

  constructor(
    private readonly sessions: SessionStore,
    private readonly memories: MemoryStore,
    private readonly queue: TaskQueue,
    private readonly topics: readonly string[],
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "coordinator" });
  }

  attach(): void {
    if (this.detach) return;
    const listener = (event: MessageAddedEvent): void => this.afterTurn(event);
    this.sessions.events.on("message:added", listener);
    this.detach = () => this.sessions.events.off("message:added", listener);
  }

  stop(): void {
    this.detach?.();
    this.detach = null;
  }

  afterTurn(event: MessageAddedEvent): void {
    const key = generationTaskKey(event.sessionId, event.turn);
    this.queue.enqueue(key, async () => {
      const history = await this.sessions.getHistory(event.sessionId, event.userId);
      if (history.length === 0) {
        this.logger.debug({ task: key }, "Session no longer readable, skipping generation");
        return;
      }
      await this.memories.generateMemory(event.userId, formatTranscript(history), this.topics);
    });
  }

  /** Waits for scheduled work, for shutdown and tests. */
  async flush(): Promise<void> {
    await this.queue.drain();
  }
}
