import { Command, Option } from "clipanion";
import { openEngine, parsePositiveInt } from "../context.js";

export class SessionHistoryCommand extends Command {
  static override paths = [["session", "history"]];

  static override usage = Command.Usage({
    description: "Print the stored history of an active session",
    examples: [
      ["Show the last 10 messages", "kestrel session history session_123 u1 --limit 10"],
    ],
  });

  sessionId = Option.String({ name: "sessionId", required: true });
  userId = Option.String({ name: "userId", required: true });

  limit = Option.String("--limit", {
    description: "Only the most recent N messages",
  });

  async execute(): Promise<void> {
    const engine = openEngine();
    try {
      const limit = this.limit === undefined ? undefined : parsePositiveInt(this.limit, 1);
      const history = await engine.sessions.getHistory(this.sessionId, this.userId, limit);

      if (history.length === 0) {
        this.context.stdout.write("Session not found or empty.\n");
        return;
      }

      for (const message of history) {
        const at = new Date(message.timestamp).toISOString();
        this.context.stdout.write(`[${at}] ${message.role}: ${message.content}\n`);
      }
    } finally {
      await engine.close();
    }
  }
}

export class SessionSweepCommand extends Command {
  static override paths = [["session", "sweep"]];

  static override usage = Command.Usage({
    description: "Archive sessions idle for longer than the TTL",
    examples: [
      ["Use the configured TTL", "kestrel session sweep"],
      ["Archive anything idle for 3 days", "kestrel session sweep --ttl-days 3"],
    ],
  });

  ttlDays = Option.String("--ttl-days", {
    description: "Override session.ttlDays",
  });

  async execute(): Promise<void> {
    const engine = openEngine();
    try {
      const ttlDays = parsePositiveInt(this.ttlDays, engine.sessions.ttlDays);
      const archived = await engine.sessions.sweepExpired(Date.now(), ttlDays);
      this.context.stdout.write(`Archived ${archived} session(s).\n`);
    } finally {
      await engine.close();
    }
  }
}
