import { describe, it, expect } from "vitest";
import { RecordDecodeError } from "../../src/errors.js";
import { decodeSession, encodeSession, SESSION_RECORD_VERSION } from "../../src/session/codec.js";
import type { Session } from "../../src/session/types.js";
import { BASE_TIME } from "../helpers/fixtures.js";

const session: Session = {
  id: "session_1",
  userId: "u1",
  createdAt: BASE_TIME,
  lastAccessed: BASE_TIME + 5_000,
  status: "active",
  history: [
    { id: "msg_1", role: "system", content: "be brief", timestamp: BASE_TIME },
    {
      id: "msg_2",
      role: "tool",
      content: "42",
      timestamp: BASE_TIME + 1_000,
      toolResponses: [{ result: 42 }],
    },
  ],
  metadata: { messageCount: 1 },
};

describe("session codec", () => {
  it("writes a versioned record with ISO timestamps", () => {
    const record = encodeSession(session);
    expect(record.kind).toBe("session");
    expect(record.version).toBe(SESSION_RECORD_VERSION);
    expect(record.createdAt).toBe("2026-01-01T00:00:00.000Z");
    expect(record.history[1].timestamp).toBe("2026-01-01T00:00:01.000Z");
  });

  it("reads back what it writes", () => {
    const raw: unknown = JSON.parse(JSON.stringify(encodeSession(session)));
    expect(decodeSession(raw)).toEqual(session);
  });

  it("rejects an unknown version", () => {
    const raw = { ...encodeSession(session), version: 2 };
    expect(() => decodeSession(raw, "session_1")).toThrow(RecordDecodeError);
  });

  it("rejects a malformed timestamp", () => {
    const raw = { ...encodeSession(session), lastAccessed: "yesterday" };
    expect(() => decodeSession(raw)).toThrow(/Unreadable session record: lastAccessed/);
  });

  it("rejects an unknown status", () => {
    const raw = { ...encodeSession(session), status: "paused" };
    expect(() => decodeSession(raw)).toThrow(RecordDecodeError);
  });
});
