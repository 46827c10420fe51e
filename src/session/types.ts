export type MessageRole = "system" | "user" | "assistant" | "tool";
export type SessionStatus = "active" | "inactive" | "archived";

export type ToolPayload = Record<string, unknown>;

export interface Message {
  readonly id: string;
  readonly role: MessageRole;
  /** Already redacted; never rewritten after the first write. */
  readonly content: string;
  readonly timestamp: number;
  readonly toolCalls?: ToolPayload[];
  readonly toolResponses?: ToolPayload[];
}

export interface Session {
  readonly id: string;
  /** Owner. Only this user can read or append. */
  readonly userId: string;
  readonly createdAt: number;
  readonly lastAccessed: number;
  readonly status: SessionStatus;
  /** Chronological; system messages first after any truncation. */
  readonly history: readonly Message[];
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface MessageInput {
  readonly role: MessageRole;
  readonly content: string;
  readonly toolCalls?: ToolPayload[];
  readonly toolResponses?: ToolPayload[];
}

export interface MessageAddedEvent {
  readonly sessionId: string;
  readonly userId: string;
  /** Value of the session's message counter after this append. */
  readonly turn: number;
  readonly message: Message;
}

export interface SessionEvents {
  "session:created": (session: Session) => void;
  "message:added": (event: MessageAddedEvent) => void;
  "session:ended": (sessionId: string, userId: string) => void;
  "session:archived": (sessionId: string, userId: string) => void;
}

const STATUS_ORDER: Record<SessionStatus, number> = {
  active: 0,
  inactive: 1,
  archived: 2,
};

/** Status only moves forward: active, inactive, archived. */
export function canTransition(from: SessionStatus, to: SessionStatus): boolean {
  return STATUS_ORDER[to] > STATUS_ORDER[from];
}
