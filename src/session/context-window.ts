import type { Message } from "./types.js";

/** Fixed approximation: one token per four characters. */
export const CHARS_PER_TOKEN = 4;

export function estimateTokensFromChars(chars: number): number {
  return Math.floor(chars / CHARS_PER_TOKEN);
}

export function countChars(messages: readonly Message[]): number {
  let total = 0;
  for (const msg of messages) total += msg.content.length;
  return total;
}

export function estimateTokens(messages: readonly Message[]): number {
  return estimateTokensFromChars(countChars(messages));
}

/**
 * Hard truncation. System messages are always kept in full; of the rest,
 * the longest recent suffix that keeps the whole history within
 * `maxTokens` survives. Nothing is reordered or partially trimmed.
 */
export function truncateHistory(history: readonly Message[], maxTokens: number): Message[] {
  if (estimateTokens(history) <= maxTokens) return [...history];

  const system = history.filter((m) => m.role === "system");
  const rest = history.filter((m) => m.role !== "system");
  const systemChars = countChars(system);

  let keptChars = 0;
  let start = rest.length;
  for (let i = rest.length - 1; i >= 0; i--) {
    const next = keptChars + rest[i].content.length;
    if (estimateTokensFromChars(systemChars + next) > maxTokens) break;
    keptChars = next;
    start = i;
  }

  return [...system, ...rest.slice(start)];
}
