import type { Memory, RetrievalCandidate } from "./types.js";

const HOUR_MS = 3_600_000;
const DAY_MS = 86_400_000;

export const SCORE_WEIGHTS = {
  importance: 0.4,
  relevance: 0.4,
  recency: 0.2,
} as const;

/** Used when a candidate's source reports no relevance. */
export const DEFAULT_RELEVANCE = 0.5;

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

/** 1 at age zero, 0.5 at 24 hours, tending to 0. */
export function recencyScore(createdAt: number, now: number): number {
  const ageHours = Math.max(0, now - createdAt) / HOUR_MS;
  return clamp01(1 / (1 + ageHours / 24));
}

export function ageInWholeDays(createdAt: number, now: number): number {
  return Math.floor((now - createdAt) / DAY_MS);
}

export function blendedScore(candidate: RetrievalCandidate, now: number): number {
  const { memory } = candidate;
  return (
    SCORE_WEIGHTS.importance * memory.importance +
    SCORE_WEIGHTS.relevance * (candidate.relevance ?? DEFAULT_RELEVANCE) +
    SCORE_WEIGHTS.recency * recencyScore(memory.createdAt, now)
  );
}

/** Descending by blended score; equal scores keep candidate order. */
export function rankCandidates(
  candidates: readonly RetrievalCandidate[],
  now: number,
  topK: number,
): Memory[] {
  return candidates
    .map((candidate, index) => ({ candidate, index, score: blendedScore(candidate, now) }))
    .sort((a, b) => b.score - a.score || a.index - b.index)
    .slice(0, Math.max(0, topK))
    .map((entry) => entry.candidate.memory);
}
