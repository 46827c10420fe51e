import { clamp01 } from "./scoring.js";
import type { MemoryType } from "./types.js";

const PROCEDURAL_INDICATORS = [
  "how to",
  "steps to",
  "process",
  "procedure",
  "method",
  "algorithm",
  "way to",
  "technique",
];

const IMPORTANCE_KEYWORDS = [
  "important",
  "critical",
  "essential",
  "key",
  "must",
  "name",
  "birthday",
  "preference",
  "allergy",
  "requirement",
];

const BASE_IMPORTANCE = 0.5;
const KEYWORD_BOOST = 0.2;
const LENGTH_NORMALIZER = 500;

export function classifyMemoryType(content: string): MemoryType {
  const lower = content.toLowerCase();
  return PROCEDURAL_INDICATORS.some((indicator) => lower.includes(indicator))
    ? "procedural"
    : "declarative";
}

/**
 * Keyword heuristic: 0.5 plus 0.2 per distinct keyword present (capped at
 * 1), then averaged with a length factor that saturates at 500 characters.
 */
export function assessImportance(content: string): number {
  const lower = content.toLowerCase();
  let importance = BASE_IMPORTANCE;
  for (const keyword of IMPORTANCE_KEYWORDS) {
    if (lower.includes(keyword)) {
      importance = Math.min(1, importance + KEYWORD_BOOST);
    }
  }

  const lengthFactor = Math.min(1, content.length / LENGTH_NORMALIZER);
  return clamp01((importance + lengthFactor) / 2);
}
