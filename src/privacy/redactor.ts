import { PII_RULES, SENSITIVE_CONTEXT_PATTERNS } from "./rules.js";
import type { PiiMatch, PiiRule } from "./types.js";

export type Redactor = (text: string) => string;

export function redact(text: string, rules: readonly PiiRule[] = PII_RULES): string {
  let result = text;
  for (const rule of rules) {
    result = result.replace(rule.pattern, rule.replacement);
  }
  return result;
}

/**
 * Reports what `redact` would target, scanning the original text once per
 * rule. Ordered by rule, then by offset.
 */
export function detect(text: string, rules: readonly PiiRule[] = PII_RULES): PiiMatch[] {
  const matches: PiiMatch[] = [];
  for (const rule of rules) {
    for (const match of text.matchAll(rule.pattern)) {
      const start = match.index ?? 0;
      matches.push({
        type: rule.type,
        matchedValue: match[0],
        startOffset: start,
        endOffset: start + match[0].length,
        replacementToken: rule.token,
      });
    }
  }
  return matches;
}

/** True when the text carries a secret-like key/value pair. */
export function validateSensitiveContext(text: string): boolean {
  return SENSITIVE_CONTEXT_PATTERNS.some((pattern) => pattern.test(text));
}
