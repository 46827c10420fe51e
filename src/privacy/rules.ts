import type { PiiRule } from "./types.js";

/**
 * Applied top to bottom. Rules are not mutually exclusive: each one runs on
 * the output of the previous, so the order is part of the redaction format.
 */
export const PII_RULES: readonly PiiRule[] = [
  {
    type: "EMAIL",
    pattern: /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Z|a-z]{2,}\b/gi,
    replacement: "[EMAIL]",
    token: "[EMAIL]",
  },
  {
    type: "PHONE",
    pattern: /\b\+?1?[-.\s]?\(?(\d{3})\)?[-.\s]?(\d{3})[-.\s]?(\d{4})\b/gi,
    replacement: "[PHONE]",
    token: "[PHONE]",
  },
  {
    type: "CREDIT_CARD",
    pattern: /\b\d{4}[-\s]?(\d{4}[-\s]?){2}\d{4}\b/gi,
    replacement: "[CREDIT_CARD]",
    token: "[CREDIT_CARD]",
  },
  {
    type: "SSN",
    pattern: /\b\d{3}-\d{2}-\d{4}\b/gi,
    replacement: "[SSN]",
    token: "[SSN]",
  },
  {
    type: "IP_ADDRESS",
    pattern: /\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/gi,
    replacement: "[IP_ADDRESS]",
    token: "[IP_ADDRESS]",
  },
  {
    // "Name: First Last"; the label is kept, the value replaced
    type: "NAME",
    pattern: /\b(Name|name)\s*[:\-]\s*([A-Z][a-z]+ [A-Z][a-z]+)/gi,
    replacement: "$1: [NAME]",
    token: "[NAME]",
  },
  {
    type: "DOB",
    pattern: /\b(\d{1,2}[\/\-]\d{1,2}[\/\-]\d{4}|\d{4}[\/\-]\d{1,2}[\/\-]\d{1,2})\b/gi,
    replacement: "[DOB]",
    token: "[DOB]",
  },
  {
    type: "BANK_ACCOUNT",
    pattern: /\b\d{8,12}\b/gi,
    replacement: "[BANK_ACCOUNT]",
    token: "[BANK_ACCOUNT]",
  },
  {
    type: "LICENSE_PLATE",
    pattern: /\b[A-Z]{1,3}\d{3,4}[A-Z]{0,3}\b/gi,
    replacement: "[LICENSE_PLATE]",
    token: "[LICENSE_PLATE]",
  },
];

export const SENSITIVE_CONTEXT_PATTERNS: readonly RegExp[] = [
  /password[:\s]+[^\s]+/i,
  /api[-_\s]?key[:\s]+[^\s]+/i,
  /token[:\s]+[^\s]+/i,
  /secret[:\s]+[^\s]+/i,
];
