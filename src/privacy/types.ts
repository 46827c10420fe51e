export type PiiType =
  | "EMAIL"
  | "PHONE"
  | "CREDIT_CARD"
  | "SSN"
  | "IP_ADDRESS"
  | "NAME"
  | "DOB"
  | "BANK_ACCOUNT"
  | "LICENSE_PLATE";

export interface PiiRule {
  readonly type: PiiType;
  /** Must carry the `g` flag; applied with `String.prototype.replace`. */
  readonly pattern: RegExp;
  /** Replacement string, may reference capture groups (`$1`). */
  readonly replacement: string;
  /** The token a reader sees in redacted text. */
  readonly token: string;
}

export interface PiiMatch {
  readonly type: PiiType;
  readonly matchedValue: string;
  readonly startOffset: number;
  readonly endOffset: number;
  readonly replacementToken: string;
}
