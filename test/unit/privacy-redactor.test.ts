import { describe, it, expect } from "vitest";
import { detect, redact, validateSensitiveContext } from "../../src/privacy/redactor.js";
import { PII_RULES } from "../../src/privacy/rules.js";

describe("redact", () => {
  it.each([
    ["My email is a@b.com", "My email is [EMAIL]"],
    ["phone: 5551234567", "phone: [PHONE]"],
    ["Card 4111 1111 1111 1111 ok", "Card [CREDIT_CARD] ok"],
    ["ssn 123-45-6789", "ssn [SSN]"],
    ["server at 192.168.1.20 now", "server at [IP_ADDRESS] now"],
    ["Name: John Smith", "Name: [NAME]"],
    ["born 12/05/1990", "born [DOB]"],
    ["account 12345678", "account [BANK_ACCOUNT]"],
    ["plate ABC1234", "plate [LICENSE_PLATE]"],
  ])("redacts %j", (input, expected) => {
    expect(redact(input)).toBe(expected);
  });

  it("consumes the separator before a phone number", () => {
    expect(redact("Call me at 555-123-4567")).toBe("Call me at[PHONE]");
  });

  it("normalizes the name label separator to a colon", () => {
    expect(redact("name - Jane Doe")).toBe("name: [NAME]");
  });

  it("applies every rule in one pass", () => {
    expect(redact("Reach me at a@b.com or 192.168.0.1")).toBe(
      "Reach me at [EMAIL] or [IP_ADDRESS]",
    );
  });

  it("leaves text without PII unchanged", () => {
    expect(redact("The weather is nice today.")).toBe("The weather is nice today.");
  });

  it("is stable when applied twice", () => {
    const once = redact("Name: John Smith, ssn 123-45-6789, mail a@b.com");
    expect(redact(once)).toBe(once);
  });

  it("accepts a custom rule list", () => {
    const emailOnly = PII_RULES.filter((rule) => rule.type === "EMAIL");
    expect(redact("a@b.com ssn 123-45-6789", emailOnly)).toBe("[EMAIL] ssn 123-45-6789");
  });
});

describe("detect", () => {
  it("reports type, value and offsets", () => {
    expect(detect("Email a@b.com")).toEqual([
      {
        type: "EMAIL",
        matchedValue: "a@b.com",
        startOffset: 6,
        endOffset: 13,
        replacementToken: "[EMAIL]",
      },
    ]);
  });

  it("returns an empty list for clean text", () => {
    expect(detect("nothing to see")).toEqual([]);
  });

  it("orders matches by rule", () => {
    const types = detect("ssn 123-45-6789 and a@b.com").map((m) => m.type);
    expect(types).toEqual(["EMAIL", "SSN"]);
  });
});

describe("validateSensitiveContext", () => {
  it("flags credential-like pairs", () => {
    expect(validateSensitiveContext("my password: hunter2")).toBe(true);
    expect(validateSensitiveContext("api_key: abc123")).toBe(true);
  });

  it("ignores ordinary text", () => {
    expect(validateSensitiveContext("hello world")).toBe(false);
  });
});
