import { describe, it, expect } from "vitest";
import { assessImportance, classifyMemoryType } from "../../src/memory/classifier.js";

describe("classifyMemoryType", () => {
  it("detects procedural content", () => {
    expect(classifyMemoryType("Here is how to brew green tea")).toBe("procedural");
    expect(classifyMemoryType("The deploy PROCEDURE has four stages")).toBe("procedural");
  });

  it("defaults to declarative", () => {
    expect(classifyMemoryType("I like green tea")).toBe("declarative");
  });
});

describe("assessImportance", () => {
  it("scores empty text at the base average", () => {
    expect(assessImportance("")).toBe(0.25);
  });

  it("boosts for each keyword present", () => {
    // (0.5 + 0.2 + 9 / 500) / 2
    expect(assessImportance("important")).toBeCloseTo(0.359);
  });

  it("caps the keyword score at 1", () => {
    const text =
      "important critical essential key must name birthday preference allergy requirement";
    expect(assessImportance(text)).toBeCloseTo((1 + text.length / 500) / 2);
  });

  it("saturates the length factor", () => {
    expect(assessImportance("x".repeat(1_000))).toBe(0.75);
  });
});
