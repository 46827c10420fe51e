import { describe, it, expect } from "vitest";
import { matchesTopic, TopicMatchExtractor } from "../../src/memory/extractor.js";

describe("matchesTopic", () => {
  it("matches the whole phrase, ignoring case", () => {
    expect(matchesTopic("We made some Important Decisions today", "important decisions")).toBe(true);
  });

  it("matches when every topic word appears", () => {
    expect(matchesTopic("this is an important decision about hosting", "important decisions")).toBe(
      true,
    );
  });

  it("requires all topic words", () => {
    expect(matchesTopic("a decision was made", "important decisions")).toBe(false);
  });

  it("never matches a blank topic", () => {
    expect(matchesTopic("anything", "   ")).toBe(false);
  });
});

describe("TopicMatchExtractor", () => {
  const extractor = new TopicMatchExtractor();

  it("returns the conversation when a topic matches", async () => {
    const text = "user: I have a peanut allergy";
    expect(await extractor.extract(text, ["birthday", "allergy"])).toBe(text);
  });

  it("returns null when nothing matches", async () => {
    expect(await extractor.extract("user: hello there", ["allergy"])).toBeNull();
  });

  it("returns null for empty text", async () => {
    expect(await extractor.extract("   ", ["allergy"])).toBeNull();
  });
});
