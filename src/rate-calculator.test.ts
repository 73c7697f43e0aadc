import { describe, it, expect } from "vitest";
import { sentenceStats, wordsPerMinute } from "./rate-calculator.js";
import { ABSENT, present } from "./utils/maybe.js";

describe("wordsPerMinute", () => {
  it("computes words per minute from count and duration", () => {
    expect(wordsPerMinute(50, 30)).toEqual(present(100));
  });

  it("rounds to 2 decimals", () => {
    // 10 / 7 * 60 = 85.714285...
    expect(wordsPerMinute(10, 7)).toEqual(present(85.71));
  });

  it("is absent for zero duration", () => {
    expect(wordsPerMinute(10, 0)).toEqual(ABSENT);
  });

  it("is absent for negative duration", () => {
    expect(wordsPerMinute(10, -5)).toEqual(ABSENT);
  });

  it("is absent for a negative word count", () => {
    expect(wordsPerMinute(-1, 30)).toEqual(ABSENT);
  });

  it("is zero (not absent) for silence with a duration", () => {
    expect(wordsPerMinute(0, 12.5)).toEqual(present(0));
  });
});

describe("sentenceStats", () => {
  it("counts sentences and their word lengths", () => {
    expect(sentenceStats("Hello. This is a test. It works well.")).toEqual({
      sentenceCount: 3,
      avgSentenceLength: 2.67,
      minSentenceLength: 1,
      maxSentenceLength: 4,
    });
  });

  it("treats runs of terminators as one boundary", () => {
    expect(sentenceStats("Really?! Yes... I agree")).toEqual({
      sentenceCount: 3,
      avgSentenceLength: 1.33,
      minSentenceLength: 1,
      maxSentenceLength: 2,
    });
  });

  it("returns zeros for empty text", () => {
    expect(sentenceStats("")).toEqual({
      sentenceCount: 0,
      avgSentenceLength: 0,
      minSentenceLength: 0,
      maxSentenceLength: 0,
    });
  });

  it("returns zeros for punctuation-only text", () => {
    expect(sentenceStats("?!...").sentenceCount).toBe(0);
  });
});
