import { describe, it, expect } from "vitest";
import {
  createSegmenter,
  isEndOfSentence,
  segmentClauses,
  segmentSentences,
  splitIntoClauses,
} from "./sentences";

describe("sentences utils", () => {
  describe("isEndOfSentence", () => {
    it("should recognise ordinary sentence-ending punctuation", () => {
      expect(isEndOfSentence("done.")).toBe(true);
      expect(isEndOfSentence("really?")).toBe(true);
      expect(isEndOfSentence("now!")).toBe(true);
      expect(isEndOfSentence("word,")).toBe(false);
    });

    it("should look through closing quotes and brackets", () => {
      expect(isEndOfSentence('"Stop."')).toBe(true);
      expect(isEndOfSentence("(see above.)")).toBe(true);
    });

    it("should not end on abbreviations or initials", () => {
      expect(isEndOfSentence("Dr.")).toBe(false);
      expect(isEndOfSentence("e.g.")).toBe(false);
      expect(isEndOfSentence("J.", "R.")).toBe(false);
      expect(isEndOfSentence("R.", "Tolkien", "J.")).toBe(false);
    });

    it("should end on a lone capital outside an initial chain", () => {
      expect(isEndOfSentence("B.", "Then", "Plan")).toBe(true);
      expect(isEndOfSentence("B.")).toBe(true);
    });

    it("should not end before a lowercase continuation", () => {
      expect(isEndOfSentence("Wait...", "what")).toBe(false);
      expect(isEndOfSentence("Wait...", "What")).toBe(true);
    });
  });

  describe("segmentSentences", () => {
    it("should return empty array for empty or blank text", () => {
      expect(segmentSentences("")).toEqual([]);
      expect(segmentSentences("   ")).toEqual([]);
    });

    it("should split simple sentences", () => {
      expect(segmentSentences("Hello world. This is a test.")).toEqual([
        "Hello world.",
        "This is a test.",
      ]);
    });

    it("should keep a trailing fragment without punctuation", () => {
      expect(segmentSentences("First one! and the rest")).toEqual([
        "First one! and the rest",
      ]);
      expect(segmentSentences("First one! The rest")).toEqual([
        "First one!",
        "The rest",
      ]);
    });

    it("should not split after abbreviations and initials", () => {
      expect(
        segmentSentences("Dr. Smith arrived. J. R. Tolkien wrote books.")
      ).toEqual(["Dr. Smith arrived.", "J. R. Tolkien wrote books."]);
    });

    it("should split after a lone capital that ends a sentence", () => {
      expect(segmentSentences("Plan B. Then go.")).toEqual(["Plan B.", "Then go."]);
    });

    it("should split after quoted sentences", () => {
      expect(segmentSentences('He said "Stop." Then left.')).toEqual([
        'He said "Stop."',
        "Then left.",
      ]);
    });

    it("should normalise whitespace inside sentences", () => {
      expect(segmentSentences("  Wait...  what\nhappened?   Nothing! ")).toEqual([
        "Wait... what happened?",
        "Nothing!",
      ]);
    });

    it("should be deterministic", () => {
      const text = "One. Two? Three!";
      expect(segmentSentences(text)).toEqual(segmentSentences(text));
    });
  });

  describe("clauses", () => {
    it("should split on clause punctuation and before conjunctions", () => {
      expect(
        splitIntoClauses("First, we install it and then we run it.")
      ).toEqual(["First,", "we install it", "and then we run it."]);
    });

    it("should not split inside words that start like a conjunction", () => {
      expect(splitIntoClauses("Android apps ship daily.")).toEqual([
        "Android apps ship daily.",
      ]);
    });

    it("should segment text into clauses sentence by sentence", () => {
      expect(
        segmentClauses("First, we install it and then we run it. Done.")
      ).toEqual(["First,", "we install it", "and then we run it.", "Done."]);
    });
  });

  describe("createSegmenter", () => {
    it("should pick the segmenter by kind", () => {
      expect(createSegmenter()).toBe(segmentSentences);
      expect(createSegmenter("sentence")).toBe(segmentSentences);
      expect(createSegmenter("clause")).toBe(segmentClauses);
    });
  });
});
