/**
 * Unit tests for the RSVP tokenizer and pacing helpers.
 */

import { describe, it, expect } from "vitest";
import {
  countWords,
  estimateReadingMinutes,
  getDelayMs,
  getDelayMultiplier,
  getFocusIndex,
  getWordDelayMs,
  splitWord,
  tokenize,
} from "../../src/lib/rsvp/tokenizer";

describe("tokenize", () => {
  it("maps each word to its paragraph", () => {
    expect(tokenize("Hello world\n\nSecond line")).toEqual({
      words: ["Hello", "world", "Second", "line"],
      paragraphIndices: [0, 0, 1, 1],
      paragraphs: ["Hello world", "Second line"],
    });
  });

  it("treats every non-blank line as a paragraph", () => {
    const result = tokenize("One\nTwo three\r\n  \r\nFour");
    expect(result.paragraphs).toEqual(["One", "Two three", "Four"]);
    expect(result.paragraphIndices).toEqual([0, 1, 1, 2]);
  });

  it("collapses runs of whitespace inside a line", () => {
    expect(tokenize("  a \t b   c  ").words).toEqual(["a", "b", "c"]);
  });

  it("returns nothing for blank text", () => {
    expect(tokenize(" \n\n \t")).toEqual({ words: [], paragraphIndices: [], paragraphs: [] });
  });
});

describe("countWords", () => {
  it("counts whitespace-separated words", () => {
    expect(countWords("The quick\nbrown  fox.")).toBe(4);
    expect(countWords("")).toBe(0);
  });
});

describe("splitWord", () => {
  it("splits around the middle letter", () => {
    expect(splitWord("hello")).toEqual({ leftPart: "he", focusLetter: "l", rightPart: "lo" });
    expect(getFocusIndex("hello")).toBe(2);
  });

  it("focuses the only letter of a one-letter word", () => {
    expect(splitWord("a")).toEqual({ leftPart: "", focusLetter: "a", rightPart: "" });
  });

  it("picks the later middle for even lengths", () => {
    expect(splitWord("word")).toEqual({ leftPart: "wo", focusLetter: "r", rightPart: "d" });
  });

  it("treats an emoji as one character", () => {
    expect(splitWord("a😀b")).toEqual({ leftPart: "a", focusLetter: "😀", rightPart: "b" });
  });

  it("keeps a combining accent with its letter", () => {
    expect(splitWord("ne\u0301e")).toEqual({
      leftPart: "n",
      focusLetter: "e\u0301",
      rightPart: "e",
    });
    expect(getFocusIndex("ne\u0301e")).toBe(1);
  });

  it("keeps a skin-tone modifier with its emoji", () => {
    expect(splitWord("ok👍🏽")).toEqual({ leftPart: "o", focusLetter: "k", rightPart: "👍🏽" });
    expect(splitWord("👍🏽!")).toEqual({ leftPart: "👍🏽", focusLetter: "!", rightPart: "" });
  });

  it("returns empty parts for an empty word", () => {
    expect(splitWord("")).toEqual({ leftPart: "", focusLetter: "", rightPart: "" });
  });
});

describe("pacing", () => {
  it("computes the base delay from wpm", () => {
    expect(getDelayMs(300)).toBe(200);
    expect(getDelayMs(60)).toBe(1000);
  });

  it("lengthens sentence and clause endings", () => {
    expect(getDelayMultiplier("end.")).toBe(1.5);
    expect(getDelayMultiplier("what?")).toBe(1.5);
    expect(getDelayMultiplier("wow!")).toBe(1.5);
    expect(getDelayMultiplier("first,")).toBe(1.2);
    expect(getDelayMultiplier("note:")).toBe(1.2);
    expect(getDelayMultiplier("then;")).toBe(1.2);
    expect(getDelayMultiplier("plain")).toBe(1.0);
    expect(getDelayMultiplier("")).toBe(1.0);
  });

  it("combines the two", () => {
    expect(getWordDelayMs("done.", 300)).toBe(300);
    expect(getWordDelayMs("word", 300)).toBe(200);
  });

  it("estimates reading time in whole minutes", () => {
    expect(estimateReadingMinutes(0, 300)).toBe(0);
    expect(estimateReadingMinutes(300, 300)).toBe(1);
    expect(estimateReadingMinutes(301, 300)).toBe(2);
  });
});
