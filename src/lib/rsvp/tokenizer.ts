/**
 * Tokenizer
 *
 * Splits article text into words for RSVP, remembering which paragraph each
 * word came from, and computes per-word pacing.
 */

/**
 * Article text split into words with word-to-paragraph mapping.
 *
 * `paragraphIndices[i]` is the index into `paragraphs` of `words[i]`.
 */
export interface TokenizedText {
  words: string[];
  paragraphIndices: number[];
  paragraphs: string[];
}

/**
 * A word split around its Optimal Recognition Point.
 *
 * `leftPart + focusLetter + rightPart` is always the original word.
 */
export interface RSVPWord {
  leftPart: string;
  focusLetter: string;
  rightPart: string;
}

const LINE_BREAK = /\r\n|\n|\r/;

const WHITESPACE = /\s+/;

/**
 * Delay multiplier for words that end a sentence.
 */
export const SENTENCE_END_MULTIPLIER = 1.5;

/**
 * Delay multiplier for words that end a clause.
 */
export const CLAUSE_END_MULTIPLIER = 1.2;

/**
 * Splits text into whitespace-free, non-empty words.
 */
export function splitWords(text: string): string[] {
  return text.split(WHITESPACE).filter((word) => word.length > 0);
}

/**
 * Counts words the same way `tokenize` splits them.
 */
export function countWords(text: string): number {
  return splitWords(text).length;
}

/**
 * Tokenizes text into words and paragraphs.
 *
 * Every non-blank line is its own paragraph; blank lines only separate.
 *
 * @example
 * tokenize("Hello world\n\nSecond line")
 * // => {
 * //   words: ["Hello", "world", "Second", "line"],
 * //   paragraphIndices: [0, 0, 1, 1],
 * //   paragraphs: ["Hello world", "Second line"],
 * // }
 */
export function tokenize(text: string): TokenizedText {
  const paragraphs = text
    .split(LINE_BREAK)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);

  const words: string[] = [];
  const paragraphIndices: number[] = [];

  paragraphs.forEach((paragraph, paragraphIndex) => {
    for (const word of splitWords(paragraph)) {
      words.push(word);
      paragraphIndices.push(paragraphIndex);
    }
  });

  return { words, paragraphIndices, paragraphs };
}

const graphemeSegmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

/**
 * Splits a word into user-perceived characters, so an accent stays with its
 * letter and an emoji with its modifiers.
 */
function toGraphemes(word: string): string[] {
  return Array.from(graphemeSegmenter.segment(word), (part) => part.segment);
}

/**
 * Index of the focus letter: the middle character, counted in graphemes.
 */
export function getFocusIndex(word: string): number {
  return Math.floor(toGraphemes(word).length / 2);
}

/**
 * Splits a word around its focus letter for display.
 */
export function splitWord(word: string): RSVPWord {
  const characters = toGraphemes(word);
  if (characters.length === 0) {
    return { leftPart: "", focusLetter: "", rightPart: "" };
  }

  const focusIndex = Math.floor(characters.length / 2);
  return {
    leftPart: characters.slice(0, focusIndex).join(""),
    focusLetter: characters[focusIndex],
    rightPart: characters.slice(focusIndex + 1).join(""),
  };
}

/**
 * Base display time per word in milliseconds.
 */
export function getDelayMs(wpm: number): number {
  return 60000 / wpm;
}

/**
 * Extra display time for words ending a sentence or clause.
 */
export function getDelayMultiplier(word: string): number {
  const last = word.slice(-1);
  if (last === "." || last === "!" || last === "?") {
    return SENTENCE_END_MULTIPLIER;
  }
  if (last === "," || last === ":" || last === ";") {
    return CLAUSE_END_MULTIPLIER;
  }
  return 1.0;
}

/**
 * Display time for a word at a given speed.
 */
export function getWordDelayMs(word: string, wpm: number): number {
  return getDelayMs(wpm) * getDelayMultiplier(word);
}

/**
 * Estimated reading time in whole minutes, rounded up.
 */
export function estimateReadingMinutes(wordCount: number, wpm: number): number {
  if (wordCount <= 0) return 0;
  return Math.ceil(wordCount / wpm);
}
