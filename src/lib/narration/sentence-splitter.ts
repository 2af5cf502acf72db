/**
 * Sentence Splitter Utility
 *
 * Splits article text into sentences for narration and maps sentence
 * positions to and from word offsets, so narration progress can be stored in
 * the same unit as RSVP progress.
 *
 * Every ".", "!" or "?" ends a sentence,
 * including the ones in abbreviations and decimals.
 *
 * @module narration/sentence-splitter
 */

import { countWords } from "@/lib/rsvp/tokenizer";

const SENTENCE_TERMINATORS = new Set([".", "!", "?"]);

/**
 * Splits text into sentences, keeping each terminator with its sentence.
 *
 * Text after the last terminator becomes a final sentence. Text with no
 * sentences at all is returned whole; empty text gives no sentences.
 *
 * @example
 * splitIntoSentences("Hi there. How are you? Fine")
 * // => ["Hi there.", "How are you?", "Fine"]
 */
export function splitIntoSentences(text: string): string[] {
  const sentences: string[] = [];
  let current = "";

  const push = () => {
    const sentence = current.trim();
    if (sentence.length > 0) {
      sentences.push(sentence);
    }
    current = "";
  };

  for (const character of text) {
    current += character;
    if (SENTENCE_TERMINATORS.has(character)) {
      push();
    }
  }
  push();

  if (sentences.length === 0 && text.trim().length > 0) {
    return [text.trim()];
  }

  return sentences;
}

/**
 * Word offset of the first word of a sentence.
 *
 * @example
 * sentenceToWordIndex(["One two.", "Three four five."], 1) // => 2
 */
export function sentenceToWordIndex(sentences: readonly string[], sentenceIndex: number): number {
  let words = 0;
  const end = Math.min(sentenceIndex, sentences.length);
  for (let i = 0; i < end; i++) {
    words += countWords(sentences[i]);
  }
  return words;
}

/**
 * The sentence containing a word offset.
 *
 * Offsets at or before 0 map to the first sentence, offsets past the end to
 * the last one.
 *
 * @example
 * wordToSentenceIndex(["One two.", "Three four five."], 3) // => 1
 */
export function wordToSentenceIndex(sentences: readonly string[], wordIndex: number): number {
  if (wordIndex <= 0 || sentences.length === 0) {
    return 0;
  }

  let cumulative = 0;
  for (let i = 0; i < sentences.length; i++) {
    cumulative += countWords(sentences[i]);
    if (cumulative > wordIndex) {
      return i;
    }
  }
  return sentences.length - 1;
}
