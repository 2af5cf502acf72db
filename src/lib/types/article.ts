/**
 * Article and Reading Progress Type Definitions
 *
 * Centralized types shared by the extraction service, the stores and both
 * reading sessions.
 */

/**
 * A saved article.
 */
export interface Article {
  /**
   * Unique identifier for the article (UUID).
   */
  id: string;

  /**
   * The page the article was extracted from.
   */
  url: string;

  title: string;

  /**
   * Plain extracted text, paragraphs separated by blank lines. Never modified after creation.
   */
  content: string;

  /**
   * Short prose summary, filled in later by the optional summarization step.
   */
  summary: string | null;

  dateAdded: Date;

  lastRead: Date | null;
}

/**
 * The two ways of consuming an article.
 */
export type ReadingMode = "rsvp" | "tts";

/**
 * Saved position in an article for one reading mode.
 *
 * Both modes store a word index; TTS translates its sentence index to and
 * from the equivalent word offset.
 */
export interface ReadingProgress {
  articleId: string;
  currentWordIndex: number;
  totalWords: number;
  mode: ReadingMode;
}
