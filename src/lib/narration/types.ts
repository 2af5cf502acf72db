/**
 * Speech Engine Types
 *
 * The narrator speaks one sentence at a time through a `SpeechEngine`. Engines
 * wrap a platform synthesizer (a native bridge, a cloud voice, a test fake)
 * behind this interface.
 *
 * @module narration/types
 */

/**
 * Rates the engine accepts, in its own units.
 *
 * The narrator multiplies `base` by the user's speed multiplier and clamps the
 * result to `[min, max]`.
 */
export interface SpeechRateRange {
  min: number;
  max: number;
  base: number;
}

/**
 * A span of the sentence being spoken, in UTF-16 code units.
 */
export interface SpokenRange {
  start: number;
  length: number;
}

export interface SpeakOptions {
  /** Identifies this utterance in the handler callbacks */
  utteranceId: number;
  /** Engine rate, already clamped to `rateRange` */
  rate: number;
  /** Voice to use; null means the engine's default */
  voiceId: string | null;
}

/**
 * Callbacks an engine reports through. Registered once, not per utterance;
 * each call carries the `utteranceId` it was given in `speak`, since a
 * completion may belong to an utterance that has since been stopped.
 */
export interface SpeechEngineHandlers {
  /** Called as each part of the sentence starts being spoken */
  onProgress(utteranceId: number, range: SpokenRange): void;
  /** Called when an utterance stops speaking, whether it finished or was stopped */
  onFinish(utteranceId: number): void;
  /** Called when the engine fails mid-utterance */
  onError(utteranceId: number, error: Error): void;
}

export interface SpeechEngine {
  readonly rateRange: SpeechRateRange;

  setHandlers(handlers: SpeechEngineHandlers): void;

  /**
   * Speaks the text.
   *
   * @returns Promise that resolves when speech starts (not when it ends)
   */
  speak(text: string, options: SpeakOptions): Promise<void>;

  /**
   * Stops any current speech immediately.
   */
  stop(): void;
}
