/**
 * RSVPSession
 *
 * Drives word-by-word playback of one article: a single pending timer
 * advances the current word, paced by the word on screen.
 *
 * Usage:
 * ```typescript
 * import { RSVPSession } from "@/lib/rsvp/session";
 *
 * const session = new RSVPSession({ progressStore: store, settingsStore: store });
 * session.subscribe((state) => render(state));
 * await session.load(article);
 * session.play();
 * ```
 */

import { createSessionLogger, errorMessage, logger, type Logger } from "@/lib/logger";
import { ProgressTracker, type ProgressStore } from "@/lib/reading/progress";
import { clampWpm, DEFAULT_APP_SETTINGS, type SettingsStore } from "@/lib/settings/app-settings";
import type { Article } from "@/lib/types/article";
import { getWordDelayMs, splitWord, tokenize, type RSVPWord, type TokenizedText } from "./tokenizer";

/**
 * Playback states.
 *
 * idle: nothing loaded, or the article had no words.
 */
export type RSVPPlaybackState = "idle" | "ready" | "playing" | "paused" | "finished";

/**
 * Words moved by skipForward / skipBackward.
 */
export const SKIP_WORD_COUNT = 5;

export interface RSVPSessionState {
  state: RSVPPlaybackState;
  currentWordIndex: number;
  totalWords: number;
  wpm: number;
  /** The word on screen, or null when idle */
  currentWord: string | null;
  /** The word on screen split around its focus letter */
  rsvpWord: RSVPWord | null;
  /** Paragraph containing the current word */
  paragraph: string | null;
  paragraphIndex: number | null;
  /** 0 at the first word, 1 at the last */
  progress: number;
}

export type RSVPStateListener = (state: RSVPSessionState) => void;

export interface RSVPSessionOptions {
  progressStore?: ProgressStore;
  /** Read for the starting speed and written on every speed change */
  settingsStore?: SettingsStore;
  /** Starting speed; takes precedence over the stored setting */
  wpm?: number;
}

const EMPTY_TEXT: TokenizedText = { words: [], paragraphIndices: [], paragraphs: [] };

export class RSVPSession {
  private text: TokenizedText = EMPTY_TEXT;
  private currentIndex = 0;
  private state: RSVPPlaybackState = "idle";
  private wpm: number;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private tracker: ProgressTracker | null = null;
  private log: Logger = logger;
  private loadGeneration = 0;
  private pendingSettingsWrite: Promise<void> = Promise.resolve();
  private readonly listeners: Set<RSVPStateListener> = new Set();

  constructor(private readonly options: RSVPSessionOptions = {}) {
    this.wpm = clampWpm(options.wpm ?? DEFAULT_APP_SETTINGS.rsvpSpeedWpm);
    this.tick = this.tick.bind(this);
  }

  /**
   * Loads an article, replacing whatever was loaded before.
   *
   * Restores saved progress; a saved position past the first word leaves the
   * session paused there.
   */
  async load(article: Pick<Article, "id" | "title" | "content">): Promise<void> {
    const generation = ++this.loadGeneration;
    this.cancelTimer();

    this.log = createSessionLogger({ articleId: article.id, mode: "rsvp" });
    this.text = tokenize(article.content.trim() ? article.content : article.title);
    this.currentIndex = 0;
    this.state = "idle";
    this.tracker = this.options.progressStore
      ? new ProgressTracker(this.options.progressStore, article.id, "rsvp", this.log)
      : null;

    if (this.options.wpm === undefined && this.options.settingsStore) {
      try {
        const settings = await this.options.settingsStore.getSettings();
        this.wpm = clampWpm(settings.rsvpSpeedWpm);
      } catch (error) {
        this.log.warn("Failed to read speed setting", { error: errorMessage(error) });
      }
    }

    const savedIndex = this.tracker ? await this.tracker.load() : null;

    // A newer load replaced this one while we were waiting
    if (generation !== this.loadGeneration) {
      return;
    }

    const total = this.text.words.length;
    if (total > 0) {
      this.currentIndex = Math.min(savedIndex ?? 0, total - 1);
      this.state = this.currentIndex > 0 ? "paused" : "ready";
    }

    this.log.debug("Loaded article for RSVP", {
      totalWords: total,
      restoredIndex: this.currentIndex,
    });
    this.notifyStateChange();
  }

  /**
   * Starts or resumes playback. From FINISHED, starts over at the first word.
   *
   * @returns false if playback can't start from the current state
   */
  play(): boolean {
    if (this.state !== "ready" && this.state !== "paused" && this.state !== "finished") {
      return false;
    }

    if (this.state === "finished") {
      this.currentIndex = 0;
    }

    this.state = "playing";
    this.scheduleTick();
    this.notifyStateChange();
    return true;
  }

  /**
   * Pauses playback and saves the position.
   *
   * @returns false if nothing was playing
   */
  pause(): boolean {
    if (this.state !== "playing") {
      return false;
    }

    this.cancelTimer();
    this.state = "paused";
    this.notifyStateChange();
    void this.saveProgress();
    return true;
  }

  toggle(): boolean {
    return this.state === "playing" ? this.pause() : this.play();
  }

  skipForward(): void {
    this.seek(this.currentIndex + SKIP_WORD_COUNT);
  }

  skipBackward(): void {
    this.seek(this.currentIndex - SKIP_WORD_COUNT);
  }

  /**
   * Moves to a word, clamped to the article.
   *
   * Outside playback, moving forward onto the last word finishes the article
   * and moving back from the end makes it ready again.
   */
  seek(index: number): void {
    if (this.state === "idle") {
      return;
    }

    const previous = this.currentIndex;
    const lastIndex = this.text.words.length - 1;
    const target = Math.max(0, Math.min(lastIndex, Math.trunc(index)));
    const movingForward = index > previous;
    this.currentIndex = target;

    if (this.state === "playing") {
      this.scheduleTick();
    } else if (movingForward && target === lastIndex) {
      this.state = "finished";
    } else if (this.state === "finished" && target < lastIndex) {
      this.state = "ready";
    }

    this.notifyStateChange();
  }

  /**
   * Stops playback and returns to the first word.
   */
  reset(): void {
    this.cancelTimer();
    this.currentIndex = 0;
    this.state = this.text.words.length > 0 ? "ready" : "idle";
    this.notifyStateChange();
  }

  /**
   * Changes the speed, keeping the current word. Playback continues at the new
   * pace from the word on screen.
   */
  setSpeed(wpm: number): void {
    this.wpm = clampWpm(wpm);

    if (this.state === "playing") {
      this.scheduleTick();
    }

    const settingsStore = this.options.settingsStore;
    if (settingsStore) {
      const speed = this.wpm;
      this.pendingSettingsWrite = this.pendingSettingsWrite.then(async () => {
        try {
          await settingsStore.updateSettings({ rsvpSpeedWpm: speed });
        } catch (error) {
          this.log.error("Failed to save speed setting", { wpm: speed, error: errorMessage(error) });
        }
      });
    }

    this.notifyStateChange();
  }

  /**
   * Stops the timer and saves the position. Call when leaving the reader.
   */
  async unload(): Promise<void> {
    this.loadGeneration++;
    this.cancelTimer();
    if (this.state === "playing") {
      this.state = "paused";
      this.notifyStateChange();
    }

    if (this.text.words.length > 0) {
      await this.saveProgress();
    }
    await this.flush();
  }

  /**
   * Resolves once queued progress and settings writes have finished.
   */
  async flush(): Promise<void> {
    await this.pendingSettingsWrite;
    await this.tracker?.flush();
  }

  getState(): RSVPSessionState {
    const total = this.text.words.length;
    const word = total > 0 ? this.text.words[this.currentIndex] : null;
    const paragraphIndex = total > 0 ? this.text.paragraphIndices[this.currentIndex] : null;

    return {
      state: this.state,
      currentWordIndex: this.currentIndex,
      totalWords: total,
      wpm: this.wpm,
      currentWord: word,
      rsvpWord: word === null ? null : splitWord(word),
      paragraph: paragraphIndex === null ? null : this.text.paragraphs[paragraphIndex],
      paragraphIndex,
      progress: total > 0 ? this.currentIndex / Math.max(total - 1, 1) : 0,
    };
  }

  /**
   * Registers a listener for state changes.
   *
   * @returns A function to unsubscribe the listener
   */
  subscribe(listener: RSVPStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private tick(): void {
    this.timer = null;
    if (this.state !== "playing") {
      return;
    }

    if (this.currentIndex < this.text.words.length - 1) {
      this.currentIndex++;
      this.scheduleTick();
    } else {
      this.state = "finished";
    }
    this.notifyStateChange();
  }

  /**
   * Replaces any pending tick with one timed for the word now on screen.
   */
  private scheduleTick(): void {
    this.cancelTimer();
    const word = this.text.words[this.currentIndex] ?? "";
    this.timer = setTimeout(this.tick, getWordDelayMs(word, this.wpm));
  }

  private cancelTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private saveProgress(): Promise<void> {
    if (!this.tracker) {
      return Promise.resolve();
    }
    return this.tracker.save(this.currentIndex, this.text.words.length);
  }

  private notifyStateChange(): void {
    const state = this.getState();
    for (const listener of this.listeners) {
      try {
        listener(state);
      } catch (error) {
        this.log.error("Error in RSVP state listener", { error: errorMessage(error) });
      }
    }
  }
}
