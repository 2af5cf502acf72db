/**
 * ArticleNarrator
 *
 * Sentence-by-sentence narration of one article through a `SpeechEngine`,
 * with playback controls, a sleep timer, saved progress and state change
 * notifications for UI updates.
 *
 * Pausing stops the engine instead of pausing it, and resuming speaks the
 * current sentence again from its start. Changing speed or jumping while
 * playing works the same way. Engines report the completion of a stopped
 * utterance through the same callback as a natural one, so every stop that is
 * followed by a restart raises a suppression flag first. While it's raised,
 * callbacks from any utterance other than the replacement are ignored; it
 * drops a short settling delay after the replacement sentence has been handed
 * to the engine. Callbacks from superseded utterances are ignored after that
 * too, since every utterance carries its own id.
 *
 * Usage:
 * ```typescript
 * import { ArticleNarrator } from "@/lib/narration/ArticleNarrator";
 *
 * const narrator = new ArticleNarrator(engine, { progressStore: store });
 * narrator.onStateChange((state) => console.log(state));
 * await narrator.load(article);
 * await narrator.start();
 * ```
 */

import { createSessionLogger, errorMessage, logger, type Logger } from "@/lib/logger";
import { ProgressTracker, type ProgressStore } from "@/lib/reading/progress";
import { countWords } from "@/lib/rsvp/tokenizer";
import {
  clampSpeedMultiplier,
  DEFAULT_APP_SETTINGS,
  type SettingsStore,
} from "@/lib/settings/app-settings";
import type { Article } from "@/lib/types/article";
import {
  sentenceToWordIndex,
  splitIntoSentences,
  wordToSentenceIndex,
} from "./sentence-splitter";
import { SleepTimer, type SleepTimerState } from "./sleep-timer";
import type { SpeechEngine, SpokenRange } from "./types";

/**
 * How long completions stay suppressed after a restarted sentence is issued.
 */
export const RESTART_SETTLE_MS = 100;

/**
 * Current state of the narration.
 *
 * Stopped: not playing, not paused. Paused: playing and paused.
 */
export interface NarrationState {
  isPlaying: boolean;
  isPaused: boolean;
  currentSentenceIndex: number;
  sentences: readonly string[];
  totalWords: number;
  speedMultiplier: number;
  voiceId: string | null;
  /** Part of the current sentence being spoken, when the engine reports it */
  spokenRange: SpokenRange | null;
  sleepTimer: SleepTimerState;
  /** 0 at the first sentence, 1 at the last */
  progress: number;
}

export type StateChangeCallback = (state: NarrationState) => void;

export interface ArticleNarratorOptions {
  progressStore?: ProgressStore;
  /** Read on load for the speed multiplier and voice */
  settingsStore?: SettingsStore;
  /** Takes precedence over the stored setting */
  speedMultiplier?: number;
  /** Takes precedence over the stored setting */
  voiceId?: string | null;
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

export class ArticleNarrator {
  private sentences: string[] = [];
  private totalWords = 0;
  private currentIndex = 0;
  private isPlaying = false;
  private isPaused = false;
  private speedMultiplier: number;
  private voiceId: string | null;
  private spokenRange: SpokenRange | null = null;
  private isRestarting = false;
  private lastUtteranceId = 0;
  /** The utterance whose completion advances narration, if any */
  private activeUtteranceId: number | null = null;
  private settleTimer: ReturnType<typeof setTimeout> | null = null;
  private tracker: ProgressTracker | null = null;
  private log: Logger = logger;
  private loadGeneration = 0;
  private readonly sleepTimer: SleepTimer;
  private stateChangeListeners: Set<StateChangeCallback> = new Set();

  constructor(
    private readonly engine: SpeechEngine,
    private readonly options: ArticleNarratorOptions = {}
  ) {
    this.speedMultiplier = clampSpeedMultiplier(
      options.speedMultiplier ?? DEFAULT_APP_SETTINGS.ttsSpeedMultiplier
    );
    this.voiceId = options.voiceId ?? DEFAULT_APP_SETTINGS.selectedVoiceId;

    this.sleepTimer = new SleepTimer({
      onExpire: () => this.handleSleepTimerExpired(),
      onTick: () => this.notifyStateChange(),
    });

    engine.setHandlers({
      onProgress: (utteranceId, range) => this.handleProgress(utteranceId, range),
      onFinish: (utteranceId) => this.handleFinish(utteranceId),
      onError: (utteranceId, error) => this.handleEngineError(utteranceId, error),
    });
  }

  /**
   * Loads an article, stopping whatever was playing, and restores saved
   * progress.
   */
  async load(article: Pick<Article, "id" | "title" | "content">): Promise<void> {
    const generation = ++this.loadGeneration;
    this.haltPlayback();

    const text = article.content.trim() ? article.content : article.title;
    this.log = createSessionLogger({ articleId: article.id, mode: "tts" });
    this.sentences = splitIntoSentences(text);
    this.totalWords = countWords(text);
    this.currentIndex = 0;
    this.tracker = this.options.progressStore
      ? new ProgressTracker(this.options.progressStore, article.id, "tts", this.log)
      : null;

    const settingsStore = this.options.settingsStore;
    if (settingsStore) {
      try {
        const settings = await settingsStore.getSettings();
        if (this.options.speedMultiplier === undefined) {
          this.speedMultiplier = clampSpeedMultiplier(settings.ttsSpeedMultiplier);
        }
        if (this.options.voiceId === undefined) {
          this.voiceId = settings.selectedVoiceId;
        }
      } catch (error) {
        this.log.warn("Failed to read narration settings", { error: errorMessage(error) });
      }
    }

    const savedWordIndex = this.tracker ? await this.tracker.load() : null;
    if (generation !== this.loadGeneration) {
      return;
    }

    if (savedWordIndex !== null && this.sentences.length > 0) {
      const sentenceIndex = wordToSentenceIndex(this.sentences, savedWordIndex);
      if (sentenceIndex < this.sentences.length) {
        this.currentIndex = sentenceIndex;
      }
    }

    this.log.debug("Loaded article for narration", {
      sentences: this.sentences.length,
      restoredSentence: this.currentIndex,
    });
    this.notifyStateChange();
  }

  /**
   * Starts narrating from the current sentence, or from the beginning when
   * there is nothing to resume. Arms the sleep timer if a duration is selected.
   */
  async start(): Promise<void> {
    if (this.sentences.length === 0) {
      return;
    }
    if (this.isPlaying && !this.isPaused) {
      return;
    }

    if (this.currentIndex < 1 || this.currentIndex >= this.sentences.length) {
      this.currentIndex = 0;
    }

    this.isPlaying = true;
    this.isPaused = false;
    this.spokenRange = null;
    this.sleepTimer.start();
    this.notifyStateChange();

    await this.speakCurrentSentence();
  }

  /**
   * Stops the engine mid-sentence and saves the position.
   */
  pause(): void {
    if (!this.isPlaying || this.isPaused) {
      return;
    }

    this.beginRestart();
    this.engine.stop();
    this.isPaused = true;
    this.spokenRange = null;
    this.sleepTimer.pause();
    this.scheduleSettle();
    this.notifyStateChange();

    void this.saveProgress();
  }

  /**
   * Speaks the current sentence again from its start.
   */
  async resume(): Promise<void> {
    if (!this.isPlaying || !this.isPaused) {
      return;
    }

    this.isPaused = false;
    this.sleepTimer.resume();
    this.notifyStateChange();

    await this.speakCurrentSentence();
  }

  /**
   * Stops narration and returns to the first sentence.
   */
  stop(): void {
    this.haltPlayback();
    this.currentIndex = 0;
    this.notifyStateChange();
  }

  /**
   * Changes the speed. While speaking, the current sentence restarts at the
   * new rate without advancing.
   */
  async setSpeed(multiplier: number): Promise<void> {
    this.speedMultiplier = clampSpeedMultiplier(multiplier);

    if (this.isPlaying && !this.isPaused) {
      await this.restartAt(this.currentIndex);
    } else {
      this.notifyStateChange();
    }
  }

  /**
   * Changes the voice. Takes effect from the next sentence spoken.
   */
  setVoice(voiceId: string | null): void {
    this.voiceId = voiceId;
    this.notifyStateChange();
  }

  /**
   * Moves to a sentence. Out-of-range indices are ignored.
   */
  async jumpToSentence(index: number): Promise<void> {
    if (!Number.isInteger(index) || index < 0 || index >= this.sentences.length) {
      return;
    }

    if (this.isPlaying && !this.isPaused) {
      await this.restartAt(index);
      return;
    }

    this.currentIndex = index;
    this.spokenRange = null;
    this.notifyStateChange();
  }

  /**
   * Chooses a sleep timer duration in minutes, or null to turn it off.
   * While speaking, the countdown starts right away.
   */
  selectSleepDuration(minutes: number | null): void {
    this.sleepTimer.select(minutes);
    if (minutes !== null && this.isPlaying && !this.isPaused) {
      this.sleepTimer.start();
    }
    this.notifyStateChange();
  }

  /**
   * Saves progress and stops speech and timers. Call when leaving the reader.
   */
  async unload(): Promise<void> {
    this.loadGeneration++;
    if (this.sentences.length > 0) {
      void this.saveProgress();
    }
    this.haltPlayback();
    this.notifyStateChange();
    await this.flush();
  }

  /**
   * Resolves once queued progress saves have finished.
   */
  async flush(): Promise<void> {
    await this.tracker?.flush();
  }

  /**
   * Rate handed to the engine for the current speed multiplier.
   */
  getEngineRate(): number {
    const { min, max, base } = this.engine.rateRange;
    return clamp(base * this.speedMultiplier, min, max);
  }

  getState(): NarrationState {
    const count = this.sentences.length;
    return {
      isPlaying: this.isPlaying,
      isPaused: this.isPaused,
      currentSentenceIndex: this.currentIndex,
      sentences: this.sentences,
      totalWords: this.totalWords,
      speedMultiplier: this.speedMultiplier,
      voiceId: this.voiceId,
      spokenRange: this.spokenRange,
      sleepTimer: this.sleepTimer.getState(),
      progress: count > 0 ? this.currentIndex / Math.max(count - 1, 1) : 0,
    };
  }

  /**
   * Registers a callback to be notified when the state changes.
   *
   * @returns A function to unsubscribe the callback
   */
  onStateChange(callback: StateChangeCallback): () => void {
    this.stateChangeListeners.add(callback);
    return () => {
      this.stateChangeListeners.delete(callback);
    };
  }

  /**
   * Stops the engine and restarts at a sentence with completions suppressed.
   */
  private async restartAt(index: number): Promise<void> {
    this.beginRestart();
    this.engine.stop();
    this.currentIndex = index;
    this.spokenRange = null;
    this.notifyStateChange();

    await this.speakCurrentSentence();
    this.scheduleSettle();
  }

  private beginRestart(): void {
    this.isRestarting = true;
    this.activeUtteranceId = null;
    this.cancelSettle();
  }

  private scheduleSettle(): void {
    this.cancelSettle();
    this.settleTimer = setTimeout(() => {
      this.settleTimer = null;
      this.isRestarting = false;
    }, RESTART_SETTLE_MS);
  }

  private cancelSettle(): void {
    if (this.settleTimer !== null) {
      clearTimeout(this.settleTimer);
      this.settleTimer = null;
    }
  }

  /**
   * Stops speech and timers without notifying. The index is kept.
   */
  private haltPlayback(): void {
    this.isPlaying = false;
    this.isPaused = false;
    this.spokenRange = null;
    this.cancelSettle();
    this.isRestarting = false;
    this.activeUtteranceId = null;
    this.sleepTimer.stop();
    this.engine.stop();
  }

  private async speakCurrentSentence(): Promise<void> {
    const sentence = this.sentences[this.currentIndex];
    if (sentence === undefined) {
      return;
    }

    const utteranceId = ++this.lastUtteranceId;
    this.activeUtteranceId = utteranceId;

    try {
      await this.engine.speak(sentence, {
        utteranceId,
        rate: this.getEngineRate(),
        voiceId: this.voiceId,
      });
    } catch (error) {
      this.handleSpeechFailure(error);
    }
  }

  /**
   * Auto-advances to the next sentence, or finishes after the last one.
   */
  private handleFinish(utteranceId: number): void {
    if (utteranceId !== this.activeUtteranceId) {
      if (this.isRestarting) {
        this.log.debug("Ignoring completion of a stopped sentence", {
          sentenceIndex: this.currentIndex,
          utteranceId,
        });
      }
      return;
    }
    if (!this.isPlaying || this.isPaused) {
      return;
    }

    this.spokenRange = null;
    if (this.currentIndex < this.sentences.length - 1) {
      this.currentIndex++;
      this.notifyStateChange();
      void this.speakCurrentSentence();
      return;
    }

    this.isPlaying = false;
    this.isPaused = false;
    this.activeUtteranceId = null;
    this.currentIndex = 0;
    this.sleepTimer.stop();
    this.log.info("Finished narrating article");
    this.notifyStateChange();
  }

  private handleProgress(utteranceId: number, range: SpokenRange): void {
    if (utteranceId !== this.activeUtteranceId || !this.isPlaying || this.isPaused) {
      return;
    }
    this.spokenRange = range;
    this.notifyStateChange();
  }

  private handleEngineError(utteranceId: number, error: Error): void {
    if (utteranceId !== this.activeUtteranceId) {
      this.log.debug("Ignoring error from a stopped sentence", {
        utteranceId,
        error: error.message,
      });
      return;
    }
    this.handleSpeechFailure(error);
  }

  private handleSpeechFailure(error: unknown): void {
    if (!this.isPlaying) {
      return;
    }

    this.log.error("Speech synthesis failed", {
      sentenceIndex: this.currentIndex,
      error: errorMessage(error),
    });
    this.isPlaying = false;
    this.isPaused = false;
    this.spokenRange = null;
    this.activeUtteranceId = null;
    this.sleepTimer.stop();
    this.notifyStateChange();
  }

  private handleSleepTimerExpired(): void {
    this.log.info("Sleep timer expired", { sentenceIndex: this.currentIndex });
    this.pause();
  }

  private saveProgress(): Promise<void> {
    if (!this.tracker) {
      return Promise.resolve();
    }
    return this.tracker.save(
      sentenceToWordIndex(this.sentences, this.currentIndex),
      this.totalWords
    );
  }

  /**
   * Notifies all registered listeners of a state change.
   */
  private notifyStateChange(): void {
    const state = this.getState();
    for (const callback of this.stateChangeListeners) {
      try {
        callback(state);
      } catch (error) {
        this.log.error("Error in narration state callback", { error: errorMessage(error) });
      }
    }
  }
}
