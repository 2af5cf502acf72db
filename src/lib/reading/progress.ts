/**
 * Reading progress persistence for a single (article, mode) session.
 *
 * Saves are queued so they reach the store in order, and failures are logged
 * rather than thrown: a failed save never affects the session's in-memory state.
 */

import { errorMessage, type Logger } from "@/lib/logger";
import type { ReadingMode, ReadingProgress } from "@/lib/types/article";

/**
 * Where progress records are read from and written to.
 * One record per (articleId, mode); upserts replace it.
 */
export interface ProgressStore {
  getProgress(articleId: string, mode: ReadingMode): Promise<ReadingProgress | null>;
  upsertProgress(progress: ReadingProgress): Promise<void>;
}

export class ProgressTracker {
  private hasRecord = false;
  private queue: Promise<void> = Promise.resolve();

  constructor(
    private readonly store: ProgressStore,
    readonly articleId: string,
    readonly mode: ReadingMode,
    private readonly log: Logger
  ) {}

  /**
   * Loads the saved word index.
   *
   * @returns The saved index, or null when there is no record or it can't be read
   */
  async load(): Promise<number | null> {
    try {
      const progress = await this.store.getProgress(this.articleId, this.mode);
      if (!progress) {
        return null;
      }
      this.hasRecord = true;
      return Math.max(0, Math.floor(progress.currentWordIndex));
    } catch (error) {
      this.log.warn("Failed to load reading progress", { error: errorMessage(error) });
      return null;
    }
  }

  /**
   * Queues an upsert of the current position.
   *
   * A session that never left word 0 and has no record yet is not saved, so
   * opening an article and closing it again doesn't create progress.
   * The returned promise never rejects.
   */
  save(currentWordIndex: number, totalWords: number): Promise<void> {
    const progress: ReadingProgress = {
      articleId: this.articleId,
      currentWordIndex,
      totalWords,
      mode: this.mode,
    };

    this.queue = this.queue.then(() => this.write(progress));
    return this.queue;
  }

  /**
   * Resolves once every queued save has finished.
   */
  flush(): Promise<void> {
    return this.queue;
  }

  private async write(progress: ReadingProgress): Promise<void> {
    if (!this.hasRecord && progress.currentWordIndex === 0) {
      return;
    }

    try {
      await this.store.upsertProgress(progress);
      this.hasRecord = true;
      this.log.debug("Saved reading progress", {
        currentWordIndex: progress.currentWordIndex,
        totalWords: progress.totalWords,
      });
    } catch (error) {
      this.log.error("Failed to save reading progress", {
        currentWordIndex: progress.currentWordIndex,
        error: errorMessage(error),
      });
    }
  }
}
