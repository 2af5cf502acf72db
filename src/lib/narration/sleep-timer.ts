/**
 * Sleep timer for narration.
 *
 * Counts down in whole seconds while running. Pausing keeps the remaining
 * time; the countdown restarts from a fresh second on resume.
 */

/**
 * Durations offered by the sleep timer menu, in minutes. null turns it off.
 */
export const SLEEP_TIMER_PRESETS: readonly (number | null)[] = [null, 5, 10, 15, 30, 45, 60];

const TICK_INTERVAL_MS = 1000;

export interface SleepTimerState {
  selectedMinutes: number | null;
  remainingSeconds: number;
  isRunning: boolean;
}

export interface SleepTimerCallbacks {
  /** Called when the countdown reaches zero */
  onExpire: () => void;
  /** Called after every second counted */
  onTick?: () => void;
}

export class SleepTimer {
  private selectedMinutes: number | null = null;
  private remainingSeconds = 0;
  private interval: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly callbacks: SleepTimerCallbacks) {}

  /**
   * Chooses a duration. Any running countdown is cancelled; choosing null also
   * clears the remaining time.
   */
  select(minutes: number | null): void {
    this.cancelCountdown();
    this.selectedMinutes = minutes !== null && minutes > 0 ? minutes : null;
    if (this.selectedMinutes === null) {
      this.remainingSeconds = 0;
    }
  }

  /**
   * Starts a full countdown of the selected duration. Does nothing when no
   * duration is selected.
   */
  start(): void {
    if (this.selectedMinutes === null) {
      return;
    }
    this.remainingSeconds = this.selectedMinutes * 60;
    this.startInterval();
  }

  pause(): void {
    this.cancelCountdown();
  }

  /**
   * Continues a paused countdown.
   */
  resume(): void {
    if (this.selectedMinutes === null || this.remainingSeconds <= 0 || this.interval !== null) {
      return;
    }
    this.startInterval();
  }

  /**
   * Cancels the countdown and clears the remaining time. The selection stays.
   */
  stop(): void {
    this.cancelCountdown();
    this.remainingSeconds = 0;
  }

  getState(): SleepTimerState {
    return {
      selectedMinutes: this.selectedMinutes,
      remainingSeconds: this.remainingSeconds,
      isRunning: this.interval !== null,
    };
  }

  private startInterval(): void {
    this.cancelCountdown();
    this.interval = setInterval(() => this.tick(), TICK_INTERVAL_MS);
  }

  private tick(): void {
    this.remainingSeconds = Math.max(0, this.remainingSeconds - 1);
    if (this.remainingSeconds > 0) {
      this.callbacks.onTick?.();
      return;
    }

    // One-shot: the selection is cleared when it fires
    this.cancelCountdown();
    this.selectedMinutes = null;
    this.callbacks.onExpire();
  }

  private cancelCountdown(): void {
    if (this.interval !== null) {
      clearInterval(this.interval);
      this.interval = null;
    }
  }
}
