/**
 * Unit tests for the narration sleep timer.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { SleepTimer, SLEEP_TIMER_PRESETS } from "../../src/lib/narration/sleep-timer";

describe("SleepTimer", () => {
  let onExpire: ReturnType<typeof vi.fn>;
  let timer: SleepTimer;

  beforeEach(() => {
    vi.useFakeTimers();
    onExpire = vi.fn();
    timer = new SleepTimer({ onExpire });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("offers off plus the preset durations", () => {
    expect(SLEEP_TIMER_PRESETS).toEqual([null, 5, 10, 15, 30, 45, 60]);
  });

  it("does nothing when started without a selection", () => {
    timer.start();
    expect(timer.getState()).toEqual({ selectedMinutes: null, remainingSeconds: 0, isRunning: false });
  });

  it("fires once and clears the selection", () => {
    timer.select(5);
    timer.start();

    vi.advanceTimersByTime(299_000);
    expect(onExpire).not.toHaveBeenCalled();
    expect(timer.getState().remainingSeconds).toBe(1);

    vi.advanceTimersByTime(1000);
    expect(onExpire).toHaveBeenCalledTimes(1);
    expect(timer.getState()).toEqual({ selectedMinutes: null, remainingSeconds: 0, isRunning: false });

    vi.advanceTimersByTime(600_000);
    expect(onExpire).toHaveBeenCalledTimes(1);
  });

  it("keeps the remaining time across a pause", () => {
    timer.select(5);
    timer.start();
    vi.advanceTimersByTime(20_000);
    timer.pause();
    vi.advanceTimersByTime(60_000);

    expect(timer.getState()).toEqual({ selectedMinutes: 5, remainingSeconds: 280, isRunning: false });

    timer.resume();
    vi.advanceTimersByTime(280_000);
    expect(onExpire).toHaveBeenCalledTimes(1);
  });

  it("restarts the full duration on start", () => {
    timer.select(5);
    timer.start();
    vi.advanceTimersByTime(100_000);
    timer.start();
    expect(timer.getState().remainingSeconds).toBe(300);
  });

  it("does not resume after stop", () => {
    timer.select(5);
    timer.start();
    timer.stop();
    timer.resume();
    expect(timer.getState()).toEqual({ selectedMinutes: 5, remainingSeconds: 0, isRunning: false });
  });
});
