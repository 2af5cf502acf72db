/**
 * Unit tests for settings parsing and clamping.
 */

import { describe, it, expect } from "vitest";
import {
  clampSpeedMultiplier,
  clampWpm,
  DEFAULT_APP_SETTINGS,
  parseAppSettings,
} from "../../src/lib/settings/app-settings";

describe("parseAppSettings", () => {
  it("returns defaults for a missing record", () => {
    expect(parseAppSettings(undefined)).toEqual(DEFAULT_APP_SETTINGS);
    expect(parseAppSettings(null)).toEqual(DEFAULT_APP_SETTINGS);
  });

  it("keeps valid fields and replaces invalid ones individually", () => {
    expect(parseAppSettings({ rsvpSpeedWpm: 450, focusColor: "red" })).toEqual({
      ...DEFAULT_APP_SETTINGS,
      rsvpSpeedWpm: 450,
    });
  });

  it("rejects speeds outside the supported range", () => {
    expect(parseAppSettings({ rsvpSpeedWpm: 5000 }).rsvpSpeedWpm).toBe(300);
    expect(parseAppSettings({ ttsSpeedMultiplier: 0.1 }).ttsSpeedMultiplier).toBe(1.0);
  });

  it("accepts a selected voice and appearance", () => {
    const settings = parseAppSettings({ selectedVoiceId: "voice-1", appearanceMode: "dark" });
    expect(settings.selectedVoiceId).toBe("voice-1");
    expect(settings.appearanceMode).toBe("dark");
  });

  it("drops unknown fields", () => {
    expect(parseAppSettings({ id: 1, extra: true })).toEqual(DEFAULT_APP_SETTINGS);
  });
});

describe("clamping", () => {
  it("clamps wpm", () => {
    expect(clampWpm(10)).toBe(50);
    expect(clampWpm(2000)).toBe(1500);
    expect(clampWpm(333.4)).toBe(333);
    expect(clampWpm(Number.NaN)).toBe(300);
  });

  it("clamps the speed multiplier", () => {
    expect(clampSpeedMultiplier(0.1)).toBe(0.5);
    expect(clampSpeedMultiplier(9)).toBe(4);
    expect(clampSpeedMultiplier(1.5)).toBe(1.5);
  });
});
