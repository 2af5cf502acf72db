/**
 * Application settings.
 *
 * One settings record per installation, created with defaults the first time
 * it is read. Both reading sessions read it to seed their speed; the settings
 * screen writes it. Last write wins.
 */

import { z } from "zod";

/**
 * Lowest and highest RSVP speeds in words per minute.
 */
export const MIN_RSVP_WPM = 50;
export const MAX_RSVP_WPM = 1500;

/**
 * Lowest and highest TTS speed multipliers.
 */
export const MIN_TTS_MULTIPLIER = 0.5;
export const MAX_TTS_MULTIPLIER = 4.0;

export type AppearanceMode = "system" | "light" | "dark";

export interface AppSettings {
  /** RSVP speed in words per minute */
  rsvpSpeedWpm: number;
  /** TTS rate multiplier applied to the engine's base rate */
  ttsSpeedMultiplier: number;
  /** Hex color of the RSVP focus letter */
  focusColor: string;
  /** Voice to narrate with; null means the engine's default */
  selectedVoiceId: string | null;
  appearanceMode: AppearanceMode;
}

export const DEFAULT_APP_SETTINGS: AppSettings = {
  rsvpSpeedWpm: 300,
  ttsSpeedMultiplier: 1.0,
  focusColor: "#FF3B30",
  selectedVoiceId: null,
  appearanceMode: "system",
};

/**
 * Each field falls back to its default independently, so one bad value
 * doesn't discard the rest of a stored record.
 */
const appSettingsSchema = z.object({
  rsvpSpeedWpm: z
    .number()
    .int()
    .min(MIN_RSVP_WPM)
    .max(MAX_RSVP_WPM)
    .catch(DEFAULT_APP_SETTINGS.rsvpSpeedWpm),
  ttsSpeedMultiplier: z
    .number()
    .min(MIN_TTS_MULTIPLIER)
    .max(MAX_TTS_MULTIPLIER)
    .catch(DEFAULT_APP_SETTINGS.ttsSpeedMultiplier),
  focusColor: z
    .string()
    .regex(/^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/)
    .catch(DEFAULT_APP_SETTINGS.focusColor),
  selectedVoiceId: z.string().min(1).nullable().catch(DEFAULT_APP_SETTINGS.selectedVoiceId),
  appearanceMode: z
    .enum(["system", "light", "dark"])
    .catch(DEFAULT_APP_SETTINGS.appearanceMode),
});

/**
 * Parses a stored settings value, replacing invalid or missing fields with defaults.
 *
 * @example
 * parseAppSettings({ rsvpSpeedWpm: 450, focusColor: "red" })
 * // => { ...DEFAULT_APP_SETTINGS, rsvpSpeedWpm: 450 }
 */
export function parseAppSettings(value: unknown): AppSettings {
  const record = typeof value === "object" && value !== null ? value : {};
  return appSettingsSchema.parse(record);
}

/**
 * Clamps an RSVP speed into the supported range.
 */
export function clampWpm(wpm: number): number {
  if (!Number.isFinite(wpm)) {
    return DEFAULT_APP_SETTINGS.rsvpSpeedWpm;
  }
  return Math.round(Math.max(MIN_RSVP_WPM, Math.min(MAX_RSVP_WPM, wpm)));
}

/**
 * Clamps a TTS speed multiplier into the supported range.
 */
export function clampSpeedMultiplier(multiplier: number): number {
  if (!Number.isFinite(multiplier)) {
    return DEFAULT_APP_SETTINGS.ttsSpeedMultiplier;
  }
  return Math.max(MIN_TTS_MULTIPLIER, Math.min(MAX_TTS_MULTIPLIER, multiplier));
}

/**
 * Where settings are read from and written to.
 */
export interface SettingsStore {
  /** Returns the settings, creating the default record on first access. */
  getSettings(): Promise<AppSettings>;
  /** Applies a partial update and returns the stored result. */
  updateSettings(patch: Partial<AppSettings>): Promise<AppSettings>;
}
