import type { AdaptiveSettings, Phase, SessionRecord, Settings } from "./types";

/** Breaks are never planned shorter than this, whatever the configured bounds say. */
export const BREAK_FLOOR_SECONDS = 60;

export type Trend = "lengthen" | "shorten" | "steady";

export function defaultDurationSeconds(phase: Phase, settings: Settings) {
  switch (phase) {
    case "focus": return settings.focusMinutes * 60;
    case "shortBreak": return settings.shortBreakMinutes * 60;
    case "longBreak": return settings.longBreakMinutes * 60;
  }
}

export function clampDuration(phase: Phase, seconds: number, adaptive: AdaptiveSettings) {
  const { minSeconds, maxSeconds } = adaptive.bounds[phase];
  const floor = phase === "focus" ? Math.max(1, minSeconds) : Math.max(BREAK_FLOOR_SECONDS, minSeconds);
  const ceiling = Math.max(floor, maxSeconds);
  return Math.round(Math.min(ceiling, Math.max(floor, seconds)));
}

/** Share of recent Focus attempts that ran to zero; null when there were none. */
export function consistencyRatio(history: readonly SessionRecord[]) {
  const attempts = history.filter((record) => record.phase === "focus");
  if (!attempts.length) return null;
  return attempts.filter((record) => record.completed).length / attempts.length;
}

export function consistencyTrend(ratio: number | null, adaptive: AdaptiveSettings): Trend {
  if (ratio === null) return "steady";
  if (ratio >= adaptive.highThreshold) return "lengthen";
  if (ratio <= adaptive.lowThreshold) return "shorten";
  return "steady";
}

/**
 * Picks the duration of the next phase. Adjustments always start from the configured
 * default, so a settings change takes effect on the next planned phase. Focus moves
 * with the consistency trend; breaks move the other way with their own, smaller step.
 */
export function planDuration(phase: Phase, history: readonly SessionRecord[], settings: Settings) {
  const { adaptive } = settings;
  const base = clampDuration(phase, defaultDurationSeconds(phase, settings), adaptive);
  if (!adaptive.enabled || !history.length) return base;

  const trend = consistencyTrend(consistencyRatio(history.slice(-adaptive.historySize)), adaptive);
  if (trend === "steady") return base;

  const step = phase === "focus" ? adaptive.focusStepSeconds : adaptive.breakStepSeconds;
  const direction = trend === "lengthen" ? 1 : -1;
  const signed = phase === "focus" ? direction * step : -direction * step;
  return clampDuration(phase, base + signed, adaptive);
}
