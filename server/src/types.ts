export type Phase = "focus" | "shortBreak" | "longBreak";

export const PHASES: readonly Phase[] = ["focus", "shortBreak", "longBreak"];

export type AlarmPrecision = "minute" | "second";

export type AlarmRepeat = "once" | "daily";

export interface PhaseBounds {
  minSeconds: number;
  maxSeconds: number;
}

export interface AdaptiveSettings {
  enabled: boolean;
  historySize: number;
  highThreshold: number;
  lowThreshold: number;
  focusStepSeconds: number;
  breakStepSeconds: number;
  bounds: Record<Phase, PhaseBounds>;
}

export interface Settings {
  focusMinutes: number;
  shortBreakMinutes: number;
  longBreakMinutes: number;
  longBreakInterval: number;
  autoStartBreaks: boolean;
  autoStartFocus: boolean;
  adaptive: AdaptiveSettings;
  alarmPrecision: AlarmPrecision;
  alarmSound: string | null;
}

/** Wall-clock start paired with a process-monotonic reading taken at the same instant. */
export interface SessionTimestamp {
  wallClock: string;
  monotonicMs: number;
}

export interface SessionRecord {
  id: string;
  phase: Phase;
  plannedDurationSeconds: number;
  actualDurationSeconds: number;
  completed: boolean;
  taskId: string | null;
  timestamp: SessionTimestamp;
  note: string | null;
}

export interface Task {
  id: string;
  title: string;
  estimatedPomodoros: number;
  createdAt: string;
}

export interface TaskView extends Task {
  completedPomodoros: number;
  done: boolean;
}

export interface TimeOfDay {
  hour: number;
  minute: number;
  second?: number;
}

export interface Alarm {
  id: string;
  label: string;
  timeOfDay: TimeOfDay;
  soundRef: string | null;
  enabled: boolean;
  repeat: AlarmRepeat;
  createdAt: string;
}

export type SessionState =
  | { status: "idle"; nextPhase: Phase; cycleCount: number }
  | { status: "running"; phase: Phase; remainingSeconds: number; plannedSeconds: number; taskId: string | null; cycleCount: number }
  | { status: "paused"; phase: Phase; remainingSeconds: number; plannedSeconds: number; taskId: string | null; cycleCount: number };

export interface HeatmapDay {
  date: string;
  sessions: number;
  minutes: number;
}

export interface StreakSummary {
  currentStreak: number;
  longestStreak: number;
  lastActiveDate: string | null;
}

export interface Stats extends StreakSummary {
  totalCompletedFocusSessions: number;
  totalFocusMinutes: number;
  todayFocusSessions: number;
  todayFocusMinutes: number;
  sevenDayHeatmap: HeatmapDay[];
}

export interface JournalEntryView extends SessionRecord {
  taskTitle: string | null;
}
