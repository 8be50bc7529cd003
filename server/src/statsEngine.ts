import { differenceInCalendarDays, format, startOfDay, subDays } from "date-fns";
import type { HeatmapDay, JournalEntryView, SessionRecord, Stats, StreakSummary, Task, TaskView } from "./types";

export const DELETED_TASK_LABEL = "task deleted";
export const HEATMAP_DAYS = 7;

const DAY_FORMAT = "yyyy-MM-dd";

export function isCompletedFocus(record: SessionRecord) {
  return record.phase === "focus" && record.completed;
}

export function recordDay(record: SessionRecord) {
  return startOfDay(new Date(record.timestamp.wallClock));
}

function toMinutes(seconds: number) {
  return Math.round(seconds / 60);
}

/** Distinct local calendar days holding at least one completed Focus record, oldest first. */
export function activeDays(records: readonly SessionRecord[]): Date[] {
  const stamps = new Set(records.filter(isCompletedFocus).map((record) => recordDay(record).getTime()));
  return [...stamps].sort((a, b) => a - b).map((stamp) => new Date(stamp));
}

/**
 * The current streak is the run of consecutive active days ending at the last active
 * day, as long as that day is today or yesterday. Today without a session yet does
 * not break the streak; a whole day without one does.
 */
export function computeStreaks(records: readonly SessionRecord[], today: Date = new Date()): StreakSummary {
  const days = activeDays(records);
  if (!days.length) return { currentStreak: 0, longestStreak: 0, lastActiveDate: null };

  let run = 1;
  let longest = 1;
  for (let i = 1; i < days.length; i++) {
    run = differenceInCalendarDays(days[i], days[i - 1]) === 1 ? run + 1 : 1;
    longest = Math.max(longest, run);
  }

  const last = days[days.length - 1];
  const sinceLast = differenceInCalendarDays(today, last);
  return {
    currentStreak: sinceLast <= 1 ? run : 0,
    longestStreak: longest,
    lastActiveDate: format(last, DAY_FORMAT)
  };
}

export function sevenDayHeatmap(records: readonly SessionRecord[], today: Date = new Date()): HeatmapDay[] {
  const totals = new Map<string, { sessions: number; seconds: number }>();
  for (const record of records.filter(isCompletedFocus)) {
    const key = format(recordDay(record), DAY_FORMAT);
    const entry = totals.get(key) ?? { sessions: 0, seconds: 0 };
    entry.sessions++;
    entry.seconds += record.actualDurationSeconds;
    totals.set(key, entry);
  }

  return Array.from({ length: HEATMAP_DAYS }).map((_, index) => {
    const date = format(startOfDay(subDays(today, HEATMAP_DAYS - 1 - index)), DAY_FORMAT);
    const entry = totals.get(date);
    return { date, sessions: entry?.sessions ?? 0, minutes: toMinutes(entry?.seconds ?? 0) };
  });
}

export function computeStats(records: readonly SessionRecord[], today: Date = new Date()): Stats {
  const focus = records.filter(isCompletedFocus);
  const todayKey = format(today, DAY_FORMAT);
  const todays = focus.filter((record) => format(recordDay(record), DAY_FORMAT) === todayKey);

  return {
    totalCompletedFocusSessions: focus.length,
    totalFocusMinutes: toMinutes(focus.reduce((sum, record) => sum + record.actualDurationSeconds, 0)),
    todayFocusSessions: todays.length,
    todayFocusMinutes: toMinutes(todays.reduce((sum, record) => sum + record.actualDurationSeconds, 0)),
    ...computeStreaks(records, today),
    sevenDayHeatmap: sevenDayHeatmap(records, today)
  };
}

export function completedPomodoros(taskId: string, records: readonly SessionRecord[]) {
  return records.filter((record) => isCompletedFocus(record) && record.taskId === taskId).length;
}

export function withProgress(tasks: readonly Task[], records: readonly SessionRecord[]): TaskView[] {
  return tasks.map((task) => {
    const done = completedPomodoros(task.id, records);
    return { ...task, completedPomodoros: done, done: done >= task.estimatedPomodoros };
  });
}

export function journalView(records: readonly SessionRecord[], tasks: readonly Task[]): JournalEntryView[] {
  const titles = new Map(tasks.map((task) => [task.id, task.title]));
  return records.map((record) => ({
    ...record,
    taskTitle: record.taskId ? titles.get(record.taskId) ?? DELETED_TASK_LABEL : null
  }));
}
