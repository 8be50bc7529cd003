import { format } from "date-fns";
import type { JournalEntryView } from "./types";

export const CSV_HEADER = ["date", "start_time", "duration_min", "type", "task", "completed", "notes"];

function csvField(value: string) {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, "\"\"")}"` : value;
}

export function toCsv(entries: readonly JournalEntryView[]) {
  const rows = entries.map((entry) => {
    const started = new Date(entry.timestamp.wallClock);
    return [
      format(started, "yyyy-MM-dd"),
      format(started, "HH:mm:ss"),
      String(Number((entry.actualDurationSeconds / 60).toFixed(2))),
      entry.phase,
      entry.taskTitle ?? "",
      String(entry.completed),
      entry.note ?? ""
    ];
  });
  return [CSV_HEADER, ...rows].map((row) => row.map(csvField).join(",")).join("\n") + "\n";
}
