import { describe, expect, it } from "vitest";
import { toCsv } from "../src/journalExport";
import type { JournalEntryView } from "../src/types";
import { makeRecord } from "./helpers";

describe("toCsv", () => {
  it("writes only the header for an empty journal", () => {
    expect(toCsv([])).toBe("date,start_time,duration_min,type,task,completed,notes\n");
  });

  it("renders one row per record and quotes awkward fields", () => {
    const entries: JournalEntryView[] = [
      { ...makeRecord({ startedAt: new Date(2026, 2, 9, 8, 5, 7), taskId: "t_1", note: "outline, then \"intro\"" }), taskTitle: "Essay" },
      {
        ...makeRecord({ startedAt: new Date(2026, 2, 9, 8, 30, 0), phase: "shortBreak", plannedDurationSeconds: 300, actualDurationSeconds: 90, completed: false }),
        taskTitle: null
      }
    ];
    expect(toCsv(entries).split("\n")).toEqual([
      "date,start_time,duration_min,type,task,completed,notes",
      "2026-03-09,08:05:07,25,focus,Essay,true,\"outline, then \"\"intro\"\"\"",
      "2026-03-09,08:30:00,1.5,shortBreak,,false,",
      ""
    ]);
  });
});
