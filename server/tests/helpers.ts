import fs from "fs/promises";
import os from "os";
import path from "path";
import { defaultSettings } from "../src/dataStore";
import type { Phase, SessionRecord, Settings } from "../src/types";

let counter = 0;

export function makeRecord(overrides: Partial<SessionRecord> & { startedAt?: Date } = {}): SessionRecord {
  const { startedAt, ...rest } = overrides;
  counter++;
  const phase: Phase = rest.phase ?? "focus";
  const planned = rest.plannedDurationSeconds ?? 1500;
  return {
    id: `s_test_${counter}`,
    phase,
    plannedDurationSeconds: planned,
    actualDurationSeconds: planned,
    completed: true,
    taskId: null,
    timestamp: { wallClock: (startedAt ?? new Date(2026, 0, 5, 9, 0, 0)).toISOString(), monotonicMs: counter * 1000 },
    note: null,
    ...rest
  };
}

export function focusRuns(pattern: boolean[], plannedDurationSeconds = 1500): SessionRecord[] {
  return pattern.map((completed) => makeRecord({
    phase: "focus",
    completed,
    plannedDurationSeconds,
    actualDurationSeconds: completed ? plannedDurationSeconds : 60
  }));
}

export function testSettings(overrides: Partial<Settings> = {}): Settings {
  return { ...defaultSettings, ...overrides };
}

export async function makeTempDir() {
  return fs.mkdtemp(path.join(os.tmpdir(), "focusclock-"));
}

export async function removeDir(dir: string) {
  await fs.rm(dir, { recursive: true, force: true });
}
