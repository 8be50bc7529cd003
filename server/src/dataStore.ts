import fs from "fs/promises";
import path from "path";
import { PersistenceError, ValidationError } from "./errors";
import { defaultAdaptiveSettings, settingsSchema } from "./schemas";
import type { Settings } from "./types";

export const defaultSettings: Settings = {
  focusMinutes: 25,
  shortBreakMinutes: 5,
  longBreakMinutes: 15,
  longBreakInterval: 4,
  autoStartBreaks: true,
  autoStartFocus: true,
  adaptive: defaultAdaptiveSettings,
  alarmPrecision: "second",
  alarmSound: null
};

export type WriteQueue = <T>(action: () => Promise<T>) => Promise<T>;

/**
 * Serializes writes against one collection. A failed action rejects its own caller
 * but never blocks the actions queued behind it.
 */
export function createWriteQueue(): WriteQueue {
  let tail: Promise<unknown> = Promise.resolve();
  return <T>(action: () => Promise<T>) => {
    const run = tail.then(action, action);
    tail = run.catch(() => undefined);
    return run;
  };
}

export async function ensureDataDir(dataDir: string) {
  try {
    await fs.mkdir(dataDir, { recursive: true });
  } catch (error) {
    throw new PersistenceError(`Cannot create data directory ${dataDir}`, dataDir, error);
  }
}

function isMissingFile(error: unknown) {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/** Reads a file as text, or returns null when it does not exist yet. */
export async function readTextFile(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw new PersistenceError(`Cannot read ${path.basename(filePath)}`, filePath, error);
  }
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await readTextFile(filePath);
  if (raw === null) return undefined;
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new PersistenceError(`${path.basename(filePath)} is not valid JSON`, filePath, error);
  }
}

export async function writeJsonAtomic(filePath: string, data: unknown) {
  const tempPath = `${filePath}.tmp`;
  try {
    await fs.writeFile(tempPath, JSON.stringify(data, null, 2), "utf-8");
    await fs.rename(tempPath, filePath);
  } catch (error) {
    throw new PersistenceError(`Cannot write ${path.basename(filePath)}`, filePath, error);
  }
}

export interface SettingsStore {
  load(): Promise<Settings>;
  current(): Settings;
  save(input: unknown): Promise<Settings>;
}

export function createSettingsStore(dataDir: string): SettingsStore {
  const settingsPath = path.join(dataDir, "settings.json");
  const queueWrite = createWriteQueue();
  let snapshot: Settings = defaultSettings;

  return {
    async load() {
      const raw = await readJsonFile(settingsPath);
      if (raw === undefined) {
        snapshot = defaultSettings;
        await queueWrite(() => writeJsonAtomic(settingsPath, snapshot));
        return snapshot;
      }
      const parsed = settingsSchema.safeParse(raw);
      if (!parsed.success) {
        console.warn(`settings.json is invalid, falling back to defaults: ${parsed.error.issues[0]?.message ?? "unknown issue"}`);
        snapshot = defaultSettings;
        return snapshot;
      }
      snapshot = parsed.data;
      return snapshot;
    },
    current: () => snapshot,
    async save(input) {
      const parsed = settingsSchema.safeParse(input);
      if (!parsed.success) throw ValidationError.fromZod("settings", parsed.error);
      await queueWrite(() => writeJsonAtomic(settingsPath, parsed.data));
      snapshot = parsed.data;
      return snapshot;
    }
  };
}
