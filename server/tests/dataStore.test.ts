import fs from "fs/promises";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createCollectionStore } from "../src/collectionStore";
import { createSettingsStore, createWriteQueue, defaultSettings } from "../src/dataStore";
import { NotFoundError, PersistenceError, ValidationError } from "../src/errors";
import { alarmSchema, taskSchema } from "../src/schemas";
import type { Alarm, Task } from "../src/types";
import { makeTempDir, removeDir } from "./helpers";

const task = (id: string, title = `Task ${id}`): Task => ({ id, title, estimatedPomodoros: 2, createdAt: "2026-01-01T00:00:00.000Z" });

describe("createWriteQueue", () => {
  it("runs actions one at a time in call order", async () => {
    const queueWrite = createWriteQueue();
    const log: string[] = [];
    const slow = (name: string, ms: number) => queueWrite(async () => {
      log.push(`${name}:start`);
      await new Promise((resolve) => setTimeout(resolve, ms));
      log.push(`${name}:end`);
      return name;
    });
    expect(await Promise.all([slow("a", 20), slow("b", 1)])).toEqual(["a", "b"]);
    expect(log).toEqual(["a:start", "a:end", "b:start", "b:end"]);
  });

  it("keeps going after a failed action", async () => {
    const queueWrite = createWriteQueue();
    const failed = queueWrite(async () => { throw new Error("boom"); });
    const next = queueWrite(async () => "ok");
    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });
});

describe("CollectionStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("persists inserts, updates and removals with a schema version", async () => {
    const store = createCollectionStore<Task>(dir, "tasks", taskSchema);
    await store.load();
    await store.insert(task("t_1"));
    await store.insert(task("t_2"));
    await store.update("t_1", (current) => ({ ...current, title: "Renamed" }));
    await store.remove("t_2");

    const file = JSON.parse(await fs.readFile(path.join(dir, "tasks.json"), "utf-8"));
    expect(file).toEqual({ schemaVersion: 1, items: [task("t_1", "Renamed")] });

    const reopened = createCollectionStore<Task>(dir, "tasks", taskSchema);
    expect(await reopened.load()).toEqual({ items: [task("t_1", "Renamed")], skipped: 0 });
  });

  it("round-trips alarms including optional seconds", async () => {
    const alarm: Alarm = {
      id: "a_1",
      label: "Stand up",
      timeOfDay: { hour: 14, minute: 5, second: 30 },
      soundRef: "chime.wav",
      enabled: false,
      repeat: "once",
      createdAt: "2026-01-01T00:00:00.000Z"
    };
    const store = createCollectionStore<Alarm>(dir, "alarms", alarmSchema);
    await store.load();
    await store.insert(alarm);
    const reopened = createCollectionStore<Alarm>(dir, "alarms", alarmSchema);
    expect((await reopened.load()).items).toEqual([alarm]);
  });

  it("serializes concurrent edits so none is lost", async () => {
    const store = createCollectionStore<Task>(dir, "tasks", taskSchema);
    await store.load();
    await Promise.all(Array.from({ length: 10 }, (_, index) => store.insert(task(`t_${index}`))));
    expect(store.list()).toHaveLength(10);
    const reopened = createCollectionStore<Task>(dir, "tasks", taskSchema);
    expect((await reopened.load()).items.map((item) => item.id)).toEqual(Array.from({ length: 10 }, (_, index) => `t_${index}`));
  });

  it("reports unknown ids as not found", async () => {
    const store = createCollectionStore<Task>(dir, "tasks", taskSchema);
    await store.load();
    await expect(store.remove("t_missing")).rejects.toBeInstanceOf(NotFoundError);
    await expect(store.update("t_missing", (current) => current)).rejects.toThrow("task t_missing not found");
  });

  it("skips malformed items on load", async () => {
    await fs.writeFile(path.join(dir, "tasks.json"), JSON.stringify({ schemaVersion: 1, items: [task("t_1"), { id: "t_2", title: "" }] }));
    const store = createCollectionStore<Task>(dir, "tasks", taskSchema);
    expect(await store.load()).toEqual({ items: [task("t_1")], skipped: 1 });
  });

  it("refuses a file it does not recognise", async () => {
    await fs.writeFile(path.join(dir, "tasks.json"), "[1, 2");
    await expect(createCollectionStore<Task>(dir, "tasks", taskSchema).load()).rejects.toBeInstanceOf(PersistenceError);
  });

  it("leaves the snapshot untouched when the write fails", async () => {
    const store = createCollectionStore<Task>(path.join(dir, "gone"), "tasks", taskSchema);
    await store.load();
    await expect(store.insert(task("t_1"))).rejects.toBeInstanceOf(PersistenceError);
    expect(store.list()).toEqual([]);
  });
});

describe("SettingsStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it("writes defaults on first load", async () => {
    const store = createSettingsStore(dir);
    expect(await store.load()).toEqual(defaultSettings);
    expect(JSON.parse(await fs.readFile(path.join(dir, "settings.json"), "utf-8"))).toEqual(defaultSettings);
  });

  it("fills in sections missing from older settings files", async () => {
    const { adaptive: _adaptive, alarmPrecision: _precision, alarmSound: _sound, ...legacy } = defaultSettings;
    await fs.writeFile(path.join(dir, "settings.json"), JSON.stringify({ ...legacy, focusMinutes: 50 }));
    expect(await createSettingsStore(dir).load()).toEqual({ ...defaultSettings, focusMinutes: 50 });
  });

  it("validates before saving", async () => {
    const store = createSettingsStore(dir);
    await store.load();
    await expect(store.save({ ...defaultSettings, longBreakInterval: 0 })).rejects.toBeInstanceOf(ValidationError);
    expect(store.current()).toEqual(defaultSettings);

    const saved = await store.save({ ...defaultSettings, alarmPrecision: "minute" });
    expect(store.current()).toEqual(saved);
    expect(saved.alarmPrecision).toBe("minute");
  });

  it("rejects inverted adaptive thresholds", async () => {
    const store = createSettingsStore(dir);
    const adaptive = { ...defaultSettings.adaptive, lowThreshold: 0.9, highThreshold: 0.5 };
    await expect(store.save({ ...defaultSettings, adaptive })).rejects.toMatchObject({
      issues: [{ path: "adaptive.lowThreshold", message: "lowThreshold must be below highThreshold" }]
    });
  });
});
