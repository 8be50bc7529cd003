import { randomUUID } from "crypto";
import { endOfDay, isValid, parseISO } from "date-fns";
import { z } from "zod";
import { type AlarmEvents, AlarmMonitor } from "./alarmMonitor";
import { type CollectionStore, createCollectionStore } from "./collectionStore";
import { createSettingsStore, ensureDataDir, type SettingsStore } from "./dataStore";
import { describeError, PersistenceError, ValidationError } from "./errors";
import { EventHub } from "./events";
import { toCsv } from "./journalExport";
import { createJournalStore, type JournalStore } from "./journalStore";
import {
  alarmPayloadSchema,
  alarmSchema,
  alarmUpdateSchema,
  notePayloadSchema,
  startPayloadSchema,
  taskPayloadSchema,
  taskSchema,
  taskUpdateSchema
} from "./schemas";
import { type SessionEvents, SessionMachine } from "./sessionMachine";
import { computeStats, computeStreaks, journalView, sevenDayHeatmap, withProgress } from "./statsEngine";
import type { Alarm, HeatmapDay, JournalEntryView, Phase, SessionRecord, SessionState, Settings, Stats, StreakSummary, Task, TaskView } from "./types";

export type FocusClockEvents = SessionEvents & AlarmEvents;

export interface FocusClockStores {
  settings: SettingsStore;
  journal: JournalStore;
  tasks: CollectionStore<Task>;
  alarms: CollectionStore<Alarm>;
}

export interface FocusClockOptions {
  tickMs?: number;
  alarmPollMs?: number;
  now?: () => Date;
}

export interface JournalQuery {
  from?: string;
  to?: string;
  phase?: Phase;
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

/** Full timestamps are taken as given; a bare date covers that whole local day. */
function rangeBound(value: string | undefined, edge: "from" | "to") {
  if (!value) return null;
  const parsed = parseISO(value);
  if (!isValid(parsed)) throw new ValidationError("from/to must be ISO dates", [{ path: edge, message: `${value} is not an ISO date` }]);
  return (edge === "to" && DATE_ONLY.test(value) ? endOfDay(parsed) : parsed).getTime();
}

function parseOrThrow<S extends z.ZodTypeAny>(subject: string, schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) throw ValidationError.fromZod(subject, result.error);
  return result.data;
}

/**
 * Owns one session machine and one alarm monitor over a data directory.
 * Collaborators hold a reference to this instance and subscribe to `events`.
 */
export class FocusClock {
  readonly events = new EventHub<FocusClockEvents>();
  readonly machine: SessionMachine;
  readonly monitor: AlarmMonitor;

  private readonly now: () => Date;
  private readonly _sideWrites = new Set<Promise<void>>();

  constructor(readonly stores: FocusClockStores, history: readonly SessionRecord[], options: FocusClockOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.machine = new SessionMachine({
      journal: stores.journal,
      settings: () => stores.settings.current(),
      history,
      tickMs: options.tickMs,
      now: this.now
    });
    this.monitor = new AlarmMonitor({
      alarms: () => stores.alarms.list(),
      precision: () => stores.settings.current().alarmPrecision,
      pollMs: options.alarmPollMs,
      now: this.now
    });

    this.machine.events.on("state", (state) => this.events.emit("state", state));
    this.machine.events.on("phaseCompleted", (event) => this.events.emit("phaseCompleted", event));
    this.machine.events.on("warning", (warning) => {
      console.warn(`Journal append failed for ${warning.record.phase} started ${warning.record.timestamp.wallClock}: ${describeError(warning.error.cause ?? warning.error)}`);
      this.events.emit("warning", warning);
    });
    this.monitor.events.on("alarmFired", (event) => {
      this.events.emit("alarmFired", event);
      const alarm = stores.alarms.get(event.alarmId);
      if (alarm?.repeat === "once") {
        const disable: Promise<void> = stores.alarms.update(alarm.id, (current) => ({ ...current, enabled: false }))
          .then(
            () => undefined,
            (error: unknown) => console.warn(`Could not disable one-shot alarm ${alarm.id}: ${describeError(error)}`)
          )
          .finally(() => this._sideWrites.delete(disable));
        this._sideWrites.add(disable);
      }
    });
  }

  // Session commands

  state(): SessionState {
    return this.machine.state();
  }

  start(input: unknown = {}): SessionState {
    const payload = parseOrThrow("start", startPayloadSchema, input);
    if (payload.taskId && !this.stores.tasks.get(payload.taskId)) {
      throw new ValidationError("Unknown task", [{ path: "taskId", message: `task ${payload.taskId} does not exist` }]);
    }
    return this.machine.start(payload.phase, { taskId: payload.taskId, note: payload.note });
  }

  pause() { return this.machine.pause(); }
  resume() { return this.machine.resume(); }
  skip() { return this.machine.skip(); }
  reset() { return this.machine.reset(); }

  annotate(input: unknown) {
    this.machine.annotate(parseOrThrow("note", notePayloadSchema, input).note);
    return this.state();
  }

  // Stats, recomputed from the journal on every query

  private async records() {
    return (await this.stores.journal.loadAll()).records;
  }

  async getStats(): Promise<Stats> {
    return computeStats(await this.records(), this.now());
  }

  async getHeatmap(): Promise<HeatmapDay[]> {
    return sevenDayHeatmap(await this.records(), this.now());
  }

  async getStreak(): Promise<StreakSummary> {
    return computeStreaks(await this.records(), this.now());
  }

  async journal(query: JournalQuery = {}): Promise<JournalEntryView[]> {
    const from = rangeBound(query.from, "from");
    const to = rangeBound(query.to, "to");
    const records = (await this.records()).filter((record) => {
      const start = Date.parse(record.timestamp.wallClock);
      if (from !== null && start < from) return false;
      if (to !== null && start > to) return false;
      return !query.phase || record.phase === query.phase;
    });
    return journalView(records, this.stores.tasks.list());
  }

  async exportCsv(): Promise<string> {
    return toCsv(await this.journal());
  }

  // Tasks

  async listTasks(): Promise<TaskView[]> {
    return withProgress(this.stores.tasks.list(), await this.records());
  }

  async createTask(input: unknown): Promise<Task> {
    const payload = parseOrThrow("task", taskPayloadSchema, input);
    const task = taskSchema.parse({ id: `t_${randomUUID()}`, ...payload, createdAt: this.now().toISOString() });
    return this.stores.tasks.insert(task);
  }

  async updateTask(id: string, input: unknown): Promise<Task> {
    const change = parseOrThrow("task", taskUpdateSchema, input);
    return this.stores.tasks.update(id, (current) => ({ ...current, ...change }));
  }

  /** Journal records keep the id; they resolve to "task deleted" from then on. */
  async deleteTask(id: string): Promise<Task> {
    return this.stores.tasks.remove(id);
  }

  // Alarms

  listAlarms(): readonly Alarm[] {
    return this.stores.alarms.list();
  }

  async createAlarm(input: unknown): Promise<Alarm> {
    const payload = parseOrThrow("alarm", alarmPayloadSchema, input);
    const alarm = alarmSchema.parse({
      id: `a_${randomUUID()}`,
      ...payload,
      soundRef: payload.soundRef ?? this.stores.settings.current().alarmSound,
      createdAt: this.now().toISOString()
    });
    return this.stores.alarms.insert(alarm);
  }

  async updateAlarm(id: string, input: unknown): Promise<Alarm> {
    const change = parseOrThrow("alarm", alarmUpdateSchema, input);
    const updated = await this.stores.alarms.update(id, (current) => ({ ...current, ...change }));
    if (change.timeOfDay || change.enabled) this.monitor.rearm(id);
    return updated;
  }

  async deleteAlarm(id: string): Promise<Alarm> {
    const removed = await this.stores.alarms.remove(id);
    this.monitor.rearm(id);
    return removed;
  }

  // Settings

  getSettings(): Settings {
    return this.stores.settings.current();
  }

  saveSettings(input: unknown): Promise<Settings> {
    return this.stores.settings.save(input);
  }

  // Lifecycle

  startBackground(): void {
    this.monitor.start();
  }

  async close(): Promise<void> {
    this.monitor.dispose();
    this.machine.dispose();
    await Promise.all([this.machine.flush(), ...this._sideWrites]);
    this.events.clear();
  }
}

export async function openFocusClock(dataDir: string, options: FocusClockOptions = {}): Promise<FocusClock> {
  await ensureDataDir(dataDir);
  const stores: FocusClockStores = {
    settings: createSettingsStore(dataDir),
    journal: createJournalStore(dataDir),
    tasks: createCollectionStore<Task>(dataDir, "tasks", taskSchema),
    alarms: createCollectionStore<Alarm>(dataDir, "alarms", alarmSchema)
  };
  await stores.settings.load();
  await stores.tasks.load();
  await stores.alarms.load();

  let history: SessionRecord[] = [];
  try {
    history = (await stores.journal.loadAll()).records;
  } catch (error) {
    if (!(error instanceof PersistenceError)) throw error;
    console.warn(`Starting without session history: ${error.message}`);
  }
  return new FocusClock(stores, history, options);
}
