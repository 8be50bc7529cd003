import { randomUUID } from "crypto";
import { PersistenceError, StateError } from "./errors";
import { EventHub } from "./events";
import { planDuration } from "./planner";
import type { Phase, SessionRecord, SessionState, SessionTimestamp, Settings } from "./types";

const HISTORY_CAP = 100;

export interface SessionJournal {
  append(record: SessionRecord): Promise<void>;
}

export interface PhaseCompletedEvent {
  phase: Phase;
  record: SessionRecord;
}

export interface PersistenceWarning {
  error: PersistenceError;
  record: SessionRecord;
}

export type SessionEvents = {
  state: SessionState;
  phaseCompleted: PhaseCompletedEvent;
  warning: PersistenceWarning;
};

export interface StartOptions {
  taskId?: string | null;
  note?: string | null;
}

export interface SessionMachineOptions {
  journal: SessionJournal;
  settings: () => Settings;
  history?: readonly SessionRecord[];
  tickMs?: number;
  now?: () => Date;
  monotonic?: () => number;
  createId?: () => string;
}

interface ActivePhase {
  phase: Phase;
  plannedSeconds: number;
  remainingSeconds: number;
  startedAt: SessionTimestamp;
  note: string | null;
  paused: boolean;
}

export class SessionMachine {
  readonly events = new EventHub<SessionEvents>();

  private _active: ActivePhase | null = null;
  private _nextPhase: Phase = "focus";
  private _cycleCount = 0;
  private _taskId: string | null = null;
  private _timer: NodeJS.Timeout | null = null;
  private _history: SessionRecord[];
  private _pending: Promise<void> = Promise.resolve();

  private readonly journal: SessionJournal;
  private readonly settings: () => Settings;
  private readonly tickMs: number;
  private readonly now: () => Date;
  private readonly monotonic: () => number;
  private readonly createId: () => string;

  constructor(options: SessionMachineOptions) {
    this.journal = options.journal;
    this.settings = options.settings;
    this.tickMs = options.tickMs ?? 1000;
    this.now = options.now ?? (() => new Date());
    this.monotonic = options.monotonic ?? (() => performance.now());
    this.createId = options.createId ?? (() => `s_${randomUUID()}`);
    this._history = (options.history ?? []).slice(-HISTORY_CAP);
  }

  state(): SessionState {
    const active = this._active;
    if (!active) return { status: "idle", nextPhase: this._nextPhase, cycleCount: this._cycleCount };
    return {
      status: active.paused ? "paused" : "running",
      phase: active.phase,
      remainingSeconds: active.remainingSeconds,
      plannedSeconds: active.plannedSeconds,
      taskId: active.phase === "focus" ? this._taskId : null,
      cycleCount: this._cycleCount
    };
  }

  get history(): readonly SessionRecord[] { return this._history; }

  start(phase?: Phase, options: StartOptions = {}): SessionState {
    if (this._active) {
      throw new StateError(`Cannot start while ${this._active.paused ? "paused" : "running"}; reset or skip first`);
    }
    if (options.taskId !== undefined) this._taskId = options.taskId;
    this._begin(phase ?? this._nextPhase, options.note ?? null);
    return this.state();
  }

  pause(): SessionState {
    const active = this._active;
    if (!active) throw new StateError("Cannot pause while idle");
    if (active.paused) throw new StateError("Session is already paused");
    this._stopTicking();
    active.paused = true;
    this._publishState();
    return this.state();
  }

  resume(): SessionState {
    const active = this._active;
    if (!active) throw new StateError("Cannot resume while idle");
    if (!active.paused) throw new StateError("Session is not paused");
    active.paused = false;
    this._startTicking();
    this._publishState();
    return this.state();
  }

  /** Abandons the current phase and moves the sequence on as if it had finished. */
  skip(): SessionRecord {
    const active = this._requireActive("skip");
    const record = this._close(active, false);
    this._advance(active.phase);
    this._publishState();
    return record;
  }

  /** Abandons the current phase; the next start repeats the same phase. */
  reset(): SessionRecord {
    const active = this._requireActive("reset");
    const record = this._close(active, false);
    this._nextPhase = active.phase;
    this._publishState();
    return record;
  }

  annotate(note: string | null): void {
    this._requireActive("annotate").note = note;
  }

  /** One countdown step. Ticks run to completion before the next command or tick is handled. */
  tick(): void {
    const active = this._active;
    if (!active || active.paused) return;
    active.remainingSeconds = Math.max(0, active.remainingSeconds - 1);
    if (active.remainingSeconds > 0) {
      this._publishState();
      return;
    }

    const record = this._close(active, true);
    this._advance(active.phase);
    this.events.emit("phaseCompleted", { phase: active.phase, record });

    const settings = this.settings();
    const autoStart = this._nextPhase === "focus" ? settings.autoStartFocus : settings.autoStartBreaks;
    if (autoStart) this._begin(this._nextPhase, null);
    else this._publishState();
  }

  /** Resolves once every journal append issued so far has settled. */
  flush(): Promise<void> {
    return this._pending;
  }

  dispose(): void {
    this._stopTicking();
    this.events.clear();
  }

  private _requireActive(action: string) {
    if (!this._active) throw new StateError(`Cannot ${action} while idle`);
    return this._active;
  }

  private _begin(phase: Phase, note: string | null) {
    const plannedSeconds = planDuration(phase, this._history, this.settings());
    this._active = {
      phase,
      plannedSeconds,
      remainingSeconds: plannedSeconds,
      startedAt: { wallClock: this.now().toISOString(), monotonicMs: this.monotonic() },
      note,
      paused: false
    };
    this._startTicking();
    this._publishState();
  }

  private _close(active: ActivePhase, completed: boolean): SessionRecord {
    this._stopTicking();
    this._active = null;
    const record: SessionRecord = Object.freeze({
      id: this.createId(),
      phase: active.phase,
      plannedDurationSeconds: active.plannedSeconds,
      actualDurationSeconds: completed ? active.plannedSeconds : active.plannedSeconds - active.remainingSeconds,
      completed,
      taskId: active.phase === "focus" ? this._taskId : null,
      timestamp: Object.freeze({ ...active.startedAt }),
      note: active.note
    });
    this._history.push(record);
    if (this._history.length > HISTORY_CAP) this._history = this._history.slice(-HISTORY_CAP);
    this._persist(record);
    return record;
  }

  private _advance(finished: Phase) {
    if (finished === "focus") {
      this._cycleCount++;
      this._nextPhase = this._cycleCount % this.settings().longBreakInterval === 0 ? "longBreak" : "shortBreak";
      return;
    }
    if (finished === "longBreak") this._cycleCount = 0;
    this._nextPhase = "focus";
  }

  private _persist(record: SessionRecord) {
    this._pending = this._pending
      .then(() => this.journal.append(record))
      .catch((cause: unknown) => {
        const error = cause instanceof PersistenceError
          ? cause
          : new PersistenceError("Journal append failed", "journal", cause);
        this.events.emit("warning", { error, record });
      });
  }

  private _startTicking() {
    this._stopTicking();
    this._timer = setInterval(() => this.tick(), this.tickMs);
  }

  private _stopTicking() {
    if (this._timer) clearInterval(this._timer);
    this._timer = null;
  }

  private _publishState() {
    this.events.emit("state", this.state());
  }
}
