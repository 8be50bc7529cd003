import { format, isSameDay } from "date-fns";
import { EventHub } from "./events";
import type { Alarm, AlarmPrecision } from "./types";

export interface AlarmFiredEvent {
  alarmId: string;
  label: string;
  soundRef: string | null;
  firedAt: string;
}

export type AlarmEvents = {
  alarmFired: AlarmFiredEvent;
};

export interface AlarmMonitorOptions {
  alarms: () => readonly Alarm[];
  precision?: () => AlarmPrecision;
  pollMs?: number;
  now?: () => Date;
}

/** Longest gap between two readings that still counts as stepping over a window. */
const MAX_CATCH_UP_MS = 60_000;

const WINDOW_FORMAT: Record<AlarmPrecision, string> = {
  minute: "yyyy-MM-dd'T'HH:mm",
  second: "yyyy-MM-dd'T'HH:mm:ss"
};

/** The instant an alarm is due on the calendar day of `reference`. */
export function alarmInstant(alarm: Alarm, reference: Date, precision: AlarmPrecision) {
  const due = new Date(reference);
  const second = precision === "second" ? alarm.timeOfDay.second ?? 0 : 0;
  due.setHours(alarm.timeOfDay.hour, alarm.timeOfDay.minute, second, 0);
  return due;
}

export function windowKey(instant: Date, precision: AlarmPrecision) {
  return format(instant, WINDOW_FORMAT[precision]);
}

/**
 * Compares wall-clock readings against the enabled alarms. An alarm fires when a
 * reading lands in its minute/second window, or when the gap since the previous
 * reading stepped over that window. Each alarm fires at most once per window.
 */
export class AlarmMonitor {
  readonly events = new EventHub<AlarmEvents>();

  private _fired = new Map<string, string>();
  private _lastCheck: Date | null = null;
  private _timer: NodeJS.Timeout | null = null;

  private readonly alarms: () => readonly Alarm[];
  private readonly precision: () => AlarmPrecision;
  private readonly pollMs: number;
  private readonly now: () => Date;

  constructor(options: AlarmMonitorOptions) {
    this.alarms = options.alarms;
    this.precision = options.precision ?? (() => "second");
    this.pollMs = options.pollMs ?? 1000;
    this.now = options.now ?? (() => new Date());
  }

  get running(): boolean { return this._timer !== null; }

  checkAndFire(currentTime: Date, alarms: readonly Alarm[], precision: AlarmPrecision = this.precision()): string[] {
    const currentWindow = windowKey(currentTime, precision);
    const previous = this._lastCheck;
    const gap = previous ? currentTime.getTime() - previous.getTime() : 0;
    const catchUpFrom = previous && gap > 0 && gap <= MAX_CATCH_UP_MS ? previous : null;
    this._lastCheck = currentTime;

    // a gap that crosses midnight can step over a window on the previous day
    const days = catchUpFrom && !isSameDay(catchUpFrom, currentTime) ? [catchUpFrom, currentTime] : [currentTime];

    const fired: string[] = [];
    for (const alarm of alarms) {
      if (!alarm.enabled) continue;
      const dueWindow = days
        .map((day) => windowKey(alarmInstant(alarm, day, precision), precision))
        .find((window) => this._fired.get(alarm.id) !== window
          && (window === currentWindow || (catchUpFrom !== null && windowKey(catchUpFrom, precision) < window && window <= currentWindow)));
      if (dueWindow === undefined) continue;

      this._fired.set(alarm.id, dueWindow);
      fired.push(alarm.id);
      this.events.emit("alarmFired", {
        alarmId: alarm.id,
        label: alarm.label,
        soundRef: alarm.soundRef,
        firedAt: currentTime.toISOString()
      });
    }
    return fired;
  }

  /** Forget the fired marker so an edited alarm can fire again in the current window. */
  rearm(alarmId: string): void {
    this._fired.delete(alarmId);
  }

  start(): void {
    if (this._timer) return;
    this._timer = setInterval(() => this.poll(), this.pollMs);
  }

  stop(): void {
    if (this._timer) clearInterval(this._timer);
    this._timer = null;
  }

  poll(): string[] {
    return this.checkAndFire(this.now(), this.alarms());
  }

  dispose(): void {
    this.stop();
    this.events.clear();
  }
}
