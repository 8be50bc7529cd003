type Listener<T> = (payload: T) => void;

type ListenerTable<Events> = { [K in keyof Events]?: Set<Listener<Events[K]>> };

/** Typed publish path: each subscriber sees each emitted event once, in subscription order. */
export class EventHub<Events extends Record<string, unknown>> {
  private _listeners: ListenerTable<Events> = {};

  on<K extends keyof Events>(event: K, fn: Listener<Events[K]>): () => void {
    const set = this._listeners[event] ?? new Set<Listener<Events[K]>>();
    set.add(fn);
    this._listeners[event] = set;
    return () => this.off(event, fn);
  }

  off<K extends keyof Events>(event: K, fn: Listener<Events[K]>): void {
    this._listeners[event]?.delete(fn);
  }

  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const set = this._listeners[event];
    if (!set) return;
    for (const fn of [...set]) {
      try {
        fn(payload);
      } catch (error) {
        console.error(`Listener for "${String(event)}" threw`, error);
      }
    }
  }

  listenerCount(event: keyof Events): number {
    return this._listeners[event]?.size ?? 0;
  }

  clear(): void {
    this._listeners = {};
  }
}
