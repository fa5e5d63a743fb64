export type Listener<P> = (payload: P) => void;

type ListenerTable<M> = { [K in keyof M]?: Set<Listener<M[K]>> };

/**
 * Typed listener registry. Delivery is synchronous and in registration
 * order; a listener that throws is reported and skipped so the emitter and
 * the remaining listeners keep going.
 */
export class EventBus<M extends object> {
  private readonly listeners: ListenerTable<M> = {};

  constructor(private readonly name = 'events') {}

  on<K extends keyof M>(type: K, listener: Listener<M[K]>): () => void {
    const set = this.listeners[type] ?? new Set<Listener<M[K]>>();
    set.add(listener);
    this.listeners[type] = set;
    return () => this.off(type, listener);
  }

  once<K extends keyof M>(type: K, listener: Listener<M[K]>): () => void {
    const wrapper: Listener<M[K]> = (payload) => {
      this.off(type, wrapper);
      listener(payload);
    };
    return this.on(type, wrapper);
  }

  off<K extends keyof M>(type: K, listener: Listener<M[K]>) {
    const set = this.listeners[type];
    if (!set) return;
    set.delete(listener);
    if (set.size === 0) delete this.listeners[type];
  }

  listenerCount<K extends keyof M>(type: K): number {
    return this.listeners[type]?.size ?? 0;
  }

  emit<K extends keyof M>(type: K, payload: M[K]) {
    const set = this.listeners[type];
    if (!set) return;
    for (const listener of [...set]) {
      try {
        listener(payload);
      } catch (err) {
        console.error(`[${this.name}] listener for "${String(type)}" threw:`, err);
      }
    }
  }
}
