type Listener<T> = (payload: T) => void;

/**
 * Small typed event emitter. `on` hands back an unregister function so callers
 * never need to keep a reference to the listener around.
 */
export class SimpleEventEmitter<Events extends object> {
  private listeners: { [K in keyof Events]?: Set<Listener<Events[K]>> } = {};

  on<K extends keyof Events>(event: K, listener: Listener<Events[K]>): () => void {
    const existing = this.listeners[event];
    const set = existing ?? new Set<Listener<Events[K]>>();
    if (!existing) {
      this.listeners[event] = set;
    }
    set.add(listener);
    return () => this.off(event, listener);
  }

  once<K extends keyof Events>(event: K, listener: Listener<Events[K]>): () => void {
    const unsubscribe = this.on(event, (payload) => {
      unsubscribe();
      listener(payload);
    });
    return unsubscribe;
  }

  off<K extends keyof Events>(event: K, listener: Listener<Events[K]>): void {
    this.listeners[event]?.delete(listener);
  }

  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const set = this.listeners[event];
    if (!set) return;
    // Copy so listeners can unsubscribe while we iterate
    for (const listener of [...set]) {
      try {
        listener(payload);
      } catch (error) {
        console.warn(`[Events] Listener for "${String(event)}" threw:`, error);
      }
    }
  }

  listenerCount<K extends keyof Events>(event: K): number {
    return this.listeners[event]?.size ?? 0;
  }

  removeAllListeners(event?: keyof Events): void {
    if (event !== undefined) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
  }
}
