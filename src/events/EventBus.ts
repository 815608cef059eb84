export type Listener<T> = (payload: T) => void;

type ListenerTable<Events> = { [K in keyof Events]?: Listener<Events[K]>[] };

/**
 * Typed observer list. Listeners run in registration order, but callers
 * should not rely on ordering between independent listeners.
 */
export class EventBus<Events extends object> {
  private listeners: ListenerTable<Events> = {};

  on<K extends keyof Events>(event: K, listener: Listener<Events[K]>): () => void {
    const list = this.listeners[event] ?? [];
    list.push(listener);
    this.listeners[event] = list;
    return () => this.off(event, listener);
  }

  once<K extends keyof Events>(event: K, listener: Listener<Events[K]>): () => void {
    const wrapped: Listener<Events[K]> = (payload) => {
      this.off(event, wrapped);
      listener(payload);
    };
    return this.on(event, wrapped);
  }

  off<K extends keyof Events>(event: K, listener: Listener<Events[K]>): void {
    const list = this.listeners[event];
    if (!list) return;
    const idx = list.indexOf(listener);
    if (idx !== -1) {
      list.splice(idx, 1);
      if (list.length === 0) {
        delete this.listeners[event];
      }
    }
  }

  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const list = this.listeners[event];
    if (!list) return;
    for (const l of [...list]) {
      try {
        l(payload);
      } catch (error) {
        console.warn(`EventBus: listener for ${String(event)} failed`, error);
      }
    }
  }

  listenerCount<K extends keyof Events>(event: K): number {
    return this.listeners[event]?.length ?? 0;
  }

  clear(): void {
    this.listeners = {};
  }
}
