/**
 * Minimal synchronous event emitter shared by the engine's components.
 *
 * The type parameter maps event names to payload types, so `on('zoom-change',
 * e => e.zoom)` is checked. Handlers are stored in a Set: registering the same
 * handler twice has no effect. A handler that throws is reported and the
 * remaining handlers still run.
 */
export type EventHandler<T> = (payload: T) => void;

type HandlerSets<E> = { [K in keyof E]?: Set<EventHandler<E[K]>> };

export class EventEmitter<E extends object = Record<string, unknown>> {
  private handlers: HandlerSets<E> = {};

  on<K extends keyof E & string>(event: K, handler: EventHandler<E[K]>): void {
    let set = this.handlers[event];
    if (!set) {
      set = new Set();
      this.handlers[event] = set;
    }
    set.add(handler);
  }

  off<K extends keyof E & string>(event: K, handler: EventHandler<E[K]>): void {
    const set = this.handlers[event];
    if (!set) return;

    set.delete(handler);
    if (set.size === 0) {
      delete this.handlers[event];
    }
  }

  /**
   * Register a handler that is removed after its first call.
   */
  once<K extends keyof E & string>(event: K, handler: EventHandler<E[K]>): void {
    const wrapper: EventHandler<E[K]> = (payload) => {
      this.off(event, wrapper);
      handler(payload);
    };
    this.on(event, wrapper);
  }

  emit<K extends keyof E & string>(event: K, payload: E[K]): void {
    const set = this.handlers[event];
    if (!set) return;

    // Copy so handlers may unsubscribe while we iterate
    for (const handler of Array.from(set)) {
      try {
        handler(payload);
      } catch (error) {
        console.error(`[EventEmitter] Error in handler for "${event}":`, error);
      }
    }
  }

  removeAllListeners<K extends keyof E & string>(event?: K): void {
    if (event === undefined) {
      this.handlers = {};
    } else {
      delete this.handlers[event];
    }
  }

  listenerCount<K extends keyof E & string>(event: K): number {
    return this.handlers[event]?.size ?? 0;
  }
}
