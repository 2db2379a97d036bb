export type Unsubscribe = () => void;

type Handler<T> = (payload: T) => void;

/**
 * Synchronous publish/subscribe over a fixed map of topics to payload types.
 *
 * Handlers of a topic run in subscription order. A throwing handler is reported through
 * `onError`; the remaining handlers still run and `publish` returns normally.
 */
export class TopicBus<Topics extends Record<string, unknown>> {
  private handlers: { [K in keyof Topics]?: Set<Handler<Topics[K]>> } = {};

  constructor(
    private readonly onError: (error: unknown, topic: keyof Topics) => void = (error, topic) =>
      console.error(`Handler for "${String(topic)}" failed:`, error)
  ) {}

  on<K extends keyof Topics>(topic: K, handler: Handler<Topics[K]>): Unsubscribe {
    const set = this.handlers[topic] ?? new Set<Handler<Topics[K]>>();
    this.handlers[topic] = set;
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  publish<K extends keyof Topics>(topic: K, payload: Topics[K]): void {
    const set = this.handlers[topic];
    if (!set) return;
    // Snapshot: handlers may unsubscribe while being called.
    for (const handler of [...set]) {
      try {
        handler(payload);
      } catch (error) {
        this.onError(error, topic);
      }
    }
  }

  listenerCount(topic: keyof Topics): number {
    return this.handlers[topic]?.size ?? 0;
  }
}
