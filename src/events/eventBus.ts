export type Unsubscribe = () => void;

/**
 * Minimal synchronous event bus.
 *
 * - Subscriber errors are reported to `onError` and never reach the emitter
 * - Preserves emission order for each subscriber
 */
export class EventBus<TEvent> {
  private subscribers: Set<(event: TEvent) => void> = new Set();

  constructor(private readonly onError: (error: unknown) => void = error => console.error('EventBus subscriber failed:', error)) {}

  subscribe(cb: (event: TEvent) => void): Unsubscribe {
    this.subscribers.add(cb);
    return () => {
      this.subscribers.delete(cb);
    };
  }

  get size(): number {
    return this.subscribers.size;
  }

  emit(event: TEvent): void {
    for (const sub of this.subscribers) {
      try {
        sub(event);
      } catch (error) {
        this.onError(error);
      }
    }
  }
}
