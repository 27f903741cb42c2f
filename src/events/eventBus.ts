import { describeError } from '../utils.js';

export type Unsubscribe = () => void;

/**
 * Synchronous, in-order event bus.
 *
 * Subscriber errors are swallowed so a broken listener never interrupts message handling.
 */
export class EventBus<TEvent> {
  private subscribers: Set<(event: TEvent) => void> = new Set();

  subscribe(cb: (event: TEvent) => void): Unsubscribe {
    this.subscribers.add(cb);
    return () => {
      this.subscribers.delete(cb);
    };
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  emit(event: TEvent): void {
    for (const sub of [...this.subscribers]) {
      try {
        sub(event);
      } catch (error) {
        // Listener failures must not reach the agent's entry points.
        process.emitWarning(`Event subscriber failed: ${describeError(error)}`);
      }
    }
  }
}
