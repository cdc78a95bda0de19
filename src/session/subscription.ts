/**
 * Pull-based queue behind DeviceSession#subscribe.
 */
import type { StateChangeEvent } from "./schema.js";

export class Subscription {
  private readonly queue: StateChangeEvent[] = [];
  private waiting: ((event: StateChangeEvent | null) => void) | null = null;
  private ended = false;

  push(event: StateChangeEvent): void {
    if (this.ended) return;
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting(event);
      return;
    }
    this.queue.push(event);
  }

  end(): void {
    this.ended = true;
    const waiting = this.waiting;
    if (waiting) {
      this.waiting = null;
      waiting(null);
    }
  }

  /** Next event, or null once ended and drained */
  next(): Promise<StateChangeEvent | null> {
    const queued = this.queue.shift();
    if (queued) return Promise.resolve(queued);
    if (this.ended) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }
}
