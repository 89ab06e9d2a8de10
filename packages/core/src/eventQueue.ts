import type { AppEvent } from "@tailscope/contracts";

/**
 * Inbound FIFO for the interaction loop. Producers (input, timers, finished fetches) only ever
 * push; the loop is the single consumer.
 */
export class EventQueue<T = AppEvent> {
  private readonly items: T[] = [];
  private readonly waiters: Array<(value: T | null) => void> = [];
  private closed = false;

  push(event: T): void {
    if (this.closed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(event);
      return;
    }
    this.items.push(event);
  }

  /** Resolves with the next event, or null once the queue is closed and empty. */
  next(): Promise<T | null> {
    const item = this.items.shift();
    if (item !== undefined) return Promise.resolve(item);
    if (this.closed) return Promise.resolve(null);
    return new Promise<T | null>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Removes and returns everything currently queued without waiting. */
  drain(): T[] {
    return this.items.splice(0, this.items.length);
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0, this.waiters.length)) {
      waiter(null);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }
}
