const CLOSE = Symbol("channel.close");

type Slot<T> = T | typeof CLOSE;

/**
 * Single-producer, single-consumer queue. The producer pushes values and
 * finally closes; the consumer takes values in order until the close sentinel.
 */
export class Channel<T> {
  private readonly buffer: Slot<T>[] = [];
  private waiter: ((slot: Slot<T>) => void) | null = null;
  private closed = false;
  private drained = false;
  private failure: { error: unknown } | null = null;

  get isClosed(): boolean {
    return this.closed;
  }

  /** Returns false once the channel is closed; the value is dropped. */
  push(value: T): boolean {
    if (this.closed) return false;
    this.deliver(value);
    return true;
  }

  /** Takes effect after buffered values are drained. A given error is rethrown to the consumer. */
  close(error?: unknown): void {
    if (this.closed) return;
    this.closed = true;
    if (error !== undefined) this.failure = { error };
    this.deliver(CLOSE);
  }

  /** Closes immediately, discarding anything not yet taken. */
  cancel(): void {
    this.buffer.length = 0;
    this.failure = null;
    if (this.closed) {
      this.buffer.push(CLOSE);
      return;
    }
    this.closed = true;
    this.deliver(CLOSE);
  }

  async take(): Promise<IteratorResult<T, undefined>> {
    if (this.drained) return { done: true, value: undefined };
    const slot = this.buffer.length > 0 ? this.buffer.shift() : await new Promise<Slot<T>>((resolve) => (this.waiter = resolve));
    if (slot === undefined || slot === CLOSE) {
      this.drained = true;
      if (this.failure) throw this.failure.error;
      return { done: true, value: undefined };
    }
    return { done: false, value: slot };
  }

  private deliver(slot: Slot<T>): void {
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter(slot);
      return;
    }
    this.buffer.push(slot);
  }
}
