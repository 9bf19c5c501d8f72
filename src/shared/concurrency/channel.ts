export type Received<T> = { done: false; value: T } | { done: true };

/**
 * Unbounded FIFO channel between async tasks.
 * Usage:
 *   const ch = new Channel<number>();
 *   ch.send(1);
 *   const next = await ch.receive(); // { done: false, value: 1 }
 *
 * Values buffered before `close()` can still be received; after that
 * receivers get `{ done: true }`.
 */
export class Channel<T> {
  private readonly buffer: Array<{ value: T }> = [];
  private readonly receivers: Array<(received: Received<T>) => void> = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  get size(): number {
    return this.buffer.length;
  }

  send(value: T): boolean {
    if (this.closed) return false;

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ done: false, value });
    } else {
      this.buffer.push({ value });
    }
    return true;
  }

  receive(): Promise<Received<T>> {
    const buffered = this.buffer.shift();
    if (buffered) return Promise.resolve({ done: false, value: buffered.value });
    if (this.closed) return Promise.resolve({ done: true });

    return new Promise<Received<T>>((resolve) => {
      this.receivers.push(resolve);
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    // Receivers only wait while the buffer is empty.
    for (const receiver of this.receivers.splice(0)) {
      receiver({ done: true });
    }
  }
}
