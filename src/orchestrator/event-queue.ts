/**
 * Unbounded single-consumer async queue.
 *
 * The producer never waits: `push` buffers when nobody is reading. The
 * consumer drains in push order and the iteration ends after `close()`
 * once the buffer is empty. Iterating a second time throws; a consumer
 * that stops early (break/return) detaches, and later pushes are dropped.
 */

export class AsyncEventQueue<T extends object> implements AsyncIterable<T> {
  private readonly buffer: T[] = [];
  private waiting: ((result: IteratorResult<T, undefined>) => void) | null = null;
  private closed = false;
  private detached = false;
  private claimed = false;

  push(item: T): void {
    if (this.closed) {
      throw new Error("Cannot push to a closed event queue");
    }
    if (this.detached) return;

    const resolve = this.waiting;
    if (resolve) {
      this.waiting = null;
      resolve({ value: item, done: false });
    } else {
      this.buffer.push(item);
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    const resolve = this.waiting;
    if (resolve) {
      this.waiting = null;
      resolve({ value: undefined, done: true });
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Items pushed but not yet read. */
  get pending(): number {
    return this.buffer.length;
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    if (this.claimed) {
      throw new Error("Event stream already consumed; it can be iterated only once");
    }
    this.claimed = true;

    return {
      next: (): Promise<IteratorResult<T, undefined>> => {
        const item = this.buffer.shift();
        if (item !== undefined) {
          return Promise.resolve({ value: item, done: false });
        }
        if (this.closed || this.detached) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise((resolve) => {
          this.waiting = resolve;
        });
      },
      return: (): Promise<IteratorResult<T, undefined>> => {
        this.detached = true;
        this.buffer.length = 0;
        this.waiting = null;
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}
