export type TakeResult<T> = { kind: "item"; item: T } | { kind: "timeout" } | { kind: "closed" };

interface Taker<T> {
  resolve: (result: TakeResult<T>) => void;
  timer: NodeJS.Timeout | null;
}

/**
 * FIFO with a fixed capacity. `put` waits while the queue is full; `take`
 * waits at most `timeoutMs` so consumers can check their stop flag.
 */
export class BoundedQueue<T> {
  private items: T[] = [];
  private takers: Taker<T>[] = [];
  private putters: Array<() => void> = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (capacity < 1) throw new Error("Queue capacity must be at least 1");
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async put(item: T): Promise<void> {
    while (!this.closed && this.items.length >= this.capacity) {
      await new Promise<void>((resolve) => this.putters.push(resolve));
    }
    if (this.closed) throw new Error("Queue is closed");

    const taker = this.takers.shift();
    if (taker) {
      if (taker.timer) clearTimeout(taker.timer);
      taker.resolve({ kind: "item", item });
      return;
    }
    this.items.push(item);
  }

  take(timeoutMs: number): Promise<TakeResult<T>> {
    if (this.items.length > 0) {
      const item = this.items.shift();
      this.putters.shift()?.();
      if (item !== undefined) return Promise.resolve({ kind: "item", item });
    }
    if (this.closed) return Promise.resolve({ kind: "closed" });

    return new Promise<TakeResult<T>>((resolve) => {
      const taker: Taker<T> = { resolve, timer: null };
      taker.timer = setTimeout(() => {
        this.takers = this.takers.filter((t) => t !== taker);
        resolve({ kind: "timeout" });
      }, Math.max(0, timeoutMs));
      this.takers.push(taker);
    });
  }

  /** Pending items stay takeable; waiting takers and putters are released. */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    if (this.items.length === 0) {
      for (const taker of this.takers) {
        if (taker.timer) clearTimeout(taker.timer);
        taker.resolve({ kind: "closed" });
      }
      this.takers = [];
    }
    for (const wake of this.putters) wake();
    this.putters = [];
  }
}
