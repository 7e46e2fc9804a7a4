export class Semaphore {
  private waiters: Array<() => void> = [];
  private held = 0;

  constructor(readonly permits: number) {
    if (permits < 1) throw new Error("Semaphore needs at least one permit");
  }

  get inUse(): number {
    return this.held;
  }

  async acquire(): Promise<void> {
    if (this.held < this.permits) {
      this.held++;
      return;
    }
    // The releasing side hands its permit over, so `held` stays unchanged.
    await new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    if (this.held > 0) this.held--;
  }

  async use<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
