/**
 * Counting semaphore with FIFO wake-up. `acquire` resolves once a permit is
 * free, which lets a producer wait for capacity before scheduling more work.
 */
export class Semaphore {
  private running = 0;
  private readonly queue: Array<() => void> = [];
  private readonly max: number;

  constructor(max: number) {
    this.max = Math.max(1, Math.floor(max));
  }

  get active() {
    return this.running;
  }

  async acquire(): Promise<void> {
    if (this.running < this.max) {
      this.running += 1;
      return;
    }
    await new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      // Hand the permit straight to the next waiter.
      next();
      return;
    }
    this.running -= 1;
  }
}
