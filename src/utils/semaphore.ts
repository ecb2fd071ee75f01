export type Release = () => void;

/**
 * Counting semaphore. `acquire` resolves with a release callback once one of
 * the `permits` is free; waiters are served in FIFO order.
 */
export class Semaphore {
  readonly permits: number;
  private available: number;
  private readonly waiters: Array<(release: Release) => void> = [];

  constructor(permits: number) {
    this.permits = Math.max(1, Math.floor(permits));
    this.available = this.permits;
  }

  acquire(): Promise<Release> {
    if (this.available > 0) {
      this.available -= 1;
      return Promise.resolve(this.createRelease());
    }
    return new Promise<Release>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private createRelease(): Release {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waiters.shift();
      if (next) {
        // hand the permit straight to the next waiter
        next(this.createRelease());
      } else {
        this.available += 1;
      }
    };
  }
}
