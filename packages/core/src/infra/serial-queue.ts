/**
 * Runs queued tasks one at a time in arrival order. A failing task rejects
 * its own caller and the queue moves on.
 */
export class SerialQueue {
  private queue: Array<() => Promise<void>> = [];
  private running = false;

  get length(): number {
    return this.queue.length;
  }

  get isRunning(): boolean {
    return this.running;
  }

  enqueue<T>(execute: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await execute());
        } catch (error) {
          reject(error instanceof Error ? error : new Error(String(error)));
        }
      });
      void this.drain();
    });
  }

  private async drain(): Promise<void> {
    if (this.running) {
      return;
    }
    this.running = true;
    try {
      let task = this.queue.shift();
      while (task) {
        await task();
        task = this.queue.shift();
      }
    } finally {
      this.running = false;
    }
  }
}
