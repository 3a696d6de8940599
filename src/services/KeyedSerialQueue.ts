/**
 * Runs tasks one at a time per key, in submission order.
 * Tasks under different keys run concurrently.
 */
export class KeyedSerialQueue {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);

    // The tail settles after `task` either way, so one failure never blocks the key
    const tail: Promise<void> = result.then(settled, settled).then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    this.tails.set(key, tail);

    return result;
  }

  /** Keys with queued or running work. */
  get activeKeys(): number {
    return this.tails.size;
  }
}

function settled(): void {}
