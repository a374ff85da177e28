/**
 * Runs tasks one at a time per key, in submission order. Different keys run
 * independently. Used where messages for one phone can arrive concurrently
 * in-process (the synchronous chat route).
 */
export class KeyedSerializer {
  private tails = new Map<string, Promise<unknown>>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task, task);

    // The stored tail never rejects, so one failure does not poison the key
    const tail = result.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  get pendingKeys(): number {
    return this.tails.size;
  }
}
