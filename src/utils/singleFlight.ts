/**
 * One in-flight task per key. Callers arriving while a task runs share its
 * promise; the entry is dropped once it settles, so failures are not cached.
 */
export class KeyedSingleFlight<V> {
  private readonly inFlight = new Map<string, Promise<V>>();

  public run(key: string, task: () => Promise<V>): Promise<V> {
    const existing = this.inFlight.get(key);
    if (existing) {
      return existing;
    }

    const promise = Promise.resolve()
      .then(task)
      .finally(() => {
        if (this.inFlight.get(key) === promise) {
          this.inFlight.delete(key);
        }
      });
    this.inFlight.set(key, promise);
    return promise;
  }

  public isInFlight(key: string): boolean {
    return this.inFlight.has(key);
  }

  public size(): number {
    return this.inFlight.size;
  }
}
