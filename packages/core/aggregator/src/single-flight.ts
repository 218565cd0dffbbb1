/**
 * Shares one in-flight computation between identical concurrent calls
 */

export class SingleFlight<T> {
  private pending: Map<string, Promise<T>> = new Map();

  /**
   * @param share - gives each caller its own view of the settled value,
   * so callers joining one run never hold the same mutable object
   */
  constructor(private share: (value: T) => T = (value) => value) {}

  /**
   * Run task for key, or join the run already in flight for it. The entry
   * is removed once the task settles.
   */
  run(key: string, task: () => Promise<T>): Promise<T> {
    const existing = this.pending.get(key);
    if (existing) return existing.then(this.share);

    const promise = task().finally(() => {
      this.pending.delete(key);
    });
    this.pending.set(key, promise);
    return promise.then(this.share);
  }

  get size(): number {
    return this.pending.size;
  }
}
