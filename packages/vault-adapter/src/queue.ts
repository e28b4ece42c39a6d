/*
 * Serializes async jobs per key. Jobs under the same key run one after another
 * in submission order; jobs under different keys do not wait on each other.
 */
export class KeyedQueue<K> {
  private readonly tails: Map<K, Promise<unknown>> = new Map();

  run<T>(key: K, job: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    const next = prev.then(job, job);
    // keep the chain even when the job rejects, the caller sees the rejection
    const tail = next.then(
      () => undefined,
      () => undefined,
    );
    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });
    return next;
  }
}
