export interface FlightResult<T> {
  promise: Promise<T>;
  /** False for the caller that started the work, true for callers that joined it. */
  joined: boolean;
}

/**
 * In-flight registry keyed by string: concurrent `run` calls for the same key
 * share one execution of `work`. The entry is removed when the work settles,
 * whether it resolved or rejected, so the next call starts fresh.
 */
export class SingleFlight<T> {
  private flights = new Map<string, Promise<T>>();

  run(key: string, work: () => Promise<T>): FlightResult<T> {
    const existing = this.flights.get(key);
    if (existing) return { promise: existing, joined: true };

    const promise = Promise.resolve()
      .then(work)
      .finally(() => {
        if (this.flights.get(key) === promise) this.flights.delete(key);
      });
    this.flights.set(key, promise);
    return { promise, joined: false };
  }

  has(key: string): boolean {
    return this.flights.has(key);
  }

  /** Number of keys with work in progress. */
  get size(): number {
    return this.flights.size;
  }
}
