export interface FlightResult<T> {
  value: T
  /** True when more than one caller observed this execution. */
  shared: boolean
}

interface Call<T> {
  promise: Promise<T>
  dups: number
}

/**
 * Collapses concurrent calls for the same key into one execution of `work`.
 * Later callers await the in-progress promise and see its exact value or
 * rejection. The key is released as soon as the execution settles.
 */
export class SingleFlight<T> {
  private readonly calls = new Map<string, Call<T>>()

  async do(key: string, work: () => Promise<T>): Promise<FlightResult<T>> {
    const existing = this.calls.get(key)
    if (existing) {
      existing.dups += 1
      return { value: await existing.promise, shared: true }
    }

    const call: Call<T> = {
      promise: Promise.resolve()
        .then(work)
        .finally(() => {
          if (this.calls.get(key) === call) this.calls.delete(key)
        }),
      dups: 0,
    }
    this.calls.set(key, call)

    const value = await call.promise
    return { value, shared: call.dups > 0 }
  }

  inFlight(key: string): boolean {
    return this.calls.has(key)
  }

  get size(): number {
    return this.calls.size
  }
}
