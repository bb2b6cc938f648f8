import PQueue from 'p-queue'

export const DEFAULT_POOL_CAPACITY = 5

export type PermitTask<T> = (signal?: AbortSignal) => Promise<T>

/**
 * Fixed-size pool of permits for outbound requests.
 *
 * Each task holds one permit while it runs; the permit returns to the pool when the task
 * settles, whether it resolved, rejected or was aborted. Tasks aborted while still
 * waiting never run.
 */
export class PermitPool {
  private readonly queue: PQueue

  constructor(readonly capacity: number = DEFAULT_POOL_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1)
      throw new RangeError(`Permit pool capacity must be a positive integer, got ${capacity}`)

    this.queue = new PQueue({ concurrency: capacity })
  }

  /** Number of permits currently held */
  get inFlight(): number {
    return this.queue.pending
  }

  /** Number of tasks waiting for a permit */
  get waiting(): number {
    return this.queue.size
  }

  async run<T>(task: PermitTask<T>, signal?: AbortSignal): Promise<T> {
    signal?.throwIfAborted()
    return this.queue.add(() => task(signal), { signal, throwOnTimeout: true })
  }

  /** Resolves once every queued and running task has settled */
  async drain(): Promise<void> {
    await this.queue.onIdle()
  }
}
