/**
 * Counting semaphore bounding concurrent oracle calls.
 * One instance per analysis; nothing is shared between analyses.
 */
export class Semaphore {
  private count = 0
  private readonly queue: Array<() => void> = []

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`)
    }
  }

  get inFlight(): number {
    return this.count
  }

  acquire(): Promise<void> {
    if (this.count < this.limit) {
      this.count++
      return Promise.resolve()
    }
    return new Promise((resolve) => this.queue.push(() => { this.count++; resolve() }))
  }

  release(): void {
    this.count--
    const next = this.queue.shift()
    if (next) next()
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire()
    try {
      return await task()
    } finally {
      this.release()
    }
  }
}
