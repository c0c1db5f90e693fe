// src/shared/mutex.ts — Promise-chain lock for the rate limiter
//
// The limiter's check-and-increment and its window reset must not interleave.
// Sections run strictly in call order; a throwing section still releases.

export class AsyncMutex {
  private tail: Promise<void> = Promise.resolve()

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    let unlock: () => void = () => {}
    const held = new Promise<void>((resolve) => { unlock = resolve })
    const previous = this.tail
    this.tail = held

    await previous
    try {
      return await fn()
    } finally {
      unlock()
    }
  }
}
