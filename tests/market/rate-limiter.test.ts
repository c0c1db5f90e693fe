// tests/market/rate-limiter.test.ts — Fixed-window limiter: admission, reset task, lifecycle

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest"
import fc from "fast-check"
import { WindowRateLimiter } from "../../src/market/rate-limiter.js"
import { AsyncMutex } from "../../src/shared/mutex.js"

describe("WindowRateLimiter", () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it("defaults to 3 requests per 1000ms", () => {
    const limiter = new WindowRateLimiter()
    expect(limiter.requestLimit).toBe(3)
    expect(limiter.windowMs).toBe(1000)
    expect(limiter.admitted).toBe(0)
  })

  it("admits up to the limit, then denies", async () => {
    const limiter = new WindowRateLimiter({ requestLimit: 3 })
    const results = []
    for (let i = 0; i < 5; i++) results.push(await limiter.tryAdmit())
    expect(results).toEqual([true, true, true, false, false])
    expect(limiter.admitted).toBe(3)
  })

  it("admits exactly the limit among concurrent callers", async () => {
    const limiter = new WindowRateLimiter({ requestLimit: 3 })
    const results = await Promise.all(Array.from({ length: 10 }, () => limiter.tryAdmit()))
    expect(results.filter(Boolean)).toHaveLength(3)
    expect(limiter.admitted).toBe(3)
  })

  it("denial leaves the counter unchanged", async () => {
    const limiter = new WindowRateLimiter({ requestLimit: 1 })
    await limiter.tryAdmit()
    await limiter.tryAdmit()
    await limiter.tryAdmit()
    expect(limiter.admitted).toBe(1)
  })

  it("reset task restores capacity after one window", async () => {
    const limiter = new WindowRateLimiter({ requestLimit: 2, windowMs: 1000 })
    limiter.start()

    expect(await limiter.tryAdmit()).toBe(true)
    expect(await limiter.tryAdmit()).toBe(true)
    expect(await limiter.tryAdmit()).toBe(false)

    await vi.advanceTimersByTimeAsync(999)
    expect(await limiter.tryAdmit()).toBe(false)

    await vi.advanceTimersByTimeAsync(1)
    expect(await limiter.tryAdmit()).toBe(true)
    expect(limiter.admitted).toBe(1)

    limiter.stop()
  })

  it("without start() the counter never resets", async () => {
    const limiter = new WindowRateLimiter({ requestLimit: 1, windowMs: 100 })
    await limiter.tryAdmit()
    await vi.advanceTimersByTimeAsync(1000)
    expect(await limiter.tryAdmit()).toBe(false)
  })

  it("start and stop are idempotent", () => {
    const limiter = new WindowRateLimiter()
    expect(limiter.isRunning).toBe(false)
    limiter.start()
    limiter.start()
    expect(limiter.isRunning).toBe(true)
    expect(vi.getTimerCount()).toBe(1)

    limiter.stop()
    limiter.stop()
    expect(limiter.isRunning).toBe(false)
    expect(vi.getTimerCount()).toBe(0)
  })

  it("stop() halts resets", async () => {
    const limiter = new WindowRateLimiter({ requestLimit: 1, windowMs: 500 })
    limiter.start()
    await limiter.tryAdmit()
    limiter.stop()

    await vi.advanceTimersByTimeAsync(2000)
    expect(limiter.admitted).toBe(1)
    expect(await limiter.tryAdmit()).toBe(false)
  })

  it("rejects a non-positive limit or window", () => {
    expect(() => new WindowRateLimiter({ requestLimit: 0 })).toThrow(RangeError)
    expect(() => new WindowRateLimiter({ requestLimit: 1.5 })).toThrow(RangeError)
    expect(() => new WindowRateLimiter({ windowMs: 0 })).toThrow(RangeError)
  })

  it("never admits more than the limit within one window", async () => {
    await fc.assert(
      fc.asyncProperty(fc.integer({ min: 1, max: 10 }), fc.integer({ min: 0, max: 30 }), async (limit, attempts) => {
        const limiter = new WindowRateLimiter({ requestLimit: limit })
        const results = await Promise.all(Array.from({ length: attempts }, () => limiter.tryAdmit()))
        expect(results.filter(Boolean).length).toBe(Math.min(limit, attempts))
      }),
    )
  })
})

describe("AsyncMutex", () => {
  it("runs critical sections one at a time, in call order", async () => {
    const mutex = new AsyncMutex()
    const events: string[] = []
    let release: () => void = () => {}
    const held = new Promise<void>((resolve) => { release = resolve })

    const first = mutex.runExclusive(async () => {
      events.push("first:start")
      await held
      events.push("first:end")
    })
    const second = mutex.runExclusive(() => {
      events.push("second")
    })

    await new Promise((resolve) => setTimeout(resolve, 0))
    expect(events).toEqual(["first:start"])

    release()
    await Promise.all([first, second])
    expect(events).toEqual(["first:start", "first:end", "second"])
  })

  it("releases the lock when a section throws", async () => {
    const mutex = new AsyncMutex()
    await expect(mutex.runExclusive(() => { throw new Error("boom") })).rejects.toThrow("boom")
    expect(await mutex.runExclusive(() => 42)).toBe(42)
  })
})
