import { describe, expect, test } from 'vitest'
import { createLimiter } from '../limit'

const deferred = () => {
  let resolve: () => void = () => undefined
  const promise = new Promise<void>((done) => {
    resolve = done
  })
  return { promise, resolve }
}

describe('createLimiter', () => {
  test('never runs more than the allowed number of tasks at once', async () => {
    const limit = createLimiter(2)
    const gates = [deferred(), deferred(), deferred(), deferred()]
    let running = 0
    let peak = 0

    const runs = gates.map((gate) =>
      limit(async () => {
        running += 1
        peak = Math.max(peak, running)
        await gate.promise
        running -= 1
      }),
    )

    await new Promise((resolve) => setTimeout(resolve, 0))
    expect(running).toBe(2)

    gates.forEach((gate) => gate.resolve())
    await Promise.all(runs)
    expect(peak).toBe(2)
    expect(running).toBe(0)
  })

  test('frees the slot when a task fails', async () => {
    const limit = createLimiter(1)
    await expect(limit(async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom')
    await expect(limit(async () => 'next')).resolves.toBe('next')
  })

  test('rejects a concurrency below one', () => {
    expect(() => createLimiter(0)).toThrow(RangeError)
  })
})
