export type Limiter = <T>(task: () => Promise<T>) => Promise<T>

/** Runs at most `concurrency` tasks at once; the rest wait for a free slot. */
export function createLimiter(concurrency: number): Limiter {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}.`)
  }

  let active = 0
  const waiting: Array<() => void> = []

  const release = () => {
    active -= 1
    const next = waiting.shift()
    if (next) {
      next()
    }
  }

  const acquire = () =>
    new Promise<void>((resolve) => {
      if (active < concurrency) {
        active += 1
        resolve()
        return
      }
      waiting.push(() => {
        active += 1
        resolve()
      })
    })

  return async (task) => {
    await acquire()
    try {
      return await task()
    } finally {
      release()
    }
  }
}
