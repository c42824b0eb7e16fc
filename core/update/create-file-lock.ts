/** Runs tasks one at a time per key. */
export type FileLock = <T>(key: string, task: () => Promise<T>) => Promise<T>

/**
 * Create a keyed mutex that serialises tasks touching the same file.
 *
 * @returns Lock function; tasks for different keys run concurrently.
 */
export function createFileLock(): FileLock {
  let tails = new Map<string, Promise<unknown>>()

  return <T>(key: string, task: () => Promise<T>): Promise<T> => {
    let previous = tails.get(key) ?? Promise.resolve()
    let current = previous.then(task, task)
    let tail = current.then(
      () => undefined,
      () => undefined,
    )
    tails.set(key, tail)
    void tail.then(() => {
      if (tails.get(key) === tail) {
        tails.delete(key)
      }
    })
    return current
  }
}
