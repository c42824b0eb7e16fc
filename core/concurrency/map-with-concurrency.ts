/**
 * Map items through an async function with at most `concurrency` calls in
 * flight.
 *
 * A rejection only affects its own slot; results keep the input order.
 *
 * @param items - Inputs.
 * @param concurrency - Maximum number of pending calls, at least 1.
 * @param mapper - Async mapping function.
 * @returns Settled results in input order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  mapper: (item: T, index: number) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  let results = new Array<PromiseSettledResult<R>>(items.length)
  let executing = new Set<Promise<void>>()
  let limit = Math.max(1, Math.floor(concurrency))

  for (let [index, item] of items.entries()) {
    let promise: Promise<void> = Promise.resolve()
      .then(() => mapper(item, index))
      .then(
        value => {
          results[index] = { status: 'fulfilled', value }
        },
        (reason: unknown) => {
          results[index] = { status: 'rejected', reason }
        },
      )
      .finally(() => executing.delete(promise))

    executing.add(promise)

    if (executing.size >= limit) {
      await Promise.race(executing)
    }
  }

  await Promise.all(executing)
  return results
}
