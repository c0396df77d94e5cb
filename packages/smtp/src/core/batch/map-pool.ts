/**
 * Runs `fn` over `items` with at most `concurrency` calls in flight.
 * Results keep input order.
 */
export async function mapPool<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length)
  let cursor = 0

  const worker = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor++
      const item = items[index]

      if (item === undefined) continue

      results[index] = await fn(item, index)
    }
  }

  const workers = Math.max(1, Math.min(Math.floor(concurrency), items.length))
  await Promise.all(Array.from({ length: workers }, worker))

  return results
}
