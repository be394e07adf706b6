/**
 * Runs `worker` over `items` with at most `limit` calls in flight. Results keep the
 * order of `items`. The first rejection rejects the whole call once the in-flight
 * workers settle; no new items start after it.
 */
export async function mapLimit<T, R>(items: readonly T[], limit: number, worker: (item: T, index: number) => Promise<R>): Promise<R[]> {
  const lanes: number = Math.max(1, Math.floor(limit) || 1)
  const results: R[] = []
  let next = 0
  let failed = false
  async function lane(): Promise<void> {
    while (!failed && next < items.length) {
      const idx = next++
      try {
        results[idx] = await worker(items[idx], idx)
      } catch (err) {
        failed = true
        throw err
      }
    }
  }
  const running: Promise<void>[] = []
  for (let i = 0; i < Math.min(lanes, items.length); i++) running.push(lane())
  await Promise.all(running)
  return results
}
