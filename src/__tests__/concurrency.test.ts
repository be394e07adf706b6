import { describe, it, expect } from 'vitest'
import { mapLimit } from '../utils/concurrency'

function sleep(ms: number): Promise<void> {
  return new Promise<void>((resolve) => { setTimeout(resolve, ms) })
}

describe('mapLimit', () => {
  it('keeps result order and the concurrency bound', async () => {
    let inFlight = 0
    let peak = 0
    const out = await mapLimit([30, 10, 20, 5], 2, async (ms, i) => {
      inFlight++
      peak = Math.max(peak, inFlight)
      await sleep(ms)
      inFlight--
      return `${i}:${ms}`
    })
    expect(out).toEqual(['0:30', '1:10', '2:20', '3:5'])
    expect(peak).toBe(2)
  })

  it('treats a limit below one as one', async () => {
    const seen: number[] = []
    await mapLimit([1, 2, 3], 0, async (n) => { seen.push(n) })
    expect(seen).toEqual([1, 2, 3])
  })

  it('rejects with the first worker error and starts nothing after it', async () => {
    const started: number[] = []
    await expect(mapLimit([1, 2, 3], 1, async (n) => {
      started.push(n)
      if (n === 2) throw new Error('second failed')
    })).rejects.toThrow('second failed')
    expect(started).toEqual([1, 2])
  })
})
