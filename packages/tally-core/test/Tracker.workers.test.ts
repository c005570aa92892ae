import { once } from 'node:events'
import { Worker } from 'node:worker_threads'
import { describe, it, expect } from '@effect/vitest'
import * as Tally from '../src/index.js'

// Worker side of a tracker: +1 per track, -1 per release, straight on the posted cell.
const workerSource = `
const { workerData } = require('node:worker_threads')
const cell = new BigInt64Array(workerData.buffer, workerData.byteOffset, 1)
for (let i = 0; i < workerData.churn; i++) {
  Atomics.add(cell, 0, 1n)
  Atomics.add(cell, 0, -1n)
}
for (let i = 0; i < workerData.held; i++) {
  Atomics.add(cell, 0, 1n)
}
`

const WORKERS = 4
const CHURN = 20_000
const HELD = 250

const runWorker = async (counter: Tally.Counter.Counter): Promise<number> => {
  const worker = new Worker(workerSource, {
    eval: true,
    workerData: { buffer: counter.buffer, byteOffset: counter.byteOffset, churn: CHURN, held: HELD },
  })
  const [code] = await once(worker, 'exit')
  return Number(code)
}

describe('Tracker across worker threads', () => {
  it('counts stay exact while workers and the main thread update the same cell', async () => {
    const tracker = Tally.Tracker.make(Tally.Counter.make(), { releaseCheck: 'throw' })
    const attached = Tally.Tracker.attach(tracker.counter.buffer, tracker.counter.byteOffset, { releaseCheck: 'throw' })

    const running = Array.from({ length: WORKERS }, () => runWorker(tracker.counter))

    const held: Array<Tally.Count> = []
    for (let i = 0; i < CHURN; i++) {
      attached.track().release()
      if (i % 100 === 0) held.push(tracker.track())
    }

    const codes = await Promise.all(running)
    expect(codes).toEqual([0, 0, 0, 0])
    expect(tracker.read()).toBe(WORKERS * HELD + held.length)
    expect(attached.read()).toBe(WORKERS * HELD + 200)

    for (const count of held) count.release()
    expect(tracker.read()).toBe(WORKERS * HELD)
  })
})
