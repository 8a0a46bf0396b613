import { describe, it, expect, beforeEach } from 'vitest'
import { SweepScheduler } from '../src/sweep-scheduler.js'
import { createTestContext } from './helpers/setup-db.js'
import type { Context } from '../src/ctx.js'

const HOUR = 3_600_000

describe('SweepScheduler', () => {
  let ctx: Context
  let clock: number
  let sleeps: number[]

  beforeEach(async () => {
    ctx = await createTestContext()
    clock = 1_000
    sleeps = []
  })

  function scheduler(job: () => Promise<void>) {
    return new SweepScheduler(ctx, job, {
      intervalMs: HOUR,
      retryDelayMs: 300_000,
      now: () => clock,
      sleep: async (ms) => {
        sleeps.push(ms)
        clock += ms
      },
    })
  }

  it('runs on the interval boundary and retries a failed run after the retry delay', async () => {
    const controller = new AbortController()
    const runsAt: number[] = []

    await scheduler(async () => {
      runsAt.push(clock)
      if (runsAt.length === 1) throw new Error('provider outage')
      if (runsAt.length === 3) controller.abort()
    }).run(controller.signal)

    expect(runsAt).toEqual([HOUR, HOUR + 300_000, 2 * HOUR])
    expect(sleeps).toEqual([HOUR - 1_000, 300_000, HOUR - 300_000])
  })

  it('does not run once aborted', async () => {
    const controller = new AbortController()
    controller.abort()
    let runs = 0

    await scheduler(async () => {
      runs++
    }).run(controller.signal)

    expect(runs).toBe(0)
    expect(sleeps).toEqual([])
  })
})
