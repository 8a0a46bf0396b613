import type { Context } from './ctx.js'
import { Logs, Severity, describeError } from './log.js'
import { sleep } from './adapters/rate-limiter.js'

export interface SchedulerOptions {
  /** runs start on multiples of this interval (an hour starts on the hour) */
  intervalMs: number
  /** wait before retrying a run that threw */
  retryDelayMs: number
  now?: () => number
  sleep?: (ms: number) => Promise<void>
}

/**
 * Repeats a sweep on a fixed wall-clock interval until `signal` aborts.
 * A run that throws is retried after `retryDelayMs` rather than at the next
 * slot.
 */
export class SweepScheduler extends Logs {
  private readonly now: () => number
  private readonly sleep: (ms: number) => Promise<void>

  constructor(
    ctx: Context,
    private readonly job: () => Promise<void>,
    private readonly options: SchedulerOptions,
  ) {
    super(ctx)
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? sleep
  }

  async run(signal?: AbortSignal): Promise<void> {
    this.log(Severity.INF, `Starting scheduled sweeps every ${this.options.intervalMs / 60_000} minutes`)

    let delay = this.untilNextSlot()

    while (!signal?.aborted) {
      this.log(Severity.INF, `Next sweep in ${(delay / 60_000).toFixed(1)} minutes`)
      await this.sleep(delay)
      if (signal?.aborted) break

      try {
        await this.job()
        delay = this.untilNextSlot()
      } catch (err) {
        this.log(Severity.ERR, `Scheduled sweep failed: ${describeError(err)}`)
        delay = this.options.retryDelayMs
      }
    }

    this.log(Severity.INF, 'Scheduled sweeps stopped')
  }

  private untilNextSlot(): number {
    const interval = this.options.intervalMs
    return interval - (this.now() % interval)
  }
}
