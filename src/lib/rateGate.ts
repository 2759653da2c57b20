import { setTimeout as sleep } from 'node:timers/promises'

export interface Clock {
  now(): number
  sleep(ms: number): Promise<void>
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await sleep(ms)
  }
}

/**
 * RateGate serializes the moment of dispatch for outbound calls, keeping at
 * least `minIntervalMs` between consecutive dispatches. Callers may submit
 * concurrently; tasks start one at a time in submission order, and their
 * completion is not awaited before the next dispatch.
 *
 * A gate lives as long as its owner. The default geocoder holds one for the
 * lifetime of the process, so every request shares the provider's budget.
 * Nothing is persisted.
 */
export class RateGate {
  private readonly minIntervalMs: number
  private readonly clock: Clock
  private lastDispatch = Number.NEGATIVE_INFINITY
  private tail: Promise<void> = Promise.resolve()
  private waiting = 0

  constructor(minIntervalMs: number, clock: Clock = systemClock) {
    if (!Number.isFinite(minIntervalMs) || minIntervalMs < 0) {
      throw new Error('minIntervalMs must be a non-negative number')
    }
    this.minIntervalMs = minIntervalMs
    this.clock = clock
  }

  /**
   * Run `task` once the gate grants the next dispatch slot
   */
  schedule<T>(task: () => Promise<T>): Promise<T> {
    this.waiting++
    const slot = this.tail.then(() => this.acquireSlot())
    this.tail = slot

    return slot.then(() => {
      this.waiting--
      return task()
    })
  }

  private async acquireSlot(): Promise<void> {
    const wait = this.lastDispatch + this.minIntervalMs - this.clock.now()
    if (wait > 0) {
      await this.clock.sleep(wait)
    }
    this.lastDispatch = this.clock.now()
  }

  /**
   * Number of submitted tasks not yet dispatched
   */
  get queuedTasks(): number {
    return this.waiting
  }

  get interval(): number {
    return this.minIntervalMs
  }
}
