/**
 * ConcurrencyController runs Promise-returning tasks with a cap on how many
 * are in flight. Results come back in task order, whatever the completion
 * order, and a rejected task never stops the others.
 */
export class ConcurrencyController {
  private readonly maxConcurrent: number
  private runningTasks = 0

  constructor(maxConcurrent: number = 4) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent <= 0) {
      throw new Error('maxConcurrent must be a positive integer')
    }
    this.maxConcurrent = maxConcurrent
  }

  async execute<T>(tasks: ReadonlyArray<() => Promise<T>>): Promise<PromiseSettledResult<T>[]> {
    if (tasks.length === 0) {
      return []
    }

    const results: PromiseSettledResult<T>[] = new Array(tasks.length)
    let nextIndex = 0

    // Each worker pulls the next unstarted task until none remain
    const worker = async (): Promise<void> => {
      while (nextIndex < tasks.length) {
        const taskIndex = nextIndex++
        this.runningTasks++
        try {
          results[taskIndex] = { status: 'fulfilled', value: await tasks[taskIndex]() }
        } catch (reason) {
          results[taskIndex] = { status: 'rejected', reason }
        } finally {
          this.runningTasks--
        }
      }
    }

    const workerCount = Math.min(tasks.length, this.maxConcurrent)
    await Promise.all(Array.from({ length: workerCount }, () => worker()))

    return results
  }

  /**
   * Get the current number of running tasks
   */
  get currentlyRunning(): number {
    return this.runningTasks
  }

  /**
   * Get the maximum concurrent tasks allowed
   */
  get maxConcurrentTasks(): number {
    return this.maxConcurrent
  }
}
