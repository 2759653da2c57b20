import { ConcurrencyController } from './concurrencyController'

const nextTick = () => new Promise<void>((resolve) => setImmediate(resolve))

describe('ConcurrencyController', () => {
  it('should return results in task order regardless of completion order', async () => {
    const controller = new ConcurrencyController(3)
    const completed: number[] = []

    const tasks = [3, 1, 2].map((ticks, index) => async () => {
      for (let i = 0; i < ticks; i++) {
        await nextTick()
      }
      completed.push(index)
      return index * 10
    })

    const results = await controller.execute(tasks)

    expect(completed).toEqual([1, 2, 0])
    expect(results).toEqual([
      { status: 'fulfilled', value: 0 },
      { status: 'fulfilled', value: 10 },
      { status: 'fulfilled', value: 20 }
    ])
  })

  it('should never run more than the configured number of tasks at once', async () => {
    const controller = new ConcurrencyController(2)
    let running = 0
    let peak = 0

    const tasks = Array.from({ length: 6 }, () => async () => {
      running++
      peak = Math.max(peak, running, controller.currentlyRunning)
      await nextTick()
      running--
    })

    await controller.execute(tasks)

    expect(peak).toBe(2)
    expect(controller.currentlyRunning).toBe(0)
  })

  it('should settle a rejected task without stopping the others', async () => {
    const controller = new ConcurrencyController(1)
    const failure = new Error('solver unavailable')

    const results = await controller.execute<string>([
      async () => 'first',
      async () => {
        throw failure
      },
      async () => 'third'
    ])

    expect(results).toEqual([
      { status: 'fulfilled', value: 'first' },
      { status: 'rejected', reason: failure },
      { status: 'fulfilled', value: 'third' }
    ])
  })

  it('should return an empty list for no tasks', async () => {
    await expect(new ConcurrencyController().execute([])).resolves.toEqual([])
  })

  it('should expose its limit', () => {
    expect(new ConcurrencyController().maxConcurrentTasks).toBe(4)
  })

  it('should reject a non-positive limit', () => {
    expect(() => new ConcurrencyController(0)).toThrow('maxConcurrent must be a positive integer')
    expect(() => new ConcurrencyController(1.5)).toThrow('maxConcurrent must be a positive integer')
  })
})
