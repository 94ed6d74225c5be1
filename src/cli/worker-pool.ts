/**
 * Worker Pool
 *
 * Run async tasks with bounded concurrency.
 * N workers pull tasks from a shared queue; results keep the task order.
 *
 * Usage:
 * ```typescript
 * const { results } = await runWorkerPool(
 *   cells,
 *   async (cell) => renderCourse(cell),
 *   { concurrency: 4, onProgress: ({ completed, total }) => logger.progress('', completed, total) }
 * )
 * ```
 */

const DEFAULT_CONCURRENCY = 4

/**
 * Task processor function type.
 * @param index Original index of the task in the array
 */
type TaskProcessor<T, R> = (task: T, index: number) => Promise<R>

/**
 * Progress callback info.
 */
export interface WorkerProgressInfo<R> {
  /** Task index (0-based) */
  readonly index: number
  readonly total: number
  /** Number of completed tasks so far, failed ones included */
  readonly completed: number
  readonly result: R
}

export interface WorkerPoolOptions<R> {
  /** Number of concurrent workers (default 4) */
  readonly concurrency?: number | undefined
  /** Called after each task completes successfully */
  readonly onProgress?: ((info: WorkerProgressInfo<R>) => void) | undefined
}

export interface WorkerPoolResult<R> {
  /** Results in original task order (undefined for failed tasks) */
  readonly results: ReadonlyArray<R | undefined>
  /** Tasks that threw, by index */
  readonly errors: ReadonlyArray<{ readonly index: number; readonly error: Error }>
}

/**
 * Run tasks through a worker pool.
 *
 * A task that throws is recorded in `errors` and the others keep running.
 */
export async function runWorkerPool<T, R>(
  tasks: readonly T[],
  processor: TaskProcessor<T, R>,
  options: WorkerPoolOptions<R> = {}
): Promise<WorkerPoolResult<R>> {
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY)
  const slots: Array<{ result: R } | undefined> = new Array(tasks.length)
  const errors: Array<{ index: number; error: Error }> = []

  let nextIndex = 0
  let completed = 0

  async function worker(): Promise<void> {
    while (nextIndex < tasks.length) {
      // Claim the next task before awaiting anything
      const index = nextIndex++
      const task = tasks[index]
      if (task === undefined) continue

      try {
        const result = await processor(task, index)
        slots[index] = { result }
        completed++
        options.onProgress?.({ index, total: tasks.length, completed, result })
      } catch (e) {
        errors.push({ index, error: e instanceof Error ? e : new Error(String(e)) })
        completed++
      }
    }
  }

  const workerCount = Math.min(concurrency, tasks.length)
  await Promise.all(Array.from({ length: workerCount }, () => worker()))

  errors.sort((a, b) => a.index - b.index)
  return { results: Array.from(slots, (slot) => slot?.result), errors }
}
