import { logger as defaultLogger, errorMessage, type Logger } from '../utils/logger.js'

export type QueueTask = () => Promise<unknown>

export interface SerialQueue {
  /** Append a task; resolves once it has run (whether it failed or not). */
  push(task: QueueTask): Promise<void>
  /** Tasks queued or running. */
  pending(): number
  /** Resolves when everything pushed so far has run. */
  idle(): Promise<void>
}

/**
 * Run tasks one at a time in push order.
 * A rejected task is logged and the queue moves on.
 */
export function createSerialQueue(log: Logger = defaultLogger): SerialQueue {
  let tail: Promise<void> = Promise.resolve()
  let pendingCount = 0

  const push = (task: QueueTask): Promise<void> => {
    pendingCount++
    tail = tail
      .then(task)
      .then(
        () => undefined,
        (error: unknown) => {
          log.error('Queued task failed', {
            event: 'queue_task_error',
            error: errorMessage(error),
          })
        }
      )
      .finally(() => {
        pendingCount--
      })
    return tail
  }

  return {
    push,
    pending: () => pendingCount,
    idle: () => tail,
  }
}
