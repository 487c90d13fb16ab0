/**
 * Deadline helpers for outbound calls that take no AbortSignal.
 */

export class TimeoutError extends Error {
  constructor(
    readonly label: string,
    readonly timeoutMs: number
  ) {
    super(`${label} timed out after ${timeoutMs}ms`)
    this.name = 'TimeoutError'
  }
}

/**
 * Race `promise` against a timer. The timer is cleared once either side settles.
 *
 * @param label - Used in the TimeoutError message
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs)
  })

  return Promise.race([promise, deadline]).finally(() => clearTimeout(timer))
}
