/**
 * Result type for error handling without exceptions.
 * Services return Result<T> and never throw; handlers decide what reaches the channel.
 */
export type Result<T> = { ok: true; data: T } | { ok: false; error: string }

export function ok<T>(data: T): Result<T> {
  return { ok: true, data }
}

export function err<T>(error: string): Result<T> {
  return { ok: false, error }
}

/**
 * Settle a promise from a throwing API into a Result.
 */
export async function toResult<T>(promise: Promise<T>): Promise<Result<T>> {
  try {
    return ok(await promise)
  } catch (error) {
    return err(error instanceof Error ? error.message : String(error))
  }
}
