import { ExtractionFailure, errorMessage } from '@domain/errors/LarderError.ts'

export interface RetryPolicy {
  /** Extra attempts after the first one. */
  retries: number
  timeoutMs: number
  /** First backoff delay; doubles on each further retry. */
  backoffMs: number
}

export interface RetryOutcome<T> {
  value: T
  tries: number
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

function toFailure(method: string, err: unknown): ExtractionFailure {
  return err instanceof ExtractionFailure ? err : new ExtractionFailure(method, errorMessage(err), { cause: err })
}

async function withTimeout<T>(
  method: string,
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  const controller = new AbortController()
  let timer: ReturnType<typeof setTimeout> | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort()
      reject(new ExtractionFailure(method, `timed out after ${timeoutMs} ms`))
    }, timeoutMs)
  })
  try {
    return await Promise.race([operation(controller.signal), timeout])
  } finally {
    clearTimeout(timer)
  }
}

/**
 * Run a provider call under a per-call timeout, retrying failures up to
 * `policy.retries` times with exponential backoff. Non-retryable failures
 * (the payload is simply not readable this way) stop immediately. `method`
 * labels failures and log lines.
 */
export async function callWithRetry<T>(
  method: string,
  operation: (signal: AbortSignal) => Promise<T>,
  policy: RetryPolicy,
): Promise<RetryOutcome<T>> {
  let tries = 0
  for (;;) {
    tries++
    try {
      return { value: await withTimeout(method, operation, policy.timeoutMs), tries }
    } catch (err) {
      const failure = toFailure(method, err)
      failure.tries = tries
      if (!failure.retryable || tries > policy.retries) throw failure
      const delay = policy.backoffMs * 2 ** (tries - 1)
      console.warn(`[Larder] ${method} attempt ${tries} failed, retrying in ${delay} ms:`, failure.message)
      await sleep(delay)
    }
  }
}
