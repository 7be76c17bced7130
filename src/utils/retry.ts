import { MAX_ATTEMPTS, MAX_BACKOFF_MS, MIN_BACKOFF_MS } from '../constants.js'

// Types

export interface BackoffOptions {
  maxAttempts?: number
  minDelayMs?: number
  maxDelayMs?: number
}

export interface WithRetryOptions extends BackoffOptions {
  isRetryableError?: (error: unknown) => boolean
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void
}

export interface FetchWithRetryOptions extends BackoffOptions {
  headers?: Record<string, string>
  timeoutMs: number
  fetch?: typeof fetch
  // Runs each attempt, e.g. inside a concurrency slot. The timeout starts once it is running.
  limit?: (attempt: () => Promise<Response>) => Promise<Response>
}

// Helpers

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

export function backoffDelay(attempt: number, minDelayMs = MIN_BACKOFF_MS, maxDelayMs = MAX_BACKOFF_MS): number {
  return Math.min(minDelayMs * 2 ** attempt, maxDelayMs)
}

export function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.message.toLowerCase().includes('timeout'))
}

// fetch() rejects with a TypeError for DNS, connection and socket failures.
export function isTransportError(error: unknown): boolean {
  return (
    error instanceof TypeError &&
    (error.message === 'fetch failed' || error.message === 'Failed to fetch' || error.message.includes('network'))
  )
}

export function isTransientError(error: unknown): boolean {
  return isTimeoutError(error) || isTransportError(error)
}

// Main Functions

export async function withRetry<T>(fn: () => Promise<T>, options: WithRetryOptions = {}): Promise<T> {
  const { isRetryableError, onRetry, maxAttempts = MAX_ATTEMPTS, minDelayMs, maxDelayMs } = options

  let lastError: unknown

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn()
    } catch (error) {
      lastError = error

      if (attempt < maxAttempts - 1 && isRetryableError?.(error)) {
        const delayMs = backoffDelay(attempt, minDelayMs, maxDelayMs)

        onRetry?.(error, attempt + 1, delayMs)

        await delay(delayMs)

        continue
      }

      throw error
    }
  }

  throw lastError ?? new Error('Retries exhausted')
}

// Only transport-level failures are retried. Any HTTP response, including 4xx/5xx, is returned to the caller.
export async function fetchWithRetry(url: string, options: FetchWithRetryOptions): Promise<Response> {
  const { headers, timeoutMs, fetch: fetchFn = fetch, limit = attempt => attempt(), ...backoff } = options

  return withRetry(
    () => limit(() => fetchFn(url, { headers, signal: AbortSignal.timeout(timeoutMs), redirect: 'follow' })),
    { ...backoff, isRetryableError: isTransientError }
  )
}
