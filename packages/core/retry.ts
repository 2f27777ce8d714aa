/**
 * Retry with exponential backoff for source requests
 *
 * Distinguishes permanent failures (bad postcode, 404) from transient ones
 * (timeouts, 429, 5xx). Only transient failures are retried.
 */

export class PermanentError extends Error {
  cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = 'PermanentError'
    this.cause = cause
  }
}

export class TransientError extends Error {
  cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = 'TransientError'
    this.cause = cause
  }
}

export interface RetryOptions {
  /** Maximum number of attempts (default: 3) */
  maxAttempts?: number
  /** Initial delay in ms (default: 1000) */
  initialDelay?: number
  /** Maximum delay in ms (default: 30000) */
  maxDelay?: number
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier?: number
  shouldRetry?: (error: Error) => boolean
  /** Called before each retry attempt */
  onRetry?: (error: Error, attempt: number, delay: number) => void
  /** Injectable for tests */
  sleep?: (ms: number) => Promise<void>
}

const TRANSIENT_PATTERNS = [
  'timeout',
  'aborted',
  'econnreset',
  'econnrefused',
  'etimedout',
  'fetch failed',
  'network',
  'rate limit',
  'too many requests',
  'service unavailable'
]

export function isTransient(error: Error): boolean {
  if (error instanceof PermanentError) return false
  if (error instanceof TransientError) return true

  const message = error.message.toLowerCase()
  return TRANSIENT_PATTERNS.some(pattern => message.includes(pattern))
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
  shouldRetry: isTransient,
  onRetry: () => {},
  sleep: ms => new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Map a non-OK HTTP status to the matching error category
 */
export function errorForStatus(status: number, statusText: string, url: string): Error {
  const message = `HTTP ${status} ${statusText} for ${url}`
  if (status === 408 || status === 429 || status >= 500) {
    return new TransientError(message)
  }
  return new PermanentError(message)
}

/**
 * Execute a function with retry logic
 *
 * @example
 * const body = await retry(() => getJson(url), {
 *   maxAttempts: 5,
 *   onRetry: (error, attempt) => console.log(`Retry ${attempt}: ${error.message}`)
 * })
 */
export async function retry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const config = { ...DEFAULT_OPTIONS, ...options }
  let attempt = 1

  for (;;) {
    try {
      return await fn()
    } catch (error) {
      const lastError = error instanceof Error ? error : new Error(String(error))

      if (!config.shouldRetry(lastError) || attempt >= config.maxAttempts) {
        throw lastError
      }

      const delay = Math.min(
        config.initialDelay * Math.pow(config.backoffMultiplier, attempt - 1),
        config.maxDelay
      )

      config.onRetry(lastError, attempt, delay)
      await config.sleep(delay)
      attempt++
    }
  }
}
