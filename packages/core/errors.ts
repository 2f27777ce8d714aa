/**
 * Error taxonomy for the fireworks pipeline
 *
 * Follows the same shape as PermanentError/TransientError in retry.ts:
 * a named Error subclass with an optional cause.
 */

import type { CalendarOperation } from './types.js'

/**
 * Invalid input to a pure calculation (coordinates, configuration values)
 */
export class ValidationError extends Error {
  cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = 'ValidationError'
    this.cause = cause
  }
}

/**
 * The remote source could not be read for this cycle
 */
export class FetchError extends Error {
  cause?: Error

  constructor(message: string, cause?: Error) {
    super(message)
    this.name = 'FetchError'
    this.cause = cause
  }
}

/**
 * A single calendar write failed; its effect on the committed state is withheld
 */
export class ApplyError extends Error {
  cause?: Error
  identityKey: string
  operation: CalendarOperation

  constructor(identityKey: string, operation: CalendarOperation, message: string, cause?: Error) {
    super(message)
    this.name = 'ApplyError'
    this.identityKey = identityKey
    this.operation = operation
    this.cause = cause
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}
