/**
 * Identity keys for reconciliation
 * Creates a stable hash from title + rounded coordinates + start time
 */

import { createHash } from 'crypto'
import type { Coordinates } from './types.js'

/** Decimal places kept from source coordinates (~1 m), absorbs float jitter */
export const COORDINATE_PRECISION = 5

export function generateIdentityKey(
  title: string,
  coordinates: Coordinates,
  startTime: Date | null
): string {
  // Trimmed, case preserved
  const normalizedTitle = title.trim()

  const location = `${roundCoordinate(coordinates.lat)},${roundCoordinate(coordinates.lon)}`

  const parts = [normalizedTitle, location]
  if (startTime) {
    parts.push(startTime.toISOString())
  }

  return createHash('sha256')
    .update(parts.join('::'))
    .digest('hex')
    .substring(0, 32)
}

/**
 * Fixed-precision coordinate; values rounding to zero lose their sign so
 * jitter across the equator or meridian keeps the same key
 */
export function roundCoordinate(value: number): string {
  const rounded = value.toFixed(COORDINATE_PRECISION)
  return /^-0\.0+$/.test(rounded) ? rounded.slice(1) : rounded
}

/**
 * Calendar entry handle for an identity key
 */
export function calendarUid(identityKey: string): string {
  return `fireworks_${identityKey}`
}
