/**
 * Root configuration for the fireworks integration
 *
 * Read from the environment (the CLI loads .env through dotenv first).
 */

import { ValidationError } from './packages/core/errors.js'
import type { ReferencePoint } from './packages/core/types.js'
import { DEFAULT_BASE_URL } from './packages/sources/fireworks/client.js'

export interface FireworksConfig {
  /** Australian postcode the listing API is queried for (4 digits) */
  postcode: string
  /** Inclusive search radius; 0 disables the search */
  maxDistanceKm: number
  /** Days of listings to fetch (today + upcoming) */
  days: number
  refreshIntervalMinutes: number
  baseUrl: string
  /** Home location every distance is measured from */
  reference: ReferencePoint
}

export const DEFAULT_MAX_DISTANCE_KM = 10
export const DEFAULT_DAYS = 7
export const DEFAULT_REFRESH_MINUTES = 60

type Env = Record<string, string | undefined>

export function loadConfig(env: Env = process.env): FireworksConfig {
  const postcode = (env.FIREWORKS_POSTCODE ?? '').trim()
  if (!/^\d{4}$/.test(postcode)) {
    throw new ValidationError(`FIREWORKS_POSTCODE must be a 4-digit postcode, got "${postcode}"`)
  }

  const latitude = requireNumber(env, 'HOME_LATITUDE')
  const longitude = requireNumber(env, 'HOME_LONGITUDE')
  if (latitude < -90 || latitude > 90) {
    throw new ValidationError(`HOME_LATITUDE out of range: ${latitude}`)
  }
  if (longitude < -180 || longitude > 180) {
    throw new ValidationError(`HOME_LONGITUDE out of range: ${longitude}`)
  }

  const days = optionalNumber(env, 'FIREWORKS_DAYS', DEFAULT_DAYS)
  if (!Number.isInteger(days) || days < 1) {
    throw new ValidationError(`FIREWORKS_DAYS must be a positive integer, got ${days}`)
  }

  const refreshIntervalMinutes = optionalNumber(env, 'FIREWORKS_REFRESH_MINUTES', DEFAULT_REFRESH_MINUTES)
  if (refreshIntervalMinutes <= 0) {
    throw new ValidationError(`FIREWORKS_REFRESH_MINUTES must be positive, got ${refreshIntervalMinutes}`)
  }

  return {
    postcode,
    maxDistanceKm: optionalNumber(env, 'FIREWORKS_MAX_DISTANCE_KM', DEFAULT_MAX_DISTANCE_KM),
    days,
    refreshIntervalMinutes,
    baseUrl: env.FIREWORKS_API_URL?.trim() || DEFAULT_BASE_URL,
    reference: { latitude, longitude }
  }
}

function requireNumber(env: Env, name: string): number {
  const raw = env[name]?.trim()
  if (!raw) {
    throw new ValidationError(`Missing ${name} environment variable`)
  }
  return parseNumber(name, raw)
}

function optionalNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name]?.trim()
  return raw ? parseNumber(name, raw) : fallback
}

function parseNumber(name: string, raw: string): number {
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new ValidationError(`${name} must be a number, got "${raw}"`)
  }
  return value
}
