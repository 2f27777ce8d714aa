/**
 * Great-circle distance on a spherical earth
 */

import { ValidationError } from './errors.js'

export const EARTH_RADIUS_KM = 6371

export interface LatLon {
  lat: number
  lon: number
}

function assertValid(point: LatLon, label: string): void {
  if (!Number.isFinite(point.lat) || !Number.isFinite(point.lon)) {
    throw new ValidationError(`${label} is not a finite coordinate: (${point.lat}, ${point.lon})`)
  }
  if (point.lat < -90 || point.lat > 90) {
    throw new ValidationError(`${label} latitude out of range: ${point.lat}`)
  }
  if (point.lon < -180 || point.lon > 180) {
    throw new ValidationError(`${label} longitude out of range: ${point.lon}`)
  }
}

function toRadians(degrees: number): number {
  return degrees * Math.PI / 180
}

/**
 * Haversine distance in kilometers between two points in decimal degrees
 *
 * @throws ValidationError when either point is non-finite or out of range
 */
export function distanceKm(a: LatLon, b: LatLon): number {
  assertValid(a, 'first point')
  assertValid(b, 'second point')

  const lat1 = toRadians(a.lat)
  const lat2 = toRadians(b.lat)
  const dLat = lat2 - lat1
  const dLon = toRadians(b.lon - a.lon)

  const h = Math.sin(dLat / 2) ** 2 + Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2
  // Clamp: rounding can push h a hair above 1 for antipodal points
  const c = 2 * Math.asin(Math.sqrt(Math.min(1, h)))

  return c * EARTH_RADIUS_KM
}
