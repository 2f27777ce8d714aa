/**
 * Event aggregation
 *
 * Filters normalized events to the configured radius and produces the
 * published result for one refresh cycle.
 */

import type { AggregatedResult, Clock, Event } from './types.js'

const systemClock: Clock = () => new Date()

/**
 * Order by distance, then identity key so equal distances stay deterministic
 */
export function compareEvents(a: Event, b: Event): number {
  if (a.distanceKm !== b.distanceKm) {
    return a.distanceKm - b.distanceKm
  }
  if (a.identityKey < b.identityKey) return -1
  if (a.identityKey > b.identityKey) return 1
  return 0
}

/**
 * Aggregate events within maxDistanceKm of the reference point
 * @param events - Normalized events (not mutated)
 * @param maxDistanceKm - Inclusive radius; zero or less disables the search
 * @param clock - Source of generatedAt
 */
export function aggregate(
  events: readonly Event[],
  maxDistanceKm: number,
  clock: Clock = systemClock
): AggregatedResult {
  const generatedAt = clock()

  if (!Number.isFinite(maxDistanceKm) || maxDistanceKm <= 0) {
    return freeze([], generatedAt)
  }

  // Source is not guaranteed unique: keep the first occurrence of each key
  const seen = new Set<string>()
  const unique: Event[] = []
  for (const event of events) {
    if (seen.has(event.identityKey)) continue
    seen.add(event.identityKey)
    unique.push(event)
  }

  const nearby = unique
    .filter(event => event.distanceKm <= maxDistanceKm)
    .sort(compareEvents)

  return freeze(nearby, generatedAt)
}

function freeze(events: Event[], generatedAt: Date): AggregatedResult {
  return Object.freeze({
    events: Object.freeze(events),
    count: events.length,
    closest: events[0] ?? null,
    generatedAt
  })
}
