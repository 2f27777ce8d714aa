/**
 * Display views over an aggregated result
 *
 * Flat attribute records for the count, event list and closest-event
 * displays, plus the calendar projection (entries, range query, next event).
 */

import { calendarUid } from './fingerprint.js'
import { isEligible } from './reconcile.js'
import type { AggregatedResult, Event } from './types.js'

export interface ViewContext {
  postcode: string
  maxDistanceKm: number
  now: Date
}

export type ViewAttributes = Record<string, string | number | null | object>

export interface View<T extends string | number> {
  state: T
  attributes: ViewAttributes
}

export interface CalendarEntry {
  uid: string
  summary: string
  description: string
  location: string
  start: Date
  end: Date
}

/**
 * Local calendar day of a date as YYYY-MM-DD
 */
export function localDay(date: Date): string {
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  return `${year}-${month}-${day}`
}

/**
 * Events starting on the given local day, in result order
 */
export function eventsOnDay(result: AggregatedResult, day: string): Event[] {
  return result.events.filter(event => event.startTime !== null && localDay(event.startTime) === day)
}

function baseAttributes(context: ViewContext): ViewAttributes {
  return {
    postcode: context.postcode,
    max_distance_km: context.maxDistanceKm,
    last_updated: context.now.toISOString()
  }
}

export function buildCountView(events: readonly Event[], context: ViewContext): View<number> {
  return {
    state: events.length,
    attributes: { ...baseAttributes(context), unit_of_measurement: 'events' }
  }
}

export function describeCount(count: number): string {
  if (count === 0) return 'No events'
  if (count === 1) return '1 event'
  return `${count} events`
}

export function buildEventsView(events: readonly Event[], context: ViewContext): View<string> {
  const attributes: ViewAttributes = {
    ...baseAttributes(context),
    event_count: events.length,
    events: events.map(toDetail)
  }

  // Flattened per-rank keys: event_1_title, event_1_location, ...
  events.forEach((event, index) => {
    const rank = index + 1
    attributes[`event_${rank}_title`] = event.title
    attributes[`event_${rank}_location`] = event.location
    attributes[`event_${rank}_distance_km`] = event.distanceKm
    attributes[`event_${rank}_start_time`] = event.startTime ? event.startTime.toISOString() : 'Unknown'
  })

  return { state: describeCount(events.length), attributes }
}

export function buildClosestView(events: readonly Event[], context: ViewContext): View<string> {
  const attributes: ViewAttributes = {
    ...baseAttributes(context),
    total_events: events.length
  }

  // Events arrive sorted, so the first one is the closest
  const closest = events[0]
  if (!closest) {
    return { state: 'No events', attributes }
  }

  return {
    state: closest.location,
    attributes: { ...attributes, ...toDetail(closest) }
  }
}

function toDetail(event: Event): ViewAttributes {
  return {
    title: event.title,
    location: event.location,
    locality: event.locality,
    distance_km: event.distanceKm,
    coordinates: { lat: event.coordinates.lat, lon: event.coordinates.lon },
    latitude: event.coordinates.lat,
    longitude: event.coordinates.lon,
    start_time: event.startTime ? event.startTime.toISOString() : null,
    end_time: event.endTime ? event.endTime.toISOString() : null,
    description: event.description
  }
}

/**
 * Calendar entry body: description, distance line, coordinates line
 */
export function buildCalendarDescription(event: Event): string {
  const parts: string[] = []

  if (event.description) {
    parts.push(event.description)
  }
  parts.push(`Distance: ${event.distanceKm.toFixed(1)} km from home`)
  parts.push(`Coordinates: ${event.coordinates.lat}, ${event.coordinates.lon}`)

  return parts.join('\n\n')
}

export function toCalendarEntry(event: Event & { startTime: Date; endTime: Date }): CalendarEntry {
  return {
    uid: calendarUid(event.identityKey),
    summary: event.location,
    description: buildCalendarDescription(event),
    location: event.location,
    start: event.startTime,
    end: event.endTime
  }
}

export function toCalendarEntries(result: AggregatedResult): CalendarEntry[] {
  const entries: CalendarEntry[] = []
  for (const event of result.events) {
    if (isEligible(event)) {
      entries.push(toCalendarEntry(event))
    }
  }
  return entries
}

/**
 * Entries overlapping [start, end)
 */
export function eventsInRange(entries: readonly CalendarEntry[], start: Date, end: Date): CalendarEntry[] {
  return entries.filter(entry => entry.start.getTime() < end.getTime() && entry.end.getTime() > start.getTime())
}

/**
 * Earliest-starting entry that has not ended yet
 */
export function nextUpcoming(entries: readonly CalendarEntry[], now: Date): CalendarEntry | null {
  const upcoming = entries
    .filter(entry => entry.end.getTime() > now.getTime())
    .sort((a, b) => a.start.getTime() - b.start.getTime())

  return upcoming[0] ?? null
}

export function buildCalendarView(result: AggregatedResult, context: ViewContext): View<string> {
  const entries = toCalendarEntries(result)
  const next = nextUpcoming(entries, context.now)

  return {
    state: next ? next.summary : 'No events',
    attributes: {
      postcode: context.postcode,
      total_events: result.count,
      last_updated: result.generatedAt.toISOString(),
      next_start: next ? next.start.toISOString() : null,
      next_end: next ? next.end.toISOString() : null
    }
  }
}
