/**
 * Core types for the fireworks event pipeline
 */

export interface ReferencePoint {
  latitude: number
  longitude: number
}

export interface Coordinates {
  lat: number
  lon: number
}

/**
 * Record as handed over by a source client. Nothing here is trusted:
 * any field may be missing or carry the wrong type.
 */
export interface RawEventRecord {
  title?: unknown
  location?: unknown
  locality?: unknown
  coordinates?: { lat?: unknown; lon?: unknown } | null
  start_time?: unknown
  end_time?: unknown
  description?: unknown
  source_event_id?: unknown
}

export interface Event {
  // Identity
  identityKey: string            // Derived from title + rounded coordinates + start time
  sourceEventId: string | null   // Source-specific ID, display only

  // Core event data
  title: string
  description: string
  startTime: Date | null
  endTime: Date | null

  // Location
  location: string
  locality: string | null
  coordinates: Coordinates
  distanceKm: number             // From the reference point, >= 0
}

export interface AggregatedResult {
  readonly events: readonly Event[]
  readonly count: number
  readonly closest: Event | null
  readonly generatedAt: Date
}

export type NormalizationFailureKind = 'MissingCoordinates' | 'MissingTitle' | 'InvalidCoordinates'

export interface NormalizationFailure {
  kind: NormalizationFailureKind
  reason: string
  raw: RawEventRecord
}

export type NormalizeResult =
  | { ok: true; event: Event }
  | { ok: false; failure: NormalizationFailure }

/**
 * Last-applied materialized fields of one calendar entry
 */
export interface CalendarEntrySnapshot {
  uid: string                    // Calendar entry handle
  title: string
  location: string
  coordinates: Coordinates
  startTime: string              // ISO-8601 UTC
  endTime: string
  description: string
  distanceKm: number
}

export type CalendarEntryState = ReadonlyMap<string, CalendarEntrySnapshot>

export interface CalendarUpdate {
  identityKey: string
  event: Event
}

export interface CalendarDiff {
  toAdd: Event[]
  toUpdate: CalendarUpdate[]
  toRemove: string[]
}

export type CalendarOperation = 'add' | 'update' | 'remove'

export interface ApplyOutcome {
  identityKey: string
  operation: CalendarOperation
  ok: boolean
  error?: Error
}

export interface EventQuery {
  postcode: string
  days: number
}

export type Clock = () => Date
