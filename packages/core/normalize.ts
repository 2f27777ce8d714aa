/**
 * Event Normalization
 *
 * Transforms raw source records into the canonical Event schema:
 * - validates title and coordinates
 * - parses start/end times (unparsable times become null)
 * - computes distance from the reference point and the identity key
 */

import { generateIdentityKey } from './fingerprint.js'
import { distanceKm } from './geo.js'
import { ValidationError } from './errors.js'
import type {
  Event,
  NormalizationFailure,
  NormalizationFailureKind,
  NormalizeResult,
  RawEventRecord,
  ReferencePoint
} from './types.js'

const DEFAULT_LOCATION = 'Unknown Location'

// Date, optional time (T or space), optional seconds/fraction, optional zone
const ISO_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/

export interface BatchResult {
  events: Event[]
  failures: NormalizationFailure[]
}

/**
 * Normalize a single raw record against the reference point
 * @param raw - Record from a source client
 * @param reference - Point all distances are measured from
 * @returns The event, or the reason it was rejected
 */
export function normalizeRecord(raw: RawEventRecord, reference: ReferencePoint): NormalizeResult {
  const lat = toNumber(raw.coordinates?.lat)
  const lon = toNumber(raw.coordinates?.lon)

  if (lat === null || lon === null) {
    return fail('MissingCoordinates', 'coordinates missing or not numeric', raw)
  }

  const title = typeof raw.title === 'string' ? raw.title.trim() : ''
  if (!title) {
    return fail('MissingTitle', 'title missing or blank', raw)
  }

  let distance: number
  try {
    distance = distanceKm(
      { lat: reference.latitude, lon: reference.longitude },
      { lat, lon }
    )
  } catch (error) {
    if (error instanceof ValidationError) {
      return fail('InvalidCoordinates', error.message, raw)
    }
    throw error
  }

  const coordinates = { lat, lon }
  const startTime = parseTimestamp(raw.start_time)
  const endTime = parseTimestamp(raw.end_time)

  return {
    ok: true,
    event: {
      identityKey: generateIdentityKey(title, coordinates, startTime),
      sourceEventId: toOptionalString(raw.source_event_id),

      title,
      description: typeof raw.description === 'string' ? raw.description : '',
      startTime,
      endTime,

      location: toOptionalString(raw.location) ?? DEFAULT_LOCATION,
      locality: toOptionalString(raw.locality),
      coordinates,
      distanceKm: Math.round(distance * 100) / 100
    }
  }
}

/**
 * Normalize a batch of records
 * Bad records are collected as failures and never abort the batch.
 */
export function normalizeRecords(raws: readonly RawEventRecord[], reference: ReferencePoint): BatchResult {
  const events: Event[] = []
  const failures: NormalizationFailure[] = []

  for (const raw of raws) {
    const result = normalizeRecord(raw, reference)
    if (result.ok) {
      events.push(result.event)
    } else {
      failures.push(result.failure)
    }
  }

  return { events, failures }
}

/**
 * Parse an ISO-8601 date or datetime string
 * Zone-less values, date-only ones included, are read as local time.
 * Dates that don't exist (2025-02-30) and out-of-range times are rejected.
 * @returns Date, or null when the value is missing or unparsable
 */
export function parseTimestamp(value: unknown): Date | null {
  if (typeof value !== 'string') return null

  const match = ISO_PATTERN.exec(value.trim())
  if (!match) return null

  const [, yearText, monthText, dayText, hourText, minuteText, secondText, fraction, zone] = match
  const year = Number(yearText)
  const month = Number(monthText)
  const day = Number(dayText)

  if (!isCalendarDate(year, month, day)) return null

  // Date-only: local midnight
  if (hourText === undefined) {
    return new Date(year, month - 1, day)
  }

  const hour = Number(hourText)
  const minute = Number(minuteText)
  const second = secondText === undefined ? 0 : Number(secondText)
  if (hour > 23 || minute > 59 || second > 59) return null

  const time = `${hourText}:${minuteText}:${secondText ?? '00'}${fraction ?? ''}`
  const date = new Date(`${yearText}-${monthText}-${dayText}T${time}${normalizeZone(zone)}`)
  return Number.isNaN(date.getTime()) ? null : date
}

// Helper functions

function fail(kind: NormalizationFailureKind, reason: string, raw: RawEventRecord): NormalizeResult {
  return { ok: false, failure: { kind, reason, raw } }
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false
  // Day 0 of the next month is the last day of this one
  const daysInMonth = new Date(Date.UTC(year, month, 0)).getUTCDate()
  return day <= daysInMonth
}

// "+1000" -> "+10:00"
function normalizeZone(zone: string | undefined): string {
  if (!zone || zone === 'Z') return zone ?? ''
  return zone.includes(':') ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.trim())
    return Number.isFinite(parsed) ? parsed : null
  }
  return null
}

function toOptionalString(value: unknown): string | null {
  if (typeof value === 'number' && Number.isFinite(value)) return String(value)
  if (typeof value !== 'string') return null
  const trimmed = value.trim()
  return trimmed || null
}
