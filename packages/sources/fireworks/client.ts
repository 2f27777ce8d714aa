/**
 * Fireworks listing API client
 *
 * Resolves a postcode to a location id, then fetches the events listed
 * for that location over the next N days and maps them to raw records.
 */

import { retry, errorForStatus, PermanentError, type RetryOptions } from '../../core/retry.js'
import { FetchError, toError } from '../../core/errors.js'
import type { EventQuery, RawEventRecord } from '../../core/types.js'

export const DEFAULT_BASE_URL = 'https://fireworks-tonight.au/api/v1/'
const REQUEST_TIMEOUT_MS = 10_000

/** Event as returned by the listing API */
export interface ApiEvent {
  id?: number | string
  name?: string
  rawlocation?: string
  date?: string
  start_time?: string
  end_time?: string
  description?: string
  source?: string
  location?: {
    locality?: string
    coordinates?: {
      latitude?: number | string | null
      longitude?: number | string | null
    }
  }
}

export type FetchFn = (url: string, init?: { signal?: AbortSignal }) => Promise<Response>

export interface FireworksClientOptions {
  baseUrl?: string
  fetch?: FetchFn
  retry?: RetryOptions
  timeoutMs?: number
}

export class FireworksClient {
  private baseUrl: string
  private fetchFn: FetchFn
  private retryOptions: RetryOptions
  private timeoutMs: number

  constructor(options: FireworksClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/?$/, '/')
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init))
    this.retryOptions = {
      onRetry: (error, attempt, delay) => {
        console.warn(`[fireworks:client] Attempt ${attempt} failed (${error.message}), retrying in ${delay}ms`)
      },
      ...options.retry
    }
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS
  }

  /**
   * Fetch raw records for a postcode
   * @throws FetchError when the postcode can't be resolved or the API keeps failing
   */
  async fetchEvents(query: EventQuery): Promise<RawEventRecord[]> {
    try {
      const locationId = await this.resolveLocationId(query.postcode)
      const events = await this.getJson(`events?location=${locationId}&days=${query.days}`)

      if (!Array.isArray(events)) {
        throw new PermanentError('events response is not a list')
      }

      return events.filter(isObject).map(event => toRawRecord(parseApiEvent(event)))
    } catch (error) {
      if (error instanceof FetchError) throw error
      const cause = toError(error)
      throw new FetchError(`Failed to fetch events for postcode ${query.postcode}: ${cause.message}`, cause)
    }
  }

  /**
   * Postcode -> "Locality, Postcode" -> location id
   */
  async resolveLocationId(postcode: string): Promise<number> {
    const matches = await this.getJson(`locations?startswith=${encodeURIComponent(postcode)}`)
    const first: unknown = Array.isArray(matches) ? matches[0] : undefined

    if (typeof first !== 'string' || !first.includes(',')) {
      throw new FetchError(`Could not find location for postcode: ${postcode}`)
    }

    const [locality, locationPostcode] = first.split(',').map(part => part.trim())
    const locations = await this.getJson(
      `locations?locality=${encodeURIComponent(locality.toLowerCase())}&postcode=${encodeURIComponent(locationPostcode)}`
    )

    const location: unknown = Array.isArray(locations) ? locations[0] : undefined
    const id = isObject(location) ? location.id : undefined
    if (typeof id !== 'number') {
      throw new FetchError(`Could not find location id for ${first}`)
    }

    return id
  }

  private async getJson(path: string): Promise<unknown> {
    const url = `${this.baseUrl}${path}`

    return retry(async () => {
      const response = await this.fetchFn(url, { signal: AbortSignal.timeout(this.timeoutMs) })
      if (!response.ok) {
        throw errorForStatus(response.status, response.statusText, url)
      }
      const body: unknown = await response.json()
      return body
    }, this.retryOptions)
  }
}

/**
 * Pick the known fields of an API event, dropping ones with unexpected types
 */
export function parseApiEvent(value: Record<string, unknown>): ApiEvent {
  const location = isObject(value.location) ? value.location : undefined
  const coordinates = location && isObject(location.coordinates) ? location.coordinates : undefined

  return {
    id: typeof value.id === 'number' || typeof value.id === 'string' ? value.id : undefined,
    name: optionalString(value.name),
    rawlocation: optionalString(value.rawlocation),
    date: optionalString(value.date),
    start_time: optionalString(value.start_time),
    end_time: optionalString(value.end_time),
    description: optionalString(value.description),
    source: optionalString(value.source),
    location: location
      ? {
          locality: optionalString(location.locality),
          coordinates: coordinates
            ? { latitude: coordinateValue(coordinates.latitude), longitude: coordinateValue(coordinates.longitude) }
            : undefined
        }
      : undefined
  }
}

/**
 * Map an API event to a raw record
 */
export function toRawRecord(event: ApiEvent): RawEventRecord {
  const coordinates = event.location?.coordinates

  return {
    title: event.name,
    location: event.rawlocation,
    locality: event.location?.locality,
    coordinates: coordinates
      ? { lat: coordinates.latitude, lon: coordinates.longitude }
      : null,
    start_time: combineDateTime(event.date, event.start_time),
    end_time: combineDateTime(event.date, event.end_time),
    description: event.description ?? '',
    source_event_id: event.id
  }
}

/**
 * Combine the API's separate date and time-of-day fields into a local ISO timestamp
 * Accepts YYYY-MM-DD, DD-MM-YYYY or DD/MM/YYYY dates and HH:MM or HH:MM:SS times.
 * A time that is already a full timestamp is passed through.
 *
 * @example combineDateTime('2025-11-25', '20:15') // '2025-11-25T20:15'
 */
export function combineDateTime(date: string | undefined, time: string | undefined): string | undefined {
  if (!time) return undefined

  const trimmedTime = time.trim()
  if (/^\d{4}-\d{2}-\d{2}[T ]/.test(trimmedTime)) return trimmedTime
  if (!date) return undefined

  const isoDate = toIsoDate(date.trim())
  if (!isoDate || !/^\d{2}:\d{2}(:\d{2})?$/.test(trimmedTime)) {
    // Left as-is: the normalizer turns it into a null time
    return `${date} ${time}`
  }

  return `${isoDate}T${trimmedTime}`
}

function toIsoDate(date: string): string | null {
  if (/^\d{4}-\d{2}-\d{2}$/.test(date)) return date

  const match = /^(\d{2})[-/](\d{2})[-/](\d{4})$/.exec(date)
  if (match) {
    const [, day, month, year] = match
    return `${year}-${month}-${day}`
  }

  return null
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function coordinateValue(value: unknown): number | string | null {
  return typeof value === 'number' || typeof value === 'string' ? value : null
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null
}
