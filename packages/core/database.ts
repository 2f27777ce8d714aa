/**
 * Database operations (Supabase)
 *
 * Two roles, one backing project:
 * - CalendarStateStore: the reconciler's committed state, survives restarts
 * - CalendarSink: the materialized calendar entries, written per operation
 *
 * Can be swapped out for other databases without changing core logic.
 */

import { createClient, SupabaseClient } from '@supabase/supabase-js'
import { ApplyError, errorMessage } from './errors.js'
import { isEligible } from './reconcile.js'
import { toCalendarEntry } from './views.js'
import { calendarUid } from './fingerprint.js'
import type {
  ApplyOutcome,
  CalendarDiff,
  CalendarEntrySnapshot,
  CalendarEntryState,
  CalendarOperation,
  Event
} from './types.js'

export interface CalendarStateStore {
  loadCalendarState(): Promise<CalendarEntryState>
  saveCalendarState(state: CalendarEntryState): Promise<void>
}

export interface CalendarSink {
  /** Applies each operation independently and reports every outcome */
  applyCalendarDiff(diff: CalendarDiff): Promise<ApplyOutcome[]>
}

export const STATE_TABLE = 'calendar_entry_state'
export const EVENTS_TABLE = 'calendar_events'

// Supabase has a limit on batch size; also the page size for reads
export const BATCH_SIZE = 500

type StateRow = {
  identity_key: string
  uid: string
  snapshot: CalendarEntrySnapshot
  updated_at: string
}

type CalendarEventRow = {
  uid: string
  identity_key: string
  summary: string
  description: string
  location: string
  start_at: string
  end_at: string
  lat: number
  lng: number
  distance_km: number
  updated_at: string
}

/**
 * Transform a calendar-eligible Event to a calendar_events row
 */
export function eventToRow(event: Event & { startTime: Date; endTime: Date }, now: Date = new Date()): CalendarEventRow {
  const entry = toCalendarEntry(event)

  return {
    uid: entry.uid,
    identity_key: event.identityKey,
    summary: entry.summary,
    description: entry.description,
    location: entry.location,
    start_at: entry.start.toISOString(),
    end_at: entry.end.toISOString(),
    lat: event.coordinates.lat,
    lng: event.coordinates.lon,
    distance_km: event.distanceKm,
    updated_at: now.toISOString()
  }
}

/**
 * Validate a stored snapshot; rows that don't match are dropped so the
 * next reconcile re-adds them
 */
export function parseSnapshot(value: unknown): CalendarEntrySnapshot | null {
  if (typeof value !== 'object' || value === null) return null

  const uid: unknown = Reflect.get(value, 'uid')
  const title: unknown = Reflect.get(value, 'title')
  const location: unknown = Reflect.get(value, 'location')
  const coordinates: unknown = Reflect.get(value, 'coordinates')
  const startTime: unknown = Reflect.get(value, 'startTime')
  const endTime: unknown = Reflect.get(value, 'endTime')
  const description: unknown = Reflect.get(value, 'description')
  const distanceKm: unknown = Reflect.get(value, 'distanceKm')

  if (typeof coordinates !== 'object' || coordinates === null) return null
  const lat: unknown = Reflect.get(coordinates, 'lat')
  const lon: unknown = Reflect.get(coordinates, 'lon')

  if (
    typeof uid !== 'string' ||
    typeof title !== 'string' ||
    typeof location !== 'string' ||
    typeof startTime !== 'string' ||
    typeof endTime !== 'string' ||
    typeof description !== 'string' ||
    typeof distanceKm !== 'number' ||
    typeof lat !== 'number' ||
    typeof lon !== 'number'
  ) {
    return null
  }

  return { uid, title, location, coordinates: { lat, lon }, startTime, endTime, description, distanceKm }
}

/** Result shape shared by every PostgREST call */
export interface TableResult<T = unknown> {
  data?: T
  error: { message: string } | null
}

/**
 * The table operations the store and sink need. Kept narrow so tests can
 * stand in an in-memory implementation for the Supabase client.
 */
export interface SupabaseTables {
  selectPage(table: string, columns: string, orderBy: string, from: number, to: number): Promise<TableResult<unknown[] | null>>
  upsert(table: string, rows: Record<string, unknown>[], onConflict: string): Promise<TableResult>
  deleteIn(table: string, column: string, values: string[]): Promise<TableResult>
  deleteEq(table: string, column: string, value: string): Promise<TableResult>
}

export function supabaseTables(client: SupabaseClient): SupabaseTables {
  return {
    async selectPage(table, columns, orderBy, from, to) {
      const { data, error } = await client.from(table).select(columns).order(orderBy).range(from, to)
      return { data, error }
    },
    async upsert(table, rows, onConflict) {
      const { error } = await client.from(table).upsert(rows, { onConflict })
      return { error }
    },
    async deleteIn(table, column, values) {
      const { error } = await client.from(table).delete().in(column, values)
      return { error }
    },
    async deleteEq(table, column, value) {
      const { error } = await client.from(table).delete().eq(column, value)
      return { error }
    }
  }
}

export class SupabaseDatabase implements CalendarStateStore, CalendarSink {
  constructor(private readonly tables: SupabaseTables) {}

  async loadCalendarState(): Promise<CalendarEntryState> {
    const rows = await this.selectAll('identity_key, snapshot', 'Failed to load calendar state')

    const state = new Map<string, CalendarEntrySnapshot>()
    for (const row of rows) {
      const identityKey = readField(row, 'identity_key')
      const snapshot = parseSnapshot(readField(row, 'snapshot'))
      if (typeof identityKey !== 'string' || !snapshot) {
        console.warn(`[fireworks:state] Ignoring malformed state row: ${JSON.stringify(row)}`)
        continue
      }
      state.set(identityKey, snapshot)
    }

    return state
  }

  async saveCalendarState(state: CalendarEntryState): Promise<void> {
    const existingRows = await this.selectAll('identity_key', 'Failed to read calendar state keys')

    const stale: string[] = []
    for (const row of existingRows) {
      const identityKey = readField(row, 'identity_key')
      if (typeof identityKey === 'string' && !state.has(identityKey)) {
        stale.push(identityKey)
      }
    }

    const updatedAt = new Date().toISOString()
    const rows: StateRow[] = [...state].map(([identityKey, snapshot]) => ({
      identity_key: identityKey,
      uid: snapshot.uid,
      snapshot,
      updated_at: updatedAt
    }))

    for (let i = 0; i < rows.length; i += BATCH_SIZE) {
      const batch = rows.slice(i, i + BATCH_SIZE)

      const { error } = await this.tables.upsert(STATE_TABLE, batch, 'identity_key')

      if (error) {
        throw new Error(`Failed to save calendar state batch: ${error.message}`)
      }
    }

    for (let i = 0; i < stale.length; i += BATCH_SIZE) {
      const batch = stale.slice(i, i + BATCH_SIZE)

      const { error } = await this.tables.deleteIn(STATE_TABLE, 'identity_key', batch)

      if (error) {
        throw new Error(`Failed to prune calendar state: ${error.message}`)
      }
    }
  }

  async applyCalendarDiff(diff: CalendarDiff): Promise<ApplyOutcome[]> {
    const outcomes: ApplyOutcome[] = []

    for (const event of diff.toAdd) {
      outcomes.push(await this.writeEntry(event, 'add'))
    }
    for (const { event } of diff.toUpdate) {
      outcomes.push(await this.writeEntry(event, 'update'))
    }
    for (const identityKey of diff.toRemove) {
      outcomes.push(await this.deleteEntry(identityKey))
    }

    return outcomes
  }

  // PostgREST caps unpaged selects, so read the whole table page by page
  private async selectAll(columns: string, failure: string): Promise<unknown[]> {
    const rows: unknown[] = []

    for (let from = 0; ; from += BATCH_SIZE) {
      const { data, error } = await this.tables.selectPage(STATE_TABLE, columns, 'identity_key', from, from + BATCH_SIZE - 1)

      if (error) {
        throw new Error(`${failure}: ${error.message}`)
      }

      const page = data ?? []
      rows.push(...page)
      if (page.length < BATCH_SIZE) return rows
    }
  }

  // Add and update both upsert on uid: re-applying an add whose commit was lost
  // must not create a second entry
  private async writeEntry(event: Event, operation: CalendarOperation): Promise<ApplyOutcome> {
    if (!isEligible(event)) {
      return failed(event.identityKey, operation, 'event has no valid start/end time')
    }

    try {
      const { error } = await this.tables.upsert(EVENTS_TABLE, [eventToRow(event)], 'uid')

      if (error) {
        return failed(event.identityKey, operation, `Failed to ${operation} calendar entry: ${error.message}`)
      }
    } catch (error) {
      return failed(event.identityKey, operation, `Failed to ${operation} calendar entry: ${errorMessage(error)}`)
    }

    return { identityKey: event.identityKey, operation, ok: true }
  }

  private async deleteEntry(identityKey: string): Promise<ApplyOutcome> {
    try {
      const { error } = await this.tables.deleteEq(EVENTS_TABLE, 'uid', calendarUid(identityKey))

      if (error) {
        return failed(identityKey, 'remove', `Failed to remove calendar entry: ${error.message}`)
      }
    } catch (error) {
      return failed(identityKey, 'remove', `Failed to remove calendar entry: ${errorMessage(error)}`)
    }

    return { identityKey, operation: 'remove', ok: true }
  }
}

function readField(row: unknown, field: string): unknown {
  return typeof row === 'object' && row !== null ? Reflect.get(row, field) : undefined
}

function failed(identityKey: string, operation: CalendarOperation, message: string): ApplyOutcome {
  return {
    identityKey,
    operation,
    ok: false,
    error: new ApplyError(identityKey, operation, message)
  }
}

export function createDatabase(): SupabaseDatabase {
  const url = process.env.SUPABASE_URL
  const key = process.env.SUPABASE_SERVICE_ROLE_KEY

  if (!url || !key) {
    throw new Error('Missing SUPABASE_URL or SUPABASE_SERVICE_ROLE_KEY environment variables')
  }

  return new SupabaseDatabase(supabaseTables(createClient(url, key)))
}
