/**
 * Calendar reconciliation
 *
 * Computes the add/update/remove diff between the current aggregated events
 * and the last committed calendar state. Pure: state is never mutated in
 * place, so a failed apply can be retried against the same previous state.
 *
 * Per identity key an entry is either absent or present:
 *   absent  -> present  (toAdd)
 *   present -> present  (toUpdate, snapshot replaced)
 *   present -> absent   (toRemove)
 */

import { calendarUid } from './fingerprint.js'
import type {
  AggregatedResult,
  ApplyOutcome,
  CalendarDiff,
  CalendarEntrySnapshot,
  CalendarEntryState,
  CalendarOperation,
  Event
} from './types.js'

export interface ReconcileResult {
  diff: CalendarDiff
  newState: CalendarEntryState
}

/**
 * An event can become a calendar entry only with ordered start and end times
 */
export function isEligible(event: Event): event is Event & { startTime: Date; endTime: Date } {
  return event.startTime !== null &&
    event.endTime !== null &&
    event.endTime.getTime() >= event.startTime.getTime()
}

export function toSnapshot(event: Event & { startTime: Date; endTime: Date }): CalendarEntrySnapshot {
  return {
    uid: calendarUid(event.identityKey),
    title: event.title,
    location: event.location,
    coordinates: { lat: event.coordinates.lat, lon: event.coordinates.lon },
    startTime: event.startTime.toISOString(),
    endTime: event.endTime.toISOString(),
    description: event.description,
    distanceKm: event.distanceKm
  }
}

export function snapshotsEqual(a: CalendarEntrySnapshot, b: CalendarEntrySnapshot): boolean {
  return a.uid === b.uid &&
    a.title === b.title &&
    a.location === b.location &&
    a.coordinates.lat === b.coordinates.lat &&
    a.coordinates.lon === b.coordinates.lon &&
    a.startTime === b.startTime &&
    a.endTime === b.endTime &&
    a.description === b.description &&
    a.distanceKm === b.distanceKm
}

export function emptyDiff(): CalendarDiff {
  return { toAdd: [], toUpdate: [], toRemove: [] }
}

export function isEmptyDiff(diff: CalendarDiff): boolean {
  return diff.toAdd.length === 0 && diff.toUpdate.length === 0 && diff.toRemove.length === 0
}

/**
 * Reconcile the current result against the previously committed state
 * @returns The diff and the state that results if every operation succeeds
 */
export function reconcile(current: AggregatedResult, previousState: CalendarEntryState): ReconcileResult {
  const diff = emptyDiff()
  const newState = new Map(previousState)
  const currentKeys = new Set<string>()

  for (const event of current.events) {
    if (!isEligible(event)) continue
    // Aggregation already dedupes, but a hand-built result might not
    if (currentKeys.has(event.identityKey)) continue
    currentKeys.add(event.identityKey)

    const snapshot = toSnapshot(event)
    const previous = previousState.get(event.identityKey)

    if (!previous) {
      diff.toAdd.push(event)
      newState.set(event.identityKey, snapshot)
    } else if (!snapshotsEqual(previous, snapshot)) {
      diff.toUpdate.push({ identityKey: event.identityKey, event })
      newState.set(event.identityKey, snapshot)
    }
  }

  for (const identityKey of previousState.keys()) {
    if (!currentKeys.has(identityKey)) {
      diff.toRemove.push(identityKey)
      newState.delete(identityKey)
    }
  }

  return { diff, newState }
}

/**
 * Advance the previous state by the operations that were applied successfully
 * Failed operations keep their previous snapshot (or absence), so the next
 * cycle's reconcile produces them again.
 */
export function commitDiff(
  previousState: CalendarEntryState,
  diff: CalendarDiff,
  outcomes: readonly ApplyOutcome[]
): CalendarEntryState {
  const succeeded = new Set(
    outcomes.filter(outcome => outcome.ok).map(outcome => outcomeKey(outcome.operation, outcome.identityKey))
  )
  const next = new Map(previousState)

  for (const event of diff.toAdd) {
    if (succeeded.has(outcomeKey('add', event.identityKey)) && isEligible(event)) {
      next.set(event.identityKey, toSnapshot(event))
    }
  }

  for (const { identityKey, event } of diff.toUpdate) {
    if (succeeded.has(outcomeKey('update', identityKey)) && isEligible(event)) {
      next.set(identityKey, toSnapshot(event))
    }
  }

  for (const identityKey of diff.toRemove) {
    if (succeeded.has(outcomeKey('remove', identityKey))) {
      next.delete(identityKey)
    }
  }

  return next
}

function outcomeKey(operation: CalendarOperation, identityKey: string): string {
  return `${operation}:${identityKey}`
}
