import assert from 'node:assert/strict'
import test from 'node:test'
import { RefreshCoordinator, type RefreshDependencies } from './sync.js'
import { generateIdentityKey } from '../core/fingerprint.js'
import { FetchError } from '../core/errors.js'
import type { CalendarSink, CalendarStateStore } from '../core/database.js'
import type {
  ApplyOutcome,
  CalendarDiff,
  CalendarEntryState,
  EventQuery,
  RawEventRecord
} from '../core/types.js'

const settings = {
  query: { postcode: '2000', days: 7 },
  reference: { latitude: -33.87, longitude: 151.21 },
  maxDistanceKm: 10
}

const harbour: RawEventRecord = {
  title: 'Harbour Show',
  location: 'Circular Quay',
  coordinates: { lat: -33.85, lon: 151.21 },
  start_time: '2025-01-01T09:00:00Z',
  end_time: '2025-01-01T09:30:00Z',
  description: 'Midnight fireworks'
}

const bay: RawEventRecord = {
  ...harbour,
  title: 'Bay Show',
  location: 'Rose Bay',
  coordinates: { lat: -33.86, lon: 151.21 }
}

const far: RawEventRecord = {
  ...harbour,
  title: 'Far Show',
  coordinates: { lat: -34.5, lon: 150.8 }
}

const noCoordinates: RawEventRecord = { title: 'Lost Show', start_time: '2025-01-01T09:00:00Z' }

const harbourKey = generateIdentityKey('Harbour Show', { lat: -33.85, lon: 151.21 }, new Date('2025-01-01T09:00:00Z'))
const bayKey = generateIdentityKey('Bay Show', { lat: -33.86, lon: 151.21 }, new Date('2025-01-01T09:00:00Z'))

/**
 * In-memory stand-in for the Supabase state table and calendar
 */
class MemoryCalendar implements CalendarStateStore, CalendarSink {
  state: CalendarEntryState = new Map()
  entries = new Set<string>()
  failKeys = new Set<string>()
  applyCalls: CalendarDiff[] = []
  throwOnApply = false

  async loadCalendarState(): Promise<CalendarEntryState> {
    return new Map(this.state)
  }

  async saveCalendarState(state: CalendarEntryState): Promise<void> {
    this.state = new Map(state)
  }

  async applyCalendarDiff(diff: CalendarDiff): Promise<ApplyOutcome[]> {
    this.applyCalls.push(diff)
    if (this.throwOnApply) {
      throw new Error('calendar offline')
    }

    const outcomes: ApplyOutcome[] = []
    const write = (identityKey: string, operation: ApplyOutcome['operation']): void => {
      if (this.failKeys.has(identityKey)) {
        outcomes.push({ identityKey, operation, ok: false, error: new Error(`write ${identityKey} failed`) })
        return
      }
      if (operation === 'remove') {
        this.entries.delete(identityKey)
      } else {
        this.entries.add(identityKey)
      }
      outcomes.push({ identityKey, operation, ok: true })
    }

    diff.toAdd.forEach(event => write(event.identityKey, 'add'))
    diff.toUpdate.forEach(update => write(update.identityKey, 'update'))
    diff.toRemove.forEach(key => write(key, 'remove'))
    return outcomes
  }
}

function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => {}
  const promise = new Promise<T>(r => {
    resolve = r
  })
  return { promise, resolve: value => resolve(value) }
}

function setup(fetchEvents: (query: EventQuery) => Promise<RawEventRecord[]>): {
  calendar: MemoryCalendar
  coordinator: RefreshCoordinator
} {
  const calendar = new MemoryCalendar()
  const deps: RefreshDependencies = {
    fetchEvents,
    stateStore: calendar,
    sink: calendar,
    clock: () => new Date('2025-01-01T00:00:00Z')
  }
  return { calendar, coordinator: new RefreshCoordinator(settings, deps) }
}

test('first cycle publishes nearby events and adds calendar entries', async () => {
  const { calendar, coordinator } = setup(async () => [harbour, far, noCoordinates])

  const result = await coordinator.refresh()

  assert.equal(result.status, 'completed')
  assert.equal(result.eventsFetched, 3)
  assert.equal(result.eventsPublished, 1)
  assert.equal(result.normalizationFailures.length, 1)
  assert.equal(result.normalizationFailures[0].kind, 'MissingCoordinates')
  assert.deepEqual(result.calendar, { added: 1, updated: 0, removed: 0, failed: 0 })
  assert.equal(coordinator.result?.closest?.title, 'Harbour Show')
  assert.deepEqual([...calendar.state.keys()], [harbourKey])
  assert.deepEqual([...calendar.entries], [harbourKey])
})

test('a second cycle with identical input produces an empty diff', async () => {
  const { calendar, coordinator } = setup(async () => [harbour, far])

  await coordinator.refresh()
  const second = await coordinator.refresh()

  assert.equal(second.status, 'completed')
  assert.deepEqual(second.diff, { toAdd: [], toUpdate: [], toRemove: [] })
  assert.equal(calendar.applyCalls.length, 1)
})

test('events that disappear upstream are removed', async () => {
  let records = [harbour, bay]
  const { calendar, coordinator } = setup(async () => records)

  await coordinator.refresh()
  records = [bay]
  const second = await coordinator.refresh()

  assert.deepEqual(second.diff.toRemove, [harbourKey])
  assert.deepEqual(second.calendar, { added: 0, updated: 0, removed: 1, failed: 0 })
  assert.deepEqual([...calendar.state.keys()], [bayKey])
})

test('a failed fetch keeps the previous result and state', async () => {
  let fail = false
  const { calendar, coordinator } = setup(async () => {
    if (fail) throw new FetchError('listing API unreachable')
    return [harbour]
  })

  const first = await coordinator.refresh()
  fail = true
  const second = await coordinator.refresh()

  assert.equal(second.status, 'fetch-failed')
  assert.deepEqual(second.errors, ['listing API unreachable'])
  assert.equal(second.result, first.result)
  assert.equal(coordinator.result, first.result)
  assert.deepEqual([...calendar.state.keys()], [harbourKey])
  assert.equal(calendar.applyCalls.length, 1)
})

test('failed calendar writes are not committed and are retried next cycle', async () => {
  const { calendar, coordinator } = setup(async () => [harbour, bay])
  calendar.failKeys.add(harbourKey)

  const first = await coordinator.refresh()

  assert.equal(first.status, 'partial')
  assert.deepEqual(first.calendar, { added: 1, updated: 0, removed: 0, failed: 1 })
  assert.deepEqual(first.errors, [`write ${harbourKey} failed`])
  assert.deepEqual([...calendar.state.keys()], [bayKey])
  // Display data is still published
  assert.equal(coordinator.result?.count, 2)

  calendar.failKeys.clear()
  const second = await coordinator.refresh()

  assert.equal(second.status, 'completed')
  assert.deepEqual(second.diff.toAdd.map(event => event.identityKey), [harbourKey])
  assert.equal(calendar.state.size, 2)
})

test('a sink that throws commits nothing', async () => {
  const { calendar, coordinator } = setup(async () => [harbour])
  calendar.throwOnApply = true

  const result = await coordinator.refresh()

  assert.equal(result.status, 'partial')
  assert.deepEqual(result.calendar, { added: 0, updated: 0, removed: 0, failed: 1 })
  assert.deepEqual(result.errors, ['Calendar apply failed: calendar offline'])
  assert.equal(calendar.state.size, 0)
})

test('a refresh requested while one is running is skipped', async () => {
  const gate = deferred<RawEventRecord[]>()
  let fetches = 0
  const { calendar, coordinator } = setup(() => {
    fetches++
    return gate.promise
  })

  const first = coordinator.refresh()
  const second = await coordinator.refresh()

  assert.equal(second.status, 'skipped')
  assert.equal(coordinator.running, true)

  gate.resolve([harbour])
  const completed = await first

  assert.equal(completed.status, 'completed')
  assert.equal(fetches, 1)
  assert.equal(calendar.applyCalls.length, 1)
  assert.equal(coordinator.running, false)
})

test('stopping before apply abandons the cycle without side effects', async () => {
  const gate = deferred<RawEventRecord[]>()
  const { calendar, coordinator } = setup(() => gate.promise)

  const inFlight = coordinator.refresh()
  const stopping = coordinator.stop()
  gate.resolve([harbour])

  const result = await inFlight
  await stopping

  assert.equal(result.status, 'cancelled')
  assert.equal(result.result, null)
  assert.equal(coordinator.result, null)
  assert.equal(calendar.applyCalls.length, 0)
  assert.equal(calendar.state.size, 0)

  const afterStop = await coordinator.refresh()
  assert.equal(afterStop.status, 'cancelled')
})

test('stop waits for the cycle started by start()', async () => {
  const { calendar, coordinator } = setup(async () => [harbour])

  coordinator.start(60 * 60 * 1000)
  await coordinator.stop()

  // The first tick was still before its apply step when stop() was called
  assert.equal(coordinator.running, false)
  assert.equal(calendar.applyCalls.length, 0)
  assert.equal(calendar.state.size, 0)
})
