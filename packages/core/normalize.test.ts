import assert from 'node:assert/strict'
import test from 'node:test'
import { normalizeRecord, normalizeRecords, parseTimestamp } from './normalize.js'
import { generateIdentityKey } from './fingerprint.js'
import { localDay } from './views.js'
import type { Event, NormalizeResult, RawEventRecord } from './types.js'

const reference = { latitude: -33.87, longitude: 151.21 }

const harbour: RawEventRecord = {
  title: ' Harbour Show ',
  location: 'Circular Quay',
  locality: 'Sydney',
  coordinates: { lat: -33.85, lon: 151.21 },
  start_time: '2025-01-01T09:00:00Z',
  end_time: '2025-01-01T09:30:00Z',
  description: 'Midnight fireworks',
  source_event_id: 42
}

function expectEvent(result: NormalizeResult): Event {
  if (!result.ok) {
    throw new Error(`expected an event, got ${result.failure.kind}`)
  }
  return result.event
}

function expectFailureKind(result: NormalizeResult): string {
  if (result.ok) {
    throw new Error('expected a normalization failure')
  }
  return result.failure.kind
}

test('normalizes a complete record', () => {
  const event = expectEvent(normalizeRecord(harbour, reference))

  assert.equal(event.title, 'Harbour Show')
  assert.equal(event.location, 'Circular Quay')
  assert.equal(event.locality, 'Sydney')
  assert.deepEqual(event.coordinates, { lat: -33.85, lon: 151.21 })
  assert.equal(event.distanceKm, 2.22)
  assert.equal(event.startTime?.toISOString(), '2025-01-01T09:00:00.000Z')
  assert.equal(event.endTime?.toISOString(), '2025-01-01T09:30:00.000Z')
  assert.equal(event.description, 'Midnight fireworks')
  assert.equal(event.sourceEventId, '42')
  assert.equal(
    event.identityKey,
    generateIdentityKey('Harbour Show', { lat: -33.85, lon: 151.21 }, new Date('2025-01-01T09:00:00Z'))
  )
})

test('missing or non-numeric coordinates fail with MissingCoordinates', () => {
  assert.equal(expectFailureKind(normalizeRecord({ ...harbour, coordinates: undefined }, reference)), 'MissingCoordinates')
  assert.equal(expectFailureKind(normalizeRecord({ ...harbour, coordinates: null }, reference)), 'MissingCoordinates')
  assert.equal(expectFailureKind(normalizeRecord({ ...harbour, coordinates: { lat: 'abc', lon: 151.21 } }, reference)), 'MissingCoordinates')
  assert.equal(expectFailureKind(normalizeRecord({ ...harbour, coordinates: { lat: -33.85 } }, reference)), 'MissingCoordinates')
})

test('numeric strings are accepted as coordinates', () => {
  const event = expectEvent(normalizeRecord({ ...harbour, coordinates: { lat: '-33.85', lon: ' 151.21 ' } }, reference))
  assert.deepEqual(event.coordinates, { lat: -33.85, lon: 151.21 })
})

test('out-of-range coordinates fail with InvalidCoordinates', () => {
  assert.equal(expectFailureKind(normalizeRecord({ ...harbour, coordinates: { lat: 95, lon: 151.21 } }, reference)), 'InvalidCoordinates')
})

test('blank or missing title fails with MissingTitle', () => {
  assert.equal(expectFailureKind(normalizeRecord({ ...harbour, title: '   ' }, reference)), 'MissingTitle')
  assert.equal(expectFailureKind(normalizeRecord({ ...harbour, title: undefined }, reference)), 'MissingTitle')
})

test('unparsable times become null without rejecting the record', () => {
  const event = expectEvent(normalizeRecord({ ...harbour, start_time: 'tonight', end_time: 1234 }, reference))

  assert.equal(event.startTime, null)
  assert.equal(event.endTime, null)
  assert.equal(event.identityKey, generateIdentityKey('Harbour Show', { lat: -33.85, lon: 151.21 }, null))
})

test('missing optional fields get defaults', () => {
  const event = expectEvent(normalizeRecord({ title: 'Pop-up', coordinates: { lat: -33.87, lon: 151.21 } }, reference))

  assert.equal(event.location, 'Unknown Location')
  assert.equal(event.locality, null)
  assert.equal(event.description, '')
  assert.equal(event.sourceEventId, null)
  assert.equal(event.distanceKm, 0)
})

test('null island is treated as an ordinary coordinate', () => {
  const event = expectEvent(normalizeRecord({ ...harbour, coordinates: { lat: 0, lon: 0 } }, reference))
  assert.ok(event.distanceKm > 10000)
})

test('batch keeps good records and collects failures', () => {
  const { events, failures } = normalizeRecords([
    harbour,
    { ...harbour, coordinates: undefined, title: 'No Coords' },
    { ...harbour, title: 'Bay Show', coordinates: { lat: -33.86, lon: 151.21 } }
  ], reference)

  assert.deepEqual(events.map(e => e.title), ['Harbour Show', 'Bay Show'])
  assert.equal(failures.length, 1)
  assert.equal(failures[0].kind, 'MissingCoordinates')
  assert.equal(failures[0].raw.title, 'No Coords')
})

test('parseTimestamp handles zones, separators and garbage', () => {
  assert.equal(parseTimestamp('2025-01-01T20:00:00+10:00')?.toISOString(), '2025-01-01T10:00:00.000Z')
  assert.equal(parseTimestamp('2025-01-01T20:00:00.500Z')?.toISOString(), '2025-01-01T20:00:00.500Z')
  assert.equal(
    parseTimestamp('2025-01-01 20:00')?.getTime(),
    new Date(2025, 0, 1, 20, 0).getTime()
  )
  assert.equal(parseTimestamp('next friday'), null)
  assert.equal(parseTimestamp(''), null)
  assert.equal(parseTimestamp(null), null)
  assert.equal(parseTimestamp(1735725600000), null)
  assert.equal(parseTimestamp('2025-01-01T20:00:00+1000')?.toISOString(), '2025-01-01T10:00:00.000Z')
})

test('parseTimestamp rejects dates and times that do not exist', () => {
  assert.equal(parseTimestamp('2025-02-30T20:00'), null)
  assert.equal(parseTimestamp('2025-02-29'), null)
  assert.equal(parseTimestamp('2025-13-01'), null)
  assert.equal(parseTimestamp('2025-00-10'), null)
  assert.equal(parseTimestamp('2025-04-31 20:00'), null)
  assert.equal(parseTimestamp('2025-01-01T24:00'), null)
  assert.equal(parseTimestamp('2025-01-01T20:60'), null)
  assert.equal(parseTimestamp('2025-01-01T20:00:60Z'), null)
  assert.equal(parseTimestamp('2024-02-29T20:00')?.getTime(), new Date(2024, 1, 29, 20, 0).getTime())
})

test('parseTimestamp reads date-only values as local midnight', () => {
  const date = parseTimestamp('2025-01-01')
  assert.equal(date?.getTime(), new Date(2025, 0, 1).getTime())
  assert.equal(date?.getTime(), parseTimestamp('2025-01-01T00:00')?.getTime())
  assert.equal(date ? localDay(date) : null, '2025-01-01')
})
