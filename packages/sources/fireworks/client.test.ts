import assert from 'node:assert/strict'
import test from 'node:test'
import { combineDateTime, FireworksClient, toRawRecord, type FetchFn } from './client.js'
import { FetchError } from '../../core/errors.js'

const BASE = 'https://api.test/v1/'

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' }
  })
}

type Routes = Record<string, Array<() => Response>>

/**
 * In-process stand-in for the listing API: each path answers from a queue,
 * the last answer repeats
 */
function fakeApi(routes: Routes): { fetch: FetchFn; calls: string[] } {
  const calls: string[] = []
  const fetch: FetchFn = async url => {
    const path = url.slice(BASE.length)
    calls.push(path)
    const queue = routes[path]
    if (!queue || queue.length === 0) {
      return json({ detail: 'not found' }, 404)
    }
    const next = queue.length > 1 ? queue.shift() : queue[0]
    return next ? next() : json(null, 500)
  }
  return { fetch, calls }
}

const harbourApiEvent = {
  id: 1,
  name: 'Harbour Show',
  rawlocation: 'Circular Quay',
  date: '2025-01-01',
  start_time: '20:00',
  end_time: '20:30',
  description: 'Midnight fireworks',
  source: 'council',
  location: {
    locality: 'Sydney',
    coordinates: { latitude: -33.85, longitude: 151.21 }
  }
}

const lookupRoutes: Routes = {
  'locations?startswith=2000': [() => json(['Sydney, 2000'])],
  'locations?locality=sydney&postcode=2000': [() => json([{ id: 7 }])]
}

const noDelay = { sleep: async () => {} }

test('resolves the postcode and maps events to raw records', async () => {
  const api = fakeApi({
    ...lookupRoutes,
    'events?location=7&days=7': [() => json([harbourApiEvent])]
  })
  const client = new FireworksClient({ baseUrl: 'https://api.test/v1', fetch: api.fetch, retry: noDelay })

  const records = await client.fetchEvents({ postcode: '2000', days: 7 })

  assert.deepEqual(api.calls, [
    'locations?startswith=2000',
    'locations?locality=sydney&postcode=2000',
    'events?location=7&days=7'
  ])
  assert.deepEqual(records, [{
    title: 'Harbour Show',
    location: 'Circular Quay',
    locality: 'Sydney',
    coordinates: { lat: -33.85, lon: 151.21 },
    start_time: '2025-01-01T20:00',
    end_time: '2025-01-01T20:30',
    description: 'Midnight fireworks',
    source_event_id: 1
  }])
})

test('transient failures are retried', async () => {
  const api = fakeApi({
    ...lookupRoutes,
    'events?location=7&days=1': [() => json({}, 503), () => json([harbourApiEvent])]
  })
  const client = new FireworksClient({ baseUrl: BASE, fetch: api.fetch, retry: noDelay })

  const records = await client.fetchEvents({ postcode: '2000', days: 1 })

  assert.equal(records.length, 1)
  assert.equal(api.calls.filter(call => call.startsWith('events')).length, 2)
})

test('permanent failures are not retried and surface as FetchError', async () => {
  const api = fakeApi({ ...lookupRoutes })
  const client = new FireworksClient({ baseUrl: BASE, fetch: api.fetch, retry: noDelay })

  await assert.rejects(client.fetchEvents({ postcode: '2000', days: 7 }), FetchError)
  assert.equal(api.calls.filter(call => call.startsWith('events')).length, 1)
})

test('unknown postcode is a FetchError', async () => {
  const api = fakeApi({ 'locations?startswith=9999': [() => json([])] })
  const client = new FireworksClient({ baseUrl: BASE, fetch: api.fetch, retry: noDelay })

  await assert.rejects(
    client.fetchEvents({ postcode: '9999', days: 7 }),
    (error: unknown) => error instanceof FetchError && error.message === 'Could not find location for postcode: 9999'
  )
})

test('records without coordinates keep a null coordinates field', () => {
  const record = toRawRecord({ name: 'Mystery Show', date: '2025-01-01', start_time: '20:00' })

  assert.equal(record.coordinates, null)
  assert.equal(record.start_time, '2025-01-01T20:00')
  assert.equal(record.end_time, undefined)
  assert.equal(record.description, '')
})

test('combineDateTime handles the listing formats', () => {
  assert.equal(combineDateTime('2025-11-25', '20:15'), '2025-11-25T20:15')
  assert.equal(combineDateTime('2025-11-25', '20:15:30'), '2025-11-25T20:15:30')
  assert.equal(combineDateTime('25-11-2025', '20:15'), '2025-11-25T20:15')
  assert.equal(combineDateTime('25/11/2025', '20:15'), '2025-11-25T20:15')
  assert.equal(combineDateTime(undefined, '2025-11-25T20:15:00+11:00'), '2025-11-25T20:15:00+11:00')
  assert.equal(combineDateTime('2025-11-25', undefined), undefined)
  assert.equal(combineDateTime(undefined, '20:15'), undefined)
  assert.equal(combineDateTime('soon', '20:15'), 'soon 20:15')
})
