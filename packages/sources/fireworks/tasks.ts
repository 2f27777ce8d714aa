/**
 * Fireworks Task Definitions
 *
 * Tasks are discovered and run by the orchestrator.
 */

import { loadConfig, type FireworksConfig } from '../../../config.js'
import { aggregate } from '../../core/aggregate.js'
import { normalizeRecords } from '../../core/normalize.js'
import { createDatabase } from '../../core/database.js'
import {
  buildCalendarView,
  buildClosestView,
  buildCountView,
  buildEventsView,
  eventsOnDay,
  localDay,
  type ViewContext
} from '../../core/views.js'
import { RefreshCoordinator } from '../../orchestrator/sync.js'
import type { Task, TaskOutput } from '../../orchestrator/runner.js'
import { FireworksClient } from './client.js'

export function createCoordinator(config: FireworksConfig = loadConfig()): RefreshCoordinator {
  const client = new FireworksClient({ baseUrl: config.baseUrl })
  const db = createDatabase()

  return new RefreshCoordinator(
    {
      query: { postcode: config.postcode, days: config.days },
      reference: config.reference,
      maxDistanceKm: config.maxDistanceKm
    },
    {
      fetchEvents: query => client.fetchEvents(query),
      stateStore: db,
      sink: db
    }
  )
}

const tasks: Task[] = [
  /**
   * Task: Refresh events and reconcile the calendar
   * Frequency: Hourly
   */
  {
    id: 'fireworks:refresh',
    schedule: 'hourly',
    description: 'Fetch nearby fireworks and sync calendar entries',

    async run(): Promise<TaskOutput> {
      const result = await createCoordinator().refresh()

      if (result.status === 'fetch-failed') {
        throw new Error(result.errors.join('; '))
      }

      return {
        eventsProcessed: result.eventsFetched,
        status: result.status,
        nearby: result.eventsPublished,
        calendar: result.calendar,
        errors: result.errors
      }
    }
  },

  /**
   * Task: Print what the displays would show, without writing anything
   */
  {
    id: 'fireworks:preview',
    schedule: 'manual',
    description: 'Fetch nearby fireworks and print the summary views (no writes)',

    async run(): Promise<TaskOutput> {
      const config = loadConfig()
      const client = new FireworksClient({ baseUrl: config.baseUrl })

      const raws = await client.fetchEvents({ postcode: config.postcode, days: config.days })
      const { events, failures } = normalizeRecords(raws, config.reference)
      const result = aggregate(events, config.maxDistanceKm)

      const now = new Date()
      const context: ViewContext = { postcode: config.postcode, maxDistanceKm: config.maxDistanceKm, now }
      const today = eventsOnDay(result, localDay(now))

      const views = {
        count: buildCountView(today, context),
        events: buildEventsView(today, context),
        closest: buildClosestView(today, context),
        calendar: buildCalendarView(result, context)
      }

      console.log(`[fireworks:preview] ${result.count} nearby (${today.length} today), ${failures.length} rejected`)
      console.log(JSON.stringify(views, null, 2))

      return { eventsProcessed: raws.length, nearby: result.count, today: today.length }
    }
  }
]

export default tasks
