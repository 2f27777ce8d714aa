/**
 * Refresh coordinator - runs one fetch → normalize → aggregate → reconcile →
 * apply → commit cycle at a time
 *
 * Deployment-agnostic: driven by its own interval in `watch` mode, or called
 * once per scheduled task run.
 */

import { aggregate } from '../core/aggregate.js'
import { normalizeRecords } from '../core/normalize.js'
import { commitDiff, emptyDiff, isEmptyDiff, reconcile } from '../core/reconcile.js'
import { errorMessage } from '../core/errors.js'
import type { CalendarSink, CalendarStateStore } from '../core/database.js'
import type {
  AggregatedResult,
  ApplyOutcome,
  CalendarDiff,
  CalendarEntryState,
  Clock,
  EventQuery,
  NormalizationFailure,
  RawEventRecord,
  ReferencePoint
} from '../core/types.js'

export interface RefreshDependencies {
  fetchEvents: (query: EventQuery) => Promise<RawEventRecord[]>
  stateStore: CalendarStateStore
  sink: CalendarSink
  clock?: Clock
}

export interface RefreshSettings {
  query: EventQuery
  reference: ReferencePoint
  maxDistanceKm: number
}

export type RefreshStatus =
  | 'completed'     // Fetched, published, every calendar operation committed
  | 'partial'       // Published, some calendar operations failed and will be retried
  | 'failed'        // Published, calendar state could not be read or saved
  | 'fetch-failed'  // Nothing changed, previous result still published
  | 'skipped'       // Another cycle was in flight
  | 'cancelled'     // Stopped before apply, nothing changed

export interface CalendarSummary {
  added: number
  updated: number
  removed: number
  failed: number
}

export interface RefreshResult {
  status: RefreshStatus
  /** Currently published result (the previous one unless this cycle published) */
  result: AggregatedResult | null
  diff: CalendarDiff
  eventsFetched: number
  eventsPublished: number
  normalizationFailures: NormalizationFailure[]
  calendar: CalendarSummary
  errors: string[]
  duration: number               // milliseconds
}

export class RefreshCoordinator {
  private current: AggregatedResult | null = null
  private inFlight: Promise<RefreshResult> | null = null
  private stopped = false
  private timer: ReturnType<typeof setInterval> | null = null
  private clock: Clock

  constructor(
    private settings: RefreshSettings,
    private deps: RefreshDependencies
  ) {
    this.clock = deps.clock ?? (() => new Date())
  }

  /** Last published result, or null before the first successful cycle */
  get result(): AggregatedResult | null {
    return this.current
  }

  get running(): boolean {
    return this.inFlight !== null
  }

  /**
   * Run one cycle. A call made while another cycle is in flight is skipped,
   * never run in parallel: both would reconcile against the same state.
   */
  async refresh(): Promise<RefreshResult> {
    if (this.stopped) {
      return this.emptyResult('cancelled', Date.now())
    }
    if (this.inFlight) {
      console.log('[fireworks:refresh] ⏭️  Previous refresh still running, skipping')
      return this.emptyResult('skipped', Date.now())
    }

    const cycle = this.runCycle()
    this.inFlight = cycle
    try {
      return await cycle
    } finally {
      this.inFlight = null
    }
  }

  /**
   * Refresh now and then every intervalMs until stop()
   */
  start(intervalMs: number): void {
    if (this.timer) return

    this.stopped = false
    const tick = (): void => {
      this.refresh().catch(error => {
        console.error('[fireworks:refresh] ✗ Unexpected refresh error:', errorMessage(error))
      })
    }

    tick()
    this.timer = setInterval(tick, intervalMs)
  }

  /**
   * Stop scheduling. A cycle that has not reached the apply step yet is
   * abandoned without touching the calendar or its state.
   */
  async stop(): Promise<void> {
    this.stopped = true
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
    if (this.inFlight) {
      await this.inFlight
    }
  }

  private async runCycle(): Promise<RefreshResult> {
    const startTime = Date.now()
    const { query, reference, maxDistanceKm } = this.settings

    let raws: RawEventRecord[]
    try {
      raws = await this.deps.fetchEvents(query)
    } catch (error) {
      // Previous result and state stay published
      console.error(`[fireworks:refresh] ✗ Fetch failed, keeping previous results: ${errorMessage(error)}`)
      return { ...this.emptyResult('fetch-failed', startTime), errors: [errorMessage(error)] }
    }

    const { events, failures } = normalizeRecords(raws, reference)
    if (failures.length > 0) {
      console.warn(`[fireworks:refresh] ⚠️  ${failures.length}/${raws.length} records could not be normalized`)
      for (const failure of failures) {
        console.warn(`  - ${failure.kind}: ${failure.reason} (${describeRecord(failure.raw)})`)
      }
    }

    const aggregated = aggregate(events, maxDistanceKm, this.clock)
    const base = {
      result: aggregated,
      eventsFetched: raws.length,
      eventsPublished: aggregated.count,
      normalizationFailures: failures
    }

    let previousState: CalendarEntryState
    try {
      previousState = await this.deps.stateStore.loadCalendarState()
    } catch (error) {
      if (this.stopped) return this.emptyResult('cancelled', startTime)
      this.publish(aggregated)
      console.error(`[fireworks:refresh] ✗ Could not load calendar state: ${errorMessage(error)}`)
      return this.finish({ ...base, status: 'failed', diff: emptyDiff(), calendar: emptyCalendar(), errors: [errorMessage(error)] }, startTime)
    }

    const { diff } = reconcile(aggregated, previousState)

    if (this.stopped) {
      console.log('[fireworks:refresh] Stopped before apply, discarding cycle')
      return this.emptyResult('cancelled', startTime)
    }

    if (isEmptyDiff(diff)) {
      this.publish(aggregated)
      return this.finish({ ...base, status: 'completed', diff, calendar: emptyCalendar(), errors: [] }, startTime)
    }

    const errors: string[] = []
    let outcomes: ApplyOutcome[]
    try {
      outcomes = await this.deps.sink.applyCalendarDiff(diff)
    } catch (error) {
      // Nothing reported as applied: commit nothing, retry everything next cycle
      errors.push(`Calendar apply failed: ${errorMessage(error)}`)
      outcomes = []
    }

    const calendar = summarize(diff, outcomes)
    for (const outcome of outcomes) {
      if (!outcome.ok) {
        errors.push(outcome.error ? outcome.error.message : `${outcome.operation} ${outcome.identityKey} failed`)
      }
    }

    const committed = commitDiff(previousState, diff, outcomes)
    let status: RefreshStatus = calendar.failed > 0 ? 'partial' : 'completed'
    try {
      await this.deps.stateStore.saveCalendarState(committed)
    } catch (error) {
      errors.push(`Could not save calendar state: ${errorMessage(error)}`)
      status = 'failed'
    }

    this.publish(aggregated)
    for (const error of errors) {
      console.error(`[fireworks:refresh] ✗ ${error}`)
    }

    return this.finish({ ...base, status, diff, calendar, errors }, startTime)
  }

  private publish(result: AggregatedResult): void {
    this.current = result
  }

  private finish(partial: Omit<RefreshResult, 'duration'>, startTime: number): RefreshResult {
    const result: RefreshResult = { ...partial, duration: Date.now() - startTime }
    const { calendar } = result

    console.log(
      `[fireworks:refresh] ✓ ${result.eventsPublished} nearby of ${result.eventsFetched} fetched; ` +
      `calendar +${calendar.added} ~${calendar.updated} -${calendar.removed}` +
      (calendar.failed > 0 ? ` (${calendar.failed} failed)` : '') +
      ` in ${result.duration}ms`
    )

    return result
  }

  private emptyResult(status: RefreshStatus, startTime: number): RefreshResult {
    return {
      status,
      result: this.current,
      diff: emptyDiff(),
      eventsFetched: 0,
      eventsPublished: this.current?.count ?? 0,
      normalizationFailures: [],
      calendar: emptyCalendar(),
      errors: [],
      duration: Date.now() - startTime
    }
  }
}

function emptyCalendar(): CalendarSummary {
  return { added: 0, updated: 0, removed: 0, failed: 0 }
}

function summarize(diff: CalendarDiff, outcomes: readonly ApplyOutcome[]): CalendarSummary {
  const ok = (operation: ApplyOutcome['operation']): number =>
    outcomes.filter(outcome => outcome.ok && outcome.operation === operation).length
  const total = diff.toAdd.length + diff.toUpdate.length + diff.toRemove.length
  const added = ok('add')
  const updated = ok('update')
  const removed = ok('remove')

  return { added, updated, removed, failed: total - added - updated - removed }
}

function describeRecord(raw: RawEventRecord): string {
  return typeof raw.title === 'string' && raw.title.trim() ? `"${raw.title.trim()}"` : 'untitled record'
}
