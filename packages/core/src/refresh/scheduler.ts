/**
 * Refresh Scheduler
 *
 * Runs the fetch → resolve → encode → publish pass on a fixed interval.
 * Passes are single-flight: a trigger arriving while a pass is running is
 * dropped, not queued. A failed pass leaves the published artifact alone.
 */

import { DateTime } from 'luxon'
import { describeError } from '../errors.js'
import { createLogger } from '../logger.js'
import type { Publisher } from '../publish/index.js'
import {
  computeHorizon,
  encodeCalendar,
  resolveOccurrences,
  type ScheduleSource,
} from '../timetable/index.js'
import type {
  PassOutcome,
  RefreshSchedulerOptions,
  RefreshState,
  RefreshStatus,
  TransformConfig,
} from './types.js'

const log = createLogger('scheduler')

const HOUR_MS = 60 * 60 * 1000

const TRANSITIONS: Record<RefreshState, readonly RefreshState[]> = {
  idle: ['fetching'],
  fetching: ['resolving', 'failed'],
  resolving: ['encoding', 'failed'],
  encoding: ['publishing', 'failed'],
  publishing: ['idle', 'failed'],
  failed: ['fetching'],
}

export class RefreshScheduler {
  private config: TransformConfig
  private source: ScheduleSource
  private publisher: Publisher
  private now: () => DateTime
  private timer: ReturnType<typeof setInterval> | null = null
  private state: RefreshState = 'idle'
  private running = false

  private passCount = 0
  private failureCount = 0
  private skippedCount = 0
  private lastPassAt: DateTime | null = null
  private lastSuccessAt: DateTime | null = null
  private lastError: RefreshStatus['lastError'] = null
  private lastLessonCount: number | null = null
  private lastPublishChanged: boolean | null = null

  constructor(options: RefreshSchedulerOptions) {
    this.config = options.config
    this.source = options.source
    this.publisher = options.publisher
    this.now = options.now ?? (() => DateTime.now())
  }

  get intervalMs(): number {
    return this.config.fetchEveryHours * HOUR_MS
  }

  /**
   * Run one pass immediately, then one every `fetchEveryHours`.
   */
  async start(): Promise<void> {
    if (this.running) {
      log.warn('Already running')
      return
    }

    this.running = true
    log.info({ everyHours: this.config.fetchEveryHours }, 'Starting refresh loop')

    await this.runPass()

    // stop() may have been called while the first pass ran
    if (!this.running) return

    this.timer = setInterval(() => {
      this.runPass().catch((err: unknown) => {
        log.error({ err }, 'Unexpected error in refresh pass')
      })
    }, this.intervalMs)
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer)
      this.timer = null
    }
    if (this.running) {
      this.running = false
      log.info('Stopped')
    }
  }

  get busy(): boolean {
    return this.state !== 'idle' && this.state !== 'failed'
  }

  getState(): RefreshState {
    return this.state
  }

  getStatus(): RefreshStatus {
    const nextPassAt =
      this.running && this.timer && this.lastPassAt
        ? this.lastPassAt.plus({ milliseconds: this.intervalMs })
        : null

    return {
      state: this.state,
      running: this.running,
      intervalMs: this.intervalMs,
      passCount: this.passCount,
      failureCount: this.failureCount,
      skippedCount: this.skippedCount,
      lastPassAt: this.lastPassAt?.toUTC().toISO() ?? null,
      lastSuccessAt: this.lastSuccessAt?.toUTC().toISO() ?? null,
      nextPassAt: nextPassAt?.toUTC().toISO() ?? null,
      lastError: this.lastError ? { ...this.lastError } : null,
      lastLessonCount: this.lastLessonCount,
      lastPublishChanged: this.lastPublishChanged,
    }
  }

  /**
   * Run one full pass unless another one is in flight.
   * Never rejects: failures are logged and reported in the outcome.
   */
  async runPass(): Promise<PassOutcome> {
    if (this.busy) {
      this.skippedCount++
      log.warn({ state: this.state }, 'Pass already in progress, dropping trigger')
      return { status: 'skipped' }
    }

    const startedAt = this.now()
    this.lastPassAt = startedAt
    this.passCount++
    const signal = AbortSignal.timeout(this.config.passTimeoutSeconds * 1000)

    try {
      this.transition('fetching')
      const horizon = computeHorizon(startedAt, this.config.weeksToFetch, this.config.timezoneUtcHoursShift)
      const templates = await this.source.fetchTemplates(horizon, signal)

      this.transition('resolving')
      const { occurrences, warnings } = resolveOccurrences(templates, {
        horizon,
        englishTeacherName: this.config.englishTeacherFullName,
        englishSubjectName: this.config.englishSubjectName,
        cancelFirstEnglishLesson: this.config.cancelFirstEnglishLesson,
      })
      for (const warning of warnings) {
        log.warn({ kind: warning.kind, week: warning.week }, warning.message)
      }

      this.transition('encoding')
      const document = encodeCalendar(occurrences, {
        utcOffsetHours: this.config.timezoneUtcHoursShift,
        travelTime: this.config.firstLessonTravelTime,
        calendarName: this.config.calendarName,
      })

      this.transition('publishing')
      const result = await this.publisher.publish(document, signal)
      this.transition('idle')

      this.lastSuccessAt = this.now()
      this.lastError = null
      this.lastLessonCount = occurrences.length
      this.lastPublishChanged = result.changed

      log.info(
        {
          templates: templates.length,
          lessons: occurrences.length,
          changed: result.changed,
          durationMs: this.now().diff(startedAt).as('milliseconds'),
        },
        'Refresh pass complete',
      )

      return {
        status: 'published',
        changed: result.changed,
        lessons: occurrences.length,
        bytes: result.bytes,
        warnings: warnings.length,
      }
    } catch (err) {
      const failedIn = this.state
      const { kind, message } = describeError(err)
      if (this.busy) {
        this.transition('failed')
      }

      this.failureCount++
      this.lastError = { kind, message, at: this.now().toUTC().toISO() ?? '' }
      log.error({ kind, stage: failedIn, err }, `Refresh pass failed: ${message}`)

      return {
        status: 'failed',
        error: err instanceof Error ? err : new Error(String(err)),
      }
    }
  }

  private transition(next: RefreshState): void {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Illegal refresh state transition: ${this.state} -> ${next}`)
    }
    log.debug({ from: this.state, to: next }, 'State change')
    this.state = next
  }
}
