/**
 * Refresh Scheduler Types
 */

import type { DateTime } from 'luxon'
import type { TimetableConfig } from '../config.js'
import type { Publisher } from '../publish/index.js'
import type { ScheduleSource } from '../timetable/index.js'

/**
 * Pass lifecycle. `failed` is entered from any busy state; a new pass may
 * start from `idle` or `failed`.
 */
export type RefreshState = 'idle' | 'fetching' | 'resolving' | 'encoding' | 'publishing' | 'failed'

export type TransformConfig = Pick<
  TimetableConfig,
  | 'englishTeacherFullName'
  | 'englishSubjectName'
  | 'cancelFirstEnglishLesson'
  | 'timezoneUtcHoursShift'
  | 'weeksToFetch'
  | 'fetchEveryHours'
  | 'passTimeoutSeconds'
  | 'firstLessonTravelTime'
  | 'calendarName'
>

export interface RefreshSchedulerOptions {
  config: TransformConfig
  source: ScheduleSource
  publisher: Publisher
  /** Clock, replaceable in tests */
  now?: () => DateTime
}

export type PassOutcome =
  | {
      status: 'published'
      changed: boolean
      lessons: number
      bytes: number
      warnings: number
    }
  | {
      status: 'failed'
      error: Error
    }
  | {
      /** Another pass was in flight; this trigger was dropped */
      status: 'skipped'
    }

export interface RefreshStatus {
  state: RefreshState
  running: boolean
  intervalMs: number
  passCount: number
  failureCount: number
  skippedCount: number
  lastPassAt: string | null
  lastSuccessAt: string | null
  nextPassAt: string | null
  lastError: { kind: string; message: string; at: string } | null
  lastLessonCount: number | null
  lastPublishChanged: boolean | null
}
