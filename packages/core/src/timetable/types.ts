/**
 * Timetable Types
 *
 * Lesson templates come from the schedule source, resolved occurrences feed
 * the encoder. Both live for a single refresh pass.
 */

import type { DateTime, Duration } from 'luxon'

/** ISO weekday, 1 = Monday .. 7 = Sunday */
export type IsoWeekday = 1 | 2 | 3 | 4 | 5 | 6 | 7

export type WeekParity = 'odd' | 'even'

/**
 * One weekly class slot as published by the university.
 */
export interface LessonTemplate {
  readonly subject: string

  /** Teacher full name, empty when the source lists none */
  readonly teacher: string

  /** Room or building, empty when unknown */
  readonly room: string

  readonly dayOfWeek: IsoWeekday

  /** Local wall-clock start, "HH:mm" */
  readonly startTime: string

  readonly durationMinutes: number

  /**
   * Index of the fetched week this slot was read from (0 = current week).
   * `null` repeats the slot on every week of the horizon.
   */
  readonly weekIndex: number | null

  /** Restricts the slot to odd or even ISO weeks */
  readonly parity?: WeekParity

  /** Marked as cancelled by the source itself */
  readonly cancelled?: boolean
}

/**
 * One concrete, dated lesson.
 *
 * Times are local wall-clock values. The UTC offset is applied by the
 * encoder and nowhere else.
 */
export interface ResolvedOccurrence {
  /** Local date, "yyyy-MM-dd" */
  readonly date: string

  /** Minutes after local midnight */
  readonly startMinutes: number

  readonly durationMinutes: number
  readonly subject: string
  readonly teacher: string
  readonly location: string
  readonly cancelled: boolean
}

/**
 * The weeks a refresh pass covers: `[start, start + weeks)`.
 */
export interface Horizon {
  /** Local Monday 00:00 of the first week */
  readonly start: DateTime
  readonly weeks: number
}

export interface ResolveOptions {
  readonly horizon: Horizon
  readonly englishTeacherName: string
  /** Subject text identifying English lessons of any subgroup */
  readonly englishSubjectName: string
  readonly cancelFirstEnglishLesson: boolean
}

export interface EncodeOptions {
  readonly utcOffsetHours: number
  /** Commute block placed before each day's first lesson */
  readonly travelTime: Duration | null
  readonly calendarName: string
}
