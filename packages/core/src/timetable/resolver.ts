/**
 * Recurrence Resolver
 *
 * Expands weekly lesson templates into dated occurrences across the horizon
 * and applies the English-lesson rules.
 */

import { NoMatchError } from '../errors.js'
import { isoWeekKey, parseClockTime, parseLocalDate, weekStart } from './horizon.js'
import type { LessonTemplate, ResolveOptions, ResolvedOccurrence } from './types.js'

export interface ResolveResult {
  occurrences: ResolvedOccurrence[]
  /** Soft problems: weeks without any lesson by the English teacher */
  warnings: NoMatchError[]
}

/**
 * Case-sensitive containment, so source decorations around the name
 * ("доц. Иванова Анна Петровна") still match.
 */
function isTaughtBy(teacher: string, name: string): boolean {
  return name.length > 0 && teacher.includes(name)
}

/**
 * Lessons of the English subject taught to another subgroup.
 */
function isForeignEnglishLesson(occurrence: ResolvedOccurrence, options: ResolveOptions): boolean {
  return (
    options.englishSubjectName.length > 0 &&
    occurrence.subject.includes(options.englishSubjectName) &&
    !isTaughtBy(occurrence.teacher, options.englishTeacherName)
  )
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

function compareOccurrences(a: ResolvedOccurrence, b: ResolvedOccurrence): number {
  return (
    compareStrings(a.date, b.date) ||
    a.startMinutes - b.startMinutes ||
    compareStrings(a.subject, b.subject) ||
    compareStrings(a.teacher, b.teacher) ||
    compareStrings(a.location, b.location)
  )
}

function matchesParity(template: LessonTemplate, weekNumber: number): boolean {
  if (!template.parity) return true
  return template.parity === (weekNumber % 2 === 0 ? 'even' : 'odd')
}

/**
 * Week indexes of the horizon a template lands on.
 */
function weeksFor(template: LessonTemplate, weeks: number): number[] {
  if (template.weekIndex === null) {
    return Array.from({ length: weeks }, (_, i) => i)
  }
  if (template.weekIndex < 0 || template.weekIndex >= weeks) {
    return []
  }
  return [template.weekIndex]
}

/**
 * Expand one template into its occurrences.
 * Templates with an unreadable start time are passed through with NaN so the
 * encoder rejects the pass instead of the lesson vanishing silently.
 */
export function expandTemplate(
  template: LessonTemplate,
  options: Pick<ResolveOptions, 'horizon'>,
): ResolvedOccurrence[] {
  const { horizon } = options
  const startMinutes = parseClockTime(template.startTime) ?? Number.NaN
  const occurrences: ResolvedOccurrence[] = []

  for (const index of weeksFor(template, horizon.weeks)) {
    const monday = weekStart(horizon, index)
    if (!matchesParity(template, monday.weekNumber)) continue

    occurrences.push({
      date: monday.plus({ days: template.dayOfWeek - 1 }).toISODate() ?? '',
      startMinutes,
      durationMinutes: template.durationMinutes,
      subject: template.subject,
      teacher: template.teacher,
      location: template.room,
      cancelled: template.cancelled ?? false,
    })
  }

  return occurrences
}

function withinHorizon(occurrence: ResolvedOccurrence, options: ResolveOptions): boolean {
  const date = parseLocalDate(occurrence.date)
  if (!date.isValid) return true // left for the encoder to reject
  const end = weekStart(options.horizon, options.horizon.weeks)
  return date.toMillis() >= options.horizon.start.toMillis() && date.toMillis() < end.toMillis()
}

/**
 * Resolve a fetched set of templates into ordered occurrences.
 */
export function resolveOccurrences(
  templates: readonly LessonTemplate[],
  options: ResolveOptions,
): ResolveResult {
  const occurrences = templates
    .flatMap((template) => expandTemplate(template, options))
    .filter((occurrence) => withinHorizon(occurrence, options))
    .filter((occurrence) => !isForeignEnglishLesson(occurrence, options))
    .sort(compareOccurrences)

  const warnings: NoMatchError[] = []

  if (options.cancelFirstEnglishLesson) {
    for (const [week, indexes] of partitionByWeek(occurrences, options)) {
      const first = indexes.find((i) => isTaughtBy(occurrences[i].teacher, options.englishTeacherName))
      if (first === undefined) {
        warnings.push(new NoMatchError(week, options.englishTeacherName))
        continue
      }
      occurrences[first] = { ...occurrences[first], cancelled: true }
    }
  }

  return { occurrences, warnings }
}

/**
 * ISO week key → indexes into the sorted occurrence list, one entry for every
 * horizon week so that empty weeks still report a missing match.
 */
function partitionByWeek(
  occurrences: readonly ResolvedOccurrence[],
  options: ResolveOptions,
): Map<string, number[]> {
  const weeks = new Map<string, number[]>()

  for (let i = 0; i < options.horizon.weeks; i++) {
    weeks.set(isoWeekKey(weekStart(options.horizon, i)), [])
  }

  occurrences.forEach((occurrence, i) => {
    const date = parseLocalDate(occurrence.date)
    if (!date.isValid) return
    const key = isoWeekKey(date)
    const bucket = weeks.get(key)
    if (bucket) {
      bucket.push(i)
    } else {
      weeks.set(key, [i])
    }
  })

  return weeks
}
