/**
 * Calendar Encoder
 *
 * Serializes resolved occurrences into an iCalendar document. The output is
 * a pure function of its input: no clock reads and no random identifiers, so
 * re-encoding the same lessons yields the same bytes and the same UIDs.
 */

import { createHash } from 'node:crypto'
import { DateTime, FixedOffsetZone, type Duration } from 'luxon'
import { EncodingError } from '../errors.js'
import { escapeICalText, formatICalUtc, serializeLines } from './ical.js'
import { formatClockTime } from './horizon.js'
import type { EncodeOptions, ResolvedOccurrence } from './types.js'

const PRODUCT_ID = '-//timetable-ics//timetable//EN'
const UID_DOMAIN = 'timetable-ics'
const MINUTES_PER_DAY = 24 * 60

const TRAVEL_SUMMARY = 'Travel'
const TRAVEL_CATEGORY = 'TRAVEL'

interface EventLines {
  uid: string
  start: DateTime
  end: DateTime
  summary: string
  location?: string
  description?: string
  status: 'CONFIRMED' | 'CANCELLED'
  category?: string
}

/** Raised when a lesson is cancelled so clients take the change as newer */
const SEQUENCE_BY_STATUS: Record<EventLines['status'], number> = {
  CONFIRMED: 0,
  CANCELLED: 1,
}

function stableUid(...parts: string[]): string {
  const digest = createHash('sha1').update(parts.join('|'), 'utf-8').digest('hex')
  return `${digest}@${UID_DOMAIN}`
}

function lessonKey(occurrence: ResolvedOccurrence): string[] {
  return [occurrence.date, formatClockTime(occurrence.startMinutes), occurrence.subject, occurrence.teacher]
}

/**
 * Identifier of a lesson, derived from day, start time, subject and teacher.
 * `ordinal` tells apart lessons sharing all four (one lab listed in two
 * rooms); the first of them keeps the plain identifier.
 */
export function lessonUid(occurrence: ResolvedOccurrence, ordinal = 0): string {
  const key = lessonKey(occurrence)
  return ordinal === 0 ? stableUid(...key) : stableUid(...key, String(ordinal))
}

export function travelUid(date: string): string {
  return stableUid('travel', date)
}

function lessonSummary(occurrence: ResolvedOccurrence): string {
  return occurrence.teacher ? `${occurrence.subject} (${occurrence.teacher})` : occurrence.subject
}

function validateOccurrence(occurrence: ResolvedOccurrence, position: number): void {
  const label = `Occurrence #${position} (${occurrence.date || 'no date'} "${occurrence.subject}")`

  if (!occurrence.subject || !occurrence.subject.trim()) {
    throw new EncodingError(`${label}: subject is missing`)
  }
  if (!occurrence.date || !DateTime.fromISO(occurrence.date, { zone: 'UTC' }).isValid) {
    throw new EncodingError(`${label}: start date is missing or invalid`)
  }
  if (
    !Number.isInteger(occurrence.startMinutes) ||
    occurrence.startMinutes < 0 ||
    occurrence.startMinutes >= MINUTES_PER_DAY
  ) {
    throw new EncodingError(`${label}: start time is missing or invalid`)
  }
  if (!Number.isFinite(occurrence.durationMinutes) || occurrence.durationMinutes <= 0) {
    throw new EncodingError(`${label}: duration must be positive, got ${occurrence.durationMinutes}`)
  }
}

/**
 * Absolute start of an occurrence: local wall-clock time in the configured
 * offset. This is the only place the offset is applied.
 */
function occurrenceStart(occurrence: ResolvedOccurrence, utcOffsetHours: number): DateTime {
  return DateTime.fromISO(occurrence.date, {
    zone: FixedOffsetZone.instance(utcOffsetHours * 60),
  }).plus({ minutes: occurrence.startMinutes })
}

function hasTravelTime(travelTime: Duration | null): travelTime is Duration {
  return travelTime !== null && travelTime.isValid && travelTime.as('milliseconds') > 0
}

function lessonEvent(occurrence: ResolvedOccurrence, ordinal: number, utcOffsetHours: number): EventLines {
  const start = occurrenceStart(occurrence, utcOffsetHours)

  return {
    uid: lessonUid(occurrence, ordinal),
    start,
    end: start.plus({ minutes: occurrence.durationMinutes }),
    summary: lessonSummary(occurrence),
    location: occurrence.location || undefined,
    description: occurrence.teacher ? `Teacher: ${occurrence.teacher}` : undefined,
    status: occurrence.cancelled ? 'CANCELLED' : 'CONFIRMED',
  }
}

function travelEvent(date: string, lessonStart: DateTime, travelTime: Duration): EventLines {
  return {
    uid: travelUid(date),
    start: lessonStart.minus(travelTime),
    end: lessonStart,
    summary: TRAVEL_SUMMARY,
    status: 'CONFIRMED',
    category: TRAVEL_CATEGORY,
  }
}

function eventToLines(event: EventLines): string[] {
  const lines = [
    'BEGIN:VEVENT',
    `UID:${event.uid}`,
    `DTSTAMP:${formatICalUtc(event.start)}`,
    `DTSTART:${formatICalUtc(event.start)}`,
    `DTEND:${formatICalUtc(event.end)}`,
    `SEQUENCE:${SEQUENCE_BY_STATUS[event.status]}`,
    `SUMMARY:${escapeICalText(event.summary)}`,
  ]

  if (event.location) {
    lines.push(`LOCATION:${escapeICalText(event.location)}`)
  }
  if (event.description) {
    lines.push(`DESCRIPTION:${escapeICalText(event.description)}`)
  }
  if (event.category) {
    lines.push(`CATEGORIES:${event.category}`)
  }

  lines.push(`STATUS:${event.status}`, 'TRANSP:OPAQUE', 'END:VEVENT')
  return lines
}

/**
 * Group occurrences by local date, keeping their order.
 */
function groupByDay(occurrences: readonly ResolvedOccurrence[]): Map<string, ResolvedOccurrence[]> {
  const days = new Map<string, ResolvedOccurrence[]>()
  for (const occurrence of occurrences) {
    const day = days.get(occurrence.date)
    if (day) {
      day.push(occurrence)
    } else {
      days.set(occurrence.date, [occurrence])
    }
  }
  return days
}

/**
 * "+0300" style offset for TZOFFSETFROM/TZOFFSETTO.
 */
function formatUtcOffset(utcOffsetHours: number): string {
  const sign = utcOffsetHours < 0 ? '-' : '+'
  return `${sign}${String(Math.abs(utcOffsetHours)).padStart(2, '0')}00`
}

/**
 * Fixed-offset VTIMEZONE. Emitted only for a calendar without events, which
 * must still carry one component.
 */
function offsetTimezoneLines(utcOffsetHours: number): string[] {
  const offset = formatUtcOffset(utcOffsetHours)
  return [
    'BEGIN:VTIMEZONE',
    `TZID:UTC${offset.slice(0, 3)}:${offset.slice(3)}`,
    'BEGIN:STANDARD',
    'DTSTART:19700101T000000',
    `TZOFFSETFROM:${offset}`,
    `TZOFFSETTO:${offset}`,
    'END:STANDARD',
    'END:VTIMEZONE',
  ]
}

/**
 * Encode ordered occurrences as an iCalendar document.
 *
 * @throws EncodingError when an occurrence lacks a subject or a valid start,
 * or has a non-positive duration
 */
export function encodeCalendar(
  occurrences: readonly ResolvedOccurrence[],
  options: EncodeOptions,
): string {
  occurrences.forEach((occurrence, i) => validateOccurrence(occurrence, i))

  const lines: string[] = [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    `PRODID:${PRODUCT_ID}`,
    'CALSCALE:GREGORIAN',
    'METHOD:PUBLISH',
    `X-WR-CALNAME:${escapeICalText(options.calendarName)}`,
  ]

  const seen = new Map<string, number>()

  for (const [date, lessons] of groupByDay(occurrences)) {
    const firstAttended = lessons.find((lesson) => !lesson.cancelled)

    if (firstAttended && hasTravelTime(options.travelTime)) {
      const start = occurrenceStart(firstAttended, options.utcOffsetHours)
      lines.push(...eventToLines(travelEvent(date, start, options.travelTime)))
    }

    for (const lesson of lessons) {
      const key = lessonKey(lesson).join('|')
      const ordinal = seen.get(key) ?? 0
      seen.set(key, ordinal + 1)
      lines.push(...eventToLines(lessonEvent(lesson, ordinal, options.utcOffsetHours)))
    }
  }

  if (occurrences.length === 0) {
    lines.push(...offsetTimezoneLines(options.utcOffsetHours))
  }

  lines.push('END:VCALENDAR')
  return serializeLines(lines)
}
