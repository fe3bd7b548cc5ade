/**
 * Unit Tests — Recurrence Resolver
 *
 * - Template expansion across the horizon (week index, parity)
 * - Deterministic ordering
 * - Foreign English lessons
 * - Cancel-first-English-lesson rule and soft no-match warnings
 */

import { describe, it, expect } from 'vitest'
import { DateTime } from 'luxon'
import { computeHorizon, isoWeekKey } from '../src/timetable/horizon.js'
import { resolveOccurrences, expandTemplate } from '../src/timetable/resolver.js'
import { NoMatchError } from '../src/errors.js'
import type { LessonTemplate, ResolveOptions } from '../src/timetable/types.js'

// -------------------------------------------------------------------
// Helpers
// -------------------------------------------------------------------

// Wednesday 2026-10-21, 15:00 at UTC+3; horizon starts Monday 2026-10-19 (ISO week 43)
const NOW = DateTime.fromISO('2026-10-21T12:00:00Z')
const horizon = computeHorizon(NOW, 2, 3)

function template(overrides: Partial<LessonTemplate> = {}): LessonTemplate {
  return {
    subject: 'Math',
    teacher: 'Ivanov',
    room: '101',
    dayOfWeek: 1,
    startTime: '09:00',
    durationMinutes: 90,
    weekIndex: 0,
    ...overrides,
  }
}

function english(dayOfWeek: LessonTemplate['dayOfWeek'], startTime: string, weekIndex = 0): LessonTemplate {
  return template({ subject: 'English', teacher: 'Smith Anna', dayOfWeek, startTime, weekIndex })
}

const options: ResolveOptions = {
  horizon,
  englishTeacherName: 'Smith Anna',
  englishSubjectName: 'English',
  cancelFirstEnglishLesson: true,
}

// -------------------------------------------------------------------
// Horizon
// -------------------------------------------------------------------

describe('computeHorizon', () => {
  it('starts on the Monday of the current local week', () => {
    expect(horizon.start.toISODate()).toBe('2026-10-19')
    expect(horizon.weeks).toBe(2)
    expect(isoWeekKey(horizon.start)).toBe('2026-W43')
  })

  it('uses the configured offset to decide which day it is', () => {
    // Sunday 22:00 UTC is already Monday 01:00 at UTC+3
    const late = DateTime.fromISO('2026-10-25T22:00:00Z')
    expect(computeHorizon(late, 1, 0).start.toISODate()).toBe('2026-10-19')
    expect(computeHorizon(late, 1, 3).start.toISODate()).toBe('2026-10-26')
  })
})

// -------------------------------------------------------------------
// Expansion
// -------------------------------------------------------------------

describe('expandTemplate', () => {
  it('places a week-indexed template on that week only', () => {
    const occurrences = expandTemplate(template({ dayOfWeek: 3, weekIndex: 1 }), { horizon })

    expect(occurrences).toEqual([
      {
        date: '2026-10-28',
        startMinutes: 540,
        durationMinutes: 90,
        subject: 'Math',
        teacher: 'Ivanov',
        location: '101',
        cancelled: false,
      },
    ])
  })

  it('repeats a template without week index on every week', () => {
    const dates = expandTemplate(template({ weekIndex: null }), { horizon }).map((o) => o.date)
    expect(dates).toEqual(['2026-10-19', '2026-10-26'])
  })

  it('respects week parity', () => {
    const even = expandTemplate(template({ weekIndex: null, parity: 'even' }), { horizon })
    const odd = expandTemplate(template({ weekIndex: null, parity: 'odd' }), { horizon })

    expect(even.map((o) => o.date)).toEqual(['2026-10-26'])
    expect(odd.map((o) => o.date)).toEqual(['2026-10-19'])
  })

  it('drops templates whose week lies outside the horizon', () => {
    expect(expandTemplate(template({ weekIndex: 2 }), { horizon })).toEqual([])
  })

  it('carries the source cancellation flag', () => {
    const [occurrence] = expandTemplate(template({ cancelled: true }), { horizon })
    expect(occurrence.cancelled).toBe(true)
  })
})

// -------------------------------------------------------------------
// Ordering
// -------------------------------------------------------------------

describe('resolveOccurrences ordering', () => {
  it('orders by date, start time, then subject name', () => {
    const { occurrences } = resolveOccurrences(
      [
        template({ subject: 'Physics', dayOfWeek: 2, startTime: '09:00' }),
        template({ subject: 'Physics', dayOfWeek: 1, startTime: '10:40' }),
        template({ subject: 'Algebra', dayOfWeek: 1, startTime: '10:40' }),
        template({ subject: 'History', dayOfWeek: 1, startTime: '09:00' }),
      ],
      { ...options, cancelFirstEnglishLesson: false },
    )

    expect(occurrences.map((o) => `${o.date} ${o.startMinutes} ${o.subject}`)).toEqual([
      '2026-10-19 540 History',
      '2026-10-19 640 Algebra',
      '2026-10-19 640 Physics',
      '2026-10-20 540 Physics',
    ])
  })

  it('is independent of input order', () => {
    const templates = [
      template({ subject: 'B', startTime: '09:00' }),
      template({ subject: 'A', startTime: '09:00' }),
      template({ subject: 'C', dayOfWeek: 5 }),
    ]

    const forward = resolveOccurrences(templates, options)
    const backward = resolveOccurrences([...templates].reverse(), options)
    expect(backward).toEqual(forward)
  })
})

// -------------------------------------------------------------------
// English rules
// -------------------------------------------------------------------

describe('resolveOccurrences English rules', () => {
  it('cancels only the earliest English lesson of the week', () => {
    const { occurrences } = resolveOccurrences(
      [english(2, '10:00'), english(1, '13:00'), english(1, '09:00'), template({ dayOfWeek: 1, startTime: '08:00' })],
      options,
    )

    const flagged = occurrences.filter((o) => o.cancelled)
    expect(flagged).toHaveLength(1)
    expect(flagged[0]).toMatchObject({ date: '2026-10-19', startMinutes: 540, subject: 'English' })

    const others = occurrences.filter((o) => o.subject === 'English' && !o.cancelled)
    expect(others.map((o) => `${o.date} ${o.startMinutes}`)).toEqual(['2026-10-19 780', '2026-10-20 600'])
  })

  it('applies the rule to every week independently', () => {
    const { occurrences, warnings } = resolveOccurrences(
      [english(4, '09:00', 0), english(2, '12:00', 1), english(2, '15:00', 1)],
      options,
    )

    expect(occurrences.filter((o) => o.cancelled).map((o) => o.date)).toEqual(['2026-10-22', '2026-10-27'])
    expect(warnings).toEqual([])
  })

  it('keeps cancelled occurrences in the output', () => {
    const { occurrences } = resolveOccurrences([english(1, '09:00')], options)
    expect(occurrences).toHaveLength(1)
    expect(occurrences[0].cancelled).toBe(true)
  })

  it('leaves everything unflagged when the rule is off', () => {
    const { occurrences, warnings } = resolveOccurrences([english(1, '09:00'), english(2, '09:00')], {
      ...options,
      cancelFirstEnglishLesson: false,
    })

    expect(occurrences.every((o) => !o.cancelled)).toBe(true)
    expect(warnings).toEqual([])
  })

  it('reports weeks without an English-teacher lesson as soft warnings', () => {
    const { occurrences, warnings } = resolveOccurrences([english(1, '09:00', 0), template({ weekIndex: 1 })], options)

    expect(warnings).toHaveLength(1)
    expect(warnings[0]).toBeInstanceOf(NoMatchError)
    expect(warnings[0].week).toBe('2026-W44')
    expect(warnings[0].fatal).toBe(false)
    expect(occurrences.filter((o) => o.cancelled)).toHaveLength(1)
  })

  it('matches the teacher name case-sensitively', () => {
    const { occurrences, warnings } = resolveOccurrences(
      [template({ subject: 'Phonetics', teacher: 'smith anna' })],
      { ...options, horizon: computeHorizon(NOW, 1, 3) },
    )

    expect(occurrences[0].cancelled).toBe(false)
    expect(warnings.map((w) => w.week)).toEqual(['2026-W43'])
  })

  it('matches the teacher name inside a decorated teacher field', () => {
    const { occurrences } = resolveOccurrences(
      [template({ subject: 'English', teacher: 'Assoc. Prof. Smith Anna' })],
      options,
    )
    expect(occurrences[0].cancelled).toBe(true)
  })

  it('drops English lessons taught to another subgroup', () => {
    const { occurrences } = resolveOccurrences(
      [
        template({ subject: 'English', teacher: 'Jones Mary', startTime: '09:00' }),
        english(1, '09:00'),
        template({ subject: 'Math', teacher: 'Jones Mary', startTime: '12:00' }),
      ],
      { ...options, cancelFirstEnglishLesson: false },
    )

    expect(occurrences.map((o) => `${o.subject} ${o.teacher}`)).toEqual(['English Smith Anna', 'Math Jones Mary'])
  })
})
