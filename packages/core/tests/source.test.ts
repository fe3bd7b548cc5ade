/**
 * Unit Tests — HTTP Schedule Source
 *
 * Uses a stubbed global fetch; no network access.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { DateTime } from 'luxon'
import { HttpScheduleSource, normalizeText, parseWeekPayload } from '../src/timetable/source.js'
import { computeHorizon } from '../src/timetable/horizon.js'
import { FetchError } from '../src/errors.js'

// -------------------------------------------------------------------
// Helpers
// -------------------------------------------------------------------

const horizon = computeHorizon(DateTime.fromISO('2026-10-21T12:00:00Z'), 2, 3)

let mockFetch: ReturnType<typeof vi.fn>

function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })
}

function createSource(): HttpScheduleSource {
  return new HttpScheduleSource({
    baseUrl: 'https://timetable.example.edu/group/42/',
    acceptLanguage: 'ru-RU,ru;q=0.9',
  })
}

// -------------------------------------------------------------------
// Payload parsing
// -------------------------------------------------------------------

describe('parseWeekPayload', () => {
  it('normalizes text and derives the duration from the end time', () => {
    const templates = parseWeekPayload(
      {
        lessons: [
          {
            subject: '\n   Математика\r\n  ',
            teacher: 'Петров   П.П.',
            room: 'ауд. 101',
            dayOfWeek: 1,
            startTime: '9:00',
            endTime: '10:30',
          },
        ],
      },
      1,
    )

    expect(templates).toEqual([
      {
        subject: 'Математика',
        teacher: 'Петров П.П.',
        room: 'ауд. 101',
        dayOfWeek: 1,
        startTime: '9:00',
        durationMinutes: 90,
        weekIndex: 1,
        parity: undefined,
        cancelled: undefined,
      },
    ])
  })

  it('defaults teacher and room to empty strings', () => {
    const [template] = parseWeekPayload(
      { lessons: [{ subject: 'PE', dayOfWeek: 6, startTime: '12:00', durationMinutes: 45, cancelled: true }] },
      0,
    )

    expect(template).toMatchObject({ teacher: '', room: '', durationMinutes: 45, cancelled: true })
  })

  it('rejects an invalid weekday', () => {
    expect(() =>
      parseWeekPayload({ lessons: [{ subject: 'PE', dayOfWeek: 8, startTime: '12:00', durationMinutes: 45 }] }, 0),
    ).toThrow(/lessons\.0\.dayOfWeek/)
  })

  it('rejects a lesson without duration or end time', () => {
    expect(() => parseWeekPayload({ lessons: [{ subject: 'PE', dayOfWeek: 1, startTime: '12:00' }] }, 0)).toThrow(
      'Either durationMinutes or endTime is required',
    )
  })

  it('rejects a malformed start time', () => {
    expect(() =>
      parseWeekPayload({ lessons: [{ subject: 'PE', dayOfWeek: 1, startTime: 'noon', durationMinutes: 45 }] }, 0),
    ).toThrow(FetchError)
  })

  it('collapses whitespace', () => {
    expect(normalizeText('  a\n\n b    c ')).toBe('a b c')
  })
})

// -------------------------------------------------------------------
// HTTP
// -------------------------------------------------------------------

describe('HttpScheduleSource', () => {
  beforeEach(() => {
    mockFetch = vi.fn()
    vi.stubGlobal('fetch', mockFetch)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('requests one document per week starting on Monday', async () => {
    mockFetch
      .mockResolvedValueOnce(
        jsonResponse({ lessons: [{ subject: 'Math', dayOfWeek: 1, startTime: '09:00', durationMinutes: 90 }] }),
      )
      .mockResolvedValueOnce(
        jsonResponse({ lessons: [{ subject: 'Physics', dayOfWeek: 2, startTime: '10:40', durationMinutes: 90 }] }),
      )

    const templates = await createSource().fetchTemplates(horizon)

    expect(mockFetch).toHaveBeenCalledTimes(2)
    expect(mockFetch.mock.calls[0][0]).toBe('https://timetable.example.edu/group/42/2026-10-19')
    expect(mockFetch.mock.calls[1][0]).toBe('https://timetable.example.edu/group/42/2026-10-26')
    expect(mockFetch.mock.calls[0][1]).toMatchObject({
      headers: { Accept: 'application/json', 'Accept-Language': 'ru-RU,ru;q=0.9' },
    })
    expect(templates.map((t) => `${t.subject}@${t.weekIndex}`)).toEqual(['Math@0', 'Physics@1'])
  })

  it('reads a fresh response for every week', async () => {
    mockFetch.mockImplementation(async () => jsonResponse({ lessons: [] }))

    await createSource().fetchTemplates(horizon)

    expect(mockFetch).toHaveBeenCalledTimes(2)
    const [first, second] = await Promise.all(mockFetch.mock.results.map((result) => result.value))
    expect(first).not.toBe(second)
  })

  it('accepts an empty week', async () => {
    mockFetch.mockImplementation(async () => jsonResponse({ lessons: [] }))
    expect(await createSource().fetchTemplates(horizon)).toEqual([])
  })

  it('raises FetchError on a non-2xx status', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ error: 'down' }, 503))

    await expect(createSource().fetchTemplates(horizon)).rejects.toThrow(
      'Failed to fetch schedule at https://timetable.example.edu/group/42/2026-10-19: HTTP 503',
    )
  })

  it('raises FetchError when the source is unreachable', async () => {
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'))

    const result = createSource().fetchTemplates(horizon)
    await expect(result).rejects.toBeInstanceOf(FetchError)
    await expect(result).rejects.toThrow('fetch failed')
  })

  it('raises FetchError on a body that is not JSON', async () => {
    mockFetch.mockResolvedValueOnce(new Response('<html></html>', { status: 200 }))

    await expect(createSource().fetchTemplates(horizon)).rejects.toBeInstanceOf(FetchError)
  })

  it('passes the abort signal to fetch', async () => {
    mockFetch.mockImplementation(async () => jsonResponse({ lessons: [] }))
    const controller = new AbortController()

    await createSource().fetchTemplates(horizon, controller.signal)

    expect(mockFetch.mock.calls[0][1]).toMatchObject({ signal: controller.signal })
  })
})
