/**
 * Schedule Source
 *
 * Retrieves lesson templates for every week of the horizon. The HTTP client
 * expects one JSON document per week at `<baseUrl>/<yyyy-MM-dd>` (the week's
 * Monday) and validates it before anything reaches the resolver.
 */

import { z } from 'zod'
import { FetchError } from '../errors.js'
import { createLogger } from '../logger.js'
import { parseClockTime, weekStart } from './horizon.js'
import type { Horizon, IsoWeekday, LessonTemplate } from './types.js'

/**
 * Anything able to produce the lesson templates of a horizon.
 */
export interface ScheduleSource {
  fetchTemplates(horizon: Horizon, signal?: AbortSignal): Promise<LessonTemplate[]>
}

const log = createLogger('source')

/**
 * Remove line breaks and collapse the padding scraped pages carry.
 */
export function normalizeText(text: string): string {
  return text.replace(/[\r\n]+/g, ' ').replace(/\s{2,}/g, ' ').trim()
}

const text = z.string().transform(normalizeText)
const clockTime = z.string().refine((value) => parseClockTime(value) !== null, {
  message: 'Expected a time in HH:mm format',
})

const lessonSchema = z
  .object({
    subject: text,
    teacher: text.default(''),
    room: text.default(''),
    dayOfWeek: z.number().int().min(1).max(7),
    startTime: clockTime,
    endTime: clockTime.optional(),
    durationMinutes: z.number().optional(),
    parity: z.enum(['odd', 'even']).optional(),
    cancelled: z.boolean().optional(),
  })
  .refine((lesson) => lesson.durationMinutes !== undefined || lesson.endTime !== undefined, {
    message: 'Either durationMinutes or endTime is required',
  })

const weekSchema = z.object({
  lessons: z.array(lessonSchema),
})

type LessonPayload = z.infer<typeof lessonSchema>

const ISO_WEEKDAYS: readonly IsoWeekday[] = [1, 2, 3, 4, 5, 6, 7]

function toIsoWeekday(day: number): IsoWeekday {
  const weekday = ISO_WEEKDAYS.find((candidate) => candidate === day)
  if (weekday === undefined) {
    throw new RangeError(`Not an ISO weekday: ${day}`)
  }
  return weekday
}

function durationOf(lesson: LessonPayload): number {
  if (lesson.durationMinutes !== undefined) {
    return lesson.durationMinutes
  }
  // Both times were validated by the schema
  const start = parseClockTime(lesson.startTime) ?? 0
  const end = parseClockTime(lesson.endTime ?? '') ?? 0
  return end - start
}

/**
 * Convert a validated payload lesson into a template of the given week.
 */
export function toLessonTemplate(lesson: LessonPayload, weekIndex: number): LessonTemplate {
  return {
    subject: lesson.subject,
    teacher: lesson.teacher,
    room: lesson.room,
    dayOfWeek: toIsoWeekday(lesson.dayOfWeek),
    startTime: lesson.startTime.trim(),
    durationMinutes: durationOf(lesson),
    weekIndex,
    parity: lesson.parity,
    cancelled: lesson.cancelled,
  }
}

/**
 * Validate one week's payload.
 *
 * @throws FetchError when the payload does not match the expected shape
 */
export function parseWeekPayload(payload: unknown, weekIndex: number, url?: string): LessonTemplate[] {
  const result = weekSchema.safeParse(payload)
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new FetchError(`Malformed schedule payload: ${issues}`, { url })
  }
  return result.data.lessons.map((lesson) => toLessonTemplate(lesson, weekIndex))
}

export interface HttpScheduleSourceOptions {
  baseUrl: string
  acceptLanguage: string
}

export class HttpScheduleSource implements ScheduleSource {
  private baseUrl: string
  private acceptLanguage: string

  constructor(options: HttpScheduleSourceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
    this.acceptLanguage = options.acceptLanguage
  }

  weekUrl(horizon: Horizon, index: number): string {
    return `${this.baseUrl}/${weekStart(horizon, index).toISODate() ?? ''}`
  }

  async fetchTemplates(horizon: Horizon, signal?: AbortSignal): Promise<LessonTemplate[]> {
    const templates: LessonTemplate[] = []

    for (let index = 0; index < horizon.weeks; index++) {
      const week = await this.fetchWeek(horizon, index, signal)
      log.debug({ week: index, lessons: week.length }, 'Fetched schedule week')
      templates.push(...week)
    }

    return templates
  }

  private async fetchWeek(horizon: Horizon, index: number, signal?: AbortSignal): Promise<LessonTemplate[]> {
    const url = this.weekUrl(horizon, index)

    let response: Response
    try {
      response = await fetch(url, {
        headers: {
          Accept: 'application/json',
          'Accept-Language': this.acceptLanguage,
        },
        signal,
      })
    } catch (err) {
      throw new FetchError(
        `Schedule source unreachable at ${url}: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err, url },
      )
    }

    if (!response.ok) {
      throw new FetchError(`Failed to fetch schedule at ${url}: HTTP ${response.status}`, { url })
    }

    let payload: unknown
    try {
      payload = await response.json()
    } catch (err) {
      throw new FetchError(`Schedule at ${url} is not valid JSON`, { cause: err, url })
    }

    return parseWeekPayload(payload, index, url)
  }
}
