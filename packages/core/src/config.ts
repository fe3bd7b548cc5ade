/**
 * Configuration Loader
 *
 * Reads environment variables, falling back to an optional YAML file with
 * the same keys. The result is validated once at startup and handed around
 * as a frozen value.
 */

import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { Duration } from 'luxon'
import { parse } from 'yaml'
import { z } from 'zod'
import { ConfigError } from './errors.js'
import { createLogger } from './logger.js'

const log = createLogger('config')

const CONFIG_FILENAME = 'timetable.yaml'

const DEFAULT_ENGLISH_SUBJECT_NAME = 'Английский язык'
const DEFAULT_ACCEPT_LANGUAGE = 'ru-RU,ru;q=0.9'
const DEFAULT_OUTPUT_PATH = 'timetables/calendar.ics'

/** One academic year */
const MAX_WEEKS_TO_FETCH = 52

/** setInterval cannot wait longer than 2^31 - 1 ms */
const MAX_FETCH_EVERY_HOURS = 596

export interface TimetableConfig {
  readonly scheduleBaseUrl: string
  readonly scheduleAcceptLanguage: string

  readonly englishTeacherFullName: string
  readonly englishSubjectName: string
  /** Cancel the earliest lesson of the English teacher in every week */
  readonly cancelFirstEnglishLesson: boolean

  readonly timezoneUtcHoursShift: number
  readonly weeksToFetch: number
  readonly fetchEveryHours: number
  readonly passTimeoutSeconds: number

  /** Commute block before each day's first lesson, null when disabled */
  readonly firstLessonTravelTime: Duration | null
  readonly calendarName: string

  /** Where the served document is written */
  readonly outputPath: string

  readonly server: {
    readonly host: string
    readonly port: number
  }
}

export type ConfigValues = Record<string, string | undefined>

const TRUE_VALUES = ['true', '1', 'yes']
const FALSE_VALUES = ['false', '0', 'no']

const booleanValue = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .refine((value) => TRUE_VALUES.includes(value) || FALSE_VALUES.includes(value), {
    message: 'Expected true/false, 1/0 or yes/no',
  })
  .transform((value) => TRUE_VALUES.includes(value))

const integerValue = (min: number, max: number) =>
  z
    .string()
    .regex(/^\s*[-+]?\d+\s*$/, 'Expected an integer')
    .transform((value) => Number.parseInt(value, 10))
    .pipe(z.number().int().min(min).max(max))

const durationValue = z
  .string()
  .transform((value) => Duration.fromISO(value.trim()))
  .refine((duration) => duration.isValid && duration.as('milliseconds') >= 0, {
    message: 'Expected an ISO-8601 duration such as PT15M',
  })

const configSchema = z.object({
  SCHEDULE_BASE_URL: z.string().url(),
  SCHEDULE_ACCEPT_LANGUAGE: z.string().default(DEFAULT_ACCEPT_LANGUAGE),
  ENGLISH_TEACHER_FULL_NAME: z.string().trim().min(1),
  ENGLISH_SUBJECT_NAME: z.string().default(DEFAULT_ENGLISH_SUBJECT_NAME),
  IS_CANCEL_FIRST_ENGLISH_LESSON: booleanValue.default('true'),
  TIMEZONE_UTC_HOURS_SHIFT: integerValue(-12, 14).default('0'),
  WEEKS_TO_FETCH: integerValue(1, MAX_WEEKS_TO_FETCH).default('2'),
  FETCH_EVERY_HOURS: integerValue(1, MAX_FETCH_EVERY_HOURS).default('6'),
  PASS_TIMEOUT_SECONDS: integerValue(1, 24 * 60 * 60).default('300'),
  FIRST_LESSON_X_TRAVEL_TIME: durationValue.optional(),
  CALENDAR_NAME: z.string().default('Timetable'),
  OUTPUT_PATH: z.string().default(DEFAULT_OUTPUT_PATH),
  HOST: z.string().default('0.0.0.0'),
  PORT: integerValue(0, 65535).default('8080'),
})

/**
 * Read a YAML config file into string values. Nested values are ignored.
 */
function loadYamlValues(configPath: string): ConfigValues {
  if (!existsSync(configPath)) {
    return {}
  }

  let yaml: unknown
  try {
    yaml = parse(readFileSync(configPath, 'utf-8'))
  } catch (err) {
    throw new ConfigError([
      `${configPath}: ${err instanceof Error ? err.message : String(err)}`,
    ])
  }

  if (yaml === null || yaml === undefined) {
    return {}
  }
  if (typeof yaml !== 'object' || Array.isArray(yaml)) {
    throw new ConfigError([`${configPath}: expected a mapping of KEY: value`])
  }

  const values: ConfigValues = {}
  for (const [key, value] of Object.entries(yaml)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      values[key] = String(value)
    } else if (value !== null) {
      log.warn({ key }, `Ignoring non-scalar value in ${configPath}`)
    }
  }
  return values
}

/**
 * Merge value sources, first one wins. Empty strings count as unset.
 */
function mergeValues(...sources: ConfigValues[]): ConfigValues {
  const merged: ConfigValues = {}
  for (const key of Object.keys(configSchema.shape)) {
    for (const source of sources) {
      const value = source[key]
      if (value !== undefined && value.trim() !== '') {
        merged[key] = value
        break
      }
    }
  }
  return merged
}

/**
 * Validate raw values into a TimetableConfig.
 *
 * @throws ConfigError listing every invalid or missing key
 */
export function parseConfig(values: ConfigValues): TimetableConfig {
  const result = configSchema.safeParse(values)
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    )
  }

  const raw = result.data
  const travelTime = raw.FIRST_LESSON_X_TRAVEL_TIME

  return Object.freeze({
    scheduleBaseUrl: raw.SCHEDULE_BASE_URL,
    scheduleAcceptLanguage: raw.SCHEDULE_ACCEPT_LANGUAGE,
    englishTeacherFullName: raw.ENGLISH_TEACHER_FULL_NAME,
    englishSubjectName: raw.ENGLISH_SUBJECT_NAME,
    cancelFirstEnglishLesson: raw.IS_CANCEL_FIRST_ENGLISH_LESSON,
    timezoneUtcHoursShift: raw.TIMEZONE_UTC_HOURS_SHIFT,
    weeksToFetch: raw.WEEKS_TO_FETCH,
    fetchEveryHours: raw.FETCH_EVERY_HOURS,
    passTimeoutSeconds: raw.PASS_TIMEOUT_SECONDS,
    firstLessonTravelTime: travelTime && travelTime.as('milliseconds') > 0 ? travelTime : null,
    calendarName: raw.CALENDAR_NAME,
    outputPath: path.resolve(raw.OUTPUT_PATH),
    server: Object.freeze({ host: raw.HOST, port: raw.PORT }),
  })
}

export interface LoadConfigOptions {
  env?: ConfigValues
  /** YAML file consulted for keys the environment does not set */
  configPath?: string
}

/**
 * Load configuration from the environment and the optional YAML file.
 */
export function loadConfig(options: LoadConfigOptions = {}): TimetableConfig {
  const env = options.env ?? process.env
  const configPath = path.resolve(options.configPath ?? (env.TIMETABLE_CONFIG || CONFIG_FILENAME))
  const values = mergeValues(env, loadYamlValues(configPath))

  const config = parseConfig(values)

  if (values.TIMEZONE_UTC_HOURS_SHIFT === undefined) {
    log.warn('TIMEZONE_UTC_HOURS_SHIFT is not set, lessons are encoded as UTC')
  }

  return config
}
