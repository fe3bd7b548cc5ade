/**
 * Timetable transform: source → resolver → encoder.
 */

export type {
  IsoWeekday,
  WeekParity,
  LessonTemplate,
  ResolvedOccurrence,
  Horizon,
  ResolveOptions,
  EncodeOptions,
} from './types.js'

export { computeHorizon } from './horizon.js'
export { resolveOccurrences } from './resolver.js'
export type { ResolveResult } from './resolver.js'
export { encodeCalendar } from './encoder.js'
export { HttpScheduleSource } from './source.js'
export type { ScheduleSource, HttpScheduleSourceOptions } from './source.js'
