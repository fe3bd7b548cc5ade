/**
 * Horizon and week helpers shared by the source and the resolver.
 */

import { DateTime, FixedOffsetZone } from 'luxon'
import type { Horizon } from './types.js'

/**
 * Build the horizon starting on the Monday of the week containing `now`,
 * as seen from the configured UTC offset.
 */
export function computeHorizon(now: DateTime, weeks: number, utcOffsetHours: number): Horizon {
  const local = now.setZone(FixedOffsetZone.instance(utcOffsetHours * 60))
  const start = DateTime.fromObject(
    { year: local.year, month: local.month, day: local.day },
    { zone: 'UTC' },
  ).startOf('week')

  return { start, weeks }
}

/**
 * Monday of the horizon's `index`-th week.
 */
export function weekStart(horizon: Horizon, index: number): DateTime {
  return horizon.start.plus({ weeks: index })
}

/**
 * ISO week key used to partition occurrences, e.g. "2026-W43".
 */
export function isoWeekKey(date: DateTime): string {
  return `${date.weekYear}-W${String(date.weekNumber).padStart(2, '0')}`
}

export function parseLocalDate(date: string): DateTime {
  return DateTime.fromISO(date, { zone: 'UTC' })
}

/**
 * "HH:mm" to minutes after midnight, or null when malformed.
 */
export function parseClockTime(time: string): number | null {
  const match = /^(\d{1,2}):(\d{2})$/.exec(time.trim())
  if (!match) return null

  const hours = Number(match[1])
  const minutes = Number(match[2])
  if (hours > 23 || minutes > 59) return null

  return hours * 60 + minutes
}

export function formatClockTime(totalMinutes: number): string {
  const hours = Math.floor(totalMinutes / 60)
  const minutes = totalMinutes % 60
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`
}
