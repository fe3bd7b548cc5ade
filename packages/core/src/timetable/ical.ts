/**
 * iCalendar content-line helpers (RFC 5545 §3.1, §3.3.11).
 */

import type { DateTime } from 'luxon'

export const CRLF = '\r\n'

const MAX_LINE_OCTETS = 75

/**
 * Escape a TEXT property value.
 */
export function escapeICalText(text: string): string {
  return text
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r\n|\r|\n/g, '\\n')
}

/**
 * Fold a content line into chunks of at most 75 octets. Continuation lines
 * start with a single space, which counts toward their length. Multi-byte
 * characters are never split.
 */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, 'utf-8') <= MAX_LINE_OCTETS) {
    return line
  }

  const parts: string[] = []
  let current = ''
  let currentOctets = 0
  let limit = MAX_LINE_OCTETS

  for (const char of line) {
    const octets = Buffer.byteLength(char, 'utf-8')
    if (currentOctets + octets > limit) {
      parts.push(current)
      current = ''
      currentOctets = 0
      limit = MAX_LINE_OCTETS - 1
    }
    current += char
    currentOctets += octets
  }
  parts.push(current)

  return parts.join(`${CRLF} `)
}

/**
 * UTC DATE-TIME value, e.g. "20261019T070000Z".
 */
export function formatICalUtc(instant: DateTime): string {
  return instant.toUTC().toFormat("yyyyMMdd'T'HHmmss'Z'")
}

/**
 * Serialize content lines into a document with CRLF line endings.
 */
export function serializeLines(lines: readonly string[]): string {
  return lines.map(foldLine).join(CRLF) + CRLF
}
