/**
 * Error kinds raised by the refresh pipeline.
 *
 * Only `NoMatchError` is soft: it is collected as a warning and never aborts
 * a pass. Everything else aborts the current pass and keeps the previously
 * published document in place.
 */

export type TimetableErrorKind = 'config' | 'fetch' | 'no-match' | 'encoding' | 'publish'

export abstract class TimetableError extends Error {
  abstract readonly kind: TimetableErrorKind

  /** Whether the error aborts the pass it was raised in */
  get fatal(): boolean {
    return true
  }
}

export class ConfigError extends TimetableError {
  readonly kind = 'config'
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }
}

export class FetchError extends TimetableError {
  readonly kind = 'fetch'
  readonly url?: string

  constructor(message: string, options?: ErrorOptions & { url?: string }) {
    super(message, options)
    this.name = 'FetchError'
    this.url = options?.url
  }
}

export class NoMatchError extends TimetableError {
  readonly kind = 'no-match'
  /** ISO week key, e.g. "2026-W43" */
  readonly week: string

  constructor(week: string, teacher: string) {
    super(`No lesson taught by "${teacher}" in week ${week}`)
    this.name = 'NoMatchError'
    this.week = week
  }

  override get fatal(): boolean {
    return false
  }
}

export class EncodingError extends TimetableError {
  readonly kind = 'encoding'

  constructor(message: string) {
    super(message)
    this.name = 'EncodingError'
  }
}

export class PublishError extends TimetableError {
  readonly kind = 'publish'

  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'PublishError'
  }
}

/**
 * Short error description for logs and status payloads.
 */
export function describeError(err: unknown): { kind: string; message: string } {
  if (err instanceof TimetableError) {
    return { kind: err.kind, message: err.message }
  }
  return {
    kind: 'unexpected',
    message: err instanceof Error ? err.message : String(err),
  }
}
