// Per-instrument failures. None of these abort a scan: gates convert them into failed results.

export type ScreenerErrorCode =
  | 'insufficient_history'
  | 'missing_field'
  | 'degenerate_group'
  | 'compute_error'
  | 'invalid_config'
  | 'invalid_batch'

export class ScreenerError extends Error {
  readonly code: ScreenerErrorCode

  constructor(code: ScreenerErrorCode, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

export class InsufficientHistoryError extends ScreenerError {
  readonly required: number
  readonly actual: number

  constructor(required: number, actual: number, what = 'bars') {
    super('insufficient_history', `insufficient history: ${actual} ${what} < ${required} required`)
    this.required = required
    this.actual = actual
  }
}

export class MissingFieldError extends ScreenerError {
  readonly field: string

  constructor(field: string) {
    super('missing_field', `missing field: ${field}`)
    this.field = field
  }
}

export class DegenerateGroupError extends ScreenerError {
  readonly group: string

  constructor(group: string, detail: string) {
    super('degenerate_group', `z-test skipped (${detail})`)
    this.group = group
  }
}

export class ComputeError extends ScreenerError {
  constructor(detail: string) {
    super('compute_error', `computation error: ${detail}`)
  }
}

export class ConfigError extends ScreenerError {
  readonly errors: string[]

  constructor(message: string, errors: string[] = []) {
    super('invalid_config', errors.length ? `${message}: ${errors.join('; ')}` : message)
    this.errors = errors
  }
}

export class BatchError extends ScreenerError {
  constructor(message: string) {
    super('invalid_batch', message)
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message || e.name
  return String(e)
}
