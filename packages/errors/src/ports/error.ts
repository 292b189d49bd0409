export type ErrorCode = Lowercase<string>

/**
 * Structured metadata attached to an error: the keys, field names and raw
 * inputs involved in the failure.
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  /** Machine-readable code, e.g. `config_missing` */
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** `true` if trying the same operation again might succeed */
  readonly isRetryable: boolean

  /**
   * Whether this is an expected runtime failure (`true`) or a programmer
   * error (`false`).
   *
   * @remarks
   * - Operational: an unset environment variable, a value that does not parse.
   * - Non-operational: a malformed schema, a broken invariant.
   *
   * @default true
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe shape of an error, used by loggers and `toJSON()`.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
