import { BaseError, type ErrorContext } from "@envbind/errors"

/**
 * The environment variable `key` is not set.
 */
export class ConfigMissingError extends BaseError<"config_missing"> {
  constructor(readonly key: string) {
    super(`Missing environment variable ${key}`, {
      code: "config_missing",
      context: { key },
    })
  }
}

export type InvalidDataDetails = Readonly<{
  /** Environment variable the value was read from */
  key: string
  /** Record member it was meant for */
  field: string
  /** Name of the target type */
  expected: string
  reason?: string
  cause?: unknown
}>

/**
 * The environment variable `key` is set, but `value` does not parse as
 * `expected`.
 */
export class InvalidDataError extends BaseError<"invalid_data"> {
  readonly key: string
  readonly field: string
  readonly expected: string

  constructor(
    /** The raw, unparsed string */
    readonly value: string,
    details: InvalidDataDetails,
  ) {
    const suffix = details.reason ? `: ${details.reason}` : ""

    super(
      `Invalid value "${value}" in environment variable ${details.key} (expected ${details.expected})${suffix}`,
      {
        code: "invalid_data",
        cause: details.cause,
        context: {
          key: details.key,
          field: details.field,
          value,
          expected: details.expected,
          ...(details.reason !== undefined && { reason: details.reason }),
        },
      },
    )

    this.key = details.key
    this.field = details.field
    this.expected = details.expected
  }
}

export type ConfigError = ConfigMissingError | InvalidDataError

export function isConfigError(e: unknown): e is ConfigError {
  return e instanceof ConfigMissingError || e instanceof InvalidDataError
}

/**
 * A field declaration list that cannot be compiled.
 */
export class SchemaError extends BaseError<"invalid_schema"> {
  constructor(message: string, context: ErrorContext) {
    super(message, { code: "invalid_schema", context, isOperational: false })
  }
}
