export type ParseSuccess<T> = {
  readonly success: true
  readonly value: T
}

export type ParseFailure = {
  readonly success: false
  /** Why the raw string was rejected, beyond "not a valid <type>" */
  readonly reason?: string
  readonly cause?: unknown
}

export type ParseOutcome<T> = ParseSuccess<T> | ParseFailure

/**
 * The capability a field's target type must have: turning a raw environment
 * string into a value, or rejecting it.
 *
 * Anything implementing this interface can be used in a field declaration;
 * `types` provides the common ones.
 *
 * @example
 * ```ts
 * const port: FieldType<number> = {
 *   name: "port",
 *   parse: (raw) => {
 *     const n = Number(raw)
 *     return Number.isInteger(n) && n > 0 && n < 65536
 *       ? { success: true, value: n }
 *       : { success: false, reason: "expected 1-65535" }
 *   },
 * }
 * ```
 */
export interface FieldType<T> {
  /** Shown in error messages, e.g. "integer" */
  readonly name: string

  parse(raw: string): ParseOutcome<T>
}

export type FieldValue<F> = F extends FieldType<infer T> ? T : never
