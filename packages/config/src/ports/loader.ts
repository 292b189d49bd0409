import type { ConfigError } from "../core/errors"
import type { AnyFieldDeclaration } from "./field"
import type { ConfigSource } from "./source"

export type LoadSuccess<R> = {
  readonly success: true
  readonly value: R
}

export type LoadFailure = {
  readonly success: false
  readonly error: ConfigError
}

export type LoadResult<R> = LoadSuccess<R> | LoadFailure

export type LoadAllFailure = {
  readonly success: false
  /** Every failing field, in declaration order */
  readonly errors: readonly ConfigError[]
}

export type LoadAllResult<R> = LoadSuccess<R> | LoadAllFailure

/**
 * Loads one configuration shape, as compiled by `defineConfig`.
 *
 * @typeParam R - The record type, inferred from the field declarations.
 *
 * @example
 * ```typescript
 * const AppConfig = defineConfig([
 *   field("PORT", "port", types.uint({ max: 65535 })),
 *   field("DATABASE_URL", "databaseUrl", types.string()),
 * ])
 *
 * const config = AppConfig.load()  // exits the process if PORT or DATABASE_URL is bad
 * config.port                      // number
 * ```
 */
export interface ConfigLoader<R> {
  /** The field declarations, in declaration order */
  readonly fields: readonly AnyFieldDeclaration[]

  /**
   * Reads every field in declaration order and stops at the first failure.
   *
   * @param source - Overrides the source given to `defineConfig` for this call.
   */
  safeLoad(source?: ConfigSource): LoadResult<R>

  /**
   * Like `safeLoad`, but visits every field and reports all failures.
   */
  safeLoadAll(source?: ConfigSource): LoadAllResult<R>

  /**
   * Returns the record, or logs a fatal entry and exits the process.
   * Never returns on failure.
   */
  load(source?: ConfigSource): R

  /**
   * The environment variable a record member is read from.
   */
  keyOf(name: keyof R & string): string
}
