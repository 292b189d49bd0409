import { toAppError } from "@envbind/errors"
import type { Logger } from "@envbind/logger"
import type { AnyFieldDeclaration } from "../ports/field"
import type { ParseOutcome } from "../ports/field-type"
import type { ConfigLoader, LoadAllResult, LoadResult } from "../ports/loader"
import type { ConfigSource } from "../ports/source"
import { type ConfigError, ConfigMissingError, InvalidDataError, SchemaError } from "./errors"

export type ExitFn = (code: number) => never

export type ConfigLoaderDeps = Readonly<{
  source: ConfigSource
  logger: Logger
  exit: ExitFn
}>

type FieldOutcome = { success: true; value: unknown } | { success: false; error: ConfigError }

export class EnvConfigLoader<R extends object> implements ConfigLoader<R> {
  constructor(
    readonly fields: readonly AnyFieldDeclaration[],
    private readonly deps: ConfigLoaderDeps,
  ) {}

  safeLoad(source: ConfigSource = this.deps.source): LoadResult<R> {
    const values: Record<string, unknown> = {}

    for (const decl of this.fields) {
      const outcome = readField(decl, source)

      if (!outcome.success) {
        this.deps.logger.debug("Configuration load failed", {
          source: source.name,
          key: decl.key,
          field: decl.name,
          err: outcome.error,
        })

        return { success: false, error: outcome.error }
      }

      values[decl.name] = outcome.value
    }

    return { success: true, value: this.complete(values, source) }
  }

  safeLoadAll(source: ConfigSource = this.deps.source): LoadAllResult<R> {
    const values: Record<string, unknown> = {}
    const errors: ConfigError[] = []

    for (const decl of this.fields) {
      const outcome = readField(decl, source)

      if (outcome.success) {
        values[decl.name] = outcome.value
      } else {
        errors.push(outcome.error)
      }
    }

    if (errors.length > 0) {
      this.deps.logger.debug("Configuration load failed", {
        source: source.name,
        errorCount: errors.length,
      })

      return { success: false, errors }
    }

    return { success: true, value: this.complete(values, source) }
  }

  load(source: ConfigSource = this.deps.source): R {
    const result = this.safeLoad(source)

    if (result.success) return result.value

    const { error } = result

    this.deps.logger.fatal(error.message, {
      source: source.name,
      key: error.key,
      err: error,
    })

    return this.deps.exit(1)
  }

  keyOf(name: keyof R & string): string {
    const decl = this.fields.find((f) => f.name === name)

    if (!decl) {
      throw new SchemaError(`Unknown configuration field ${name}`, { field: name })
    }

    return decl.key
  }

  private complete(values: Record<string, unknown>, source: ConfigSource): R {
    this.deps.logger.debug("Configuration loaded", {
      source: source.name,
      fieldCount: this.fields.length,
    })

    // Every declared member was assigned above with its field type's output.
    return Object.freeze(values) as R
  }
}

function readField(decl: AnyFieldDeclaration, source: ConfigSource): FieldOutcome {
  const raw = source.get(decl.key)

  if (raw === undefined) {
    return { success: false, error: new ConfigMissingError(decl.key) }
  }

  const parsed = parseRaw(decl, raw)

  if (parsed.success) return parsed

  return {
    success: false,
    error: new InvalidDataError(raw, {
      key: decl.key,
      field: decl.name,
      expected: decl.type.name,
      ...(parsed.reason !== undefined && { reason: parsed.reason }),
      cause: parsed.cause,
    }),
  }
}

function parseRaw(decl: AnyFieldDeclaration, raw: string): ParseOutcome<unknown> {
  try {
    return decl.type.parse(raw)
  } catch (err) {
    return { success: false, reason: toAppError(err).message, cause: err }
  }
}
