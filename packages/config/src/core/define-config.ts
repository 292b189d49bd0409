import { createPinoLogger, type Logger } from "@envbind/logger"
import { ProcessEnvSource } from "../adapters/process/process-env-source"
import type { AnyFieldDeclaration, ConfigRecord } from "../ports/field"
import type { ConfigLoader } from "../ports/loader"
import type { ConfigSource } from "../ports/source"
import { EnvConfigLoader, type ExitFn } from "./config-loader"
import { SchemaError } from "./errors"

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/

export type DefineConfigOptions = {
  /**
   * Where values are read from when `safeLoad`/`load` get no source.
   *
   * @default new ProcessEnvSource()
   */
  source?: ConfigSource

  /**
   * @default a pino logger writing to stdout at "info"
   */
  logger?: Logger

  /**
   * Called by `load` with exit code 1 when the configuration is unusable.
   *
   * @default process.exit
   */
  exit?: ExitFn
}

/**
 * Compiles an ordered list of field declarations into a loader for the
 * record they describe. Nothing is read until the loader is used.
 *
 * @throws {SchemaError} when a key or name is empty, a name is not an
 * identifier, or two declarations share a name. Declaring the same key under
 * several names is allowed.
 *
 * @example
 * ```typescript
 * const Person = defineConfig([
 *   field("NAME", "name", types.string()),
 *   field("AGE", "age", types.uint()),
 * ])
 *
 * const result = Person.safeLoad()
 * if (result.success) greet(result.value.name)
 * ```
 */
export function defineConfig<const F extends readonly AnyFieldDeclaration[]>(
  fields: F,
  options: DefineConfigOptions = {},
): ConfigLoader<ConfigRecord<F>> {
  assertValidFields(fields)

  return new EnvConfigLoader<ConfigRecord<F>>(Object.freeze([...fields]), {
    source: options.source ?? new ProcessEnvSource(),
    logger: options.logger ?? createPinoLogger({}, { level: "info" }, { module: "config" }),
    exit: options.exit ?? ((code) => process.exit(code)),
  })
}

function assertValidFields(fields: readonly AnyFieldDeclaration[]): void {
  const seen = new Set<string>()

  for (const [index, decl] of fields.entries()) {
    if (decl.key.length === 0) {
      throw new SchemaError(`Field at index ${index} has an empty key`, { index })
    }

    if (!IDENTIFIER.test(decl.name)) {
      throw new SchemaError(`Field name "${decl.name}" is not a valid identifier`, {
        index,
        key: decl.key,
        field: decl.name,
      })
    }

    if (seen.has(decl.name)) {
      throw new SchemaError(`Field name "${decl.name}" is declared more than once`, {
        index,
        key: decl.key,
        field: decl.name,
      })
    }

    seen.add(decl.name)
  }
}
