import { z } from "zod"
import type { FieldType } from "../../ports/field-type"
import { fail, ok } from "./outcome"

/**
 * Validates the raw string with a zod schema. The schema receives the string
 * as-is; use `z.coerce` or `.transform` to produce other types.
 *
 * @example
 * ```ts
 * field("ADMIN_EMAIL", "adminEmail", types.zod(z.email(), "email"))
 * ```
 */
export function zod<S extends z.ZodType>(schema: S, name = "value"): FieldType<z.output<S>> {
  return {
    name,
    parse: (raw) => {
      const result = schema.safeParse(raw)

      return result.success ? ok(result.data) : fail(z.prettifyError(result.error), result.error)
    },
  }
}
