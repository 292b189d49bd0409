import { toAppError } from "@envbind/errors"
import type { FieldType } from "../../ports/field-type"
import { fail, ok } from "./outcome"

/**
 * Adapts a function that throws on bad input, such as a constructor or a
 * third-party parser.
 *
 * @example
 * ```ts
 * field("API_URL", "apiUrl", types.custom("URL", (raw) => new URL(raw)))
 * ```
 */
export function custom<T>(name: string, parse: (raw: string) => T): FieldType<T> {
  return {
    name,
    parse: (raw) => {
      try {
        return ok(parse(raw))
      } catch (err) {
        return fail(toAppError(err).message, err)
      }
    },
  }
}
