import type { FieldType } from "../../ports/field-type"
import { fail, ok } from "./outcome"

/**
 * One of a fixed list of strings, compared exactly. The field is typed as
 * their union.
 *
 * @example
 * ```ts
 * field("NODE_ENV", "nodeEnv", types.oneOf(["development", "production", "test"]))
 * ```
 */
export function oneOf<const V extends readonly [string, ...string[]]>(
  values: V,
): FieldType<V[number]> {
  const listed = values.join(", ")

  return {
    name: `one of ${listed}`,
    parse: (raw) => {
      const match = values.find((v) => v === raw)

      return match === undefined ? fail() : ok(match)
    },
  }
}
