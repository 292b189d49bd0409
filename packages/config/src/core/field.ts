import type { FieldType } from "../ports/field-type"
import type { FieldDeclaration } from "../ports/field"

/**
 * Declares that environment variable `key` is loaded into record member
 * `name` as a `T`.
 */
export function field<K extends string, N extends string, T>(
  key: K,
  name: N,
  type: FieldType<T>,
): FieldDeclaration<K, N, T> {
  return Object.freeze({ key, name, type })
}
