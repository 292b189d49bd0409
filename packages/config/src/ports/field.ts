import type { FieldType, FieldValue } from "./field-type"

/**
 * Binds an environment variable to a record member and a target type.
 */
export type FieldDeclaration<K extends string = string, N extends string = string, T = unknown> =
  Readonly<{
    /** Environment variable to read, e.g. "DATABASE_URL" */
    key: K
    /** Member of the loaded record, e.g. "databaseUrl" */
    name: N
    type: FieldType<T>
  }>

export type AnyFieldDeclaration = FieldDeclaration<string, string, unknown>

/**
 * The record produced by loading `F`: one readonly member per declaration,
 * named by `name` and typed by `type`.
 */
export type ConfigRecord<F extends readonly AnyFieldDeclaration[]> = {
  readonly [D in F[number] as D["name"]]: FieldValue<D["type"]>
}
