/**
 * A read-only view of environment variables.
 *
 * Lookups happen when `get` is called; a source never caches, so two loads
 * can observe different values if the environment changed in between.
 */
export interface ConfigSource {
  /**
   * Name used in diagnostics.
   * Example: "env", "object"
   */
  readonly name: string

  /**
   * Raw value of `key`, or `undefined` when the variable is not set.
   * An empty string is a value.
   */
  get(key: string): string | undefined
}
