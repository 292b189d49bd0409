import type { ConfigSource } from "../../ports/source"

/**
 * Fixed, in-memory variables. Lets tests load configuration without touching
 * `process.env`.
 */
export class ObjectSource implements ConfigSource {
  readonly name = "object"
  private readonly values: ReadonlyMap<string, string>

  constructor(values: Readonly<Record<string, string | undefined>>) {
    const entries = Object.entries(values).filter(
      (entry): entry is [string, string] => entry[1] !== undefined,
    )

    this.values = new Map(entries)
  }

  get(key: string): string | undefined {
    return this.values.get(key)
  }
}
