import type { ConfigSource } from "../../ports/source"

export type ProcessEnvSourceOptions = {
  /**
   * Prepended to every key: with `prefix: "APP_"`, `get("PORT")` reads
   * `APP_PORT`.
   */
  prefix?: string

  /**
   * Variables to read instead of `process.env`. Read live, not copied.
   */
  env?: Readonly<Record<string, string | undefined>>
}

export class ProcessEnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix: string
  private readonly env: Readonly<Record<string, string | undefined>>

  constructor(options: ProcessEnvSourceOptions = {}) {
    this.prefix = options.prefix ?? ""
    this.env = options.env ?? process.env
  }

  get(key: string): string | undefined {
    const name = `${this.prefix}${key}`

    return Object.hasOwn(this.env, name) ? this.env[name] : undefined
  }
}
