import type { LogLevelName } from "./log-level"

/**
 * Policy shared by every Logger adapter.
 */
export type LoggerOptions = {
  /**
   * Minimum level to emit; "info" suppresses "trace" and "debug".
   */
  level: LogLevelName

  /**
   * Human-readable single-line output instead of JSON.
   *
   * @remarks
   * Meant for local development. Leave it off where logs are shipped to a
   * collector.
   */
  prettify?: boolean
}
