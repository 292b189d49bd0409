export type LogContext = {
  service: string
  module: string

  /** Name of the configuration source, e.g. "env" */
  source: string
  /** Environment variable involved */
  key: string
  /** Record member involved */
  field: string

  fieldCount: number
  errorCount: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent>

/**
 * A partial overlay applied to an existing log context by `child()`.
 */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
