/**
 * Fields a configuration host attaches to its log lines.
 *
 * `source` is the name of the config source being applied (e.g. `"env"`,
 * `"json:app.json"`), `key` the config item concerned.
 */
export type LogContext = {
  service: string
  module: string
  env: string

  source: string
  key: string
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/** A partial overlay applied to an existing log context by `child()`. */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
