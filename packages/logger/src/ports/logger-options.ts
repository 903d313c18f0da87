import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Minimum level to emit. */
  level: LogLevelName

  /**
   * Pretty-print for humans (local development). Leave off in production,
   * where JSON lines are expected.
   */
  prettify?: boolean
}
