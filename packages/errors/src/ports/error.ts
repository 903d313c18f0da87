export type ErrorCode = Lowercase<string>

/**
 * Codes raised by the configuration framework.
 *
 * @remarks
 * - `config_builder_error`: an item was declared wrongly (duplicate key, property set twice, bad default).
 * - `checker_usage_error`: a validator used the checker wrongly (allowNull twice, empty element list).
 * - `constraint_violation`: a candidate value failed a declared requirement.
 * - `type_mismatch`: a value's runtime type disagrees with the item's declared type.
 * - `unknown_key`, `value_unset`, `default_missing`: a lookup that cannot be answered.
 * - `config_load_failed`: one or more values supplied by sources were rejected.
 */
export type ConfigErrorCode =
  | "config_builder_error"
  | "checker_usage_error"
  | "constraint_violation"
  | "type_mismatch"
  | "unknown_key"
  | "value_unset"
  | "default_missing"
  | "config_load_failed"

/**
 * Structured metadata attached to errors (keys, offending values, bounds).
 */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode

  readonly context: ErrorContext

  /** Configuration errors are never transient, so this is `false` for every code above. */
  readonly isRetryable: boolean

  /**
   * `true` when the error describes bad input data (a rejected value), `false`
   * when it describes a wiring or authoring bug in the embedding program.
   */
  readonly isOperational: boolean

  readonly timestamp: Date

  readonly cause?: unknown
}

/**
 * JSON-safe error shape, used when errors are handed to a logger.
 */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
