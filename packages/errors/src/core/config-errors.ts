import type { ConfigErrorCode, ErrorContext } from "../ports/error"
import { BaseError } from "./base-error"

type ErrorExtras = Readonly<{
  context?: ErrorContext
  cause?: unknown
}>

/**
 * An item was declared wrongly: duplicate key, a property specified twice,
 * a missing type, or a default that fails its own validator.
 */
export class ConfigBuilderError extends BaseError<"config_builder_error"> {
  constructor(message: string, extras: ErrorExtras = {}) {
    super(message, { code: "config_builder_error", isOperational: false, ...extras })
  }

  /** Builds the error for a property that was already specified on `key`. */
  static duplicateProperty(key: string, property: string): ConfigBuilderError {
    return new ConfigBuilderError(`${property} has already been specified for: ${key}`, {
      context: { key, property },
    })
  }
}

/** A validator used the checker in a contradictory or meaningless way. */
export class CheckerUsageError extends BaseError<"checker_usage_error"> {
  constructor(message: string, extras: ErrorExtras = {}) {
    super(message, { code: "checker_usage_error", isOperational: false, ...extras })
  }
}

/**
 * A candidate value failed a declared requirement.
 *
 * Raised without a key by the checker; the owning item re-raises it through
 * {@link ConstraintViolationError.forKey} so that callers see which item rejected the value.
 */
export class ConstraintViolationError extends BaseError<"constraint_violation"> {
  /** The failed requirement, without the item key. */
  readonly reason: string
  readonly key: string | undefined

  constructor(reason: string, extras: ErrorExtras & { key?: string } = {}) {
    const key = extras.key

    super(key === undefined ? reason : `invalid value for ${key}: ${reason}`, {
      code: "constraint_violation",
      isOperational: true,
      context: { ...extras.context, ...(key !== undefined && { key }) },
      cause: extras.cause,
    })

    this.reason = reason
    this.key = key
  }

  forKey(key: string): ConstraintViolationError {
    if (this.key !== undefined) return this

    return new ConstraintViolationError(this.reason, { context: this.context, key, cause: this })
  }
}

export class TypeMismatchError extends BaseError<"type_mismatch"> {
  constructor(
    readonly key: string,
    readonly expected: string,
    readonly actual: string,
    cause?: unknown,
  ) {
    super(`value for ${key} must be of type ${expected}, currently: ${actual}`, {
      code: "type_mismatch",
      isOperational: false,
      context: { key, expected, actual },
      cause,
    })
  }
}

export class UnknownKeyError extends BaseError<"unknown_key"> {
  constructor(readonly key: string) {
    super(`no config item with key: ${key}`, {
      code: "unknown_key",
      isOperational: false,
      context: { key },
    })
  }
}

export class UnsetValueError extends BaseError<"value_unset"> {
  constructor(readonly key: string) {
    super(`config item ${key} has no value and no default`, {
      code: "value_unset",
      isOperational: false,
      context: { key },
    })
  }
}

export class MissingDefaultError extends BaseError<"default_missing"> {
  constructor(readonly key: string) {
    super(`no default has been declared for: ${key}`, {
      code: "default_missing",
      isOperational: false,
      context: { key },
    })
  }
}

export type LoadIssue = Readonly<{
  key: string
  source: string
  code: ConfigErrorCode
  message: string
}>

/** Every value a source supplied that the registry rejected, reported together. */
export class ConfigLoadError extends BaseError<"config_load_failed"> {
  readonly issues: readonly LoadIssue[]

  constructor(issues: readonly LoadIssue[]) {
    const lines = issues.map((i) => `  - ${i.key} (${i.source}): ${i.message}`)

    super(`Configuration loading failed:\n${lines.join("\n")}`, {
      code: "config_load_failed",
      isOperational: true,
      context: { issues },
    })

    this.issues = issues
  }
}
