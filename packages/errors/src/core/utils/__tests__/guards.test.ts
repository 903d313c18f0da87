import type { ConfigErrorCode } from "../../../ports/error"
import { BaseError } from "../../base-error"
import {
  CheckerUsageError,
  ConfigBuilderError,
  ConfigLoadError,
  ConstraintViolationError,
  MissingDefaultError,
  TypeMismatchError,
  UnknownKeyError,
  UnsetValueError,
} from "../../config-errors"
import {
  type ConfigError,
  isAppError,
  isAuthoringError,
  isConfigError,
  isValidationFailure,
} from "../guards"

describe("isAppError", () => {
  it("accepts BaseError instances", () => {
    expect(isAppError(new BaseError("x", { code: "x" }))).toBe(true)
  })

  it("accepts duck-typed errors with every field", () => {
    expect(
      isAppError({
        name: "Copied",
        message: "from another copy",
        code: "constraint_violation",
        context: {},
        isRetryable: false,
        isOperational: true,
        timestamp: new Date(),
      }),
    ).toBe(true)
  })

  it("rejects plain errors and primitives", () => {
    expect(isAppError(new Error("plain"))).toBe(false)
    expect(isAppError(null)).toBe(false)
    expect(isAppError("error")).toBe(false)
  })

  it("rejects objects with an invalid timestamp", () => {
    expect(
      isAppError({
        name: "Err",
        message: "msg",
        code: "x",
        context: {},
        isRetryable: false,
        isOperational: true,
        timestamp: new Date("invalid"),
      }),
    ).toBe(false)
  })
})

describe("config error guards", () => {
  it("isConfigError recognises the framework's errors only", () => {
    expect(isConfigError(new UnknownKeyError("a"))).toBe(true)
    expect(isConfigError(new BaseError("x", { code: "x" }))).toBe(false)
    expect(isConfigError(new Error("x"))).toBe(false)
  })

  it("isAuthoringError covers builder and checker misuse", () => {
    expect(isAuthoringError(new ConfigBuilderError("dup"))).toBe(true)
    expect(isAuthoringError(new CheckerUsageError("empty"))).toBe(true)
    expect(isAuthoringError(new ConstraintViolationError("bad"))).toBe(false)
  })

  it("isValidationFailure covers rejected values", () => {
    expect(isValidationFailure(new ConstraintViolationError("bad"))).toBe(true)
    expect(isValidationFailure(new TypeMismatchError("a", "string", "number"))).toBe(true)
    expect(isValidationFailure(new UnknownKeyError("a"))).toBe(false)
  })

  it("every config error carries a ConfigErrorCode", () => {
    const errors: ConfigError[] = [
      new ConfigBuilderError("dup"),
      new CheckerUsageError("empty"),
      new ConstraintViolationError("bad"),
      new TypeMismatchError("a", "string", "number"),
      new UnknownKeyError("a"),
      new UnsetValueError("a"),
      new MissingDefaultError("a"),
      new ConfigLoadError([]),
    ]

    const codes: ConfigErrorCode[] = errors.map((e) => e.code)

    expect(codes).toEqual([
      "config_builder_error",
      "checker_usage_error",
      "constraint_violation",
      "type_mismatch",
      "unknown_key",
      "value_unset",
      "default_missing",
      "config_load_failed",
    ])
  })
})
