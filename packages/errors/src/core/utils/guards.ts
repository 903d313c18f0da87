import type { AppError } from "../../ports/error"
import { BaseError } from "../base-error"
import {
  CheckerUsageError,
  ConfigBuilderError,
  ConfigLoadError,
  ConstraintViolationError,
  MissingDefaultError,
  TypeMismatchError,
  UnknownKeyError,
  UnsetValueError,
} from "../config-errors"

export type ConfigError =
  | ConfigBuilderError
  | CheckerUsageError
  | ConstraintViolationError
  | TypeMismatchError
  | UnknownKeyError
  | UnsetValueError
  | MissingDefaultError
  | ConfigLoadError

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function isValidDate(v: unknown): v is Date {
  return v instanceof Date && Number.isFinite(v.valueOf())
}

/**
 * Structural check for the {@link AppError} shape, so errors crossing a
 * package-copy boundary (two installed versions) are still recognised.
 */
export function isAppError(e: unknown): e is AppError {
  if (e instanceof BaseError) return true
  if (!isRecord(e)) return false

  return (
    typeof e.code === "string" &&
    isRecord(e.context) &&
    typeof e.isRetryable === "boolean" &&
    typeof e.isOperational === "boolean" &&
    isValidDate(e.timestamp) &&
    typeof e.message === "string" &&
    typeof e.name === "string"
  )
}

export function isConfigError(e: unknown): e is ConfigError {
  return (
    e instanceof ConfigBuilderError ||
    e instanceof CheckerUsageError ||
    e instanceof ConstraintViolationError ||
    e instanceof TypeMismatchError ||
    e instanceof UnknownKeyError ||
    e instanceof UnsetValueError ||
    e instanceof MissingDefaultError ||
    e instanceof ConfigLoadError
  )
}

/** Mistakes in how items or validators were written, as opposed to bad values. */
export function isAuthoringError(e: unknown): e is ConfigBuilderError | CheckerUsageError {
  return e instanceof ConfigBuilderError || e instanceof CheckerUsageError
}

/** Errors a host may report to an operator as a rejected value. */
export function isValidationFailure(
  e: unknown,
): e is ConstraintViolationError | TypeMismatchError {
  return e instanceof ConstraintViolationError || e instanceof TypeMismatchError
}
