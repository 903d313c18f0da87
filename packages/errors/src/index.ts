export { BaseError, type BaseErrorOptions, serializeError } from "./core/base-error"
export {
  CheckerUsageError,
  ConfigBuilderError,
  ConfigLoadError,
  ConstraintViolationError,
  type LoadIssue,
  MissingDefaultError,
  TypeMismatchError,
  UnknownKeyError,
  UnsetValueError,
} from "./core/config-errors"
export {
  type ConfigError,
  isAppError,
  isAuthoringError,
  isConfigError,
  isValidationFailure,
} from "./core/utils/guards"
export type {
  AppError,
  ConfigErrorCode,
  ErrorCode,
  ErrorContext,
  SerializedError,
} from "./ports/error"
