import type { ValueChecker } from "../core/checker/value-checker"

/**
 * A rule over one candidate value, expressed through the checker it is given.
 *
 * Validators report failure only through the checker (a `require*` call or
 * `fail`) and must not keep a reference to it once they return.
 *
 * @example
 * ```typescript
 * const port: Validator<number> = (c) => c.requireIntegerBetween(1, 65535)
 * ```
 */
export type Validator<T> = (checker: ValueChecker<T>) => void
