import { CheckerUsageError, ConstraintViolationError, type ErrorContext } from "@confine/errors"
import type { TypeTag } from "../../ports/type-tag"
import { describeType, formatList, formatValue } from "./describe-value"

/** A candidate as a checker sees it: `null` and `undefined` both count as absent. */
export type Candidate<T> = T | null | undefined

type Comparable = { compareTo(other: unknown): number }

/**
 * Chainable assertion engine bound to one candidate value at a time.
 *
 * Every requirement either returns the checker or throws a
 * {@link ConstraintViolationError}. Absent values are settled by the null
 * policy before any predicate runs, so predicates only ever see a present value.
 *
 * Misuse (an empty element list, contradictory bounds, `allowNull()` twice)
 * throws a {@link CheckerUsageError} at the call site.
 *
 * @example
 * ```typescript
 * new ValueChecker<number>()
 *   .bind(8080)
 *   .requireIntegerBetween(1, 65535)
 *   .requireNotIn([0, 22])
 * ```
 */
export class ValueChecker<T> {
  private value: Candidate<T> = undefined
  private bound = false
  private nullAllowed = false
  private pinned = false

  /** A checker bound to `value` for good: `bind()` on it throws. Items hand these to validators. */
  static pinnedTo<T>(value: Candidate<T>): ValueChecker<T> {
    const checker = new ValueChecker<T>().bind(value)
    checker.pinned = true

    return checker
  }

  /** Rebinds to `value` and forbids null again. */
  bind(value: Candidate<T>): this {
    if (this.pinned) {
      throw new CheckerUsageError("checker cannot be rebound while it validates a value")
    }
    this.value = value
    this.bound = true
    this.nullAllowed = false

    return this
  }

  allowNull(): this {
    if (this.nullAllowed) {
      throw new CheckerUsageError("null values are already allowed")
    }
    this.nullAllowed = true

    return this
  }

  get isNullAllowed(): boolean {
    return this.nullAllowed
  }

  /**
   * Runs `predicate` on the bound value.
   *
   * An absent value never reaches the predicate: it passes when null is
   * allowed and fails with "value cannot be null" otherwise.
   */
  check(predicate: (value: NonNullable<T>) => void): this {
    if (!this.bound) {
      throw new CheckerUsageError("checker is not bound to a value")
    }

    const value = this.value

    if (value === null || value === undefined) {
      if (!this.nullAllowed) this.fail("value cannot be null")

      return this
    }

    predicate(value)

    return this
  }

  /** Runs `predicate(value, element)` for each element, in iteration order. */
  checkAgainst<E>(elements: Iterable<E>, predicate: (value: NonNullable<T>, element: E) => void): this {
    const list = nonEmpty(elements, "elements")

    return this.check((value) => {
      for (const element of list) predicate(value, element)
    })
  }

  fail(message: string, details?: ErrorContext): never {
    throw new ConstraintViolationError(message, {
      context: { value: this.value, ...details },
    })
  }

  /** Requires the value to satisfy every tag. */
  requireType(...tags: TypeTag<unknown>[]): this {
    return this.checkAgainst(tags, (value, tag) => {
      if (!tag.is(value)) {
        this.fail(`value must be of type ${tag.name}, currently: ${describeType(value)}`, {
          expected: tag.name,
        })
      }
    })
  }

  requireString(): this {
    return this.check((value: unknown) => {
      if (typeof value !== "string") {
        this.fail(`value must be a string, currently: ${describeType(value)}`)
      }
    })
  }

  requireNonEmptyString(): this {
    return this.requireString().check((value: unknown) => {
      if (value === "") this.fail("value must be a non-empty string")
    })
  }

  /**
   * Requires a string matching `pattern`.
   *
   * A string pattern must match the whole value. A `RegExp` is tested as
   * given, without its global or sticky state.
   */
  requireMatch(pattern: string | RegExp, message?: string): this {
    const regex = compilePattern(pattern)

    return this.requireString().check((value: unknown) => {
      if (typeof value === "string" && !regex.test(value)) {
        this.fail(message ?? `value must match ${String(pattern)}, currently: ${formatValue(value)}`)
      }
    })
  }

  requireInteger(): this {
    return this.check((value: unknown) => {
      if (!isInteger(value)) {
        this.fail(`value must be an integer, currently: ${formatValue(value)}`)
      }
    })
  }

  /** Inclusive on both ends. */
  requireIntegerBetween(min: number, max: number): this {
    assertBound("min", min)
    assertBound("max", max)

    if (min > max) {
      throw new CheckerUsageError(`min (${min}) cannot be greater than max (${max})`, {
        context: { min, max },
      })
    }

    return this.requireIntegerWhere(
      (n) => n >= min && n <= max,
      `an integer between or equal ${min} and ${max}`,
    )
  }

  requireIntegerMin(min: number): this {
    assertBound("min", min)

    return this.requireIntegerWhere((n) => n >= min, `an integer greater than or equal to ${min}`)
  }

  requireIntegerMax(max: number): this {
    assertBound("max", max)

    return this.requireIntegerWhere((n) => n <= max, `an integer less than or equal to ${max}`)
  }

  /** Greater than zero. */
  requireNaturalInteger(): this {
    return this.requireIntegerWhere((n) => n > 0, "an integer greater than zero")
  }

  requireNonNegativeInteger(): this {
    return this.requireIntegerWhere((n) => n >= 0, "an integer greater than or equal to zero")
  }

  requireNegativeInteger(): this {
    return this.requireIntegerWhere((n) => n < 0, "an integer less than zero")
  }

  /** Membership by SameValueZero, the equality of `Array.prototype.includes`. */
  requireIn(values: Iterable<T>): this {
    const list = nonEmpty(values, "values")

    return this.check((value) => {
      if (!list.includes(value)) {
        this.fail(`value must be one of ${formatList(list)}, currently: ${formatValue(value)}`)
      }
    })
  }

  requireNotIn(values: Iterable<T>): this {
    const list = [...values]

    return this.check((value) => {
      if (list.includes(value)) {
        this.fail(`value cannot be one of ${formatList(list)}, currently: ${formatValue(value)}`)
      }
    })
  }

  requireThat(predicate: (value: NonNullable<T>) => boolean, message: string): this {
    return this.check((value) => {
      if (!predicate(value)) this.fail(message)
    })
  }

  /**
   * Requires a value with a total order: a number other than NaN, a bigint,
   * a string, a valid Date, or an object with a `compareTo` method.
   */
  requireComparable(): this {
    return this.check((value: unknown) => {
      if (!isComparable(value)) {
        this.fail(`value must be comparable, currently: ${describeType(value)}`)
      }
    })
  }

  private requireIntegerWhere(test: (n: number) => boolean, expectation: string): this {
    return this.requireInteger().check((value: unknown) => {
      if (typeof value === "number" && !test(value)) {
        this.fail(`value must be ${expectation}, currently: ${formatValue(value)}`)
      }
    })
  }
}

function isInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value)
}

function isComparable(value: unknown): boolean {
  switch (typeof value) {
    case "number":
      return !Number.isNaN(value)
    case "bigint":
    case "string":
      return true
  }

  if (value instanceof Date) return !Number.isNaN(value.getTime())

  return hasCompareTo(value)
}

function hasCompareTo(value: unknown): value is Comparable {
  return (
    typeof value === "object" &&
    value !== null &&
    "compareTo" in value &&
    typeof value.compareTo === "function"
  )
}

function nonEmpty<E>(items: Iterable<E>, label: string): E[] {
  const list = [...items]

  if (list.length === 0) {
    throw new CheckerUsageError(`list of ${label} cannot be empty`)
  }
  if (list.some((item) => item === null || item === undefined)) {
    throw new CheckerUsageError(`list of ${label} cannot contain null`)
  }

  return list
}

function assertBound(name: string, bound: number): void {
  if (!Number.isFinite(bound)) {
    throw new CheckerUsageError(`${name} must be a finite number, currently: ${bound}`)
  }
}

function compilePattern(pattern: string | RegExp): RegExp {
  if (pattern instanceof RegExp) {
    return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ""))
  }

  try {
    return new RegExp(`^(?:${pattern})$`)
  } catch (err) {
    throw new CheckerUsageError(`invalid pattern: ${pattern}`, { cause: err })
  }
}
