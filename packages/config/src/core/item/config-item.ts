import {
  ConstraintViolationError,
  isConfigError,
  MissingDefaultError,
  TypeMismatchError,
  UnsetValueError,
} from "@confine/errors"
import type { TypeTag } from "../../ports/type-tag"
import type { Validator } from "../../ports/validator"
import { describeType } from "../checker/describe-value"
import { type Candidate, ValueChecker } from "../checker/value-checker"
import type { MapResult, RawMapper } from "./raw-mapper"

export type ConfigItemOptions<T> = {
  key: string
  type: TypeTag<T>
  validator?: Validator<T>
  defaultFactory?: () => Candidate<T>
  mapper?: RawMapper<T>
}

type Slot<T> = { set: false } | { set: true; value: Candidate<T> }

/**
 * One declared configuration key: its type, rule, default and current value.
 *
 * Values enter through {@link ConfigItem.setValue}, which converts and
 * validates before committing, and leave through {@link ConfigItem.getValue},
 * which re-checks the type on the way out.
 */
export class ConfigItem<T> {
  readonly key: string
  readonly type: TypeTag<T>
  private readonly validator: Validator<T> | undefined
  private readonly defaultFactory: (() => Candidate<T>) | undefined
  private readonly mapper: RawMapper<T> | undefined
  private current: Slot<T> = { set: false }

  constructor(options: ConfigItemOptions<T>) {
    this.key = options.key
    this.type = options.type
    this.validator = options.validator
    this.defaultFactory = options.defaultFactory
    this.mapper = options.mapper
  }

  hasDefault(): boolean {
    return this.defaultFactory !== undefined
  }

  isSet(): boolean {
    return this.current.set
  }

  /**
   * Runs the validator against `value` with a fresh checker, then applies the
   * null policy once more for validators that never reached `check`.
   *
   * Violations are re-thrown with this item's key. The current value is untouched.
   */
  validate(value: Candidate<T>): void {
    const checker = ValueChecker.pinnedTo(value)

    try {
      this.validator?.(checker)
      checker.check(() => {})
    } catch (err) {
      if (err instanceof ConstraintViolationError) throw err.forKey(this.key)
      throw err
    }
  }

  /**
   * Checked downcast of external input.
   *
   * Values of the declared type are used as is; otherwise the mapper, when
   * its source type matches. An absent value the tag rejects is put to the
   * null policy first, so a required item reports "value cannot be null" and
   * an item that allows null under a non-nullable tag reports a mismatch.
   */
  accept(raw: unknown): Candidate<T> {
    if (this.type.is(raw)) return raw

    if (raw === null || raw === undefined) {
      this.validate(raw)
      throw new TypeMismatchError(this.key, this.type.name, describeType(raw))
    }

    if (this.mapper) {
      const mapped = this.map(this.mapper, raw)

      if (mapped.matched) return this.downcast(mapped.value)
    }

    throw new TypeMismatchError(this.key, this.type.name, describeType(raw))
  }

  /** Converts and validates `raw`, committing it only when both succeed. */
  setValue(raw: unknown): void {
    const value = this.accept(raw)

    this.validate(value)
    this.current = { set: true, value }
  }

  /** The committed value, or the default while nothing has been committed. */
  getValue(): T {
    if (this.current.set) return this.downcast(this.current.value)
    if (this.defaultFactory) return this.createDefault()

    throw new UnsetValueError(this.key)
  }

  /** Invokes the default factory; the result was validated when the item was built. */
  createDefault(): T {
    if (!this.defaultFactory) throw new MissingDefaultError(this.key)

    return this.downcast(this.defaultFactory())
  }

  private downcast(value: unknown): T {
    if (this.type.is(value)) return value

    throw new TypeMismatchError(this.key, this.type.name, describeType(value))
  }

  /** A mapper that throws is reported as a mismatch of the raw value, with its error as cause. */
  private map(mapper: RawMapper<T>, raw: unknown): MapResult<T> {
    try {
      return mapper.tryMap(raw)
    } catch (err) {
      if (isConfigError(err)) throw err
      throw new TypeMismatchError(this.key, this.type.name, describeType(raw), err)
    }
  }
}
