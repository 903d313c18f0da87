import { ConfigBuilderError, ConstraintViolationError, isValidationFailure } from "@confine/errors"
import type { TypeTag } from "../../ports/type-tag"
import type { Validator } from "../../ports/validator"
import { ConfigItem } from "../item/config-item"
import type { RawMapper } from "../item/raw-mapper"

type DraftProperty = "type" | "validator" | "default" | "mapper"

/**
 * Property slots of one item under construction, with the value type erased.
 *
 * Each slot is written at most once. {@link ItemDraft.complete} turns the
 * draft into a {@link ConfigItem} after checking the default, and closes it.
 */
export class ItemDraft {
  private type: TypeTag<unknown> | undefined
  private validator: Validator<unknown> | undefined
  private defaultFactory: (() => unknown) | undefined
  private mapper: RawMapper<unknown> | undefined
  private item: ConfigItem<unknown> | undefined

  constructor(readonly key: string) {}

  get isComplete(): boolean {
    return this.item !== undefined
  }

  setType(type: TypeTag<unknown>): void {
    this.assertSettable("type", this.type, type)
    this.type = type
  }

  setValidator(validator: Validator<unknown>): void {
    this.assertSettable("validator", this.validator, validator)
    this.validator = validator
  }

  setDefaultFactory(factory: () => unknown): void {
    this.assertSettable("default", this.defaultFactory, factory)
    this.defaultFactory = factory
  }

  setMapper(mapper: RawMapper<unknown>): void {
    this.assertSettable("mapper", this.mapper, mapper)
    this.mapper = mapper
  }

  /** Replays every property set here through `target`'s setters. */
  copyTo(target: ItemDraft): void {
    if (this.type) target.setType(this.type)
    if (this.validator) target.setValidator(this.validator)
    if (this.defaultFactory) target.setDefaultFactory(this.defaultFactory)
    if (this.mapper) target.setMapper(this.mapper)
  }

  complete(): ConfigItem<unknown> {
    if (this.item) return this.item

    if (!this.type) {
      throw new ConfigBuilderError(`type has not been specified for: ${this.key}`, {
        context: { key: this.key, property: "type" },
      })
    }

    const item = new ConfigItem<unknown>({
      key: this.key,
      type: this.type,
      validator: this.validator,
      defaultFactory: this.defaultFactory,
      mapper: this.mapper,
    })

    if (item.hasDefault()) verifyDefault(item)
    this.item = item

    return item
  }

  private assertSettable(property: DraftProperty, current: unknown, next: unknown): void {
    if (this.item) {
      throw new ConfigBuilderError(`${property} cannot be specified once ${this.key} is complete`, {
        context: { key: this.key, property },
      })
    }
    if (current !== undefined) {
      throw ConfigBuilderError.duplicateProperty(this.key, property)
    }
    if (next === undefined || next === null) {
      throw new ConfigBuilderError(`${property} cannot be null for: ${this.key}`, {
        context: { key: this.key, property },
      })
    }
  }
}

function verifyDefault(item: ConfigItem<unknown>): void {
  try {
    item.validate(item.createDefault())
  } catch (err) {
    if (!isValidationFailure(err)) throw err

    const reason = err instanceof ConstraintViolationError ? err.reason : err.message

    throw new ConfigBuilderError(`invalid default for ${item.key}: ${reason}`, {
      context: { key: item.key, property: "default" },
      cause: err,
    })
  }
}
