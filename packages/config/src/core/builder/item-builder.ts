import type { TypeTag } from "../../ports/type-tag"
import type { Validator } from "../../ports/validator"
import type { Config } from "../config"
import { createRawMapper } from "../item/raw-mapper"
import type { ConfigBuilder } from "./config-builder"
import type { ItemDraft } from "./item-draft"
import { snapshotDefault } from "./snapshot-default"

/**
 * Fluent view over the item currently being declared.
 *
 * @typeParam S - Keys and types declared before this item.
 * @typeParam K - This item's key.
 * @typeParam T - This item's value type, fixed by {@link ItemBuilder.ofType}.
 */
export class ItemBuilder<S extends object, K extends string, T> {
  constructor(
    private readonly owner: ConfigBuilder,
    private readonly draft: ItemDraft,
    readonly key: K,
  ) {}

  ofType<U>(type: TypeTag<U>): ItemBuilder<S, K, U> {
    this.draft.setType(type)

    return new ItemBuilder<S, K, U>(this.owner, this.draft, this.key)
  }

  withValidator(validator: Validator<T>): this {
    // Drafts hold validators erased to unknown; the type tag guards every value they see.
    this.draft.setValidator(validator as Validator<unknown>)

    return this
  }

  /** Every read gets its own copy of `value`, taken now. */
  withDefault(value: T): this {
    const stored = snapshotDefault(this.key, value)

    this.draft.setDefaultFactory(() => snapshotDefault(this.key, stored))

    return this
  }

  /** For defaults that change between reads, such as the current time. */
  withDefaultFactory(factory: () => T): this {
    this.draft.setDefaultFactory(factory)

    return this
  }

  /** Accepts raw input of type `R`, converted with `map`, wherever a `T` is expected. */
  mapFrom<R>(from: TypeTag<R>, map: (raw: R) => T): this {
    this.draft.setMapper(createRawMapper(from, map))

    return this
  }

  addItem<K2 extends string>(key: K2): ItemBuilder<S & Record<K, T>, K2, unknown> {
    return this.owner.openItem<S & Record<K, T>, K2>(key)
  }

  /** Declares `key` with the type, validator, default and mapper of `original`. */
  addCopy<K2 extends string, O extends keyof (S & Record<K, T>) & string>(
    key: K2,
    original: O,
  ): ItemBuilder<S & Record<K, T>, K2, (S & Record<K, T>)[O]> {
    return this.owner.openItem<S & Record<K, T>, K2, (S & Record<K, T>)[O]>(key, original)
  }

  addCopyOfPrevious<K2 extends string>(key: K2): ItemBuilder<S & Record<K, T>, K2, T> {
    return this.owner.openItem<S & Record<K, T>, K2, T>(key, this.key)
  }

  build(): Config<S & Record<K, T>> {
    return this.owner.buildAs<S & Record<K, T>>()
  }
}
