import { ConfigBuilderError, UnknownKeyError } from "@confine/errors"
import type { ConfigShape, IConfig } from "../ports/config"
import type { ConfigItem } from "./item/config-item"

/**
 * The built registry. Its key set is fixed at construction.
 *
 * Items are stored with their value type erased; each read is checked against
 * the item's type tag, which is what makes the `S[K]` results sound.
 */
export class Config<S extends object = ConfigShape> implements IConfig<S> {
  private readonly items: ReadonlyMap<string, ConfigItem<unknown>>

  constructor(items: Iterable<ConfigItem<unknown>>) {
    const byKey = new Map<string, ConfigItem<unknown>>()

    for (const item of items) {
      if (byKey.has(item.key)) {
        throw new ConfigBuilderError(`duplicate config item key: ${item.key}`, {
          context: { key: item.key },
        })
      }
      byKey.set(item.key, item)
    }

    this.items = byKey
    Object.freeze(this)
  }

  getValue<K extends keyof S & string>(key: K): S[K] {
    return this.item(key).getValue() as S[K]
  }

  getDefault<K extends keyof S & string>(key: K): S[K] {
    return this.item(key).createDefault() as S[K]
  }

  hasEntry(key: string): key is keyof S & string {
    return this.items.has(key)
  }

  setValue<K extends keyof S & string>(key: K, value: S[K]): void {
    this.item(key).setValue(value)
  }

  setRawValue(key: string, raw: unknown): void {
    this.item(key).setValue(raw)
  }

  isSet(key: keyof S & string): boolean {
    return this.item(key).isSet()
  }

  keys(): string[] {
    return [...this.items.keys()]
  }

  private item(key: string): ConfigItem<unknown> {
    const item = this.items.get(key)

    if (!item) throw new UnknownKeyError(key)

    return item
  }
}
