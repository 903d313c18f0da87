import { ConfigBuilderError } from "@confine/errors"
import type { ConfigShape, EmptyShape } from "../../ports/config"
import { Config } from "../config"
import { ItemBuilder } from "./item-builder"
import { ItemDraft } from "./item-draft"

/**
 * Single-pass assembly of a {@link Config}.
 *
 * Each `addItem` completes the item declared before it, so a bad declaration
 * fails at the point it is finished rather than at first lookup.
 *
 * @example
 * ```typescript
 * const config = new ConfigBuilder()
 *   .addItem("port").ofType(types.integer).withDefault(8080)
 *   .mapFrom(types.string, parsers.integer)
 *   .addCopyOfPrevious("adminPort")
 *   .build()
 * ```
 */
export class ConfigBuilder {
  private readonly drafts: ItemDraft[] = []
  private built = false

  addItem<K extends string>(key: K): ItemBuilder<EmptyShape, K, unknown> {
    return this.openItem<EmptyShape, K>(key)
  }

  /** Builds without static key types; use the last item's `build()` to keep them. */
  build(): Config<ConfigShape> {
    return this.buildAs<ConfigShape>()
  }

  /**
   * Completes the open item and starts `key`, optionally replaying the
   * properties of the item declared as `copyOf`.
   *
   * @internal Called by {@link ItemBuilder}; `S` and `T` are supplied by the caller.
   */
  openItem<S extends object, K extends string, T = unknown>(
    key: K,
    copyOf?: string,
  ): ItemBuilder<S, K, T> {
    this.assertNotBuilt()

    if (typeof key !== "string" || key.length === 0) {
      throw new ConfigBuilderError("config item key cannot be empty", { context: { key } })
    }

    this.completeOpen()

    const draft = new ItemDraft(key)

    if (copyOf !== undefined) this.find(copyOf).copyTo(draft)
    this.drafts.push(draft)

    return new ItemBuilder<S, K, T>(this, draft, key)
  }

  /** @internal Called by {@link ItemBuilder.build}. */
  buildAs<S extends object>(): Config<S> {
    this.assertNotBuilt()

    const config = new Config<S>(this.drafts.map((draft) => draft.complete()))

    this.built = true

    return config
  }

  private completeOpen(): void {
    this.drafts.at(-1)?.complete()
  }

  private find(key: string): ItemDraft {
    const draft = this.drafts.find((d) => d.key === key)

    if (!draft) {
      throw new ConfigBuilderError(`no config item has been declared with key: ${key}`, {
        context: { key },
      })
    }

    return draft
  }

  private assertNotBuilt(): void {
    if (this.built) {
      throw new ConfigBuilderError("config has already been built")
    }
  }
}
