/** Loosest registry shape: any key, values of unknown type. */
export type ConfigShape = Record<string, unknown>

/** Shape of a builder before its first item. */
export type EmptyShape = Record<never, never>

/**
 * Registry of declared configuration items, keyed by name.
 *
 * @typeParam S - Key to value type, accumulated by the builder from each item's type tag.
 *
 * @example
 * ```typescript
 * const config = new ConfigBuilder()
 *   .addItem("host").ofType(types.string).withDefault("localhost")
 *   .addItem("port").ofType(types.integer).withValidator((c) => c.requireIntegerBetween(1, 65535))
 *   .build()
 *
 * config.setValue("port", 8080)
 * config.getValue("port") // 8080, typed number
 * config.getValue("host") // "localhost"
 * ```
 */
export interface IConfig<S extends object> {
  /**
   * Returns the committed value, or the default while none has been committed.
   *
   * @throws UnknownKeyError if `key` was never declared.
   * @throws UnsetValueError if nothing was committed and there is no default.
   */
  getValue<K extends keyof S & string>(key: K): S[K]

  /**
   * Invokes the item's default factory; called again on every read.
   *
   * @throws MissingDefaultError if the item declares no default.
   */
  getDefault<K extends keyof S & string>(key: K): S[K]

  hasEntry(key: string): key is keyof S & string

  /** Validates and commits `value`; the previous value is kept on failure. */
  setValue<K extends keyof S & string>(key: K, value: S[K]): void

  /**
   * Converts, validates and commits untyped input, such as a string read from
   * the environment.
   *
   * @throws TypeMismatchError if `raw` is neither of the item's type nor convertible to it.
   * @throws ConstraintViolationError if the converted value fails validation.
   */
  setRawValue(key: string, raw: unknown): void

  isSet(key: keyof S & string): boolean

  keys(): string[]
}
