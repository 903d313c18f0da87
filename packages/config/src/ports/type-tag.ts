/**
 * Runtime descriptor of a value type.
 *
 * Items use their tag for the checked downcast: external input, defaults and
 * committed values are all tested with {@link TypeTag.is} before they are
 * handed out as `T`.
 *
 * @example
 * ```typescript
 * const port: TypeTag<number> = types.integer
 * port.is(8080)   // true
 * port.is("8080") // false
 * ```
 */
export interface TypeTag<T> {
  /** Name used in type-mismatch messages, e.g. "integer" or "string[]". */
  readonly name: string

  is(value: unknown): value is T
}
