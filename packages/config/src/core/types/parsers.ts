import { z } from "zod"

const integerString = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/)
  .transform(Number)
  .pipe(z.number().int())

const numberString = z.string().trim().min(1).transform(Number).pipe(z.number())

const booleanString = z.stringbool()

/**
 * Converters from raw strings, for use with `mapFrom(types.string, ...)`.
 *
 * Each throws a `ZodError` on input it cannot convert; the item reports that
 * as a type mismatch with the zod error as cause.
 *
 * @example
 * ```typescript
 * builder.addItem("port").ofType(types.integer).mapFrom(types.string, parsers.integer)
 * ```
 */
export const parsers = {
  /** Decimal integers with an optional sign, e.g. "8080" or "-1". */
  integer: (raw: string): number => integerString.parse(raw),

  /** Anything `Number()` reads as a finite number, except the empty string. */
  number: (raw: string): number => numberString.parse(raw),

  /** "true"/"false", "1"/"0", "yes"/"no", "on"/"off", "y"/"n", "enabled"/"disabled". */
  boolean: (raw: string): boolean => booleanString.parse(raw),

  /** Comma-separated values, trimmed, with empty entries dropped. */
  list: (raw: string): string[] =>
    raw
      .split(",")
      .map((part) => part.trim())
      .filter((part) => part.length > 0),
}
