import { z } from "zod"
import type { TypeTag } from "../../ports/type-tag"
import { formatValue } from "../checker/describe-value"

type Literal = string | number | bigint | boolean

/** Wraps a zod schema as a tag; `is` succeeds when the schema accepts the value unchanged in type. */
function schema<T>(name: string, zodSchema: z.ZodType<T, T>): TypeTag<T> {
  return {
    name,
    is: (value: unknown): value is T => zodSchema.safeParse(value).success,
  }
}

function instanceOf<T>(ctor: abstract new (...args: never[]) => T, name = ctor.name): TypeTag<T> {
  return {
    name,
    is: (value: unknown): value is T => value instanceof ctor,
  }
}

function oneOf<const V extends readonly [Literal, ...Literal[]]>(...values: V): TypeTag<V[number]> {
  return {
    name: values.map(formatValue).join(" | "),
    is: (value: unknown): value is V[number] => values.some((v) => v === value),
  }
}

function arrayOf<T>(tag: TypeTag<T>): TypeTag<T[]> {
  return {
    name: `${tag.name}[]`,
    is: (value: unknown): value is T[] => Array.isArray(value) && value.every((v) => tag.is(v)),
  }
}

function nullable<T>(tag: TypeTag<T>): TypeTag<T | null> {
  return {
    name: `${tag.name} | null`,
    is: (value: unknown): value is T | null => value === null || tag.is(value),
  }
}

/**
 * Built-in type tags.
 *
 * @example
 * ```typescript
 * builder
 *   .addItem("port").ofType(types.integer)
 *   .addItem("level").ofType(types.oneOf("debug", "info", "warn"))
 *   .addItem("db").ofType(types.schema("db", z.object({ url: z.url() })))
 * ```
 */
export const types = {
  unknown: { name: "unknown", is: (value: unknown): value is unknown => true } satisfies TypeTag<unknown>,
  string: schema("string", z.string()),
  /** Finite numbers. */
  number: schema("number", z.number()),
  /** Safe integers. */
  integer: schema("integer", z.number().int()),
  boolean: schema("boolean", z.boolean()),
  bigint: schema("bigint", z.bigint()),
  /** Dates whose time value is not NaN. */
  date: schema("Date", z.date().refine((d) => !Number.isNaN(d.getTime()))),
  schema,
  instanceOf,
  oneOf,
  arrayOf,
  nullable,
}
