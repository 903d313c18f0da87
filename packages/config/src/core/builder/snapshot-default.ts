import { ConfigBuilderError } from "@confine/errors"

/**
 * Deep copy of a declared default, so that no reader can change what the
 * next reader gets. Arrays, plain objects, Dates, Maps and Sets are copied;
 * primitives and class instances are returned as they are.
 */
export function snapshotDefault<T>(key: string, value: T): T {
  if (!isPlainData(value)) return value

  try {
    return structuredClone(value)
  } catch (err) {
    throw new ConfigBuilderError(
      `default for ${key} cannot be copied; declare it with withDefaultFactory()`,
      { context: { key, property: "default" }, cause: err },
    )
  }
}

function isPlainData(value: unknown): boolean {
  if (Array.isArray(value)) return true
  if (value instanceof Date || value instanceof Map || value instanceof Set) return true
  if (typeof value !== "object" || value === null) return false

  const proto: unknown = Object.getPrototypeOf(value)

  return proto === Object.prototype || proto === null
}
