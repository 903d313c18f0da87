/** Short type name of a runtime value, as used in mismatch messages. */
export function describeType(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  if (value instanceof Date) return "Date"

  if (typeof value === "object") {
    const name = Object.getPrototypeOf(value)?.constructor?.name

    return typeof name === "string" && name !== "" && name !== "Object" ? name : "object"
  }

  return typeof value
}

/** Renders a value for a violation message: strings quoted, others as written in code. */
export function formatValue(value: unknown): string {
  switch (typeof value) {
    case "string":
      return JSON.stringify(value)
    case "bigint":
      return `${value}n`
    case "function":
      return `[function ${value.name || "anonymous"}]`
    case "symbol":
    case "number":
    case "boolean":
    case "undefined":
      return String(value)
  }

  if (value === null) return "null"
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString()
  if (value instanceof RegExp) return String(value)

  try {
    return JSON.stringify(value) ?? String(value)
  } catch {
    return `[${describeType(value)}]`
  }
}

export function formatList(values: readonly unknown[]): string {
  return `[${values.map(formatValue).join(", ")}]`
}
