import type { ConfigSource } from "../../ports/source"
import { readSourceFile, type SourceFileOptions } from "../fs/read-source-file"

/**
 * Options for creating a JSON configuration source.
 */
export type JsonSourceOptions = SourceFileOptions

/**
 * Loads a JSON object, flattening nested objects to dotted keys:
 * `{ "server": { "port": 8080 } }` loads as `{ "server.port": 8080 }`.
 *
 * Arrays, empty objects and primitives are leaf values and keep their JSON types.
 */
export class JsonSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: JsonSourceOptions) {
    this.name = `json:${this.opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await readSourceFile(this.opts)

    if (content === undefined) return {}

    const parsed: unknown = JSON.parse(content)

    if (!isPlainObject(parsed)) {
      throw new TypeError(`${this.name}: top-level JSON value must be an object`)
    }

    return Object.fromEntries(flatten(parsed, "", new Map<string, unknown>()))
  }
}

/** Collects leaves in a Map so that keys such as `__proto__` stay ordinary entries. */
function flatten(
  obj: Record<string, unknown>,
  prefix: string,
  out: Map<string, unknown>,
): Map<string, unknown> {
  for (const [key, value] of Object.entries(obj)) {
    const path = `${prefix}${key}`

    if (isPlainObject(value) && Object.keys(value).length > 0) {
      flatten(value, `${path}.`, out)
    } else {
      out.set(path, value)
    }
  }

  return out
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}
