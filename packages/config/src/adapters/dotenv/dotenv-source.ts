import { parse } from "dotenv"
import type { ConfigSource, KeyMapper } from "../../ports/source"
import { readSourceFile, type SourceFileOptions } from "../fs/read-source-file"

/**
 * Options for creating a dotenv configuration source.
 */
export type DotenvSourceOptions = SourceFileOptions & {
  /** Renames parsed keys; returning `undefined` drops the entry. */
  mapKey?: KeyMapper
}

export class DotenvSource implements ConfigSource {
  readonly name: string

  constructor(private readonly opts: DotenvSourceOptions) {
    this.name = `dotenv:${opts.file}`
  }

  async load(): Promise<Record<string, unknown>> {
    const content = await readSourceFile(this.opts)

    if (content === undefined) return {}

    const parsed = parse(content)
    const mapKey = this.opts.mapKey

    if (!mapKey) return parsed

    const values = new Map<string, string>()

    for (const [rawKey, value] of Object.entries(parsed)) {
      const key = mapKey(rawKey)

      if (key !== undefined) values.set(key, value)
    }

    return Object.fromEntries(values)
  }
}
