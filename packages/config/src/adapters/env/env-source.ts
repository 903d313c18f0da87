import type { ConfigSource, KeyMapper } from "../../ports/source"

export type EnvSourceOptions = {
  prefix?: string
  env?: Record<string, string | undefined>
  /** Applied after the prefix is stripped, e.g. `APP_HTTP_PORT` → `HTTP_PORT` → `http.port`. */
  mapKey?: KeyMapper
}

export class EnvSource implements ConfigSource {
  readonly name = "env"
  private readonly prefix?: string | undefined
  private readonly env: Record<string, string | undefined>
  private readonly mapKey?: KeyMapper | undefined

  constructor(options: EnvSourceOptions = {}) {
    this.prefix = options.prefix
    this.env = options.env ?? process.env
    this.mapKey = options.mapKey
  }

  async load(): Promise<Record<string, unknown>> {
    const values = new Map<string, string | undefined>()

    for (const [rawKey, value] of Object.entries(this.env)) {
      if (this.prefix && !rawKey.startsWith(this.prefix)) continue

      const stripped = this.prefix ? rawKey.slice(this.prefix.length) : rawKey
      const key = this.mapKey ? this.mapKey(stripped) : stripped

      if (key !== undefined) values.set(key, value)
    }

    return Object.fromEntries(values)
  }
}
