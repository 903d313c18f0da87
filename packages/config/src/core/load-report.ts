/**
 * Outcome of a successful {@link loadConfig} run.
 *
 * @example
 * ```typescript
 * const report = await loadConfig({ config, sources: [dotenv, new EnvSource()] })
 *
 * report.explain("port")  // "env"
 * report.explain("host")  // "default"
 * report.unknownKeys()    // ["PORTT"]
 * ```
 */
export class LoadReport {
  private readonly provenance: ReadonlyMap<string, string>
  private readonly unknown: readonly string[]

  constructor(provenance: ReadonlyMap<string, string>, unknownKeys: readonly string[]) {
    this.provenance = new Map(provenance)
    this.unknown = Object.freeze([...unknownKeys])
  }

  /** Name of the source whose value was applied to `key`, or "default" if none was. */
  explain(key: string): string {
    return this.provenance.get(key) ?? "default"
  }

  /** Keys that received a value from some source. */
  appliedKeys(): string[] {
    return [...this.provenance.keys()]
  }

  /**
   * Returns the names of all sources that contributed at least one applied value.
   */
  sourcesUsed(): string[] {
    return [...new Set(this.provenance.values())]
  }

  /**
   * Returns keys present in sources but not declared in the registry.
   *
   * Useful for detecting typos, stale config, or misconfigured sources.
   */
  unknownKeys(): string[] {
    return [...this.unknown]
  }
}
