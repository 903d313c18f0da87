/**
 * A source of configuration values.
 *
 * A ConfigSource is responsible only for *loading* raw configuration.
 * It does not convert, validate or merge; the registry's items do that.
 *
 * Sources are evaluated in order; later sources override earlier ones.
 */
export interface ConfigSource {
  /**
   * Human-readable name for debugging and provenance.
   * Example: "env", "dotenv:.env.defaults", "json:config.json"
   */
  readonly name: string

  /**
   * Load configuration values, keyed by item key.
   *
   * - Env/dotenv sources return flat string values
   * - JSON sources return typed values under dotted keys
   * - Returning undefined for a key means "value not provided"
   */
  load(): Promise<Record<string, unknown>>
}

/** Renames a source key to an item key; returning `undefined` drops the entry. */
export type KeyMapper = (sourceKey: string) => string | undefined
