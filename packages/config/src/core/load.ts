import { ConfigLoadError, isValidationFailure, type LoadIssue } from "@confine/errors"
import { type Logger, NullLogger } from "@confine/logger"
import { EnvSource } from "../adapters/env/env-source"
import type { IConfig } from "../ports/config"
import type { ConfigSource } from "../ports/source"
import { LoadReport } from "./load-report"

export type LoadConfigOptions<S extends object> = {
  config: IConfig<S>
  sources?: ConfigSource[]
  logger?: Logger
}

type Supplied = { value: unknown; source: string }

/**
 * Loads every source in order and applies the merged values to `config`
 * through {@link IConfig.setRawValue}.
 *
 * Later sources override earlier ones; `undefined` never overrides. Values
 * rejected by their item are collected and thrown together as a
 * {@link ConfigLoadError} once every key has been tried. Accepted values stay
 * committed either way.
 */
export async function loadConfig<S extends object>({
  config,
  sources,
  logger,
}: LoadConfigOptions<S>): Promise<LoadReport> {
  const log = (logger ?? new NullLogger()).child({ module: "config-loader" })
  const merged = new Map<string, Supplied>()
  const resolvedSources = sources ?? [new EnvSource()]

  for (const source of resolvedSources) {
    const values = await source.load()
    let supplied = 0

    for (const [key, value] of Object.entries(values)) {
      if (value !== undefined) {
        merged.set(key, { value, source: source.name })
        supplied++
      }
    }

    log.debug("Config source loaded", { source: source.name, supplied })
  }

  const provenance = new Map<string, string>()
  const unknownKeys: string[] = []
  const issues: LoadIssue[] = []

  for (const [key, { value, source }] of merged) {
    if (!config.hasEntry(key)) {
      unknownKeys.push(key)
      continue
    }

    try {
      config.setRawValue(key, value)
      provenance.set(key, source)
    } catch (err) {
      if (!isValidationFailure(err)) throw err

      issues.push({ key, source, code: err.code, message: err.message })
      log.error("Config value rejected", { key, source, err })
    }
  }

  if (unknownKeys.length > 0) {
    log.debug("Undeclared config keys ignored", { keys: unknownKeys })
  }

  if (issues.length > 0) {
    throw new ConfigLoadError(issues)
  }

  log.info("Config loaded", {
    applied: provenance.size,
    sources: resolvedSources.map((s) => s.name),
  })

  return new LoadReport(provenance, unknownKeys)
}
