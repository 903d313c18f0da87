export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export type { SourceFileOptions } from "./adapters/fs/read-source-file"
export { JsonSource, type JsonSourceOptions } from "./adapters/json/json-source"
export { ObjectSource } from "./adapters/object/object-source"
export { ConfigBuilder } from "./core/builder/config-builder"
export { ItemBuilder } from "./core/builder/item-builder"
export { describeType, formatValue } from "./core/checker/describe-value"
export { type Candidate, ValueChecker } from "./core/checker/value-checker"
export { Config } from "./core/config"
export { ConfigItem, type ConfigItemOptions } from "./core/item/config-item"
export { createRawMapper, type MapResult, type RawMapper } from "./core/item/raw-mapper"
export { type LoadConfigOptions, loadConfig } from "./core/load"
export { LoadReport } from "./core/load-report"
export { parsers } from "./core/types/parsers"
export { types } from "./core/types/types"
export type { ConfigShape, EmptyShape, IConfig } from "./ports/config"
export type { ConfigSource, KeyMapper } from "./ports/source"
export type { TypeTag } from "./ports/type-tag"
export type { Validator } from "./ports/validator"
