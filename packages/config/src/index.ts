export { ObjectSource } from "./adapters/object/object-source"
export {
  ProcessEnvSource,
  type ProcessEnvSourceOptions,
} from "./adapters/process/process-env-source"
export type { ConfigLoaderDeps, ExitFn } from "./core/config-loader"
export { type DefineConfigOptions, defineConfig } from "./core/define-config"
export {
  type ConfigError,
  ConfigMissingError,
  type InvalidDataDetails,
  InvalidDataError,
  isConfigError,
  SchemaError,
} from "./core/errors"
export { field } from "./core/field"
export { type IntegerBounds, types } from "./core/field-types"
export type { AnyFieldDeclaration, ConfigRecord, FieldDeclaration } from "./ports/field"
export type {
  FieldType,
  FieldValue,
  ParseFailure,
  ParseOutcome,
  ParseSuccess,
} from "./ports/field-type"
export type {
  ConfigLoader,
  LoadAllFailure,
  LoadAllResult,
  LoadFailure,
  LoadResult,
  LoadSuccess,
} from "./ports/loader"
export type { ConfigSource } from "./ports/source"
