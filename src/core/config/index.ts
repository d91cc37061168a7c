export {
  ConfigSchema,
  DEFAULT_INSTALL_COMMAND,
  validateConfig,
  validateConfigSafe,
  formatValidationErrors,
  type Config,
  type ValidationResult
} from './schema.js'
export {
  ConfigLoader,
  ConfigLoadError,
  DEFAULT_CONFIG_FILENAME,
  createConfigLoader,
  type LoaderOptions
} from './loader.js'
export {
  ConfigurationError,
  SPARK_HOME_ENV,
  requireSparkHome,
  resolveSparkHome,
  type SparkHomeSources
} from './resolve.js'
