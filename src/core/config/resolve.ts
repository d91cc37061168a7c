import type { Config } from './schema.js'

/** Environment variable naming the Spark installation */
export const SPARK_HOME_ENV = 'SPARK_HOME'

export interface SparkHomeSources {
  /** Explicit value, e.g. from the command line */
  override?: string
  env?: NodeJS.ProcessEnv
  config?: Pick<Config, 'sparkHome'>
}

/**
 * Pick the Spark home: explicit override, then SPARK_HOME, then the config file
 */
export function resolveSparkHome(sources: SparkHomeSources): string | undefined {
  const candidates = [
    sources.override,
    sources.env?.[SPARK_HOME_ENV],
    sources.config?.sparkHome
  ]
  return candidates.find(value => value !== undefined && value.trim() !== '')
}

/**
 * Return the Spark home or fail with a ConfigurationError
 */
export function requireSparkHome(sparkHome: string | undefined): string {
  if (sparkHome === undefined || sparkHome.trim() === '') {
    throw new ConfigurationError(`${SPARK_HOME_ENV} not set!`)
  }
  return sparkHome
}

/**
 * Raised for configuration that makes the whole run impossible
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}
