import { access, readFile } from 'fs/promises'
import { resolve } from 'path'
import yaml from 'js-yaml'
import { type Config, validateConfig, validateConfigSafe, formatValidationErrors } from './schema.js'

/** Config file picked up from the working directory when no path is given */
export const DEFAULT_CONFIG_FILENAME = 'jar-rpkg.config.yaml'

export interface LoaderOptions {
  basePath?: string
}

export class ConfigLoader {
  private basePath: string

  constructor(options: LoaderOptions = {}) {
    this.basePath = options.basePath || process.cwd()
  }

  /**
   * Load and validate a config file
   */
  async load(configPath: string): Promise<Config> {
    const absolutePath = resolve(this.basePath, configPath)
    const content = await this.readConfigFile(absolutePath)

    let raw: unknown
    try {
      raw = yaml.load(content)
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      throw new ConfigLoadError(`Invalid YAML in config file: ${configPath}`, absolutePath, [message])
    }

    const validation = validateConfigSafe(raw)
    if (!validation.success) {
      const errors = formatValidationErrors(validation.errors)
      throw new ConfigLoadError(
        `Invalid config file: ${configPath}\n${errors.join('\n')}`,
        absolutePath,
        errors
      )
    }

    return validation.data
  }

  /**
   * Load the given file, or the default file when it exists, or the built-in defaults
   */
  async loadOrDefault(configPath?: string): Promise<Config> {
    if (configPath) {
      return this.load(configPath)
    }

    const defaultPath = resolve(this.basePath, DEFAULT_CONFIG_FILENAME)
    if (await exists(defaultPath)) {
      return this.load(defaultPath)
    }

    return validateConfig({})
  }

  /**
   * Load config from string content
   */
  loadFromString(content: string): Config {
    return validateConfig(yaml.load(content))
  }

  private async readConfigFile(absolutePath: string): Promise<string> {
    try {
      return await readFile(absolutePath, 'utf-8')
    } catch (error) {
      const code = error instanceof Error && 'code' in error ? String(error.code) : 'UNKNOWN'
      throw new ConfigLoadError(
        `Failed to read config file: ${absolutePath}`,
        absolutePath,
        [code]
      )
    }
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

/**
 * Custom error for config loading failures
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly configPath: string,
    public readonly validationErrors: string[]
  ) {
    super(message)
    this.name = 'ConfigLoadError'
  }
}

/**
 * Create a default loader instance
 */
export function createConfigLoader(options?: LoaderOptions): ConfigLoader {
  return new ConfigLoader(options)
}
