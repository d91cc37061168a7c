/**
 * init command - Generate a default configuration file
 */

import * as fs from 'fs'
import * as path from 'path'
import { fileURLToPath } from 'url'
import { DEFAULT_CONFIG_FILENAME } from '../../core/config/index.js'

export const DEFAULT_OUTPUT_FILENAME = DEFAULT_CONFIG_FILENAME

export interface InitOptions {
  output?: string
  force?: boolean
}

export interface InitResult {
  success: boolean
  outputPath?: string
  error?: string
}

/**
 * Get the path to the default configuration bundled with the package
 */
export function getDefaultConfigPath(): string {
  const currentDir = path.dirname(fileURLToPath(import.meta.url))

  // src/cli/commands (or dist/cli/commands) -> config
  const projectRoot = path.resolve(currentDir, '..', '..', '..')
  return path.join(projectRoot, 'config', 'default.yaml')
}

/**
 * Execute the init command
 */
export async function initCommand(options: InitOptions): Promise<InitResult> {
  const outputPath = path.resolve(
    process.cwd(),
    options.output ?? DEFAULT_OUTPUT_FILENAME
  )

  try {
    if (fs.existsSync(outputPath) && !options.force) {
      return {
        success: false,
        outputPath,
        error: `File already exists: ${outputPath}. Use --force to overwrite.`
      }
    }

    const content = fs.readFileSync(getDefaultConfigPath(), 'utf-8')

    fs.mkdirSync(path.dirname(outputPath), { recursive: true })
    fs.writeFileSync(outputPath, content, 'utf-8')

    return {
      success: true,
      outputPath
    }
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error'
    return {
      success: false,
      outputPath,
      error: message
    }
  }
}
