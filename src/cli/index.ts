#!/usr/bin/env node
/**
 * jar-rpkg CLI entry point
 *
 * Installs R packages shipped inside jars
 */

import { Command } from 'commander'
import { configureLogger, createLogger } from '../utils/logger.js'
import { createStreamSink } from '../utils/sink.js'
import { R_JAR_DOC } from '../core/installer/index.js'
import { initCommand, DEFAULT_OUTPUT_FILENAME } from './commands/init.js'
import { registerInstallCommand } from './commands/install.js'
import { registerCheckCommand } from './commands/check.js'

/**
 * Exit codes for the CLI
 * - 0: ok
 * - 1: failure (a jar failed to install, or `check` found no R code)
 * - 2: error (bad configuration or usage)
 */
export const ExitCode = {
  OK: 0,
  FAILURE: 1,
  ERROR: 2
} as const

export type ExitCodeType = (typeof ExitCode)[keyof typeof ExitCode]

/**
 * Global CLI options
 */
export interface GlobalOptions {
  verbose?: boolean
  quiet?: boolean
  config?: string
}

const logger = createLogger('cli')

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('jar-rpkg')
    .description('Install R packages bundled inside jars')
    .version('1.0.0')
    .option('-v, --verbose', 'Enable verbose output')
    .option('-q, --quiet', 'Suppress output except errors')
    .option('-c, --config <path>', 'Path to configuration file')
    .hook('preAction', () => {
      const globalOpts = program.opts<GlobalOptions>()
      configureLogger({
        level: globalOpts.verbose ? 'debug' : 'info',
        quiet: globalOpts.quiet ?? false
      })
    })

  registerInstallCommand(program)
  registerCheckCommand(program)

  program
    .command('doc')
    .description('Show how R source code must be laid out in a jar')
    .action(() => {
      createStreamSink(process.stdout).println(R_JAR_DOC)
      process.exit(ExitCode.OK)
    })

  program
    .command('init')
    .description('Generate a default configuration file')
    .option('-o, --output <file>', 'Output file path', DEFAULT_OUTPUT_FILENAME)
    .option('--force', 'Overwrite existing file')
    .action(async (options: { output?: string; force?: boolean }) => {
      const result = await initCommand({
        output: options.output,
        force: options.force
      })

      if (result.success) {
        logger.info(`Created configuration file: ${result.outputPath}`)
        process.exit(ExitCode.OK)
      } else {
        logger.error(`Failed to create configuration file: ${result.error}`)
        process.exit(ExitCode.ERROR)
      }
    })

  return program
}

/**
 * Run the CLI
 */
export async function run(args: string[] = process.argv): Promise<void> {
  const program = createProgram()

  try {
    await program.parseAsync(args)
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error'
    logger.error(`CLI error: ${message}`)
    process.exit(ExitCode.ERROR)
  }
}

// Run CLI when executed directly (not when imported as a module)
const isMainModule =
  import.meta.url === `file://${process.argv[1]}` ||
  decodeURIComponent(import.meta.url) === `file://${process.argv[1]}`
if (isMainModule) {
  void run()
}
