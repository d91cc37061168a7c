/**
 * install command
 *
 * Loads configuration, resolves the Spark home and runs the batch installer
 * over a comma-separated list of jars.
 */

import type { Command } from 'commander'
import type { GlobalOptions } from '../index.js'
import { ExitCode } from '../index.js'
import { createLogger } from '../../utils/logger.js'
import { createFilteredSink, createStreamSink, type OutputSink } from '../../utils/sink.js'
import {
  ConfigLoadError,
  ConfigurationError,
  createConfigLoader,
  resolveSparkHome
} from '../../core/config/index.js'
import { checkAndBuildRPackages, R_JAR_DOC, type ArchiveOutcome } from '../../core/installer/index.js'

const logger = createLogger('install')

/**
 * Install command options
 */
export interface InstallOptions {
  sparkHome?: string
  workDir?: string
}

/**
 * Where the command reads its environment and writes installer output
 */
export interface InstallIO {
  sink?: OutputSink
  env?: NodeJS.ProcessEnv
  cwd?: string
}

const FAILED_STATUSES = new Set<ArchiveOutcome['status']>([
  'unreadable',
  'extract-failed',
  'build-failed'
])

/**
 * Lines still shown in quiet mode: warnings, errors and the layout help
 */
export function isProblemLine(line: string): boolean {
  return line.startsWith('WARN: ') || line.startsWith('ERROR: ') || line === R_JAR_DOC
}

/**
 * Exit code for a finished batch
 */
export function exitCodeFor(outcomes: ArchiveOutcome[]): number {
  return outcomes.some(o => FAILED_STATUSES.has(o.status))
    ? ExitCode.FAILURE
    : ExitCode.OK
}

function summarize(outcomes: ArchiveOutcome[]): string {
  const counts = new Map<string, number>()
  for (const outcome of outcomes) {
    counts.set(outcome.status, (counts.get(outcome.status) ?? 0) + 1)
  }
  const parts = [...counts].map(([status, count]) => `${count} ${status}`)
  return `Processed ${outcomes.length} jar(s)${parts.length > 0 ? `: ${parts.join(', ')}` : ''}`
}

/**
 * Execute install command
 */
export async function executeInstall(
  jars: string,
  options: InstallOptions,
  globalOptions: GlobalOptions,
  io: InstallIO = {}
): Promise<number> {
  const env = io.env ?? process.env
  const output = io.sink ?? createStreamSink(process.stdout)
  const sink = globalOptions.quiet ? createFilteredSink(output, isProblemLine) : output
  const verbose = globalOptions.verbose ?? false

  try {
    const config = await createConfigLoader({ basePath: io.cwd })
      .loadOrDefault(globalOptions.config)

    const sparkHome = resolveSparkHome({
      override: options.sparkHome,
      env,
      config
    })
    logger.debug(`Spark home: ${sparkHome ?? '(not set)'}`)

    const outcomes = await checkAndBuildRPackages(jars, sink, verbose, {
      sparkHome,
      workDir: options.workDir ?? config.workDir,
      command: config.installCommand,
      env: config.inheritEnv ? { ...env } : {},
      searchPath: env.PATH
    })

    if (verbose) {
      logger.info(summarize(outcomes))
    }

    return exitCodeFor(outcomes)
  } catch (error) {
    if (error instanceof ConfigurationError || error instanceof ConfigLoadError) {
      logger.error(error.message)
      return ExitCode.ERROR
    }
    throw error
  }
}

/**
 * Register install command on the program
 */
export function registerInstallCommand(program: Command): void {
  program
    .command('install <jars>')
    .description('Install the R packages bundled in a comma-separated list of jars')
    .option('--spark-home <dir>', 'Spark installation (overrides SPARK_HOME)')
    .option('--work-dir <dir>', 'Parent directory for scratch directories')
    .action(async (jars: string, options: InstallOptions) => {
      const globalOpts = program.opts<GlobalOptions>()
      const exitCode = await executeInstall(jars, options, globalOpts)
      process.exit(exitCode)
    })
}
