/**
 * check command - report whether a jar carries R source code
 */

import type { Command } from 'commander'
import type { GlobalOptions } from '../index.js'
import { ExitCode } from '../index.js'
import { createLogger } from '../../utils/logger.js'
import { createStreamSink, nullSink, type OutputSink } from '../../utils/sink.js'
import { JarArchive, checkManifestForR } from '../../core/archive/index.js'
import { isREntry } from '../../core/extractor/index.js'

const logger = createLogger('check')

/**
 * Execute check command.
 * Exits OK when the jar carries R source code, FAILURE when it does not.
 */
export async function executeCheck(
  jarPath: string,
  globalOptions: GlobalOptions,
  sink: OutputSink = globalOptions.quiet ? nullSink : createStreamSink(process.stdout)
): Promise<number> {
  let jar: JarArchive
  try {
    jar = await JarArchive.open(jarPath, { filter: isREntry })
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    logger.error(`Cannot read ${jarPath}: ${message}`)
    return ExitCode.ERROR
  }

  if (!checkManifestForR(jar)) {
    sink.println(`${jarPath} doesn't contain R source code.`)
    return ExitCode.FAILURE
  }

  sink.println(`${jarPath} contains R source code.`)
  if (globalOptions.verbose) {
    for (const entry of jar.entries()) {
      if (isREntry(entry.name)) {
        sink.println(`  ${entry.name}`)
      }
    }
  }

  return ExitCode.OK
}

/**
 * Register check command on the program
 */
export function registerCheckCommand(program: Command): void {
  program
    .command('check <jar>')
    .description('Check whether a jar bundles R source code')
    .action(async (jarPath: string) => {
      const globalOpts = program.opts<GlobalOptions>()
      const exitCode = await executeCheck(jarPath, globalOpts)
      process.exit(exitCode)
    })
}
