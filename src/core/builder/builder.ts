import { spawn } from 'child_process'
import { once } from 'events'
import { join } from 'path'
import { createInterface } from 'readline'
import type { Readable } from 'stream'
import which from 'which'
import { DEFAULT_INSTALL_COMMAND, requireSparkHome } from '../config/index.js'
import type { OutputSink } from '../../utils/sink.js'

export interface BuilderOptions {
  /** Spark installation whose R/lib receives the package */
  sparkHome: string

  /** Install command before the library and package paths */
  command?: readonly string[]

  /** Environment of the install process (cleared when omitted) */
  env?: NodeJS.ProcessEnv

  /** PATH used to find the install command (the caller's PATH when omitted) */
  searchPath?: string
}

/**
 * Outcome of one install run
 */
export interface BuildResult {
  /** Whether the command exited with code 0 */
  success: boolean

  /** Exit code, null when the process never ran or died from a signal */
  exitCode: number | null

  /** Number of output lines relayed to the sink */
  outputLines: number

  /** Duration in milliseconds */
  duration: number

  /** Launch or wait failure message */
  error?: string
}

/**
 * Command line that installs the package found under dir/R/pkg
 */
export function buildInstallCommand(
  dir: string,
  sparkHome: string,
  command: readonly string[] = DEFAULT_INSTALL_COMMAND
): string[] {
  const pathToSparkR = join(sparkHome, 'R', 'lib')
  const pathToPkg = join(dir, 'R', 'pkg')
  return [...command, pathToSparkR, pathToPkg]
}

/**
 * Run the R package installer on an extracted source tree.
 * Output of the process is relayed to the sink as it arrives. Running it
 * again on the same directory reinstalls the package.
 *
 * Throws ConfigurationError when no Spark home is given. Every other
 * failure is reported in the result.
 */
export async function buildRPackage(
  dir: string,
  sink: OutputSink,
  verbose: boolean,
  options: BuilderOptions
): Promise<BuildResult> {
  const sparkHome = requireSparkHome(options.sparkHome)
  const installCmd = buildInstallCommand(dir, sparkHome, options.command)

  if (verbose) {
    sink.println(`Building R package with the command: ${installCmd.join(' ')}`)
  }

  const startTime = Date.now()
  let outputLines = 0

  try {
    const [command, ...args] = installCmd
    // The child gets a cleared environment, so look the command up on the caller's PATH
    const executable = await which(command, {
      path: options.searchPath ?? process.env.PATH,
      nothrow: true
    }) ?? command
    const child = spawn(executable, args, {
      env: options.env ?? {},
      stdio: ['ignore', 'pipe', 'pipe']
    })

    const relay = (stream: Readable): Promise<void> => {
      const lines = createInterface({ input: stream, crlfDelay: Infinity })
      lines.on('line', line => {
        outputLines++
        sink.println(line)
      })
      return once(lines, 'close').then(() => undefined)
    }

    const exited = new Promise<number | null>((resolve, reject) => {
      child.once('error', reject)
      child.once('close', code => resolve(code))
    })

    const [exitCode] = await Promise.all([
      exited,
      relay(child.stdout),
      relay(child.stderr)
    ])

    return {
      success: exitCode === 0,
      exitCode,
      outputLines,
      duration: Date.now() - startTime
    }
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err))
    sink.println(`${error.message}\n${error.stack ?? ''}`)
    return {
      success: false,
      exitCode: null,
      outputLines,
      duration: Date.now() - startTime,
      error: error.message
    }
  }
}
