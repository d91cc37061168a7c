/**
 * Batch installer
 *
 * For each jar in a comma-separated list:
 * exists? → manifest flag? → extract R/pkg → R CMD INSTALL → remove scratch dir
 */

import { rm, stat } from 'fs/promises'
import { JarArchive, checkManifestForR } from '../archive/index.js'
import { extractRFolder, isREntry } from '../extractor/index.js'
import { buildRPackage, type BuilderOptions } from '../builder/index.js'
import { requireSparkHome } from '../config/index.js'
import type { OutputSink } from '../../utils/sink.js'
import { R_JAR_DOC } from './doc.js'

export type ArchiveStatus =
  | 'not-found'
  | 'unreadable'
  | 'no-r-code'
  | 'extract-failed'
  | 'build-failed'
  | 'built'

/**
 * What happened to one jar of the batch
 */
export interface ArchiveOutcome {
  path: string
  status: ArchiveStatus
  /** Scratch directory used for the build (already removed) */
  scratchDir?: string
}

export interface InstallerOptions extends Omit<BuilderOptions, 'sparkHome'> {
  /** Spark home, required only once a jar with R code shows up */
  sparkHome?: string

  /** Parent directory for scratch directories */
  workDir?: string
}

/**
 * Split a comma-separated jar list, dropping blank items
 */
export function splitJarList(jars: string): string[] {
  return jars
    .split(',')
    .map(jar => jar.trim())
    .filter(jar => jar.length > 0)
}

/**
 * Install the R packages bundled in the given jars, one jar at a time.
 * Progress goes to the sink. A failing jar never stops the batch; only a
 * missing Spark home does.
 */
export async function checkAndBuildRPackages(
  jars: string,
  sink: OutputSink,
  verbose: boolean,
  options: InstallerOptions = {}
): Promise<ArchiveOutcome[]> {
  const outcomes: ArchiveOutcome[] = []

  for (const jarPath of splitJarList(jars)) {
    outcomes.push(await processJar(jarPath, sink, verbose, options))
  }

  return outcomes
}

async function processJar(
  jarPath: string,
  sink: OutputSink,
  verbose: boolean,
  options: InstallerOptions
): Promise<ArchiveOutcome> {
  if (!(await isFile(jarPath))) {
    sink.println(`WARN: ${jarPath} resolved as dependency, but not found.`)
    return { path: jarPath, status: 'not-found' }
  }

  let jar: JarArchive
  try {
    jar = await JarArchive.open(jarPath, { filter: isREntry })
  } catch (err) {
    sink.println(`ERROR: Failed to read ${jarPath}: ${errorMessage(err)}`)
    return { path: jarPath, status: 'unreadable' }
  }

  if (!checkManifestForR(jar)) {
    if (verbose) {
      sink.println(`${jarPath} doesn't contain R source code, skipping...`)
    }
    return { path: jarPath, status: 'no-r-code' }
  }

  sink.println(`${jarPath} contains R source code. Now installing package.`)
  const sparkHome = requireSparkHome(options.sparkHome)

  let rSource: string
  try {
    rSource = await extractRFolder(jar, sink, verbose, { workDir: options.workDir })
  } catch (err) {
    sink.println(`ERROR: Failed to extract R source from ${jarPath}: ${errorMessage(err)}`)
    return { path: jarPath, status: 'extract-failed' }
  }

  try {
    const result = await buildRPackage(rSource, sink, verbose, {
      sparkHome,
      command: options.command,
      env: options.env,
      searchPath: options.searchPath
    })

    if (!result.success) {
      sink.println(`ERROR: Failed to build R package in ${jarPath}.`)
      sink.println(R_JAR_DOC)
      return { path: jarPath, status: 'build-failed', scratchDir: rSource }
    }

    return { path: jarPath, status: 'built', scratchDir: rSource }
  } finally {
    await removeScratchDir(rSource, sink)
  }
}

async function removeScratchDir(dir: string, sink: OutputSink): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true })
  } catch (err) {
    sink.println(`WARN: Failed to remove ${dir}: ${errorMessage(err)}`)
  }
}

async function isFile(path: string): Promise<boolean> {
  try {
    const stats = await stat(path)
    return stats.isFile()
  } catch {
    return false
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
