import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { dirname, join, relative, resolve, isAbsolute } from 'path'
import type { JarArchive } from '../archive/index.js'
import type { OutputSink } from '../../utils/sink.js'

/** R source code lives under R/pkg inside a jar */
export const R_JAR_ENTRIES = 'R/pkg'

/** Prefix of scratch directories created for extraction */
export const SCRATCH_PREFIX = 'rpkg-'

export interface ExtractOptions {
  /** Parent directory for the scratch directory (defaults to the OS temp dir) */
  workDir?: string
}

/**
 * Check whether an entry belongs to the bundled R package
 */
export function isREntry(name: string): boolean {
  return name.includes(R_JAR_ENTRIES)
}

/**
 * Extract every R/pkg entry of a jar into a fresh temporary directory.
 * Entry paths keep everything from the first R/pkg onwards. On failure the
 * temporary directory is removed before the error propagates.
 *
 * @returns the temporary directory
 */
export async function extractRFolder(
  jar: JarArchive,
  sink: OutputSink,
  verbose: boolean,
  options: ExtractOptions = {}
): Promise<string> {
  const tempDir = await mkdtemp(join(options.workDir ?? tmpdir(), SCRATCH_PREFIX))

  try {
    for (const entry of jar.entries()) {
      const markerIndex = entry.name.indexOf(R_JAR_ENTRIES)
      if (markerIndex < 0) {
        continue
      }

      const entryPath = entry.name.slice(markerIndex)
      const outPath = resolveInside(tempDir, entryPath)

      if (entry.isDirectory) {
        if (verbose) {
          sink.println(`Creating directory: ${outPath}`)
        }
        await mkdir(outPath, { recursive: true })
      } else {
        await mkdir(dirname(outPath), { recursive: true })
        if (verbose) {
          sink.println(`Extracting ${entry.name} to ${outPath}`)
        }
        await writeFile(outPath, entry.data)
      }
    }
  } catch (err) {
    await rm(tempDir, { recursive: true, force: true })
    throw err
  }

  return tempDir
}

/**
 * Resolve an entry path under root, refusing paths that climb out of it
 */
function resolveInside(root: string, entryPath: string): string {
  const target = resolve(root, entryPath)
  const rel = relative(root, target)

  if (rel.startsWith('..') || isAbsolute(rel)) {
    throw new ExtractionError(`Entry escapes extraction directory: ${entryPath}`, entryPath)
  }

  return target
}

/**
 * Raised when an entry cannot be extracted safely
 */
export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly entryName: string
  ) {
    super(message)
    this.name = 'ExtractionError'
  }
}
