import { writeFile } from 'fs/promises'
import { join } from 'path'
import { strToU8, zipSync } from 'fflate'

export const R_MANIFEST = 'Manifest-Version: 1.0\r\nSpark-HasRPackage: true\r\n\r\n'
export const PLAIN_MANIFEST = 'Manifest-Version: 1.0\r\nCreated-By: tests\r\n\r\n'

/**
 * Zip the given entries. Names ending with `/` become directory entries.
 */
export function createJarBytes(entries: Record<string, string | Uint8Array>): Uint8Array {
  const files: Record<string, Uint8Array> = {}
  for (const [name, content] of Object.entries(entries)) {
    files[name] = typeof content === 'string' ? strToU8(content) : content
  }
  return zipSync(files)
}

/**
 * Write a jar to dir/name and return its path
 */
export async function writeJar(
  dir: string,
  name: string,
  entries: Record<string, string | Uint8Array>
): Promise<string> {
  const jarPath = join(dir, name)
  await writeFile(jarPath, createJarBytes(entries))
  return jarPath
}

/**
 * A jar with an R package next to some class files
 */
export function rPackageEntries(manifest: string = R_MANIFEST): Record<string, string> {
  return {
    'META-INF/MANIFEST.MF': manifest,
    'R/': '',
    'R/pkg/': '',
    'R/pkg/DESCRIPTION': 'Package: demo',
    'R/pkg/R/': '',
    'R/pkg/R/code.R': 'hello <- function() "hi"\n',
    'org/example/Main.class': 'not really bytecode'
  }
}
