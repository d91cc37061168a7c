import { Attributes, type Manifest } from './types.js'
import type { JarArchive } from './jar.js'

/** The manifest key that flags bundled R source code */
export const HAS_R_PACKAGE = 'Spark-HasRPackage'

/**
 * Parse manifest text into its main section and per-entry sections
 */
export function parseManifest(text: string): Manifest {
  const lines = unfold(text.split(/\r\n|\r|\n/))
  const mainAttributes = new Attributes()
  const entries = new Map<string, Attributes>()

  let current = mainAttributes
  let inMain = true
  let sectionStarted = false

  for (const line of lines) {
    if (line === '') {
      // Blank line closes the current section
      inMain = false
      sectionStarted = false
      continue
    }

    const separator = line.indexOf(': ')
    if (separator <= 0) {
      continue
    }

    const name = line.slice(0, separator)
    const value = line.slice(separator + 2)

    if (!inMain && !sectionStarted) {
      current = new Attributes()
      sectionStarted = true
      if (name.toLowerCase() === 'name') {
        entries.set(value, current)
      }
    }

    current.set(name, value)
  }

  return { mainAttributes, entries }
}

/**
 * Join continuation lines (leading single space) onto the line before them
 */
function unfold(lines: string[]): string[] {
  const result: string[] = []

  for (const line of lines) {
    if (line.startsWith(' ') && result.length > 0 && result[result.length - 1] !== '') {
      result[result.length - 1] += line.slice(1)
    } else {
      result.push(line)
    }
  }

  return result
}

/**
 * Check whether the manifest of a jar declares bundled R source code.
 * Jars without a manifest are treated as not carrying any.
 */
export function checkManifestForR(jar: JarArchive): boolean {
  const manifest = jar.getManifest()
  const value = manifest?.mainAttributes.get(HAS_R_PACKAGE)
  return value !== undefined && value.trim() === 'true'
}
