import { readFile } from 'fs/promises'
import { strFromU8, unzipSync } from 'fflate'
import { parseManifest } from './manifest.js'
import type { JarEntry, JarOpenOptions, Manifest } from './types.js'

/** Location of the manifest inside a jar */
export const MANIFEST_NAME = 'META-INF/MANIFEST.MF'

/**
 * Read-only handle on a jar file.
 * Entry bodies are decompressed once, when the jar is opened.
 */
export class JarArchive {
  private manifest: Manifest | null | undefined

  private constructor(
    public readonly path: string,
    private readonly files: Array<[string, Uint8Array]>
  ) {}

  /**
   * Open a jar from disk
   */
  static async open(path: string, options: JarOpenOptions = {}): Promise<JarArchive> {
    const content = await readFile(path)
    return JarArchive.fromBytes(path, content, options)
  }

  /**
   * Open a jar from bytes already in memory
   */
  static fromBytes(path: string, content: Uint8Array, options: JarOpenOptions = {}): JarArchive {
    const { filter } = options

    try {
      const unzipped = unzipSync(content, {
        filter: file => !filter || isManifest(file.name) || filter(file.name)
      })
      return new JarArchive(path, Object.entries(unzipped))
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err)
      throw new ArchiveReadError(`Invalid jar file: ${path} (${message})`, path)
    }
  }

  /**
   * Parsed manifest, or null when the jar has none
   */
  getManifest(): Manifest | null {
    if (this.manifest === undefined) {
      const file = this.files.find(([name]) => isManifest(name))
      this.manifest = file ? parseManifest(strFromU8(file[1])) : null
    }
    return this.manifest
  }

  /**
   * All decompressed entries, in archive order
   */
  entries(): JarEntry[] {
    return this.files.map(([name, data]) => ({
      name,
      isDirectory: name.endsWith('/'),
      data
    }))
  }
}

function isManifest(name: string): boolean {
  return name.toUpperCase() === MANIFEST_NAME
}

/**
 * Raised when a file cannot be decoded as a jar
 */
export class ArchiveReadError extends Error {
  constructor(
    message: string,
    public readonly archivePath: string
  ) {
    super(message)
    this.name = 'ArchiveReadError'
  }
}
