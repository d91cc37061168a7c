/**
 * A single entry read from a jar
 */
export interface JarEntry {
  /** Full entry name as stored in the archive, `/`-separated */
  name: string

  /** Directory entries are the ones whose name ends with `/` */
  isDirectory: boolean

  /** Uncompressed content (empty for directories) */
  data: Uint8Array
}

/**
 * Options for opening a jar
 */
export interface JarOpenOptions {
  /**
   * Decide which entry bodies get decompressed. The manifest is always kept.
   */
  filter?: (name: string) => boolean
}

/**
 * Parsed META-INF/MANIFEST.MF
 */
export interface Manifest {
  /** Attributes of the main section */
  mainAttributes: Attributes

  /** Per-entry sections, keyed by their `Name` attribute */
  entries: Map<string, Attributes>
}

/**
 * Manifest attributes. Names compare case-insensitively.
 */
export class Attributes {
  private readonly values = new Map<string, { name: string; value: string }>()

  get(name: string): string | undefined {
    return this.values.get(name.toLowerCase())?.value
  }

  set(name: string, value: string): void {
    this.values.set(name.toLowerCase(), { name, value })
  }

  has(name: string): boolean {
    return this.values.has(name.toLowerCase())
  }

  get size(): number {
    return this.values.size
  }

  /** Attribute names with their original casing */
  names(): string[] {
    return [...this.values.values()].map(v => v.name)
  }
}
