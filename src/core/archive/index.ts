export { JarArchive, ArchiveReadError, MANIFEST_NAME } from './jar.js'
export { HAS_R_PACKAGE, checkManifestForR, parseManifest } from './manifest.js'
export { Attributes } from './types.js'
export type { JarEntry, JarOpenOptions, Manifest } from './types.js'
