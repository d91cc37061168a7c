export {
  checkAndBuildRPackages,
  splitJarList,
  type ArchiveOutcome,
  type ArchiveStatus,
  type InstallerOptions
} from './installer.js'
export { R_JAR_DOC } from './doc.js'
