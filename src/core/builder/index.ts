export {
  buildRPackage,
  buildInstallCommand,
  type BuilderOptions,
  type BuildResult
} from './builder.js'
