export {
  extractRFolder,
  isREntry,
  ExtractionError,
  R_JAR_ENTRIES,
  SCRATCH_PREFIX,
  type ExtractOptions
} from './extractor.js'
