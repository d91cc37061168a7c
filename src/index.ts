export * from './core/archive/index.js'
export * from './core/extractor/index.js'
export * from './core/builder/index.js'
export * from './core/config/index.js'
export * from './core/installer/index.js'
export {
  createFilteredSink,
  createMemorySink,
  createStreamSink,
  nullSink,
  type MemorySink,
  type OutputSink
} from './utils/sink.js'
