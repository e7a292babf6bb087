/**
 * @strata/corpus - Corpus building, knowledge synthesis and exports
 */
export { CorpusBuilder, type CorpusSnapshot, type CorpusStatistics } from './builder';
export { readCorpusFile } from './reader';
export { KnowledgeSynthesizer, FUNDAMENTALS, type Fundamental } from './synthesizer';
export {
  buildBundle,
  writeBundle,
  toJsonl,
  jsonlPathFor,
  BUNDLE_VERSION,
  PLATFORM,
  CONSTANTS,
  type CorpusBundle,
  type BundleOptions,
  type WrittenBundle,
} from './bundle';
export {
  prepareTrainingExamples,
  toAlpaca,
  buildKnowledgeText,
  renderModelfile,
  writeTrainingExports,
  type ChatRole,
  type ChatMessage,
  type ChatExample,
  type AlpacaEntry,
  type ModelfileOptions,
  type TrainingExportPaths,
} from './training-export';
export {
  summarizeTrainingFiles,
  countExamples,
  formatTrainingStats,
  type TrainingFileStats,
  type TrainingStatsSummary,
} from './training-stats';
