// M5-Documents module exports

export {
  DocumentExtractor,
  documentKind,
  DEFAULT_EXTRACTOR_CONFIG,
  DEFAULT_TEXT_EXTRACTORS,
  SUPPORTED_EXTENSIONS
} from './document-extractor.js';
export {
  DocumentSummarizer,
  splitIntoChunks,
  buildChunkPrompt,
  buildCombinePrompt,
  DEFAULT_SUMMARY_CONFIG,
  TRUNCATION_MARKER
} from './document-summarizer.js';
export type {
  DocumentKind,
  ExtractedDocument,
  TextExtractors,
  DocumentExtractorConfig,
  SummaryConfig
} from './types.js';
