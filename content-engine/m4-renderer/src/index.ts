// M4-Renderer module exports

export { DocumentRenderer, renderDigest } from './document-renderer.js';
export { PdfLayoutEngine } from './pdf-layout.js';
export { buildStory, buildCover, buildBody, formatLongDate, imageAnchorTitles } from './story-builder.js';
export { classifyLine, createClassifierState, CLASSIFICATION_RULES } from './line-classifier.js';
export { detectImageFormat } from './image-decoder.js';
export {
  buildBaseFilename,
  buildExports,
  toMarkdown,
  toPlainText,
  countWords,
  formatCompactDate,
  MIME_TYPES
} from './exports.js';
export { LineKind } from './types.js';
export type {
  Block,
  ClassifiedLine,
  ClassifierState,
  ExportArtifact,
  ExportFormat,
  ImageFormat,
  ParagraphStyleName,
  PdfMetadata,
  RenderInput,
  StudentInfo
} from './types.js';
