// Core types for M5-Documents module

export type DocumentKind = 'pdf' | 'docx' | 'text' | 'image';

export interface ExtractedDocument {
  filename: string;
  kind: DocumentKind;
  text: string;
  wordCount: number;
  charCount: number;
  /** e.g. "Extracted 120 words (640 characters)" */
  message: string;
}

/**
 * Format-specific text extraction. Binary formats go through libraries,
 * so callers (and tests) can swap any of them.
 */
export interface TextExtractors {
  pdf(data: Buffer): Promise<string>;
  docx(data: Buffer): Promise<string>;
  image(data: Buffer): Promise<string>;
}

export interface DocumentExtractorConfig {
  maxSizeMb: number;
  minTextLength: number;
}

export interface SummaryConfig {
  chunkSize: number;
  maxChars: number;
}
