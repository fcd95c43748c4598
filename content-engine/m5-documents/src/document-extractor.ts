import path from 'path';
import mammoth from 'mammoth';
import { SETTINGS } from '../../../config/settings.js';
import { Err, ModuleError, Ok, Result, errorMessage, generateCorrelationId } from '../../shared/types.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { DocumentExtractorConfig, DocumentKind, ExtractedDocument, TextExtractors } from './types.js';

const KIND_BY_EXTENSION: Record<string, DocumentKind> = {
  pdf: 'pdf',
  docx: 'docx',
  txt: 'text',
  md: 'text',
  png: 'image',
  jpg: 'image',
  jpeg: 'image'
};

export const SUPPORTED_EXTENSIONS = Object.keys(KIND_BY_EXTENSION);

export const DEFAULT_EXTRACTOR_CONFIG: DocumentExtractorConfig = {
  maxSizeMb: SETTINGS.MAX_DOCUMENT_SIZE_MB,
  minTextLength: 10
};

export const DEFAULT_TEXT_EXTRACTORS: TextExtractors = {
  async pdf(data) {
    const { PDFParse } = await import('pdf-parse');
    const parser = new PDFParse({ data });
    try {
      const result = await parser.getText();
      return result.text;
    } finally {
      await parser.destroy();
    }
  },

  async docx(data) {
    const result = await mammoth.extractRawText({ buffer: data });
    return result.value;
  },

  // Tesseract fetches its language data on first use
  async image(data) {
    const Tesseract = await import('tesseract.js');
    const worker = await Tesseract.createWorker('eng');
    try {
      const { data: ocr } = await worker.recognize(data);
      return ocr.text;
    } finally {
      await worker.terminate();
    }
  }
};

export function documentKind(filename: string): DocumentKind | undefined {
  const extension = path.extname(filename).slice(1).toLowerCase();
  return Object.prototype.hasOwnProperty.call(KIND_BY_EXTENSION, extension)
    ? KIND_BY_EXTENSION[extension]
    : undefined;
}

function decodeUtf8(data: Buffer): string {
  return new TextDecoder('utf-8', { fatal: true }).decode(data);
}

/**
 * Turns an uploaded reference document into plain text for the prompt.
 * Rejections carry a user-facing `message` in their data.
 */
export class DocumentExtractor {
  private config: DocumentExtractorConfig;
  private extractors: TextExtractors;
  private logger: Logger;

  constructor(config: Partial<DocumentExtractorConfig> = {}, extractors: TextExtractors = DEFAULT_TEXT_EXTRACTORS, logger: Logger = silentLogger) {
    this.config = { ...DEFAULT_EXTRACTOR_CONFIG, ...config };
    this.extractors = extractors;
    this.logger = logger;
  }

  async extract(filename: string, data: Buffer, correlationId: string = generateCorrelationId('doc')): Promise<Result<ExtractedDocument, ModuleError[]>> {
    const fail = (code: string, message: string, extra: Record<string, unknown> = {}): Result<ExtractedDocument, ModuleError[]> => {
      this.logger('warn', 'Document rejected', { filename, code, correlationId });
      return Err([{
        code,
        module: 'M5-Documents',
        data: { message, filename, ...extra },
        correlationId
      }]);
    };

    const limitBytes = this.config.maxSizeMb * 1024 * 1024;
    if (data.length > limitBytes) {
      return fail('E-M5-DOC-TOO-LARGE', `File size exceeds ${this.config.maxSizeMb} MB limit`, { bytes: data.length });
    }

    const kind = documentKind(filename);
    if (!kind) {
      const extension = path.extname(filename).slice(1).toLowerCase();
      return fail('E-M5-DOC-UNSUPPORTED', `Unsupported file type: ${extension || 'none'}`);
    }

    let raw: string;
    try {
      raw = await this.read(kind, data);
    } catch (error) {
      return fail('E-M5-DOC-UNREADABLE', `Error processing document: ${errorMessage(error)}`);
    }

    const text = raw.trim();
    if (text.length < this.config.minTextLength) {
      return fail('E-M5-DOC-EMPTY', 'No meaningful text extracted from document', { chars: text.length });
    }

    const wordCount = text.split(/\s+/).length;
    const message = `Extracted ${wordCount} words (${text.length} characters)`;
    this.logger('info', message, { filename, kind, correlationId });

    return Ok({ filename, kind, text, wordCount, charCount: text.length, message });
  }

  private read(kind: DocumentKind, data: Buffer): Promise<string> {
    switch (kind) {
      case 'pdf':
        return this.extractors.pdf(data);
      case 'docx':
        return this.extractors.docx(data);
      case 'image':
        return this.extractors.image(data);
      case 'text':
        return Promise.resolve(decodeUtf8(data));
    }
  }
}
