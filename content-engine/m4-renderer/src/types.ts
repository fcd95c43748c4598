// Core types for M4-Renderer module

import type { SectionImageMap } from '../../m3-sections/src/types.js';

export interface StudentInfo {
  university: string;
  name: string;
  id: string;
  program: string;
  subject: string;
  instructor?: string;
  semester?: string;
}

export interface RenderInput {
  studentInfo: StudentInfo;
  text: string;
  /** Part of the render key only; the body renders the same either way */
  includeReferences: boolean;
  images: SectionImageMap;
  submissionDate: Date;
}

export type ParagraphStyleName =
  | 'title'
  | 'subtitle'
  | 'mainHeading'
  | 'subheading'
  | 'question'
  | 'body'
  | 'small';

export type ImageFormat = 'PNG' | 'JPEG';

export type Block =
  | { type: 'spacer'; height: number }
  | { type: 'paragraph'; style: ParagraphStyleName; text: string }
  | { type: 'infoTable'; rows: Array<[string, string]> }
  | { type: 'image'; data: Buffer; format: ImageFormat; width: number; height: number }
  | { type: 'pageBreak' };

export enum LineKind {
  MAIN_HEADING = 'MAIN_HEADING',
  SUBHEADING = 'SUBHEADING',
  QUESTION = 'QUESTION',
  REFERENCE = 'REFERENCE',
  BODY = 'BODY'
}

export interface ClassifiedLine {
  kind: LineKind;
  text: string;
}

export interface ClassifierState {
  /** Set once a references heading has been seen; never cleared within a document */
  inReferences: boolean;
}

export interface PdfMetadata {
  title: string;
  author: string;
  subject: string;
  creationDate: Date;
  /** 32 hex characters */
  fileId: string;
}

export type ExportFormat = 'pdf' | 'md' | 'txt';

export interface ExportArtifact {
  format: ExportFormat;
  filename: string;
  mimeType: string;
  data: Buffer;
}
