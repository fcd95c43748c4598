import { ExportArtifact, ExportFormat } from './types.js';

export const MIME_TYPES: Record<ExportFormat, string> = {
  pdf: 'application/pdf',
  md: 'text/markdown',
  txt: 'text/plain'
};

function sanitizePart(value: string): string {
  const cleaned = value.trim().replace(/\s+/g, '_').replace(/[^A-Za-z0-9_-]/g, '');
  return cleaned || 'assignment';
}

export function formatCompactDate(date: Date): string {
  const month = String(date.getUTCMonth() + 1).padStart(2, '0');
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${date.getUTCFullYear()}${month}${day}`;
}

/**
 * `<name>_<subject>_<YYYYMMDD>`, safe for Content-Disposition and file systems
 */
export function buildBaseFilename(studentName: string, subject: string, date: Date): string {
  return `${sanitizePart(studentName)}_${sanitizePart(subject)}_${formatCompactDate(date)}`;
}

export function toMarkdown(text: string): string {
  return text;
}

export function toPlainText(text: string): string {
  return text
    .split('\n')
    .map(line => line.replace(/^(\s*)#+\s*/, '$1').replace(/\*\*/g, ''))
    .join('\n');
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export function buildExports(baseFilename: string, text: string, pdf: Buffer): ExportArtifact[] {
  const artifact = (format: ExportFormat, data: Buffer): ExportArtifact => ({
    format,
    filename: `${baseFilename}.${format}`,
    mimeType: MIME_TYPES[format],
    data
  });

  return [
    artifact('pdf', pdf),
    artifact('md', Buffer.from(toMarkdown(text), 'utf8')),
    artifact('txt', Buffer.from(toPlainText(text), 'utf8'))
  ];
}
