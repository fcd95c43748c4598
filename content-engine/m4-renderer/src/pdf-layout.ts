import { jsPDF } from 'jspdf';
import { errorMessage } from '../../shared/types.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import {
  CONTENT_WIDTH,
  FOOTER_STYLE,
  INFO_TABLE_STYLE,
  PAGE,
  PARAGRAPH_STYLES,
  ParagraphStyle
} from './pdf-styles.js';
import { Block, ImageFormat, ParagraphStyleName, PdfMetadata } from './types.js';

const FONT_FAMILY = 'helvetica';

// Characters above U+00FF that the standard fonts still encode (WinAnsi)
const WIN_ANSI_EXTRAS = new Set('€‚ƒ„…†‡ˆ‰Š‹ŒŽ‘’“”•–—˜™š›œžŸ');

/**
 * Characters the built-in Helvetica cannot encode. jsPDF writes any line holding
 * one of them in a two-byte encoding, which garbles the whole line.
 */
export function unencodableCharacters(text: string): string[] {
  const found = new Set<string>();
  for (const char of text) {
    const code = char.codePointAt(0) ?? 0;
    if (code > 0xff && !WIN_ANSI_EXTRAS.has(char)) {
      found.add(char);
    }
  }
  return [...found];
}

function blockText(block: Block): string[] {
  switch (block.type) {
    case 'paragraph':
      return [block.text];
    case 'infoTable':
      return block.rows.flat();
    default:
      return [];
  }
}

export interface PdfLayoutOptions {
  /** Deflate page streams; off only to inspect the raw content */
  compress: boolean;
}

interface PdfContext {
  pdf: jsPDF;
  /** Distance from the top edge to the next free line, in points */
  y: number;
  atPageTop: boolean;
}

function createPdfContext(metadata: PdfMetadata, compress: boolean): PdfContext {
  const pdf = new jsPDF({ unit: 'pt', format: 'letter', orientation: 'portrait', compress });

  pdf.setProperties({
    title: metadata.title,
    subject: metadata.subject,
    author: metadata.author,
    creator: 'assignment-forge'
  });
  pdf.setCreationDate(metadata.creationDate);
  pdf.setFileId(metadata.fileId);

  return { pdf, y: PAGE.marginTop, atPageTop: true };
}

function newPage(ctx: PdfContext): void {
  ctx.pdf.addPage();
  ctx.y = PAGE.marginTop;
  ctx.atPageTop = true;
}

/**
 * Break to a new page unless `height` still fits. A fresh page always accepts.
 */
function ensureSpace(ctx: PdfContext, height: number): void {
  if (!ctx.atPageTop && ctx.y + height > PAGE.height - PAGE.marginBottom) {
    newPage(ctx);
  }
}

function applyFont(pdf: jsPDF, fontStyle: 'normal' | 'bold', fontSize: number, color: string): void {
  pdf.setFont(FONT_FAMILY, fontStyle);
  pdf.setFontSize(fontSize);
  pdf.setTextColor(color);
}

function wrapText(pdf: jsPDF, text: string, width: number): string[] {
  const lines: string[] = pdf.splitTextToSize(text, width);
  return lines.length > 0 ? lines : [''];
}

function drawJustifiedLine(pdf: jsPDF, line: string, x: number, baseline: number, width: number): void {
  const words = line.split(' ').filter(word => word.length > 0);
  if (words.length < 2) {
    pdf.text(line, x, baseline);
    return;
  }

  const wordsWidth = words.reduce((total, word) => total + pdf.getTextWidth(word), 0);
  const gap = (width - wordsWidth) / (words.length - 1);

  let cursor = x;
  for (const word of words) {
    pdf.text(word, cursor, baseline);
    cursor += pdf.getTextWidth(word) + gap;
  }
}

function drawParagraph(ctx: PdfContext, style: ParagraphStyle, text: string): void {
  const { pdf } = ctx;

  if (!ctx.atPageTop) {
    ctx.y += style.spaceBefore;
  }

  applyFont(pdf, style.fontStyle, style.fontSize, style.color);
  const lines = wrapText(pdf, text, CONTENT_WIDTH);

  lines.forEach((line, index) => {
    ensureSpace(ctx, style.leading);
    const baseline = ctx.y + style.fontSize;
    const isLastLine = index === lines.length - 1;

    if (style.align === 'center') {
      pdf.text(line, PAGE.width / 2, baseline, { align: 'center' });
    } else if (style.align === 'justify' && !isLastLine) {
      drawJustifiedLine(pdf, line, PAGE.marginLeft, baseline, CONTENT_WIDTH);
    } else {
      pdf.text(line, PAGE.marginLeft, baseline);
    }

    ctx.y += style.leading;
    ctx.atPageTop = false;
  });

  ctx.y += style.spaceAfter;
}

function drawInfoTable(ctx: PdfContext, rows: Array<[string, string]>): void {
  const { pdf } = ctx;
  const table = INFO_TABLE_STYLE;
  const [labelWidth, valueWidth] = table.columnWidths;
  const tableWidth = labelWidth + valueWidth;
  const left = (PAGE.width - tableWidth) / 2;
  const textWidth = (cellWidth: number) => cellWidth - 2 * table.paddingHorizontal;

  pdf.setFontSize(table.fontSize);
  pdf.setDrawColor(table.gridColor);
  pdf.setLineWidth(table.gridWidth);

  for (const [label, value] of rows) {
    pdf.setFont(FONT_FAMILY, 'bold');
    const labelLines = wrapText(pdf, label, textWidth(labelWidth));
    pdf.setFont(FONT_FAMILY, 'normal');
    const valueLines = wrapText(pdf, value, textWidth(valueWidth));

    const lineCount = Math.max(labelLines.length, valueLines.length);
    const rowHeight = lineCount * table.leading + 2 * table.paddingVertical;
    ensureSpace(ctx, rowHeight);

    const top = ctx.y;
    pdf.setFillColor(table.labelBackground);
    pdf.rect(left, top, labelWidth, rowHeight, 'F');
    pdf.rect(left, top, labelWidth, rowHeight, 'S');
    pdf.rect(left + labelWidth, top, valueWidth, rowHeight, 'S');

    const drawCell = (cellLines: string[], x: number, fontStyle: 'normal' | 'bold') => {
      applyFont(pdf, fontStyle, table.fontSize, table.textColor);
      // vertically centred within the row
      const blockHeight = cellLines.length * table.leading;
      let baseline = top + (rowHeight - blockHeight) / 2 + table.fontSize;
      for (const cellLine of cellLines) {
        pdf.text(cellLine, x + table.paddingHorizontal, baseline);
        baseline += table.leading;
      }
    };

    drawCell(labelLines, left, 'bold');
    drawCell(valueLines, left + labelWidth, 'normal');

    ctx.y = top + rowHeight;
    ctx.atPageTop = false;
  }
}

function applyFootersToAllPages(pdf: jsPDF): void {
  const pageCount = pdf.getNumberOfPages();
  const footer = FOOTER_STYLE;

  for (let page = 1; page <= pageCount; page++) {
    pdf.setPage(page);

    applyFont(pdf, 'normal', footer.fontSize, footer.textColor);
    pdf.text(`Page ${page}`, footer.textRightX, PAGE.height - footer.textBottomOffset, { align: 'right' });

    pdf.setDrawColor(footer.ruleColor);
    pdf.setLineWidth(footer.ruleWidth);
    const ruleY = PAGE.height - footer.ruleBottomOffset;
    pdf.line(footer.ruleStartX, ruleY, footer.ruleEndX, ruleY);
  }
}

/**
 * Flows story blocks onto US-letter pages and returns the PDF bytes
 */
export class PdfLayoutEngine {
  private logger: Logger;
  private options: PdfLayoutOptions;

  constructor(logger: Logger = silentLogger, options: Partial<PdfLayoutOptions> = {}) {
    this.logger = logger;
    this.options = { compress: true, ...options };
  }

  layout(blocks: Block[], metadata: PdfMetadata): Buffer {
    const ctx = createPdfContext(metadata, this.options.compress);

    const unencodable = unencodableCharacters(blocks.flatMap(blockText).join('\n'));
    if (unencodable.length > 0) {
      this.logger('warn', 'Text outside the standard font encoding will print garbled', {
        characters: unencodable.slice(0, 10)
      });
    }

    for (const block of blocks) {
      switch (block.type) {
        case 'spacer':
          ctx.y += block.height;
          break;
        case 'paragraph':
          drawParagraph(ctx, this.style(block.style), block.text);
          break;
        case 'infoTable':
          drawInfoTable(ctx, block.rows);
          break;
        case 'image':
          this.drawImage(ctx, block.data, block.format, block.width, block.height);
          break;
        case 'pageBreak':
          if (!ctx.atPageTop) {
            newPage(ctx);
          }
          break;
      }
    }

    applyFootersToAllPages(ctx.pdf);

    return Buffer.from(ctx.pdf.output('arraybuffer'));
  }

  private style(name: ParagraphStyleName): ParagraphStyle {
    return PARAGRAPH_STYLES[name];
  }

  private drawImage(ctx: PdfContext, data: Buffer, format: ImageFormat, width: number, height: number): void {
    ensureSpace(ctx, height);
    const x = (PAGE.width - width) / 2;

    try {
      ctx.pdf.addImage(new Uint8Array(data), format, x, ctx.y, width, height);
    } catch (error) {
      // signature looked right but the payload did not decode; keep the heading, drop the image
      this.logger('warn', 'Image could not be embedded', { error: errorMessage(error), bytes: data.length });
      return;
    }

    ctx.y += height;
    ctx.atPageTop = false;
  }
}
