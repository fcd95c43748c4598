import { Logger, silentLogger } from '../../utils/logger.js';
import type { SectionImageMap } from '../../m3-sections/src/types.js';
import { detectImageFormat } from './image-decoder.js';
import { classifyLine, createClassifierState } from './line-classifier.js';
import { INCH, SECTION_IMAGE } from './pdf-styles.js';
import { Block, LineKind, ParagraphStyleName, RenderInput, StudentInfo } from './types.js';

const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December'
];

const STYLE_FOR_KIND: Record<LineKind, ParagraphStyleName> = {
  [LineKind.MAIN_HEADING]: 'mainHeading',
  [LineKind.SUBHEADING]: 'subheading',
  [LineKind.QUESTION]: 'question',
  [LineKind.REFERENCE]: 'small',
  [LineKind.BODY]: 'body'
};

/**
 * "October 08, 2026"; read in UTC so the same instant renders the same everywhere
 */
export function formatLongDate(date: Date): string {
  const day = String(date.getUTCDate()).padStart(2, '0');
  return `${MONTHS[date.getUTCMonth()]} ${day}, ${date.getUTCFullYear()}`;
}

export function buildCover(studentInfo: StudentInfo, submissionDate: Date): Block[] {
  return [
    { type: 'spacer', height: 0.4 * INCH },
    { type: 'paragraph', style: 'title', text: (studentInfo.university || 'UNIVERSITY').toUpperCase() },
    { type: 'spacer', height: 0.1 * INCH },
    { type: 'paragraph', style: 'subtitle', text: 'ACADEMIC ASSIGNMENT' },
    { type: 'paragraph', style: 'subtitle', text: studentInfo.subject },
    { type: 'spacer', height: 0.15 * INCH },
    {
      type: 'infoTable',
      rows: [
        ['Student Name:', studentInfo.name],
        ['Student ID:', studentInfo.id],
        ['Program:', studentInfo.program],
        ['Instructor:', studentInfo.instructor || 'N/A'],
        ['Semester / Term:', studentInfo.semester || 'N/A'],
        ['Submission Date:', formatLongDate(submissionDate)]
      ]
    },
    { type: 'spacer', height: 0.3 * INCH },
    { type: 'paragraph', style: 'small', text: '_'.repeat(80) },
    { type: 'spacer', height: 0.2 * INCH },
    { type: 'pageBreak' }
  ];
}

function imageBlocks(data: Buffer, title: string, logger: Logger): Block[] {
  const format = detectImageFormat(data);
  if (!format.isSuccess()) {
    logger('warn', 'Section image skipped', { section: title, errors: format.errors ?? [] });
    return [];
  }

  return [
    { type: 'spacer', height: SECTION_IMAGE.spacing },
    { type: 'image', data, format: format.value, width: SECTION_IMAGE.width, height: SECTION_IMAGE.height },
    { type: 'spacer', height: SECTION_IMAGE.spacing }
  ];
}

/**
 * Turn generated text into body blocks, one classified line at a time
 */
export function buildBody(
  text: string,
  images: SectionImageMap,
  logger: Logger = silentLogger
): Block[] {
  const blocks: Block[] = [];
  const state = createClassifierState();

  for (const rawLine of text.split(/\r?\n/)) {
    const classified = classifyLine(rawLine, state);
    if (!classified) {
      continue;
    }

    blocks.push({ type: 'paragraph', style: STYLE_FOR_KIND[classified.kind], text: classified.text });

    if (classified.kind === LineKind.MAIN_HEADING) {
      const image = images.get(classified.text);
      if (image) {
        blocks.push(...imageBlocks(image, classified.text, logger));
      }
    }
  }

  return blocks;
}

/**
 * Titles the body draws as main headings; an image keyed by any other title is never placed
 */
export function imageAnchorTitles(text: string): Set<string> {
  const titles = new Set<string>();
  const state = createClassifierState();

  for (const rawLine of text.split(/\r?\n/)) {
    const classified = classifyLine(rawLine, state);
    if (classified?.kind === LineKind.MAIN_HEADING) {
      titles.add(classified.text);
    }
  }

  return titles;
}

export function buildStory(input: RenderInput, logger: Logger = silentLogger): Block[] {
  return [
    ...buildCover(input.studentInfo, input.submissionDate),
    ...buildBody(input.text, input.images, logger)
  ];
}
