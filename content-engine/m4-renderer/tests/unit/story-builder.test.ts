import { buildBody, buildCover, buildStory, formatLongDate } from '../../src/story-builder.js';
import { SECTION_IMAGE } from '../../src/pdf-styles.js';
import { Block, RenderInput } from '../../src/types.js';

const PNG_BYTES = Buffer.from(
  'iVBORw0KGgoAAAANSUhEUgAAAAIAAAACCAIAAAD91JpzAAAAEElEQVR4nGMwTpsJRAwQCgAf7gTJ/qZDUgAAAABJRU5ErkJggg==',
  'base64'
);

const submissionDate = new Date(Date.UTC(2026, 9, 8));

function paragraphs(blocks: Block[]): Array<[string, string]> {
  const result: Array<[string, string]> = [];
  for (const block of blocks) {
    if (block.type === 'paragraph') {
      result.push([block.style, block.text]);
    }
  }
  return result;
}

function makeInput(overrides: Partial<RenderInput> = {}): RenderInput {
  return {
    studentInfo: {
      university: 'University of Lahore',
      name: 'Ayesha Khan',
      id: 'BSCS-042',
      program: 'BS Computer Science',
      subject: 'Data Structures'
    },
    text: '## INTRODUCTION\nText.\n## CONCLUSION\nDone.',
    includeReferences: true,
    images: new Map(),
    submissionDate,
    ...overrides
  };
}

describe('formatLongDate', () => {
  test('should write the month name and a padded day', () => {
    expect(formatLongDate(submissionDate)).toBe('October 08, 2026');
  });
});

describe('buildCover', () => {
  test('should lay out the cover and end with a page break', () => {
    const cover = buildCover(makeInput().studentInfo, submissionDate);

    expect(cover).toHaveLength(11);
    expect(cover[1]).toEqual({ type: 'paragraph', style: 'title', text: 'UNIVERSITY OF LAHORE' });
    expect(paragraphs(cover)).toEqual([
      ['title', 'UNIVERSITY OF LAHORE'],
      ['subtitle', 'ACADEMIC ASSIGNMENT'],
      ['subtitle', 'Data Structures'],
      ['small', '_'.repeat(80)]
    ]);
    expect(cover[cover.length - 1]).toEqual({ type: 'pageBreak' });
  });

  test('should fill missing instructor and term with N/A', () => {
    const table = buildCover(makeInput().studentInfo, submissionDate).find(block => block.type === 'infoTable');
    expect(table).toEqual({
      type: 'infoTable',
      rows: [
        ['Student Name:', 'Ayesha Khan'],
        ['Student ID:', 'BSCS-042'],
        ['Program:', 'BS Computer Science'],
        ['Instructor:', 'N/A'],
        ['Semester / Term:', 'N/A'],
        ['Submission Date:', 'October 08, 2026']
      ]
    });
  });
});

describe('buildStory', () => {
  test('should place two main headings after the cover page', () => {
    const story = buildStory(makeInput());
    const pageBreakIndex = story.findIndex(block => block.type === 'pageBreak');
    const body = story.slice(pageBreakIndex + 1);

    expect(pageBreakIndex).toBe(10);
    expect(paragraphs(body)).toEqual([
      ['mainHeading', 'INTRODUCTION'],
      ['body', 'Text.'],
      ['mainHeading', 'CONCLUSION'],
      ['body', 'Done.']
    ]);
  });
});

describe('buildBody', () => {
  test('should insert a section image between spacers after its heading', () => {
    const images = new Map([['INTRODUCTION', PNG_BYTES]]);
    const body = buildBody('## Introduction\nText.', images);

    expect(body.map(block => block.type)).toEqual(['paragraph', 'spacer', 'image', 'spacer', 'paragraph']);
    expect(body[1]).toEqual({ type: 'spacer', height: SECTION_IMAGE.spacing });
    expect(SECTION_IMAGE.spacing).toBeCloseTo(10.8);
    expect(body[2]).toEqual({ type: 'image', data: PNG_BYTES, format: 'PNG', width: 360, height: 216 });
  });

  test('should keep the heading and skip an undecodable image', () => {
    const warnings: string[] = [];
    const images = new Map([['INTRODUCTION', Buffer.from('not an image')]]);
    const body = buildBody('## Introduction\nText.', images, (level, message) => {
      if (level === 'warn') {
        warnings.push(message);
      }
    });

    expect(paragraphs(body)).toEqual([['mainHeading', 'INTRODUCTION'], ['body', 'Text.']]);
    expect(body.some(block => block.type === 'image')).toBe(false);
    expect(warnings).toEqual(['Section image skipped']);
  });

  test('should style numbered references small', () => {
    const body = buildBody('## References\n1. Smith, J. (2020). Trees.', new Map());
    expect(paragraphs(body)).toEqual([['mainHeading', 'REFERENCES'], ['small', '1. Smith, J. (2020). Trees.']]);
  });

  test('should render the references section the same whether or not references were requested', () => {
    const text = '## INTRO\nx\n## REFERENCES\n1. Smith (2020).\nCONCLUSION: end';
    const base = {
      studentInfo: { university: 'U', name: 'N', id: 'I', program: 'P', subject: 'S' },
      text,
      images: new Map<string, Buffer>(),
      submissionDate: new Date(Date.UTC(2026, 9, 18))
    };

    const withReferences = buildStory({ ...base, includeReferences: true });
    const withoutReferences = buildStory({ ...base, includeReferences: false });

    expect(withoutReferences).toEqual(withReferences);
    expect(paragraphs(buildBody(text, new Map()))).toEqual([
      ['mainHeading', 'INTRO'],
      ['body', 'x'],
      ['mainHeading', 'REFERENCES'],
      ['small', '1. Smith (2020).'],
      ['mainHeading', 'CONCLUSION: END']
    ]);
  });
});
