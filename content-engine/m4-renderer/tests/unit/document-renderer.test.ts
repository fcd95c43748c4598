import { CacheManager } from '../../../utils/cache-manager.js';
import { DocumentRenderer, renderDigest } from '../../src/document-renderer.js';
import { RenderInput } from '../../src/types.js';

const PNG_BYTES = Buffer.from(
  'iVBORw0KGgoAAAANSUhEUgAAAAIAAAACCAIAAAD91JpzAAAAEElEQVR4nGMwTpsJRAwQCgAf7gTJ/qZDUgAAAABJRU5ErkJggg==',
  'base64'
);

function makeInput(overrides: Partial<RenderInput> = {}): RenderInput {
  return {
    studentInfo: {
      university: 'University of Lahore',
      name: 'Ayesha Khan',
      id: 'BSCS-042',
      program: 'BS Computer Science',
      subject: 'Data Structures',
      instructor: 'Dr. Imran Ali',
      semester: 'Fall 2026'
    },
    text: [
      '## INTRODUCTION',
      'Balanced trees keep lookups logarithmic while hash tables trade ordering for constant expected time.',
      '## MAIN DISCUSSION',
      '### Mechanism',
      'Rotations restore balance after inserts and deletes.',
      '**Question:** Which structure supports range queries?',
      '## REFERENCES',
      '1. Cormen, T. (2009). Introduction to Algorithms.'
    ].join('\n'),
    includeReferences: true,
    images: new Map([['INTRODUCTION', PNG_BYTES]]),
    submissionDate: new Date(Date.UTC(2026, 9, 18)),
    ...overrides
  };
}

describe('DocumentRenderer', () => {
  test('should render a PDF document', () => {
    const pdf = new DocumentRenderer().render(makeInput());
    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });

  test('should produce identical bytes for identical inputs', () => {
    const first = new DocumentRenderer().render(makeInput());
    const second = new DocumentRenderer().render(makeInput());
    expect(first.equals(second)).toBe(true);
  });

  test('should serve repeated renders from the cache', () => {
    const renderer = new DocumentRenderer(new CacheManager<Buffer>());

    const first = renderer.render(makeInput());
    const second = renderer.render(makeInput());

    expect(second).toBe(first);
    expect(renderer.getCacheMetrics().hits_total).toBe(1);
  });

  test('should still render when an embedded image fails to decode', () => {
    const pdf = new DocumentRenderer().render(makeInput({ images: new Map([['INTRODUCTION', Buffer.from('junk')]]) }));
    expect(pdf.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });
});

describe('renderDigest', () => {
  test('should change with every input that shapes the output', () => {
    const base = renderDigest(makeInput());

    expect(renderDigest(makeInput())).toBe(base);
    expect(renderDigest(makeInput({ includeReferences: false }))).not.toBe(base);
    expect(renderDigest(makeInput({ text: 'other' }))).not.toBe(base);
    expect(renderDigest(makeInput({ images: new Map() }))).not.toBe(base);
    expect(renderDigest(makeInput({ submissionDate: new Date(Date.UTC(2026, 9, 19)) }))).not.toBe(base);
  });
});
