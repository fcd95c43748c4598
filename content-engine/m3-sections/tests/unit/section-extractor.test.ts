import { extractSections } from '../../src/section-extractor.js';

describe('extractSections', () => {
  test('should exclude content under a references heading', () => {
    const sections = extractSections('## A\nfoo\n## REFERENCES\nbar\n## B\nbaz');
    expect(sections).toEqual([
      { title: 'A', body: 'foo ' },
      { title: 'B', body: 'baz ' }
    ]);
  });

  test('should join non-blank lines with a trailing space each', () => {
    const sections = extractSections('## INTRODUCTION\n  first line  \n\n\nsecond line\n');
    expect(sections).toEqual([{ title: 'INTRODUCTION', body: 'first line second line ' }]);
  });

  test('should discard lines before the first heading', () => {
    expect(extractSections('preamble\n## Scope\nkept')).toEqual([{ title: 'Scope', body: 'kept ' }]);
  });

  test('should keep subheadings inside the open section', () => {
    const sections = extractSections('## MAIN DISCUSSION\n### Mechanism\nDetail.');
    expect(sections).toEqual([{ title: 'MAIN DISCUSSION', body: '### Mechanism Detail. ' }]);
  });

  test('should strip emphasis from titles', () => {
    expect(extractSections('## **Conclusion**\nDone.')[0].title).toBe('Conclusion');
  });

  test('should match reference headings case-insensitively', () => {
    const sections = extractSections('## Intro\nx\n## Reference List\n1. Smith (2020)');
    expect(sections).toEqual([{ title: 'Intro', body: 'x ' }]);
  });

  test('should return an empty list for text without headings', () => {
    expect(extractSections('just prose\nmore prose')).toEqual([]);
  });
});
