import { buildBaseFilename, buildExports, countWords, toMarkdown, toPlainText } from '../../src/exports.js';

const date = new Date(Date.UTC(2026, 0, 5));

describe('buildBaseFilename', () => {
  test('should join name, subject and compact date', () => {
    expect(buildBaseFilename('Ayesha Khan', 'Data Structures', date)).toBe('Ayesha_Khan_Data_Structures_20260105');
  });

  test('should drop unsafe characters and fall back for empty parts', () => {
    expect(buildBaseFilename('  José / O\'Neil ', '???', date)).toBe('Jos__ONeil_assignment_20260105');
  });
});

describe('text exports', () => {
  const text = '## INTRODUCTION\nSome **bold** text.\n### Detail\nMore.';

  test('should pass markdown through unchanged', () => {
    expect(toMarkdown(text)).toBe(text);
  });

  test('should strip heading markers and emphasis for plain text', () => {
    expect(toPlainText(text)).toBe('INTRODUCTION\nSome bold text.\nDetail\nMore.');
  });

  test('should count whitespace-separated words', () => {
    expect(countWords(text)).toBe(8);
    expect(countWords('   ')).toBe(0);
  });
});

describe('buildExports', () => {
  test('should build pdf, md and txt artifacts with mime types', () => {
    const artifacts = buildExports('Ayesha_Khan_DS_20260105', '## A\n**b**', Buffer.from('%PDF-1.3'));

    expect(artifacts.map(a => [a.format, a.filename, a.mimeType])).toEqual([
      ['pdf', 'Ayesha_Khan_DS_20260105.pdf', 'application/pdf'],
      ['md', 'Ayesha_Khan_DS_20260105.md', 'text/markdown'],
      ['txt', 'Ayesha_Khan_DS_20260105.txt', 'text/plain']
    ]);
    expect(artifacts[2].data.toString('utf8')).toBe('A\nb');
  });
});
