import { Section } from './types.js';

const MAIN_HEADING = /^##(?!#)/;

export function isReferencesTitle(title: string): boolean {
  return title.toUpperCase().includes('REFERENCE');
}

function headingTitle(line: string): string {
  return line.replace(/^#+/, '').replace(/\*\*/g, '').trim();
}

/**
 * Split generated text into (title, body) pairs at `##` headings.
 * A references heading closes the open section; its lines belong to no section.
 */
export function extractSections(text: string): Section[] {
  const sections: Section[] = [];
  let current: Section | undefined;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();

    if (MAIN_HEADING.test(line)) {
      const title = headingTitle(line);
      if (isReferencesTitle(title)) {
        current = undefined;
      } else {
        current = { title, body: '' };
        sections.push(current);
      }
      continue;
    }

    if (current && line) {
      current.body += `${line} `;
    }
  }

  return sections;
}
