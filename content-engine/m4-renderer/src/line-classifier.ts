import { ClassifiedLine, ClassifierState, LineKind } from './types.js';

const SECTION_NAMES = 'INTRODUCTION|LEARNING OBJECTIVES|EVALUATION RUBRIC|REFERENCES|ASSIGNMENT BODY|CONCLUSION';

const REFERENCES_HEADING = /^##\s*REFERENCES/;
const SUBHEADING_PREFIX = /^Subheading:\s*/i;
const QUESTION_PREFIX = /^\*\*Question:\*\*/i;
const ANSWER_PREFIX = /^\*\*Answer:\*\*/i;
const BOLD_SECTION_NAME = new RegExp(`^\\*\\*(${SECTION_NAMES})[*:]`, 'i');
const LABELLED_SECTION_NAME = new RegExp(`^(${SECTION_NAMES}):`, 'i');
const NUMBERED_QUESTION = /^Q\d+[.)]/;
const NUMBERED_ANSWER = /^Answer\s*\d+:/i;
const NUMBERED_ITEM = /^\d+\.\s/;

function stripEmphasis(text: string): string {
  return text.replace(/\*\*/g, '');
}

interface ClassificationRule {
  kind: LineKind;
  /** `line` is trimmed; `clean` is the line with `**` removed */
  matches: (line: string, clean: string, state: ClassifierState) => boolean;
  text: (line: string, clean: string) => string;
}

// First match wins; order is significant
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    kind: LineKind.MAIN_HEADING,
    matches: line => line.startsWith('## '),
    text: line => stripEmphasis(line.replace(/## /g, '')).trim().toUpperCase()
  },
  {
    kind: LineKind.SUBHEADING,
    matches: line => line.startsWith('### '),
    text: line => stripEmphasis(line.replace(/### /g, '')).trim()
  },
  {
    kind: LineKind.SUBHEADING,
    matches: (_line, clean) => SUBHEADING_PREFIX.test(clean),
    text: (_line, clean) => clean.replace(SUBHEADING_PREFIX, '').trim()
  },
  {
    kind: LineKind.QUESTION,
    matches: line => QUESTION_PREFIX.test(line),
    text: line => stripEmphasis(line.replace(QUESTION_PREFIX, 'Question:'))
  },
  {
    kind: LineKind.QUESTION,
    matches: line => ANSWER_PREFIX.test(line),
    text: line => stripEmphasis(line.replace(ANSWER_PREFIX, 'Answer:'))
  },
  {
    kind: LineKind.MAIN_HEADING,
    matches: line => BOLD_SECTION_NAME.test(line),
    text: line => stripEmphasis(line).replace(/:/g, '').trim().toUpperCase()
  },
  {
    kind: LineKind.MAIN_HEADING,
    matches: (_line, clean) => LABELLED_SECTION_NAME.test(clean),
    text: (_line, clean) => clean.toUpperCase()
  },
  {
    kind: LineKind.QUESTION,
    matches: (_line, clean) => NUMBERED_QUESTION.test(clean),
    text: (_line, clean) => clean
  },
  {
    kind: LineKind.QUESTION,
    matches: (_line, clean) => NUMBERED_ANSWER.test(clean),
    text: (_line, clean) => clean
  },
  {
    kind: LineKind.REFERENCE,
    matches: (_line, clean, state) => state.inReferences && NUMBERED_ITEM.test(clean),
    text: (_line, clean) => clean
  },
  {
    kind: LineKind.BODY,
    matches: () => true,
    text: (_line, clean) => clean
  }
];

export function createClassifierState(): ClassifierState {
  return { inReferences: false };
}

/**
 * Classify one line of generated text. Returns undefined for blank lines.
 * Seeing a references heading sets `state.inReferences` before the rules run.
 */
export function classifyLine(rawLine: string, state: ClassifierState): ClassifiedLine | undefined {
  const line = rawLine.trim();
  if (!line) {
    return undefined;
  }

  const clean = stripEmphasis(line);
  if (REFERENCES_HEADING.test(clean.toUpperCase())) {
    state.inReferences = true;
  }

  for (const rule of CLASSIFICATION_RULES) {
    if (rule.matches(line, clean, state)) {
      return { kind: rule.kind, text: rule.text(line, clean) };
    }
  }

  return { kind: LineKind.BODY, text: clean };
}
