import { classifyLine, createClassifierState } from '../../src/line-classifier.js';
import { LineKind } from '../../src/types.js';

describe('classifyLine', () => {
  test('should normalize a bold question prefix', () => {
    expect(classifyLine('**Question:** What is X?', createClassifierState())).toEqual({
      kind: LineKind.QUESTION,
      text: 'Question: What is X?'
    });
  });

  test.each([
    ['## Introduction', LineKind.MAIN_HEADING, 'INTRODUCTION'],
    ['## **Main Discussion**', LineKind.MAIN_HEADING, 'MAIN DISCUSSION'],
    ['### Key Principles', LineKind.SUBHEADING, 'Key Principles'],
    ['Subheading: Scope', LineKind.SUBHEADING, 'Scope'],
    ['**answer:** Because.', LineKind.QUESTION, 'Answer: Because.'],
    ['**Conclusion:**', LineKind.MAIN_HEADING, 'CONCLUSION'],
    ['**Introduction**', LineKind.MAIN_HEADING, 'INTRODUCTION'],
    ['Conclusion: wrapping up', LineKind.MAIN_HEADING, 'CONCLUSION: WRAPPING UP'],
    ['Q1. Define entropy.', LineKind.QUESTION, 'Q1. Define entropy.'],
    ['Answer 2: yes', LineKind.QUESTION, 'Answer 2: yes'],
    ['**Bold** statement', LineKind.BODY, 'Bold statement'],
    ['1. Smith, J. (2020).', LineKind.BODY, '1. Smith, J. (2020).']
  ])('should classify "%s" as %s', (line, kind, text) => {
    expect(classifyLine(line, createClassifierState())).toEqual({ kind, text });
  });

  test('should drop blank lines', () => {
    expect(classifyLine('   ', createClassifierState())).toBeUndefined();
  });

  test('should trim before classifying', () => {
    expect(classifyLine('   ### Scope  ', createClassifierState())).toEqual({ kind: LineKind.SUBHEADING, text: 'Scope' });
  });

  test('should switch numbered lines to references after a references heading', () => {
    const state = createClassifierState();

    expect(classifyLine('## REFERENCES', state)).toEqual({ kind: LineKind.MAIN_HEADING, text: 'REFERENCES' });
    expect(state.inReferences).toBe(true);
    expect(classifyLine('1. Smith, J. (2020).', state)).toEqual({ kind: LineKind.REFERENCE, text: '1. Smith, J. (2020).' });
    expect(classifyLine('Further reading', state)).toEqual({ kind: LineKind.BODY, text: 'Further reading' });
  });

  test('should detect a bolded references heading', () => {
    const state = createClassifierState();
    classifyLine('## **References**', state);
    expect(state.inReferences).toBe(true);
  });
});
