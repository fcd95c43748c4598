import { BuiltPrompt, PromptParams } from './types.js';
import { DOCUMENT_CONTEXT_LIMIT } from './constants.js';

/**
 * Headings the model is told to emit. The section extractor and the PDF
 * renderer key off this vocabulary.
 */
export const REQUIRED_HEADINGS = ['## INTRODUCTION', '## MAIN DISCUSSION', '## CONCLUSION'] as const;

export const OPTIONAL_HEADINGS = {
  learningObjectives: '## LEARNING OBJECTIVES',
  rubric: '## EVALUATION RUBRIC',
  references: '## REFERENCES'
} as const;

/**
 * Map the word-count preference onto the range quoted to the model.
 * Standard falls through to the same range as Concise; see DESIGN.md.
 */
export function resolveWordCountRange(preference: string = ''): string {
  if (preference.includes('Concise')) {
    return '100-150';
  }
  if (preference.includes('Detailed')) {
    return '800-1000';
  }
  return '100-150';
}

function learningObjectivesBlock(): string {
  return `
${OPTIONAL_HEADINGS.learningObjectives}
[List 3–5 clear, measurable learning objectives that students should achieve after completing this assignment.]
`;
}

function rubricBlock(): string {
  return `
${OPTIONAL_HEADINGS.rubric}
[Provide 4–5 criteria with brief descriptors for Excellent, Good, Satisfactory, and Poor performance (concise table style).]
`;
}

function referencesBlock(): string {
  return `
${OPTIONAL_HEADINGS.references}
[List 4–6 academic references in APA format as a numbered list (1. 2. 3.).]
`;
}

function documentContextBlock(documentContext: string): string {
  return `
DOCUMENT CONTEXT PROVIDED:
${documentContext.slice(0, DOCUMENT_CONTEXT_LIMIT)}

Use this context to enhance the assignment content. Integrate the information naturally with additional insights.
`;
}

/**
 * Render the generation prompt. Pure: identical params give an identical string.
 */
export function buildPrompt(params: PromptParams): BuiltPrompt {
  const wordCountRange = resolveWordCountRange(params.wordCountPreference);
  const examplesInstruction = params.includeExamples
    ? '\n- Include practical examples and real-world applications.'
    : '';

  const hasDocumentContext = Boolean(params.documentContext && params.documentContext.trim());

  // Optional blocks collapse to nothing when disabled so no empty heading leaks into the prompt
  const optionalSections = [
    params.includeLearningObjectives ? learningObjectivesBlock() : '',
    params.includeRubric ? rubricBlock() : ''
  ].join('');
  const contextSection = hasDocumentContext && params.documentContext
    ? documentContextBlock(params.documentContext)
    : '';
  const referencesSection = params.includeReferences ? referencesBlock() : '';

  const prompt = `
You are an expert university professor and academic writer.
Create a professional ${params.assignmentType} assignment suitable for ${params.difficulty}-level students.

CRITICAL FORMATTING RULES:
- Use ## for main section headings, written in capitals
- Use ### for subsection headings (e.g., ### Key Principles)
- Do NOT use any "Question" or "Answer" format.
- Maintain consistent academic formatting and spacing.
- Write in formal academic English throughout.

Topic: ${params.topic}
Subject: ${params.subject}
${contextSection}
INSTRUCTIONS:
- Structure the assignment with clear sections and subsections.
- Each subsection should explain key aspects of the topic in a coherent, analytical manner.
- Maintain academic flow: introduction, main discussion (divided into logical subtopics), and conclusion.
- Use discipline-appropriate terminology and theoretical insights.${examplesInstruction}
- Provide depth, evidence-based reasoning, and critical reflection.
- Each major section should contain approximately ${wordCountRange} words.

${REQUIRED_HEADINGS[0]}
[Write a short introduction of 2-3 lines:
- Provide background and significance of the topic
- Explain its relevance to the academic discipline
- Outline the key concepts or challenges explored
- State the overall purpose and learning outcomes of the assignment]
${optionalSections}
${REQUIRED_HEADINGS[1]}
[Organize this section into several subheadings, each a short paragraph of 2-3 lines, e.g.:
### Definition and Concept
### Mechanism or Process
### Applications
### Challenges and Future Prospects
Each subsection should elaborate with academic reasoning and examples.]

${REQUIRED_HEADINGS[2]}
[Write 1 paragraph synthesizing the key insights from all sections and reflecting on the broader academic and practical significance of the topic.]
${referencesSection}`;

  return {
    prompt,
    meta: {
      wordCountRange,
      examplesInstruction,
      questionCount: params.questionCount,
      hasDocumentContext
    }
  };
}
