// M1-Request module exports

export { RequestValidator, validateRequest, IMAGE_KEY_REQUIRED_MESSAGE } from './request-validator.js';
export {
  buildPrompt,
  resolveWordCountRange,
  REQUIRED_HEADINGS,
  OPTIONAL_HEADINGS
} from './prompt-builder.js';
export * from './constants.js';
export {
  ASSIGNMENT_TYPES,
  WORD_COUNT_PREFERENCES,
  DIFFICULTY_LEVELS,
  IMAGE_STYLES
} from './types.js';
export type {
  AssignmentRequest,
  AssignmentType,
  WordCountPreference,
  DifficultyLevel,
  ImageStyle,
  PromptParams,
  PromptMeta,
  BuiltPrompt,
  ValidationContext
} from './types.js';

import type { AssignmentRequest, PromptParams } from './types.js';

/**
 * Project an assignment request onto the prompt builder's inputs
 */
export function toPromptParams(request: AssignmentRequest): PromptParams {
  return {
    topic: request.topic.trim(),
    subject: request.subject.trim(),
    questionCount: request.questionCount,
    assignmentType: request.assignmentType,
    difficulty: request.difficulty,
    includeReferences: request.includeReferences,
    includeExamples: request.includeExamples,
    includeLearningObjectives: request.includeLearningObjectives,
    includeRubric: request.includeRubric,
    wordCountPreference: request.wordCountPreference,
    documentContext: request.documentContext
  };
}

export { parseAssignmentRequestDocument, formatSchemaErrors } from './request-schema.js';
export type { AssignmentRequestDocument } from './request-schema.js';
