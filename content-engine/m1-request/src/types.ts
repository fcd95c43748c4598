// Core types for M1-Request module

export const ASSIGNMENT_TYPES = [
  'Assignment',
  'Research Paper',
  'Problem Solving',
  'Essay',
  'Case Study',
  'Technical Report',
  'Literature Review',
  'Project Proposal'
] as const;

export const WORD_COUNT_PREFERENCES = [
  'Concise (200-300 words)',
  'Standard (400-600 words)',
  'Detailed (800-1000 words)'
] as const;

export const DIFFICULTY_LEVELS = ['Beginner', 'Intermediate', 'Advanced', 'Expert'] as const;

export const IMAGE_STYLES = ['realistic', 'illustration', 'diagram', 'minimalist'] as const;

export type AssignmentType = (typeof ASSIGNMENT_TYPES)[number];
export type WordCountPreference = (typeof WORD_COUNT_PREFERENCES)[number];
export type DifficultyLevel = (typeof DIFFICULTY_LEVELS)[number];
export type ImageStyle = (typeof IMAGE_STYLES)[number];

export interface AssignmentRequest {
  readonly university: string;
  readonly studentName: string;
  readonly studentId: string;
  readonly program: string;
  readonly subject: string;
  readonly instructor?: string;
  readonly semester?: string;
  readonly topic: string;
  readonly assignmentType: AssignmentType;
  readonly difficulty: DifficultyLevel;
  readonly wordCountPreference: WordCountPreference;
  readonly questionCount: number;
  readonly includeReferences: boolean;
  readonly includeExamples: boolean;
  readonly includeLearningObjectives: boolean;
  readonly includeRubric: boolean;
  readonly includeImages: boolean;
  readonly imageStyle: ImageStyle;
  /** Reference material the user attached; spliced into the prompt when present */
  readonly documentContext?: string;
}

export interface PromptParams {
  topic: string;
  subject: string;
  questionCount: number;
  assignmentType: string;
  difficulty: string;
  includeReferences: boolean;
  includeExamples: boolean;
  includeLearningObjectives: boolean;
  includeRubric: boolean;
  /** Free-form; only the words "Concise" and "Detailed" are significant */
  wordCountPreference?: string;
  documentContext?: string;
}

export interface PromptMeta {
  wordCountRange: string;
  examplesInstruction: string;
  questionCount: number;
  hasDocumentContext: boolean;
}

export interface BuiltPrompt {
  prompt: string;
  meta: PromptMeta;
}

export interface ValidationContext {
  /** Credential for the image service; only consulted when images are requested */
  imageApiKey?: string;
}
