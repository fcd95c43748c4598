import type { AssignmentRequest } from '../../m1-request/src/types.js';
import type { SectionImageMap } from '../../m3-sections/src/types.js';
import type { StudentInfo } from '../../m4-renderer/src/types.js';
import { countWords } from '../../m4-renderer/src/exports.js';

export interface GeneratedDocument {
  readonly text: string;
  readonly elapsedSeconds: number;
  readonly generatedAt: Date;
}

export interface HistoryRecord {
  timestamp: Date;
  topic: string;
  subject: string;
  wordCount: number;
  elapsedSeconds: number;
}

/**
 * Everything a caller can re-export without generating again.
 * Only a successful generation writes here.
 */
export interface AppState {
  lastDocument?: GeneratedDocument;
  lastRequest?: AssignmentRequest;
  lastImages: SectionImageMap;
  history: HistoryRecord[];
}

export function createAppState(): AppState {
  return { lastImages: new Map(), history: [] };
}

export function recordGeneration(
  state: AppState,
  request: AssignmentRequest,
  document: GeneratedDocument,
  images: SectionImageMap
): void {
  state.lastDocument = document;
  state.lastRequest = request;
  state.lastImages = images;
  state.history.push({
    timestamp: document.generatedAt,
    topic: request.topic,
    subject: request.subject,
    wordCount: countWords(document.text),
    elapsedSeconds: document.elapsedSeconds
  });
}

export function toStudentInfo(request: AssignmentRequest): StudentInfo {
  return {
    university: request.university.trim(),
    name: request.studentName.trim(),
    id: request.studentId.trim(),
    program: request.program.trim(),
    subject: request.subject.trim(),
    instructor: request.instructor?.trim() || undefined,
    semester: request.semester?.trim() || undefined
  };
}
