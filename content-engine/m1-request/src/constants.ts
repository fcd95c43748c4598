/**
 * Input limits for assignment requests
 */

export const MIN_UNIVERSITY_NAME_LENGTH = 3;
export const MIN_STUDENT_NAME_LENGTH = 2;
export const MIN_STUDENT_ID_LENGTH = 3;
export const MIN_PROGRAM_NAME_LENGTH = 5;
export const MIN_SUBJECT_NAME_LENGTH = 3;
export const MIN_TOPIC_LENGTH = 20;

export const MIN_QUESTIONS = 1;
export const MAX_QUESTIONS = 10;

/** Characters of attached reference material forwarded to the model */
export const DOCUMENT_CONTEXT_LIMIT = 3000;
