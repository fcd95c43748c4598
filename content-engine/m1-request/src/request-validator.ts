import { AssignmentRequest, ValidationContext } from './types.js';
import {
  MIN_UNIVERSITY_NAME_LENGTH,
  MIN_STUDENT_NAME_LENGTH,
  MIN_STUDENT_ID_LENGTH,
  MIN_PROGRAM_NAME_LENGTH,
  MIN_SUBJECT_NAME_LENGTH,
  MIN_TOPIC_LENGTH
} from './constants.js';

interface LengthRule {
  label: string;
  minLength: number;
  read: (request: AssignmentRequest) => string | undefined;
}

const LENGTH_RULES: readonly LengthRule[] = [
  { label: 'University name', minLength: MIN_UNIVERSITY_NAME_LENGTH, read: r => r.university },
  { label: 'Student name', minLength: MIN_STUDENT_NAME_LENGTH, read: r => r.studentName },
  { label: 'Student ID', minLength: MIN_STUDENT_ID_LENGTH, read: r => r.studentId },
  { label: 'Program name', minLength: MIN_PROGRAM_NAME_LENGTH, read: r => r.program },
  { label: 'Subject name', minLength: MIN_SUBJECT_NAME_LENGTH, read: r => r.subject },
  { label: 'Assignment topic', minLength: MIN_TOPIC_LENGTH, read: r => r.topic }
];

export const IMAGE_KEY_REQUIRED_MESSAGE = 'Image generation requires an image API key.';

/**
 * Validates assignment requests before any prompt is built.
 * Every rule runs; messages come back in rule order.
 */
export class RequestValidator {

  static validate(request: AssignmentRequest, context: ValidationContext = {}): string[] {
    const errors: string[] = [];

    for (const rule of LENGTH_RULES) {
      const value = rule.read(request) ?? '';
      if (value.trim().length < rule.minLength) {
        errors.push(`${rule.label} must be at least ${rule.minLength} characters.`);
      }
    }

    if (request.includeImages && !context.imageApiKey?.trim()) {
      errors.push(IMAGE_KEY_REQUIRED_MESSAGE);
    }

    return errors;
  }
}

export function validateRequest(request: AssignmentRequest, context: ValidationContext = {}): string[] {
  return RequestValidator.validate(request, context);
}
