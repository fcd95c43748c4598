import Ajv from 'ajv';
import addFormats from 'ajv-formats';
import requestSchema from '../../schemas/assignment-request.v1.schema.json';
import { Err, ModuleError, Ok, Result, generateCorrelationId } from '../../shared/types.js';
import { AssignmentRequest } from './types.js';

/**
 * Request as stored in a JSON file: the request itself plus an optional pinned date
 */
export interface AssignmentRequestDocument extends AssignmentRequest {
  readonly submissionDate?: string;
}

const ajv = new Ajv({ strict: true, allErrors: true });
addFormats(ajv);
const validateDocument = ajv.compile<AssignmentRequestDocument>(requestSchema);

/**
 * Check parsed JSON against assignment-request.v1 and return the typed document
 */
export function parseAssignmentRequestDocument(data: unknown): Result<AssignmentRequestDocument, ModuleError[]> {
  if (validateDocument(data)) {
    return Ok(data);
  }

  const correlationId = generateCorrelationId('req');
  return Err((validateDocument.errors ?? []).map(error => ({
    code: 'E-M1-SCHEMA-VALIDATION',
    module: 'M1-Request',
    data: {
      path: error.instancePath || '/',
      message: error.message ?? 'invalid',
      params: error.params
    },
    correlationId
  })));
}

export function formatSchemaErrors(errors: ModuleError[]): string[] {
  return errors.map(error => `${String(error.data.path)}: ${String(error.data.message)}`);
}
