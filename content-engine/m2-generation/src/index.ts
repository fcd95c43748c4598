// M2-Generation module exports

export { GenerationClient } from './generation-client.js';
export { classifyFailure, isFailureText, FAILURE_MARKER } from './error-classifier.js';
export type { GenerationFailureKind, GenerationOutcome, TextGenerator, ConnectionCheck } from './types.js';
