// Core types for M2-Generation module

export type GenerationFailureKind =
  | 'invalid-credential'
  | 'quota-exhausted'
  | 'timeout'
  | 'permission-denied'
  | 'unexpected';

export type GenerationOutcome =
  | { ok: true; text: string; elapsedSeconds: number }
  | { ok: false; kind: GenerationFailureKind; text: string; elapsedSeconds: 0 };

/**
 * Anything that turns a prompt into text. Rejects on transport or service errors;
 * the generation client converts those rejections into outcomes.
 */
export interface TextGenerator {
  generateText(prompt: string): Promise<string>;
}

export interface ConnectionCheck {
  ok: boolean;
  message: string;
}
