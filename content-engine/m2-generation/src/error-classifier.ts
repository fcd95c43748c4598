import { GenerationFailureKind } from './types.js';

export const FAILURE_MARKER = '❌';

interface ClassificationRule {
  kind: Exclude<GenerationFailureKind, 'unexpected'>;
  matches: (message: string) => boolean;
  text: string;
}

// Order matters: the first matching rule wins
const RULES: readonly ClassificationRule[] = [
  {
    kind: 'invalid-credential',
    matches: message => message.includes('API_KEY_INVALID') || message.toLowerCase().includes('invalid'),
    text: `${FAILURE_MARKER} **API Key Error**: Your API key is invalid.\n\n` +
      '**Solution:** Create a new key in your provider dashboard and set OPENAI_API_KEY.'
  },
  {
    kind: 'quota-exhausted',
    matches: message => {
      const lower = message.toLowerCase();
      return lower.includes('quota') || lower.includes('resource_exhausted');
    },
    text: `${FAILURE_MARKER} **Quota Exceeded**: You've reached your API usage limits.\n\n` +
      '**Solution:** Check the usage limits and billing of your API account.'
  },
  {
    kind: 'timeout',
    matches: message => message.toLowerCase().includes('timeout'),
    text: `${FAILURE_MARKER} **Timeout Error**: Request took too long.\n\n` +
      '**Solution:** Try reducing word count or number of questions.'
  },
  {
    kind: 'permission-denied',
    matches: message => message.includes('PERMISSION_DENIED'),
    text: `${FAILURE_MARKER} **Permission Error**: API key doesn't have permission to use this model.\n\n` +
      '**Solution:** Enable access to the configured model (OPENAI_MODEL) for this key.'
  }
];

export function classifyFailure(message: string): { kind: GenerationFailureKind; text: string } {
  const rule = RULES.find(candidate => candidate.matches(message));
  if (rule) {
    return { kind: rule.kind, text: rule.text };
  }
  return { kind: 'unexpected', text: `${FAILURE_MARKER} **Unexpected Error**: ${message}` };
}

export function isFailureText(text: string): boolean {
  return text.startsWith(FAILURE_MARKER);
}
