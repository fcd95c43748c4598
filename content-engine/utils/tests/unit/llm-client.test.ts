import OpenAI from 'openai';
import { LLMClient, normalizeOpenAIError } from '../../llm-client.js';
import { classifyFailure } from '../../../m2-generation/src/error-classifier.js';

describe('normalizeOpenAIError', () => {
  test('should mark authentication failures as invalid credentials', () => {
    const error = normalizeOpenAIError(new OpenAI.APIError(401, undefined, 'Incorrect API key provided', undefined), 1000);
    expect(error.message).toBe('API_KEY_INVALID: 401 Incorrect API key provided');
    expect(classifyFailure(error.message).kind).toBe('invalid-credential');
  });

  test('should mark rate limits as exhausted quota', () => {
    const error = normalizeOpenAIError(new OpenAI.APIError(429, undefined, 'Rate limit reached', undefined), 1000);
    expect(classifyFailure(error.message).kind).toBe('quota-exhausted');
  });

  test('should mark forbidden responses as permission denied', () => {
    const error = normalizeOpenAIError(new OpenAI.APIError(403, undefined, 'Model not available for this project', undefined), 1000);
    expect(classifyFailure(error.message).kind).toBe('permission-denied');
  });

  test('should turn SDK timeouts into a timeout message', () => {
    const error = normalizeOpenAIError(new OpenAI.APIConnectionTimeoutError(), 120000);
    expect(error.message).toBe('Request timeout after 120000ms');
    expect(classifyFailure(error.message).kind).toBe('timeout');
  });

  test('should wrap non-Error values', () => {
    expect(normalizeOpenAIError('socket hang up', 1000).message).toBe('socket hang up');
  });
});

describe('LLMClient', () => {
  test('should report health from configuration without a request', () => {
    const client = new LLMClient({ apiKey: 'test-secret', model: 'test-model' });
    expect(client.getHealth()).toEqual({
      healthy: true,
      configured: true,
      model: 'test-model',
      lastRequestAt: undefined
    });
    expect(client.getMetrics().requests).toBe(0);
  });
});
