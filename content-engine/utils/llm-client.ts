/**
 * LLM Client Integration
 *
 * OpenAI chat-completions client used as the text generator of the pipeline:
 * - Configurable base URL and model (any OpenAI-compatible endpoint)
 * - Bounded request timeout, no automatic retries
 * - Provider errors normalized into classifiable messages
 * - Metrics collection
 */

import OpenAI from 'openai';
import { SETTINGS } from '../../config/settings.js';
import { errorMessage } from '../shared/types.js';
import { Logger, silentLogger } from './logger.js';
import { AssignmentForgeError } from '../shared/errors.js';
import type { TextGenerator } from '../m2-generation/src/types.js';

/**
 * LLM request configuration
 */
export interface LLMClientConfig {
  apiKey: string;
  baseURL?: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
}

export const DEFAULT_LLM_CONFIG: LLMClientConfig = {
  apiKey: SETTINGS.OPENAI_API_KEY,
  baseURL: SETTINGS.OPENAI_BASE_URL,
  model: SETTINGS.OPENAI_MODEL,
  maxTokens: SETTINGS.GENERATION_MAX_TOKENS,
  timeoutMs: SETTINGS.GENERATION_TIMEOUT_MS
};

interface LLMClientMetrics {
  requests: number;
  failures: number;
  totalLatencyMs: number;
  promptTokens: number;
  completionTokens: number;
  lastRequestAt?: number;
}

/**
 * Rewrite SDK errors so the status-derived failure class survives as text.
 * 401 and 403 carry the credential and permission markers; 429 the exhaustion marker.
 */
export function normalizeOpenAIError(error: unknown, timeoutMs: number): Error {
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new Error(`Request timeout after ${timeoutMs}ms`);
  }

  if (error instanceof OpenAI.APIError) {
    switch (error.status) {
      case 401:
        return new Error(`API_KEY_INVALID: ${error.message}`);
      case 403:
        return new Error(`PERMISSION_DENIED: ${error.message}`);
      case 429:
        return new Error(`RESOURCE_EXHAUSTED: ${error.message}`);
      default:
        return error;
    }
  }

  return error instanceof Error ? error : new Error(errorMessage(error));
}

/**
 * OpenAI-backed text generator
 */
export class LLMClient implements TextGenerator {
  private openai: OpenAI;
  private config: LLMClientConfig;
  private logger: Logger;
  private metrics: LLMClientMetrics = {
    requests: 0,
    failures: 0,
    totalLatencyMs: 0,
    promptTokens: 0,
    completionTokens: 0
  };

  constructor(config: Partial<LLMClientConfig> = {}, logger: Logger = silentLogger) {
    this.config = { ...DEFAULT_LLM_CONFIG, ...config };
    this.logger = logger;
    this.openai = new OpenAI({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseURL,
      timeout: this.config.timeoutMs,
      maxRetries: 0
    });
  }

  async generateText(prompt: string): Promise<string> {
    const requestId = this.generateRequestId();
    const startTime = Date.now();
    this.metrics.requests++;
    this.metrics.lastRequestAt = startTime;

    try {
      const completion = await this.openai.chat.completions.create({
        model: this.config.model,
        max_tokens: this.config.maxTokens,
        messages: [{ role: 'user', content: prompt }]
      });

      const latency = Date.now() - startTime;
      this.metrics.totalLatencyMs += latency;
      this.metrics.promptTokens += completion.usage?.prompt_tokens ?? 0;
      this.metrics.completionTokens += completion.usage?.completion_tokens ?? 0;

      const content = completion.choices[0]?.message?.content;
      if (!content) {
        throw new AssignmentForgeError('Empty response from model', requestId);
      }

      this.logger('info', 'OpenAI request successful', {
        requestId,
        model: completion.model,
        promptTokens: completion.usage?.prompt_tokens ?? 0,
        completionTokens: completion.usage?.completion_tokens ?? 0,
        latency
      });

      return content;
    } catch (error) {
      this.metrics.failures++;
      const normalized = normalizeOpenAIError(error, this.config.timeoutMs);

      this.logger('error', 'OpenAI request failed', {
        requestId,
        model: this.config.model,
        latency: Date.now() - startTime,
        error: normalized.message
      });

      throw normalized;
    }
  }

  /**
   * Generate unique request ID
   */
  private generateRequestId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 11);
    return `req-${timestamp}-${random}`;
  }

  /**
   * Get client health status
   */
  getHealth(): { healthy: boolean; configured: boolean; model: string; lastRequestAt?: number } {
    const configured = this.config.apiKey.length > 0;
    return {
      healthy: configured,
      configured,
      model: this.config.model,
      lastRequestAt: this.metrics.lastRequestAt
    };
  }

  /**
   * Get client metrics
   */
  getMetrics(): LLMClientMetrics & { averageLatencyMs: number } {
    const succeeded = this.metrics.requests - this.metrics.failures;
    return {
      ...this.metrics,
      averageLatencyMs: succeeded > 0 ? this.metrics.totalLatencyMs / succeeded : 0
    };
  }
}
