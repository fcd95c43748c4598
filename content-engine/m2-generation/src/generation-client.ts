import { errorMessage } from '../../shared/types.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { classifyFailure, FAILURE_MARKER } from './error-classifier.js';
import { ConnectionCheck, GenerationOutcome, TextGenerator } from './types.js';

const CONNECTION_CHECK_PROMPT = "Say 'API connection successful'";

/**
 * Sends built prompts to a text generator and reports the result as a value.
 * A single attempt per call; failures come back classified, never thrown.
 */
export class GenerationClient {
  private generator: TextGenerator;
  private logger: Logger;
  private now: () => number;

  constructor(generator: TextGenerator, logger: Logger = silentLogger, now: () => number = Date.now) {
    this.generator = generator;
    this.logger = logger;
    this.now = now;
  }

  async generate(prompt: string): Promise<GenerationOutcome> {
    const startTime = this.now();

    try {
      const text = await this.generator.generateText(prompt);
      const elapsedSeconds = (this.now() - startTime) / 1000;

      this.logger('info', 'Generation completed', {
        elapsedSeconds,
        characters: text.length
      });

      return { ok: true, text, elapsedSeconds };
    } catch (error) {
      const message = errorMessage(error);
      const { kind, text } = classifyFailure(message);

      this.logger('error', 'Generation failed', { kind, error: message });

      return { ok: false, kind, text, elapsedSeconds: 0 };
    }
  }

  /**
   * Check the generator with a fixed prompt
   */
  async testConnection(): Promise<ConnectionCheck> {
    try {
      const text = await this.generator.generateText(CONNECTION_CHECK_PROMPT);
      if (text.trim()) {
        return { ok: true, message: '✅ API connection successful!' };
      }
      return { ok: false, message: `${FAILURE_MARKER} API returned empty response` };
    } catch (error) {
      return { ok: false, message: `${FAILURE_MARKER} API connection failed: ${errorMessage(error)}` };
    }
  }
}
