import { Err, ModuleError, Ok, Result, errorMessage, generateCorrelationId } from '../../shared/types.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { TextGenerator } from '../../m2-generation/src/types.js';
import { SummaryConfig } from './types.js';

export const TRUNCATION_MARKER = '\n\n[Truncated for AI summarization]';

export const DEFAULT_SUMMARY_CONFIG: SummaryConfig = {
  chunkSize: 4000,
  maxChars: 16000
};

export function splitIntoChunks(text: string, chunkSize: number): string[] {
  const chunks: string[] = [];
  for (let start = 0; start < text.length; start += chunkSize) {
    chunks.push(text.slice(start, start + chunkSize));
  }
  return chunks;
}

export function buildChunkPrompt(chunk: string, index: number, total: number): string {
  return `Summarize the following part (${index + 1}/${total}):\n\n${chunk}`;
}

export function buildCombinePrompt(summaries: string[]): string {
  return 'Combine the following summaries into one clear, structured academic summary:\n\n' + summaries.join('\n\n');
}

/**
 * Condenses long reference material before it is spliced into the prompt.
 * Map over fixed-size chunks, then one combining call.
 */
export class DocumentSummarizer {
  private generator: TextGenerator;
  private config: SummaryConfig;
  private logger: Logger;

  constructor(generator: TextGenerator, config: Partial<SummaryConfig> = {}, logger: Logger = silentLogger) {
    this.generator = generator;
    this.config = { ...DEFAULT_SUMMARY_CONFIG, ...config };
    this.logger = logger;
  }

  async summarize(text: string, correlationId: string = generateCorrelationId('sum')): Promise<Result<string, ModuleError[]>> {
    const source = text.length > this.config.maxChars
      ? text.slice(0, this.config.maxChars) + TRUNCATION_MARKER
      : text;
    const chunks = splitIntoChunks(source, this.config.chunkSize);

    try {
      const summaries: string[] = [];
      for (const [index, chunk] of chunks.entries()) {
        const partial = await this.generator.generateText(buildChunkPrompt(chunk, index, chunks.length));
        summaries.push(partial.trim());
      }

      const combined = await this.generator.generateText(buildCombinePrompt(summaries));
      this.logger('info', 'Document summarized', { chunks: chunks.length, characters: combined.length, correlationId });

      return Ok(combined.trim());
    } catch (error) {
      const message = errorMessage(error);
      this.logger('error', 'Summarization failed', { error: message, correlationId });

      return Err([{
        code: 'E-M5-SUMMARY-FAILED',
        module: 'M5-Documents',
        data: { message: `Error summarizing text: ${message}` },
        correlationId
      }]);
    }
  }
}
