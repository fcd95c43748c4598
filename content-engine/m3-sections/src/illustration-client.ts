import { SETTINGS } from '../../../config/settings.js';
import { Err, ModuleError, Ok, Result, errorMessage, generateCorrelationId } from '../../shared/types.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { FetchLike, IllustrationClientConfig, IllustrationProgress, Section, SectionImageMap } from './types.js';

export const MAX_ILLUSTRATED_SECTIONS = 5;
const CONTEXT_PREVIEW_LENGTH = 200;

export const DEFAULT_ILLUSTRATION_CONFIG: IllustrationClientConfig = {
  apiUrl: SETTINGS.IMAGE_API_URL,
  apiKey: SETTINGS.IMAGE_API_KEY,
  timeoutMs: SETTINGS.IMAGE_TIMEOUT_MS,
  width: 800,
  height: 500
};

export function buildIllustrationPrompt(section: Section, subject: string): string {
  return `Educational illustration for a ${subject} assignment. ` +
    `Section: ${section.title}. ` +
    `Context: ${section.body.slice(0, CONTEXT_PREVIEW_LENGTH)}`;
}

/**
 * Requests one image per section from the image service.
 * Failures are per section: logged, skipped, never thrown.
 */
export class IllustrationClient {
  private config: IllustrationClientConfig;
  private fetchImpl: FetchLike;
  private logger: Logger;

  constructor(config: Partial<IllustrationClientConfig> = {}, fetchImpl: FetchLike = fetch, logger: Logger = silentLogger) {
    this.config = { ...DEFAULT_ILLUSTRATION_CONFIG, ...config };
    this.fetchImpl = fetchImpl;
    this.logger = logger;
  }

  async fetchIllustration(prompt: string, style: string, correlationId: string = generateCorrelationId('img')): Promise<Result<Buffer, ModuleError[]>> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const response = await this.fetchImpl(this.config.apiUrl, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.config.apiKey}`,
          'Content-Type': 'application/json'
        },
        body: JSON.stringify({
          prompt,
          style,
          width: this.config.width,
          height: this.config.height,
          format: 'png'
        }),
        signal: controller.signal
      });

      if (response.status !== 200) {
        return Err([{
          code: 'E-M3-IMAGE-HTTP',
          module: 'M3-Sections',
          data: { status: response.status },
          correlationId
        }]);
      }

      return Ok(Buffer.from(await response.arrayBuffer()));
    } catch (error) {
      return Err([{
        code: controller.signal.aborted ? 'E-M3-IMAGE-TIMEOUT' : 'E-M3-IMAGE-TRANSPORT',
        module: 'M3-Sections',
        data: { error: errorMessage(error), timeoutMs: this.config.timeoutMs },
        correlationId
      }]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Illustrate the first sections in document order, one request at a time
   */
  async illustrateSections(
    sections: Section[],
    subject: string,
    style: string,
    onProgress?: (progress: IllustrationProgress) => void
  ): Promise<SectionImageMap> {
    const images: SectionImageMap = new Map();
    const selected = sections.slice(0, MAX_ILLUSTRATED_SECTIONS);
    const correlationId = generateCorrelationId('img');

    for (const [index, section] of selected.entries()) {
      onProgress?.({ index, total: selected.length, title: section.title });

      const result = await this.fetchIllustration(buildIllustrationPrompt(section, subject), style, correlationId);
      if (result.isSuccess()) {
        images.set(section.title.toUpperCase(), result.value);
      } else {
        this.logger('warn', 'Illustration skipped', {
          section: section.title,
          errors: result.errors ?? []
        });
      }
    }

    this.logger('info', 'Illustration batch finished', {
      correlationId,
      requested: selected.length,
      illustrated: images.size
    });

    return images;
  }
}
