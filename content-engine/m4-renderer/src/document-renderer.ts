import { SETTINGS } from '../../../config/settings.js';
import { CacheKeyType, CacheManager, contentHash } from '../../utils/cache-manager.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { PdfLayoutEngine } from './pdf-layout.js';
import { buildStory } from './story-builder.js';
import { PdfMetadata, RenderInput, StudentInfo } from './types.js';

function studentInfoFingerprint(info: StudentInfo): string {
  return JSON.stringify([
    info.university,
    info.name,
    info.id,
    info.program,
    info.subject,
    info.instructor ?? '',
    info.semester ?? ''
  ]);
}

/**
 * SHA256 over everything that shapes the output bytes
 */
export function renderDigest(input: RenderInput): string {
  const imageDigests = [...input.images.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([title, data]) => `${title}=${contentHash(data)}`);

  return contentHash(
    studentInfoFingerprint(input.studentInfo),
    input.text,
    String(input.includeReferences),
    imageDigests.join('\n'),
    input.submissionDate.toISOString()
  );
}

/**
 * Renders generated assignments to PDF. Same input, same bytes; repeats come from the cache.
 */
export class DocumentRenderer {
  private cache: CacheManager<Buffer>;
  private engine: PdfLayoutEngine;
  private logger: Logger;

  constructor(
    cache: CacheManager<Buffer> = new CacheManager<Buffer>({
      defaultTtl: SETTINGS.CACHE_TTL_SECONDS,
      memoryMaxSize: SETTINGS.CACHE_MAX_ENTRIES
    }),
    logger: Logger = silentLogger
  ) {
    this.cache = cache;
    this.logger = logger;
    this.engine = new PdfLayoutEngine(logger);
  }

  render(input: RenderInput): Buffer {
    const digest = renderDigest(input);
    const cached = this.cache.get(CacheKeyType.RENDERED_PDF, digest);
    if (cached) {
      this.logger('debug', 'PDF served from cache', { digest });
      return cached;
    }

    const startTime = Date.now();
    const blocks = buildStory(input, this.logger);
    const metadata: PdfMetadata = {
      title: `${input.studentInfo.subject} Assignment`,
      author: input.studentInfo.name,
      subject: input.studentInfo.subject,
      creationDate: input.submissionDate,
      fileId: digest.slice(0, 32)
    };

    const pdf = this.engine.layout(blocks, metadata);
    this.cache.set(CacheKeyType.RENDERED_PDF, digest, pdf);

    this.logger('info', 'PDF rendered', {
      digest,
      blocks: blocks.length,
      bytes: pdf.length,
      durationMs: Date.now() - startTime
    });

    return pdf;
  }

  getCacheMetrics() {
    return this.cache.getMetrics();
  }
}
