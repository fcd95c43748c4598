import { SETTINGS, Settings } from '../../../config/settings.js';
import { CacheManager } from '../../utils/cache-manager.js';
import { LLMClient } from '../../utils/llm-client.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { GenerationClient } from '../../m2-generation/src/generation-client.js';
import { IllustrationClient } from '../../m3-sections/src/illustration-client.js';
import { DocumentRenderer } from '../../m4-renderer/src/document-renderer.js';
import { DocumentExtractor } from '../../m5-documents/src/document-extractor.js';
import { DocumentSummarizer } from '../../m5-documents/src/document-summarizer.js';
import { AssignmentPipeline } from './pipeline.js';

export interface PipelineServices {
  pipeline: AssignmentPipeline;
  generation: GenerationClient;
  llm: LLMClient;
  renderer: DocumentRenderer;
  documents: DocumentExtractor;
  summarizer: DocumentSummarizer;
}

/**
 * Wire the pipeline to the configured services
 */
export function createPipelineServices(
  settings: Settings = SETTINGS,
  logger: Logger = silentLogger,
  now?: () => Date
): PipelineServices {
  const llm = new LLMClient({
    apiKey: settings.OPENAI_API_KEY,
    baseURL: settings.OPENAI_BASE_URL,
    model: settings.OPENAI_MODEL,
    maxTokens: settings.GENERATION_MAX_TOKENS,
    timeoutMs: settings.GENERATION_TIMEOUT_MS
  }, logger);

  const generation = new GenerationClient(llm, logger);

  const renderer = new DocumentRenderer(
    new CacheManager<Buffer>({
      defaultTtl: settings.CACHE_TTL_SECONDS,
      memoryMaxSize: settings.CACHE_MAX_ENTRIES
    }, logger),
    logger
  );

  const illustrations = settings.IMAGE_API_URL
    ? new IllustrationClient({
        apiUrl: settings.IMAGE_API_URL,
        apiKey: settings.IMAGE_API_KEY,
        timeoutMs: settings.IMAGE_TIMEOUT_MS
      }, fetch, logger)
    : undefined;

  const pipeline = new AssignmentPipeline({
    generation,
    renderer,
    illustrations,
    imageApiKey: settings.IMAGE_API_KEY,
    logger,
    now
  });

  const documents = new DocumentExtractor({ maxSizeMb: settings.MAX_DOCUMENT_SIZE_MB }, undefined, logger);
  const summarizer = new DocumentSummarizer(llm, {}, logger);

  return { pipeline, generation, llm, renderer, documents, summarizer };
}
