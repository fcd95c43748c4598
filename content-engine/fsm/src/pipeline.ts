import { Err, ModuleError, Ok, Result, errorMessage, generateCorrelationId } from '../../shared/types.js';
import { Logger, silentLogger } from '../../utils/logger.js';
import { buildPrompt, toPromptParams, validateRequest } from '../../m1-request/src/index.js';
import type { AssignmentRequest, BuiltPrompt } from '../../m1-request/src/index.js';
import { FAILURE_MARKER, GenerationClient } from '../../m2-generation/src/index.js';
import type { GenerationFailureKind } from '../../m2-generation/src/index.js';
import { IllustrationClient, extractSections } from '../../m3-sections/src/index.js';
import type { IllustrationProgress, Section, SectionImageMap } from '../../m3-sections/src/index.js';
import { DocumentRenderer, buildBaseFilename, buildExports, imageAnchorTitles } from '../../m4-renderer/src/index.js';
import type { ExportArtifact } from '../../m4-renderer/src/index.js';
import { AppState, GeneratedDocument, recordGeneration, toStudentInfo } from './app-state.js';

/**
 * Pipeline stages, reported in this order
 */
export type PipelineStage =
  | 'validating'
  | 'prompting'
  | 'generating'
  | 'extracting'
  | 'illustrating'
  | 'done';

export interface PipelineHooks {
  onStage?: (stage: PipelineStage) => void;
  onIllustrationProgress?: (progress: IllustrationProgress) => void;
}

export type PipelineResult =
  | { status: 'invalid'; errors: string[]; correlationId: string }
  | { status: 'failed'; failure: { kind: GenerationFailureKind; text: string }; correlationId: string }
  | {
      status: 'generated';
      document: GeneratedDocument;
      sections: Section[];
      images: SectionImageMap;
      prompt: BuiltPrompt;
      correlationId: string;
    };

export interface PipelineDependencies {
  generation: GenerationClient;
  renderer: DocumentRenderer;
  /** Absent when no image service is configured */
  illustrations?: IllustrationClient;
  imageApiKey?: string;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Validate → prompt → generate → extract → illustrate.
 * Rendering happens on export, from whatever the state last recorded.
 */
export class AssignmentPipeline {
  private generation: GenerationClient;
  private renderer: DocumentRenderer;
  private illustrations?: IllustrationClient;
  private imageApiKey?: string;
  private logger: Logger;
  private now: () => Date;

  constructor(deps: PipelineDependencies) {
    this.generation = deps.generation;
    this.renderer = deps.renderer;
    this.illustrations = deps.illustrations;
    this.imageApiKey = deps.imageApiKey;
    this.logger = deps.logger ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
  }

  async run(request: AssignmentRequest, state: AppState, hooks: PipelineHooks = {}): Promise<PipelineResult> {
    const correlationId = generateCorrelationId('asg');
    const stage = (name: PipelineStage) => {
      this.logger('debug', `Pipeline stage: ${name}`, { correlationId });
      hooks.onStage?.(name);
    };

    try {
      stage('validating');
      const errors = validateRequest(request, { imageApiKey: this.imageApiKey });
      if (errors.length > 0) {
        this.logger('info', 'Request rejected by validation', { correlationId, errors });
        return { status: 'invalid', errors, correlationId };
      }

      stage('prompting');
      const prompt = buildPrompt(toPromptParams(request));

      stage('generating');
      const outcome = await this.generation.generate(prompt.prompt);
      if (!outcome.ok) {
        return { status: 'failed', failure: { kind: outcome.kind, text: outcome.text }, correlationId };
      }

      const document: GeneratedDocument = {
        text: outcome.text,
        elapsedSeconds: outcome.elapsedSeconds,
        generatedAt: this.now()
      };

      stage('extracting');
      const sections = extractSections(document.text);

      let images: SectionImageMap = new Map();
      if (request.includeImages) {
        stage('illustrating');
        images = await this.illustrate(sections, document.text, request, correlationId, hooks);
      }

      recordGeneration(state, request, document, images);
      stage('done');

      this.logger('info', 'Assignment generated', {
        correlationId,
        sections: sections.length,
        illustrated: images.size,
        elapsedSeconds: document.elapsedSeconds
      });

      return { status: 'generated', document, sections, images, prompt, correlationId };
    } catch (error) {
      const message = errorMessage(error);
      this.logger('error', 'Pipeline failed unexpectedly', { correlationId, error: message });
      return {
        status: 'failed',
        failure: { kind: 'unexpected', text: `${FAILURE_MARKER} **Unexpected Error**: ${message}` },
        correlationId
      };
    }
  }

  /**
   * Render the last generated document and package all export formats
   */
  exportLatest(state: AppState): Result<ExportArtifact[], ModuleError[]> {
    const document = state.lastDocument;
    const request = state.lastRequest;

    if (!document || !request) {
      return Err([{
        code: 'E-PIPELINE-NO-DOCUMENT',
        module: 'PIPELINE',
        data: { reason: 'Nothing has been generated yet' },
        correlationId: generateCorrelationId('exp')
      }]);
    }

    const pdf = this.renderer.render({
      studentInfo: toStudentInfo(request),
      text: document.text,
      includeReferences: request.includeReferences,
      images: state.lastImages,
      submissionDate: document.generatedAt
    });

    const baseFilename = buildBaseFilename(request.studentName, request.subject, document.generatedAt);
    return Ok(buildExports(baseFilename, document.text, pdf));
  }

  private async illustrate(
    sections: Section[],
    text: string,
    request: AssignmentRequest,
    correlationId: string,
    hooks: PipelineHooks
  ): Promise<SectionImageMap> {
    if (!this.illustrations) {
      this.logger('warn', 'Images requested but no image service is configured', { correlationId });
      return new Map();
    }

    // Headings the renderer reads as body text would get an image that is never drawn
    const anchors = imageAnchorTitles(text);
    const placeable = sections.filter(section => anchors.has(section.title.toUpperCase()));
    if (placeable.length < sections.length) {
      this.logger('debug', 'Sections without a rendered heading are not illustrated', {
        correlationId,
        skipped: sections.filter(section => !placeable.includes(section)).map(section => section.title)
      });
    }

    return this.illustrations.illustrateSections(
      placeable,
      request.subject.trim(),
      request.imageStyle,
      hooks.onIllustrationProgress
    );
  }
}
