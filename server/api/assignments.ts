/**
 * Assignment API Endpoints
 * Generation, latest-document lookup and export downloads
 */

import { z } from 'zod';
import {
  ASSIGNMENT_TYPES,
  DIFFICULTY_LEVELS,
  IMAGE_STYLES,
  MAX_QUESTIONS,
  MIN_QUESTIONS,
  WORD_COUNT_PREFERENCES
} from '../../content-engine/m1-request/src/index.js';
import type { AssignmentRequest } from '../../content-engine/m1-request/src/index.js';
import { countWords } from '../../content-engine/m4-renderer/src/index.js';
import type { ExportFormat } from '../../content-engine/m4-renderer/src/index.js';
import type { AppState, AssignmentPipeline, PipelineResult } from '../../content-engine/fsm/src/index.js';
import { errorMessage } from '../../content-engine/shared/types.js';
import { Logger, silentLogger } from '../../content-engine/utils/logger.js';

// Defaults mirror the generation form
export const AssignmentRequestSchema = z.object({
  university: z.string(),
  studentName: z.string(),
  studentId: z.string(),
  program: z.string(),
  subject: z.string(),
  instructor: z.string().optional(),
  semester: z.string().optional(),
  topic: z.string(),
  assignmentType: z.enum(ASSIGNMENT_TYPES).default('Assignment'),
  difficulty: z.enum(DIFFICULTY_LEVELS).default('Intermediate'),
  wordCountPreference: z.enum(WORD_COUNT_PREFERENCES).default('Standard (400-600 words)'),
  questionCount: z.number().int().min(MIN_QUESTIONS).max(MAX_QUESTIONS).default(3),
  includeReferences: z.boolean().default(true),
  includeExamples: z.boolean().default(true),
  includeLearningObjectives: z.boolean().default(false),
  includeRubric: z.boolean().default(false),
  includeImages: z.boolean().default(false),
  imageStyle: z.enum(IMAGE_STYLES).default('realistic'),
  documentContext: z.string().optional()
});

/**
 * The parts of express's request and response the handlers use
 */
export interface ApiRequest {
  body?: unknown;
  params: Record<string, string>;
}

export interface ApiResponse {
  status(code: number): ApiResponse;
  json(body: unknown): unknown;
  send(body: Buffer): unknown;
  setHeader(name: string, value: string): unknown;
}

export type AssignmentRequestBody = z.infer<typeof AssignmentRequestSchema>;

const ExportFormatSchema = z.enum(['pdf', 'md', 'txt']);

export function toAssignmentRequest(body: AssignmentRequestBody): AssignmentRequest {
  return { ...body };
}

export function parseExportFormat(value: unknown): ExportFormat | undefined {
  const parsed = ExportFormatSchema.safeParse(value);
  return parsed.success ? parsed.data : undefined;
}

/**
 * Handlers share one AppState; the latest successful generation wins
 */
export function createAssignmentHandlers(
  pipeline: AssignmentPipeline,
  state: AppState,
  logger: Logger = silentLogger
) {
  const create = async (req: ApiRequest, res: ApiResponse): Promise<void> => {
    const parsed = AssignmentRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        success: false,
        error: 'Invalid request format',
        details: parsed.error.errors
      });
      return;
    }

    let result: PipelineResult;
    try {
      result = await pipeline.run(toAssignmentRequest(parsed.data), state);
    } catch (error) {
      logger('error', 'Assignment request failed', { error: errorMessage(error) });
      res.status(500).json({ success: false, error: 'Internal server error' });
      return;
    }

    switch (result.status) {
      case 'invalid':
        res.status(400).json({
          success: false,
          error: 'Validation failed',
          details: result.errors,
          correlationId: result.correlationId
        });
        return;

      case 'failed':
        logger('warn', 'Generation failed', { correlationId: result.correlationId, kind: result.failure.kind });
        res.status(502).json({
          success: false,
          error: result.failure.text,
          kind: result.failure.kind,
          correlationId: result.correlationId
        });
        return;

      case 'generated':
        res.status(201).json({
          success: true,
          text: result.document.text,
          elapsedSeconds: result.document.elapsedSeconds,
          wordCount: countWords(result.document.text),
          sections: result.sections.map(section => section.title),
          illustrated: [...result.images.keys()],
          correlationId: result.correlationId
        });
        return;
    }
  };

  const latest = (req: ApiRequest, res: ApiResponse): void => {
    const document = state.lastDocument;
    if (!document) {
      res.status(404).json({ success: false, error: 'No assignment has been generated yet' });
      return;
    }

    res.json({
      success: true,
      document: {
        text: document.text,
        elapsedSeconds: document.elapsedSeconds,
        generatedAt: document.generatedAt.toISOString(),
        wordCount: countWords(document.text)
      },
      history: state.history.map(record => ({
        ...record,
        timestamp: record.timestamp.toISOString()
      }))
    });
  };

  const exportLatest = (req: ApiRequest, res: ApiResponse): void => {
    const format = parseExportFormat(req.params.format);
    if (!format) {
      res.status(400).json({ success: false, error: `Unsupported export format: ${req.params.format}` });
      return;
    }

    const exported = pipeline.exportLatest(state);
    if (!exported.isSuccess()) {
      res.status(404).json({ success: false, error: 'No assignment has been generated yet' });
      return;
    }

    const artifact = exported.value.find(candidate => candidate.format === format);
    if (!artifact) {
      res.status(404).json({ success: false, error: `No ${format} export available` });
      return;
    }

    res.setHeader('Content-Type', artifact.mimeType);
    res.setHeader('Content-Disposition', `attachment; filename="${artifact.filename}"`);
    res.status(200).send(artifact.data);
  };

  return { create, latest, exportLatest };
}
