import { describe, it, expect, beforeEach } from '@jest/globals';
import { AssignmentPipeline } from '../../fsm/src/pipeline.js';
import type { PipelineStage } from '../../fsm/src/pipeline.js';
import { createAppState } from '../../fsm/src/app-state.js';
import type { AppState } from '../../fsm/src/app-state.js';
import { GenerationClient } from '../../m2-generation/src/generation-client.js';
import type { TextGenerator } from '../../m2-generation/src/types.js';
import { IllustrationClient } from '../../m3-sections/src/illustration-client.js';
import type { FetchLike } from '../../m3-sections/src/types.js';
import { DocumentRenderer } from '../../m4-renderer/src/document-renderer.js';
import { buildStory } from '../../m4-renderer/src/story-builder.js';
import type { AssignmentRequest } from '../../m1-request/src/types.js';

const PNG_BYTES = Buffer.from(
  'iVBORw0KGgoAAAANSUhEUgAAAAIAAAACCAIAAAD91JpzAAAAEElEQVR4nGMwTpsJRAwQCgAf7gTJ/qZDUgAAAABJRU5ErkJggg==',
  'base64'
);

const GENERATED_TEXT = '## INTRODUCTION\nText.\n## CONCLUSION\nDone.';

class StubGenerator implements TextGenerator {
  prompts: string[] = [];

  constructor(private readonly reply: () => Promise<string>) {}

  generateText(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.reply();
  }
}

function makeRequest(overrides: Partial<AssignmentRequest> = {}): AssignmentRequest {
  return {
    university: 'University of Lahore',
    studentName: 'Ayesha Khan',
    studentId: 'BSCS-042',
    program: 'BS Computer Science',
    subject: 'Data Structures',
    topic: 'Hash tables against trees',
    assignmentType: 'Assignment',
    difficulty: 'Intermediate',
    wordCountPreference: 'Standard (400-600 words)',
    questionCount: 3,
    includeReferences: true,
    includeExamples: true,
    includeLearningObjectives: false,
    includeRubric: false,
    includeImages: false,
    imageStyle: 'illustration',
    ...overrides
  };
}

const fixedNow = () => new Date(Date.UTC(2026, 9, 18, 9, 30));

describe('Assignment Pipeline Integration', () => {
  let state: AppState;

  beforeEach(() => {
    state = createAppState();
  });

  it('should take a valid request through generation to a two-heading story', async () => {
    const generator = new StubGenerator(async () => GENERATED_TEXT);
    const pipeline = new AssignmentPipeline({
      generation: new GenerationClient(generator),
      renderer: new DocumentRenderer(),
      now: fixedNow
    });
    const stages: PipelineStage[] = [];

    const request = makeRequest();
    expect(request.topic).toHaveLength(25);

    const result = await pipeline.run(request, state, { onStage: stage => stages.push(stage) });

    expect(result.status).toBe('generated');
    expect(stages).toEqual(['validating', 'prompting', 'generating', 'extracting', 'done']);

    const prompt = generator.prompts[0];
    expect(prompt.split('## INTRODUCTION')).toHaveLength(2);
    expect(prompt).not.toContain('## LEARNING OBJECTIVES');

    if (result.status === 'generated') {
      expect(result.sections).toEqual([
        { title: 'INTRODUCTION', body: 'Text. ' },
        { title: 'CONCLUSION', body: 'Done. ' }
      ]);

      const story = buildStory({
        studentInfo: {
          university: request.university,
          name: request.studentName,
          id: request.studentId,
          program: request.program,
          subject: request.subject
        },
        text: result.document.text,
        includeReferences: request.includeReferences,
        images: result.images,
        submissionDate: result.document.generatedAt
      });
      const pageBreak = story.findIndex(block => block.type === 'pageBreak');
      const headingsAfterCover = story
        .slice(pageBreak + 1)
        .filter(block => block.type === 'paragraph' && block.style === 'mainHeading');
      const headingsOnCover = story
        .slice(0, pageBreak)
        .filter(block => block.type === 'paragraph' && block.style === 'mainHeading');

      expect(pageBreak).toBeGreaterThan(0);
      expect(headingsOnCover).toHaveLength(0);
      expect(headingsAfterCover).toHaveLength(2);
    }
  });

  it('should record the document and history on success', async () => {
    const pipeline = new AssignmentPipeline({
      generation: new GenerationClient(new StubGenerator(async () => GENERATED_TEXT)),
      renderer: new DocumentRenderer(),
      now: fixedNow
    });

    await pipeline.run(makeRequest(), state);

    expect(state.lastDocument?.text).toBe(GENERATED_TEXT);
    expect(state.history).toHaveLength(1);
    expect(state.history[0].wordCount).toBe(6);
    expect(state.history[0].topic).toBe('Hash tables against trees');
  });

  it('should export pdf, markdown and text for the latest document', async () => {
    const pipeline = new AssignmentPipeline({
      generation: new GenerationClient(new StubGenerator(async () => GENERATED_TEXT)),
      renderer: new DocumentRenderer(),
      now: fixedNow
    });

    expect(pipeline.exportLatest(state).isError()).toBe(true);

    await pipeline.run(makeRequest(), state);
    const exported = pipeline.exportLatest(state);

    expect(exported.isSuccess()).toBe(true);
    if (exported.isSuccess()) {
      expect(exported.value.map(artifact => artifact.filename)).toEqual([
        'Ayesha_Khan_Data_Structures_20261018.pdf',
        'Ayesha_Khan_Data_Structures_20261018.md',
        'Ayesha_Khan_Data_Structures_20261018.txt'
      ]);
      expect(exported.value[0].data.subarray(0, 5).toString('latin1')).toBe('%PDF-');
      expect(exported.value[2].data.toString('utf8')).toBe('INTRODUCTION\nText.\nCONCLUSION\nDone.');
    }
  });

  it('should return validation errors without calling the generator', async () => {
    const generator = new StubGenerator(async () => GENERATED_TEXT);
    const pipeline = new AssignmentPipeline({
      generation: new GenerationClient(generator),
      renderer: new DocumentRenderer()
    });

    const result = await pipeline.run(makeRequest({ topic: 'Too short' }), state);

    expect(result.status).toBe('invalid');
    if (result.status === 'invalid') {
      expect(result.errors).toEqual(['Assignment topic must be at least 20 characters.']);
    }
    expect(generator.prompts).toHaveLength(0);
    expect(state.lastDocument).toBeUndefined();
  });

  it('should surface generation failures and leave the state untouched', async () => {
    const pipeline = new AssignmentPipeline({
      generation: new GenerationClient(new StubGenerator(async () => {
        throw new Error('Request timeout after 120000ms');
      })),
      renderer: new DocumentRenderer()
    });

    const result = await pipeline.run(makeRequest(), state);

    expect(result.status).toBe('failed');
    if (result.status === 'failed') {
      expect(result.failure.kind).toBe('timeout');
      expect(result.failure.text.startsWith('❌ **Timeout Error**')).toBe(true);
    }
    expect(state.history).toHaveLength(0);
  });

  it('should illustrate sections when images are requested', async () => {
    const calls: string[] = [];
    const fetchImpl: FetchLike = async (url) => {
      calls.push(url);
      return {
        ok: true,
        status: 200,
        arrayBuffer: async () => {
          const buffer = new ArrayBuffer(PNG_BYTES.length);
          new Uint8Array(buffer).set(PNG_BYTES);
          return buffer;
        }
      };
    };
    const pipeline = new AssignmentPipeline({
      generation: new GenerationClient(new StubGenerator(async () => GENERATED_TEXT)),
      renderer: new DocumentRenderer(),
      illustrations: new IllustrationClient({ apiUrl: 'https://images.test/generate', apiKey: 'test-secret' }, fetchImpl),
      imageApiKey: 'test-secret',
      now: fixedNow
    });
    const stages: PipelineStage[] = [];

    const result = await pipeline.run(makeRequest({ includeImages: true }), state, { onStage: stage => stages.push(stage) });

    expect(stages).toContain('illustrating');
    expect(calls).toHaveLength(2);
    if (result.status === 'generated') {
      expect([...result.images.keys()]).toEqual(['INTRODUCTION', 'CONCLUSION']);
    }
    expect(state.lastImages.size).toBe(2);
  });

  it('should only illustrate sections whose heading the document draws', async () => {
    const prompts: string[] = [];
    const fetchImpl: FetchLike = async (_url, init) => {
      prompts.push(init.body);
      return {
        ok: true,
        status: 200,
        arrayBuffer: async () => {
          const buffer = new ArrayBuffer(PNG_BYTES.length);
          new Uint8Array(buffer).set(PNG_BYTES);
          return buffer;
        }
      };
    };
    const pipeline = new AssignmentPipeline({
      generation: new GenerationClient(new StubGenerator(async () => '##Intro\nbody\n## CONCLUSION\nDone.')),
      renderer: new DocumentRenderer(),
      illustrations: new IllustrationClient({ apiUrl: 'https://images.test/generate', apiKey: 'test-secret' }, fetchImpl),
      imageApiKey: 'test-secret',
      now: fixedNow
    });

    const result = await pipeline.run(makeRequest({ includeImages: true }), state);

    expect(prompts).toHaveLength(1);
    expect(prompts[0]).toContain('Section: CONCLUSION.');
    if (result.status === 'generated') {
      expect(result.sections.map(section => section.title)).toEqual(['Intro', 'CONCLUSION']);
      expect([...result.images.keys()]).toEqual(['CONCLUSION']);
    }
  });

  it('should reject image requests without an image credential', async () => {
    const pipeline = new AssignmentPipeline({
      generation: new GenerationClient(new StubGenerator(async () => GENERATED_TEXT)),
      renderer: new DocumentRenderer()
    });

    const result = await pipeline.run(makeRequest({ includeImages: true }), state);

    expect(result).toMatchObject({ status: 'invalid', errors: ['Image generation requires an image API key.'] });
  });
});
