#!/usr/bin/env node
import 'dotenv/config';
import { promises as fs } from 'fs';
import path from 'path';
import { SETTINGS, resolvePath, validateConfiguration } from '../config/settings.js';
import { createAppState } from '../content-engine/fsm/src/app-state.js';
import { createPipelineServices } from '../content-engine/fsm/src/factory.js';
import { formatSchemaErrors, parseAssignmentRequestDocument } from '../content-engine/m1-request/src/request-schema.js';
import { countWords } from '../content-engine/m4-renderer/src/exports.js';
import { createConsoleLogger } from '../content-engine/utils/logger.js';

/**
 * CLI: generate one assignment from a request file and write PDF, Markdown and text exports.
 *
 *   generate-assignment --input request.json [--context notes.pdf [--summarize]] [--out output] [--check]
 */

function readOption(argv: string[], ...names: string[]): string | undefined {
  const index = argv.findIndex(arg => names.includes(arg));
  return index >= 0 ? argv[index + 1] : undefined;
}

function printUsage(): void {
  console.log(`
Usage: generate-assignment --input <request.json> [options]

Options:
  --input, -i <file>     Assignment request (assignment-request.v1 JSON)
  --context, -c <file>   Reference material to ground the assignment (.pdf, .docx, .txt, .md, .png, .jpg)
  --summarize            Condense the reference material with the model before generating
  --out, -o <dir>        Output directory (default: ${SETTINGS.OUTPUT_DIR})
  --check                Test the generation API connection and exit
  --help, -h             Show this help
`);
}

async function main(): Promise<number> {
  const argv = process.argv.slice(2);
  const logger = createConsoleLogger(SETTINGS.LOG_LEVEL, 'cli');

  const config = validateConfiguration();
  if (!config.valid) {
    config.errors.forEach(error => console.warn(`⚠️  ${error}`));
  }

  if (argv.includes('--check')) {
    const { generation } = createPipelineServices(SETTINGS, logger);
    const check = await generation.testConnection();
    console.log(check.message);
    return check.ok ? 0 : 1;
  }

  const inputPath = readOption(argv, '--input', '-i');
  if (!inputPath) {
    printUsage();
    return 1;
  }

  const raw: unknown = JSON.parse(await fs.readFile(inputPath, 'utf-8'));
  const parsed = parseAssignmentRequestDocument(raw);
  if (!parsed.isSuccess()) {
    console.error(`❌ ${inputPath} is not a valid assignment request:`);
    formatSchemaErrors(parsed.errors ?? []).forEach(error => console.error(`   • ${error}`));
    return 1;
  }

  const { submissionDate, ...fields } = parsed.value;
  const pinnedDate = submissionDate ? new Date(submissionDate) : undefined;
  const { pipeline, documents, summarizer } = createPipelineServices(SETTINGS, logger, pinnedDate ? () => pinnedDate : undefined);
  const state = createAppState();

  let request = fields;
  const contextPath = readOption(argv, '--context', '-c');
  if (contextPath) {
    const extracted = await documents.extract(path.basename(contextPath), await fs.readFile(contextPath));
    if (!extracted.isSuccess()) {
      extracted.errors?.forEach(error => console.error(`❌ ${String(error.data.message)}`));
      return 1;
    }
    console.log(`📄 ${extracted.value.message}`);

    let documentContext = extracted.value.text;
    if (argv.includes('--summarize')) {
      const summary = await summarizer.summarize(documentContext);
      if (!summary.isSuccess()) {
        summary.errors?.forEach(error => console.error(`❌ ${String(error.data.message)}`));
        return 1;
      }
      documentContext = summary.value;
    }
    request = { ...fields, documentContext };
  }

  console.log(`📝 Generating ${request.assignmentType.toLowerCase()}: "${request.topic}"`);

  const result = await pipeline.run(request, state, {
    onStage: stage => console.log(`   → ${stage}`),
    onIllustrationProgress: progress => console.log(`     🎨 ${progress.index + 1}/${progress.total} ${progress.title}`)
  });

  if (result.status === 'invalid') {
    console.error('❌ Request rejected:');
    result.errors.forEach(error => console.error(`   • ${error}`));
    return 1;
  }

  if (result.status === 'failed') {
    console.error(result.failure.text);
    return 1;
  }

  const exported = pipeline.exportLatest(state);
  if (!exported.isSuccess()) {
    console.error('❌ Export failed:', exported.errors);
    return 1;
  }

  const outDir = resolvePath(readOption(argv, '--out', '-o') ?? SETTINGS.OUTPUT_DIR);
  await fs.mkdir(outDir, { recursive: true });

  for (const artifact of exported.value) {
    const target = path.join(outDir, artifact.filename);
    await fs.writeFile(target, artifact.data);
    console.log(`   • ${target}`);
  }

  console.log(`✅ Done in ${result.document.elapsedSeconds.toFixed(1)}s, ${countWords(result.document.text)} words, ${result.sections.length} sections`);
  return 0;
}

if (process.argv.includes('--help') || process.argv.includes('-h')) {
  printUsage();
  process.exit(0);
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error('💥 Unexpected failure:', err instanceof Error ? err.message : err);
    process.exit(1);
  });
