#!/usr/bin/env node
import 'dotenv/config';
import { readFile } from 'fs/promises';
import path from 'path';
import { createNotesPipeline, NotesPipeline, StageResult } from '../content-engine/fsm/src/pipeline.js';
import { formatOutline, parseOutline } from '../content-engine/outline/src/index.js';
import {
  saveSnapshot,
  loadSnapshot,
  saveDocument,
  DocxDocumentSink,
  MarkdownDocumentSink,
  LessonSnapshot
} from '../content-engine/serializer/src/index.js';
import { extractText } from '../content-engine/utils/text-extractor.js';
import { createConsoleLogger, withScope, Logger } from '../content-engine/utils/logger.js';
import { ModuleError, errorMessage } from '../content-engine/utils/result.js';
import { pathValidation, resolveOutputFile } from '../config/paths.js';

type Command = 'plan' | 'notes' | 'ask';
type DocumentFormat = 'docx' | 'markdown';

const USAGE = `
Usage: generate-notes <command> [options]

Commands:
  plan    Generate a roadmap and lesson plan from a syllabus
  notes   Generate lecture notes from a (possibly edited) lesson-plan snapshot
  ask     Answer a question about lecture notes

Options:
  --subject, -s <name>      Subject name (plan)
  --syllabus <file>         Syllabus as text or PDF (plan)
  --roadmap <file>          Use an edited roadmap instead of generating one (plan)
  --difficulty, -d <level>  Audience level, e.g. Beginner, Btech, PhD (default: Intermediate)
  --snapshot <file>         Lesson-plan snapshot (notes) or lecture-notes snapshot (ask)
  --notes <file>            Plain-text notes to question instead of a snapshot (ask)
  --highlight <names>       Comma-separated topic names to cover in depth (notes)
  --reference <file>        Reference material as text or PDF (notes)
  --question, -q <text>     Question to answer (ask)
  --format <format>         docx or markdown (default: docx)
  --detail <1-3>            Detail level for generated content
  --help, -h                Show this help message

Environment:
  OPENAI_API_KEY            Required
  OPENAI_MODEL              Model name (default: gpt-4o-mini)
  OUTPUT_DIR, SNAPSHOTS_DIR, DOCUMENTS_DIR  Output locations
`;

function option(argv: string[], ...names: string[]): string | undefined {
  const index = argv.findIndex(arg => names.includes(arg));
  if (index >= 0 && argv[index + 1] !== undefined) {
    return argv[index + 1];
  }
  return undefined;
}

function required(argv: string[], ...names: string[]): string {
  const value = option(argv, ...names);
  if (value === undefined) {
    throw new Error(`Missing required option ${names[0]}`);
  }
  return value;
}

function parseDifficulty(value: string | undefined): string {
  const difficulty = value?.trim() ?? 'Intermediate';
  if (!difficulty) {
    throw new Error('Difficulty must not be empty');
  }
  return difficulty;
}

function parseFormat(value: string | undefined): DocumentFormat {
  if (value === undefined || value === 'docx') return 'docx';
  if (value === 'markdown' || value === 'md') return 'markdown';
  throw new Error(`Unknown format "${value}", expected docx or markdown`);
}

function parseDetail(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const detail = Number(value);
  if (!Number.isInteger(detail) || detail < 1 || detail > 3) {
    throw new Error(`Detail level must be 1, 2 or 3, got "${value}"`);
  }
  return detail;
}

function isCommand(value: string | undefined): value is Command {
  return value === 'plan' || value === 'notes' || value === 'ask';
}

function describeError(error: ModuleError): string {
  return `[${error.module}] ${error.code}: ${JSON.stringify(error.data)}`;
}

async function readSource(filePath: string, logger?: Logger): Promise<string> {
  const bytes = await readFile(filePath);
  return extractText(bytes, undefined, logger);
}

function baseName(subject: string, kind: string): string {
  return pathValidation.sanitizeFilename(`${subject}-${kind}`.replace(/\s+/g, '_'));
}

function reportFailures(result: StageResult, logger: Logger): void {
  for (const failure of result.failures) {
    logger('warn', `Topic ${failure.nodeId ?? '?'} left empty`, { code: failure.code, cause: failure.cause });
  }
  if (result.skippedIds.length > 0) {
    logger('warn', 'Duplicate topics skipped', { ids: result.skippedIds });
  }
}

async function writeOutputs(
  pipeline: NotesPipeline,
  snapshot: LessonSnapshot,
  format: DocumentFormat,
  logger: Logger
): Promise<void> {
  const name = baseName(snapshot.subject, snapshot.stage);

  const saved = await saveSnapshot(snapshot, resolveOutputFile('SNAPSHOTS_DIR', `${name}.json`), logger);
  if (!saved.success) throw new Error(describeError(saved.errors));
  console.log(`Snapshot written to ${saved.value.filePath}`);

  const rendered = format === 'markdown'
    ? await pipeline.renderDocument(snapshot, new MarkdownDocumentSink())
    : await pipeline.renderDocument(snapshot, new DocxDocumentSink({ title: snapshot.subject }));
  if (!rendered.success) throw new Error(describeError(rendered.errors));

  const extension = format === 'markdown' ? 'md' : 'docx';
  const document = await saveDocument(rendered.value, resolveOutputFile('DOCUMENTS_DIR', `${name}.${extension}`), logger);
  if (!document.success) throw new Error(describeError(document.errors));
  console.log(`Document written to ${document.value.filePath}`);
}

async function plan(argv: string[], pipeline: NotesPipeline, logger: Logger): Promise<void> {
  const subject = required(argv, '--subject', '-s');
  const difficulty = parseDifficulty(option(argv, '--difficulty', '-d'));
  const format = parseFormat(option(argv, '--format'));
  const detailLevel = parseDetail(option(argv, '--detail'));
  const roadmapFile = option(argv, '--roadmap');

  let roadmapText: string;
  if (roadmapFile) {
    roadmapText = await readFile(roadmapFile, 'utf8');
  } else {
    const syllabusText = await readSource(required(argv, '--syllabus'), logger);
    const roadmap = await pipeline.generateRoadmap({ subject, syllabusText, difficulty });
    if (!roadmap.success) throw new Error(describeError(roadmap.errors));
    roadmapText = roadmap.value.roadmapText;
  }

  const outline = parseOutline(roadmapText, withScope(logger, 'outline'));
  const roadmapPath = resolveOutputFile('OUTPUT_DIR', `${baseName(subject, 'roadmap')}.txt`);
  const savedRoadmap = await saveDocument(`${formatOutline(outline.topics, outline.sequence)}\n`, roadmapPath, logger);
  if (!savedRoadmap.success) throw new Error(describeError(savedRoadmap.errors));
  console.log(`Roadmap written to ${savedRoadmap.value.filePath} (${outline.topics.length} main topics)`);

  const result = await pipeline.generateLessonPlan(
    { subject, difficulty, topics: outline.topics, sequence: outline.sequence },
    {
      detailLevel,
      onProgress: event => logger('info', `Lesson plan ${Math.round(event.progress * 100)}%`, { nodeId: event.nodeId })
    }
  );
  if (!result.success) throw new Error(describeError(result.errors));

  reportFailures(result.value, logger);
  await writeOutputs(pipeline, result.value.snapshot, format, logger);
}

async function notes(argv: string[], pipeline: NotesPipeline, logger: Logger): Promise<void> {
  const format = parseFormat(option(argv, '--format'));
  const detailLevel = parseDetail(option(argv, '--detail'));
  const highlight = option(argv, '--highlight');
  const referenceFile = option(argv, '--reference');

  const lessonPlan = await loadSnapshot(path.resolve(required(argv, '--snapshot')), logger);
  if (!lessonPlan.success) throw new Error(describeError(lessonPlan.errors));

  const result = await pipeline.generateLectureNotes(lessonPlan.value, {
    detailLevel,
    highlightedTopics: highlight ? highlight.split(',').map(id => id.trim()).filter(Boolean) : [],
    referenceMaterial: referenceFile ? await readSource(referenceFile, logger) : undefined,
    onProgress: event => logger('info', `Lecture notes ${Math.round(event.progress * 100)}%`, { nodeId: event.nodeId })
  });
  if (!result.success) throw new Error(describeError(result.errors));

  reportFailures(result.value, logger);
  await writeOutputs(pipeline, result.value.snapshot, format, logger);
}

async function ask(argv: string[], pipeline: NotesPipeline, logger: Logger): Promise<void> {
  const question = required(argv, '--question', '-q');
  const snapshotFile = option(argv, '--snapshot');

  let source: string | LessonSnapshot;
  if (snapshotFile) {
    const loaded = await loadSnapshot(path.resolve(snapshotFile), logger);
    if (!loaded.success) throw new Error(describeError(loaded.errors));
    source = loaded.value;
  } else {
    source = await readSource(required(argv, '--notes'), logger);
  }

  const answer = await pipeline.askQuestion(source, question);
  if (!answer.success) throw new Error(describeError(answer.errors));
  console.log(answer.value);
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  const command = argv[0];

  const wantsHelp = argv.length === 0 || argv.includes('--help') || argv.includes('-h');

  if (!isCommand(command) || wantsHelp) {
    console.log(USAGE);
    process.exit(wantsHelp ? 0 : 1);
  }

  const logger = createConsoleLogger(undefined, 'notes');
  const pipeline = createNotesPipeline({}, logger);

  if (command === 'plan') {
    await plan(argv, pipeline, logger);
  } else if (command === 'notes') {
    await notes(argv, pipeline, logger);
  } else {
    await ask(argv, pipeline, logger);
  }
}

if (require.main === module) {
  main().catch((err) => {
    console.error(`generate-notes failed: ${errorMessage(err)}`);
    process.exit(1);
  });
}
