import Ajv from 'ajv';
import addFormats from 'ajv-formats';
import snapshotSchema from '../schemas/lesson-snapshot.v1.schema.json';
import { TopicNode } from '../../outline/src/types.js';
import { parentTopicId } from '../../outline/src/outline-parser.js';
import { LessonSnapshot, SnapshotMeta, SnapshotTopic, SNAPSHOT_VERSION } from './types.js';
import { Result, Ok, Err, ModuleError, errorMessage, generateCorrelationId } from '../../utils/result.js';

const ajv = new Ajv({ strict: true, allErrors: true });
addFormats(ajv);
const validateSnapshotSchema = ajv.compile<LessonSnapshot>(snapshotSchema);

function serializationError(code: string, data: Record<string, unknown>): ModuleError {
  return { code, module: 'SERIALIZER', data, correlationId: generateCorrelationId('ser') };
}

function toSnapshotTopic(node: TopicNode): SnapshotTopic {
  return {
    id: node.id,
    title: node.title,
    description: node.description,
    ...(node.content !== undefined ? { content: node.content } : {}),
    subtopics: node.children.map(toSnapshotTopic)
  };
}

function fromSnapshotTopic(topic: SnapshotTopic): TopicNode {
  return {
    id: topic.id,
    title: topic.title,
    description: topic.description,
    ...(topic.content !== undefined ? { content: topic.content } : {}),
    children: topic.subtopics.map(fromSnapshotTopic)
  };
}

export function toSnapshot(topics: readonly TopicNode[], meta: SnapshotMeta): LessonSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    stage: meta.stage,
    subject: meta.subject,
    difficulty: meta.difficulty,
    generatedAt: meta.generatedAt ?? new Date().toISOString(),
    ...(meta.sequence ? { sequence: meta.sequence } : {}),
    topics: topics.map(toSnapshotTopic)
  };
}

export function snapshotTopics(snapshot: LessonSnapshot): TopicNode[] {
  return snapshot.topics.map(fromSnapshotTopic);
}

/**
 * Child ids must extend their parent's id by one component
 */
export function checkTopicPaths(topics: readonly SnapshotTopic[], parentId: string | null = null): string[] {
  const problems: string[] = [];
  for (const topic of topics) {
    if (parentTopicId(topic.id) !== parentId) {
      problems.push(
        parentId === null
          ? `${topic.id} is nested at the top level`
          : `${topic.id} is not a direct child id of ${parentId}`
      );
    }
    problems.push(...checkTopicPaths(topic.subtopics, topic.id));
  }
  return problems;
}

export function validateSnapshot(value: unknown): Result<LessonSnapshot, ModuleError> {
  if (!validateSnapshotSchema(value)) {
    const errors = (validateSnapshotSchema.errors ?? []).map(
      error => `${error.instancePath || '(root)'} ${error.message ?? 'is invalid'}`
    );
    return Err(serializationError('E-SERIALIZE-SCHEMA', { errors }));
  }

  const pathProblems = checkTopicPaths(value.topics);
  if (pathProblems.length > 0) {
    return Err(serializationError('E-SERIALIZE-INVALID-TREE', { errors: pathProblems }));
  }

  return Ok(value);
}

export function serializeSnapshot(snapshot: LessonSnapshot): string {
  return JSON.stringify(snapshot, null, 2);
}

export function deserializeSnapshot(json: string): Result<LessonSnapshot, ModuleError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    return Err(serializationError('E-SERIALIZE-INVALID-JSON', { error: errorMessage(error) }));
  }
  return validateSnapshot(parsed);
}
