// Outline module exports

export {
  OutlineParser,
  parseOutline,
  formatTopicId,
  parseTopicId,
  topicDepth,
  parentTopicId,
  countTopics,
  flattenTopics,
  findTopic,
  indexTopicsById,
  formatOutline
} from './outline-parser.js';
export {
  SEQUENCE_TYPES,
  MAX_OUTLINE_LEVEL
} from './types.js';
export type {
  TopicNode,
  SequenceType,
  ParseWarning,
  ParseWarningCode,
  OutlineParseResult
} from './types.js';
