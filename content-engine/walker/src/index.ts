// Tree Walker module exports

export { TreeWalker, DEFAULT_TREE_WALKER_CONFIG, clampDetailLevel } from './tree-walker.js';
export type { TreeWalkerConfig } from './tree-walker.js';
export type {
  WalkStage,
  StageRequest,
  WalkOptions,
  WalkReport,
  ProgressEvent,
  ProgressObserver,
  TextGateway
} from './types.js';
