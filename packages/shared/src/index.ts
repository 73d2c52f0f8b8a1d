export { BatchProcessor } from './utils/batch-processor';
export {
  ConcurrentPool,
  type ConcurrentPoolOptions,
} from './utils/concurrent-pool';
export { sha256Hex } from './utils/hash';
export {
  LLMCaller,
  type LLMCallResult,
  type LLMCallUsage,
  type LLMVisionCallConfig,
} from './utils/llm-caller';
export { retryWithBackoff, type RetryOptions } from './utils/retry';
export {
  SpawnTimeoutError,
  spawnAsync,
  type SpawnAsyncOptions,
  type SpawnResult,
} from './utils/spawn-utils';
export {
  bboxArea,
  bboxCentroid,
  bboxFromPoints,
  bboxHeight,
  bboxUnion,
  bboxWidth,
  bboxesTouch,
  centreInside,
  intersectionOverUnion,
} from './utils/geometry';
