export {
  collectionFor,
  formatCitation,
  toChunkRecord,
} from './chunk-record';
export type {
  ChunkRecord,
  CollectionName,
  MetadataValue,
} from './chunk-record';
export type {
  ChunkQueryFilter,
  ChunkQueryResult,
  ChunkStore,
} from './chunk-store';
export {
  InMemoryChunkStore,
  cosineDistance,
  jaccardDistance,
  tokenize,
} from './in-memory-chunk-store';
export type { InMemoryChunkStoreOptions } from './in-memory-chunk-store';
export { AiEmbedder } from './ai-embedder';
export type { AiEmbedderOptions, EmbeddingModelInput } from './ai-embedder';
