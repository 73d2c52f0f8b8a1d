/**
 * @ledgerlens/ingestion
 *
 * Turns PDF financial reports into retrievable text, table and figure
 * chunks.
 *
 * ## Key Features
 *
 * - Heuristic layout segmentation with optional detector regions
 * - Ruled-line table detection with an OCR fallback
 * - Figure selection from layout, embedded images and vector drawings
 * - Overlapping text windows, table and figure chunks, page summaries
 * - Quality gate and idempotent, retried store upserts
 * - Known-document tracking and per-document state machine
 *
 * @packageDocumentation
 */

export {
  IngestionPipeline,
  createEmptyStats,
  mergeStats,
} from './ingestion-pipeline';
export type {
  DocumentStateChange,
  IngestFileOptions,
  IngestFolderOptions,
  IngestionPipelineOptions,
} from './ingestion-pipeline';
export {
  ENV_PREFIX,
  IngestionConfigSchema,
  checkIngestionConfig,
  loadIngestionConfig,
  resolveIngestionConfig,
  toEnvName,
} from './config';
export type { IngestionConfig, IngestionConfigInput } from './config';
export {
  BaseLLMComponent,
  DocumentStateMachine,
  VisionLLMComponent,
} from './core';
export type { BaseLLMComponentOptions, StateChangeListener } from './core';
export {
  ConfigError,
  DocumentNotFoundError,
  IngestionError,
  InvalidStateTransitionError,
  StoreError,
  createAbortError,
  isAbortError,
} from './errors/ingestion-error';
export type {
  ChartInterpreter,
  Embedder,
  FigureClassifier,
  LayoutRegionDetector,
  OcrService,
} from './collaborators/types';
export {
  CaptionChartInterpreter,
  composeCaptionDescription,
} from './collaborators/caption-chart-interpreter';
export {
  KeywordFigureClassifier,
} from './collaborators/keyword-figure-classifier';
export { normalizeOcrBoxes, ocrToText } from './collaborators/ocr-text';
export {
  VisionChartInterpreter,
} from './collaborators/vision-chart-interpreter';
export {
  LayoutSegmenter,
  classifySpan,
  groupParagraphs,
  medianFontSize,
  sectionAfterPage,
  sectionForOffset,
  sectionForRegion,
} from './segmenter';
export type { HeadingMarker, LayoutSegmenterOptions } from './segmenter';
export {
  FigureEnricher,
  FigureExtractor,
  TableExtractor,
  clusterOcrRows,
  detectRuledTables,
  nearestCaption,
  selectFigureRegions,
} from './extractors';
export type {
  EnrichedFigure,
  FigureEnricherOptions,
  FigureExtractorOptions,
  FigureRegionOptions,
  RuledTable,
  RuledTableDetectorOptions,
  TableExtractorOptions,
} from './extractors';
export {
  Chunker,
  buildProse,
  chunkToText,
  composeFigureText,
  slideWindows,
} from './chunker';
export type {
  ChunkerOptions,
  PageChunkInput,
  Prose,
  TextWindow,
} from './chunker';
export { QualityGate } from './validators';
export type {
  QualityGateOptions,
  QualityGateResult,
  QualityVerdict,
  RejectedChunk,
} from './validators';
export {
  AiEmbedder,
  InMemoryChunkStore,
  collectionFor,
  cosineDistance,
  formatCitation,
  jaccardDistance,
  toChunkRecord,
  tokenize,
} from './store';
export type {
  AiEmbedderOptions,
  ChunkQueryFilter,
  ChunkQueryResult,
  ChunkRecord,
  ChunkStore,
  CollectionName,
  EmbeddingModelInput,
  InMemoryChunkStoreOptions,
  MetadataValue,
} from './store';
export { KnownDocumentRegistry } from './registry';
export type { ReserveOptions, ReserveOutcome } from './registry';
export { TableFormatter } from './utils/table-formatter';
export { softCall } from './utils/soft-call';
export type { SoftCallOptions } from './utils/soft-call';
