export type { BBox } from './geometry';
export type {
  DrawingCluster,
  ImageRegion,
  PageRecord,
  RulingSegment,
  TextSpan,
} from './page-record';
export type { LayoutBlock, LayoutRole } from './layout-block';
export type {
  ExtractedFigure,
  ExtractedTable,
  OcrBox,
  TableExtractionMethod,
} from './extracted-region';
export { FigureType, type ChartSeries } from './figure-type';
export type {
  BlockType,
  Chunk,
  ChunkKind,
  ChunkMetadata,
  FigureChunk,
  TableChunk,
  TextChunk,
} from './chunk';
export { DocumentState, type IngestionStats } from './ingestion-state';
