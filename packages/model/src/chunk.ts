import type { ChartSeries, FigureType } from './figure-type';

export type BlockType = 'text' | 'table' | 'figure' | 'page_summary';

/**
 * Provenance shared by every chunk variant
 *
 * @interface ChunkMetadata
 */
export interface ChunkMetadata {
  /**
   * SHA-256 of the source file bytes
   */
  docId: string;

  /**
   * Source file name without directories
   */
  sourceFile: string;

  page: number;
  blockType: BlockType;

  /**
   * Most recent heading before the chunk, empty before the first heading
   */
  section: string;

  /**
   * Exhibit label such as "Table 2 (p.7)", empty for prose
   */
  exhibitId: string;

  /**
   * SHA-256 of the canonical text; doubles as the storage id
   */
  contentHash: string;

  /**
   * ISO-8601 creation time
   */
  createdAt: string;
}

export interface TextChunk {
  kind: 'text';
  text: string;
  metadata: ChunkMetadata;
}

export interface TableChunk {
  kind: 'table';
  markdown: string;
  csv: string;

  /**
   * Optional prose summary, empty when none was produced
   */
  summary: string;

  metadata: ChunkMetadata;
}

export interface FigureChunk {
  kind: 'figure';

  /**
   * Textual representation used for retrieval
   */
  text: string;

  caption: string;
  ocrText: string;
  chartDescription: string;
  figureType: FigureType;
  series: ChartSeries | null;
  imagePath: string;
  metadata: ChunkMetadata;
}

export type Chunk = TextChunk | TableChunk | FigureChunk;

export type ChunkKind = Chunk['kind'];
