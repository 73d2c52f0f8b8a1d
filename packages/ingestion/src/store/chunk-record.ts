import type { BlockType, Chunk } from '@ledgerlens/model';

import { chunkToText } from '../chunker/chunker';

/**
 * Scalar metadata value accepted by vector stores
 */
export type MetadataValue = string | number | boolean;

/**
 * Chunk flattened for storage
 *
 * @interface ChunkRecord
 */
export interface ChunkRecord {
  /**
   * Storage id; the chunk's content hash
   */
  id: string;

  /**
   * Canonical text that is embedded and returned by queries
   */
  text: string;

  blockType: BlockType;
  metadata: Record<string, MetadataValue>;
}

/**
 * Collection a block type is stored in; page overviews share the text one
 */
export type CollectionName = 'text' | 'tables' | 'figures';

export function collectionFor(blockType: BlockType): CollectionName {
  switch (blockType) {
    case 'table':
      return 'tables';
    case 'figure':
      return 'figures';
    default:
      return 'text';
  }
}

/**
 * Human-readable source reference, e.g. `report.pdf, p.7 – Table 2 (p.7)`.
 */
export function formatCitation(
  sourceFile: string,
  page: number,
  exhibitId: string,
): string {
  const base = `${sourceFile}, p.${page}`;
  return exhibitId ? `${base} – ${exhibitId}` : base;
}

export function toChunkRecord(chunk: Chunk): ChunkRecord {
  const { metadata } = chunk;
  const flat: Record<string, MetadataValue> = {
    ...metadata,
    citation: formatCitation(
      metadata.sourceFile,
      metadata.page,
      metadata.exhibitId,
    ),
  };
  if (chunk.kind === 'figure') {
    flat.figureType = chunk.figureType;
    flat.imagePath = chunk.imagePath;
  }

  return {
    id: metadata.contentHash,
    text: chunkToText(chunk),
    blockType: metadata.blockType,
    metadata: flat,
  };
}
