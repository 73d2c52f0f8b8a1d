import type { BlockType } from '@ledgerlens/model';

import type {
  ChunkRecord,
  CollectionName,
  MetadataValue,
} from './chunk-record';

export interface ChunkQueryFilter {
  /**
   * Only search the collections holding these block types
   */
  blockTypes?: readonly BlockType[];

  /**
   * Only return chunks of this document
   */
  docId?: string;
}

export interface ChunkQueryResult {
  id: string;
  text: string;
  metadata: Record<string, MetadataValue>;

  /**
   * Lower is closer; results are sorted ascending
   */
  distance: number;

  collection: CollectionName;
}

/**
 * Persistence for chunk records
 *
 * Upserts replace records with the same id, so re-ingesting unchanged
 * content is idempotent.
 */
export interface ChunkStore {
  /**
   * Write records in one batch. Duplicate ids inside the batch collapse to
   * the last occurrence.
   *
   * @returns Number of unique ids written
   */
  upsert(records: readonly ChunkRecord[]): Promise<number>;

  /**
   * Whether any stored chunk belongs to the document
   */
  existsByDocId(docId: string): Promise<boolean>;

  query(
    text: string,
    k: number,
    filter?: ChunkQueryFilter,
  ): Promise<ChunkQueryResult[]>;

  count(): Promise<number>;
}
