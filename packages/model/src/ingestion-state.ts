/**
 * Lifecycle of one document inside an ingestion run
 *
 * Per page the pipeline cycles PARSED → SEGMENTED → EXTRACTED → CHUNKED,
 * then the whole chunk set is FILTERED once and STORED once.
 */
export const DocumentState = {
  NEW: 'NEW',
  PARSED: 'PARSED',
  SEGMENTED: 'SEGMENTED',
  EXTRACTED: 'EXTRACTED',
  CHUNKED: 'CHUNKED',
  FILTERED: 'FILTERED',
  STORED: 'STORED',
  SKIPPED: 'SKIPPED',
  FAILED: 'FAILED',
  CANCELLED: 'CANCELLED',
} as const;

export type DocumentState = (typeof DocumentState)[keyof typeof DocumentState];

/**
 * Counters for one ingestion invocation
 *
 * @interface IngestionStats
 */
export interface IngestionStats {
  filesProcessed: number;
  filesSkipped: number;

  /**
   * Documents that were missing or failed before their upsert completed
   */
  filesFailed: number;

  pagesProcessed: number;
  textChunks: number;
  tableChunks: number;
  figureChunks: number;
  pageSummaryChunks: number;
  chunksRejected: number;

  /**
   * Unique records written to the store
   */
  totalStored: number;

  elapsedSeconds: number;
}
