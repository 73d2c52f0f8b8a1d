import type { PageRecord } from '@ledgerlens/model';

export interface ReadPagesOptions {
  /**
   * Stop after this many pages; 0 or absent reads every page
   */
  maxPages?: number;

  /**
   * Checked between pages; an aborted signal ends iteration with an AbortError
   */
  signal?: AbortSignal;
}

/**
 * Produces page records from a document file, one page at a time
 */
export interface PageSource {
  readPages(
    filePath: string,
    options?: ReadPagesOptions,
  ): AsyncIterable<PageRecord>;
}
