import type { ChunkStore } from '../store/chunk-store';

export type ReserveOutcome = 'reserved' | 'known' | 'in-progress';

export interface ReserveOptions {
  /**
   * Reserve even when the document is already known
   */
  force?: boolean;
}

/**
 * KnownDocumentRegistry
 *
 * Tracks which documents are ingested and which are being ingested.
 * `reserve` claims a document before any await, so two workers never both
 * ingest the same content. A document only becomes known on `commit`,
 * after its chunks are stored.
 *
 * The in-memory set is a fast path; with a store, a document the set does
 * not know is looked up with `existsByDocId`.
 */
export class KnownDocumentRegistry {
  private readonly known = new Set<string>();
  private readonly inFlight = new Set<string>();

  constructor(private readonly store?: Pick<ChunkStore, 'existsByDocId'>) {}

  async reserve(
    docId: string,
    options: ReserveOptions = {},
  ): Promise<ReserveOutcome> {
    if (this.inFlight.has(docId)) {
      return 'in-progress';
    }
    this.inFlight.add(docId);
    if (options.force) {
      return 'reserved';
    }

    try {
      if (this.known.has(docId)) {
        this.inFlight.delete(docId);
        return 'known';
      }
      if (this.store && (await this.store.existsByDocId(docId))) {
        this.known.add(docId);
        this.inFlight.delete(docId);
        return 'known';
      }
      return 'reserved';
    } catch (error) {
      this.inFlight.delete(docId);
      throw error;
    }
  }

  /**
   * Mark a reserved document as ingested.
   */
  commit(docId: string): void {
    this.inFlight.delete(docId);
    this.known.add(docId);
  }

  /**
   * Drop a reservation without marking the document known.
   */
  release(docId: string): void {
    this.inFlight.delete(docId);
  }

  isKnown(docId: string): boolean {
    return this.known.has(docId);
  }

  isReserved(docId: string): boolean {
    return this.inFlight.has(docId);
  }
}
