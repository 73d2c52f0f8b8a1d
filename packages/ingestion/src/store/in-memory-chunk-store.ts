import type { LoggerMethods } from '@ledgerlens/logger';

import type { Embedder } from '../collaborators/types';
import type { ChunkRecord, CollectionName } from './chunk-record';
import type {
  ChunkQueryFilter,
  ChunkQueryResult,
  ChunkStore,
} from './chunk-store';

import { collectionFor } from './chunk-record';

interface StoredEntry {
  record: ChunkRecord;
  vector: number[] | null;
}

type Collection = Map<string, StoredEntry>;

export interface InMemoryChunkStoreOptions {
  /**
   * Embeds records and queries; without one, distance is lexical
   */
  embedder?: Embedder;
}

const COLLECTIONS: readonly CollectionName[] = ['text', 'tables', 'figures'];

/**
 * Word set of a text, lowercased
 */
export function tokenize(text: string): Set<string> {
  return new Set(text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []);
}

/**
 * 1 − |A ∩ B| / |A ∪ B|; 1 when both sets are empty
 */
export function jaccardDistance(
  a: ReadonlySet<string>,
  b: ReadonlySet<string>,
): number {
  let intersection = 0;
  for (const token of a) {
    if (b.has(token)) intersection++;
  }
  const union = a.size + b.size - intersection;
  return union === 0 ? 1 : 1 - intersection / union;
}

/**
 * 1 − cosine similarity; 1 when either vector is zero
 */
export function cosineDistance(
  a: readonly number[],
  b: readonly number[],
): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  const norm = Math.sqrt(normA) * Math.sqrt(normB);
  return norm === 0 ? 1 : 1 - dot / norm;
}

/**
 * InMemoryChunkStore
 *
 * Process-local ChunkStore with separate text, table and figure
 * collections. Suitable for tests and single-run tooling.
 */
export class InMemoryChunkStore implements ChunkStore {
  private readonly collections = new Map<CollectionName, Collection>(
    COLLECTIONS.map((name) => [name, new Map()] as const),
  );
  private readonly embedder?: Embedder;

  constructor(
    private readonly logger: LoggerMethods,
    options: InMemoryChunkStoreOptions = {},
  ) {
    this.embedder = options.embedder;
  }

  async upsert(records: readonly ChunkRecord[]): Promise<number> {
    const unique = new Map<string, ChunkRecord>();
    for (const record of records) {
      unique.set(record.id, record);
    }
    const duplicates = records.length - unique.size;
    if (duplicates > 0) {
      this.logger.debug(
        `[InMemoryChunkStore] Dropped ${duplicates} duplicate record(s)`,
      );
    }

    const batch = [...unique.values()];
    const vectors = this.embedder
      ? await this.embedder.embed(batch.map((record) => record.text))
      : null;

    batch.forEach((record, index) => {
      const target = collectionFor(record.blockType);
      for (const [name, entries] of this.collections) {
        if (name !== target) entries.delete(record.id);
      }
      this.collection(target).set(record.id, {
        record,
        vector: vectors?.[index] ?? null,
      });
    });

    return batch.length;
  }

  async existsByDocId(docId: string): Promise<boolean> {
    for (const entries of this.collections.values()) {
      for (const { record } of entries.values()) {
        if (record.metadata.docId === docId) return true;
      }
    }
    return false;
  }

  async query(
    text: string,
    k: number,
    filter: ChunkQueryFilter = {},
  ): Promise<ChunkQueryResult[]> {
    const names = filter.blockTypes
      ? [...new Set(filter.blockTypes.map(collectionFor))]
      : COLLECTIONS;
    const [queryVector] = this.embedder
      ? await this.embedder.embed([text])
      : [];
    const queryTokens = tokenize(text);

    const results: ChunkQueryResult[] = [];
    for (const name of names) {
      for (const { record, vector } of this.collection(name).values()) {
        if (filter.docId && record.metadata.docId !== filter.docId) {
          continue;
        }
        const distance =
          queryVector && vector
            ? cosineDistance(queryVector, vector)
            : jaccardDistance(queryTokens, tokenize(record.text));
        results.push({
          id: record.id,
          text: record.text,
          metadata: record.metadata,
          distance,
          collection: name,
        });
      }
    }

    return results
      .sort((a, b) => a.distance - b.distance)
      .slice(0, Math.max(0, k));
  }

  async count(): Promise<number> {
    let total = 0;
    for (const entries of this.collections.values()) {
      total += entries.size;
    }
    return total;
  }

  /**
   * Record counts per collection
   */
  collectionCounts(): Record<CollectionName, number> {
    return {
      text: this.collection('text').size,
      tables: this.collection('tables').size,
      figures: this.collection('figures').size,
    };
  }

  private collection(name: CollectionName): Collection {
    const entries = this.collections.get(name);
    if (!entries) {
      throw new Error(`Unknown collection: ${name}`);
    }
    return entries;
  }
}
