import type { LoggerMethods } from '@ledgerlens/logger';

import type { Embedder } from '../collaborators/types';
import type { IngestionConfig } from '../config';

import { BatchProcessor } from '@ledgerlens/shared';
import { embedMany } from 'ai';

/**
 * Embedding model accepted by the AI SDK
 */
export type EmbeddingModelInput = Parameters<typeof embedMany>[0]['model'];

export interface AiEmbedderOptions {
  /**
   * Texts per embedding request (default: 64)
   */
  batchSize?: number;

  /**
   * Transport retries per request, handled by the AI SDK (default: 2)
   */
  maxRetries?: number;

  abortSignal?: AbortSignal;
}

/**
 * AiEmbedder
 *
 * Embedder backed by the AI SDK's `embedMany`. Requests are split into
 * batches and sent one after another.
 */
export class AiEmbedder implements Embedder {
  private readonly batchSize: number;
  private readonly maxRetries: number;
  private readonly abortSignal?: AbortSignal;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly model: EmbeddingModelInput,
    options: AiEmbedderOptions = {},
  ) {
    this.batchSize = options.batchSize ?? 64;
    this.maxRetries = options.maxRetries ?? 2;
    this.abortSignal = options.abortSignal;
  }

  /**
   * Embedder sized by the ingestion settings.
   */
  static fromConfig(
    logger: LoggerMethods,
    model: EmbeddingModelInput,
    config: Pick<IngestionConfig, 'embeddingBatchSize'>,
    options: Omit<AiEmbedderOptions, 'batchSize'> = {},
  ): AiEmbedder {
    return new AiEmbedder(logger, model, {
      ...options,
      batchSize: config.embeddingBatchSize,
    });
  }

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const vectors = await BatchProcessor.processBatchSequential(
      texts,
      this.batchSize,
      async (batch, index) => {
        const { embeddings } = await embedMany({
          model: this.model,
          values: batch,
          maxRetries: this.maxRetries,
          abortSignal: this.abortSignal,
        });
        this.logger.debug(
          `[AiEmbedder] Batch ${index + 1}: embedded ${batch.length} text(s)`,
        );
        return embeddings;
      },
    );
    return vectors;
  }
}
