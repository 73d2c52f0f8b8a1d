import type { LoggerMethods } from '@ledgerlens/logger';
import type {
  Chunk,
  IngestionStats,
  LayoutBlock,
  PageRecord,
} from '@ledgerlens/model';
import type { PageSource } from '@ledgerlens/page-source';

import type {
  ChartInterpreter,
  FigureClassifier,
  LayoutRegionDetector,
  OcrService,
} from './collaborators/types';
import type { IngestionConfig, IngestionConfigInput } from './config';
import type { ChunkRecord, ChunkStore } from './store';

import { createLogger } from '@ledgerlens/logger';
import { DocumentState } from '@ledgerlens/model';
import {
  PageRenderer,
  PdfPageSource,
  computeFileHash,
} from '@ledgerlens/page-source';
import { ConcurrentPool, retryWithBackoff } from '@ledgerlens/shared';
import { existsSync } from 'node:fs';
import { readdir } from 'node:fs/promises';
import { basename, join } from 'node:path';

import { Chunker } from './chunker';
import { normalizeOcrBoxes, ocrToText } from './collaborators/ocr-text';
import { checkIngestionConfig, resolveIngestionConfig } from './config';
import { DocumentStateMachine } from './core/document-state-machine';
import {
  DocumentNotFoundError,
  IngestionError,
  StoreError,
  createAbortError,
  isAbortError,
} from './errors/ingestion-error';
import { FigureEnricher, FigureExtractor, TableExtractor } from './extractors';
import { KnownDocumentRegistry } from './registry';
import {
  LayoutSegmenter,
  groupParagraphs,
  sectionAfterPage,
} from './segmenter';
import { toChunkRecord } from './store';
import { softCall } from './utils/soft-call';
import { QualityGate } from './validators';

/** Roles that make up a page's prose */
const TEXT_ROLES = new Set<LayoutBlock['role']>([
  'heading',
  'paragraph',
  'footnote',
]);

/**
 * State change of one document, as reported to `onStateChange`
 */
export interface DocumentStateChange {
  filePath: string;
  from: DocumentState;
  to: DocumentState;
}

/**
 * IngestionPipeline Options
 */
export interface IngestionPipelineOptions {
  /**
   * Logger instance (default: console logger at `config.logLevel`)
   */
  logger?: LoggerMethods;

  /**
   * Destination of accepted chunks
   */
  store: ChunkStore;

  /**
   * Settings; missing keys take their defaults
   */
  config?: IngestionConfigInput;

  /**
   * Page reader (default: PdfPageSource rendering rasters with ImageMagick)
   */
  pageSource?: PageSource;

  /**
   * Known-document tracking (default: a registry backed by `store`)
   */
  registry?: KnownDocumentRegistry;

  /**
   * Text recognition for scanned pages, table regions and figure overlays
   */
  ocr?: OcrService;

  /**
   * Model-based table, figure and caption regions added to the heuristics
   */
  layoutDetector?: LayoutRegionDetector;

  /**
   * Figure classifier (default: KeywordFigureClassifier)
   */
  figureClassifier?: FigureClassifier;

  /**
   * Chart interpreter (default: CaptionChartInterpreter)
   */
  chartInterpreter?: ChartInterpreter;

  /**
   * Document id of a file (default: SHA-256 of its bytes)
   */
  hashFile?: (filePath: string) => Promise<string>;

  /**
   * Called on every document state change
   */
  onStateChange?: (change: DocumentStateChange) => void;

  /**
   * Clock for chunk timestamps (default: current time)
   */
  now?: () => Date;
}

export interface IngestFileOptions {
  /**
   * Re-ingest even when the document is already known
   */
  force?: boolean;

  /**
   * Cancels the document between pages and before the upsert
   */
  signal?: AbortSignal;
}

export interface IngestFolderOptions extends IngestFileOptions {
  /**
   * Documents processed in parallel (default: config `concurrency`)
   */
  concurrency?: number;
}

export function createEmptyStats(): IngestionStats {
  return {
    filesProcessed: 0,
    filesSkipped: 0,
    filesFailed: 0,
    pagesProcessed: 0,
    textChunks: 0,
    tableChunks: 0,
    figureChunks: 0,
    pageSummaryChunks: 0,
    chunksRejected: 0,
    totalStored: 0,
    elapsedSeconds: 0,
  };
}

/**
 * Add counters of `b` to `a`; elapsed time is left to the caller.
 */
export function mergeStats(
  a: IngestionStats,
  b: IngestionStats,
): IngestionStats {
  return {
    filesProcessed: a.filesProcessed + b.filesProcessed,
    filesSkipped: a.filesSkipped + b.filesSkipped,
    filesFailed: a.filesFailed + b.filesFailed,
    pagesProcessed: a.pagesProcessed + b.pagesProcessed,
    textChunks: a.textChunks + b.textChunks,
    tableChunks: a.tableChunks + b.tableChunks,
    figureChunks: a.figureChunks + b.figureChunks,
    pageSummaryChunks: a.pageSummaryChunks + b.pageSummaryChunks,
    chunksRejected: a.chunksRejected + b.chunksRejected,
    totalStored: a.totalStored + b.totalStored,
    elapsedSeconds: a.elapsedSeconds,
  };
}

function checkAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw createAbortError('Ingestion was aborted');
  }
}

function countChunk(stats: IngestionStats, chunk: Chunk): void {
  switch (chunk.metadata.blockType) {
    case 'text':
      stats.textChunks++;
      break;
    case 'page_summary':
      stats.pageSummaryChunks++;
      break;
    case 'table':
      stats.tableChunks++;
      break;
    case 'figure':
      stats.figureChunks++;
      break;
  }
}

/**
 * IngestionPipeline
 *
 * Turns PDF reports into stored chunks, one document at a time.
 *
 * ## Per document
 *
 * 1. Hash the file and reserve it in the registry; known files are skipped
 * 2. Per page, in order: segment, extract tables and figures, enrich
 *    figures, chunk. The current section is carried from page to page
 * 3. Run the quality gate over all chunks once
 * 4. Upsert the accepted chunks in one batch, retrying transient store
 *    failures, then mark the document known
 *
 * A failed or cancelled document releases its reservation and writes
 * nothing.
 *
 * @example
 * ```typescript
 * const pipeline = new IngestionPipeline({
 *   logger: createLogger({ level: 'info' }),
 *   store: new InMemoryChunkStore(logger),
 *   config: loadIngestionConfig(),
 * });
 *
 * const stats = await pipeline.ingestFolder();
 * ```
 */
export class IngestionPipeline {
  readonly config: IngestionConfig;
  private readonly logger: LoggerMethods;
  private readonly store: ChunkStore;
  private readonly registry: KnownDocumentRegistry;
  private readonly pageSource: PageSource;
  private readonly ocr?: OcrService;
  private readonly layoutDetector?: LayoutRegionDetector;
  private readonly hashFile: (filePath: string) => Promise<string>;
  private readonly onStateChange?: (change: DocumentStateChange) => void;
  private readonly segmenter: LayoutSegmenter;
  private readonly tableExtractor: TableExtractor;
  private readonly figureExtractor: FigureExtractor;
  private readonly figureEnricher: FigureEnricher;
  private readonly chunker: Chunker;
  private readonly qualityGate: QualityGate;

  constructor(options: IngestionPipelineOptions) {
    const config = resolveIngestionConfig(options.config ?? {});
    const logger =
      options.logger ?? createLogger({ level: config.logLevel });
    checkIngestionConfig(config, logger);
    const timeoutMs = config.collaboratorTimeoutMs;

    this.config = config;
    this.logger = logger;
    this.store = options.store;
    this.registry =
      options.registry ?? new KnownDocumentRegistry(options.store);
    this.pageSource =
      options.pageSource ??
      new PdfPageSource(logger, {
        renderer: new PageRenderer(logger),
        dpi: config.dpi,
        renderTimeoutMs: timeoutMs,
        drawingMinPaths: config.drawingMinPaths,
        drawingMergeGap: config.drawingMergeGap,
      });
    this.ocr = options.ocr;
    this.layoutDetector = options.layoutDetector;
    this.hashFile = options.hashFile ?? computeFileHash;
    this.onStateChange = options.onStateChange;

    this.segmenter = new LayoutSegmenter({
      figureMinAreaRatio: config.layoutFigureMinAreaRatio,
      detectorConfidenceThreshold: config.layoutConfidenceThreshold,
    });
    this.tableExtractor = new TableExtractor(logger, {
      ocr: options.ocr,
      dpi: config.dpi,
      minRows: config.tableMinRows,
      minCols: config.tableMinCols,
      rowTolerance: config.ocrRowTolerance,
      ocrConfidenceThreshold: config.ocrConfidenceThreshold,
      timeoutMs,
    });
    this.figureExtractor = new FigureExtractor(logger, {
      resourcesDir: config.resourcesDir,
      dpi: config.dpi,
      minAreaRatio: config.figureMinAreaRatio,
      iouThreshold: config.figureIouThreshold,
      drawingMinPaths: config.drawingMinPaths,
      minCropPx: config.minFigureCropPx,
    });
    this.figureEnricher = new FigureEnricher(logger, {
      ocr: options.ocr,
      classifier: options.figureClassifier,
      interpreter: options.chartInterpreter,
      ocrConfidenceThreshold: config.chartOcrConfidenceThreshold,
      timeoutMs,
    });
    this.chunker = new Chunker({
      textChunkSize: config.textChunkSize,
      textChunkOverlap: config.textChunkOverlap,
      minChunkLength: config.minChunkLength,
      includePageSummary: config.includePageSummary,
      pageSummaryMaxChars: config.pageSummaryMaxChars,
      now: options.now,
    });
    this.qualityGate = new QualityGate(logger, {
      minChunkLength: config.minChunkLength,
      maxChunkLength: config.maxChunkLength,
      minAlnumRatio: config.minAlnumRatio,
      minUniqueWordRatio: config.minUniqueWordRatio,
      tableMinRows: config.qualityTableMinRows,
      minFigureTextLength: config.minFigureTextLength,
    });
  }

  /**
   * Ingest one PDF.
   *
   * A missing file is reported in `filesFailed` rather than thrown.
   *
   * @throws {StoreError} When the upsert still fails after its retries
   * @throws {Error} named 'AbortError' when `signal` is aborted
   */
  async ingestFile(
    filePath: string,
    options: IngestFileOptions = {},
  ): Promise<IngestionStats> {
    const startTime = Date.now();
    const stats = createEmptyStats();
    const machine = new DocumentStateMachine((from, to) =>
      this.onStateChange?.({ filePath, from, to }),
    );
    const finish = () => ({
      ...stats,
      elapsedSeconds: (Date.now() - startTime) / 1000,
    });

    if (!existsSync(filePath)) {
      const error = new DocumentNotFoundError(filePath);
      this.logger.error('[IngestionPipeline]', error.message);
      machine.transition(DocumentState.FAILED);
      stats.filesFailed = 1;
      return finish();
    }

    let docId: string;
    try {
      checkAborted(options.signal);
      docId = await this.hashFile(filePath);
      const outcome = await this.registry.reserve(docId, {
        force: options.force,
      });
      if (outcome !== 'reserved') {
        this.logger.info(
          `[IngestionPipeline] Skipping ${basename(filePath)}: document ${outcome}`,
        );
        machine.transition(DocumentState.SKIPPED);
        stats.filesSkipped = 1;
        return finish();
      }
    } catch (error) {
      this.fail(machine, filePath, error);
      throw error;
    }

    try {
      await this.processDocument(filePath, docId, machine, stats, options);
      this.registry.commit(docId);
      machine.transition(DocumentState.STORED);
    } catch (error) {
      this.registry.release(docId);
      this.fail(machine, filePath, error);
      throw error;
    }

    const result = finish();
    this.logger.info(
      `[IngestionPipeline] Ingested ${basename(filePath)}: ${result.pagesProcessed} page(s), ${result.totalStored} chunk(s) stored, ${result.chunksRejected} rejected in ${result.elapsedSeconds.toFixed(1)}s`,
    );
    return result;
  }

  /**
   * Ingest every `*.pdf` in `dir`, in name order, with bounded parallelism.
   *
   * Document failures are logged and counted in `filesFailed`; aborts
   * end the run. A missing folder is logged and yields empty stats.
   */
  async ingestFolder(
    dir: string = this.config.pdfDir,
    options: IngestFolderOptions = {},
  ): Promise<IngestionStats> {
    const startTime = Date.now();
    if (!existsSync(dir)) {
      this.logger.warn(`[IngestionPipeline] Folder not found: ${dir}`);
      return {
        ...createEmptyStats(),
        elapsedSeconds: (Date.now() - startTime) / 1000,
      };
    }
    const files = await this.listPdfs(dir);
    this.logger.info(
      `[IngestionPipeline] Found ${files.length} PDF(s) in ${dir}`,
    );

    const results = await ConcurrentPool.run(
      files,
      options.concurrency ?? this.config.concurrency,
      async (file) => {
        try {
          return await this.ingestFile(join(dir, file), options);
        } catch (error) {
          if (isAbortError(error)) {
            throw error;
          }
          return { ...createEmptyStats(), filesFailed: 1 };
        }
      },
      { signal: options.signal },
    );

    const total = results.reduce(mergeStats, createEmptyStats());
    return { ...total, elapsedSeconds: (Date.now() - startTime) / 1000 };
  }

  private async listPdfs(dir: string): Promise<string[]> {
    try {
      const entries = await readdir(dir, { withFileTypes: true });
      return entries
        .filter((entry) => entry.isFile() && /\.pdf$/i.test(entry.name))
        .map((entry) => entry.name)
        .sort();
    } catch (error) {
      throw IngestionError.fromError(`Cannot read folder ${dir}`, error);
    }
  }

  private async processDocument(
    filePath: string,
    docId: string,
    machine: DocumentStateMachine,
    stats: IngestionStats,
    options: IngestFileOptions,
  ): Promise<void> {
    const { signal } = options;
    const sourceFile = basename(filePath);
    const chunks: Chunk[] = [];
    let section = '';

    this.logger.info(
      `[IngestionPipeline] Ingesting ${sourceFile} (${docId.slice(0, 16)})`,
    );

    for await (const page of this.pageSource.readPages(filePath, {
      maxPages: this.config.maxPages,
      signal,
    })) {
      machine.transition(DocumentState.PARSED);
      stats.pagesProcessed++;

      const blocks = await this.segment(page);
      machine.transition(DocumentState.SEGMENTED);

      const nativeText = blocks.filter((block) => TEXT_ROLES.has(block.role));
      const recognized = page.hasTextLayer
        ? []
        : await this.recognizePage(page);
      // A sparse native layer still counts when OCR has nothing to add
      const textBlocks = recognized.length > 0 ? recognized : nativeText;
      const tables = await this.tableExtractor.extract(page, blocks);
      const figures = await this.figureExtractor.extract(
        page,
        blocks,
        docId,
        tables,
      );
      const enriched = await this.figureEnricher.enrichAll(figures);
      machine.transition(DocumentState.EXTRACTED);

      chunks.push(
        ...this.chunker.chunkPage({
          docId,
          sourceFile,
          page,
          blocks: textBlocks,
          tables,
          figures: enriched,
          section,
        }),
      );
      section = sectionAfterPage(textBlocks, section);
      machine.transition(DocumentState.CHUNKED);

      checkAborted(signal);
    }

    machine.transition(DocumentState.FILTERED);
    const { accepted, rejected } = this.qualityGate.filterChunks(chunks);
    stats.chunksRejected = rejected.length;
    accepted.forEach((chunk) => countChunk(stats, chunk));

    checkAborted(signal);
    stats.totalStored = await this.upsert(
      accepted.map(toChunkRecord),
      signal,
    );
    stats.filesProcessed = 1;
  }

  private async segment(page: PageRecord): Promise<LayoutBlock[]> {
    const detector = this.layoutDetector;
    const detected = detector
      ? await softCall(() => detector.detect(page), {
          logger: this.logger,
          label: `[IngestionPipeline] Layout detection on page ${page.pageNumber}`,
          fallback: [],
          timeoutMs: this.config.collaboratorTimeoutMs,
        })
      : [];
    return groupParagraphs(this.segmenter.segment(page, detected));
  }

  /**
   * Paragraph block holding the OCR text of a page without a text layer,
   * or nothing when OCR yields no text.
   */
  private async recognizePage(page: PageRecord): Promise<LayoutBlock[]> {
    const { ocr } = this;
    const raster = page.raster;
    if (!ocr || !raster) {
      return [];
    }

    const threshold = this.config.ocrConfidenceThreshold;
    const text = await softCall(
      async () =>
        ocrToText(
          normalizeOcrBoxes(await ocr.recognize(raster, threshold), threshold),
        ),
      {
        logger: this.logger,
        label: `[IngestionPipeline] OCR of page ${page.pageNumber}`,
        fallback: '',
        timeoutMs: this.config.collaboratorTimeoutMs,
      },
    );
    if (!text) {
      return [];
    }
    return [
      {
        role: 'paragraph',
        bbox: [0, 0, page.width, page.height],
        text,
        pageNumber: page.pageNumber,
        confidence: 1,
      },
    ];
  }

  private async upsert(
    records: ChunkRecord[],
    signal?: AbortSignal,
  ): Promise<number> {
    if (records.length === 0) {
      return 0;
    }
    return retryWithBackoff(() => this.store.upsert(records), {
      maxAttempts: this.config.storeMaxAttempts,
      baseDelayMs: this.config.storeRetryBaseDelayMs,
      shouldRetry: StoreError.isTransient,
      onRetry: (error, attempt, delayMs) =>
        this.logger.warn(
          `[IngestionPipeline] Store upsert attempt ${attempt} failed, retrying in ${delayMs}ms:`,
          IngestionError.getErrorMessage(error),
        ),
      signal,
    });
  }

  private fail(
    machine: DocumentStateMachine,
    filePath: string,
    error: unknown,
  ): void {
    if (isAbortError(error)) {
      this.logger.warn(`[IngestionPipeline] Cancelled ${basename(filePath)}`);
      machine.transition(DocumentState.CANCELLED);
      return;
    }
    this.logger.error(
      `[IngestionPipeline] Failed to ingest ${basename(filePath)}:`,
      IngestionError.getErrorMessage(error),
    );
    machine.transition(DocumentState.FAILED);
  }
}
