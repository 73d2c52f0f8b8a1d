import type { LoggerMethods } from '@ledgerlens/logger';
import type { PageRecord } from '@ledgerlens/model';

import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';

import type { PageRenderer } from '../processors/page-renderer';
import type { PageSource, ReadPagesOptions } from '../types';

import { PageSourceError, PdfOpenError } from '../errors/page-source-error';
import { clusterDrawingPaths } from '../processors/drawing-clusterer';
import {
  type OperatorListLike,
  parseOperatorList,
} from '../processors/operator-list-parser';
import {
  type FontNameResolver,
  extractTextSpans,
} from '../processors/text-span-extractor';
import { PDFJS_DOCUMENT_OPTIONS } from '../utils/pdfjs-config';

/** Pages whose text layer is this short are treated as scanned */
const MIN_TEXT_LAYER_CHARS = 20;

export interface PdfPageSourceOptions {
  /**
   * Renders page rasters; pages get `raster: null` when omitted
   */
  renderer?: Pick<PageRenderer, 'renderPage'>;

  /**
   * Raster resolution (default: 100)
   */
  dpi?: number;

  /**
   * Time limit for rendering one page (default: none)
   */
  renderTimeoutMs?: number;

  /**
   * Minimum painted paths before a page has drawing clusters (default: 5)
   */
  drawingMinPaths?: number;

  /**
   * Merge distance for drawing clusters in points (default: 10)
   */
  drawingMergeGap?: number;
}

/**
 * Structural subset of pdfjs' PDFPageProxy used per page
 */
interface PdfPageLike {
  getViewport(params: { scale: number }): { width: number; height: number };
  getOperatorList(): Promise<OperatorListLike>;
  getTextContent(): Promise<{ items: unknown[]; styles: unknown }>;
  commonObjs: { has(id: string): boolean; get(id: string): unknown };
  cleanup(): boolean | void;
}

/** Drop the six-letter subset tag, e.g. "ABCDEF+Arial-BoldMT" */
function stripSubsetTag(fontName: string): string {
  return fontName.replace(/^[A-Z]{6}\+/, '');
}

function createFontResolver(page: PdfPageLike): FontNameResolver {
  return (fontId) => {
    if (!page.commonObjs.has(fontId)) {
      return undefined;
    }
    const font = page.commonObjs.get(fontId);
    if (typeof font === 'object' && font !== null && 'name' in font) {
      return typeof font.name === 'string'
        ? stripSubsetTag(font.name)
        : undefined;
    }
    return undefined;
  };
}

/**
 * PdfPageSource - reads PDF pages with pdfjs-dist
 *
 * Text spans come from the text layer, image placements, drawing clusters and
 * ruling lines from the operator list. The raster is rendered separately by
 * ImageMagick and degrades to `null` when rendering fails.
 */
export class PdfPageSource implements PageSource {
  private readonly renderer?: Pick<PageRenderer, 'renderPage'>;
  private readonly dpi: number;
  private readonly renderTimeoutMs?: number;
  private readonly drawingMinPaths: number;
  private readonly drawingMergeGap: number;

  constructor(
    private readonly logger: LoggerMethods,
    options: PdfPageSourceOptions = {},
  ) {
    this.renderer = options.renderer;
    this.dpi = options.dpi ?? 100;
    this.renderTimeoutMs = options.renderTimeoutMs;
    this.drawingMinPaths = options.drawingMinPaths ?? 5;
    this.drawingMergeGap = options.drawingMergeGap ?? 10;
  }

  async *readPages(
    filePath: string,
    options: ReadPagesOptions = {},
  ): AsyncGenerator<PageRecord> {
    const { maxPages = 0, signal } = options;

    let data: Uint8Array;
    try {
      data = new Uint8Array(await readFile(filePath));
    } catch (error) {
      throw PdfOpenError.fromError(filePath, error);
    }

    const doc = await getDocument({
      ...PDFJS_DOCUMENT_OPTIONS,
      data,
    }).promise.catch((error: unknown) => {
      throw PdfOpenError.fromError(filePath, error);
    });

    const pageCount =
      maxPages > 0 ? Math.min(maxPages, doc.numPages) : doc.numPages;
    this.logger.info(
      `[PdfPageSource] Reading ${pageCount} of ${doc.numPages} pages from ${filePath}`,
    );

    const workDir = this.renderer
      ? await mkdtemp(join(tmpdir(), 'page-source-'))
      : null;

    try {
      for (let pageNumber = 1; pageNumber <= pageCount; pageNumber++) {
        this.checkAborted(signal);
        const page = await doc.getPage(pageNumber);
        try {
          yield await this.readPage(page, filePath, pageNumber, workDir);
        } finally {
          page.cleanup();
        }
      }
    } finally {
      if (workDir) {
        await rm(workDir, { recursive: true, force: true });
      }
      await doc.destroy();
    }
  }

  private async readPage(
    page: PdfPageLike,
    filePath: string,
    pageNumber: number,
    workDir: string | null,
  ): Promise<PageRecord> {
    const { width, height } = page.getViewport({ scale: 1 });

    // Fonts land in commonObjs while the operator list is built
    const operatorList = await page.getOperatorList();
    const geometry = parseOperatorList(operatorList, height);

    const textContent = await page.getTextContent();
    const spans = extractTextSpans(
      textContent.items,
      textContent.styles,
      height,
      createFontResolver(page),
    );
    const rawText = spans.map((span) => span.text).join(' ');

    return {
      pageNumber,
      width,
      height,
      spans,
      images: geometry.images,
      drawings: clusterDrawingPaths(geometry.paths, {
        gap: this.drawingMergeGap,
        minPaths: this.drawingMinPaths,
      }),
      rulings: geometry.rulings,
      rawText,
      hasTextLayer: rawText.trim().length > MIN_TEXT_LAYER_CHARS,
      raster: await this.renderRaster(filePath, pageNumber, workDir),
    };
  }

  private async renderRaster(
    filePath: string,
    pageNumber: number,
    workDir: string | null,
  ): Promise<Buffer | null> {
    if (!this.renderer || !workDir) {
      return null;
    }
    try {
      return await this.renderer.renderPage(filePath, pageNumber, workDir, {
        dpi: this.dpi,
        timeoutMs: this.renderTimeoutMs,
      });
    } catch (error) {
      this.logger.warn(
        `[PdfPageSource] Rendering failed for page ${pageNumber}, continuing without raster:`,
        PageSourceError.getErrorMessage(error),
      );
      return null;
    }
  }

  /**
   * @throws {Error} with name 'AbortError' if aborted
   */
  private checkAborted(signal?: AbortSignal): void {
    if (signal?.aborted) {
      const error = new Error('Page reading was aborted');
      error.name = 'AbortError';
      throw error;
    }
  }
}
