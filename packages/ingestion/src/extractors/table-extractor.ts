import type { LoggerMethods } from '@ledgerlens/logger';
import type {
  BBox,
  ExtractedTable,
  LayoutBlock,
  OcrBox,
  PageRecord,
  TableExtractionMethod,
} from '@ledgerlens/model';

import type { OcrService } from '../collaborators/types';

import { normalizeOcrBoxes } from '../collaborators/ocr-text';
import { softCall } from '../utils/soft-call';
import {
  cropPng,
  pointScale,
  readRasterSize,
  toPixelRect,
} from '../utils/raster';
import { TableFormatter } from '../utils/table-formatter';
import { detectRuledTables } from './ruled-table-detector';

export interface TableExtractorOptions {
  /**
   * OCR service for the raster fallback; no fallback without one
   */
  ocr?: OcrService;

  /**
   * Raster resolution, for mapping points to pixels (default: 100)
   */
  dpi?: number;

  /**
   * Tables with fewer rows are discarded (default: 2)
   */
  minRows?: number;

  /**
   * Tables whose widest row has fewer cells are discarded (default: 2)
   */
  minCols?: number;

  /**
   * Pixels between OCR box centres that still share a row (default: 12)
   */
  rowTolerance?: number;

  /**
   * OCR boxes below this confidence are ignored (default: 0.4)
   */
  ocrConfidenceThreshold?: number;

  /**
   * Time limit for each detector or OCR call (default: none)
   */
  timeoutMs?: number;
}

/**
 * Group OCR boxes into rows by vertical centre.
 *
 * A box joins the first existing row whose key is closer than `tolerance`,
 * otherwise it opens a row keyed by its own (integer) centre. Rows are
 * ordered by key, cells by left edge.
 */
export function clusterOcrRows(
  boxes: readonly OcrBox[],
  tolerance: number,
): string[][] {
  const rows = new Map<number, Array<{ x: number; text: string }>>();

  for (const box of boxes) {
    const centre = Math.floor((box.bbox[1] + box.bbox[3]) / 2);
    const cell = { x: box.bbox[0], text: box.text };
    const key = [...rows.keys()].find(
      (k) => Math.abs(k - centre) < tolerance,
    );
    if (key === undefined) {
      rows.set(centre, [cell]);
    } else {
      rows.get(key)?.push(cell);
    }
  }

  return [...rows.entries()]
    .sort(([a], [b]) => a - b)
    .map(([, cells]) =>
      [...cells].sort((a, b) => a.x - b.x).map((cell) => cell.text),
    );
}

/**
 * TableExtractor
 *
 * Recovers tables from a page. The ruled-line detector runs first; only when
 * it finds nothing is each region the segmenter tagged as a table cropped
 * from the raster and read with OCR. Both paths apply the same minimums.
 */
export class TableExtractor {
  private readonly ocr?: OcrService;
  private readonly scale: number;
  private readonly minRows: number;
  private readonly minCols: number;
  private readonly rowTolerance: number;
  private readonly ocrConfidenceThreshold: number;
  private readonly timeoutMs?: number;

  constructor(
    private readonly logger: LoggerMethods,
    options: TableExtractorOptions = {},
  ) {
    this.ocr = options.ocr;
    this.scale = pointScale(options.dpi ?? 100);
    this.minRows = options.minRows ?? 2;
    this.minCols = options.minCols ?? 2;
    this.rowTolerance = options.rowTolerance ?? 12;
    this.ocrConfidenceThreshold = options.ocrConfidenceThreshold ?? 0.4;
    this.timeoutMs = options.timeoutMs;
  }

  async extract(
    page: PageRecord,
    blocks: readonly LayoutBlock[],
  ): Promise<ExtractedTable[]> {
    const candidates = await softCall(
      async () => detectRuledTables(page.rulings, page.spans),
      {
        logger: this.logger,
        label: `[TableExtractor] Ruled-line detection, page ${page.pageNumber}`,
        fallback: [],
        timeoutMs: this.timeoutMs,
      },
    );

    const tables = candidates
      .filter((candidate) => this.meetsMinimums(candidate.rows))
      .map(({ bbox, rows }) =>
        this.buildTable(page.pageNumber, bbox, rows, 'primary'),
      );
    if (tables.length > 0) {
      this.logger.debug(
        `[TableExtractor] Page ${page.pageNumber}: ${tables.length} ruled table(s)`,
      );
      return tables;
    }

    const regions = blocks.filter((block) => block.role === 'table');
    if (regions.length === 0 || !this.ocr || !page.raster) {
      return [];
    }
    return this.extractWithOcr(page, page.raster, this.ocr, regions);
  }

  private async extractWithOcr(
    page: PageRecord,
    raster: Buffer,
    ocr: OcrService,
    regions: readonly LayoutBlock[],
  ): Promise<ExtractedTable[]> {
    const label = `[TableExtractor] OCR fallback on page ${page.pageNumber}`;
    const size = await softCall(() => readRasterSize(raster), {
      logger: this.logger,
      label,
      fallback: null,
    });
    if (!size) {
      return [];
    }

    const tables: ExtractedTable[] = [];
    for (const region of regions) {
      const rect = toPixelRect(region.bbox, this.scale, size);
      if (rect.width === 0 || rect.height === 0) {
        continue;
      }

      const boxes = await softCall(
        async () =>
          normalizeOcrBoxes(
            await ocr.recognize(
              await cropPng(raster, rect),
              this.ocrConfidenceThreshold,
            ),
            this.ocrConfidenceThreshold,
          ),
        { logger: this.logger, label, fallback: [], timeoutMs: this.timeoutMs },
      );

      const rows = clusterOcrRows(boxes, this.rowTolerance);
      if (this.meetsMinimums(rows)) {
        tables.push(
          this.buildTable(page.pageNumber, region.bbox, rows, 'ocr-fallback'),
        );
      }
    }

    this.logger.debug(
      `[TableExtractor] Page ${page.pageNumber}: ${tables.length} OCR table(s) from ${regions.length} region(s)`,
    );
    return tables;
  }

  private meetsMinimums(rows: readonly string[][]): boolean {
    return (
      rows.length >= this.minRows &&
      TableFormatter.maxColumns(rows) >= this.minCols
    );
  }

  private buildTable(
    pageNumber: number,
    bbox: BBox,
    rows: string[][],
    method: TableExtractionMethod,
  ): ExtractedTable {
    return {
      pageNumber,
      bbox: [...bbox],
      rows,
      markdown: TableFormatter.toMarkdown(rows),
      csv: TableFormatter.toCsv(rows),
      method,
    };
  }
}
