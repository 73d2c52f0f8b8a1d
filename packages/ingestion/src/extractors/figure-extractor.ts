import type { LoggerMethods } from '@ledgerlens/logger';
import type {
  BBox,
  ExtractedFigure,
  ExtractedTable,
  LayoutBlock,
  PageRecord,
} from '@ledgerlens/model';

import {
  bboxArea,
  bboxCentroid,
  intersectionOverUnion,
} from '@ledgerlens/shared';
import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { softCall } from '../utils/soft-call';
import {
  cropPng,
  pointScale,
  readRasterSize,
  toPixelRect,
} from '../utils/raster';

/** Characters of the document id used for its resource directory */
const RESOURCE_DIR_PREFIX_LENGTH = 16;

export interface FigureRegionOptions {
  /**
   * Images and drawing clusters must cover this fraction of the page
   * (default: 0.02)
   */
  minAreaRatio?: number;

  /**
   * A candidate overlapping an accepted one by more than this IoU is a
   * duplicate (default: 0.3)
   */
  iouThreshold?: number;

  /**
   * Drawing clusters need at least this many paths (default: 5)
   */
  drawingMinPaths?: number;
}

export interface FigureExtractorOptions extends FigureRegionOptions {
  /**
   * Root directory for saved crops
   */
  resourcesDir: string;

  /**
   * Raster resolution, for mapping points to pixels (default: 100)
   */
  dpi?: number;

  /**
   * Crops narrower or shorter than this many pixels are discarded
   * (default: 20)
   */
  minCropPx?: number;
}

/**
 * Figure regions of a page, in acceptance order.
 *
 * Layout figure blocks come first, then large embedded images, then large
 * drawing clusters. A candidate whose IoU with an accepted one exceeds the
 * threshold is dropped, so the earliest source wins. Drawing clusters that
 * overlap an extracted table the same way are dropped as table rulings.
 */
export function selectFigureRegions(
  page: PageRecord,
  blocks: readonly LayoutBlock[],
  tables: readonly ExtractedTable[],
  options: FigureRegionOptions = {},
): BBox[] {
  const minAreaRatio = options.minAreaRatio ?? 0.02;
  const iouThreshold = options.iouThreshold ?? 0.3;
  const drawingMinPaths = options.drawingMinPaths ?? 5;
  const pageArea = page.width * page.height;
  const largeEnough = (bbox: BBox) =>
    pageArea > 0 && bboxArea(bbox) / pageArea >= minAreaRatio;
  const overlapsAny = (bbox: BBox, others: readonly BBox[]) =>
    others.some((other) => intersectionOverUnion(bbox, other) > iouThreshold);

  const accepted: BBox[] = [];
  const accept = (bbox: BBox) => {
    if (!overlapsAny(bbox, accepted)) {
      accepted.push(bbox);
    }
  };

  blocks
    .filter((block) => block.role === 'figure')
    .forEach((block) => accept(block.bbox));

  page.images
    .map((image) => image.bbox)
    .filter(largeEnough)
    .forEach(accept);

  const tableBoxes = tables.map((table) => table.bbox);
  page.drawings
    .filter((cluster) => cluster.pathCount >= drawingMinPaths)
    .map((cluster) => cluster.bbox)
    .filter((bbox) => largeEnough(bbox) && !overlapsAny(bbox, tableBoxes))
    .forEach(accept);

  return accepted;
}

/**
 * Text of the caption block closest to `bbox` by centroid distance, or an
 * empty string when there is none. The first of equally close captions wins.
 */
export function nearestCaption(
  bbox: BBox,
  blocks: readonly LayoutBlock[],
): string {
  const [cx, cy] = bboxCentroid(bbox);
  let best = '';
  let bestDistance = Infinity;

  for (const block of blocks) {
    if (block.role !== 'caption') {
      continue;
    }
    const [bx, by] = bboxCentroid(block.bbox);
    const distance = Math.hypot(bx - cx, by - cy);
    if (distance < bestDistance) {
      bestDistance = distance;
      best = block.text;
    }
  }
  return best;
}

/**
 * FigureExtractor
 *
 * Crops figure regions out of the page raster, saves them as PNG under a
 * per-document directory and links each to its nearest caption.
 */
export class FigureExtractor {
  private readonly resourcesDir: string;
  private readonly scale: number;
  private readonly minCropPx: number;
  private readonly regionOptions: FigureRegionOptions;

  constructor(
    private readonly logger: LoggerMethods,
    options: FigureExtractorOptions,
  ) {
    this.resourcesDir = options.resourcesDir;
    this.scale = pointScale(options.dpi ?? 100);
    this.minCropPx = options.minCropPx ?? 20;
    this.regionOptions = {
      minAreaRatio: options.minAreaRatio,
      iouThreshold: options.iouThreshold,
      drawingMinPaths: options.drawingMinPaths,
    };
  }

  /**
   * Extract the page's figures.
   *
   * @param docId - Document content hash; its prefix names the crop directory
   * @param tables - Tables already extracted from the page
   */
  async extract(
    page: PageRecord,
    blocks: readonly LayoutBlock[],
    docId: string,
    tables: readonly ExtractedTable[] = [],
  ): Promise<ExtractedFigure[]> {
    const raster = page.raster;
    if (!raster) {
      return [];
    }

    const regions = selectFigureRegions(
      page,
      blocks,
      tables,
      this.regionOptions,
    );
    if (regions.length === 0) {
      return [];
    }

    const size = await softCall(() => readRasterSize(raster), {
      logger: this.logger,
      label: `[FigureExtractor] Reading raster of page ${page.pageNumber}`,
      fallback: null,
    });
    if (!size) {
      return [];
    }

    const docDir = docId.slice(0, RESOURCE_DIR_PREFIX_LENGTH);
    const figures: ExtractedFigure[] = [];

    for (const [index, bbox] of regions.entries()) {
      const figureIndex = index + 1;
      const rect = toPixelRect(bbox, this.scale, size);
      if (rect.width < this.minCropPx || rect.height < this.minCropPx) {
        this.logger.debug(
          `[FigureExtractor] Skipping figure ${figureIndex} on page ${page.pageNumber}: crop ${rect.width}x${rect.height}px`,
        );
        continue;
      }

      const image = await cropPng(raster, rect);
      const fileName = `page_${page.pageNumber}_fig_${figureIndex}.png`;
      const imagePath = `${docDir}/${fileName}`;
      this.saveImage(imagePath, image);

      figures.push({
        pageNumber: page.pageNumber,
        bbox: [...bbox],
        image,
        imagePath,
        caption: nearestCaption(bbox, blocks),
        figureIndex,
      });
    }

    this.logger.debug(
      `[FigureExtractor] Page ${page.pageNumber}: ${figures.length} figure(s) from ${regions.length} region(s)`,
    );
    return figures;
  }

  private saveImage(relativePath: string, image: Buffer): void {
    const target = join(this.resourcesDir, relativePath);
    mkdirSync(join(target, '..'), { recursive: true });
    writeFileSync(target, image);
  }
}
