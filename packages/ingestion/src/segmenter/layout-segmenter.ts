import type {
  LayoutBlock,
  LayoutRole,
  PageRecord,
  TextSpan,
} from '@ledgerlens/model';

import { bboxArea, bboxUnion } from '@ledgerlens/shared';

/** Spans at or above median × ratio are headings */
const HEADING_FONT_RATIO = 1.25;

/** Bold spans with fewer words than this are headings */
const BOLD_HEADING_MAX_WORDS = 15;

/** Vertical centre above this fraction of the page height */
const HEADER_Y_RATIO = 0.06;

/** Vertical centre below this fraction of the page height */
const FOOTER_Y_RATIO = 0.92;

const DEFAULT_FONT_SIZE = 12;

const CAPTION_PATTERN =
  /^(figure|fig\.?|table|exhibit|chart|graph|source|note)\s/i;

export interface LayoutSegmenterOptions {
  /**
   * Images covering at least this fraction of the page become figure blocks
   * (default: 0.01)
   */
  figureMinAreaRatio?: number;

  /**
   * Detector regions below this confidence are ignored (default: 0.5)
   */
  detectorConfidenceThreshold?: number;
}

/**
 * Median of the positive font sizes, taking the upper middle for even counts.
 */
export function medianFontSize(spans: readonly TextSpan[]): number {
  const sizes = spans
    .map((span) => span.fontSize)
    .filter((size) => size > 0)
    .sort((a, b) => a - b);
  return sizes.length === 0
    ? DEFAULT_FONT_SIZE
    : sizes[Math.floor(sizes.length / 2)];
}

/**
 * Role of one text span: position first, then caption wording, then
 * typography.
 */
export function classifySpan(
  span: TextSpan,
  medianSize: number,
  pageHeight: number,
): LayoutRole {
  const centreY = (span.bbox[1] + span.bbox[3]) / 2;
  const relativeY = pageHeight > 0 ? centreY / pageHeight : 0.5;

  if (relativeY < HEADER_Y_RATIO) {
    return 'header';
  }
  if (relativeY > FOOTER_Y_RATIO) {
    return 'footnote';
  }
  if (CAPTION_PATTERN.test(span.text.trim())) {
    return 'caption';
  }

  const wordCount = span.text.split(/\s+/).filter(Boolean).length;
  if (
    span.fontSize >= medianSize * HEADING_FONT_RATIO ||
    (span.isBold && wordCount < BOLD_HEADING_MAX_WORDS)
  ) {
    return 'heading';
  }
  return 'paragraph';
}

/**
 * Merge each run of consecutive paragraph blocks into one block.
 *
 * Texts are joined with a space, boxes unioned and the lowest confidence
 * kept. Any other block ends the run and passes through unchanged.
 */
export function groupParagraphs(blocks: readonly LayoutBlock[]): LayoutBlock[] {
  const merged: LayoutBlock[] = [];
  let current: LayoutBlock | null = null;

  for (const block of blocks) {
    if (block.role !== 'paragraph') {
      if (current) {
        merged.push(current);
        current = null;
      }
      merged.push(block);
      continue;
    }

    if (current) {
      current.text = `${current.text} ${block.text}`;
      current.bbox = bboxUnion(current.bbox, block.bbox);
      current.confidence = Math.min(current.confidence, block.confidence);
    } else {
      current = { ...block, bbox: [...block.bbox] };
    }
  }

  if (current) {
    merged.push(current);
  }
  return merged;
}

/**
 * LayoutSegmenter
 *
 * Classifies a page's text spans into semantic roles with positional and
 * typographic heuristics, then appends large embedded images as figure
 * blocks and any confident regions from a layout detector.
 */
export class LayoutSegmenter {
  private readonly figureMinAreaRatio: number;
  private readonly detectorConfidenceThreshold: number;

  constructor(options: LayoutSegmenterOptions = {}) {
    this.figureMinAreaRatio = options.figureMinAreaRatio ?? 0.01;
    this.detectorConfidenceThreshold =
      options.detectorConfidenceThreshold ?? 0.5;
  }

  /**
   * @param detectedRegions - Regions from a LayoutRegionDetector, if any
   */
  segment(
    page: PageRecord,
    detectedRegions: readonly LayoutBlock[] = [],
  ): LayoutBlock[] {
    const medianSize = medianFontSize(page.spans);
    const blocks: LayoutBlock[] = page.spans.map((span) => ({
      role: classifySpan(span, medianSize, page.height),
      bbox: [...span.bbox],
      text: span.text,
      pageNumber: page.pageNumber,
      confidence: 1,
    }));

    const pageArea = page.width * page.height;
    for (const image of page.images) {
      const ratio = pageArea > 0 ? bboxArea(image.bbox) / pageArea : 0;
      if (ratio >= this.figureMinAreaRatio) {
        blocks.push({
          role: 'figure',
          bbox: [...image.bbox],
          text: '',
          pageNumber: page.pageNumber,
          confidence: 1,
        });
      }
    }

    for (const region of detectedRegions) {
      if (region.confidence >= this.detectorConfidenceThreshold) {
        blocks.push({ ...region, pageNumber: page.pageNumber });
      }
    }

    return blocks;
  }
}
