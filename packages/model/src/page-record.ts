import type { BBox } from './geometry';

/**
 * Positioned run of text from the page's native text layer
 *
 * @interface TextSpan
 */
export interface TextSpan {
  text: string;
  bbox: BBox;

  /**
   * Effective font size in points (text matrix scale)
   */
  fontSize: number;

  /**
   * Resolved font name, empty when the font could not be resolved
   */
  fontName: string;

  /**
   * Bold flag derived from the font name
   */
  isBold: boolean;
}

/**
 * Placement of an embedded raster image
 *
 * @interface ImageRegion
 */
export interface ImageRegion {
  /**
   * Displayed area on the page
   */
  bbox: BBox;

  /**
   * Intrinsic pixel width of the image (0 when unknown)
   */
  width: number;

  /**
   * Intrinsic pixel height of the image (0 when unknown)
   */
  height: number;
}

/**
 * Group of vector drawing paths merged by proximity
 *
 * Charts and diagrams drawn with many path operators show up as one cluster.
 *
 * @interface DrawingCluster
 */
export interface DrawingCluster {
  bbox: BBox;
  pathCount: number;
  hasFill: boolean;
  hasStroke: boolean;
}

/**
 * Axis-aligned ruling line (stroked line or rectangle edge)
 *
 * Input for the ruled-line table detector.
 *
 * @interface RulingSegment
 */
export interface RulingSegment {
  orientation: 'horizontal' | 'vertical';
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

/**
 * Everything the ingestion pipeline needs to know about one page
 *
 * Produced by a page source and never mutated afterwards. The raster is
 * owned by the page's processing and dropped once extraction completes.
 *
 * @interface PageRecord
 */
export interface PageRecord {
  /**
   * 1-based page number
   */
  pageNumber: number;

  /**
   * Page width in points
   */
  width: number;

  /**
   * Page height in points
   */
  height: number;

  /**
   * Text spans in content-stream order
   */
  spans: TextSpan[];

  images: ImageRegion[];
  drawings: DrawingCluster[];
  rulings: RulingSegment[];

  /**
   * Span texts joined by a single space
   */
  rawText: string;

  /**
   * Whether the native text layer carries more than a few characters.
   * Pages without one are sent through OCR.
   */
  hasTextLayer: boolean;

  /**
   * Rendered PNG bytes, null when rendering failed
   */
  raster: Buffer | null;
}
