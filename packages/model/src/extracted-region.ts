import type { BBox } from './geometry';

export type TableExtractionMethod = 'primary' | 'ocr-fallback';

/**
 * Table recovered from a page region
 *
 * @interface ExtractedTable
 */
export interface ExtractedTable {
  pageNumber: number;
  bbox: BBox;

  /**
   * Row-major cell texts; rows may have different lengths
   */
  rows: string[][];

  markdown: string;
  csv: string;
  method: TableExtractionMethod;
}

/**
 * Figure crop with its linked caption
 *
 * @interface ExtractedFigure
 */
export interface ExtractedFigure {
  pageNumber: number;
  bbox: BBox;

  /**
   * Cropped PNG bytes
   */
  image: Buffer;

  /**
   * Saved crop, relative to the resources directory
   */
  imagePath: string;

  /**
   * Nearest caption text, empty when the page has no caption
   */
  caption: string;

  /**
   * 1-based position among the page's accepted figure candidates
   */
  figureIndex: number;
}

/**
 * Recognized word or line returned by an OCR service
 *
 * Coordinates are pixels of the image handed to the service.
 *
 * @interface OcrBox
 */
export interface OcrBox {
  text: string;
  confidence: number;
  bbox: BBox;
}
