import type { BBox } from './geometry';

export type LayoutRole =
  | 'heading'
  | 'paragraph'
  | 'table'
  | 'figure'
  | 'caption'
  | 'footnote'
  | 'header'
  | 'footer'
  | 'other';

/**
 * Page region tagged with a semantic role
 *
 * @interface LayoutBlock
 */
export interface LayoutBlock {
  role: LayoutRole;
  bbox: BBox;

  /**
   * Source text, empty for image-only figures
   */
  text: string;

  pageNumber: number;

  /**
   * Classification confidence in [0, 1]; heuristic rules report 1
   */
  confidence: number;
}
