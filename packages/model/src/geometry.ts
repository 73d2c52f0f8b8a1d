/**
 * Axis-aligned bounding box `[x0, y0, x1, y1]` in PDF points.
 *
 * Origin is the top-left corner of the page; y grows downward.
 */
export type BBox = [x0: number, y0: number, x1: number, y1: number];
