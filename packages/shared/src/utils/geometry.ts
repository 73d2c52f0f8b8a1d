import type { BBox } from '@ledgerlens/model';

export function bboxWidth(bbox: BBox): number {
  return Math.max(0, bbox[2] - bbox[0]);
}

export function bboxHeight(bbox: BBox): number {
  return Math.max(0, bbox[3] - bbox[1]);
}

export function bboxArea(bbox: BBox): number {
  return bboxWidth(bbox) * bboxHeight(bbox);
}

export function bboxUnion(a: BBox, b: BBox): BBox {
  return [
    Math.min(a[0], b[0]),
    Math.min(a[1], b[1]),
    Math.max(a[2], b[2]),
    Math.max(a[3], b[3]),
  ];
}

/**
 * Smallest box containing every point, or null for no points.
 */
export function bboxFromPoints(
  points: ReadonlyArray<readonly [number, number]>,
): BBox | null {
  if (points.length === 0) {
    return null;
  }
  let [x0, y0] = points[0];
  let [x1, y1] = points[0];
  for (const [x, y] of points) {
    x0 = Math.min(x0, x);
    y0 = Math.min(y0, y);
    x1 = Math.max(x1, x);
    y1 = Math.max(y1, y);
  }
  return [x0, y0, x1, y1];
}

export function bboxCentroid(bbox: BBox): [number, number] {
  return [(bbox[0] + bbox[2]) / 2, (bbox[1] + bbox[3]) / 2];
}

/**
 * Intersection-over-union of two boxes; 0 when the union is empty.
 */
export function intersectionOverUnion(a: BBox, b: BBox): number {
  const ix0 = Math.max(a[0], b[0]);
  const iy0 = Math.max(a[1], b[1]);
  const ix1 = Math.min(a[2], b[2]);
  const iy1 = Math.min(a[3], b[3]);
  const intersection = Math.max(0, ix1 - ix0) * Math.max(0, iy1 - iy0);
  const union = bboxArea(a) + bboxArea(b) - intersection;
  return union > 0 ? intersection / union : 0;
}

/**
 * Whether two boxes overlap once `gap` is added around `b`.
 */
export function bboxesTouch(a: BBox, b: BBox, gap = 0): boolean {
  return (
    a[0] <= b[2] + gap &&
    a[2] >= b[0] - gap &&
    a[1] <= b[3] + gap &&
    a[3] >= b[1] - gap
  );
}

/**
 * Whether the box's centre lies inside `container` (edges inclusive).
 */
export function centreInside(bbox: BBox, container: BBox): boolean {
  const [cx, cy] = bboxCentroid(bbox);
  return (
    cx >= container[0] &&
    cx <= container[2] &&
    cy >= container[1] &&
    cy <= container[3]
  );
}
