import type { BBox, ImageRegion, RulingSegment } from '@ledgerlens/model';

import { bboxFromPoints, bboxHeight, bboxWidth } from '@ledgerlens/shared';

import {
  IDENTITY,
  type Matrix,
  applyToPoint,
  concat,
  toMatrix,
  toNumberArray,
} from '../utils/affine';

/**
 * pdfjs-dist (v4) operator codes read by the parser
 */
export const PDF_OPS = {
  save: 10,
  restore: 11,
  transform: 12,
  moveTo: 13,
  lineTo: 14,
  curveTo: 15,
  curveTo2: 16,
  curveTo3: 17,
  closePath: 18,
  rectangle: 19,
  stroke: 20,
  closeStroke: 21,
  fill: 22,
  eoFill: 23,
  fillStroke: 24,
  eoFillStroke: 25,
  closeFillStroke: 26,
  closeEOFillStroke: 27,
  endPath: 28,
  paintFormXObjectBegin: 74,
  paintFormXObjectEnd: 75,
  paintJpegXObject: 82,
  paintImageXObject: 85,
  paintInlineImageXObject: 86,
  constructPath: 91,
} as const;

/**
 * Paths narrower or shorter than this (points) are treated as hairlines
 */
export const HAIRLINE_THRESHOLD = 2;

/** Lines shorter than this are not considered rulings */
const MIN_RULING_LENGTH = 3;

/** Slack when deciding a line is horizontal or vertical */
const AXIS_TOLERANCE = 1;

/**
 * One painted path with its bounds in page space
 */
export interface DrawingPath {
  bbox: BBox;
  hasFill: boolean;
  hasStroke: boolean;
}

/**
 * Geometry collected from a page's operator list
 */
export interface PageGeometry {
  images: ImageRegion[];
  paths: DrawingPath[];
  rulings: RulingSegment[];
}

/**
 * Structural subset of pdfjs' PDFOperatorList
 */
export interface OperatorListLike {
  fnArray: ArrayLike<number>;
  argsArray: ArrayLike<unknown>;
}

type Point = [number, number];

interface PendingPath {
  points: Point[];
  lines: Array<[Point, Point]>;
}

const PAINT_OPS: ReadonlyMap<number, { fill: boolean; stroke: boolean }> =
  new Map([
    [PDF_OPS.stroke, { fill: false, stroke: true }],
    [PDF_OPS.closeStroke, { fill: false, stroke: true }],
    [PDF_OPS.fill, { fill: true, stroke: false }],
    [PDF_OPS.eoFill, { fill: true, stroke: false }],
    [PDF_OPS.fillStroke, { fill: true, stroke: true }],
    [PDF_OPS.eoFillStroke, { fill: true, stroke: true }],
    [PDF_OPS.closeFillStroke, { fill: true, stroke: true }],
    [PDF_OPS.closeEOFillStroke, { fill: true, stroke: true }],
  ]);

/** Coordinates consumed by each sub-operation of constructPath */
const PATH_ARG_COUNT: ReadonlyMap<number, number> = new Map([
  [PDF_OPS.moveTo, 2],
  [PDF_OPS.lineTo, 2],
  [PDF_OPS.curveTo, 6],
  [PDF_OPS.curveTo2, 4],
  [PDF_OPS.curveTo3, 4],
  [PDF_OPS.closePath, 0],
  [PDF_OPS.rectangle, 4],
]);

function toRuling(from: Point, to: Point): RulingSegment | null {
  const dx = Math.abs(to[0] - from[0]);
  const dy = Math.abs(to[1] - from[1]);
  if (dy <= AXIS_TOLERANCE && dx >= MIN_RULING_LENGTH) {
    const y = (from[1] + to[1]) / 2;
    return {
      orientation: 'horizontal',
      x0: Math.min(from[0], to[0]),
      y0: y,
      x1: Math.max(from[0], to[0]),
      y1: y,
    };
  }
  if (dx <= AXIS_TOLERANCE && dy >= MIN_RULING_LENGTH) {
    const x = (from[0] + to[0]) / 2;
    return {
      orientation: 'vertical',
      x0: x,
      y0: Math.min(from[1], to[1]),
      x1: x,
      y1: Math.max(from[1], to[1]),
    };
  }
  return null;
}

/**
 * A filled sliver is drawn as a line; report its centre line.
 */
function sliverRuling(bbox: BBox): RulingSegment | null {
  const width = bboxWidth(bbox);
  const height = bboxHeight(bbox);
  if (height < HAIRLINE_THRESHOLD && width >= MIN_RULING_LENGTH) {
    const y = (bbox[1] + bbox[3]) / 2;
    return {
      orientation: 'horizontal',
      x0: bbox[0],
      y0: y,
      x1: bbox[2],
      y1: y,
    };
  }
  if (width < HAIRLINE_THRESHOLD && height >= MIN_RULING_LENGTH) {
    const x = (bbox[0] + bbox[2]) / 2;
    return {
      orientation: 'vertical',
      x0: x,
      y0: bbox[1],
      x1: x,
      y1: bbox[3],
    };
  }
  return null;
}

function imagePixelSize(op: number, args: unknown): [number, number] {
  if (!Array.isArray(args)) {
    return [0, 0];
  }
  if (op === PDF_OPS.paintInlineImageXObject) {
    const data: unknown = args[0];
    if (typeof data === 'object' && data !== null) {
      const width = 'width' in data ? data.width : 0;
      const height = 'height' in data ? data.height : 0;
      return [
        typeof width === 'number' ? width : 0,
        typeof height === 'number' ? height : 0,
      ];
    }
    return [0, 0];
  }
  const width: unknown = args[1];
  const height: unknown = args[2];
  return [
    typeof width === 'number' ? width : 0,
    typeof height === 'number' ? height : 0,
  ];
}

/**
 * Walk a pdfjs operator list and collect image placements, painted paths and
 * axis-aligned rulings in top-left page coordinates.
 *
 * Tracks the current transformation matrix through save/restore, `cm` and
 * form XObjects. Path construction is accepted both as the packed
 * `constructPath` operator and as individual path operators. A path is
 * committed by the paint operator that follows it; `endPath` (clipping paths)
 * discards it.
 */
export function parseOperatorList(
  operatorList: OperatorListLike,
  pageHeight: number,
): PageGeometry {
  const geometry: PageGeometry = { images: [], paths: [], rulings: [] };
  const stack: Matrix[] = [];
  let ctm: Matrix = IDENTITY;
  let pending: PendingPath = { points: [], lines: [] };
  let current: Point | null = null;
  let subpathStart: Point | null = null;

  const toPage = (x: number, y: number): Point => {
    const [px, py] = applyToPoint(ctm, x, y);
    return [px, pageHeight - py];
  };

  const addLine = (from: Point | null, to: Point): void => {
    if (from) {
      pending.lines.push([from, to]);
    }
  };

  const pathOp = (op: number, coords: number[]): void => {
    switch (op) {
      case PDF_OPS.moveTo: {
        current = toPage(coords[0], coords[1]);
        subpathStart = current;
        pending.points.push(current);
        break;
      }
      case PDF_OPS.lineTo: {
        const point = toPage(coords[0], coords[1]);
        addLine(current, point);
        pending.points.push(point);
        current = point;
        break;
      }
      case PDF_OPS.curveTo:
      case PDF_OPS.curveTo2:
      case PDF_OPS.curveTo3: {
        for (let i = 0; i + 1 < coords.length; i += 2) {
          pending.points.push(toPage(coords[i], coords[i + 1]));
        }
        current = toPage(coords[coords.length - 2], coords[coords.length - 1]);
        break;
      }
      case PDF_OPS.closePath: {
        if (current && subpathStart) {
          addLine(current, subpathStart);
          current = subpathStart;
        }
        break;
      }
      case PDF_OPS.rectangle: {
        const [x, y, w, h] = coords;
        const corners: Point[] = [
          toPage(x, y),
          toPage(x + w, y),
          toPage(x + w, y + h),
          toPage(x, y + h),
        ];
        pending.points.push(...corners);
        for (let i = 0; i < 4; i++) {
          pending.lines.push([corners[i], corners[(i + 1) % 4]]);
        }
        current = corners[0];
        subpathStart = corners[0];
        break;
      }
    }
  };

  const paint = (fill: boolean, stroke: boolean): void => {
    const bbox = bboxFromPoints(pending.points);
    if (bbox) {
      if (stroke) {
        for (const [from, to] of pending.lines) {
          const ruling = toRuling(from, to);
          if (ruling) geometry.rulings.push(ruling);
        }
      } else {
        const ruling = sliverRuling(bbox);
        if (ruling) geometry.rulings.push(ruling);
      }

      if (
        bboxWidth(bbox) >= HAIRLINE_THRESHOLD &&
        bboxHeight(bbox) >= HAIRLINE_THRESHOLD
      ) {
        geometry.paths.push({ bbox, hasFill: fill, hasStroke: stroke });
      }
    }
    pending = { points: [], lines: [] };
    current = null;
    subpathStart = null;
  };

  const count = Math.min(
    operatorList.fnArray.length,
    operatorList.argsArray.length,
  );
  for (let i = 0; i < count; i++) {
    const op = operatorList.fnArray[i];
    const args = operatorList.argsArray[i];

    const paintMode = PAINT_OPS.get(op);
    if (paintMode) {
      if (op === PDF_OPS.closeStroke || op === PDF_OPS.closeFillStroke) {
        pathOp(PDF_OPS.closePath, []);
      }
      paint(paintMode.fill, paintMode.stroke);
      continue;
    }

    const argCount = PATH_ARG_COUNT.get(op);
    if (argCount !== undefined) {
      const coords = argCount === 0 ? [] : toNumberArray(args);
      if (coords && coords.length >= argCount) {
        pathOp(op, coords);
      }
      continue;
    }

    switch (op) {
      case PDF_OPS.save:
        stack.push(ctm);
        break;
      case PDF_OPS.restore:
        ctm = stack.pop() ?? ctm;
        break;
      case PDF_OPS.transform: {
        const matrix = toMatrix(args);
        if (matrix) ctm = concat(ctm, matrix);
        break;
      }
      case PDF_OPS.paintFormXObjectBegin: {
        stack.push(ctm);
        const matrix = Array.isArray(args) ? toMatrix(args[0]) : null;
        if (matrix) ctm = concat(ctm, matrix);
        break;
      }
      case PDF_OPS.paintFormXObjectEnd:
        ctm = stack.pop() ?? ctm;
        break;
      case PDF_OPS.constructPath: {
        if (!Array.isArray(args)) break;
        const subOps = toNumberArray(args[0]);
        const coords = toNumberArray(args[1]);
        if (!subOps || !coords) break;
        let offset = 0;
        for (const subOp of subOps) {
          const n = PATH_ARG_COUNT.get(subOp) ?? 0;
          if (offset + n > coords.length) break;
          pathOp(subOp, coords.slice(offset, offset + n));
          offset += n;
        }
        break;
      }
      case PDF_OPS.endPath:
        pending = { points: [], lines: [] };
        current = null;
        subpathStart = null;
        break;
      case PDF_OPS.paintImageXObject:
      case PDF_OPS.paintJpegXObject:
      case PDF_OPS.paintInlineImageXObject: {
        const bbox = bboxFromPoints([
          toPage(0, 0),
          toPage(1, 0),
          toPage(0, 1),
          toPage(1, 1),
        ]);
        if (bbox) {
          const [width, height] = imagePixelSize(op, args);
          geometry.images.push({ bbox, width, height });
        }
        break;
      }
    }
  }

  return geometry;
}
