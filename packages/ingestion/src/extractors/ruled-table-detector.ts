import type { BBox, RulingSegment, TextSpan } from '@ledgerlens/model';

import { bboxCentroid } from '@ledgerlens/shared';

/**
 * Table grid found from ruling lines, before row/column minimums
 */
export interface RuledTable {
  bbox: BBox;
  rows: string[][];
}

export interface RuledTableDetectorOptions {
  /**
   * Rulings this close (points) are treated as the same line and as
   * touching (default: 3)
   */
  tolerance?: number;
}

interface Line {
  /** y for horizontal lines, x for vertical lines */
  position: number;
  start: number;
  end: number;
}

/**
 * Cluster nearby coordinates and map each to its cluster mean.
 */
function snapPositions(
  values: readonly number[],
  tolerance: number,
): Map<number, number> {
  const sorted = [...new Set(values)].sort((a, b) => a - b);
  const snapped = new Map<number, number>();
  let cluster: number[] = [];

  const flush = () => {
    const mean = cluster.reduce((sum, v) => sum + v, 0) / cluster.length;
    for (const value of cluster) snapped.set(value, mean);
    cluster = [];
  };

  for (const value of sorted) {
    const last = cluster.at(-1);
    if (last !== undefined && value - last > tolerance) {
      flush();
    }
    cluster.push(value);
  }
  if (cluster.length > 0) flush();
  return snapped;
}

function toLines(
  rulings: readonly RulingSegment[],
  orientation: RulingSegment['orientation'],
  tolerance: number,
): Line[] {
  const selected = rulings.filter((r) => r.orientation === orientation);
  const horizontal = orientation === 'horizontal';
  const snapped = snapPositions(
    selected.map((r) => (horizontal ? r.y0 : r.x0)),
    tolerance,
  );
  return selected.map((r) => {
    const raw = horizontal ? r.y0 : r.x0;
    return {
      position: snapped.get(raw) ?? raw,
      start: horizontal ? r.x0 : r.y0,
      end: horizontal ? r.x1 : r.y1,
    };
  });
}

function crosses(h: Line, v: Line, tolerance: number): boolean {
  return (
    v.position >= h.start - tolerance &&
    v.position <= h.end + tolerance &&
    h.position >= v.start - tolerance &&
    h.position <= v.end + tolerance
  );
}

function uniqueSorted(values: readonly number[]): number[] {
  return [...new Set(values)].sort((a, b) => a - b);
}

/**
 * Index of the interval of `edges` containing `value`, or -1.
 */
function intervalIndex(edges: readonly number[], value: number): number {
  for (let i = 0; i + 1 < edges.length; i++) {
    if (value >= edges[i] && value < edges[i + 1]) {
      return i;
    }
  }
  return -1;
}

/**
 * Detect ruled tables from a page's horizontal and vertical rulings.
 *
 * Rulings are snapped together, then grouped into connected grids: a
 * horizontal and a vertical line are connected when they cross. A grid with
 * at least two lines in each direction becomes a table whose cell edges are
 * its distinct line positions. Each span is placed in the cell containing
 * its centre; rows without any text are dropped.
 */
export function detectRuledTables(
  rulings: readonly RulingSegment[],
  spans: readonly TextSpan[],
  options: RuledTableDetectorOptions = {},
): RuledTable[] {
  const tolerance = options.tolerance ?? 3;
  const horizontals = toLines(rulings, 'horizontal', tolerance);
  const verticals = toLines(rulings, 'vertical', tolerance);
  if (horizontals.length < 2 || verticals.length < 2) {
    return [];
  }

  // Union-find over horizontals (0..h-1) then verticals (h..h+v-1)
  const parent = Array.from(
    { length: horizontals.length + verticals.length },
    (_, i) => i,
  );
  const find = (i: number): number => {
    while (parent[i] !== i) {
      parent[i] = parent[parent[i]];
      i = parent[i];
    }
    return i;
  };
  horizontals.forEach((h, hi) => {
    verticals.forEach((v, vi) => {
      if (crosses(h, v, tolerance)) {
        parent[find(hi)] = find(horizontals.length + vi);
      }
    });
  });

  const groups = new Map<number, { h: Line[]; v: Line[] }>();
  const groupOf = (index: number) => {
    const root = find(index);
    const group = groups.get(root) ?? { h: [], v: [] };
    groups.set(root, group);
    return group;
  };
  horizontals.forEach((h, hi) => groupOf(hi).h.push(h));
  verticals.forEach((v, vi) => groupOf(horizontals.length + vi).v.push(v));

  const tables: RuledTable[] = [];
  for (const group of groups.values()) {
    if (group.h.length < 2 || group.v.length < 2) {
      continue;
    }
    const ys = uniqueSorted(group.h.map((line) => line.position));
    const xs = uniqueSorted(group.v.map((line) => line.position));
    if (ys.length < 2 || xs.length < 2) {
      continue;
    }

    const cells: string[][][] = Array.from({ length: ys.length - 1 }, () =>
      Array.from({ length: xs.length - 1 }, () => []),
    );
    for (const span of spans) {
      const [cx, cy] = bboxCentroid(span.bbox);
      const row = intervalIndex(ys, cy);
      const col = intervalIndex(xs, cx);
      if (row >= 0 && col >= 0) {
        cells[row][col].push(span.text.trim());
      }
    }

    const rows = cells
      .map((row) => row.map((texts) => texts.filter(Boolean).join(' ')))
      .filter((row) => row.some((text) => text.length > 0));

    tables.push({
      bbox: [xs[0], ys[0], xs[xs.length - 1], ys[ys.length - 1]],
      rows,
    });
  }

  return tables.sort((a, b) => a.bbox[1] - b.bbox[1] || a.bbox[0] - b.bbox[0]);
}
