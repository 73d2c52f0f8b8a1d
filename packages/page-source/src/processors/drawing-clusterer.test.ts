import type { BBox } from '@ledgerlens/model';

import { describe, expect, test } from 'vitest';

import type { DrawingPath } from './operator-list-parser';

import { clusterDrawingPaths } from './drawing-clusterer';

function bar(bbox: BBox, hasFill = true): DrawingPath {
  return { bbox, hasFill, hasStroke: !hasFill };
}

describe('clusterDrawingPaths', () => {
  test('returns nothing below the minimum path count', () => {
    const paths = [bar([0, 0, 10, 10]), bar([12, 0, 20, 10])];

    expect(clusterDrawingPaths(paths)).toEqual([]);
  });

  test('merges bars within the gap into one cluster', () => {
    const paths = [
      bar([100, 100, 110, 200]),
      bar([115, 120, 125, 200]),
      bar([130, 90, 140, 200]),
      bar([145, 150, 155, 200]),
      bar([100, 200, 160, 201.5], false),
    ];

    expect(clusterDrawingPaths(paths)).toEqual([
      {
        bbox: [100, 90, 160, 201.5],
        pathCount: 5,
        hasFill: true,
        hasStroke: true,
      },
    ]);
  });

  test('keeps distant groups apart', () => {
    const paths = [
      bar([0, 0, 10, 10]),
      bar([15, 0, 25, 10]),
      bar([30, 0, 40, 10]),
      bar([400, 400, 410, 410]),
      bar([412, 400, 420, 410]),
    ];

    const clusters = clusterDrawingPaths(paths);

    expect(clusters.map((c) => c.pathCount)).toEqual([3, 2]);
    expect(clusters[1].bbox).toEqual([400, 400, 420, 410]);
  });

  test('joins the first matching cluster only', () => {
    const paths = [
      bar([0, 0, 10, 10]),
      bar([100, 0, 110, 10]),
      bar([50, 0, 60, 10]),
      bar([18, 0, 92, 10]),
      bar([500, 500, 510, 510]),
    ];

    const clusters = clusterDrawingPaths(paths, { gap: 10 });

    expect(clusters.map((c) => c.pathCount)).toEqual([2, 1, 1, 1]);
    expect(clusters[0].bbox).toEqual([0, 0, 92, 10]);
  });

  test('respects a custom minimum', () => {
    expect(
      clusterDrawingPaths([bar([0, 0, 10, 10])], { minPaths: 1 }),
    ).toHaveLength(1);
  });
});
