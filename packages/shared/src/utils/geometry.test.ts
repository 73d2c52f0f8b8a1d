import type { BBox } from '@ledgerlens/model';

import { describe, expect, test } from 'vitest';

import {
  bboxArea,
  bboxCentroid,
  bboxFromPoints,
  bboxUnion,
  bboxesTouch,
  centreInside,
  intersectionOverUnion,
} from './geometry';

describe('geometry', () => {
  test('bboxArea clamps inverted boxes to zero', () => {
    expect(bboxArea([0, 0, 10, 5])).toBe(50);
    expect(bboxArea([10, 0, 0, 5])).toBe(0);
  });

  test('bboxUnion covers both boxes', () => {
    expect(bboxUnion([0, 5, 10, 10], [5, 0, 20, 8])).toEqual([0, 0, 20, 10]);
  });

  test('bboxFromPoints returns null without points', () => {
    expect(bboxFromPoints([])).toBeNull();
    expect(
      bboxFromPoints([
        [3, 9],
        [1, 4],
        [7, 2],
      ]),
    ).toEqual([1, 2, 7, 9]);
  });

  test('bboxCentroid is the box midpoint', () => {
    expect(bboxCentroid([0, 0, 10, 20])).toEqual([5, 10]);
  });

  describe('intersectionOverUnion', () => {
    test('is 1 for identical boxes', () => {
      const box: BBox = [10, 10, 30, 30];
      expect(intersectionOverUnion(box, box)).toBe(1);
    });

    test('is 0 for disjoint boxes', () => {
      expect(intersectionOverUnion([0, 0, 10, 10], [20, 20, 30, 30])).toBe(0);
    });

    test('is 0.5 when the overlap is two thirds of each box', () => {
      // 30x10 boxes sharing a 20x10 strip: 200 / (300 + 300 - 200)
      expect(intersectionOverUnion([0, 0, 30, 10], [10, 0, 40, 10])).toBe(0.5);
    });

    test('is 0 for zero-area boxes', () => {
      expect(intersectionOverUnion([5, 5, 5, 5], [5, 5, 5, 5])).toBe(0);
    });
  });

  test('bboxesTouch honours the gap tolerance', () => {
    expect(bboxesTouch([0, 0, 10, 10], [15, 0, 20, 10])).toBe(false);
    expect(bboxesTouch([0, 0, 10, 10], [15, 0, 20, 10], 5)).toBe(true);
  });

  test('centreInside checks the centre point only', () => {
    expect(centreInside([0, 0, 10, 10], [4, 4, 100, 100])).toBe(true);
    expect(centreInside([0, 0, 6, 6], [4, 4, 100, 100])).toBe(false);
  });
});
