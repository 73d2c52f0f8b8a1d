import { describe, expect, test } from 'vitest';

import {
  IDENTITY,
  applyToPoint,
  concat,
  toMatrix,
  toNumberArray,
} from './affine';

describe('affine', () => {
  test('concat with identity is a no-op', () => {
    expect(concat(IDENTITY, [2, 0, 0, 3, 10, 20])).toEqual([
      2, 0, 0, 3, 10, 20,
    ]);
  });

  test('concat applies the new matrix inside the current one', () => {
    const ctm = concat([2, 0, 0, 2, 0, 0], [1, 0, 0, 1, 5, 5]);

    expect(applyToPoint(ctm, 0, 0)).toEqual([10, 10]);
    expect(applyToPoint(ctm, 1, 1)).toEqual([12, 12]);
  });

  test('toMatrix rejects short or non-numeric input', () => {
    expect(toMatrix([1, 0, 0, 1, 0])).toBeNull();
    expect(toMatrix(['1', 0, 0, 1, 0, 0])).toBeNull();
    expect(toMatrix(new Float32Array([1, 0, 0, 1, 4, 8]))).toEqual([
      1, 0, 0, 1, 4, 8,
    ]);
  });

  test('toNumberArray returns null for non-arrays', () => {
    expect(toNumberArray({ length: 2 })).toBeNull();
    expect(toNumberArray([1, Number.NaN])).toBeNull();
    expect(toNumberArray([])).toEqual([]);
  });
});
