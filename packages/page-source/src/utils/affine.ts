/** 6-element affine transform `[a, b, c, d, e, f]` */
export type Matrix = [number, number, number, number, number, number];

export const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];

/**
 * Concatenate `m` onto `ctm` the way a PDF `cm` operator does.
 */
export function concat(ctm: Matrix, m: Matrix): Matrix {
  return [
    ctm[0] * m[0] + ctm[2] * m[1],
    ctm[1] * m[0] + ctm[3] * m[1],
    ctm[0] * m[2] + ctm[2] * m[3],
    ctm[1] * m[2] + ctm[3] * m[3],
    ctm[0] * m[4] + ctm[2] * m[5] + ctm[4],
    ctm[1] * m[4] + ctm[3] * m[5] + ctm[5],
  ];
}

export function applyToPoint(
  m: Matrix,
  x: number,
  y: number,
): [number, number] {
  return [m[0] * x + m[2] * y + m[4], m[1] * x + m[3] * y + m[5]];
}

/**
 * Read a matrix out of an operator argument, or null if it is not one.
 */
export function toMatrix(value: unknown): Matrix | null {
  const numbers = toNumberArray(value);
  if (!numbers || numbers.length < 6) {
    return null;
  }
  const [a, b, c, d, e, f] = numbers;
  return [a, b, c, d, e, f];
}

/**
 * Narrow an operator argument to a list of finite numbers.
 */
export function toNumberArray(value: unknown): number[] | null {
  let items: unknown[];
  if (Array.isArray(value)) {
    items = value;
  } else if (value instanceof Float32Array || value instanceof Float64Array) {
    items = Array.from(value);
  } else {
    return null;
  }
  const numbers: number[] = [];
  for (const item of items) {
    if (typeof item !== 'number' || !Number.isFinite(item)) {
      return null;
    }
    numbers.push(item);
  }
  return numbers;
}
