import { describe, expect, test } from 'vitest';

import { PDF_OPS, parseOperatorList } from './operator-list-parser';

const PAGE_HEIGHT = 800;

function opList(...entries: Array<[number, unknown]>) {
  return {
    fnArray: entries.map(([op]) => op),
    argsArray: entries.map(([, args]) => args),
  };
}

describe('parseOperatorList', () => {
  test('places images through the current transform', () => {
    const geometry = parseOperatorList(
      opList(
        [PDF_OPS.save, null],
        [PDF_OPS.transform, [100, 0, 0, 50, 20, 30]],
        [PDF_OPS.paintImageXObject, ['img_p0_1', 400, 200]],
        [PDF_OPS.restore, null],
      ),
      PAGE_HEIGHT,
    );

    expect(geometry.images).toEqual([
      { bbox: [20, 720, 120, 770], width: 400, height: 200 },
    ]);
  });

  test('restore drops transforms made after save', () => {
    const geometry = parseOperatorList(
      opList(
        [PDF_OPS.save, null],
        [PDF_OPS.transform, [2, 0, 0, 2, 0, 0]],
        [PDF_OPS.restore, null],
        [PDF_OPS.paintJpegXObject, ['img_p0_2', 8, 8]],
      ),
      PAGE_HEIGHT,
    );

    expect(geometry.images[0].bbox).toEqual([0, 799, 1, 800]);
  });

  test('form XObjects apply their matrix until they end', () => {
    const geometry = parseOperatorList(
      opList(
        [PDF_OPS.paintFormXObjectBegin, [[1, 0, 0, 1, 100, 100], null]],
        [PDF_OPS.save, null],
        [PDF_OPS.transform, [10, 0, 0, 10, 0, 0]],
        [PDF_OPS.paintInlineImageXObject, [{ width: 32, height: 16 }]],
        [PDF_OPS.restore, null],
        [PDF_OPS.paintFormXObjectEnd, []],
        [PDF_OPS.paintImageXObject, ['img_p0_3', 1, 1]],
      ),
      PAGE_HEIGHT,
    );

    expect(geometry.images).toEqual([
      { bbox: [100, 690, 110, 700], width: 32, height: 16 },
      { bbox: [0, 799, 1, 800], width: 1, height: 1 },
    ]);
  });

  test('stroked rectangles yield a path and four rulings', () => {
    const geometry = parseOperatorList(
      opList(
        [PDF_OPS.constructPath, [[PDF_OPS.rectangle], [10, 10, 100, 50], []]],
        [PDF_OPS.stroke, null],
      ),
      PAGE_HEIGHT,
    );

    expect(geometry.paths).toEqual([
      { bbox: [10, 740, 110, 790], hasFill: false, hasStroke: true },
    ]);
    expect(geometry.rulings).toEqual([
      { orientation: 'horizontal', x0: 10, y0: 790, x1: 110, y1: 790 },
      { orientation: 'vertical', x0: 110, y0: 740, x1: 110, y1: 790 },
      { orientation: 'horizontal', x0: 10, y0: 740, x1: 110, y1: 740 },
      { orientation: 'vertical', x0: 10, y0: 740, x1: 10, y1: 790 },
    ]);
  });

  test('endPath discards clipping paths', () => {
    const geometry = parseOperatorList(
      opList(
        [PDF_OPS.constructPath, [[PDF_OPS.rectangle], [0, 0, 300, 300], []]],
        [PDF_OPS.endPath, null],
        [PDF_OPS.fill, null],
      ),
      PAGE_HEIGHT,
    );

    expect(geometry.paths).toEqual([]);
    expect(geometry.rulings).toEqual([]);
  });

  test('filled slivers become rulings but not drawing paths', () => {
    const geometry = parseOperatorList(
      opList(
        [PDF_OPS.constructPath, [[PDF_OPS.rectangle], [50, 100, 200, 1], []]],
        [PDF_OPS.fill, null],
      ),
      PAGE_HEIGHT,
    );

    expect(geometry.paths).toEqual([]);
    expect(geometry.rulings).toEqual([
      { orientation: 'horizontal', x0: 50, y0: 699.5, x1: 250, y1: 699.5 },
    ]);
  });

  test('accepts individual path operators', () => {
    const geometry = parseOperatorList(
      opList(
        [PDF_OPS.moveTo, [0, 0]],
        [PDF_OPS.lineTo, [0, 100]],
        [PDF_OPS.stroke, null],
      ),
      PAGE_HEIGHT,
    );

    expect(geometry.paths).toEqual([]);
    expect(geometry.rulings).toEqual([
      { orientation: 'vertical', x0: 0, y0: 700, x1: 0, y1: 800 },
    ]);
  });

  test('curves extend the path bounds and closePath adds the closing edge', () => {
    const geometry = parseOperatorList(
      opList(
        [
          PDF_OPS.constructPath,
          [
            [PDF_OPS.moveTo, PDF_OPS.curveTo, PDF_OPS.closePath],
            [0, 0, 10, 20, 30, 20, 40, 0],
            [],
          ],
        ],
        [PDF_OPS.fillStroke, null],
      ),
      PAGE_HEIGHT,
    );

    expect(geometry.paths).toEqual([
      { bbox: [0, 780, 40, 800], hasFill: true, hasStroke: true },
    ]);
    expect(geometry.rulings).toEqual([
      { orientation: 'horizontal', x0: 0, y0: 800, x1: 40, y1: 800 },
    ]);
  });

  test('ignores malformed arguments', () => {
    const geometry = parseOperatorList(
      opList(
        [PDF_OPS.transform, ['a', 'b']],
        [PDF_OPS.constructPath, 'not-an-array'],
        [PDF_OPS.lineTo, null],
        [PDF_OPS.stroke, null],
        [PDF_OPS.paintImageXObject, null],
      ),
      PAGE_HEIGHT,
    );

    expect(geometry.paths).toEqual([]);
    expect(geometry.images).toEqual([
      { bbox: [0, 799, 1, 800], width: 0, height: 0 },
    ]);
  });
});
