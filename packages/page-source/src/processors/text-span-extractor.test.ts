import { describe, expect, test } from 'vitest';

import { extractTextSpans, isBoldFontName } from './text-span-extractor';

const PAGE_HEIGHT = 800;

function item(
  str: string,
  x: number,
  baseline: number,
  size: number,
  width: number,
  fontName = 'g_d0_f1',
) {
  return {
    str,
    transform: [size, 0, 0, size, x, baseline],
    width,
    height: size,
    fontName,
  };
}

describe('isBoldFontName', () => {
  test('matches common bold naming', () => {
    expect(isBoldFontName('Arial-BoldMT')).toBe(true);
    expect(isBoldFontName('Frutiger-Black')).toBe(true);
    expect(isBoldFontName('MyriadPro-Bd')).toBe(true);
    expect(isBoldFontName('Helvetica')).toBe(false);
  });
});

describe('extractTextSpans', () => {
  test('flips the y axis and resolves font names', () => {
    const spans = extractTextSpans(
      [item('Table 1', 72, 650, 10, 30, 'g_d0_f2')],
      { g_d0_f2: { fontFamily: 'Arial-BoldMT' } },
      PAGE_HEIGHT,
    );

    expect(spans).toEqual([
      {
        text: 'Table 1',
        bbox: [72, 140, 102, 150],
        fontSize: 10,
        fontName: 'Arial-BoldMT',
        isBold: true,
      },
    ]);
  });

  test('prefers the resolver over style font families', () => {
    const spans = extractTextSpans(
      [item('Outlook', 72, 700, 12, 40)],
      { g_d0_f1: { fontFamily: 'sans-serif' } },
      PAGE_HEIGHT,
      (id) => (id === 'g_d0_f1' ? 'Helvetica' : undefined),
    );

    expect(spans[0].fontName).toBe('Helvetica');
    expect(spans[0].isBold).toBe(false);
  });

  test('joins runs on the same line with the same font', () => {
    const spans = extractTextSpans(
      [
        item('Revenue', 72, 700, 12, 42),
        item(' ', 114, 700, 12, 3),
        item('grew', 117, 700, 12, 24),
        item('Q', 72, 600, 12, 6),
        item('3', 78, 600, 12, 6),
      ],
      {},
      PAGE_HEIGHT,
    );

    expect(spans.map((s) => s.text)).toEqual(['Revenue grew', 'Q3']);
    expect(spans[0].bbox).toEqual([72, 88, 141, 100]);
  });

  test('keeps runs in different fonts apart', () => {
    const spans = extractTextSpans(
      [
        item('Summary', 72, 700, 12, 48, 'g_d0_f1'),
        item('text', 122, 700, 12, 24, 'g_d0_f3'),
      ],
      {},
      PAGE_HEIGHT,
    );

    expect(spans).toHaveLength(2);
  });

  test('derives font size from a rotated text matrix', () => {
    const spans = extractTextSpans(
      [
        {
          str: 'Axis',
          transform: [0, 10, -10, 0, 30, 400],
          width: 0,
          height: 0,
          fontName: 'f',
        },
      ],
      {},
      PAGE_HEIGHT,
    );

    expect(spans[0].fontSize).toBe(10);
    expect(spans[0].bbox).toEqual([30, 390, 50, 400]);
  });

  test('skips marked content and malformed items', () => {
    const spans = extractTextSpans(
      [
        { type: 'beginMarkedContent' },
        { str: 'short', transform: [1, 2] },
        null,
        item('Kept', 72, 500, 11, 20),
      ],
      undefined,
      PAGE_HEIGHT,
    );

    expect(spans.map((s) => s.text)).toEqual(['Kept']);
  });
});
