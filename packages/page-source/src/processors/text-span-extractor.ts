import type { TextSpan } from '@ledgerlens/model';

import { toNumberArray } from '../utils/affine';

/**
 * Structural subset of a pdfjs TextItem
 */
interface PdfTextItem {
  str: string;
  transform: number[];
  width: number;
  height: number;
  fontName: string;
}

/**
 * Resolves a pdfjs internal font id (e.g. "g_d0_f2") to the font's real name
 */
export type FontNameResolver = (fontId: string) => string | undefined;

/** Baselines closer than this fraction of the font size share a line */
const SAME_LINE_RATIO = 0.2;

/** Horizontal gaps below this fraction of the font size need no space */
const TIGHT_GAP_RATIO = 0.15;

/** Larger gaps start a new span */
const MAX_JOIN_GAP_RATIO = 1;

const BOLD_PATTERN = /bold|black|heavy|semibold|demi|-bd\b|bd$/i;

export function isBoldFontName(fontName: string): boolean {
  return BOLD_PATTERN.test(fontName);
}

function toTextItem(value: unknown): PdfTextItem | null {
  if (typeof value !== 'object' || value === null || !('str' in value)) {
    return null;
  }
  const { str } = value;
  const transform =
    'transform' in value ? toNumberArray(value.transform) : null;
  if (typeof str !== 'string' || !transform || transform.length < 6) {
    return null;
  }
  const width = 'width' in value ? value.width : 0;
  const height = 'height' in value ? value.height : 0;
  const fontName = 'fontName' in value ? value.fontName : '';
  return {
    str,
    transform,
    width: typeof width === 'number' ? width : 0,
    height: typeof height === 'number' ? height : 0,
    fontName: typeof fontName === 'string' ? fontName : '',
  };
}

function styleFontFamily(styles: unknown, fontId: string): string | undefined {
  if (typeof styles !== 'object' || styles === null || !(fontId in styles)) {
    return undefined;
  }
  const style: unknown = Reflect.get(styles, fontId);
  if (typeof style === 'object' && style !== null && 'fontFamily' in style) {
    return typeof style.fontFamily === 'string' ? style.fontFamily : undefined;
  }
  return undefined;
}

/**
 * Convert pdfjs text content into spans with top-left bounding boxes.
 *
 * Consecutive items on the same baseline with the same font are joined into
 * one span so a heading split into several runs is classified once.
 *
 * @param items - `TextContent.items` from `page.getTextContent()`
 * @param styles - `TextContent.styles`, used when the resolver has no name
 * @param pageHeight - Page height in points, for flipping the y axis
 * @param resolveFontName - Looks up the loaded font's real name
 */
export function extractTextSpans(
  items: readonly unknown[],
  styles: unknown,
  pageHeight: number,
  resolveFontName: FontNameResolver = () => undefined,
): TextSpan[] {
  const spans: TextSpan[] = [];
  let previous: { span: TextSpan; baseline: number; fontId: string } | null =
    null;

  for (const raw of items) {
    const item = toTextItem(raw);
    if (!item || item.str.trim().length === 0) {
      continue;
    }

    const [a, b, , , x, baseline] = item.transform;
    const fontSize = Math.hypot(a, b);
    if (fontSize <= 0) {
      continue;
    }

    const height = item.height || fontSize;
    const width = item.width || item.str.length * fontSize * 0.5;
    const fontName =
      resolveFontName(item.fontName) ??
      styleFontFamily(styles, item.fontName) ??
      '';

    if (
      previous &&
      previous.fontId === item.fontName &&
      Math.abs(previous.baseline - baseline) <= fontSize * SAME_LINE_RATIO
    ) {
      const gap = x - previous.span.bbox[2];
      if (
        gap >= -fontSize * TIGHT_GAP_RATIO &&
        gap <= fontSize * MAX_JOIN_GAP_RATIO
      ) {
        const span = previous.span;
        const separator = gap > fontSize * TIGHT_GAP_RATIO ? ' ' : '';
        span.text = `${span.text}${separator}${item.str.trim()}`;
        span.bbox = [
          span.bbox[0],
          Math.min(span.bbox[1], pageHeight - baseline - height),
          Math.max(span.bbox[2], x + width),
          span.bbox[3],
        ];
        continue;
      }
    }

    const span: TextSpan = {
      text: item.str.trim(),
      bbox: [
        x,
        pageHeight - baseline - height,
        x + width,
        pageHeight - baseline,
      ],
      fontSize,
      fontName,
      isBold: isBoldFontName(fontName),
    };
    spans.push(span);
    previous = { span, baseline, fontId: item.fontName };
  }

  return spans;
}
