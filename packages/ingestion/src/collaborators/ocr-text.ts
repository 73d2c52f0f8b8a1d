import type { OcrBox } from '@ledgerlens/model';

/**
 * Join recognized texts with single spaces, in box order.
 */
export function ocrToText(boxes: readonly OcrBox[]): string {
  return boxes.map((box) => box.text).join(' ');
}

/**
 * Apply the OcrService contract to raw results: trim texts, drop boxes below
 * the threshold or without text, order top-to-bottom then left-to-right.
 */
export function normalizeOcrBoxes(
  boxes: readonly OcrBox[],
  confidenceThreshold: number,
): OcrBox[] {
  return boxes
    .filter((box) => box.confidence >= confidenceThreshold)
    .map((box) => ({ ...box, text: box.text.trim() }))
    .filter((box) => box.text.length > 0)
    .sort((a, b) => a.bbox[1] - b.bbox[1] || a.bbox[0] - b.bbox[0]);
}
