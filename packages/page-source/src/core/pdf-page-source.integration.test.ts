import type { PageRecord } from '@ledgerlens/model';

import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, expect, test, vi } from 'vitest';

import { PdfPageSource } from './pdf-page-source';

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

/**
 * Single-page PDF (300 x 200 pt) drawing `content` with Helvetica as /F1.
 */
function buildPdf(content: string): Buffer {
  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
    '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 300 200] ' +
      '/Resources << /Font << /F1 4 0 R >> >> /Contents 5 0 R >>',
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica ' +
      '/Encoding /WinAnsiEncoding >>',
    `<< /Length ${content.length} >>\nstream\n${content}\nendstream`,
  ];

  let pdf = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((body, i) => {
    offsets.push(pdf.length);
    pdf += `${i + 1} 0 obj\n${body}\nendobj\n`;
  });

  const xrefOffset = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    pdf += `${String(offset).padStart(10, '0')} 00000 n \n`;
  }
  pdf +=
    `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\n` +
    `startxref\n${xrefOffset}\n%%EOF\n`;
  return Buffer.from(pdf, 'latin1');
}

const CONTENT = [
  'BT /F1 12 Tf 40 150 Td (Revenue rose in the third quarter) Tj ET',
  '1 w',
  '40 100 m 260 100 l S',
  '40 40 220 40 re S',
].join('\n');

describe('PdfPageSource with pdfjs', () => {
  let dir: string;
  let page: PageRecord;

  beforeAll(async () => {
    dir = mkdtempSync(join(tmpdir(), 'pdf-page-source-pdfjs-'));
    const pdfPath = join(dir, 'ruled.pdf');
    writeFileSync(pdfPath, buildPdf(CONTENT));

    const pages: PageRecord[] = [];
    for await (const record of new PdfPageSource(mockLogger).readPages(
      pdfPath,
    )) {
      pages.push(record);
    }
    expect(pages).toHaveLength(1);
    page = pages[0];
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('reads the page size and text layer', () => {
    expect(page.pageNumber).toBe(1);
    expect(page.width).toBe(300);
    expect(page.height).toBe(200);
    expect(page.rawText).toBe('Revenue rose in the third quarter');
    expect(page.hasTextLayer).toBe(true);
    expect(page.raster).toBeNull();
  });

  test('flips text baselines into top-left coordinates', () => {
    const [span] = page.spans;

    expect(page.spans).toHaveLength(1);
    expect(span.fontSize).toBeCloseTo(12);
    expect(span.bbox[0]).toBeCloseTo(40);
    expect(span.bbox[3]).toBeCloseTo(50);
    expect(span.bbox[2]).toBeGreaterThan(40);
  });

  test('turns a stroked line and rectangle into rulings', () => {
    expect(page.rulings).toEqual([
      { orientation: 'horizontal', x0: 40, y0: 100, x1: 260, y1: 100 },
      { orientation: 'horizontal', x0: 40, y0: 160, x1: 260, y1: 160 },
      { orientation: 'vertical', x0: 260, y0: 120, x1: 260, y1: 160 },
      { orientation: 'horizontal', x0: 40, y0: 120, x1: 260, y1: 120 },
      { orientation: 'vertical', x0: 40, y0: 120, x1: 40, y1: 160 },
    ]);
    expect(page.images).toEqual([]);
    expect(page.drawings).toEqual([]);
  });
});
