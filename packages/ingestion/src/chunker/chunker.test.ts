import type {
  BBox,
  ExtractedTable,
  LayoutBlock,
  PageRecord,
  TableChunk,
} from '@ledgerlens/model';

import type { EnrichedFigure } from '../extractors/figure-enricher';

import { FigureType } from '@ledgerlens/model';
import { sha256Hex } from '@ledgerlens/shared';
import { describe, expect, test } from 'vitest';

import { ConfigError } from '../errors/ingestion-error';
import {
  Chunker,
  buildProse,
  chunkToText,
  composeFigureText,
  slideWindows,
} from './chunker';

const DOC_ID = 'f'.repeat(64);
const NOW = new Date('2026-03-01T12:00:00.000Z');

function block(
  role: LayoutBlock['role'],
  text: string,
  bbox: BBox = [50, 100, 550, 120],
): LayoutBlock {
  return { role, bbox, text, pageNumber: 4, confidence: 1 };
}

function page(rawText = ''): PageRecord {
  return {
    pageNumber: 4,
    width: 600,
    height: 800,
    spans: [],
    images: [],
    drawings: [],
    rulings: [],
    rawText,
    hasTextLayer: true,
    raster: null,
  };
}

function table(markdown: string, bbox: BBox): ExtractedTable {
  return {
    pageNumber: 4,
    bbox,
    rows: [],
    markdown,
    csv: 'csv\r\n',
    method: 'primary',
  };
}

function enriched(
  caption: string,
  description = '',
  ocrText = '',
): EnrichedFigure {
  return {
    figure: {
      pageNumber: 4,
      bbox: [50, 400, 300, 600],
      image: Buffer.from('png'),
      imagePath: 'ffffffffffffffff/page_4_fig_2.png',
      caption,
      figureIndex: 2,
    },
    ocrText,
    figureType: FigureType.LINE_CHART,
    description,
    series: null,
  };
}

describe('buildProse', () => {
  test('marks headings and joins paragraphs with spaces', () => {
    const prose = buildProse([
      block('heading', 'Outlook'),
      block('paragraph', 'Growth slowed.'),
      block('caption', 'Figure 1 ignored'),
      block('footnote', 'Inflation eased.'),
    ]);

    expect(prose).toEqual({
      text: '## Outlook\nGrowth slowed. Inflation eased.',
      headings: [{ offset: 0, text: 'Outlook' }],
    });
  });

  test('records heading offsets inside the prose', () => {
    const prose = buildProse([
      block('paragraph', 'Intro text.'),
      block('heading', 'Risks'),
      block('paragraph', 'Debt rose.'),
    ]);

    expect(prose.text).toBe('Intro text. \n## Risks\nDebt rose.');
    expect(prose.headings).toEqual([{ offset: 12, text: 'Risks' }]);
    expect(prose.text.slice(12)).toMatch(/^\n## Risks/);
  });

  test('returns empty prose without text blocks', () => {
    expect(buildProse([block('header', 'Annual Report')])).toEqual({
      text: '',
      headings: [],
    });
  });
});

describe('slideWindows', () => {
  test('splits 600 characters into two windows overlapping by 50', () => {
    const text = 'abcdefghij'.repeat(60);

    const windows = slideWindows(text, 450, 50, 30);

    expect(windows).toEqual([
      { start: 0, text: text.slice(0, 450) },
      { start: 400, text: text.slice(400, 600) },
    ]);
    expect(windows[0].text.slice(-50)).toBe(windows[1].text.slice(0, 50));
  });

  test('drops a short trailing window', () => {
    const text = 'a'.repeat(420);

    expect(slideWindows(text, 450, 50, 30)).toEqual([
      { start: 0, text },
    ]);
  });

  test('trims windows before checking their length', () => {
    const text = `${'b'.repeat(10)}${' '.repeat(30)}`;

    expect(slideWindows(text, 450, 50, 11)).toEqual([]);
    expect(slideWindows(text, 450, 50, 10)).toEqual([
      { start: 0, text: 'b'.repeat(10) },
    ]);
  });

  test('rejects an overlap as large as the window', () => {
    expect(() => slideWindows('text', 50, 50, 1)).toThrow(ConfigError);
  });
});

describe('composeFigureText', () => {
  test('labels caption, description and overlay text', () => {
    expect(
      composeFigureText(
        enriched('Figure 2 Policy rate', 'Rates rose twice.', '5.25 4.75'),
        'report.pdf',
        30,
      ),
    ).toBe(
      'Caption: Figure 2 Policy rate\nRates rose twice.\nOCR overlay: 5.25 4.75',
    );
  });

  test('falls back to a placeholder when the signals are too short', () => {
    expect(composeFigureText(enriched('Fig. 2'), 'report.pdf', 30)).toBe(
      'Figure from report.pdf page 4',
    );
  });
});

describe('chunkToText', () => {
  const metadata = {
    docId: DOC_ID,
    sourceFile: 'report.pdf',
    page: 1,
    blockType: 'table' as const,
    section: '',
    exhibitId: 'Table 1 (p.1)',
    contentHash: '',
    createdAt: NOW.toISOString(),
  };

  test('appends a table summary when present', () => {
    const chunk: TableChunk = {
      kind: 'table',
      markdown: '| a |\n| --- |',
      csv: 'a\r\n',
      summary: 'One column.',
      metadata,
    };

    expect(chunkToText(chunk)).toBe('| a |\n| --- |\nSummary: One column.');
    expect(chunkToText({ ...chunk, summary: '' })).toBe('| a |\n| --- |');
  });
});

describe('Chunker', () => {
  test('rejects an overlap as large as the window size', () => {
    expect(
      () => new Chunker({ textChunkSize: 100, textChunkOverlap: 100 }),
    ).toThrow(ConfigError);
  });

  test('chunks text, tables, figures and the page overview in order', () => {
    const chunker = new Chunker({ now: () => NOW });
    const blocks = [
      block(
        'paragraph',
        'Opening remarks on the fiscal year.',
        [50, 80, 550, 95],
      ),
      block('heading', 'Balance sheet', [50, 300, 550, 320]),
      block('paragraph', 'Assets grew by four percent.', [50, 330, 550, 345]),
    ];
    const markdown = '| Item | 2024 |\n| --- | --- |\n| Cash | 12 |';

    const chunks = chunker.chunkPage({
      docId: DOC_ID,
      sourceFile: 'report.pdf',
      page: page('Opening remarks on the fiscal year. Balance sheet'),
      blocks,
      tables: [
        table('   ', [50, 120, 550, 200]),
        table(markdown, [50, 350, 550, 390]),
      ],
      figures: [enriched('Figure 2 Cash over time', 'Cash rose steadily.')],
      section: 'Overview',
    });

    const prose =
      'Opening remarks on the fiscal year. \n## Balance sheet\n' +
      'Assets grew by four percent.';
    expect(chunks.map((c) => [c.kind, c.metadata.blockType])).toEqual([
      ['text', 'text'],
      ['table', 'table'],
      ['figure', 'figure'],
      ['text', 'page_summary'],
    ]);
    expect(chunks[0]).toEqual({
      kind: 'text',
      text: prose,
      metadata: {
        docId: DOC_ID,
        sourceFile: 'report.pdf',
        page: 4,
        blockType: 'text',
        section: 'Overview',
        exhibitId: '',
        contentHash: sha256Hex(prose),
        createdAt: '2026-03-01T12:00:00.000Z',
      },
    });
    expect(chunks[1]).toMatchObject({
      kind: 'table',
      markdown,
      csv: 'csv\r\n',
      summary: '',
      metadata: {
        section: 'Balance sheet',
        exhibitId: 'Table 2 (p.4)',
        contentHash: sha256Hex(markdown),
      },
    });
    const figureText =
      'Caption: Figure 2 Cash over time\nCash rose steadily.';
    expect(chunks[2]).toEqual({
      kind: 'figure',
      text: figureText,
      caption: 'Figure 2 Cash over time',
      ocrText: '',
      chartDescription: 'Cash rose steadily.',
      figureType: FigureType.LINE_CHART,
      series: null,
      imagePath: 'ffffffffffffffff/page_4_fig_2.png',
      metadata: {
        docId: DOC_ID,
        sourceFile: 'report.pdf',
        page: 4,
        blockType: 'figure',
        section: 'Balance sheet',
        exhibitId: 'Figure 2 (p.4)',
        contentHash: sha256Hex(figureText),
        createdAt: '2026-03-01T12:00:00.000Z',
      },
    });
    expect(chunks[3]).toMatchObject({
      text: '[Page 4 overview] Opening remarks on the fiscal year. Balance sheet',
      metadata: { section: 'Overview', exhibitId: '' },
    });
  });

  test('assigns each window the last heading at or before its start', () => {
    const chunker = new Chunker({
      textChunkSize: 40,
      textChunkOverlap: 0,
      minChunkLength: 5,
      includePageSummary: false,
    });

    const chunks = chunker.chunkPage({
      docId: DOC_ID,
      sourceFile: 'report.pdf',
      page: page(),
      blocks: [
        block('paragraph', 'x'.repeat(38)),
        block('heading', 'Liquidity'),
        block('paragraph', 'y'.repeat(60)),
      ],
      tables: [],
      figures: [],
      section: 'Carried',
    });

    // prose: 38 x's, a space, then the heading marker at offset 39
    expect(chunks.map((c) => c.metadata.section)).toEqual([
      'Carried',
      'Liquidity',
      'Liquidity',
    ]);
  });

  test('truncates the page overview and skips short pages', () => {
    const chunker = new Chunker({ pageSummaryMaxChars: 40 });
    const base = {
      docId: DOC_ID,
      sourceFile: 'report.pdf',
      blocks: [],
      tables: [],
      figures: [],
      section: '',
    };

    const long = chunker.pageSummary({
      ...base,
      page: page(`  ${'Revenue and margins improved. '.repeat(3)}`),
    });
    const short = chunker.pageSummary({ ...base, page: page('Page 4') });

    expect(long?.text).toBe('[Page 4 overview] Revenue and margins im');
    expect(long?.text).toHaveLength(40);
    expect(short).toBeNull();
  });

  test('omits the page overview when disabled', () => {
    const chunker = new Chunker({ includePageSummary: false });

    const chunks = chunker.chunkPage({
      docId: DOC_ID,
      sourceFile: 'report.pdf',
      page: page('A page with plenty of raw text for an overview.'),
      blocks: [],
      tables: [],
      figures: [],
      section: '',
    });

    expect(chunks).toEqual([]);
  });
});
