import type {
  BlockType,
  Chunk,
  ChunkMetadata,
  ExtractedTable,
  FigureChunk,
  LayoutBlock,
  PageRecord,
  TableChunk,
  TextChunk,
} from '@ledgerlens/model';

import type { EnrichedFigure } from '../extractors/figure-enricher';
import type { HeadingMarker } from '../segmenter/section-tracker';

import { sha256Hex } from '@ledgerlens/shared';

import { ConfigError } from '../errors/ingestion-error';
import {
  sectionForOffset,
  sectionForRegion,
} from '../segmenter/section-tracker';

export interface ChunkerOptions {
  /**
   * Characters per text window (default: 450)
   */
  textChunkSize?: number;

  /**
   * Characters shared by consecutive windows; must be below the size
   * (default: 50)
   */
  textChunkOverlap?: number;

  /**
   * Windows, page summaries and figure texts shorter than this are dropped
   * or replaced (default: 30)
   */
  minChunkLength?: number;

  /**
   * Emit one overview chunk per page (default: true)
   */
  includePageSummary?: boolean;

  /**
   * Page overview length cap, prefix included (default: 8000)
   */
  pageSummaryMaxChars?: number;

  /**
   * Clock for `createdAt` (default: current time)
   */
  now?: () => Date;
}

/**
 * Everything the chunker needs from one processed page
 */
export interface PageChunkInput {
  docId: string;
  sourceFile: string;
  page: PageRecord;

  /**
   * Text blocks in reading order; headings, paragraphs and footnotes are used
   */
  blocks: readonly LayoutBlock[];

  tables: readonly ExtractedTable[];
  figures: readonly EnrichedFigure[];

  /**
   * Section carried into the page from earlier pages
   */
  section: string;
}

/**
 * Page prose with the positions of its headings
 */
export interface Prose {
  text: string;
  headings: HeadingMarker[];
}

/**
 * Window of the prose string
 */
export interface TextWindow {
  start: number;
  text: string;
}

/**
 * Rebuild a page's prose: headings as `## ` lines, paragraph and footnote
 * text joined by spaces. Heading offsets refer to the trimmed result.
 */
export function buildProse(blocks: readonly LayoutBlock[]): Prose {
  let raw = '';
  const rawHeadings: HeadingMarker[] = [];

  for (const block of blocks) {
    if (block.role === 'heading') {
      rawHeadings.push({ offset: raw.length, text: block.text });
      raw += `\n## ${block.text}\n`;
    } else if (block.role === 'paragraph' || block.role === 'footnote') {
      raw += `${block.text} `;
    }
  }

  const text = raw.trim();
  const lead = raw.length - raw.trimStart().length;
  return {
    text,
    headings: rawHeadings.map((marker) => ({
      offset: Math.max(0, marker.offset - lead),
      text: marker.text,
    })),
  };
}

/**
 * Fixed-stride windows over `text`.
 *
 * Each window is `[start, start + size)` trimmed; windows shorter than
 * `minLength` are dropped and the start still advances by `size - overlap`.
 */
export function slideWindows(
  text: string,
  size: number,
  overlap: number,
  minLength: number,
): TextWindow[] {
  const step = size - overlap;
  if (step <= 0) {
    throw new ConfigError(
      `Chunk overlap (${overlap}) must be smaller than chunk size (${size})`,
    );
  }

  const windows: TextWindow[] = [];
  for (let start = 0; start < text.length; start += step) {
    const snippet = text.slice(start, start + size).trim();
    if (snippet.length >= minLength) {
      windows.push({ start, text: snippet });
    }
  }
  return windows;
}

/**
 * Retrieval text of a figure: labelled caption, description and overlay
 * text, or a placeholder naming the page when together they are too short.
 */
export function composeFigureText(
  enriched: Pick<EnrichedFigure, 'figure' | 'description' | 'ocrText'>,
  sourceFile: string,
  minLength: number,
): string {
  const { figure, description, ocrText } = enriched;
  const flat = `${figure.caption} ${description} ${ocrText}`.trim();
  if (flat.length < minLength) {
    return `Figure from ${sourceFile} page ${figure.pageNumber}`;
  }

  const parts: string[] = [];
  if (figure.caption) {
    parts.push(`Caption: ${figure.caption}`);
  }
  if (description) {
    parts.push(description);
  }
  if (ocrText) {
    parts.push(`OCR overlay: ${ocrText}`);
  }
  return parts.join('\n');
}

/**
 * Canonical text of a chunk; its SHA-256 is the chunk's identity.
 */
export function chunkToText(chunk: Chunk): string {
  switch (chunk.kind) {
    case 'text':
      return chunk.text;
    case 'table':
      return chunk.summary
        ? `${chunk.markdown}\nSummary: ${chunk.summary}`
        : chunk.markdown;
    case 'figure':
      return chunk.text;
  }
}

/**
 * Chunker
 *
 * Turns one page's blocks, tables and enriched figures into chunks with
 * provenance metadata. Order: text windows, tables, figures, page overview.
 */
export class Chunker {
  private readonly size: number;
  private readonly overlap: number;
  private readonly minLength: number;
  private readonly includePageSummary: boolean;
  private readonly pageSummaryMaxChars: number;
  private readonly now: () => Date;

  constructor(options: ChunkerOptions = {}) {
    this.size = options.textChunkSize ?? 450;
    this.overlap = options.textChunkOverlap ?? 50;
    this.minLength = options.minChunkLength ?? 30;
    this.includePageSummary = options.includePageSummary ?? true;
    this.pageSummaryMaxChars = options.pageSummaryMaxChars ?? 8000;
    this.now = options.now ?? (() => new Date());

    if (this.overlap >= this.size) {
      throw new ConfigError(
        `Chunk overlap (${this.overlap}) must be smaller than ` +
          `chunk size (${this.size})`,
      );
    }
  }

  chunkPage(input: PageChunkInput): Chunk[] {
    const summary = this.includePageSummary ? this.pageSummary(input) : null;
    return [
      ...this.chunkText(input),
      ...this.chunkTables(input),
      ...this.chunkFigures(input),
      ...(summary ? [summary] : []),
    ];
  }

  chunkText(input: PageChunkInput): TextChunk[] {
    const prose = buildProse(input.blocks);
    return slideWindows(
      prose.text,
      this.size,
      this.overlap,
      this.minLength,
    ).map(({ start, text }) => ({
      kind: 'text',
      text,
      metadata: this.metadata(input, {
        blockType: 'text',
        section: sectionForOffset(prose.headings, start, input.section),
        exhibitId: '',
        canonical: text,
      }),
    }));
  }

  chunkTables(input: PageChunkInput): TableChunk[] {
    const chunks: TableChunk[] = [];
    for (const [index, table] of input.tables.entries()) {
      if (!table.markdown.trim()) {
        continue;
      }
      chunks.push({
        kind: 'table',
        markdown: table.markdown,
        csv: table.csv,
        summary: '',
        metadata: this.metadata(input, {
          blockType: 'table',
          section: sectionForRegion(input.blocks, table.bbox[1], input.section),
          exhibitId: `Table ${index + 1} (p.${table.pageNumber})`,
          canonical: table.markdown,
        }),
      });
    }
    return chunks;
  }

  chunkFigures(input: PageChunkInput): FigureChunk[] {
    return input.figures.map((enriched) => {
      const { figure } = enriched;
      const text = composeFigureText(
        enriched,
        input.sourceFile,
        this.minLength,
      );
      const top = figure.bbox[1];
      return {
        kind: 'figure',
        text,
        caption: figure.caption,
        ocrText: enriched.ocrText,
        chartDescription: enriched.description,
        figureType: enriched.figureType,
        series: enriched.series,
        imagePath: figure.imagePath,
        metadata: this.metadata(input, {
          blockType: 'figure',
          section: sectionForRegion(input.blocks, top, input.section),
          exhibitId: `Figure ${figure.figureIndex} (p.${figure.pageNumber})`,
          canonical: text,
        }),
      };
    });
  }

  /**
   * Overview chunk holding the page's raw text, or null when the text is
   * shorter than the minimum chunk length.
   */
  pageSummary(input: PageChunkInput): TextChunk | null {
    const body = input.page.rawText.trim();
    if (body.length < this.minLength) {
      return null;
    }

    const text = `[Page ${input.page.pageNumber} overview] ${body}`.slice(
      0,
      this.pageSummaryMaxChars,
    );
    return {
      kind: 'text',
      text,
      metadata: this.metadata(input, {
        blockType: 'page_summary',
        section: input.section,
        exhibitId: '',
        canonical: text,
      }),
    };
  }

  private metadata(
    input: PageChunkInput,
    fields: {
      blockType: BlockType;
      section: string;
      exhibitId: string;
      canonical: string;
    },
  ): ChunkMetadata {
    return {
      docId: input.docId,
      sourceFile: input.sourceFile,
      page: input.page.pageNumber,
      blockType: fields.blockType,
      section: fields.section,
      exhibitId: fields.exhibitId,
      contentHash: sha256Hex(fields.canonical),
      createdAt: this.now().toISOString(),
    };
  }
}
