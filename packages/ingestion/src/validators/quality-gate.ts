import type { LoggerMethods } from '@ledgerlens/logger';
import type {
  Chunk,
  FigureChunk,
  TableChunk,
  TextChunk,
} from '@ledgerlens/model';

import { chunkToText } from '../chunker/chunker';

/**
 * Thresholds for QualityGate
 */
export interface QualityGateOptions {
  /**
   * Shortest accepted text chunk, after trimming (default: 30)
   */
  minChunkLength?: number;

  /**
   * Longest accepted text chunk, after trimming (default: 8000)
   */
  maxChunkLength?: number;

  /**
   * Minimum share of letters and digits in a text chunk (default: 0.3)
   */
  minAlnumRatio?: number;

  /**
   * Minimum distinct-word share for texts of five or more words
   * (default: 0.5)
   */
  minUniqueWordRatio?: number;

  /**
   * Minimum markdown rows of a table, header included (default: 2)
   */
  tableMinRows?: number;

  /**
   * Shortest accepted figure text (default: 10)
   */
  minFigureTextLength?: number;
}

const DEFAULT_OPTIONS: Required<QualityGateOptions> = {
  minChunkLength: 30,
  maxChunkLength: 8000,
  minAlnumRatio: 0.3,
  minUniqueWordRatio: 0.5,
  tableMinRows: 2,
  minFigureTextLength: 10,
};

/** Texts with fewer words are never judged repetitive */
const REPETITION_MIN_WORDS = 5;

const ALNUM_PATTERN = /[\p{L}\p{N}]/u;

const SEPARATOR_ROW_PATTERN = /^\|(\s*:?-{3,}:?\s*\|)+$/;

export type QualityVerdict = { ok: true } | { ok: false; reason: string };

export interface RejectedChunk {
  chunk: Chunk;
  reason: string;
}

export interface QualityGateResult {
  accepted: Chunk[];
  rejected: RejectedChunk[];
}

const ACCEPT: QualityVerdict = { ok: true };

function reject(reason: string): QualityVerdict {
  return { ok: false, reason };
}

/**
 * QualityGate
 *
 * Stateless accept/reject checks applied to chunks before storage. Each
 * verdict depends on the chunk alone, so results do not depend on order.
 */
export class QualityGate {
  private readonly options: Required<QualityGateOptions>;

  constructor(
    private readonly logger?: LoggerMethods,
    options?: QualityGateOptions,
  ) {
    this.options = {
      ...DEFAULT_OPTIONS,
      ...options,
    };
  }

  validateText(chunk: TextChunk): QualityVerdict {
    const { minChunkLength, maxChunkLength, minAlnumRatio } = this.options;
    const text = chunk.text.trim();

    if (text.length < minChunkLength) {
      return reject(`Too short (${text.length} chars)`);
    }
    if (text.length > maxChunkLength) {
      return reject(`Too long (${text.length} chars)`);
    }

    const chars = [...text];
    const alnum = chars.filter((char) => ALNUM_PATTERN.test(char)).length;
    const ratio = alnum / chars.length;
    if (ratio < minAlnumRatio) {
      return reject(`Low alphanumeric ratio (${ratio.toFixed(2)})`);
    }

    if (this.isRepetitive(text)) {
      return reject('Repetitive content');
    }
    return ACCEPT;
  }

  validateTable(chunk: TableChunk): QualityVerdict {
    const markdown = chunk.markdown.trim();
    if (!markdown) {
      return reject('Empty table');
    }

    const rows = markdown
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.startsWith('|'))
      .filter((line) => !SEPARATOR_ROW_PATTERN.test(line));
    if (rows.length < this.options.tableMinRows) {
      return reject(`Too few rows (${rows.length})`);
    }
    return ACCEPT;
  }

  validateFigure(chunk: FigureChunk): QualityVerdict {
    const text = chunk.text.trim();
    if (text.length < this.options.minFigureTextLength) {
      return reject('Insufficient textual representation');
    }
    return ACCEPT;
  }

  validate(chunk: Chunk): QualityVerdict {
    switch (chunk.kind) {
      case 'text':
        return this.validateText(chunk);
      case 'table':
        return this.validateTable(chunk);
      case 'figure':
        return this.validateFigure(chunk);
      default:
        return ACCEPT;
    }
  }

  /**
   * Split chunks into accepted and rejected, keeping input order in both.
   */
  filterChunks(chunks: readonly Chunk[]): QualityGateResult {
    const accepted: Chunk[] = [];
    const rejected: RejectedChunk[] = [];

    for (const chunk of chunks) {
      const verdict = this.validate(chunk);
      if (verdict.ok) {
        accepted.push(chunk);
        continue;
      }
      rejected.push({ chunk, reason: verdict.reason });
      this.logger?.debug(
        `[QualityGate] Rejected ${chunk.kind} chunk (${verdict.reason}):`,
        chunkToText(chunk).slice(0, 80),
      );
    }

    if (rejected.length > 0) {
      this.logger?.info(
        `[QualityGate] ${accepted.length} chunk(s) passed, ${rejected.length} rejected`,
      );
    }
    return { accepted, rejected };
  }

  private isRepetitive(text: string): boolean {
    const words = text.split(/\s+/).filter(Boolean);
    if (words.length < REPETITION_MIN_WORDS) {
      return false;
    }
    return new Set(words).size / words.length < this.options.minUniqueWordRatio;
  }
}
