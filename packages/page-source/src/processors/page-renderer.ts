import type { LoggerMethods } from '@ledgerlens/logger';

import { spawnAsync } from '@ledgerlens/shared';
import { readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';

import { PageRenderError } from '../errors/page-source-error';

/** Default rendering DPI, matching the crop scale used downstream */
const DEFAULT_DPI = 100;

/** Options for page rendering */
export interface PageRendererOptions {
  /** DPI for rendered images (default: 100) */
  dpi?: number;

  /** Kill ImageMagick after this many milliseconds (default: none) */
  timeoutMs?: number;
}

/**
 * Renders single PDF pages to PNG bytes using ImageMagick.
 *
 * ## System Requirements
 * - ImageMagick (`brew install imagemagick`)
 * - Ghostscript (`brew install ghostscript`)
 */
export class PageRenderer {
  constructor(private readonly logger: LoggerMethods) {}

  /**
   * Render one page of a PDF and return the PNG bytes.
   *
   * The intermediate file is written to `workDir` and removed afterwards.
   *
   * @param pdfPath - Path to the source PDF file
   * @param pageNumber - 1-based page number
   * @param workDir - Existing scratch directory for the output file
   */
  async renderPage(
    pdfPath: string,
    pageNumber: number,
    workDir: string,
    options?: PageRendererOptions,
  ): Promise<Buffer> {
    const dpi = options?.dpi ?? DEFAULT_DPI;
    const outputPath = join(workDir, `page_${pageNumber}.png`);

    this.logger.debug(
      `[PageRenderer] Rendering page ${pageNumber} at ${dpi} DPI...`,
    );

    const result = await spawnAsync(
      'magick',
      [
        '-density',
        dpi.toString(),
        `${pdfPath}[${pageNumber - 1}]`,
        '-background',
        'white',
        '-alpha',
        'remove',
        '-alpha',
        'off',
        outputPath,
      ],
      { timeoutMs: options?.timeoutMs },
    );

    if (result.code !== 0) {
      throw new PageRenderError(
        pageNumber,
        result.stderr.trim() || 'Unknown error',
      );
    }

    try {
      return readFileSync(outputPath);
    } catch (error) {
      throw new PageRenderError(
        pageNumber,
        PageRenderError.getErrorMessage(error),
        { cause: error },
      );
    } finally {
      rmSync(outputPath, { force: true });
    }
  }
}
