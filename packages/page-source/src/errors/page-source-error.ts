/**
 * PageSourceError
 *
 * Base error for failures while reading pages from a document.
 */
export class PageSourceError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PageSourceError';
  }

  static getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}

/**
 * Raised when the PDF cannot be opened or parsed at all.
 */
export class PdfOpenError extends PageSourceError {
  constructor(
    public readonly filePath: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to open PDF: ${filePath}`, options);
    this.name = 'PdfOpenError';
  }

  static fromError(filePath: string, error: unknown): PdfOpenError {
    return new PdfOpenError(filePath, { cause: error });
  }
}

/**
 * Raised when a page cannot be rasterized.
 */
export class PageRenderError extends PageSourceError {
  constructor(
    public readonly pageNumber: number,
    detail: string,
    options?: ErrorOptions,
  ) {
    super(`Failed to render page ${pageNumber}: ${detail}`, options);
    this.name = 'PageRenderError';
  }
}
