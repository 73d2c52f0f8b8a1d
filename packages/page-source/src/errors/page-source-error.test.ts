import { describe, expect, test } from 'vitest';

import {
  PageRenderError,
  PageSourceError,
  PdfOpenError,
} from './page-source-error';

describe('PageSourceError', () => {
  test('getErrorMessage handles non-Error values', () => {
    expect(PageSourceError.getErrorMessage(new Error('bad xref'))).toBe(
      'bad xref',
    );
    expect(PageSourceError.getErrorMessage(404)).toBe('404');
  });

  test('PdfOpenError.fromError keeps the cause', () => {
    const cause = new Error('Invalid PDF structure');
    const error = PdfOpenError.fromError('/reports/q3.pdf', cause);

    expect(error).toBeInstanceOf(PageSourceError);
    expect(error.name).toBe('PdfOpenError');
    expect(error.message).toBe('Failed to open PDF: /reports/q3.pdf');
    expect(error.cause).toBe(cause);
  });

  test('PageRenderError names the page', () => {
    const error = new PageRenderError(4, 'magick exited with 1');

    expect(error.message).toBe('Failed to render page 4: magick exited with 1');
    expect(error.pageNumber).toBe(4);
  });
});
