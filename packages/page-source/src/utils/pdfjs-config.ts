import { createRequire } from 'node:module';
import { dirname, join } from 'node:path';

const PDFJS_ROOT = dirname(
  createRequire(import.meta.url).resolve('pdfjs-dist/package.json'),
);

/**
 * Options spread into every `getDocument()` call.
 *
 * Font and CMap data come from the installed pdfjs-dist package, so pages
 * that use non-embedded standard 14 fonts or CJK encodings still yield
 * text. pdfjs requires both locations to end with a slash.
 */
export const PDFJS_DOCUMENT_OPTIONS = {
  standardFontDataUrl: `${join(PDFJS_ROOT, 'standard_fonts')}/`,
  cMapUrl: `${join(PDFJS_ROOT, 'cmaps')}/`,
  cMapPacked: true,
  isEvalSupported: false,
  disableFontFace: true,
} as const;
