export {
  PdfPageSource,
  type PdfPageSourceOptions,
} from './core/pdf-page-source';
export {
  PageRenderError,
  PageSourceError,
  PdfOpenError,
} from './errors/page-source-error';
export {
  clusterDrawingPaths,
  type DrawingClusterOptions,
} from './processors/drawing-clusterer';
export {
  PDF_OPS,
  parseOperatorList,
  type DrawingPath,
  type OperatorListLike,
  type PageGeometry,
} from './processors/operator-list-parser';
export {
  PageRenderer,
  type PageRendererOptions,
} from './processors/page-renderer';
export {
  extractTextSpans,
  isBoldFontName,
  type FontNameResolver,
} from './processors/text-span-extractor';
export type { PageSource, ReadPagesOptions } from './types';
export { computeFileHash } from './utils/file-hash';
