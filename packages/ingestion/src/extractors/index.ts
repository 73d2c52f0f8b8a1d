export { detectRuledTables } from './ruled-table-detector';
export type {
  RuledTable,
  RuledTableDetectorOptions,
} from './ruled-table-detector';
export { TableExtractor, clusterOcrRows } from './table-extractor';
export type { TableExtractorOptions } from './table-extractor';
export {
  FigureExtractor,
  nearestCaption,
  selectFigureRegions,
} from './figure-extractor';
export type {
  FigureExtractorOptions,
  FigureRegionOptions,
} from './figure-extractor';
export { FigureEnricher } from './figure-enricher';
export type { EnrichedFigure, FigureEnricherOptions } from './figure-enricher';
