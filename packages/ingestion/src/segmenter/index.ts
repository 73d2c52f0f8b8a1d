export {
  LayoutSegmenter,
  classifySpan,
  groupParagraphs,
  medianFontSize,
} from './layout-segmenter';
export type { LayoutSegmenterOptions } from './layout-segmenter';
export {
  sectionAfterPage,
  sectionForOffset,
  sectionForRegion,
} from './section-tracker';
export type { HeadingMarker } from './section-tracker';
