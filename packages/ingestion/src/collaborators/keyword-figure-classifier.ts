import type { FigureClassifier } from './types';

import { FigureType } from '@ledgerlens/model';

/**
 * Ordered keyword rules; the first match wins
 */
const KEYWORD_RULES: ReadonlyArray<readonly [RegExp, FigureType]> = [
  [/\bpie\b/i, FigureType.PIE_CHART],
  [/\bdonut\b/i, FigureType.DONUT_CHART],
  [/\bscatter\b/i, FigureType.SCATTER_CHART],
  [/\bbubble\b/i, FigureType.BUBBLE_CHART],
  [/\bcandle|ohlc\b/i, FigureType.CANDLESTICK],
  [/\bwaterfall\b/i, FigureType.WATERFALL],
  [/\bheat\s*map\b/i, FigureType.HEATMAP],
  [/\bbox\b.*\bwhisker|box\s*plot\b/i, FigureType.BOX_WHISKER],
  [/\bhistogram\b/i, FigureType.HISTOGRAM],
  [/\bnetwork\b/i, FigureType.NETWORK_GRAPH],
  [/\bparallel\s*coord/i, FigureType.PARALLEL_COORDINATES],
  [/\bstacked\s*(bar|column)\b/i, FigureType.STACKED_BAR_CHART],
  [/\bbar\b|\bcolumn\b/i, FigureType.BAR_CHART],
  [/\barea\b/i, FigureType.AREA_CHART],
  [/\bline\b.*\bline\b|\bmulti.?line\b/i, FigureType.MULTI_LINE_CHART],
  [/\bline\b/i, FigureType.LINE_CHART],
];

/**
 * KeywordFigureClassifier
 *
 * Classifies figures from words in their caption and overlay text.
 */
export class KeywordFigureClassifier implements FigureClassifier {
  classify(caption: string, ocrText: string): Promise<FigureType> {
    return Promise.resolve(
      KeywordFigureClassifier.classifyText(caption, ocrText),
    );
  }

  static classifyText(caption: string, ocrText: string): FigureType {
    const combined = `${caption} ${ocrText}`;
    for (const [pattern, figureType] of KEYWORD_RULES) {
      if (pattern.test(combined)) {
        return figureType;
      }
    }
    return FigureType.UNKNOWN;
  }
}
