import type {
  ChartSeries,
  FigureType,
  LayoutBlock,
  OcrBox,
  PageRecord,
} from '@ledgerlens/model';

/**
 * Text recognition over a PNG image
 */
export interface OcrService {
  /**
   * Recognize text in `image`. Implementations drop boxes whose confidence
   * is below `confidenceThreshold` and return the rest top-to-bottom, then
   * left-to-right, in pixel coordinates of `image`.
   */
  recognize(image: Buffer, confidenceThreshold: number): Promise<OcrBox[]>;
}

/**
 * Assigns a figure category from the figure's caption and overlay text
 */
export interface FigureClassifier {
  classify(caption: string, ocrText: string): Promise<FigureType>;
}

/**
 * Turns chart images into prose and, where possible, data
 */
export interface ChartInterpreter {
  /**
   * Natural-language description of the chart; may be empty
   */
  describe(image: Buffer, caption: string, ocrText: string): Promise<string>;

  /**
   * Data series read from the chart, or null when none can be recovered
   */
  digitize(image: Buffer): Promise<ChartSeries | null>;
}

/**
 * Model-based region detection (tables, figures, captions) for one page
 */
export interface LayoutRegionDetector {
  detect(page: PageRecord): Promise<LayoutBlock[]>;
}

/**
 * Maps texts to embedding vectors, one per input, in input order
 */
export interface Embedder {
  embed(texts: string[]): Promise<number[][]>;
}
