import type { LoggerMethods } from '@ledgerlens/logger';
import type { ChartSeries, ExtractedFigure } from '@ledgerlens/model';

import type {
  ChartInterpreter,
  FigureClassifier,
  OcrService,
} from '../collaborators/types';

import { FigureType } from '@ledgerlens/model';

import {
  CaptionChartInterpreter,
} from '../collaborators/caption-chart-interpreter';
import {
  KeywordFigureClassifier,
} from '../collaborators/keyword-figure-classifier';
import { normalizeOcrBoxes, ocrToText } from '../collaborators/ocr-text';
import { softCall } from '../utils/soft-call';

/**
 * Figure with the outputs of OCR, classification and chart interpretation
 */
export interface EnrichedFigure {
  figure: ExtractedFigure;

  /**
   * Overlay text read from the crop, empty without OCR
   */
  ocrText: string;

  figureType: FigureType;
  description: string;
  series: ChartSeries | null;
}

export interface FigureEnricherOptions {
  /**
   * Reads overlay text from figure crops; skipped when absent
   */
  ocr?: OcrService;

  /**
   * Default: KeywordFigureClassifier
   */
  classifier?: FigureClassifier;

  /**
   * Default: CaptionChartInterpreter
   */
  interpreter?: ChartInterpreter;

  /**
   * Minimum OCR confidence for overlay text (default: 0.3)
   */
  ocrConfidenceThreshold?: number;

  /**
   * Time limit for each collaborator call (default: none)
   */
  timeoutMs?: number;
}

/**
 * FigureEnricher
 *
 * Runs the figure collaborators in turn: overlay OCR, type classification,
 * description and, for recognised chart types, digitization. Each call is
 * soft; a failure leaves its field empty and the rest still run.
 */
export class FigureEnricher {
  private readonly ocr?: OcrService;
  private readonly classifier: FigureClassifier;
  private readonly interpreter: ChartInterpreter;
  private readonly ocrConfidenceThreshold: number;
  private readonly timeoutMs?: number;

  constructor(
    private readonly logger: LoggerMethods,
    options: FigureEnricherOptions = {},
  ) {
    this.ocr = options.ocr;
    this.classifier = options.classifier ?? new KeywordFigureClassifier();
    this.interpreter = options.interpreter ?? new CaptionChartInterpreter();
    this.ocrConfidenceThreshold = options.ocrConfidenceThreshold ?? 0.3;
    this.timeoutMs = options.timeoutMs;
  }

  async enrich(figure: ExtractedFigure): Promise<EnrichedFigure> {
    const where = `figure ${figure.figureIndex} on page ${figure.pageNumber}`;
    const soft = <T>(label: string, fn: () => Promise<T>, fallback: T) =>
      softCall(fn, {
        logger: this.logger,
        label: `[FigureEnricher] ${label} for ${where}`,
        fallback,
        timeoutMs: this.timeoutMs,
      });

    const ocr = this.ocr;
    const ocrText = ocr
      ? await soft(
          'OCR',
          async () =>
            ocrToText(
              normalizeOcrBoxes(
                await ocr.recognize(figure.image, this.ocrConfidenceThreshold),
                this.ocrConfidenceThreshold,
              ),
            ),
          '',
        )
      : '';

    const figureType = await soft(
      'Classification',
      () => this.classifier.classify(figure.caption, ocrText),
      FigureType.UNKNOWN,
    );

    const description = await soft(
      'Chart description',
      async () => {
        const { image, caption } = figure;
        const text = await this.interpreter.describe(image, caption, ocrText);
        return text.trim();
      },
      '',
    );

    const series =
      figureType === FigureType.UNKNOWN
        ? null
        : await soft(
            'Digitization',
            () => this.interpreter.digitize(figure.image),
            null,
          );

    return { figure, ocrText, figureType, description, series };
  }

  async enrichAll(
    figures: readonly ExtractedFigure[],
  ): Promise<EnrichedFigure[]> {
    const enriched: EnrichedFigure[] = [];
    for (const figure of figures) {
      enriched.push(await this.enrich(figure));
    }
    return enriched;
  }
}
