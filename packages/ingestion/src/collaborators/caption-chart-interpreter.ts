import type { ChartSeries } from '@ledgerlens/model';

import type { ChartInterpreter } from './types';

/**
 * Compose a chart description from its caption and overlay text.
 */
export function composeCaptionDescription(
  caption: string,
  ocrText: string,
): string {
  const parts: string[] = [];
  if (caption) {
    parts.push(`This figure is captioned: "${caption}".`);
  }
  if (ocrText) {
    parts.push(`Text visible in the chart: ${ocrText}`);
  }
  return parts.join(' ');
}

/**
 * CaptionChartInterpreter
 *
 * Model-free interpreter: describes charts by their caption and overlay
 * text and never digitizes.
 */
export class CaptionChartInterpreter implements ChartInterpreter {
  describe(_image: Buffer, caption: string, ocrText: string): Promise<string> {
    return Promise.resolve(composeCaptionDescription(caption, ocrText));
  }

  digitize(_image: Buffer): Promise<ChartSeries | null> {
    return Promise.resolve(null);
  }
}
