import type { LoggerMethods } from '@ledgerlens/logger';
import type { ChartSeries } from '@ledgerlens/model';
import type { LanguageModel, ModelMessage } from 'ai';

import type { BaseLLMComponentOptions } from '../core/base-llm-component';
import type { ChartInterpreter } from './types';

import { z } from 'zod';

import { VisionLLMComponent } from '../core/vision-llm-component';
import { IngestionError, isAbortError } from '../errors/ingestion-error';
import { composeCaptionDescription } from './caption-chart-interpreter';

const ChartDescriptionSchema = z.object({
  description: z
    .string()
    .describe('Two or three sentences on trends, comparisons and key values'),
});

const ChartSeriesSchema = z.object({
  hasData: z
    .boolean()
    .describe('False when the image is not a chart with readable values'),
  columns: z
    .array(z.string())
    .describe('Header row: category label followed by one name per series'),
  rows: z
    .array(z.array(z.string()))
    .describe('One row per category, values as printed on the chart'),
});

/**
 * VisionChartInterpreter
 *
 * Describes and digitizes charts with a vision-capable language model.
 * Description failures fall back to the caption composition; digitization
 * failures yield no series.
 */
export class VisionChartInterpreter
  extends VisionLLMComponent
  implements ChartInterpreter
{
  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    options?: BaseLLMComponentOptions,
    fallbackModel?: LanguageModel,
  ) {
    super(logger, model, 'VisionChartInterpreter', options, fallbackModel);
  }

  async describe(
    image: Buffer,
    caption: string,
    ocrText: string,
  ): Promise<string> {
    try {
      const { output } = await this.callVisionLLM(
        ChartDescriptionSchema,
        this.buildMessages('describe', image, caption, ocrText),
        'describe',
      );
      const description = output.description.trim();
      if (description) {
        return description;
      }
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      this.log(
        'warn',
        'Chart description failed, using caption instead:',
        IngestionError.getErrorMessage(error),
      );
    }
    return composeCaptionDescription(caption, ocrText);
  }

  async digitize(image: Buffer): Promise<ChartSeries | null> {
    try {
      const { output } = await this.callVisionLLM(
        ChartSeriesSchema,
        this.buildMessages('digitize', image, '', ''),
        'digitize',
      );
      if (!output.hasData || output.columns.length === 0) {
        return null;
      }
      return { columns: output.columns, rows: output.rows };
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      this.log(
        'warn',
        'Chart digitization failed:',
        IngestionError.getErrorMessage(error),
      );
      return null;
    }
  }

  private buildMessages(
    task: 'describe' | 'digitize',
    image: Buffer,
    caption: string,
    ocrText: string,
  ): ModelMessage[] {
    return [
      { role: 'system', content: this.buildSystemPrompt(task) },
      {
        role: 'user',
        content: [
          { type: 'text', text: this.buildUserPrompt(caption, ocrText) },
          this.buildImageContent(image),
        ],
      },
    ];
  }

  protected buildSystemPrompt(task: 'describe' | 'digitize'): string {
    if (task === 'digitize') {
      return `You read data out of charts in financial and economic reports.
Return the chart's underlying data table: the first column holds the category (period, country, sector), one further column per series.
Copy numbers exactly as printed; leave a cell empty when a value cannot be read.
Set hasData to false when the image is a photo, logo or diagram without values.`;
    }
    return `You describe charts from financial and economic reports for a search index.
Write two or three plain sentences covering what is measured, the main trend and notable values.
Do not speculate beyond what the chart shows.`;
  }

  protected buildUserPrompt(caption: string, ocrText: string): string {
    const lines = [
      caption ? `Caption: ${caption}` : 'Caption: (none)',
      ocrText ? `Text found on the chart: ${ocrText}` : '',
    ];
    return lines.filter(Boolean).join('\n');
  }
}
