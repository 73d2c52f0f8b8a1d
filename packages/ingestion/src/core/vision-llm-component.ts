import type { LLMCallUsage } from '@ledgerlens/shared';
import type { ImagePart, ModelMessage } from 'ai';
import type { z } from 'zod';

import { LLMCaller } from '@ledgerlens/shared';

import { BaseLLMComponent } from './base-llm-component';

/**
 * Abstract base class for vision-based LLM components
 *
 * Extends BaseLLMComponent with helper methods for vision-based LLM calls
 * using LLMCaller.callVision().
 *
 * Subclasses: VisionChartInterpreter
 */
export abstract class VisionLLMComponent extends BaseLLMComponent {
  /**
   * Call LLM with vision capabilities using LLMCaller.callVision()
   *
   * @param schema - Zod schema for response validation
   * @param messages - Messages array including image content
   * @param phase - Phase name for tracking (e.g., 'describe', 'digitize')
   */
  protected async callVisionLLM<TOutput>(
    schema: z.ZodType<TOutput>,
    messages: ModelMessage[],
    phase: string,
  ): Promise<{ output: TOutput; usage: LLMCallUsage }> {
    const result = await LLMCaller.callVision({
      schema,
      messages,
      primaryModel: this.model,
      fallbackModel: this.fallbackModel,
      maxRetries: this.maxRetries,
      temperature: this.temperature,
      abortSignal: this.abortSignal,
      component: this.componentName,
      phase,
    });

    this.trackUsage(result.usage);

    return { output: result.output, usage: result.usage };
  }

  /**
   * Build image content for vision LLM messages from raw image bytes
   */
  protected buildImageContent(
    image: Uint8Array,
    mediaType: string = 'image/png',
  ): ImagePart {
    return { type: 'image', image, mediaType };
  }
}
