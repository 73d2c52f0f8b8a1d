import type { z } from 'zod';

import {
  type LanguageModel,
  type ModelMessage,
  NoObjectGeneratedError,
  Output,
  generateText,
} from 'ai';

/**
 * Configuration for a structured vision call
 */
export interface LLMVisionCallConfig<TOutput> {
  /**
   * Zod schema the response must satisfy
   */
  schema: z.ZodType<TOutput>;

  /**
   * Conversation including image parts
   */
  messages: ModelMessage[];

  /**
   * Model tried first
   */
  primaryModel: LanguageModel;

  /**
   * Model tried once the primary model has failed (optional)
   */
  fallbackModel?: LanguageModel;

  /**
   * Transport retries per model, handled by the AI SDK
   */
  maxRetries: number;

  /**
   * Sampling temperature (optional, 0-1)
   */
  temperature?: number;

  abortSignal?: AbortSignal;

  /**
   * Caller name for usage tracking (e.g. 'VisionChartInterpreter')
   */
  component: string;

  /**
   * Step name for usage tracking (e.g. 'describe', 'digitize')
   */
  phase: string;
}

/**
 * Token usage of one call
 */
export interface LLMCallUsage {
  component: string;
  phase: string;
  model: 'primary' | 'fallback';
  modelName: string;
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface LLMCallResult<T> {
  output: T;
  usage: LLMCallUsage;
  usedFallback: boolean;
}

interface RawUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

/**
 * LLMCaller - structured vision calls with a fallback model.
 *
 * 1. Ask the primary model for an object matching the schema, repeating the
 *    request when the model answers with something that does not parse
 * 2. On any other failure, repeat with the fallback model when one is set
 * 3. Aborts are rethrown without trying the fallback
 */
export class LLMCaller {
  /**
   * Extra attempts when the response does not match the schema
   */
  private static readonly MAX_SCHEMA_RETRIES = 2;

  private static modelName(model: LanguageModel): string {
    return typeof model === 'string' ? model : model.modelId;
  }

  private static buildUsage(
    config: Pick<LLMVisionCallConfig<unknown>, 'component' | 'phase'>,
    modelName: string,
    usage: RawUsage | undefined,
    usedFallback: boolean,
  ): LLMCallUsage {
    return {
      component: config.component,
      phase: config.phase,
      model: usedFallback ? 'fallback' : 'primary',
      modelName,
      inputTokens: usage?.inputTokens ?? 0,
      outputTokens: usage?.outputTokens ?? 0,
      totalTokens: usage?.totalTokens ?? 0,
    };
  }

  private static async generateObject<TOutput>(
    model: LanguageModel,
    config: LLMVisionCallConfig<TOutput>,
  ): Promise<{ output: TOutput; usage?: RawUsage }> {
    let lastError: unknown;

    for (let attempt = 0; attempt <= this.MAX_SCHEMA_RETRIES; attempt++) {
      try {
        const result = await generateText({
          model,
          output: Output.object({ schema: config.schema }),
          messages: config.messages,
          temperature: config.temperature,
          maxRetries: config.maxRetries,
          abortSignal: config.abortSignal,
        });
        return { output: result.output, usage: result.usage };
      } catch (error) {
        if (NoObjectGeneratedError.isInstance(error)) {
          lastError = error;
          continue;
        }
        throw error;
      }
    }

    throw lastError;
  }

  /**
   * Call a vision model and parse its answer with `config.schema`.
   *
   * @throws the last error when every model fails
   */
  static async callVision<TOutput>(
    config: LLMVisionCallConfig<TOutput>,
  ): Promise<LLMCallResult<TOutput>> {
    try {
      const response = await this.generateObject(config.primaryModel, config);
      return {
        output: response.output,
        usage: this.buildUsage(
          config,
          this.modelName(config.primaryModel),
          response.usage,
          false,
        ),
        usedFallback: false,
      };
    } catch (primaryError) {
      if (config.abortSignal?.aborted || !config.fallbackModel) {
        throw primaryError;
      }

      const response = await this.generateObject(config.fallbackModel, config);
      return {
        output: response.output,
        usage: this.buildUsage(
          config,
          this.modelName(config.fallbackModel),
          response.usage,
          true,
        ),
        usedFallback: true,
      };
    }
  }
}
