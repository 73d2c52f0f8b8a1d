import type { LoggerMethods } from '@ledgerlens/logger';
import type { LLMCallUsage } from '@ledgerlens/shared';
import type { LanguageModel } from 'ai';

/**
 * Base options for all LLM-based components
 */
export interface BaseLLMComponentOptions {
  /**
   * Maximum retry count for LLM API (default: 3)
   */
  maxRetries?: number;

  /**
   * Temperature for LLM generation (default: 0)
   */
  temperature?: number;

  /**
   * Abort signal for cancellation support
   */
  abortSignal?: AbortSignal;

  /**
   * Receives token usage after every successful call
   */
  onUsage?: (usage: LLMCallUsage) => void;
}

/**
 * Abstract base class for all LLM-based components
 *
 * Provides common functionality:
 * - Consistent logging with component name prefix
 * - Token usage reporting via an optional callback
 * - Standard configuration (model, fallback, retries, temperature)
 *
 * Subclasses must implement buildSystemPrompt() and buildUserPrompt().
 */
export abstract class BaseLLMComponent {
  protected readonly logger: LoggerMethods;
  protected readonly model: LanguageModel;
  protected readonly fallbackModel?: LanguageModel;
  protected readonly maxRetries: number;
  protected readonly temperature: number;
  protected readonly componentName: string;
  protected readonly abortSignal?: AbortSignal;
  private readonly onUsage?: (usage: LLMCallUsage) => void;

  /**
   * @param componentName - Name used as the log prefix and usage label
   */
  constructor(
    logger: LoggerMethods,
    model: LanguageModel,
    componentName: string,
    options?: BaseLLMComponentOptions,
    fallbackModel?: LanguageModel,
  ) {
    this.logger = logger;
    this.model = model;
    this.componentName = componentName;
    this.maxRetries = options?.maxRetries ?? 3;
    this.temperature = options?.temperature ?? 0;
    this.fallbackModel = fallbackModel;
    this.abortSignal = options?.abortSignal;
    this.onUsage = options?.onUsage;
  }

  /**
   * Log a message with consistent component name prefix
   */
  protected log(
    level: 'info' | 'warn' | 'error',
    message: string,
    ...args: unknown[]
  ): void {
    const formattedMessage = `[${this.componentName}] ${message}`;
    this.logger[level](formattedMessage, ...args);
  }

  protected trackUsage(usage: LLMCallUsage): void {
    this.onUsage?.(usage);
  }

  protected abstract buildSystemPrompt(...args: unknown[]): string;

  protected abstract buildUserPrompt(...args: unknown[]): string;
}
