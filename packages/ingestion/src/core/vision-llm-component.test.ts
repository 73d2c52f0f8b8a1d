import type { LLMCallUsage } from '@ledgerlens/shared';
import type { ModelMessage } from 'ai';

import { LLMCaller } from '@ledgerlens/shared';
import { beforeEach, describe, expect, test, vi } from 'vitest';
import { z } from 'zod';

import { VisionLLMComponent } from './vision-llm-component';

vi.mock('@ledgerlens/shared', () => ({
  LLMCaller: {
    callVision: vi.fn(),
  },
}));

/**
 * Concrete implementation for testing abstract class
 */
class TestVisionComponent extends VisionLLMComponent {
  protected buildSystemPrompt(): string {
    return 'Test system prompt';
  }

  protected buildUserPrompt(input: string): string {
    return `Test user prompt: ${input}`;
  }

  public async testCallVisionLLM<T>(
    schema: z.ZodType<T>,
    messages: ModelMessage[],
    phase: string,
  ) {
    return this.callVisionLLM(schema, messages, phase);
  }

  public testBuildImageContent(image: Uint8Array, mediaType?: string) {
    return this.buildImageContent(image, mediaType);
  }

  public testLog(message: string) {
    this.log('warn', message, 'detail');
  }
}

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

const mockUsage: LLMCallUsage = {
  component: 'TestComponent',
  phase: 'test-phase',
  model: 'primary',
  modelName: 'test-model',
  inputTokens: 100,
  outputTokens: 50,
  totalTokens: 150,
};

describe('VisionLLMComponent', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('callVisionLLM()', () => {
    test('calls LLMCaller.callVision() with the component configuration', async () => {
      const controller = new AbortController();
      const component = new TestVisionComponent(
        mockLogger,
        'test-primary-model',
        'TestComponent',
        { maxRetries: 5, temperature: 0.5, abortSignal: controller.signal },
        'test-fallback-model',
      );
      const schema = z.object({ result: z.string() });
      const messages: ModelMessage[] = [
        { role: 'user', content: [{ type: 'text', text: 'Test' }] },
      ];
      vi.mocked(LLMCaller.callVision).mockResolvedValue({
        output: { result: 'ok' },
        usage: mockUsage,
        usedFallback: false,
      });

      const result = await component.testCallVisionLLM(
        schema,
        messages,
        'test-phase',
      );

      expect(LLMCaller.callVision).toHaveBeenCalledWith({
        schema,
        messages,
        primaryModel: 'test-primary-model',
        fallbackModel: 'test-fallback-model',
        maxRetries: 5,
        temperature: 0.5,
        abortSignal: controller.signal,
        component: 'TestComponent',
        phase: 'test-phase',
      });
      expect(result).toEqual({ output: { result: 'ok' }, usage: mockUsage });
    });

    test('uses default retries and temperature', async () => {
      const component = new TestVisionComponent(
        mockLogger,
        'test-model',
        'TestComponent',
      );
      vi.mocked(LLMCaller.callVision).mockResolvedValue({
        output: {},
        usage: mockUsage,
        usedFallback: false,
      });

      await component.testCallVisionLLM(z.object({}), [], 'phase');

      expect(LLMCaller.callVision).toHaveBeenCalledWith(
        expect.objectContaining({
          maxRetries: 3,
          temperature: 0,
          fallbackModel: undefined,
        }),
      );
    });

    test('reports usage through onUsage', async () => {
      const onUsage = vi.fn();
      const component = new TestVisionComponent(
        mockLogger,
        'test-model',
        'TestComponent',
        { onUsage },
      );
      vi.mocked(LLMCaller.callVision).mockResolvedValue({
        output: {},
        usage: mockUsage,
        usedFallback: false,
      });

      await component.testCallVisionLLM(z.object({}), [], 'phase');

      expect(onUsage).toHaveBeenCalledWith(mockUsage);
    });

    test('propagates LLMCaller errors', async () => {
      const component = new TestVisionComponent(
        mockLogger,
        'test-model',
        'TestComponent',
      );
      vi.mocked(LLMCaller.callVision).mockRejectedValue(new Error('quota'));

      await expect(
        component.testCallVisionLLM(z.object({}), [], 'phase'),
      ).rejects.toThrow('quota');
    });
  });

  test('buildImageContent wraps bytes with a media type', () => {
    const component = new TestVisionComponent(mockLogger, 'm', 'Test');
    const bytes = Buffer.from('png');

    expect(component.testBuildImageContent(bytes)).toEqual({
      type: 'image',
      image: bytes,
      mediaType: 'image/png',
    });
    expect(component.testBuildImageContent(bytes, 'image/jpeg').mediaType).toBe(
      'image/jpeg',
    );
  });

  test('log prefixes the component name', () => {
    const component = new TestVisionComponent(mockLogger, 'm', 'ChartReader');

    component.testLog('slow response');

    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[ChartReader] slow response',
      'detail',
    );
  });
});
