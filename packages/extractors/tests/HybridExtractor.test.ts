import { describe, it, expect, vi } from 'vitest';
import { createLogger } from '@orderflow/core';
import type { FallbackExtraction, FallbackProvider } from '@orderflow/core';
import { HybridExtractor } from '../src/HybridExtractor.js';

function stubProvider(extract: FallbackProvider['extractIntent']) {
  const extractIntent = vi.fn(extract);
  const provider: FallbackProvider = { name: 'stub', extractIntent, generateReply: async () => null };
  return { provider, extractIntent };
}

describe('HybridExtractor', () => {
  it('should return pattern matches without asking the provider', async () => {
    const { provider, extractIntent } = stubProvider(async () => null);
    const extractor = new HybridExtractor({ fallback: provider });

    const result = await extractor.extract('add cola');

    expect(result).toEqual({
      intent: 'add_item',
      entities: { item: 'cola' },
      language: 'en',
      source: 'pattern',
      confidence: 1,
    });
    expect(extractIntent).not.toHaveBeenCalled();
  });

  it('should report no intent when there is no provider', async () => {
    expect(await new HybridExtractor().extract('tell me a joke')).toEqual({
      intent: null,
      entities: {},
      language: 'en',
      source: 'none',
      confidence: 0,
    });
  });

  it("should use the provider's extraction when patterns miss", async () => {
    const answer: FallbackExtraction = { intent: 'view_cart', entities: {}, confidence: 0.8 };
    const { provider, extractIntent } = stubProvider(async () => answer);

    const result = await new HybridExtractor({ fallback: provider }).extract('what is in my basket');

    expect(result).toEqual({ intent: 'view_cart', entities: {}, confidence: 0.8, language: 'en', source: 'fallback' });
    expect(extractIntent).toHaveBeenCalledWith('what is in my basket', 'en');
  });

  it('should pass the detected language to the provider', async () => {
    const { provider, extractIntent } = stubProvider(async () => ({ intent: null, entities: {}, confidence: 0 }));

    const result = await new HybridExtractor({ fallback: provider }).extract('شكرا جزيلا');

    expect(extractIntent).toHaveBeenCalledWith('شكرا جزيلا', 'ar');
    expect(result.language).toBe('ar');
    expect(result.source).toBe('fallback');
  });

  it('should clean up what the provider returns', async () => {
    const { provider } = stubProvider(async () => ({
      intent: 'add_item',
      entities: { item: ' Cola ', size: 'L' },
      confidence: 3,
    }));

    const result = await new HybridExtractor({ fallback: provider }).extract('the fizzy drink thing');

    expect(result.entities).toEqual({ item: 'Cola', size: 'L' });
    expect(result.confidence).toBe(1);
  });

  it('should mark an empty provider answer as an error', async () => {
    const { provider } = stubProvider(async () => null);

    expect(await new HybridExtractor({ fallback: provider }).extract('tell me a joke')).toEqual({
      intent: null,
      entities: {},
      language: 'en',
      source: 'error',
      confidence: 0,
    });
  });

  it('should not reject when the provider throws', async () => {
    const write = vi.fn();
    const { provider } = stubProvider(async () => {
      throw new Error('rate limited');
    });
    const extractor = new HybridExtractor({ fallback: provider, logger: createLogger({ write }) });

    const result = await extractor.extract('tell me a joke');

    expect(result.source).toBe('error');
    expect(result.intent).toBeNull();
    expect(write).toHaveBeenCalledWith(
      'warn',
      '[WARN] Fallback extraction failed {"provider":"stub","error":"rate limited"}'
    );
  });
});
