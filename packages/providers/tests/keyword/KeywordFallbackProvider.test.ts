import { describe, it, expect } from 'vitest';
import { KeywordFallbackProvider, loadDefaultCorpus } from '../../src/keyword/KeywordFallbackProvider.js';

describe('KeywordFallbackProvider', () => {
  const provider = new KeywordFallbackProvider();

  it('should load the bundled corpus for both languages', () => {
    const corpus = loadDefaultCorpus();

    expect(Object.keys(corpus)).toEqual(['en', 'ar']);
    expect(corpus.en?.view_cart).toContain('what is in my basket');
  });

  it('should match the closest intent by its keywords', async () => {
    const result = await provider.extractIntent('what is in my basket', 'en');

    expect(result?.intent).toBe('view_cart');
    expect(result?.entities).toEqual({});
    expect(result?.confidence).toBeGreaterThan(0.5);
    expect(result?.confidence).toBeLessThanOrEqual(0.9);
  });

  it('should pull the order number for order tracking', async () => {
    const result = await provider.extractIntent('delivery status 15', 'en');

    expect(result?.intent).toBe('track_order');
    expect(result?.entities).toEqual({ order_id: '15' });
  });

  it('should match Arabic phrases against the Arabic corpus', async () => {
    const result = await provider.extractIntent('الدليفري اتأخر', 'ar');

    expect(result?.intent).toBe('track_order');
    expect(result?.entities).toEqual({});
  });

  it('should report no intent for unknown words', async () => {
    expect(await provider.extractIntent('zzz qqq', 'en')).toEqual({ intent: null, entities: {}, confidence: 0 });
  });

  it('should report no intent for empty text', async () => {
    expect(await provider.extractIntent('   ', 'en')).toEqual({ intent: null, entities: {}, confidence: 0 });
  });

  it('should reject matches under the threshold', async () => {
    const strict = new KeywordFallbackProvider({ threshold: 100 });

    expect((await strict.extractIntent('what is in my basket', 'en'))?.intent).toBeNull();
  });

  it('should accept a custom corpus', async () => {
    const custom = new KeywordFallbackProvider({
      corpus: { en: { checkout: ['pay now', 'pay the bill'], welcome: ['hello there'] } },
    });

    expect((await custom.extractIntent('pay', 'en'))?.intent).toBe('checkout');
    expect((await custom.extractIntent('مرحبا', 'ar'))?.intent).toBeNull();
  });

  it('should never generate replies', async () => {
    expect(await provider.generateReply()).toBeNull();
  });
});
