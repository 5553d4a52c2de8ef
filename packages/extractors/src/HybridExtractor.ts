import type { ExtractionResult, Extractor, FallbackProvider, Language, Logger } from '@orderflow/core';
import { errorMessage, sanitizeExtraction, silentLogger } from '@orderflow/core';
import { detectLanguage } from './language.js';
import { PatternMatcher } from './pattern/PatternMatcher.js';

export interface HybridExtractorConfig {
  matcher?: PatternMatcher;
  /** Consulted only when no pattern matches */
  fallback?: FallbackProvider | null;
  defaultLanguage?: Language;
  logger?: Logger;
}

/**
 * Patterns first, generative provider second. Never rejects: provider
 * failures come back as `source: 'error'` with no intent.
 */
export class HybridExtractor implements Extractor {
  private readonly matcher: PatternMatcher;
  private readonly fallback: FallbackProvider | null;
  private readonly defaultLanguage: Language;
  private readonly logger: Logger;

  constructor(config: HybridExtractorConfig = {}) {
    this.defaultLanguage = config.defaultLanguage ?? 'en';
    this.matcher = config.matcher ?? new PatternMatcher({ defaultLanguage: this.defaultLanguage });
    this.fallback = config.fallback ?? null;
    this.logger = config.logger ?? silentLogger;
  }

  async extract(text: string): Promise<ExtractionResult> {
    const matched = this.matcher.match(text);
    if (matched) {
      this.logger.debug('Pattern match', { intent: matched.intent });
      return matched;
    }

    const language = detectLanguage(text, this.defaultLanguage);
    if (!this.fallback) {
      return { intent: null, entities: {}, language, source: 'none', confidence: 0 };
    }

    try {
      const raw = await this.fallback.extractIntent(text, language);
      const extraction = raw === null ? null : sanitizeExtraction(raw);
      if (!extraction) {
        this.logger.warn('Fallback extraction returned nothing usable', { provider: this.fallback.name });
        return { intent: null, entities: {}, language, source: 'error', confidence: 0 };
      }

      this.logger.debug('Fallback extraction', { provider: this.fallback.name, intent: extraction.intent });
      return { ...extraction, language, source: 'fallback' };
    } catch (error) {
      this.logger.warn('Fallback extraction failed', { provider: this.fallback.name, error: errorMessage(error) });
      return { intent: null, entities: {}, language, source: 'error', confidence: 0 };
    }
  }
}
