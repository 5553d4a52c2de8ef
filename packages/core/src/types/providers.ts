import type { Entities, ExtractionResult, Intent, Language, SizeCode } from './base.js';
import type { CartSnapshot } from './domain.js';

/**
 * What a generative provider returns for intent extraction
 */
export interface FallbackExtraction {
  intent: Intent | null;
  entities: Entities;
  confidence: number;
}

/**
 * Capability boundary to a generative text-understanding provider.
 *
 * Implementations resolve to `null` instead of rejecting when they have no usable
 * output; callers still guard against rejections.
 */
export interface FallbackProvider {
  readonly name: string;
  extractIntent(text: string, language: Language): Promise<FallbackExtraction | null>;
  generateReply(text: string, contextBlob: string, language: Language): Promise<string | null>;
}

/**
 * Turns raw text into a standardized extraction. Never rejects.
 */
export interface Extractor {
  extract(text: string): Promise<ExtractionResult>;
}

export interface Recommendation {
  name: string;
  category: string;
  description?: string;
  sizes: Array<{ size: SizeCode; price: number }>;
  reason?: string;
  badge?: string;
}

export interface RecommendationProvider {
  getRecommendations(userId: string, cart: CartSnapshot, maxItems: number): Promise<Recommendation[]>;
  formatRecommendationsText(recommendations: Recommendation[], language: Language): string;
}
