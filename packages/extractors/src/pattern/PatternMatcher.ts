import type { Entities, ExtractionResult, Language } from '@orderflow/core';
import { ENTITY_KEYS, cleanItemName, extractSize, sizeFromToken, takeLeadingQuantity } from '@orderflow/core';
import { detectLanguage } from '../language.js';
import { MultiItemParser } from './MultiItemParser.js';
import { flattenRules, INTENT_PATTERNS } from './rules.js';
import type { IntentPatterns, PatternRule } from './rules.js';

export interface PatternMatcherConfig {
  /** Rule table; defaults to the built-in one */
  patterns?: IntentPatterns[];
  defaultLanguage?: Language;
  multiItemParser?: MultiItemParser;
}

/**
 * Deterministic first-pass extractor: ordered regex rules per language.
 * The first rule that matches decides the intent.
 */
export class PatternMatcher {
  private readonly rules: PatternRule[];
  private readonly defaultLanguage: Language;
  private readonly multiItem: MultiItemParser;

  constructor(config: PatternMatcherConfig = {}) {
    this.rules = flattenRules(config.patterns ?? INTENT_PATTERNS);
    this.defaultLanguage = config.defaultLanguage ?? 'en';
    this.multiItem = config.multiItemParser ?? new MultiItemParser();
  }

  /**
   * Pattern extraction, or null when no rule matches
   */
  match(text: string): ExtractionResult | null {
    const normalized = normalize(text);
    if (!normalized) return null;

    const language = detectLanguage(normalized, this.defaultLanguage);

    for (const rule of this.rules) {
      if (rule.language !== language) continue;

      const match = rule.pattern.exec(normalized);
      if (!match) continue;

      const groups = match.groups ?? {};
      if (rule.intent === 'add_item' && groups.fullInput) {
        return this.parseAddItem(groups.fullInput, language);
      }

      return {
        intent: rule.intent,
        entities: entitiesFromGroups(groups),
        language,
        source: 'pattern',
        confidence: 1,
      };
    }

    return null;
  }

  /**
   * Item phrase to either a batch or a single item with quantity and size
   */
  private parseAddItem(fullInput: string, language: Language): ExtractionResult {
    const phrase = fullInput.trim();

    if (this.multiItem.isMultiItem(phrase, language)) {
      const batchItems = this.multiItem.parse(phrase, language);
      if (batchItems.length >= 2) {
        return { intent: 'add_item', entities: {}, language, source: 'pattern', confidence: 1, batchItems };
      }
    }

    const { quantity, remainder } = takeLeadingQuantity(phrase, language);
    const { size, remainder: withoutSize } = extractSize(remainder, language);
    const item = cleanItemName(withoutSize);

    const entities: Entities = {};
    if (item) entities.item = item;
    if (size) entities.size = size;
    if (quantity !== null) entities.quantity = quantity;

    return { intent: 'add_item', entities, language, source: 'pattern', confidence: 1 };
  }
}

function normalize(text: string): string {
  return text.trim().toLowerCase().replace(/[.!?؟]+$/u, '').trim();
}

function entitiesFromGroups(groups: Record<string, string | undefined>): Entities {
  const entities: Entities = {};
  for (const key of ENTITY_KEYS) {
    const value = groups[key]?.trim();
    if (!value) continue;
    switch (key) {
      case 'quantity':
        entities.quantity = Number.parseInt(value, 10);
        break;
      case 'size': {
        const size = sizeFromToken(value);
        if (size) entities.size = size;
        break;
      }
      default:
        entities[key] = value;
    }
  }
  return entities;
}
