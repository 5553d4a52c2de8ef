import type { BatchItem, Language } from '@orderflow/core';
import { WORD_NUMBERS, cleanItemName, extractSize } from '@orderflow/core';

const SEPARATORS: Record<Language, RegExp> = {
  en: /\s*(?:\band\b|[,،])\s*/u,
  ar: /\s*(?:[,،]|\sو\s)\s*/u,
};

/**
 * Splits "2 large pizza and 1 cola" style requests into individual items
 */
export class MultiItemParser {
  /**
   * Two or more number-led items, or a separator splitting the text into
   * two or more non-empty parts
   */
  isMultiItem(text: string, language: Language): boolean {
    const numbered = text.match(/\d+\s*\p{L}/gu) ?? [];
    if (numbered.length >= 2) return true;

    const parts = text.split(SEPARATORS[language]);
    return parts.length >= 2 && parts.every((part) => part.trim().length > 0);
  }

  parse(text: string, language: Language): BatchItem[] {
    const scanned = this.scanNumbered(text, language);
    if (scanned.length >= 2) return scanned;
    return this.splitOnSeparators(text, language);
  }

  // "1 large pizza 2 cola": every item carries its own count
  private scanNumbered(text: string, language: Language): BatchItem[] {
    const items: BatchItem[] = [];
    const scan = /(\d+)\s*(\p{L}+(?:\s+\p{L}+)*?)(?=\s*\d|$|\s+and\s+|\s*[,،])/gu;

    for (const match of text.matchAll(scan)) {
      const [, count, phrase] = match;
      if (!count || !phrase) continue;
      const item = this.toItem(phrase, Number.parseInt(count, 10), language);
      if (item) items.push(item);
    }

    return items;
  }

  // "fries and cola", "one pizza, 2 cola": count defaults to 1
  private splitOnSeparators(text: string, language: Language): BatchItem[] {
    const items: BatchItem[] = [];

    for (const part of text.split(SEPARATORS[language])) {
      const trimmed = part.trim();
      if (!trimmed) continue;

      let quantity = 1;
      let phrase = trimmed;
      const numeric = /^(\d+)\s*(.+)$/u.exec(trimmed);
      const [first = '', ...rest] = trimmed.split(/\s+/);
      const wordNumber = WORD_NUMBERS[language][first];

      if (numeric?.[1] && numeric[2]) {
        quantity = Number.parseInt(numeric[1], 10);
        phrase = numeric[2];
      } else if (wordNumber !== undefined && rest.length > 0) {
        quantity = wordNumber;
        phrase = rest.join(' ');
      }

      const item = this.toItem(phrase, quantity, language);
      if (item) items.push(item);
    }

    return items;
  }

  private toItem(phrase: string, quantity: number, language: Language): BatchItem | null {
    const { size, remainder } = extractSize(phrase, language);
    const item = cleanItemName(remainder);
    return item && quantity > 0 ? { item, quantity, size } : null;
  }
}
