import type { Language, SizeCode } from '../types/index.js';

/**
 * Size words per language, checked in this order; the first hit wins.
 */
export const SIZE_WORDS: Record<Language, ReadonlyArray<readonly [SizeCode, readonly string[]]>> = {
  en: [
    ['S', ['small', 's']],
    ['M', ['medium', 'm']],
    ['L', ['large', 'l', 'big']],
    ['REG', ['regular', 'reg']],
  ],
  ar: [
    ['S', ['صغير', 'ص']],
    ['M', ['متوسط', 'م']],
    ['L', ['كبير', 'ك']],
    ['REG', ['عادي', 'عاد']],
  ],
};

export const WORD_NUMBERS: Record<Language, Readonly<Record<string, number>>> = {
  en: { one: 1, two: 2, three: 3, four: 4, five: 5, six: 6, seven: 7, eight: 8, nine: 9, ten: 10 },
  ar: {
    'واحد': 1,
    'اتنين': 2,
    'تلاتة': 3,
    'اربعة': 4,
    'خمسة': 5,
    'ستة': 6,
    'سبعة': 7,
    'تمانية': 8,
    'تسعة': 9,
    'عشرة': 10,
  },
};

export const FILLER_WORDS: ReadonlySet<string> = new Set(['a', 'an', 'the', 'some']);

const SIZE_LABELS: Record<Language, Record<SizeCode, string>> = {
  en: { S: 'Small', M: 'Medium', L: 'Large', REG: 'Regular' },
  ar: { S: 'صغير', M: 'متوسط', L: 'كبير', REG: 'عادي' },
};

// Word boundary that also works for Arabic letters
const wordPattern = (words: readonly string[], flags = 'u') =>
  new RegExp(`(?<![\\p{L}\\p{N}_])(?:${words.join('|')})(?![\\p{L}\\p{N}_])`, flags);

const SIZE_PATTERNS: Record<Language, Array<{ code: SizeCode; pattern: RegExp }>> = {
  en: SIZE_WORDS.en.map(([code, words]) => ({ code, pattern: wordPattern(words) })),
  ar: SIZE_WORDS.ar.map(([code, words]) => ({ code, pattern: wordPattern(words) })),
};

export function sizeLabel(size: SizeCode, language: Language): string {
  return SIZE_LABELS[language][size];
}

/**
 * Find a size word in `text`. The remainder has the size word removed and
 * whitespace collapsed.
 */
export function extractSize(text: string, language: Language): { size: SizeCode | null; remainder: string } {
  for (const { code, pattern } of SIZE_PATTERNS[language]) {
    if (pattern.test(text)) {
      return { size: code, remainder: collapseSpaces(text.replace(pattern, ' ')) };
    }
  }
  return { size: null, remainder: collapseSpaces(text) };
}

/**
 * Map a single token to a size code, in either language
 */
export function sizeFromToken(token: string): SizeCode | null {
  const lowered = token.toLowerCase();
  for (const language of ['en', 'ar'] as const) {
    for (const [code, words] of SIZE_WORDS[language]) {
      if (words.includes(lowered)) return code;
    }
  }
  return null;
}

/**
 * Split a leading quantity ("two ..." or "2 ...") off an item phrase
 */
export function takeLeadingQuantity(
  text: string,
  language: Language
): { quantity: number | null; remainder: string } {
  const trimmed = text.trim();
  const [first = '', ...rest] = trimmed.split(/\s+/);

  const wordNumber = WORD_NUMBERS[language][first];
  if (wordNumber !== undefined) {
    return { quantity: wordNumber, remainder: rest.join(' ') };
  }

  const numeric = /^(\d+)\s*(\p{L}.*)$/u.exec(trimmed);
  if (numeric?.[1] && numeric[2]) {
    return { quantity: Number.parseInt(numeric[1], 10), remainder: numeric[2].trim() };
  }

  return { quantity: null, remainder: trimmed };
}

/**
 * Strip leading articles and collapse whitespace
 */
export function cleanItemName(text: string): string {
  const words = text.trim().split(/\s+/).filter(Boolean);
  while (words.length > 0 && FILLER_WORDS.has(words[0] ?? '')) {
    words.shift();
  }
  return words.join(' ');
}

export function collapseSpaces(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
