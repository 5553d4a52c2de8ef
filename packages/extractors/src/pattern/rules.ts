import type { Intent, Language } from '@orderflow/core';

export interface PatternRule {
  intent: Intent;
  language: Language;
  pattern: RegExp;
}

export interface IntentPatterns {
  intent: Intent;
  patterns: Partial<Record<Language, RegExp[]>>;
}

// Named groups: `fullInput` is re-parsed into item/size/quantity,
// any group named after an entity key becomes that entity.
export const INTENT_PATTERNS: IntentPatterns[] = [
  {
    intent: 'welcome',
    patterns: {
      en: [/\b(?:hi|hello|hey)\b/u],
      ar: [/(?:اهلا|أهلا|مرحبا|هاي)/u],
    },
  },
  {
    intent: 'track_order',
    patterns: {
      en: [/\b(?:track|status of) my order(?: number (?<order_id>\d+))?/u],
      ar: [/(?:عايز اعرف|حالة) طلبي(?: رقم (?<order_id>\d+))?/u],
    },
  },
  {
    intent: 'add_item',
    patterns: {
      en: [
        /\b(?:add|order|i want to order|i want|get me|give me)\s+(?:a\s+)?(?<fullInput>[\w\s,&]+?)(?:\s+(?:please|thanks|thank you))?$/u,
        /^(?<fullInput>(?:\d+|one|two|three|four|five|six|seven|eight|nine|ten)\s*[a-z][\w\s,&]*)$/u,
      ],
      ar: [/(?:ضيف|طلب|عايز)\s+(?<fullInput>[\p{L}\p{N}\s,،]+?)(?:\s+(?:من فضلك|شكرا))?$/u],
    },
  },
  {
    intent: 'remove_item',
    patterns: {
      en: [/\b(?:remove|delete|cancel)\s+(?!(?:my\s+)?cart$|that$)(?<item>[\w\s]+)/u],
      ar: [/(?:شيل|احذف)\s+(?<item>[\p{L}\p{N}\s]+)/u],
    },
  },
  {
    intent: 'view_cart',
    patterns: {
      en: [
        /\b(?:show|view|what|see) (?:my )?cart\b/u,
        /\b(?:what|how much|what's) (?:is )?(?:the |my )?total\b/u,
        /\b(?:how much|what) (?:do |did )?i (?:order|have|spend)\b/u,
        /\b(?:what's|show) (?:my )?(?:order|price)\b/u,
      ],
      ar: [/(?:اعرض|شف) (?:سلة )?الطلب/u, /كام في السلة/u, /(?:كام|إيه|ايه) (?:المجموع|السعر)/u],
    },
  },
  {
    intent: 'clear_cart',
    patterns: {
      en: [/\b(?:clear|empty|reset|cancel) (?:my )?cart\b/u],
      ar: [/(?:امسح|فضي|الغي) (?:السلة|الطلب)/u],
    },
  },
  {
    intent: 'checkout',
    patterns: {
      en: [/\b(?:checkout|confirm|place order|pay|complete)\b/u],
      ar: [/(?:ادفع|اكمل|اتمم الطلب|أكد الطلب)/u],
    },
  },
  {
    intent: 'browse_menu',
    patterns: {
      en: [/\b(?:what do you have|show menu|menu|pizzas?|items)\b/u],
      ar: [/(?:في إيه|قائمة|المنيو|عندك إيه|بيتزا)/u],
    },
  },
  {
    intent: 'new_order',
    patterns: {
      en: [/\b(?:new order|start order)\b/u],
      ar: [/(?:طلب جديد|ابدأ طلب)/u],
    },
  },
  {
    intent: 'confirmation',
    patterns: {
      en: [/^(?:yes|yeah|yep|yup|sure|ok|okay|correct|right|fine|alright|sounds good|that's right)$/u],
      ar: [/^(?:نعم|ايوة|أيوة|ماشي|تمام|صح)$/u],
    },
  },
  {
    intent: 'rejection',
    patterns: {
      en: [/^(?:no|nope|nah|not really|incorrect|wrong|cancel that)$/u],
      ar: [/^(?:لا|مش صح|غلط)$/u],
    },
  },
];

/**
 * Flatten the table into the matching order: intents in table order, each
 * intent's patterns in listed order
 */
export function flattenRules(table: IntentPatterns[] = INTENT_PATTERNS): PatternRule[] {
  return table.flatMap(({ intent, patterns }) =>
    (['en', 'ar'] as const).flatMap((language) =>
      (patterns[language] ?? []).map((pattern) => ({ intent, language, pattern }))
    )
  );
}
