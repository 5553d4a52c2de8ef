import type {
  CartSnapshot,
  Language,
  MenuItem,
  MenuStore,
  Recommendation,
  RecommendationProvider,
} from '../types/index.js';
import { CURRENCY, messagesFor } from '../i18n/messages.js';

const DRINK_KEYWORDS = ['cola', 'juice', 'water', 'drink'];
const SIDE_KEYWORDS = ['fries'];

const matchesAny = (name: string, keywords: string[]) => {
  const lowered = name.toLowerCase();
  return keywords.some((keyword) => lowered.includes(keyword));
};

/**
 * Cart-aware recommendations: a drink and a side for pizza orders, then
 * featured items to fill up to the requested count
 */
export class MenuRecommender implements RecommendationProvider {
  constructor(private readonly menu: MenuStore) {}

  async getRecommendations(_userId: string, cart: CartSnapshot, maxItems: number): Promise<Recommendation[]> {
    if (maxItems <= 0) return [];

    const inCart = new Set(cart.items.map((line) => line.itemName.toLowerCase()));
    const candidates = (await this.menu.listMenu()).filter(
      (item) =>
        item.available &&
        item.sizes.some((size) => size.available) &&
        !inCart.has(item.name.toLowerCase())
    );

    const hasPizza = cart.items.some((line) => line.category === 'pizza');
    const hasDrink = cart.items.some((line) => matchesAny(line.itemName, DRINK_KEYWORDS));
    const hasSide = cart.items.some((line) => matchesAny(line.itemName, SIDE_KEYWORDS));

    const picks: Recommendation[] = [];
    const take = (item: MenuItem | undefined, reason: string, badge: string) => {
      if (!item || picks.length >= maxItems || picks.some((pick) => pick.name === item.name)) return;
      picks.push(toRecommendation(item, reason, badge));
    };

    if (hasPizza && !hasDrink) {
      take(
        candidates.find((item) => matchesAny(item.name, DRINK_KEYWORDS)),
        'Perfect with your pizza!',
        '🥤 Pair it'
      );
    }
    if (hasPizza && !hasSide) {
      take(
        candidates.find((item) => matchesAny(item.name, SIDE_KEYWORDS)),
        'Complete your meal!',
        '🍟 Add on'
      );
    }
    for (const item of candidates) {
      take(item, 'Great choice', '⭐ Featured');
    }

    return picks;
  }

  formatRecommendationsText(recommendations: Recommendation[], language: Language): string {
    if (recommendations.length === 0) return '';

    const blocks = recommendations.map((recommendation) => {
      const lines = [`${recommendation.badge ?? '✨'} ${recommendation.name}`];
      if (recommendation.reason) lines.push(`   ${recommendation.reason}`);
      lines.push(`   ${formatPrices(recommendation)}`);
      return lines.join('\n');
    });

    return `${messagesFor(language).recommendationsHeader}\n\n${blocks.join('\n\n')}`;
  }
}

function toRecommendation(item: MenuItem, reason: string, badge: string): Recommendation {
  return {
    name: item.name,
    category: item.category,
    ...(item.description ? { description: item.description } : {}),
    sizes: item.sizes.filter((size) => size.available).map((size) => ({ size: size.size, price: size.price })),
    reason,
    badge,
  };
}

function formatPrices(recommendation: Recommendation): string {
  const [only] = recommendation.sizes;
  if (recommendation.sizes.length === 1 && only) return `${only.price} ${CURRENCY}`;
  return recommendation.sizes.map((size) => `${size.size}(${size.price} ${CURRENCY})`).join(', ');
}
