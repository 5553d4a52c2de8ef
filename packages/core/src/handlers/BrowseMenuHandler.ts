import type { DialogueContext, IntentHandler, Language, MenuItem } from '../types/index.js';
import { withHandlerResult } from '../context/DialogueContext.js';
import { CURRENCY } from '../i18n/messages.js';
import type { HandlerDependencies } from './types.js';

const MENU_TITLE: Record<Language, string> = { en: '🍕 Our Menu:', ar: '🍕 المنيو:' };

export class BrowseMenuHandler implements IntentHandler {
  readonly name = 'browse_menu';

  constructor(private readonly deps: HandlerDependencies) {}

  canHandle(context: DialogueContext): boolean {
    return context.intent === 'browse_menu';
  }

  async execute(context: DialogueContext): Promise<DialogueContext> {
    const query = context.entities.item?.trim();

    if (query) {
      const category = await this.findCategory(query.toLowerCase());
      if (category.length > 0) {
        return withHandlerResult(context, this.name, {
          success: true,
          message: formatMenu(category, context.language),
        });
      }

      const item = await this.deps.store.getMenuItem(query, false);
      if (item) {
        return withHandlerResult(context, this.name, { success: true, message: formatMenuItem(item) });
      }
    }

    const items = (await this.deps.store.listMenu()).filter((item) => item.available);
    return withHandlerResult(context, this.name, {
      success: true,
      message: formatMenu(items, context.language),
    });
  }

  // "pizzas" and "pizza" both name the pizza category
  private async findCategory(query: string): Promise<MenuItem[]> {
    for (const name of new Set([query, query.replace(/s$/, '')])) {
      const items = (await this.deps.store.listMenu(name)).filter((item) => item.available);
      if (items.length > 0) return items;
    }
    return [];
  }
}

export function formatMenuItem(item: MenuItem): string {
  const sizes = item.sizes
    .filter((size) => size.available)
    .map((size) => `${size.size} ${size.price} ${CURRENCY}`)
    .join(', ');
  return `  • ${item.name}: ${sizes}`;
}

/**
 * Menu grouped by category, in first-seen category order
 */
export function formatMenu(items: MenuItem[], language: Language): string {
  const byCategory = new Map<string, MenuItem[]>();
  for (const item of items) {
    const group = byCategory.get(item.category) ?? [];
    group.push(item);
    byCategory.set(item.category, group);
  }

  const sections = Array.from(byCategory, ([category, group]) =>
    [`${category.charAt(0).toUpperCase()}${category.slice(1)}:`, ...group.map(formatMenuItem)].join('\n')
  );
  return [MENU_TITLE[language], '', sections.join('\n\n')].join('\n');
}
