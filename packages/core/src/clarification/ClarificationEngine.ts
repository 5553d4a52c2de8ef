import type {
  CartSnapshot,
  DialogueState,
  EntityKey,
  Entities,
  Intent,
  Language,
  MenuSize,
  MenuStore,
  PendingAction,
} from '../types/index.js';
import { messagesFor } from '../i18n/messages.js';
import {
  cleanItemName,
  extractSize,
  sizeLabel,
  takeLeadingQuantity,
  WORD_NUMBERS,
} from '../domain/normalize.js';

/**
 * Add-ons that come in one size; asking "what size?" for them is noise
 */
export const SINGLE_SIZE_KEYWORDS = ['fries', 'cola', 'juice', 'water', 'drink'] as const;

/**
 * Intents that start a new command. While a pending action is open, a message
 * recognized as one of these abandons the pending action instead of answering it.
 */
const COMMAND_INTENTS: ReadonlySet<Intent> = new Set([
  'add_item',
  'remove_item',
  'view_cart',
  'clear_cart',
  'checkout',
  'track_order',
  'new_order',
  'confirmation',
  'rejection',
]);

const FIELD_STATES: Partial<Record<EntityKey, DialogueState>> = {
  size: 'awaiting_size',
  quantity: 'awaiting_quantity',
  item: 'clarifying_item',
  address: 'awaiting_address',
};

export interface ClarificationEngineConfig {
  /** Unanswered follow-ups before a pending action is dropped. Defaults to 3. */
  maxAttempts?: number;
}

export interface ClarificationCheck {
  needed: boolean;
  missingFields: EntityKey[];
}

/**
 * Everything the orchestrator needs to ask one follow-up question
 */
export interface Clarification {
  question: string;
  missingFields: EntityKey[];
  dialogueState: DialogueState;
  /** null when the question can't be answered by filling a slot (e.g. unknown item) */
  pendingAction: PendingAction | null;
  suggestedActions: string[];
}

export type PendingResolution =
  | { status: 'resolved'; intent: Intent; entities: Entities }
  | { status: 'incomplete'; intent: Intent; entities: Entities; pendingAction: PendingAction }
  | { status: 'superseded' }
  | { status: 'abandoned'; attempts: number };

interface Question {
  text: string;
  answerable: boolean;
  suggestedActions: string[];
}

/**
 * Decides whether a command has what it needs, phrases the follow-up question
 * and folds the user's answer back into the pending command.
 */
export class ClarificationEngine {
  private readonly maxAttempts: number;

  constructor(
    private readonly menu: MenuStore,
    config: ClarificationEngineConfig = {}
  ) {
    this.maxAttempts = config.maxAttempts ?? 3;
  }

  requiredFields(intent: Intent, entities: Entities): EntityKey[] {
    switch (intent) {
      case 'add_item': {
        const item = entities.item?.toLowerCase() ?? '';
        const singleSize = SINGLE_SIZE_KEYWORDS.some((keyword) => item.includes(keyword));
        return singleSize ? ['item'] : ['item', 'size'];
      }
      case 'remove_item':
        return ['item'];
      case 'track_order':
        return ['order_id'];
      default:
        return [];
    }
  }

  needsClarification(intent: Intent, entities: Entities): ClarificationCheck {
    const missingFields = this.requiredFields(intent, entities).filter((field) => isBlank(entities[field]));
    return { needed: missingFields.length > 0, missingFields };
  }

  async generateQuestion(
    intent: Intent,
    entities: Entities,
    missingFields: EntityKey[],
    language: Language,
    cart: CartSnapshot
  ): Promise<string> {
    const question = await this.buildQuestion(intent, entities, missingFields, language, cart);
    return question.text;
  }

  /**
   * Question, pending action and dialogue state for an incomplete command.
   * `previous` carries the attempt count across re-asks of the same command.
   */
  async clarify(
    intent: Intent,
    entities: Entities,
    missingFields: EntityKey[],
    language: Language,
    cart: CartSnapshot,
    previous: PendingAction | null = null,
    now: Date = new Date()
  ): Promise<Clarification> {
    const question = await this.buildQuestion(intent, entities, missingFields, language, cart);

    if (!question.answerable) {
      return {
        question: question.text,
        missingFields,
        dialogueState: 'idle',
        pendingAction: null,
        suggestedActions: question.suggestedActions,
      };
    }

    const pendingAction = this.createPendingAction(intent, entities, missingFields, now);
    if (previous && previous.actionType === intent) {
      pendingAction.attempts = previous.attempts;
    }

    return {
      question: question.text,
      missingFields,
      dialogueState: this.stateFor(missingFields),
      pendingAction,
      suggestedActions: question.suggestedActions,
    };
  }

  createPendingAction(
    intent: Intent,
    entities: Entities,
    missingFields: EntityKey[],
    now: Date = new Date()
  ): PendingAction {
    return {
      actionType: intent,
      missingFields: [...missingFields],
      partialData: { ...entities },
      createdAt: now,
      attempts: 0,
    };
  }

  stateFor(missingFields: EntityKey[]): DialogueState {
    for (const field of missingFields) {
      const state = FIELD_STATES[field];
      if (state) return state;
    }
    return 'idle';
  }

  /**
   * Try to complete `pending` with the user's latest message.
   * `intent` and `extracted` are what extraction made of that message on its
   * own. The same intent without a new item ("add_item {size: L}" for
   * "large") answers the pending command instead of replacing it.
   */
  resolvePendingAction(
    pending: PendingAction,
    message: string,
    intent: Intent | null,
    language: Language,
    extracted: Entities = {}
  ): PendingResolution {
    const restatesPending = intent === pending.actionType && isBlank(extracted.item);
    if (intent !== null && COMMAND_INTENTS.has(intent) && !restatesPending) {
      return { status: 'superseded' };
    }

    const answer = this.extractFromAnswer(message, pending.missingFields, language);
    const entities: Entities = {
      ...pending.partialData,
      ...answer,
      ...(restatesPending ? filledEntities(extracted) : {}),
    };
    const { missingFields } = this.needsClarification(pending.actionType, entities);

    if (missingFields.length === 0) {
      return { status: 'resolved', intent: pending.actionType, entities };
    }

    const attempts = pending.attempts + 1;
    if (attempts >= this.maxAttempts) {
      return { status: 'abandoned', attempts };
    }

    return {
      status: 'incomplete',
      intent: pending.actionType,
      entities,
      pendingAction: { ...pending, partialData: entities, missingFields, attempts },
    };
  }

  /**
   * Pull values for the requested fields out of a free-text answer
   */
  extractFromAnswer(message: string, fields: EntityKey[], language: Language): Entities {
    const text = message.trim().toLowerCase().replace(/[.!?]+$/, '');
    const answer: Entities = {};

    const { size, remainder: withoutSize } = extractSize(text, language);
    const { quantity, remainder } = takeLeadingQuantity(withoutSize, language);
    const digits = /\d+/.exec(text)?.[0];

    for (const field of fields) {
      switch (field) {
        case 'size':
          if (size) answer.size = size;
          break;
        case 'quantity': {
          const wordNumber = WORD_NUMBERS[language][text];
          const value = quantity ?? wordNumber ?? (digits ? Number.parseInt(digits, 10) : null);
          if (value) answer.quantity = value;
          break;
        }
        case 'item': {
          const item = cleanItemName(remainder);
          if (item && !/^\d+$/.test(item)) answer.item = item;
          if (size) answer.size = size;
          if (quantity) answer.quantity = quantity;
          break;
        }
        case 'order_id':
          if (digits) answer.order_id = digits;
          break;
        case 'phone': {
          const phone = /\+?\d[\d\s-]{6,}\d/.exec(text)?.[0];
          if (phone) answer.phone = phone.replace(/[\s-]/g, '');
          break;
        }
        case 'address':
          if (message.trim()) answer.address = message.trim();
          break;
      }
    }

    return answer;
  }

  private async buildQuestion(
    intent: Intent,
    entities: Entities,
    missingFields: EntityKey[],
    language: Language,
    cart: CartSnapshot
  ): Promise<Question> {
    const messages = messagesFor(language);

    if (intent === 'add_item') {
      if (missingFields.includes('item')) {
        return { text: messages.askItem, answerable: true, suggestedActions: [] };
      }
      if (missingFields.includes('size') && entities.item) {
        const sizes = await this.lookupSizes(entities.item);
        if (sizes.length === 0) {
          return { text: messages.itemNotFound(entities.item), answerable: false, suggestedActions: [] };
        }
        const options = sizes
          .map((size) => messages.sizeOption(sizeLabel(size.size, language), size.size, size.price))
          .join('\n');
        return {
          text: messages.askSize(entities.item, options),
          answerable: true,
          suggestedActions: sizes.map((size) => sizeLabel(size.size, language)),
        };
      }
    }

    if (intent === 'remove_item' && missingFields.includes('item')) {
      if (cart.items.length === 0) {
        return { text: messages.nothingToRemove, answerable: false, suggestedActions: [] };
      }
      const names = cart.items.map((line) => line.itemName);
      return { text: messages.askRemoveItem(names), answerable: true, suggestedActions: names };
    }

    if (intent === 'track_order' && missingFields.includes('order_id')) {
      return { text: messages.askOrderId, answerable: true, suggestedActions: [] };
    }

    if (missingFields.length === 1) {
      const [field] = missingFields;
      if (field === 'quantity' && entities.item) {
        return { text: messages.askQuantity(entities.item), answerable: true, suggestedActions: [] };
      }
      if (field === 'address') return { text: messages.askAddress, answerable: true, suggestedActions: [] };
      if (field === 'phone') return { text: messages.askPhone, answerable: true, suggestedActions: [] };
    }

    return { text: messages.needMore(missingFields), answerable: true, suggestedActions: [] };
  }

  /**
   * Available sizes for an item, falling back to a per-word lookup
   * ("margherita pizza" -> "margherita") when the full name doesn't match.
   */
  private async lookupSizes(itemName: string): Promise<MenuSize[]> {
    const direct = await this.menu.getMenuItem(itemName, false);
    if (direct) return direct.sizes.filter((size) => size.available);

    for (const word of itemName.split(/\s+/)) {
      if (word.length <= 3) continue;
      const item = await this.menu.getMenuItem(word, false);
      if (item) return item.sizes.filter((size) => size.available);
    }

    return [];
  }
}

function filledEntities(entities: Entities): Entities {
  const filled: Entities = {};
  for (const [key, value] of Object.entries(entities)) {
    if (!isBlank(value)) Object.assign(filled, { [key]: value });
  }
  return filled;
}

function isBlank(value: Entities[EntityKey]): boolean {
  return value === null || value === undefined || value === '';
}
