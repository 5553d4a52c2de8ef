import { describe, it, expect } from 'vitest';
import { ClarificationEngine } from '../../src/clarification/ClarificationEngine.js';
import { InMemoryOrderingStore } from '../../src/store/InMemoryOrderingStore.js';
import { EMPTY_CART } from '../../src/context/DialogueContext.js';
import type { CartSnapshot, PendingAction } from '../../src/types/index.js';
import { TEST_MENU } from '../fixtures/menu.js';

const now = new Date('2024-01-01T12:00:00Z');

function engine(maxAttempts?: number) {
  return new ClarificationEngine(new InMemoryOrderingStore({ menu: TEST_MENU }), { maxAttempts });
}

describe('ClarificationEngine', () => {
  describe('needsClarification', () => {
    it('should require item and size for pizzas', () => {
      expect(engine().needsClarification('add_item', { item: 'margherita pizza' })).toEqual({
        needed: true,
        missingFields: ['size'],
      });
      expect(engine().needsClarification('add_item', {})).toEqual({ needed: true, missingFields: ['item', 'size'] });
    });

    it('should not ask for a size for single-size add-ons', () => {
      expect(engine().needsClarification('add_item', { item: 'mango juice' })).toEqual({
        needed: false,
        missingFields: [],
      });
    });

    it('should require an order number for tracking', () => {
      expect(engine().needsClarification('track_order', {}).missingFields).toEqual(['order_id']);
      expect(engine().needsClarification('track_order', { order_id: '12' }).needed).toBe(false);
    });

    it('should treat blank values as missing', () => {
      expect(engine().needsClarification('remove_item', { item: '' }).missingFields).toEqual(['item']);
    });

    it('should need nothing for intents without required fields', () => {
      for (const intent of ['view_cart', 'checkout', 'welcome', 'confirmation'] as const) {
        expect(engine().needsClarification(intent, {})).toEqual({ needed: false, missingFields: [] });
      }
    });
  });

  describe('generateQuestion', () => {
    it('should list the available sizes with prices', async () => {
      const question = await engine().generateQuestion('add_item', { item: 'pepperoni pizza' }, ['size'], 'en', EMPTY_CART);

      expect(question).toBe(
        'What size would you like for pepperoni pizza?\n' +
          '  • Small (S) - 120 EGP\n' +
          '  • Medium (M) - 160 EGP'
      );
    });

    it('should fall back to a per-word lookup', async () => {
      const question = await engine().generateQuestion('add_item', { item: 'spicy margherita' }, ['size'], 'en', EMPTY_CART);

      expect(question.split('\n')).toHaveLength(4);
      expect(question).toContain('  • Large (L) - 180 EGP');
    });

    it('should say so when the item is unknown', async () => {
      const question = await engine().generateQuestion('add_item', { item: 'sushi' }, ['size'], 'en', EMPTY_CART);

      expect(question).toBe("Sorry, I couldn't find 'sushi' in our menu. Could you check the name?");
    });

    it('should ask for the item name first', async () => {
      const question = await engine().generateQuestion('add_item', {}, ['item', 'size'], 'en', EMPTY_CART);

      expect(question).toBe('What would you like to order? Please tell me the item name.');
    });

    it('should phrase remove and track questions', async () => {
      const cart: CartSnapshot = {
        items: [{ menuSizeId: 41, itemName: 'Fries', category: 'addition', size: 'REG', price: 30, quantity: 1, subtotal: 30 }],
        totalPrice: 30,
        itemCount: 1,
      };

      expect(await engine().generateQuestion('remove_item', {}, ['item'], 'en', EMPTY_CART)).toBe(
        "Your cart is empty. There's nothing to remove."
      );
      expect(await engine().generateQuestion('remove_item', {}, ['item'], 'en', cart)).toBe(
        'Which item would you like to remove? Your cart has: Fries'
      );
      expect(await engine().generateQuestion('track_order', {}, ['order_id'], 'en', EMPTY_CART)).toBe(
        "I need your order number to track it. What's your order number?"
      );
    });

    it('should ask in Arabic', async () => {
      const question = await engine().generateQuestion('track_order', {}, ['order_id'], 'ar', EMPTY_CART);

      expect(question).toBe('محتاج رقم الطلب علشان أتابعه. رقم طلبك كام؟');
    });
  });

  describe('clarify', () => {
    it('should record a pending action and the matching dialogue state', async () => {
      const clarification = await engine().clarify('add_item', { item: 'pizza' }, ['size'], 'en', EMPTY_CART, null, now);

      expect(clarification.dialogueState).toBe('awaiting_size');
      expect(clarification.pendingAction).toEqual({
        actionType: 'add_item',
        missingFields: ['size'],
        partialData: { item: 'pizza' },
        createdAt: now,
        attempts: 0,
      });
      expect(clarification.suggestedActions).toEqual(['Small', 'Medium', 'Large']);
    });

    it('should not record a pending action for an unknown item', async () => {
      const clarification = await engine().clarify('add_item', { item: 'sushi' }, ['size'], 'en', EMPTY_CART, null, now);

      expect(clarification.pendingAction).toBeNull();
      expect(clarification.dialogueState).toBe('idle');
    });

    it('should carry attempts over when re-asking the same command', async () => {
      const previous: PendingAction = {
        actionType: 'add_item',
        missingFields: ['size'],
        partialData: { item: 'pizza' },
        createdAt: now,
        attempts: 2,
      };

      const clarification = await engine().clarify('add_item', { item: 'pizza' }, ['size'], 'en', EMPTY_CART, previous, now);

      expect(clarification.pendingAction?.attempts).toBe(2);
    });
  });

  describe('resolvePendingAction', () => {
    const pending: PendingAction = {
      actionType: 'add_item',
      missingFields: ['size'],
      partialData: { item: 'margherita pizza', quantity: 2 },
      createdAt: now,
      attempts: 0,
    };

    it('should merge an answer into the partial data', () => {
      expect(engine().resolvePendingAction(pending, 'large please', null, 'en')).toEqual({
        status: 'resolved',
        intent: 'add_item',
        entities: { item: 'margherita pizza', quantity: 2, size: 'L' },
      });
    });

    it('should count an unhelpful answer as an attempt', () => {
      const resolution = engine().resolvePendingAction(pending, 'hmm', null, 'en');

      expect(resolution.status).toBe('incomplete');
      if (resolution.status === 'incomplete') {
        expect(resolution.pendingAction.attempts).toBe(1);
        expect(resolution.pendingAction.missingFields).toEqual(['size']);
      }
    });

    it('should give up after the maximum attempts', () => {
      expect(engine(2).resolvePendingAction({ ...pending, attempts: 1 }, 'hmm', null, 'en')).toEqual({
        status: 'abandoned',
        attempts: 2,
      });
    });

    it('should step aside for a new command', () => {
      expect(engine().resolvePendingAction(pending, 'show my cart', 'view_cart', 'en')).toEqual({
        status: 'superseded',
      });
    });

    it('should merge a restated command that carries only the missing field', () => {
      const sizePending: PendingAction = { ...pending, partialData: { item: 'pizza' } };

      expect(engine().resolvePendingAction(sizePending, 'the biggest one', 'add_item', 'en', { size: 'L' })).toEqual({
        status: 'resolved',
        intent: 'add_item',
        entities: { item: 'pizza', size: 'L' },
      });
    });

    it('should still step aside for the same command naming a new item', () => {
      expect(
        engine().resolvePendingAction(pending, 'add cola', 'add_item', 'en', { item: 'cola', quantity: 1 }),
      ).toEqual({ status: 'superseded' });
    });

    it('should accept an item name as an answer even when it looks like browsing', () => {
      const itemPending: PendingAction = { ...pending, missingFields: ['item', 'size'], partialData: {} };

      expect(engine().resolvePendingAction(itemPending, 'large pepperoni pizza', 'browse_menu', 'en')).toEqual({
        status: 'resolved',
        intent: 'add_item',
        entities: { item: 'pepperoni pizza', size: 'L' },
      });
    });

    it('should read order numbers', () => {
      const trackPending: PendingAction = { ...pending, actionType: 'track_order', missingFields: ['order_id'], partialData: {} };

      expect(engine().resolvePendingAction(trackPending, 'it is #1042', null, 'en')).toEqual({
        status: 'resolved',
        intent: 'track_order',
        entities: { order_id: '1042' },
      });
    });
  });
});
