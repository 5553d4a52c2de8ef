import { describe, it, expect, beforeEach } from 'vitest';
import {
  AddItemHandler,
  BatchAddItemHandler,
  BrowseMenuHandler,
  CheckoutHandler,
  ClearCartHandler,
  ConfirmationHandler,
  RejectionHandler,
  RemoveItemHandler,
  TrackOrderHandler,
  ViewCartHandler,
  createDefaultHandlers,
} from '../../src/handlers/index.js';
import type { HandlerDependencies } from '../../src/handlers/index.js';
import { createContext, updateContext } from '../../src/context/DialogueContext.js';
import { InMemoryOrderingStore } from '../../src/store/InMemoryOrderingStore.js';
import { ItemValidator } from '../../src/validation/ItemValidator.js';
import { SuggestionProtocol } from '../../src/suggestions/SuggestionProtocol.js';
import type { DialogueContext } from '../../src/types/index.js';
import { TEST_MENU } from '../fixtures/menu.js';

const now = new Date('2024-01-01T12:00:00Z');

describe('handlers', () => {
  let store: InMemoryOrderingStore;
  let deps: HandlerDependencies;

  beforeEach(() => {
    store = new InMemoryOrderingStore({ menu: TEST_MENU, now: () => now });
    const validator = new ItemValidator(store);
    deps = { store, validator, suggestions: new SuggestionProtocol(store, validator, { now: () => now }) };
  });

  function turn(patch: Partial<DialogueContext>): DialogueContext {
    return updateContext(createContext('u1', 'test', 'en', now), patch);
  }

  it('should register in the documented order', () => {
    expect(createDefaultHandlers(deps).map((handler) => handler.name)).toEqual([
      'batch_add_item',
      'add_item',
      'remove_item',
      'view_cart',
      'checkout',
      'browse_menu',
      'clear_cart',
      'track_order',
      'confirmation',
      'rejection',
    ]);
  });

  describe('AddItemHandler', () => {
    it('should only accept add_item with an item', () => {
      const handler = new AddItemHandler(deps);

      expect(handler.canHandle(turn({ intent: 'add_item', entities: { item: 'cola' } }))).toBe(true);
      expect(handler.canHandle(turn({ intent: 'add_item', entities: { item: '  ' } }))).toBe(false);
      expect(handler.canHandle(turn({ intent: 'remove_item', entities: { item: 'cola' } }))).toBe(false);
    });

    it('should add a validated item', async () => {
      const result = await new AddItemHandler(deps).execute(
        turn({ intent: 'add_item', entities: { item: 'margherita pizza', size: 'L', quantity: 2 } })
      );

      expect(result.handler.result).toEqual({
        success: true,
        message: 'Added Margherita Pizza (L) x 2 to cart',
        itemAdded: { name: 'Margherita Pizza', size: 'L', quantity: 2 },
      });
      expect((await store.getCart('u1')).totalPrice).toBe(360);
    });

    it('should propose the closest item for a near-miss name', async () => {
      const result = await new AddItemHandler(deps).execute(
        turn({ intent: 'add_item', entities: { item: 'margherita piza', size: 'L' } })
      );

      expect(result.handler.result?.suggestionCreated).toBe(true);
      expect(result.session.dialogueState).toBe('awaiting_confirmation');
      expect(result.session.pendingSuggestion).toEqual({
        type: 'add_item',
        item: 'Margherita Pizza',
        size: 'L',
        quantity: 1,
        createdAt: now,
      });
      expect((await store.getCart('u1')).itemCount).toBe(0);
    });

    it('should report unavailable sizes', async () => {
      const result = await new AddItemHandler(deps).execute(
        turn({ intent: 'add_item', entities: { item: 'pepperoni pizza', size: 'L' } })
      );

      expect(result.handler.result).toEqual({
        success: false,
        error: 'L size for Pepperoni Pizza is currently unavailable',
      });
    });
  });

  describe('BatchAddItemHandler', () => {
    it('should need at least two parsed items', () => {
      const handler = new BatchAddItemHandler(deps);
      const one = [{ item: 'cola', quantity: 1, size: null }];

      expect(handler.priority).toBe(100);
      expect(handler.canHandle(turn({ intent: 'add_item', batchItems: one }))).toBe(false);
      expect(handler.canHandle(turn({ intent: 'add_item', batchItems: [...one, ...one] }))).toBe(true);
    });

    it('should add what it can and list the rest', async () => {
      const result = await new BatchAddItemHandler(deps).execute(
        turn({
          intent: 'add_item',
          batchItems: [
            { item: 'fries', quantity: 1, size: null },
            { item: 'cola', quantity: 2, size: null },
            { item: 'sushi', quantity: 1, size: null },
          ],
        })
      );

      expect(result.handler.result?.success).toBe(true);
      expect(result.handler.result?.message).toBe(
        "Added 2 items to cart: Fries (REG), Cola (REG) x2\n\nCouldn't add: sushi ('sushi' not found in menu)"
      );
      expect(result.handler.result?.results?.map((outcome) => outcome.success)).toEqual([true, true, false]);
      expect((await store.getCart('u1')).totalPrice).toBe(70);
    });

    it('should fail when nothing could be added', async () => {
      const result = await new BatchAddItemHandler(deps).execute(
        turn({
          intent: 'add_item',
          batchItems: [
            { item: 'sushi', quantity: 1, size: null },
            { item: 'ramen', quantity: 1, size: null },
          ],
        })
      );

      const message =
        "Couldn't add any items:\n  • sushi: 'sushi' not found in menu\n  • ramen: 'ramen' not found in menu";
      expect(result.handler.result?.success).toBe(false);
      expect(result.handler.result?.error).toBe(message);
    });
  });

  describe('RemoveItemHandler', () => {
    beforeEach(async () => {
      await store.addToCart('u1', 51, 3);
    });

    const remove = (item: string, quantity?: number) =>
      new RemoveItemHandler(deps).execute(turn({ intent: 'remove_item', entities: { item, quantity } }));

    it('should lower the quantity when fewer than all are removed', async () => {
      const result = await remove('2 cola');

      expect(result.handler.result).toEqual({ success: true, message: 'Removed 2 Cola, 1 remaining' });
      expect((await store.getCart('u1')).items[0]?.quantity).toBe(1);
    });

    it('should remove the whole line without a quantity', async () => {
      const result = await remove('cola');

      expect(result.handler.result).toEqual({ success: true, message: 'Removed Cola from cart' });
    });

    it('should remove the whole line when the quantity covers it', async () => {
      const result = await remove('cola', 5);

      expect(result.handler.result).toEqual({ success: true, message: 'Removed all Cola from cart' });
      expect((await store.getCart('u1')).itemCount).toBe(0);
    });

    it('should list the cart when the item is not in it', async () => {
      const result = await remove('fries');

      expect(result.handler.result).toEqual({ success: false, error: "'fries' not found in cart. You have: Cola" });
    });

    it('should match whole words only', async () => {
      const result = await remove('a');

      expect(result.handler.result).toEqual({ success: false, error: "'a' not found in cart. You have: Cola" });
      expect((await store.getCart('u1')).items[0]?.quantity).toBe(3);
    });

    it('should match a plural name', async () => {
      const result = await remove('colas');

      expect(result.handler.result).toEqual({ success: true, message: 'Removed Cola from cart' });
    });

    it('should report an empty cart', async () => {
      await store.clearCart('u1');

      expect((await remove('cola')).handler.result).toEqual({ success: false, error: 'Your cart is empty' });
    });
  });

  describe('ViewCartHandler', () => {
    it('should summarize the cart', async () => {
      await store.addToCart('u1', 11, 1);
      await store.addToCart('u1', 51, 2);

      const result = await new ViewCartHandler(deps).execute(turn({ intent: 'view_cart' }));

      const summary =
        'Current Cart:\n' +
        '  • Margherita Pizza (S) x1 = 100 EGP\n' +
        '  • Cola (REG) x2 = 40 EGP\n' +
        '\n' +
        'Total: 140 EGP';
      expect(result.handler.result).toEqual({ success: true, message: summary, summary });
      expect(result.cart.totalPrice).toBe(140);
      expect(result.responseData).toEqual({ cartSummary: summary });
    });
  });

  describe('CheckoutHandler', () => {
    it('should only run with items in the cart', () => {
      expect(new CheckoutHandler(deps).canHandle(turn({ intent: 'checkout' }))).toBe(false);
    });

    it('should place the order and empty the cart', async () => {
      await store.addToCart('u1', 13, 1);
      const cart = await store.getCart('u1');

      const result = await new CheckoutHandler(deps).execute(turn({ intent: 'checkout', cart }));

      expect(result.handler.result).toEqual({
        success: true,
        message: 'Order placed successfully',
        order: {
          orderId: 1,
          totalPrice: 180,
          items: [{ name: 'Margherita Pizza', size: 'L', quantity: 1, price: 180, subtotal: 180 }],
        },
      });
      expect(result.cart.items).toEqual([]);
      expect(result.responseData).toEqual({ orderId: 1, totalPrice: 180 });
    });
  });

  describe('BrowseMenuHandler', () => {
    it('should list available items by category', async () => {
      const result = await new BrowseMenuHandler(deps).execute(turn({ intent: 'browse_menu' }));

      expect(result.handler.result?.message).toBe(
        [
          '🍕 Our Menu:',
          '',
          'Pizza:',
          '  • Margherita Pizza: S 100 EGP, M 140 EGP, L 180 EGP',
          '  • Pepperoni Pizza: S 120 EGP, M 160 EGP',
          '',
          'Addition:',
          '  • Fries: REG 30 EGP',
          '  • Cola: REG 20 EGP',
          '  • Mango Juice: REG 35 EGP',
          '  • Water: REG 10 EGP',
        ].join('\n')
      );
    });

    it('should list one category when it is named', async () => {
      const result = await new BrowseMenuHandler(deps).execute(
        turn({ intent: 'browse_menu', entities: { item: 'Pizzas' } })
      );

      expect(result.handler.result?.message).toBe(
        [
          '🍕 Our Menu:',
          '',
          'Pizza:',
          '  • Margherita Pizza: S 100 EGP, M 140 EGP, L 180 EGP',
          '  • Pepperoni Pizza: S 120 EGP, M 160 EGP',
        ].join('\n')
      );
    });

    it('should describe a single item when one is named', async () => {
      const result = await new BrowseMenuHandler(deps).execute(
        turn({ intent: 'browse_menu', entities: { item: 'juice' } })
      );

      expect(result.handler.result?.message).toBe('  • Mango Juice: REG 35 EGP');
    });
  });

  describe('ClearCartHandler', () => {
    it('should empty the cart', async () => {
      await store.addToCart('u1', 41, 1);

      const result = await new ClearCartHandler(deps).execute(turn({ intent: 'clear_cart' }));

      expect(result.handler.result).toEqual({ success: true, message: 'Cart cleared! Ready for a new order 🛒' });
      expect((await store.getCart('u1')).itemCount).toBe(0);
    });
  });

  describe('TrackOrderHandler', () => {
    beforeEach(async () => {
      await store.addToCart('u1', 41, 2);
      await store.checkout('u1');
    });

    it("should report the user's order", async () => {
      const result = await new TrackOrderHandler(deps).execute(
        turn({ intent: 'track_order', entities: { order_id: '1' } })
      );

      expect(result.handler.result).toEqual({ success: true, message: 'Order #1 is pending. Total: 60 EGP' });
    });

    it("should not reveal another user's order", async () => {
      const context = updateContext(createContext('u2', 'where is order 1', 'en', now), {
        intent: 'track_order',
        entities: { order_id: '1' },
      });

      const result = await new TrackOrderHandler(deps).execute(context);

      expect(result.handler.result).toEqual({ success: false, error: "I couldn't find order #1." });
    });
  });

  describe('ConfirmationHandler and RejectionHandler', () => {
    it('should add the pending suggestion on confirmation', async () => {
      const session = deps.suggestions.propose(createContext('u1', '').session, 'colaa', 'Cola', null, 1, 'en').session;

      const result = await new ConfirmationHandler(deps).execute(turn({ intent: 'confirmation', session }));

      expect(result.handler.result?.message).toBe('✅ Added 1x REG Cola to your cart!');
      expect(result.session.pendingSuggestion).toBeNull();
      expect(result.session.dialogueState).toBe('idle');
    });

    it('should drop the pending suggestion on rejection', async () => {
      const session = deps.suggestions.propose(createContext('u1', '').session, 'colaa', 'Cola', null, 1, 'en').session;

      const result = await new RejectionHandler(deps).execute(turn({ intent: 'rejection', session }));

      expect(result.handler.result?.message).toBe('No problem! What would you like to order instead?');
      expect(result.session.pendingSuggestion).toBeNull();
      expect((await store.getCart('u1')).itemCount).toBe(0);
    });
  });
});
