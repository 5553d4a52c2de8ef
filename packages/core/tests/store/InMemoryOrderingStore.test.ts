import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryOrderingStore } from '../../src/store/InMemoryOrderingStore.js';
import { TEST_MENU } from '../fixtures/menu.js';

describe('InMemoryOrderingStore', () => {
  let store: InMemoryOrderingStore;

  beforeEach(() => {
    store = new InMemoryOrderingStore({
      menu: TEST_MENU,
      users: [{ userId: 'u1', name: 'Test User' }],
      now: () => new Date('2024-01-01T12:00:00Z'),
    });
  });

  describe('menu', () => {
    it('should prefer an exact name over a partial one', async () => {
      expect((await store.getMenuItem('PIZZA', false))?.name).toBe('Margherita Pizza');
      expect(await store.getMenuItem('pizza', true)).toBeNull();
      expect((await store.getMenuItem('cola', true))?.name).toBe('Cola');
    });

    it('should search by name similarity', async () => {
      const results = await store.searchMenu('pepperoni piza');

      expect(results.map((item) => item.name)[0]).toBe('Pepperoni Pizza');
      expect(await store.searchMenu('sushi')).toEqual([]);
    });

    it('should list available sizes and filter by category', async () => {
      expect((await store.getAvailableSizes(2)).map((size) => size.size)).toEqual(['S', 'M']);
      expect((await store.listMenu('addition')).map((item) => item.name)).toEqual([
        'Fries',
        'Cola',
        'Mango Juice',
        'Water',
      ]);
    });

    it('should hand out copies', async () => {
      const item = await store.getMenuItemById(1);
      if (item) item.name = 'Changed';

      expect((await store.getMenuItemById(1))?.name).toBe('Margherita Pizza');
    });
  });

  describe('cart', () => {
    it('should merge repeated adds of the same size', async () => {
      expect(await store.addToCart('u1', 13, 1)).toEqual({
        success: true,
        message: 'Added Margherita Pizza (L) x 1 to cart',
      });
      await store.addToCart('u1', 13, 2);
      await store.addToCart('u1', 51, 1);

      const cart = await store.getCart('u1');
      expect(cart.items).toEqual([
        { menuSizeId: 13, itemName: 'Margherita Pizza', category: 'pizza', size: 'L', price: 180, quantity: 3, subtotal: 540 },
        { menuSizeId: 51, itemName: 'Cola', category: 'addition', size: 'REG', price: 20, quantity: 1, subtotal: 20 },
      ]);
      expect(cart.totalPrice).toBe(560);
      expect(cart.itemCount).toBe(4);
    });

    it('should refuse unknown or unavailable sizes', async () => {
      expect((await store.addToCart('u1', 999, 1)).success).toBe(false);
      expect(await store.addToCart('u1', 23, 1)).toEqual({
        success: false,
        message: 'Pepperoni Pizza (L) is currently unavailable',
      });
    });

    it('should update, remove and clear lines', async () => {
      await store.addToCart('u1', 13, 3);
      await store.addToCart('u1', 41, 1);

      expect((await store.updateCartQuantity('u1', 13, 1)).message).toBe('Updated Margherita Pizza quantity to 1');
      expect((await store.removeFromCart('u1', 41)).message).toBe('Removed Fries from cart');
      expect((await store.getCart('u1')).items.map((line) => line.quantity)).toEqual([1]);

      await store.clearCart('u1');
      expect(await store.getCart('u1')).toEqual({ items: [], totalPrice: 0, itemCount: 0 });
    });
  });

  describe('orders', () => {
    it('should place an order and empty the cart', async () => {
      await store.addToCart('u1', 12, 2);

      const result = await store.checkout('u1');

      expect(result).toEqual({
        success: true,
        orderId: 1,
        totalPrice: 280,
        items: [{ name: 'Margherita Pizza', size: 'M', quantity: 2, price: 140, subtotal: 280 }],
      });
      expect((await store.getCart('u1')).items).toEqual([]);
      expect((await store.getOrder(1))?.status).toBe('pending');
    });

    it('should refuse to check out an empty cart', async () => {
      expect(await store.checkout('u1')).toEqual({ success: false, error: 'Cart is empty' });
    });

    it('should update order status', async () => {
      await store.addToCart('u1', 41, 1);
      await store.checkout('u1');

      expect(await store.updateOrderStatus(1, 'delivering')).toBe(true);
      expect((await store.getOrder(1))?.status).toBe('delivering');
      expect(await store.updateOrderStatus(42, 'delivered')).toBe(false);
    });
  });

  describe('history and sessions', () => {
    it('should return the most recent entries oldest first', async () => {
      await store.appendHistory('u1', 'user', 'one');
      await store.appendHistory('u1', 'bot', 'two');
      await store.appendHistory('u1', 'user', 'three', { intent: 'view_cart' });

      const history = await store.getHistory('u1', 2);

      expect(history.map((entry) => entry.content)).toEqual(['two', 'three']);
      expect(history[1]?.metadata).toEqual({ intent: 'view_cart' });
      expect(history[1]?.timestamp).toEqual(new Date('2024-01-01T12:00:00Z'));
    });

    it('should default to an idle session and persist saved ones', async () => {
      expect(await store.getSession('u2')).toEqual({ dialogueState: 'idle', pendingAction: null, pendingSuggestion: null });

      await store.saveSession('u2', { dialogueState: 'awaiting_size', pendingAction: null, pendingSuggestion: null });

      expect((await store.getSession('u2')).dialogueState).toBe('awaiting_size');
    });

    it('should look up users', async () => {
      expect(await store.getUser('u1')).toEqual({ userId: 'u1', name: 'Test User' });
      expect(await store.getUser('nobody')).toBeNull();
    });
  });
});
