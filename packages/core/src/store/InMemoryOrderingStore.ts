import natural from 'natural';
import type {
  CartLine,
  CartMutationResult,
  CartSnapshot,
  CheckoutResult,
  HistoryEntry,
  HistoryRole,
  MenuItem,
  MenuSize,
  OrderingStore,
  OrderRecord,
  OrderStatus,
  SessionState,
  UserProfile,
} from '../types/index.js';
import { emptySession } from '../types/index.js';

export interface InMemoryOrderingStoreConfig {
  menu?: MenuItem[];
  users?: UserProfile[];
  /** Minimum Jaro-Winkler similarity for `searchMenu`. Defaults to 0.85. */
  similarityThreshold?: number;
  /** History entries kept per user. Defaults to 100. */
  maxHistory?: number;
  now?: () => Date;
}

interface SizeEntry {
  item: MenuItem;
  size: MenuSize;
}

/**
 * Map-backed store for tests, demos and single-process deployments.
 * Values are copied in and out so callers can't mutate stored state.
 */
export class InMemoryOrderingStore implements OrderingStore {
  private menu: MenuItem[];
  private sizeIndex = new Map<number, SizeEntry>();
  private users = new Map<string, UserProfile>();
  private carts = new Map<string, Map<number, number>>();
  private history = new Map<string, HistoryEntry[]>();
  private sessions = new Map<string, SessionState>();
  private orders = new Map<number, OrderRecord>();
  private nextOrderId = 1;
  private config: Required<Omit<InMemoryOrderingStoreConfig, 'menu' | 'users'>>;

  constructor(config: InMemoryOrderingStoreConfig = {}) {
    this.config = {
      similarityThreshold: config.similarityThreshold ?? 0.85,
      maxHistory: config.maxHistory ?? 100,
      now: config.now ?? (() => new Date()),
    };
    this.menu = structuredClone(config.menu ?? []);
    for (const item of this.menu) {
      for (const size of item.sizes) {
        this.sizeIndex.set(size.id, { item, size });
      }
    }
    for (const user of config.users ?? []) {
      this.users.set(user.userId, { ...user });
    }
  }

  // Users

  async getUser(userId: string): Promise<UserProfile | null> {
    const user = this.users.get(userId);
    return user ? { ...user } : null;
  }

  // History

  async getHistory(userId: string, limit: number): Promise<HistoryEntry[]> {
    if (limit <= 0) return [];
    return structuredClone((this.history.get(userId) ?? []).slice(-limit));
  }

  async appendHistory(
    userId: string,
    role: HistoryRole,
    content: string,
    metadata?: Record<string, unknown>
  ): Promise<void> {
    const entries = this.history.get(userId) ?? [];
    entries.push({
      role,
      content,
      timestamp: this.config.now(),
      ...(metadata ? { metadata: structuredClone(metadata) } : {}),
    });
    this.history.set(userId, entries.slice(-this.config.maxHistory));
  }

  // Menu

  async getMenuItem(nameQuery: string, exact: boolean): Promise<MenuItem | null> {
    const query = nameQuery.trim().toLowerCase();
    if (!query) return null;

    const match =
      this.menu.find((item) => item.name.toLowerCase() === query) ??
      (exact ? undefined : this.menu.find((item) => item.name.toLowerCase().includes(query)));
    return match ? structuredClone(match) : null;
  }

  async getMenuItemById(itemId: number): Promise<MenuItem | null> {
    const item = this.menu.find((candidate) => candidate.id === itemId);
    return item ? structuredClone(item) : null;
  }

  async getAvailableSizes(itemId: number): Promise<MenuSize[]> {
    const item = this.menu.find((candidate) => candidate.id === itemId);
    return item ? item.sizes.filter((size) => size.available).map((size) => ({ ...size })) : [];
  }

  async searchMenu(query: string, limit = 5): Promise<MenuItem[]> {
    const needle = query.trim().toLowerCase();
    if (!needle) return [];

    return this.menu
      .map((item) => ({ item, score: natural.JaroWinklerDistance(needle, item.name.toLowerCase(), {}) }))
      .filter(({ score }) => score >= this.config.similarityThreshold)
      .sort((a, b) => b.score - a.score)
      .slice(0, limit)
      .map(({ item }) => structuredClone(item));
  }

  async listMenu(category?: string): Promise<MenuItem[]> {
    const items = category ? this.menu.filter((item) => item.category === category) : this.menu;
    return structuredClone(items);
  }

  // Cart

  async getCart(userId: string): Promise<CartSnapshot> {
    const items: CartLine[] = [];
    for (const [menuSizeId, quantity] of this.carts.get(userId) ?? []) {
      const entry = this.sizeIndex.get(menuSizeId);
      if (!entry) continue;
      items.push({
        menuSizeId,
        itemName: entry.item.name,
        category: entry.item.category,
        size: entry.size.size,
        price: entry.size.price,
        quantity,
        subtotal: entry.size.price * quantity,
      });
    }

    return {
      items,
      totalPrice: items.reduce((sum, line) => sum + line.subtotal, 0),
      itemCount: items.reduce((sum, line) => sum + line.quantity, 0),
    };
  }

  async addToCart(userId: string, menuSizeId: number, quantity: number): Promise<CartMutationResult> {
    const entry = this.sizeIndex.get(menuSizeId);
    if (!entry) return { success: false, message: 'Invalid menu size' };
    if (!Number.isInteger(quantity) || quantity <= 0) {
      return { success: false, message: 'Quantity must be a positive whole number' };
    }
    if (!entry.item.available || !entry.size.available) {
      return { success: false, message: `${entry.item.name} (${entry.size.size}) is currently unavailable` };
    }

    const cart = this.carts.get(userId) ?? new Map<number, number>();
    cart.set(menuSizeId, (cart.get(menuSizeId) ?? 0) + quantity);
    this.carts.set(userId, cart);

    return { success: true, message: `Added ${entry.item.name} (${entry.size.size}) x ${quantity} to cart` };
  }

  async removeFromCart(userId: string, menuSizeId: number): Promise<CartMutationResult> {
    const cart = this.carts.get(userId);
    const entry = this.sizeIndex.get(menuSizeId);
    if (!cart?.has(menuSizeId) || !entry) {
      return { success: false, message: 'Item not in cart' };
    }

    cart.delete(menuSizeId);
    return { success: true, message: `Removed ${entry.item.name} from cart` };
  }

  async updateCartQuantity(userId: string, menuSizeId: number, quantity: number): Promise<CartMutationResult> {
    if (quantity <= 0) return this.removeFromCart(userId, menuSizeId);

    const cart = this.carts.get(userId);
    const entry = this.sizeIndex.get(menuSizeId);
    if (!cart?.has(menuSizeId) || !entry) {
      return { success: false, message: 'Item not in cart' };
    }

    cart.set(menuSizeId, quantity);
    return { success: true, message: `Updated ${entry.item.name} quantity to ${quantity}` };
  }

  async clearCart(userId: string): Promise<CartMutationResult> {
    this.carts.delete(userId);
    return { success: true, message: 'Cart cleared' };
  }

  // Orders

  async checkout(userId: string): Promise<CheckoutResult> {
    const cart = await this.getCart(userId);
    if (cart.items.length === 0) {
      return { success: false, error: 'Cart is empty' };
    }

    const order: OrderRecord = {
      orderId: this.nextOrderId++,
      userId,
      status: 'pending',
      totalPrice: cart.totalPrice,
      items: cart.items.map((line) => ({
        name: line.itemName,
        size: line.size,
        quantity: line.quantity,
        price: line.price,
        subtotal: line.subtotal,
      })),
      createdAt: this.config.now(),
    };
    this.orders.set(order.orderId, order);
    this.carts.delete(userId);

    return { success: true, orderId: order.orderId, totalPrice: order.totalPrice, items: structuredClone(order.items) };
  }

  async getOrder(orderId: number): Promise<OrderRecord | null> {
    const order = this.orders.get(orderId);
    return order ? structuredClone(order) : null;
  }

  async updateOrderStatus(orderId: number, status: OrderStatus): Promise<boolean> {
    const order = this.orders.get(orderId);
    if (!order) return false;
    order.status = status;
    return true;
  }

  // Sessions

  async getSession(userId: string): Promise<SessionState> {
    const session = this.sessions.get(userId);
    return session ? structuredClone(session) : emptySession();
  }

  async saveSession(userId: string, session: SessionState): Promise<void> {
    this.sessions.set(userId, structuredClone(session));
  }
}
