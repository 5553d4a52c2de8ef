import type { HistoryEntry, HistoryRole } from './base.js';
import type {
  CartMutationResult,
  CartSnapshot,
  CheckoutResult,
  MenuItem,
  MenuSize,
  OrderRecord,
  UserProfile,
} from './domain.js';
import type { SessionState } from './session.js';

export interface UserStore {
  getUser(userId: string): Promise<UserProfile | null>;
}

export interface HistoryStore {
  /** Most recent `limit` messages, oldest first */
  getHistory(userId: string, limit: number): Promise<HistoryEntry[]>;
  appendHistory(
    userId: string,
    role: HistoryRole,
    content: string,
    metadata?: Record<string, unknown>
  ): Promise<void>;
}

export interface MenuStore {
  /** Case-insensitive lookup; `exact: false` also accepts a name containing the query */
  getMenuItem(nameQuery: string, exact: boolean): Promise<MenuItem | null>;
  getMenuItemById(itemId: number): Promise<MenuItem | null>;
  getAvailableSizes(itemId: number): Promise<MenuSize[]>;
  /** Items whose names resemble the query, best first */
  searchMenu(query: string, limit?: number): Promise<MenuItem[]>;
  listMenu(category?: string): Promise<MenuItem[]>;
}

export interface CartStore {
  getCart(userId: string): Promise<CartSnapshot>;
  addToCart(userId: string, menuSizeId: number, quantity: number): Promise<CartMutationResult>;
  removeFromCart(userId: string, menuSizeId: number): Promise<CartMutationResult>;
  updateCartQuantity(userId: string, menuSizeId: number, quantity: number): Promise<CartMutationResult>;
  clearCart(userId: string): Promise<CartMutationResult>;
}

export interface OrderStore {
  checkout(userId: string): Promise<CheckoutResult>;
  getOrder(orderId: number): Promise<OrderRecord | null>;
}

export interface SessionStore {
  getSession(userId: string): Promise<SessionState>;
  saveSession(userId: string, session: SessionState): Promise<void>;
}

/**
 * Everything the dialogue engine reads from and writes to external storage
 */
export interface OrderingStore
  extends UserStore,
    HistoryStore,
    MenuStore,
    CartStore,
    OrderStore,
    SessionStore {}
