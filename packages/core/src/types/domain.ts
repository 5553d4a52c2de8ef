import type { SizeCode } from './base.js';

export interface MenuSize {
  id: number;
  size: SizeCode;
  price: number;
  available: boolean;
}

export interface MenuItem {
  id: number;
  name: string;
  /** e.g. 'pizza' or 'addition' */
  category: string;
  description?: string;
  available: boolean;
  sizes: MenuSize[];
}

/**
 * One line of a cart, keyed by menu size
 */
export interface CartLine {
  menuSizeId: number;
  itemName: string;
  category: string;
  size: SizeCode;
  price: number;
  quantity: number;
  subtotal: number;
}

export interface CartSnapshot {
  items: CartLine[];
  totalPrice: number;
  itemCount: number;
}

export interface UserProfile {
  userId: string;
  name?: string;
  phone?: string;
  address?: string;
}

export interface CartMutationResult {
  success: boolean;
  message: string;
}

export interface OrderLine {
  name: string;
  size: SizeCode;
  quantity: number;
  price: number;
  subtotal: number;
}

/**
 * Authoritative checkout data; replies about a placed order are built from this only
 */
export interface OrderReceipt {
  orderId: number;
  totalPrice: number;
  items: OrderLine[];
}

export type CheckoutResult =
  | ({ success: true } & OrderReceipt)
  | { success: false; error: string };

export type OrderStatus = 'pending' | 'preparing' | 'delivering' | 'delivered' | 'cancelled';

export interface OrderRecord extends OrderReceipt {
  userId: string;
  status: OrderStatus;
  createdAt: Date;
}
