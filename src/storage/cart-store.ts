/**
 * Storage abstraction layer for cart operations.
 */

import { Amount, AmountInput } from '../pricing/amount';

/**
 * Read-only view of a single item in a shopping cart.
 */
export interface CartItemSnapshot {
  /** Product name, unique within the cart */
  name: string;
  /** Price fixed by the first add of this item */
  unitPrice: Amount;
  /** Accumulated quantity, always positive */
  quantity: number;
  /** unitPrice x quantity */
  subtotal: Amount;
}

/**
 * Read-only view of a user's shopping cart.
 */
export interface CartSnapshot {
  cartId: string;
  items: CartItemSnapshot[];
  total: Amount;
}

/**
 * Storage interface for cart operations.
 */
export interface ICartStore {
  /**
   * Add an item to a cart, creating the cart and item as needed.
   * If the item already exists its price is kept and only the quantity increases.
   * @param price - Unit price, must be non-negative
   * @param quantity - Units to add, must be a positive integer
   * @returns The cart's total after the add
   * @throws InvalidArgumentError if price or quantity are invalid; nothing is changed
   */
  addItem(cartId: string, itemName: string, price: AmountInput, quantity: number): Promise<Amount>;

  /**
   * Sum of all item subtotals in a cart.
   * @throws CartNotFoundError if no item was ever added to this cart
   */
  getTotal(cartId: string): Promise<Amount>;

  /**
   * Copy of a cart's items and total.
   * @throws CartNotFoundError if no item was ever added to this cart
   */
  getCart(cartId: string): Promise<CartSnapshot>;

  /**
   * Check if the storage backend is accessible.
   */
  ping(): Promise<boolean>;
}
