/**
 * One user's cart: item name to CartItem.
 */

import { Amount } from '../pricing/amount';
import { CartItem } from './cart-item';
import { CartSnapshot } from './cart-store';

export class ShoppingCart {
  private readonly items = new Map<string, CartItem>();

  constructor(readonly cartId: string) {}

  /**
   * Add a line or merge into the existing one.
   * An existing item keeps its original price; only the quantity changes.
   * @returns the quantity of the item after the merge
   * @throws InvalidArgumentError if the merged quantity would exceed MAX_QUANTITY; the item is unchanged
   */
  addItem(itemName: string, unitPrice: Amount, quantity: number): number {
    const existing = this.items.get(itemName);

    if (existing) {
      existing.assertCanAdd(quantity);
      existing.addQuantity(quantity);
      return existing.quantity;
    }

    const item = new CartItem(itemName, unitPrice, quantity);
    this.items.set(itemName, item);
    return item.quantity;
  }

  get itemCount(): number {
    return this.items.size;
  }

  total(): Amount {
    let total = Amount.ZERO;
    for (const item of this.items.values()) {
      total = total.plus(item.subtotal());
    }
    return total;
  }

  snapshot(): CartSnapshot {
    const items = Array.from(this.items.values(), (item) => item.snapshot());
    return {
      cartId: this.cartId,
      items,
      total: items.reduce((sum, item) => sum.plus(item.subtotal), Amount.ZERO),
    };
  }
}
