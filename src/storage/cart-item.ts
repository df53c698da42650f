/**
 * A single product line in a shopping cart.
 * Name and unit price are fixed at creation; quantity only grows.
 */

import { Amount } from '../pricing/amount';
import { InvalidArgumentError } from '../errors';
import { CartItemSnapshot } from './cart-store';

/** Largest quantity a cart line can hold; the wire type is int32. */
export const MAX_QUANTITY = 2147483647;

/**
 * Check a price/quantity pair before anything is created or merged.
 * @throws InvalidArgumentError if the price is negative or the quantity is not a positive integer
 */
export function validateLineItem(unitPrice: Amount, quantity: number): void {
  if (unitPrice.isNegative()) {
    throw new InvalidArgumentError('Price must be non-negative');
  }
  if (!Number.isSafeInteger(quantity) || quantity <= 0) {
    throw new InvalidArgumentError('Quantity must be greater than zero');
  }
  if (quantity > MAX_QUANTITY) {
    throw new InvalidArgumentError(`Quantity must not exceed ${MAX_QUANTITY}`);
  }
}

export class CartItem {
  readonly name: string;
  readonly unitPrice: Amount;
  private count: number;

  constructor(name: string, unitPrice: Amount, quantity: number) {
    validateLineItem(unitPrice, quantity);
    this.name = name;
    this.unitPrice = unitPrice;
    this.count = quantity;
  }

  get quantity(): number {
    return this.count;
  }

  /**
   * @throws InvalidArgumentError if adding the amount would push the quantity past MAX_QUANTITY
   */
  assertCanAdd(amount: number): void {
    if (amount > MAX_QUANTITY - this.count) {
      throw new InvalidArgumentError(`Quantity of ${this.name} would exceed ${MAX_QUANTITY}`);
    }
  }

  /**
   * Increase the quantity. Non-positive or fractional amounts are ignored, and so is
   * an amount that would take the quantity past MAX_QUANTITY.
   */
  addQuantity(amount: number): void {
    if (Number.isSafeInteger(amount) && amount > 0 && amount <= MAX_QUANTITY - this.count) {
      this.count += amount;
    }
  }

  subtotal(): Amount {
    return this.unitPrice.times(this.count);
  }

  snapshot(): CartItemSnapshot {
    return {
      name: this.name,
      unitPrice: this.unitPrice,
      quantity: this.count,
      subtotal: this.subtotal(),
    };
  }
}
