/**
 * Tests for the in-memory cart store
 */

import { MemoryStore } from '../src/storage/memory-store';
import { CartSnapshot } from '../src/storage/cart-store';
import { MAX_QUANTITY } from '../src/storage/cart-item';
import * as metrics from '../src/telemetry/metrics';
import { CartNotFoundError, InvalidArgumentError } from '../src/errors';

function describeCart(cart: CartSnapshot) {
  return {
    cartId: cart.cartId,
    items: cart.items.map(item => ({
      name: item.name,
      unitPrice: item.unitPrice.toString(),
      quantity: item.quantity,
      subtotal: item.subtotal.toString(),
    })),
    total: cart.total.toString(),
  };
}

describe('MemoryStore', () => {
  let store: MemoryStore;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation();
    store = new MemoryStore();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should create a cart on first add and return its total', async () => {
    const total = await store.addItem('c1', 'Book', '120.50', 2);

    expect(total.toString()).toBe('241.00');
  });

  it('should keep the first price and accumulate quantity', async () => {
    await store.addItem('c1', 'Book', '120.50', 2);
    const total = await store.addItem('c1', 'Book', '999.99', 3);

    expect(total.toString()).toBe('602.50');
    expect((await store.getTotal('c1')).toString()).toBe('602.50');
    expect(describeCart(await store.getCart('c1'))).toEqual({
      cartId: 'c1',
      items: [{ name: 'Book', unitPrice: '120.50', quantity: 5, subtotal: '602.50' }],
      total: '602.50',
    });
  });

  it('should sum quantities over many adds of the same item', async () => {
    const quantities = [1, 4, 2, 7, 3];
    for (const quantity of quantities) {
      await store.addItem('c1', 'Pen', '0.10', quantity);
    }

    const cart = await store.getCart('c1');
    expect(cart.items).toHaveLength(1);
    expect(cart.items[0].quantity).toBe(17);
    expect(cart.total.toString()).toBe('1.70');
  });

  it('should keep carts independent', async () => {
    await store.addItem('alice', 'Book', '10.00', 1);
    await store.addItem('bob', 'Book', '12.00', 2);

    expect((await store.getTotal('alice')).toString()).toBe('10.00');
    expect((await store.getTotal('bob')).toString()).toBe('24.00');
  });

  it('should signal NotFound for an unknown cart', async () => {
    await expect(store.getTotal('unknown')).rejects.toThrow(CartNotFoundError);
    await expect(store.getCart('unknown')).rejects.toThrow('Cart not found: unknown');
  });

  it('should return identical totals on consecutive reads', async () => {
    await store.addItem('c1', 'Book', '3.33', 3);

    const first = await store.getTotal('c1');
    const second = await store.getTotal('c1');

    expect(first.toString()).toBe('9.99');
    expect(second.toString()).toBe(first.toString());
  });

  describe('invalid arguments', () => {
    it.each([
      ['negative price', '-0.01', 1, 'Price must be non-negative'],
      ['zero quantity', '1.00', 0, 'Quantity must be greater than zero'],
      ['negative quantity', '1.00', -2, 'Quantity must be greater than zero'],
      ['fractional quantity', '1.00', 1.5, 'Quantity must be greater than zero'],
      ['malformed price', 'ten', 1, 'Invalid amount: ten'],
      ['price with too many fraction digits', '1e-600000000', 1, 'Amount out of range: 1e-600000000'],
      ['quantity past the wire limit', '1.00', 2147483648, 'Quantity must not exceed 2147483647'],
    ])('should reject %s without creating the cart', async (_case, price, quantity, message) => {
      await expect(store.addItem('fresh', 'Book', price, quantity)).rejects.toThrow(
        new InvalidArgumentError(message)
      );
      await expect(store.getTotal('fresh')).rejects.toThrow(CartNotFoundError);
    });

    it('should leave an existing cart unchanged', async () => {
      await store.addItem('c1', 'Book', '120.50', 2);
      const before = describeCart(await store.getCart('c1'));

      await expect(store.addItem('c1', 'Book', '-5', 1)).rejects.toThrow(InvalidArgumentError);
      await expect(store.addItem('c1', 'Book', '120.50', 0)).rejects.toThrow(InvalidArgumentError);
      await expect(store.addItem('c1', 'Pen', '1.00', -1)).rejects.toThrow(InvalidArgumentError);

      expect(describeCart(await store.getCart('c1'))).toEqual(before);
    });
  });

  describe('quantity limit', () => {
    it('should reject a merge that would exceed the limit and keep the item', async () => {
      await store.addItem('c1', 'X', '1', MAX_QUANTITY);
      await store.addItem('c1', 'Y', '2', 1);

      await expect(store.addItem('c1', 'X', '1', 1)).rejects.toThrow(
        new InvalidArgumentError('Quantity of X would exceed 2147483647')
      );

      expect(describeCart(await store.getCart('c1'))).toEqual({
        cartId: 'c1',
        items: [
          { name: 'X', unitPrice: '1', quantity: MAX_QUANTITY, subtotal: '2147483647' },
          { name: 'Y', unitPrice: '2', quantity: 1, subtotal: '2' },
        ],
        total: '2147483649',
      });
    });

    it('should keep the sum exact up to the limit', async () => {
      await store.addItem('c1', 'X', '0.01', MAX_QUANTITY - 2);
      const total = await store.addItem('c1', 'X', '0.01', 2);

      expect(total.toString()).toBe('21474836.47');
    });
  });

  describe('concurrent adds', () => {
    it('should create one item and lose no update', async () => {
      const calls = 250;

      const totals = await Promise.all(
        Array.from({ length: calls }, () => store.addItem('race', 'X', '1.00', 1))
      );

      const cart = await store.getCart('race');
      expect(cart.items).toHaveLength(1);
      expect(cart.items[0].quantity).toBe(calls);
      expect(cart.total.toString()).toBe('250.00');
      expect(new Set(totals.map(total => total.toString())).size).toBe(calls);
    });

    it('should accumulate interleaved adds across carts and items', async () => {
      const adds: Promise<unknown>[] = [];
      for (let i = 0; i < 50; i++) {
        adds.push(store.addItem('a', 'X', '2.00', 3));
        adds.push(store.addItem('a', 'Y', '0.50', 4));
        adds.push(store.addItem('b', 'X', '1.00', 1));
      }
      await Promise.all(adds);

      expect(describeCart(await store.getCart('a')).items).toEqual([
        { name: 'X', unitPrice: '2.00', quantity: 150, subtotal: '300.00' },
        { name: 'Y', unitPrice: '0.50', quantity: 200, subtotal: '100.00' },
      ]);
      expect((await store.getTotal('a')).toString()).toBe('400.00');
      expect((await store.getTotal('b')).toString()).toBe('50.00');
    });
  });

  it('should count created carts and added units', async () => {
    const cartsCreated = jest.spyOn(metrics, 'recordCartCreated');
    const unitsAdded = jest.spyOn(metrics, 'recordUnitsAdded');

    await store.addItem('c1', 'Book', '1.00', 2);
    await store.addItem('c1', 'Book', '1.00', 3);
    await expect(store.addItem('c2', 'Book', '-1', 1)).rejects.toThrow(InvalidArgumentError);

    expect(cartsCreated).toHaveBeenCalledTimes(1);
    expect(unitsAdded.mock.calls).toEqual([
      [2, true],
      [3, false],
    ]);
  });

  it('should always answer ping', async () => {
    await expect(store.ping()).resolves.toBe(true);
  });
});
