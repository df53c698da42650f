/**
 * In-memory implementation of cart storage.
 * Data lives for the process lifetime and is lost on restart.
 *
 * Every operation does its whole read-modify-write without awaiting, so on the
 * event loop each call is one uninterrupted step: a cart is created exactly once
 * and concurrent adds to the same item never lose an update.
 */

import { ICartStore, CartSnapshot } from './cart-store';
import { ShoppingCart } from './shopping-cart';
import { validateLineItem } from './cart-item';
import { Amount, AmountInput } from '../pricing/amount';
import { CartNotFoundError, InvalidArgumentError } from '../errors';
import { logger } from '../utils/logger';
import { recordCartCreated, recordStorageOperation, recordUnitsAdded } from '../telemetry/metrics';

/**
 * In-memory cart store using a Map for storage.
 */
export class MemoryStore implements ICartStore {
    private carts: Map<string, ShoppingCart>;

    constructor() {
        this.carts = new Map();
        logger.info('MemoryStore initialized');
    }

    /**
     * Add an item to a cart, creating the cart and item as needed.
     * Validation happens before any lookup, so a rejected call never creates a cart.
     */
    async addItem(cartId: string, itemName: string, price: AmountInput, quantity: number): Promise<Amount> {
        const startTime = Date.now();
        try {
            const unitPrice = Amount.parse(price);
            validateLineItem(unitPrice, quantity);

            let cart = this.carts.get(cartId);
            if (!cart) {
                cart = new ShoppingCart(cartId);
                this.carts.set(cartId, cart);
                recordCartCreated();
                logger.debug('Created cart', { cartId });
            }

            const newQuantity = cart.addItem(itemName, unitPrice, quantity);
            recordUnitsAdded(quantity, newQuantity === quantity);
            const total = cart.total();
            logger.debug('Merged item into cart', { cartId, itemName, quantity: newQuantity, total: total.toString() });

            const duration = (Date.now() - startTime) / 1000;
            recordStorageOperation('addItem', 'success', duration);
            return total;
        } catch (error) {
            const duration = (Date.now() - startTime) / 1000;
            recordStorageOperation('addItem', error instanceof InvalidArgumentError ? 'invalid_argument' : 'error', duration);
            throw error;
        }
    }

    /**
     * Sum of all item subtotals in a cart.
     */
    async getTotal(cartId: string): Promise<Amount> {
        const startTime = Date.now();
        const cart = this.findCart(cartId, 'getTotal');
        const total = cart.total();

        logger.debug('Computed cart total', { cartId, itemCount: cart.itemCount, total: total.toString() });
        const duration = (Date.now() - startTime) / 1000;
        recordStorageOperation('getTotal', 'success', duration);
        return total;
    }

    /**
     * Copy of a cart's items and total.
     */
    async getCart(cartId: string): Promise<CartSnapshot> {
        const startTime = Date.now();
        const snapshot = this.findCart(cartId, 'getCart').snapshot();

        logger.debug('Retrieved cart from memory', { cartId, itemCount: snapshot.items.length });
        const duration = (Date.now() - startTime) / 1000;
        recordStorageOperation('getCart', 'success', duration);
        return snapshot;
    }

    /**
     * Check if the storage backend is accessible.
     * Always returns true for in-memory storage.
     */
    async ping(): Promise<boolean> {
        return true;
    }

    private findCart(cartId: string, operation: string): ShoppingCart {
        const cart = this.carts.get(cartId);
        if (!cart) {
            logger.debug('No cart found', { cartId });
            recordStorageOperation(operation, 'not_found', 0);
            throw new CartNotFoundError(cartId);
        }
        return cart;
    }
}
