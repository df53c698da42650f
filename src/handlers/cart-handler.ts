/**
 * gRPC handlers for ShoppingCartService operations
 * Implements AddItem, GetTotal, and GetCart methods
 */

import * as grpc from '@grpc/grpc-js';
import { ICartStore, CartSnapshot } from '../storage/cart-store';
import { CartError, CartNotFoundError, InvalidArgumentError } from '../errors';
import { logger } from '../utils/logger';
import { recordCartRequest } from '../telemetry/metrics';

/**
 * gRPC request/response types based on proto definitions
 */
export interface AddItemRequest {
  cart_id: string;
  item_name: string;
  price: string;
  quantity: number;
}

export interface GetTotalRequest {
  cart_id: string;
}

export interface GetCartRequest {
  cart_id: string;
}

export interface CartTotalResponse {
  cart_id: string;
  total: string;
}

export interface CartItemResponse {
  item_name: string;
  unit_price: string;
  quantity: number;
  subtotal: string;
}

export interface CartResponse {
  cart_id: string;
  items: CartItemResponse[];
  total: string;
}

/**
 * The handlers only read the decoded request off the call.
 */
export type UnaryCall<RequestType> = Pick<grpc.ServerUnaryCall<RequestType, unknown>, 'request'>;

interface FailedCall {
  code: grpc.status;
  message: string;
}

function isBlank(value: string | undefined): boolean {
  return !value || value.trim() === '';
}

/**
 * Map a store error to the status returned to the client.
 */
export function toFailedCall(error: unknown): FailedCall {
  if (error instanceof InvalidArgumentError) {
    return { code: grpc.status.INVALID_ARGUMENT, message: error.message };
  }
  if (error instanceof CartNotFoundError) {
    return { code: grpc.status.NOT_FOUND, message: error.message };
  }
  return {
    code: grpc.status.FAILED_PRECONDITION,
    message: `Can't access cart storage: ${error instanceof Error ? error.message : String(error)}`,
  };
}

function toCartResponse(cart: CartSnapshot): CartResponse {
  return {
    cart_id: cart.cartId,
    items: cart.items.map(item => ({
      item_name: item.name,
      unit_price: item.unitPrice.toString(),
      quantity: item.quantity,
      subtotal: item.subtotal.toString(),
    })),
    total: cart.total.toString(),
  };
}

/**
 * Create ShoppingCartService gRPC handlers
 */
export function createCartHandlers(store: ICartStore) {
  /**
   * Log and report a failed call. Domain errors are the caller's fault and logged as warnings.
   */
  function fail<ResponseType>(
    method: string,
    startTime: number,
    error: unknown,
    callback: grpc.sendUnaryData<ResponseType>,
    context: Record<string, unknown>
  ): void {
    const failed = toFailedCall(error);
    const details = { ...context, error: failed.message };
    if (error instanceof CartError) {
      logger.warn(`${method} rejected`, details);
    } else {
      logger.error(`${method} failed`, details);
    }

    const duration = (Date.now() - startTime) / 1000;
    recordCartRequest(method, grpc.status[failed.code], duration);
    callback(failed);
  }

  return {
    /**
     * Add a quantity of an item to a cart and return the new total
     */
    async addItem(
      call: UnaryCall<AddItemRequest>,
      callback: grpc.sendUnaryData<CartTotalResponse>
    ): Promise<void> {
      const startTime = Date.now();
      const request = call.request;

      for (const field of ['cart_id', 'item_name', 'price'] as const) {
        if (isBlank(request[field])) {
          fail('AddItem', startTime, new InvalidArgumentError(`${field} is required`), callback, {
            cartId: request.cart_id,
          });
          return;
        }
      }

      try {
        const total = await store.addItem(
          request.cart_id,
          request.item_name,
          request.price.trim(),
          request.quantity
        );

        logger.info('Item added to cart', {
          cartId: request.cart_id,
          itemName: request.item_name,
          quantity: request.quantity,
          total: total.toString(),
        });

        const duration = (Date.now() - startTime) / 1000;
        recordCartRequest('AddItem', 'OK', duration);
        callback(null, { cart_id: request.cart_id, total: total.toString() });
      } catch (error) {
        fail('AddItem', startTime, error, callback, {
          cartId: request.cart_id,
          itemName: request.item_name,
          price: request.price,
          quantity: request.quantity,
        });
      }
    },

    /**
     * Get the running total of a cart
     */
    async getTotal(
      call: UnaryCall<GetTotalRequest>,
      callback: grpc.sendUnaryData<CartTotalResponse>
    ): Promise<void> {
      const startTime = Date.now();
      const request = call.request;

      if (isBlank(request.cart_id)) {
        fail('GetTotal', startTime, new InvalidArgumentError('cart_id is required'), callback, {});
        return;
      }

      try {
        const total = await store.getTotal(request.cart_id);

        logger.info('Cart total retrieved', { cartId: request.cart_id, total: total.toString() });

        const duration = (Date.now() - startTime) / 1000;
        recordCartRequest('GetTotal', 'OK', duration);
        callback(null, { cart_id: request.cart_id, total: total.toString() });
      } catch (error) {
        fail('GetTotal', startTime, error, callback, { cartId: request.cart_id });
      }
    },

    /**
     * Get the items of a cart with their subtotals
     */
    async getCart(
      call: UnaryCall<GetCartRequest>,
      callback: grpc.sendUnaryData<CartResponse>
    ): Promise<void> {
      const startTime = Date.now();
      const request = call.request;

      if (isBlank(request.cart_id)) {
        fail('GetCart', startTime, new InvalidArgumentError('cart_id is required'), callback, {});
        return;
      }

      try {
        const cart = await store.getCart(request.cart_id);
        const response = toCartResponse(cart);

        logger.info('Cart retrieved', { cartId: request.cart_id, itemCount: response.items.length });
        logger.debug('Sending cart response', { cartId: request.cart_id, items: response.items });

        const duration = (Date.now() - startTime) / 1000;
        recordCartRequest('GetCart', 'OK', duration);
        callback(null, response);
      } catch (error) {
        fail('GetCart', startTime, error, callback, { cartId: request.cart_id });
      }
    },
  };
}
