/**
 * Domain errors raised by the cart store.
 * Handlers map these to gRPC status codes; anything else is treated as a storage failure.
 */

export class CartError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised for a negative or malformed price, or a quantity that is not a positive integer.
 * The store is left untouched when this is thrown.
 */
export class InvalidArgumentError extends CartError {}

/**
 * Raised when reading a cart that no successful addItem call has ever created.
 */
export class CartNotFoundError extends CartError {
  readonly cartId: string;

  constructor(cartId: string) {
    super(`Cart not found: ${cartId}`);
    this.cartId = cartId;
  }
}
