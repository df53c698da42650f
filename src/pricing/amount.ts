/**
 * Exact decimal money amounts.
 * Wraps decimal.js and keeps track of the scale (fraction digits) the amount was written with,
 * so "120.50" x 2 renders as "241.00" rather than "241".
 */

import Decimal from 'decimal.js';
import { InvalidArgumentError } from '../errors';

// Results are rounded to this many significant digits; far beyond any cart total.
const ExactDecimal = Decimal.clone({ precision: 1000 });

const PLAIN_DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)$/;

/** Most fraction digits a parsed amount may carry. */
export const MAX_SCALE = 20;

/** Parsed amounts must stay below 10^30 in absolute value. */
const MAX_MAGNITUDE = new ExactDecimal('1e30');

export type AmountInput = Amount | Decimal.Value;

/**
 * Number of fraction digits to keep for a parsed input.
 * Plain decimal strings keep what was written; numbers and exponent strings use what the value needs.
 */
function scaleOf(input: Decimal.Value, value: Decimal): number {
  if (typeof input === 'string' && PLAIN_DECIMAL.test(input)) {
    const point = input.indexOf('.');
    return point === -1 ? 0 : input.length - point - 1;
  }
  return Math.max(value.decimalPlaces(), 0);
}

export class Amount {
  static readonly ZERO = new Amount(new ExactDecimal(0), 0);

  private constructor(
    private readonly value: Decimal,
    readonly scale: number,
  ) {}

  /**
   * Parse a price from a decimal string, a number or a Decimal.
   * @throws InvalidArgumentError if the input is not a finite number, has more than MAX_SCALE
   * fraction digits or is 10^30 or larger
   */
  static parse(input: AmountInput): Amount {
    if (input instanceof Amount) {
      return input;
    }

    const raw = typeof input === 'string' ? input.trim() : input;
    let value: Decimal;
    try {
      value = new ExactDecimal(raw);
    } catch {
      throw new InvalidArgumentError(`Invalid amount: ${String(input)}`);
    }

    if (!value.isFinite()) {
      throw new InvalidArgumentError(`Invalid amount: ${String(input)}`);
    }

    const scale = scaleOf(raw, value);
    if (scale > MAX_SCALE || value.abs().greaterThanOrEqualTo(MAX_MAGNITUDE)) {
      throw new InvalidArgumentError(`Amount out of range: ${String(input)}`);
    }

    return new Amount(value, scale);
  }

  isNegative(): boolean {
    return this.value.lessThan(0);
  }

  times(quantity: number): Amount {
    return new Amount(this.value.times(quantity), this.scale);
  }

  plus(other: Amount): Amount {
    return new Amount(this.value.plus(other.value), Math.max(this.scale, other.scale));
  }

  equals(other: Amount): boolean {
    return this.value.equals(other.value);
  }

  toString(): string {
    return this.value.toFixed(this.scale);
  }

  toJSON(): string {
    return this.toString();
  }
}
