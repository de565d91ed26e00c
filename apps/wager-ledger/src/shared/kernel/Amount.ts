import {
  AmountOverflowError,
  AmountUnderflowError,
  InvalidAmountError,
} from '@shared/kernel/DomainError';

export const MAX_AMOUNT = (1n << 256n) - 1n;

/**
 * Unsigned integer quantity in an asset's smallest unit. Every operation
 * that would leave the `[0, 2^256 - 1]` range throws instead of wrapping.
 */
export class Amount {
  private constructor(private readonly units: bigint) {
    if (units < 0n) throw new AmountUnderflowError(`Amount below zero: ${units}`);
    if (units > MAX_AMOUNT) throw new AmountOverflowError(`Amount exceeds 2^256 - 1: ${units}`);
  }

  static of(units: bigint | number): Amount {
    if (typeof units === 'number') {
      if (!Number.isSafeInteger(units)) {
        throw new InvalidAmountError(`Must be a safe integer, got ${units}`);
      }
      return new Amount(BigInt(units));
    }
    return new Amount(units);
  }

  static parse(text: string): Amount {
    if (!/^\d+$/.test(text)) {
      throw new InvalidAmountError(`Not an unsigned integer: "${text}"`);
    }
    return new Amount(BigInt(text));
  }

  static zero(): Amount {
    return new Amount(0n);
  }

  add(other: Amount): Amount {
    return new Amount(this.units + other.units);
  }

  subtract(other: Amount): Amount {
    return new Amount(this.units - other.units);
  }

  multiply(factor: bigint): Amount {
    return new Amount(this.units * factor);
  }

  /** Floor division. */
  divide(divisor: bigint): Amount {
    if (divisor <= 0n) throw new InvalidAmountError(`Divisor must be positive, got ${divisor}`);
    return new Amount(this.units / divisor);
  }

  /** `floor(this * numerator / denominator)`, overflow-checked on the product. */
  mulDiv(numerator: bigint, denominator: bigint): Amount {
    return this.multiply(numerator).divide(denominator);
  }

  isMultipleOf(divisor: bigint): boolean {
    return divisor > 0n && this.units % divisor === 0n;
  }

  isGreaterThan(other: Amount): boolean {
    return this.units > other.units;
  }

  isLessThan(other: Amount): boolean {
    return this.units < other.units;
  }

  isZero(): boolean {
    return this.units === 0n;
  }

  equals(other: Amount): boolean {
    return this.units === other.units;
  }

  toBigInt(): bigint {
    return this.units;
  }

  toString(): string {
    return this.units.toString();
  }
}
