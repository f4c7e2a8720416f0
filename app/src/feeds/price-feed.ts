/**
 * Push price-feed collaborator and simple adapters
 */

import { FeedReading } from '../types';
import { wadMul } from '../utils/fixed-point';

/**
 * Independent (non-pool) price source. Values are 18-decimal fixed point;
 * null means the source has not produced a reading yet.
 */
export interface PushPriceFeed {
  readonly name: string;
  latestPrice(): FeedReading | null;
}

/**
 * Feed with an explicitly set value
 */
export class ManualPriceFeed implements PushPriceFeed {
  private reading: FeedReading | null = null;

  constructor(
    public readonly name: string,
    initial?: FeedReading
  ) {
    this.reading = initial ?? null;
  }

  set(value: bigint, asOf: number): void {
    if (value <= 0n) {
      throw new RangeError(`${this.name}: price must be positive`);
    }
    this.reading = { value, asOf };
  }

  clear(): void {
    this.reading = null;
  }

  latestPrice(): FeedReading | null {
    return this.reading;
  }
}

/**
 * Product of two feeds (e.g. BTC/USD x WBTC/BTC); as-of time is the older input's
 */
export class ProductPriceFeed implements PushPriceFeed {
  constructor(
    public readonly name: string,
    private readonly left: PushPriceFeed,
    private readonly right: PushPriceFeed
  ) {}

  latestPrice(): FeedReading | null {
    const a = this.left.latestPrice();
    const b = this.right.latestPrice();
    if (!a || !b) {
      return null;
    }
    return { value: wadMul(a.value, b.value), asOf: Math.min(a.asOf, b.asOf) };
  }
}

/**
 * Convert a mantissa/exponent price (value * 10^expo) to 18-decimal fixed point
 */
export function exponentToWad(mantissa: bigint, expo: number): bigint {
  const shift = 18 + expo;
  if (shift >= 0) {
    return mantissa * 10n ** BigInt(shift);
  }
  return mantissa / 10n ** BigInt(-shift);
}

/**
 * Convert an integer answer with `decimals` places to 18-decimal fixed point
 */
export function answerToWad(answer: bigint, decimals: number): bigint {
  return exponentToWad(answer, -decimals);
}
