/**
 * Fixed-point arithmetic on bigint
 *
 * All prices and ratios use an 18-decimal scale (WAD). Every division floors,
 * so each conversion drifts downward by at most one unit of its output scale.
 */

import { BPS, WAD } from '../config/constants';

/**
 * floor(a * b / denominator)
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new RangeError('mulDiv: division by zero');
  }
  if (a < 0n || b < 0n || denominator < 0n) {
    throw new RangeError('mulDiv: negative operand');
  }
  return (a * b) / denominator;
}

/**
 * floor(a * b / WAD)
 */
export function wadMul(a: bigint, b: bigint): bigint {
  return mulDiv(a, b, WAD);
}

/**
 * floor(a * WAD / b)
 */
export function wadDiv(a: bigint, b: bigint): bigint {
  return mulDiv(a, WAD, b);
}

/**
 * floor(amount * bps / 10000)
 */
export function bpsOf(amount: bigint, bps: bigint): bigint {
  return mulDiv(amount, bps, BPS);
}

/**
 * Power-of-ten multiplier between a token's native decimals and the 18-decimal scale
 */
export function decimalScale(decimals: number): bigint {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > 18) {
    throw new RangeError(`Unsupported decimals: ${decimals}`);
  }
  return 10n ** BigInt(18 - decimals);
}

/**
 * Native token units to 18-decimal units
 */
export function scaleToWad(amount: bigint, decimals: number): bigint {
  return amount * decimalScale(decimals);
}

/**
 * 18-decimal units to native token units (floor)
 */
export function fromWad(amount: bigint, decimals: number): bigint {
  return amount / decimalScale(decimals);
}

/**
 * Parse a decimal string ("50000", "0.9") into integer units with the given decimals
 */
export function parseUnits(text: string, decimals: number = 18): bigint {
  const match = /^(\d+)(?:\.(\d+))?$/.exec(text.trim());
  if (!match) {
    throw new RangeError(`Invalid decimal amount: "${text}"`);
  }
  const whole = match[1] ?? '0';
  const fraction = match[2] ?? '';
  if (fraction.length > decimals) {
    throw new RangeError(`Too many decimal places in "${text}" (max ${decimals})`);
  }
  return BigInt(whole) * 10n ** BigInt(decimals) + BigInt(fraction.padEnd(decimals, '0') || '0');
}

/**
 * Median of a non-empty list (even length averages the middle pair, floored)
 */
export function median(values: readonly bigint[]): bigint {
  if (values.length === 0) {
    throw new RangeError('median: empty input');
  }
  const sorted = [...values].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0n;
  if (sorted.length % 2 === 1) {
    return upper;
  }
  const lower = sorted[mid - 1] ?? 0n;
  return (lower + upper) / 2n;
}

export function absDiff(a: bigint, b: bigint): bigint {
  return a > b ? a - b : b - a;
}
