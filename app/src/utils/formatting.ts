/**
 * Formatting utilities
 */

/**
 * Format integer units as a decimal string, trimming trailing zeros
 */
export function formatUnits(amount: bigint, decimals: number = 18): string {
  const negative = amount < 0n;
  const abs = negative ? -amount : amount;
  const base = 10n ** BigInt(decimals);
  const whole = abs / base;
  const fraction = (abs % base).toString().padStart(decimals, '0').replace(/0+$/, '');
  const text = fraction.length > 0 ? `${whole}.${fraction}` : whole.toString();
  return negative ? `-${text}` : text;
}

/**
 * Format an 18-decimal price with 2 decimal places
 */
export function formatPrice(value: bigint): string {
  const cents = value / 10n ** 16n;
  const whole = (cents / 100n).toString().replace(/\B(?=(\d{3})+(?!\d))/g, ',');
  return `${whole}.${(cents % 100n).toString().padStart(2, '0')}`;
}

/**
 * Format an 18-decimal ratio as a percentage
 */
export function formatRatio(ratio: bigint): string {
  const basisPoints = ratio / 10n ** 14n;
  return `${basisPoints / 100n}.${(basisPoints % 100n).toString().padStart(2, '0')}%`;
}

/**
 * Format unix seconds to ISO string
 */
export function formatTimestamp(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}

/**
 * Human-readable duration ("1.5h", "12.0m", "40s")
 */
export function formatDuration(seconds: number): string {
  if (seconds > 3600) {
    return `${(seconds / 3600).toFixed(1)}h`;
  }
  if (seconds > 60) {
    return `${(seconds / 60).toFixed(1)}m`;
  }
  return `${seconds.toFixed(0)}s`;
}
