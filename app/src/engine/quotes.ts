/**
 * Mint and redemption math
 *
 * Pure functions of the current position, prices and parameters. The engine
 * applies their output; nothing here touches a ledger.
 */

import { CollateralPosition, InsufficientFundsError, RedemptionResult } from '../types';
import { UNBOUNDED_RATIO, WAD } from '../config/constants';
import { bpsOf, decimalScale, mulDiv, scaleToWad, wadDiv, wadMul } from '../utils/fixed-point';

/**
 * USD prices (18 decimals) needed for every request
 */
export interface CorePrices {
  reserve: bigint;
  unitOfAccount: bigint;
}

/**
 * Bond and backstop prices, only read when the protocol is under-collateralized
 */
export interface CompensationPrices {
  bond(): bigint;
  backstop(): bigint;
}

export interface MintQuote {
  reserveAmount: bigint;
  grossStable: bigint;
  fee: bigint;
  netStable: bigint;
}

export type RedemptionTier = 'reserve' | 'reserve+bond' | 'reserve+bond+backstop';

export interface RedemptionQuote extends RedemptionResult {
  stableAmount: bigint;
  fee: bigint;
  netStable: bigint;
  collateralRatio: bigint;
  tier: RedemptionTier;
}

export function quoteMint(reserveAmount: bigint, reserveDecimals: number, prices: CorePrices, mintFeeBps: bigint): MintQuote {
  const grossStable = mulDiv(scaleToWad(reserveAmount, reserveDecimals), prices.reserve, prices.unitOfAccount);
  const fee = bpsOf(grossStable, mintFeeBps);
  return { reserveAmount, grossStable, fee, netStable: grossStable - fee };
}

export function reserveValue(position: CollateralPosition, reserveDecimals: number, reservePrice: bigint): bigint {
  return wadMul(scaleToWad(position.totalReserveUnits, reserveDecimals), reservePrice);
}

export function liabilityValue(position: CollateralPosition, unitOfAccountPrice: bigint): bigint {
  return wadMul(position.totalStableSupplyTracked, unitOfAccountPrice);
}

/**
 * Reserve value over stable liability value; WAD = fully backed, UNBOUNDED_RATIO with no liability
 */
export function collateralRatio(position: CollateralPosition, reserveDecimals: number, prices: CorePrices): bigint {
  const liability = liabilityValue(position, prices.unitOfAccount);
  if (liability === 0n) {
    return UNBOUNDED_RATIO;
  }
  return wadDiv(reserveValue(position, reserveDecimals, prices.reserve), liability);
}

/**
 * Stable that may be issued against bonds: (CR - 1) * supply, computed from the surplus value
 */
export function bondRedemptionCap(position: CollateralPosition, reserveDecimals: number, prices: CorePrices): bigint {
  const assets = reserveValue(position, reserveDecimals, prices.reserve);
  const liability = liabilityValue(position, prices.unitOfAccount);
  if (assets <= liability) {
    return 0n;
  }
  return wadDiv(assets - liability, prices.unitOfAccount);
}

export interface RedemptionInput {
  position: CollateralPosition;
  stableAmount: bigint;
  reserveDecimals: number;
  prices: CorePrices;
  compensation: CompensationPrices;
  redeemFeeBps: bigint;
  bondFloorPrice: bigint;
}

/**
 * Three-tier payout for burning `stableAmount`, priced on the pre-redemption ratio
 */
export function quoteRedemption(input: RedemptionInput): RedemptionQuote {
  const { position, stableAmount, reserveDecimals, prices } = input;
  if (stableAmount > position.totalStableSupplyTracked) {
    throw new InsufficientFundsError('stable supply', 'protocol', stableAmount, position.totalStableSupplyTracked);
  }

  const fee = bpsOf(stableAmount, input.redeemFeeBps);
  const netStable = stableAmount - fee;
  const ratio = collateralRatio(position, reserveDecimals, prices);
  const base = { stableAmount, fee, netStable, collateralRatio: ratio };

  if (ratio >= WAD) {
    const reserveOut = mulDiv(netStable, prices.unitOfAccount, prices.reserve * decimalScale(reserveDecimals));
    return { ...base, reserveOut, bondOut: 0n, backstopOut: 0n, tier: 'reserve' };
  }

  const reserveOut = mulDiv(netStable, position.totalReserveUnits, position.totalStableSupplyTracked);
  const owedValue = wadMul(netStable, prices.unitOfAccount);
  const paidValue = wadMul(scaleToWad(reserveOut, reserveDecimals), prices.reserve);
  const shortfall = owedValue > paidValue ? owedValue - paidValue : 0n;

  const bondPrice = input.compensation.bond();
  if (bondPrice >= input.bondFloorPrice) {
    return { ...base, reserveOut, bondOut: wadDiv(shortfall, bondPrice), backstopOut: 0n, tier: 'reserve+bond' };
  }

  // Bonds are credited at the floor; backstop covers what those bonds are worth less at market.
  const bondOut = wadDiv(shortfall, input.bondFloorPrice);
  const gap = wadMul(bondOut, input.bondFloorPrice - bondPrice);
  const backstopOut = wadDiv(gap, input.compensation.backstop());
  return { ...base, reserveOut, bondOut, backstopOut, tier: 'reserve+bond+backstop' };
}
