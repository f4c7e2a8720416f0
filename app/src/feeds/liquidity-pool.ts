/**
 * Liquidity-pool collaborator
 *
 * Accumulators are sums of instantaneous price (UQ112x112) times seconds,
 * recorded at the last reserve change, and never decrease.
 */

import { AssetSymbol } from '../types';

export interface CumulativePrices {
  /** token1 per token0 */
  price0: bigint;
  /** token0 per token1 */
  price1: bigint;
}

export interface PoolReserves {
  reserve0: bigint;
  reserve1: bigint;
}

export interface LiquidityPool {
  readonly token0: AssetSymbol;
  readonly token1: AssetSymbol;

  cumulativePriceAccumulator(): CumulativePrices;
  reserves(): PoolReserves;
  lastSyncTime(): number;
}
