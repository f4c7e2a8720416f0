/**
 * Constant-product pool simulation with cumulative price accumulators
 */

import { AssetSymbol } from '../types';
import { POOL_FEE_PER_MILLE, Q112 } from '../config/constants';
import { Clock } from '../utils/clock';
import { CumulativePrices, LiquidityPool, PoolReserves } from './liquidity-pool';

export interface SimulatedPoolConfig {
  token0: AssetSymbol;
  token1: AssetSymbol;
  reserve0: bigint;
  reserve1: bigint;
}

export interface SwapResult {
  amountIn: bigint;
  amountOut: bigint;
}

export class SimulatedPool implements LiquidityPool {
  readonly token0: AssetSymbol;
  readonly token1: AssetSymbol;
  private reserve0: bigint;
  private reserve1: bigint;
  private price0Cumulative = 0n;
  private price1Cumulative = 0n;
  private timestampLast: number;

  constructor(
    private readonly clock: Clock,
    config: SimulatedPoolConfig
  ) {
    if (config.reserve0 <= 0n || config.reserve1 <= 0n) {
      throw new RangeError(`Pool ${config.token0}/${config.token1} needs positive reserves`);
    }
    this.token0 = config.token0;
    this.token1 = config.token1;
    this.reserve0 = config.reserve0;
    this.reserve1 = config.reserve1;
    this.timestampLast = clock.now();
  }

  cumulativePriceAccumulator(): CumulativePrices {
    return { price0: this.price0Cumulative, price1: this.price1Cumulative };
  }

  reserves(): PoolReserves {
    return { reserve0: this.reserve0, reserve1: this.reserve1 };
  }

  lastSyncTime(): number {
    return this.timestampLast;
  }

  /**
   * Accrue the current price up to now without changing reserves
   */
  sync(): void {
    this.update(this.reserve0, this.reserve1);
  }

  /**
   * Replace reserves (liquidity events, test setup); accrues the old price first
   */
  setReserves(reserve0: bigint, reserve1: bigint): void {
    if (reserve0 <= 0n || reserve1 <= 0n) {
      throw new RangeError('Reserves must be positive');
    }
    this.update(reserve0, reserve1);
  }

  /**
   * Quote the output of a swap with the pool fee applied
   */
  getAmountOut(amountIn: bigint, zeroForOne: boolean): bigint {
    const [reserveIn, reserveOut] = zeroForOne ? [this.reserve0, this.reserve1] : [this.reserve1, this.reserve0];
    const amountInWithFee = amountIn * (1000n - POOL_FEE_PER_MILLE);
    return (amountInWithFee * reserveOut) / (reserveIn * 1000n + amountInWithFee);
  }

  /**
   * Swap exact input; zeroForOne sells token0 for token1
   */
  swap(amountIn: bigint, zeroForOne: boolean): SwapResult {
    if (amountIn <= 0n) {
      throw new RangeError('Swap amount must be positive');
    }
    const amountOut = this.getAmountOut(amountIn, zeroForOne);
    if (zeroForOne) {
      this.update(this.reserve0 + amountIn, this.reserve1 - amountOut);
    } else {
      this.update(this.reserve0 - amountOut, this.reserve1 + amountIn);
    }
    return { amountIn, amountOut };
  }

  private update(reserve0: bigint, reserve1: bigint): void {
    const now = this.clock.now();
    const elapsed = BigInt(now - this.timestampLast);
    if (elapsed > 0n) {
      this.price0Cumulative += ((this.reserve1 * Q112) / this.reserve0) * elapsed;
      this.price1Cumulative += ((this.reserve0 * Q112) / this.reserve1) * elapsed;
    }
    this.reserve0 = reserve0;
    this.reserve1 = reserve1;
    this.timestampLast = now;
  }
}
