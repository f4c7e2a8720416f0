/**
 * Time-weighted average price oracle
 *
 * Keeps two observations per pair. The average runs from a reference
 * observation at least PERIOD old up to the current time, so a trade made just
 * before a read only weighs in for the seconds since it happened.
 */

import { Observation, ObservationNotReadyError, PairId, PriceUnavailableError } from '../types';
import { PERIOD, Q112 } from '../config/constants';
import { Clock } from '../utils/clock';
import { LiquidityPool } from '../feeds/liquidity-pool';

export interface PairRegistration {
  pool: LiquidityPool;
  /** Average token1-per-token0 when true, token0-per-token1 otherwise */
  baseIsToken0: boolean;
}

export interface ObservationSlots {
  older: Observation | null;
  newer: Observation | null;
}

export interface ObservationInfo {
  olderTimestamp: number | null;
  newerTimestamp: number | null;
  /** Seconds since the newer observation (null before the first one) */
  elapsed: number | null;
}

export class TimeWeightedPriceOracle {
  private pairs = new Map<PairId, PairRegistration>();
  private slots = new Map<PairId, ObservationSlots>();

  constructor(
    private readonly clock: Clock,
    private readonly period: number = PERIOD
  ) {
    if (period <= 0) {
      throw new RangeError('PERIOD must be positive');
    }
  }

  registerPair(pair: PairId, registration: PairRegistration): void {
    this.pairs.set(pair, registration);
  }

  registeredPairs(): PairId[] {
    return Array.from(this.pairs.keys());
  }

  isRegistered(pair: PairId): boolean {
    return this.pairs.has(pair);
  }

  /**
   * Store an observation if none exists or the newer one is at least PERIOD old.
   * Returns true when an observation was written.
   */
  recordObservationIfDue(pair: PairId): boolean {
    const registration = this.registration(pair);
    const now = this.clock.now();
    const current = this.slotsFor(pair);

    if (current.newer !== null && now - current.newer.timestamp < this.period) {
      return false;
    }

    const candidate: Observation = { timestamp: now, accumulator: this.currentAccumulator(registration, now) };
    this.slots.set(pair, { older: current.newer, newer: candidate });
    return true;
  }

  needsUpdate(pair: PairId): boolean {
    this.registration(pair);
    const { newer } = this.slotsFor(pair);
    return newer === null || this.clock.now() - newer.timestamp >= this.period;
  }

  isReady(pair: PairId): boolean {
    this.registration(pair);
    return this.referenceObservation(pair, this.clock.now()) !== null;
  }

  /**
   * Average raw price (UQ112x112, quote raw units per base raw unit) from the reference observation to now
   */
  computeAverage(pair: PairId): bigint {
    const registration = this.registration(pair);
    const now = this.clock.now();
    const reference = this.referenceObservation(pair, now);
    if (reference === null) {
      throw new ObservationNotReadyError(pair);
    }
    const elapsed = BigInt(now - reference.timestamp);
    return (this.currentAccumulator(registration, now) - reference.accumulator) / elapsed;
  }

  /**
   * Average price as 18-decimal fixed point, adjusted for both assets' native decimals
   */
  priceInUnits(pair: PairId, decimalsA: number, decimalsB: number): bigint {
    const average = this.computeAverage(pair);
    return (average * 10n ** BigInt(18 + decimalsA)) / (10n ** BigInt(decimalsB) * Q112);
  }

  getObservationInfo(pair: PairId): ObservationInfo {
    this.registration(pair);
    const { older, newer } = this.slotsFor(pair);
    return {
      olderTimestamp: older?.timestamp ?? null,
      newerTimestamp: newer?.timestamp ?? null,
      elapsed: newer ? this.clock.now() - newer.timestamp : null,
    };
  }

  observations(pair: PairId): ObservationSlots {
    return { ...this.slotsFor(pair) };
  }

  private referenceObservation(pair: PairId, now: number): Observation | null {
    const { older, newer } = this.slotsFor(pair);
    if (newer !== null && now - newer.timestamp >= this.period) {
      return newer;
    }
    if (older !== null && now - older.timestamp >= this.period) {
      return older;
    }
    return null;
  }

  /**
   * Stored accumulator extended to `now` at the pool's current spot price
   */
  private currentAccumulator(registration: PairRegistration, now: number): bigint {
    const { pool, baseIsToken0 } = registration;
    const cumulative = pool.cumulativePriceAccumulator();
    let accumulator = baseIsToken0 ? cumulative.price0 : cumulative.price1;

    const lastSync = pool.lastSyncTime();
    const { reserve0, reserve1 } = pool.reserves();
    if (now > lastSync && reserve0 > 0n && reserve1 > 0n) {
      const spot = baseIsToken0 ? (reserve1 * Q112) / reserve0 : (reserve0 * Q112) / reserve1;
      accumulator += spot * BigInt(now - lastSync);
    }
    return accumulator;
  }

  private registration(pair: PairId): PairRegistration {
    const registration = this.pairs.get(pair);
    if (!registration) {
      throw new PriceUnavailableError(pair, 'pair is not registered');
    }
    return registration;
  }

  private slotsFor(pair: PairId): ObservationSlots {
    return this.slots.get(pair) ?? { older: null, newer: null };
  }
}
