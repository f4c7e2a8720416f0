/**
 * Governance parameter store
 *
 * Holds the protocol parameters read by the engine and the validator.
 * Writes are owner-only and checked against per-key bounds.
 */

import { AccountId, GovernableParameters, InvalidParameterError, ParameterKey } from '../types';
import { WAD } from '../config/constants';
import { TwoStepOwnership } from './ownership';

export interface ParameterReader {
  current(): Readonly<GovernableParameters>;
}

interface ParameterBounds {
  min: bigint;
  max: bigint;
  /** Value accepted outside [min, max] (e.g. 0 = disabled) */
  sentinel?: bigint;
}

export const PARAMETER_BOUNDS: Record<ParameterKey, ParameterBounds> = {
  mintFeeBps: { min: 0n, max: 1000n },
  redeemFeeBps: { min: 0n, max: 1000n },
  bondFloorPrice: { min: WAD / 10n, max: WAD, sentinel: 0n },
  maxBondRate: { min: 0n, max: 10_000n },
  deviationToleranceBps: { min: 1n, max: 2000n },
};

export const DEFAULT_PARAMETERS: Readonly<GovernableParameters> = Object.freeze({
  mintFeeBps: 50n,
  redeemFeeBps: 50n,
  bondFloorPrice: 0n,
  maxBondRate: 500n,
  deviationToleranceBps: 100n,
});

export function isParameterKey(key: string): key is ParameterKey {
  return Object.prototype.hasOwnProperty.call(PARAMETER_BOUNDS, key);
}

/**
 * Throws InvalidParameter when value is outside the key's range
 */
export function checkParameter(key: ParameterKey, value: bigint): void {
  const bounds = PARAMETER_BOUNDS[key];
  if (bounds.sentinel !== undefined && value === bounds.sentinel) {
    return;
  }
  if (value < bounds.min || value > bounds.max) {
    throw new InvalidParameterError(key, `${value} outside [${bounds.min}, ${bounds.max}]`);
  }
}

export class ParameterStore implements ParameterReader {
  readonly ownership: TwoStepOwnership;
  private values: Readonly<GovernableParameters>;

  constructor(owner: AccountId, initial: Partial<GovernableParameters> = {}) {
    this.ownership = new TwoStepOwnership(owner);
    const merged: GovernableParameters = { ...DEFAULT_PARAMETERS, ...initial };
    for (const key of Object.keys(PARAMETER_BOUNDS)) {
      if (isParameterKey(key)) {
        checkParameter(key, merged[key]);
      }
    }
    this.values = Object.freeze(merged);
  }

  current(): Readonly<GovernableParameters> {
    return this.values;
  }

  get(key: ParameterKey): bigint {
    return this.values[key];
  }

  setParameter(caller: AccountId, key: ParameterKey, value: bigint): void {
    const updates: Partial<GovernableParameters> = {};
    updates[key] = value;
    this.setParameters(caller, updates);
  }

  /**
   * Apply several writes; nothing changes unless every value is in range
   */
  setParameters(caller: AccountId, updates: Partial<GovernableParameters>): void {
    this.ownership.requireOwner(caller, 'set parameters');
    const next: GovernableParameters = { ...this.values };
    for (const key of Object.keys(updates)) {
      if (!isParameterKey(key)) {
        throw new InvalidParameterError(key, 'unknown parameter');
      }
      const value = updates[key];
      if (value === undefined) {
        continue;
      }
      checkParameter(key, value);
      next[key] = value;
    }
    this.values = Object.freeze(next);
  }
}
