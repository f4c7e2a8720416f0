/**
 * Global collateral position, written only by the engine
 */

import { CollateralPosition } from '../types';
import { Rollback } from './atomic';

export interface PositionDelta {
  reserveUnits: bigint;
  stableSupply: bigint;
}

export const EMPTY_POSITION: Readonly<CollateralPosition> = Object.freeze({
  totalReserveUnits: 0n,
  totalStableSupplyTracked: 0n,
});

export function applyDelta(position: CollateralPosition, delta: PositionDelta): CollateralPosition {
  const next: CollateralPosition = {
    totalReserveUnits: position.totalReserveUnits + delta.reserveUnits,
    totalStableSupplyTracked: position.totalStableSupplyTracked + delta.stableSupply,
  };
  if (next.totalReserveUnits < 0n || next.totalStableSupplyTracked < 0n) {
    throw new RangeError('Collateral position cannot go negative');
  }
  return next;
}

export class PositionStore {
  private position: Readonly<CollateralPosition> = EMPTY_POSITION;

  current(): Readonly<CollateralPosition> {
    return this.position;
  }

  apply(delta: PositionDelta): Readonly<CollateralPosition> {
    this.position = Object.freeze(applyDelta(this.position, delta));
    return this.position;
  }

  checkpoint(): Rollback {
    const saved = this.position;
    return () => {
      this.position = saved;
    };
  }
}
