/**
 * Inflation-indexed unit of account
 *
 * Tracks a PCE price index feed: value = initialValue * currentPce / basePce.
 * Exposed as a push feed so the validator can price the unit of account.
 */

import { AccountId, FeedReading, PriceUnavailableError, UnauthorizedError } from '../types';
import { WAD } from '../config/constants';
import { Clock } from '../utils/clock';
import { mulDiv } from '../utils/fixed-point';
import { PushPriceFeed } from '../feeds/price-feed';
import { TwoStepOwnership } from './ownership';

export interface IndexUpdate {
  timestamp: number;
  value: bigint;
  pceIndex: bigint;
}

export interface UnitOfAccountOptions {
  initialValue?: bigint;
  /** PCE level the initial value corresponds to; captured on first update when unset */
  basePce?: bigint;
}

export class UnitOfAccountIndex implements PushPriceFeed {
  readonly name = 'unit-of-account';
  readonly ownership: TwoStepOwnership;
  private readonly initialValue: bigint;
  private basePce: bigint | null;
  private value: bigint;
  private asOf: number;
  private history: IndexUpdate[] = [];
  private updaters = new Set<AccountId>();
  private whitelistEnabled = false;

  constructor(
    owner: AccountId,
    private readonly pceFeed: PushPriceFeed,
    private readonly clock: Clock,
    options: UnitOfAccountOptions = {}
  ) {
    this.ownership = new TwoStepOwnership(owner);
    this.initialValue = options.initialValue ?? WAD;
    if (this.initialValue <= 0n) {
      throw new RangeError('Initial unit-of-account value must be positive');
    }
    this.basePce = options.basePce ?? null;
    this.value = this.initialValue;
    this.asOf = clock.now();
  }

  latestPrice(): FeedReading {
    return { value: this.value, asOf: this.asOf };
  }

  /**
   * Owner always; whitelisted updaters only while the whitelist is enabled
   */
  canUpdate(caller: AccountId): boolean {
    if (caller === this.ownership.owner()) {
      return true;
    }
    return this.whitelistEnabled && this.updaters.has(caller);
  }

  update(caller: AccountId): IndexUpdate {
    if (!this.canUpdate(caller)) {
      throw new UnauthorizedError(caller, 'update the unit-of-account index');
    }
    const reading = this.pceFeed.latestPrice();
    if (!reading || reading.value <= 0n) {
      throw new PriceUnavailableError(this.pceFeed.name, 'no PCE reading');
    }

    if (this.basePce === null) {
      this.basePce = reading.value;
    }
    const now = this.clock.now();
    this.value = mulDiv(this.initialValue, reading.value, this.basePce);
    this.asOf = now;

    const entry: IndexUpdate = { timestamp: now, value: this.value, pceIndex: reading.value };
    this.history.push(entry);
    return entry;
  }

  latestUpdate(): IndexUpdate | null {
    return this.history[this.history.length - 1] ?? null;
  }

  updateHistory(): readonly IndexUpdate[] {
    return this.history;
  }

  setWhitelistEnabled(caller: AccountId, enabled: boolean): void {
    this.ownership.requireOwner(caller, 'configure updater whitelist');
    this.whitelistEnabled = enabled;
  }

  setUpdater(caller: AccountId, updater: AccountId, authorized: boolean): void {
    this.ownership.requireOwner(caller, 'configure updater whitelist');
    if (authorized) {
      this.updaters.add(updater);
    } else {
      this.updaters.delete(updater);
    }
  }
}
