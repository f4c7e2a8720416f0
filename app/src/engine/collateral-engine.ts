/**
 * Collateral engine - mint, tiered redemption and bond redemption
 *
 * Every mutating call holds the reentrancy lock and runs inside an atomic
 * scope over the position and the token ledgers: the quote is computed first,
 * then effects are applied, and any failure rolls all of them back.
 * Calls are synchronous, so requests complete in the order they arrive.
 */

import { EventEmitter } from 'events';
import {
  AccountId,
  AssetSymbol,
  CollateralPosition,
  PausedError,
  PriceUnavailableError,
  RedemptionCapExceededError,
  RedemptionResult,
  TrustedPrice,
  ZeroAmountError,
} from '../types';
import { Logger, getLogger } from '../utils/logger';
import { formatUnits } from '../utils/formatting';
import { TokenLedger } from '../ledger/token-ledger';
import { ParameterReader } from '../governance/parameter-store';
import { TwoStepOwnership } from '../governance/ownership';
import { ReserveVault, VaultCapability } from '../vault/reserve-vault';
import { AtomicScope } from './atomic';
import { PositionStore } from './position-store';
import { ReentrancyGuard } from './reentrancy-guard';
import {
  CompensationPrices,
  CorePrices,
  MintQuote,
  RedemptionQuote,
  bondRedemptionCap,
  collateralRatio,
  quoteMint,
  quoteRedemption,
} from './quotes';

/**
 * Source of trusted prices (PriceValidator in production)
 */
export interface PriceSource {
  getTrustedPrice(asset: AssetSymbol): TrustedPrice;
}

export interface EngineAssets {
  reserve: AssetSymbol;
  unitOfAccount: AssetSymbol;
  bond: AssetSymbol;
  backstop: AssetSymbol;
}

export interface EngineLedgers {
  reserve: TokenLedger;
  stable: TokenLedger;
  bond: TokenLedger;
  backstop: TokenLedger;
}

export interface CollateralEngineConfig {
  /** Engine's own account: allowance spender and transient holder of burned tokens */
  account: AccountId;
  admin: AccountId;
  assets: EngineAssets;
  ledgers: EngineLedgers;
  vault: ReserveVault;
  prices: PriceSource;
  parameters: ParameterReader;
  logger?: Logger;
}

export interface MintReceipt extends MintQuote {
  account: AccountId;
}

export interface RedemptionReceipt extends RedemptionQuote {
  account: AccountId;
}

export interface BondRedemptionReceipt {
  account: AccountId;
  bondAmount: bigint;
  stableOut: bigint;
  capBefore: bigint;
}

export class CollateralEngine extends EventEmitter {
  readonly account: AccountId;
  readonly ownership: TwoStepOwnership;
  private readonly assets: EngineAssets;
  private readonly ledgers: EngineLedgers;
  private readonly vault: ReserveVault;
  private readonly vaultAccess: VaultCapability;
  private readonly prices: PriceSource;
  private readonly parameters: ParameterReader;
  private readonly logger: Logger;
  private readonly store = new PositionStore();
  private readonly guard = new ReentrancyGuard();
  private readonly scope: AtomicScope;
  private paused = false;

  constructor(config: CollateralEngineConfig) {
    super();
    this.account = config.account;
    this.ownership = new TwoStepOwnership(config.admin);
    this.assets = config.assets;
    this.ledgers = config.ledgers;
    this.vault = config.vault;
    this.vaultAccess = config.vault.bindEngine();
    this.prices = config.prices;
    this.parameters = config.parameters;
    this.logger = config.logger ?? getLogger();

    const { reserve, stable, bond, backstop } = config.ledgers;
    this.scope = new AtomicScope([this.store, ...new Set([reserve, stable, bond, backstop])]);
  }

  /**
   * Deposit reserve and receive stable; returns the net stable minted to the caller
   */
  mint(caller: AccountId, reserveAmount: bigint): bigint {
    const receipt = this.execute('mint', () => {
      this.requireNotPaused('mint');
      this.requirePositive('reserveAmount', reserveAmount);

      const quote = this.quoteMint(reserveAmount);
      if (quote.netStable === 0n) {
        throw new ZeroAmountError('stable output');
      }

      this.vault.depositReserve(this.vaultAccess, caller, reserveAmount);
      this.ledgers.stable.mint(caller, quote.netStable);
      if (quote.fee > 0n) {
        this.ledgers.stable.mint(this.vault.account, quote.fee);
      }
      this.store.apply({ reserveUnits: reserveAmount, stableSupply: quote.grossStable });

      const result: MintReceipt = { ...quote, account: caller };
      return result;
    });

    this.logger.debug(
      `mint ${caller}: ${formatUnits(reserveAmount, this.ledgers.reserve.decimals)} ${this.assets.reserve} -> ` +
      `${formatUnits(receipt.netStable)} stable (fee ${formatUnits(receipt.fee)})`
    );
    this.announce('minted', receipt);
    return receipt.netStable;
  }

  /**
   * Burn stable and receive reserve, plus bond and backstop when under-collateralized
   */
  redeem(caller: AccountId, stableAmount: bigint): RedemptionResult {
    const receipt = this.execute('redeem', () => {
      this.requireNotPaused('redeem');
      this.requirePositive('stableAmount', stableAmount);

      const quote = this.quoteRedeem(stableAmount);

      this.ledgers.stable.transferIn(this.account, caller, this.account, stableAmount);
      this.ledgers.stable.burn(this.account, stableAmount);
      if (quote.reserveOut > 0n) {
        this.vault.withdrawReserve(this.vaultAccess, caller, quote.reserveOut);
      }
      if (quote.bondOut > 0n) {
        this.ledgers.bond.mint(caller, quote.bondOut);
      }
      if (quote.backstopOut > 0n) {
        this.vault.compensate(this.vaultAccess, caller, quote.backstopOut);
      }
      this.store.apply({ reserveUnits: -quote.reserveOut, stableSupply: -stableAmount });

      const result: RedemptionReceipt = { ...quote, account: caller };
      return result;
    });

    this.logger.debug(
      `redeem ${caller}: ${formatUnits(stableAmount)} stable -> ${receipt.tier} ` +
      `(reserve ${formatUnits(receipt.reserveOut, this.ledgers.reserve.decimals)}, ` +
      `bond ${formatUnits(receipt.bondOut)}, backstop ${formatUnits(receipt.backstopOut)})`
    );
    this.announce('redeemed', receipt);
    return { reserveOut: receipt.reserveOut, bondOut: receipt.bondOut, backstopOut: receipt.backstopOut };
  }

  /**
   * Exchange bonds 1:1 for newly issued stable while the protocol holds surplus
   */
  redeemBond(caller: AccountId, bondAmount: bigint): bigint {
    const receipt = this.execute('redeemBond', () => {
      this.requireNotPaused('redeemBond');
      this.requirePositive('bondAmount', bondAmount);

      const cap = this.redeemableBondCap();
      if (bondAmount > cap) {
        throw new RedemptionCapExceededError(bondAmount, cap);
      }

      this.ledgers.bond.transferIn(this.account, caller, this.account, bondAmount);
      this.ledgers.bond.burn(this.account, bondAmount);
      this.ledgers.stable.mint(caller, bondAmount);
      this.store.apply({ reserveUnits: 0n, stableSupply: bondAmount });

      const result: BondRedemptionReceipt = { account: caller, bondAmount, stableOut: bondAmount, capBefore: cap };
      return result;
    });

    this.logger.debug(`redeemBond ${caller}: ${formatUnits(bondAmount)} bond -> stable (cap ${formatUnits(receipt.capBefore)})`);
    this.announce('bondRedeemed', receipt);
    return receipt.stableOut;
  }

  pause(caller: AccountId): void {
    this.ownership.requireOwner(caller, 'pause');
    if (!this.paused) {
      this.paused = true;
      this.logger.warn('Collateral engine paused');
      this.emit('paused', caller);
    }
  }

  unpause(caller: AccountId): void {
    this.ownership.requireOwner(caller, 'unpause');
    if (this.paused) {
      this.paused = false;
      this.logger.info('Collateral engine unpaused');
      this.emit('unpaused', caller);
    }
  }

  isPaused(): boolean {
    return this.paused;
  }

  position(): Readonly<CollateralPosition> {
    return this.store.current();
  }

  collateralRatio(): bigint {
    return collateralRatio(this.store.current(), this.ledgers.reserve.decimals, this.corePrices());
  }

  redeemableBondCap(): bigint {
    return bondRedemptionCap(this.store.current(), this.ledgers.reserve.decimals, this.corePrices());
  }

  quoteMint(reserveAmount: bigint): MintQuote {
    return quoteMint(reserveAmount, this.ledgers.reserve.decimals, this.corePrices(), this.parameters.current().mintFeeBps);
  }

  quoteRedeem(stableAmount: bigint): RedemptionQuote {
    const params = this.parameters.current();
    return quoteRedemption({
      position: this.store.current(),
      stableAmount,
      reserveDecimals: this.ledgers.reserve.decimals,
      prices: this.corePrices(),
      compensation: this.compensationPrices(),
      redeemFeeBps: params.redeemFeeBps,
      bondFloorPrice: params.bondFloorPrice,
    });
  }

  /**
   * Listener failures are logged; the request has already committed
   */
  private announce(event: 'minted' | 'redeemed' | 'bondRedeemed', receipt: MintReceipt | RedemptionReceipt | BondRedemptionReceipt): void {
    try {
      this.emit(event, receipt);
    } catch (error) {
      this.logger.error(`[${event} listener]`, error instanceof Error ? error.message : String(error));
    }
  }

  private execute<T>(entry: string, request: () => T): T {
    return this.guard.enter(entry, () => this.scope.run(request));
  }

  private corePrices(): CorePrices {
    return {
      reserve: this.positivePrice(this.assets.reserve),
      unitOfAccount: this.positivePrice(this.assets.unitOfAccount),
    };
  }

  private compensationPrices(): CompensationPrices {
    return {
      bond: () => this.positivePrice(this.assets.bond),
      backstop: () => this.positivePrice(this.assets.backstop),
    };
  }

  private positivePrice(asset: AssetSymbol): bigint {
    const { value } = this.prices.getTrustedPrice(asset);
    if (value <= 0n) {
      throw new PriceUnavailableError(asset, 'trusted price is zero');
    }
    return value;
  }

  private requireNotPaused(operation: string): void {
    if (this.paused) {
      throw new PausedError(operation);
    }
  }

  private requirePositive(field: string, amount: bigint): void {
    if (amount === 0n) {
      throw new ZeroAmountError(field);
    }
    if (amount < 0n) {
      throw new RangeError(`${field} must be positive`);
    }
  }
}
