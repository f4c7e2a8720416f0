/**
 * Reserve vault
 *
 * Custodian of the reserve asset and backstop token. Every movement needs the
 * capability handed out once by bindEngine(); balances are open to anyone.
 */

import { AccountId, InsufficientFundsError, UnauthorizedError, VaultBalances } from '../types';
import { TokenLedger } from '../ledger/token-ledger';

export interface ReserveVaultConfig {
  account: AccountId;
  engine: AccountId;
  reserve: TokenLedger;
  backstop: TokenLedger;
  stable: TokenLedger;
}

/**
 * Engine authority over the vault. Checked by identity, so a copy with the
 * same holder is refused.
 */
export interface VaultCapability {
  readonly holder: AccountId;
}

export class ReserveVault {
  readonly account: AccountId;
  private readonly engine: AccountId;
  private readonly reserve: TokenLedger;
  private readonly backstop: TokenLedger;
  private readonly stable: TokenLedger;
  private capability: VaultCapability | null = null;

  constructor(config: ReserveVaultConfig) {
    this.account = config.account;
    this.engine = config.engine;
    this.reserve = config.reserve;
    this.backstop = config.backstop;
    this.stable = config.stable;
  }

  /**
   * Issue the engine's capability; a vault serves exactly one engine
   */
  bindEngine(): VaultCapability {
    if (this.capability) {
      throw new UnauthorizedError(this.engine, 'bind the vault twice');
    }
    const capability: VaultCapability = Object.freeze({ holder: this.engine });
    this.capability = capability;
    return capability;
  }

  /**
   * Pull reserve from `from` into custody, spending the allowance granted to the engine
   */
  depositReserve(capability: VaultCapability, from: AccountId, amount: bigint): void {
    this.requireEngine(capability, 'deposit reserve');
    this.reserve.transferIn(this.engine, from, this.account, amount);
  }

  withdrawReserve(capability: VaultCapability, to: AccountId, amount: bigint): void {
    this.requireEngine(capability, 'withdraw reserve');
    this.requireBalance(this.reserve, amount);
    this.reserve.transferOut(this.account, to, amount);
  }

  /**
   * Pay backstop tokens from custody; fails rather than paying less than asked
   */
  compensate(capability: VaultCapability, recipient: AccountId, backstopAmount: bigint): void {
    this.requireEngine(capability, 'compensate');
    this.requireBalance(this.backstop, backstopAmount);
    this.backstop.transferOut(this.account, recipient, backstopAmount);
  }

  balances(): VaultBalances {
    return {
      reserve: this.reserve.balanceOf(this.account),
      backstop: this.backstop.balanceOf(this.account),
      stableHeld: this.stable.balanceOf(this.account),
    };
  }

  private requireEngine(capability: VaultCapability, action: string): void {
    if (this.capability === null || capability !== this.capability) {
      throw new UnauthorizedError(capability.holder, action);
    }
  }

  private requireBalance(ledger: TokenLedger, amount: bigint): void {
    const held = ledger.balanceOf(this.account);
    if (held < amount) {
      throw new InsufficientFundsError(ledger.symbol, this.account, amount, held);
    }
  }
}
