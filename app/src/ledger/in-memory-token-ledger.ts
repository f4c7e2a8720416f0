/**
 * In-memory fungible token ledger
 */

import { AccountId, AssetSymbol, InsufficientAllowanceError, InsufficientFundsError } from '../types';
import { Rollback } from '../engine/atomic';
import { TokenLedger } from './token-ledger';

/**
 * Called after every balance move, before the moving call returns.
 * Lets a token call back into its caller the way hook-bearing tokens do.
 */
export type TransferHook = (from: AccountId | null, to: AccountId | null, amount: bigint) => void;

export class InMemoryTokenLedger implements TokenLedger {
  private balances = new Map<AccountId, bigint>();
  private allowances = new Map<string, bigint>();
  private supply = 0n;
  private hook: TransferHook | null = null;

  constructor(
    public readonly symbol: AssetSymbol,
    public readonly decimals: number
  ) {}

  private allowanceKey(owner: AccountId, spender: AccountId): string {
    return `${owner}\u0000${spender}`;
  }

  balanceOf(account: AccountId): bigint {
    return this.balances.get(account) ?? 0n;
  }

  allowance(owner: AccountId, spender: AccountId): bigint {
    return this.allowances.get(this.allowanceKey(owner, spender)) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  approve(owner: AccountId, spender: AccountId, amount: bigint): void {
    this.requireNonNegative(amount);
    this.allowances.set(this.allowanceKey(owner, spender), amount);
  }

  transferIn(spender: AccountId, from: AccountId, to: AccountId, amount: bigint): void {
    this.requireNonNegative(amount);
    const allowed = this.allowance(from, spender);
    if (allowed < amount) {
      throw new InsufficientAllowanceError(this.symbol, from, spender, amount, allowed);
    }
    this.debit(from, amount);
    this.allowances.set(this.allowanceKey(from, spender), allowed - amount);
    this.credit(to, amount);
    this.hook?.(from, to, amount);
  }

  transferOut(from: AccountId, to: AccountId, amount: bigint): void {
    this.requireNonNegative(amount);
    this.debit(from, amount);
    this.credit(to, amount);
    this.hook?.(from, to, amount);
  }

  mint(to: AccountId, amount: bigint): void {
    this.requireNonNegative(amount);
    this.credit(to, amount);
    this.supply += amount;
    this.hook?.(null, to, amount);
  }

  burn(from: AccountId, amount: bigint): void {
    this.requireNonNegative(amount);
    this.debit(from, amount);
    this.supply -= amount;
    this.hook?.(from, null, amount);
  }

  /**
   * Install (or clear with null) the post-transfer hook
   */
  setTransferHook(hook: TransferHook | null): void {
    this.hook = hook;
  }

  checkpoint(): Rollback {
    const balances = new Map(this.balances);
    const allowances = new Map(this.allowances);
    const supply = this.supply;
    return () => {
      this.balances = balances;
      this.allowances = allowances;
      this.supply = supply;
    };
  }

  private debit(account: AccountId, amount: bigint): void {
    const balance = this.balanceOf(account);
    if (balance < amount) {
      throw new InsufficientFundsError(this.symbol, account, amount, balance);
    }
    this.balances.set(account, balance - amount);
  }

  private credit(account: AccountId, amount: bigint): void {
    this.balances.set(account, this.balanceOf(account) + amount);
  }

  private requireNonNegative(amount: bigint): void {
    if (amount < 0n) {
      throw new RangeError(`${this.symbol}: negative amount ${amount}`);
    }
  }
}
