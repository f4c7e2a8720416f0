/**
 * Token ledger collaborator (one per asset)
 */

import { AccountId, AssetSymbol } from '../types';

export interface TokenLedger {
  readonly symbol: AssetSymbol;
  readonly decimals: number;

  balanceOf(account: AccountId): bigint;
  allowance(owner: AccountId, spender: AccountId): bigint;
  totalSupply(): bigint;

  approve(owner: AccountId, spender: AccountId, amount: bigint): void;

  /**
   * Pull `amount` from `from` to `to`, spending the allowance `from` granted to `spender`
   */
  transferIn(spender: AccountId, from: AccountId, to: AccountId, amount: bigint): void;

  /**
   * Move `amount` held by `from` to `to`
   */
  transferOut(from: AccountId, to: AccountId, amount: bigint): void;

  mint(to: AccountId, amount: bigint): void;
  burn(from: AccountId, amount: bigint): void;
}
