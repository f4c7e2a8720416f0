import { AccountId, AssetSymbol, GovernableParameters, PriceUnavailableError, TrustedPrice } from '../../app/src/types';
import { WAD } from '../../app/src/config/constants';
import { Logger } from '../../app/src/utils/logger';
import { InMemoryTokenLedger } from '../../app/src/ledger/in-memory-token-ledger';
import { ParameterStore } from '../../app/src/governance/parameter-store';
import { ReserveVault } from '../../app/src/vault/reserve-vault';
import { CollateralEngine, PriceSource } from '../../app/src/engine/collateral-engine';

export const ADMIN = 'admin';
export const ENGINE = 'engine';
export const VAULT = 'vault';
export const ALICE = 'alice';
export const BOB = 'bob';

export const BTC = 10n ** 8n;

export function wad(units: number | bigint): bigint {
  return BigInt(units) * WAD;
}

/**
 * Price source with values set directly by the test
 */
export class StaticPriceSource implements PriceSource {
  private prices = new Map<AssetSymbol, bigint>();
  readonly requests: AssetSymbol[] = [];

  set(asset: AssetSymbol, value: bigint): this {
    this.prices.set(asset, value);
    return this;
  }

  getTrustedPrice(asset: AssetSymbol): TrustedPrice {
    this.requests.push(asset);
    const value = this.prices.get(asset);
    if (value === undefined) {
      throw new PriceUnavailableError(asset, 'not set in test');
    }
    return { asset, value, asOf: 0 };
  }
}

export interface EngineFixtureOptions {
  parameters?: Partial<GovernableParameters>;
  reservePrice?: bigint;
  bondPrice?: bigint;
  backstopPrice?: bigint;
  vaultBackstop?: bigint;
}

export interface EngineFixture {
  engine: CollateralEngine;
  prices: StaticPriceSource;
  parameters: ParameterStore;
  vault: ReserveVault;
  reserve: InMemoryTokenLedger;
  stable: InMemoryTokenLedger;
  bond: InMemoryTokenLedger;
  backstop: InMemoryTokenLedger;
}

export function createEngineFixture(options: EngineFixtureOptions = {}): EngineFixture {
  const reserve = new InMemoryTokenLedger('WBTC', 8);
  const stable = new InMemoryTokenLedger('STABLE', 18);
  const bond = new InMemoryTokenLedger('BOND', 18);
  const backstop = new InMemoryTokenLedger('BACKSTOP', 18);

  const prices = new StaticPriceSource()
    .set('WBTC', options.reservePrice ?? wad(50_000))
    .set('IUSD', WAD)
    .set('BOND', options.bondPrice ?? WAD)
    .set('BACKSTOP', options.backstopPrice ?? wad(2));

  const parameters = new ParameterStore(ADMIN, options.parameters ?? {});
  const vault = new ReserveVault({ account: VAULT, engine: ENGINE, reserve, backstop, stable });
  if (options.vaultBackstop !== undefined) {
    backstop.mint(VAULT, options.vaultBackstop);
  }

  const engine = new CollateralEngine({
    account: ENGINE,
    admin: ADMIN,
    assets: { reserve: 'WBTC', unitOfAccount: 'IUSD', bond: 'BOND', backstop: 'BACKSTOP' },
    ledgers: { reserve, stable, bond, backstop },
    vault,
    prices,
    parameters,
    logger: new Logger(),
  });

  return { engine, prices, parameters, vault, reserve, stable, bond, backstop };
}

/**
 * Mint `amount` to `account` and approve the engine to pull all of it
 */
export function fund(ledger: InMemoryTokenLedger, account: AccountId, amount: bigint): void {
  ledger.mint(account, amount);
  ledger.approve(account, ENGINE, ledger.allowance(account, ENGINE) + amount);
}

export function approveEngine(ledger: InMemoryTokenLedger, account: AccountId): void {
  ledger.approve(account, ENGINE, ledger.balanceOf(account));
}
