/**
 * Protocol assembly - wires ledgers, pools, oracles, governance, vault and engine
 * from a deployment description
 */

import { AccountId, AssetSymbol, ConfigurationError, PairId, ProtocolError } from '../types';
import { DeploymentConfig, FeedSpec } from '../config/deployment';
import { Clock } from '../utils/clock';
import { Logger } from '../utils/logger';
import { InMemoryTokenLedger } from '../ledger/in-memory-token-ledger';
import { ManualPriceFeed, ProductPriceFeed, PushPriceFeed } from '../feeds/price-feed';
import { PythPriceStream } from '../feeds/pyth-feed';
import { SimulatedPool } from '../feeds/simulated-pool';
import { TimeWeightedPriceOracle } from '../oracles/twap-oracle';
import { AssetPriceConfig, PoolPriceSource, PriceValidator } from '../oracles/price-validator';
import { ParameterStore } from '../governance/parameter-store';
import { IndexUpdate, UnitOfAccountIndex } from '../governance/unit-of-account-index';
import { ReserveVault } from '../vault/reserve-vault';
import { CollateralEngine } from '../engine/collateral-engine';

export interface ProtocolOptions {
  clock: Clock;
  logger: Logger;
  /** Needed only when the deployment declares pyth feeds */
  pythStream?: PythPriceStream;
}

export interface Protocol {
  deployment: DeploymentConfig;
  clock: Clock;
  ledgers: Map<AssetSymbol, InMemoryTokenLedger>;
  pools: Map<PairId, SimulatedPool>;
  manualFeeds: Map<string, ManualPriceFeed>;
  twap: TimeWeightedPriceOracle;
  parameters: ParameterStore;
  unitOfAccount: UnitOfAccountIndex;
  validator: PriceValidator;
  vault: ReserveVault;
  engine: CollateralEngine;
  pythStream: PythPriceStream | null;
  /** Account the keeper updates the unit-of-account index as */
  indexUpdater: AccountId;
}

export function createProtocol(deployment: DeploymentConfig, options: ProtocolOptions): Protocol {
  const { clock, logger } = options;
  const { accounts, roles } = deployment;

  const ledgers = new Map<AssetSymbol, InMemoryTokenLedger>();
  for (const token of deployment.tokens) {
    ledgers.set(token.symbol, new InMemoryTokenLedger(token.symbol, token.decimals));
  }
  const ledger = (symbol: AssetSymbol): InMemoryTokenLedger => {
    const found = ledgers.get(symbol);
    if (!found) {
      throw new ConfigurationError(`No token ledger for ${symbol}`);
    }
    return found;
  };

  const pools = new Map<PairId, SimulatedPool>();
  for (const spec of deployment.pools) {
    pools.set(spec.pair, new SimulatedPool(clock, spec));
  }

  const manualFeeds = new Map<string, ManualPriceFeed>();
  let pythStream: PythPriceStream | null = null;

  const parameters = new ParameterStore(accounts.admin, deployment.parameters);

  // The unit-of-account index reads its PCE feed, so it is built before asset feeds reference it.
  let unitOfAccount: UnitOfAccountIndex | null = null;
  const buildFeed = (spec: FeedSpec): PushPriceFeed => {
    switch (spec.kind) {
      case 'manual': {
        const feed = new ManualPriceFeed(spec.name, { value: spec.value, asOf: clock.now() });
        manualFeeds.set(spec.name, feed);
        return feed;
      }
      case 'pyth': {
        if (!options.pythStream) {
          throw new ConfigurationError(`Feed ${spec.name} needs a Pyth stream`);
        }
        pythStream = options.pythStream;
        return options.pythStream.feed(spec.name, spec.feedId);
      }
      case 'product':
        return new ProductPriceFeed(spec.name, buildFeed(spec.left), buildFeed(spec.right));
      case 'unitOfAccount':
        if (!unitOfAccount) {
          throw new ConfigurationError('The unit-of-account index cannot price its own PCE feed');
        }
        return unitOfAccount;
    }
  };

  unitOfAccount = new UnitOfAccountIndex(accounts.admin, buildFeed(deployment.unitOfAccount.pceFeed), clock, {
    initialValue: deployment.unitOfAccount.initialValue,
    basePce: deployment.unitOfAccount.basePce ?? undefined,
  });
  if (deployment.unitOfAccount.updaters.length > 0) {
    for (const updater of deployment.unitOfAccount.updaters) {
      unitOfAccount.setUpdater(accounts.admin, updater, true);
    }
    unitOfAccount.setWhitelistEnabled(accounts.admin, true);
  }
  const indexFeed = unitOfAccount;

  const twap = new TimeWeightedPriceOracle(clock);
  const registeredBase = new Map<PairId, AssetSymbol>();
  const assetConfigs: Record<AssetSymbol, AssetPriceConfig> = {};

  for (const [asset, spec] of Object.entries(deployment.assets)) {
    assetConfigs[asset] = {
      feeds: spec.feeds.map(buildFeed),
      pool: spec.pool === undefined ? undefined : registerPool(asset, spec.pool),
      maxFeedAgeSec: spec.maxFeedAgeSec,
      requireCorroboration: spec.requireCorroboration,
      scaleBy: spec.scaleByUnitOfAccount ? indexFeed : undefined,
    };
  }

  function registerPool(asset: AssetSymbol, pair: PairId): PoolPriceSource {
    const pool = pools.get(pair);
    if (!pool) {
      throw new ConfigurationError(`Unknown pool ${pair}`);
    }
    if (pool.token0 !== asset && pool.token1 !== asset) {
      throw new ConfigurationError(`Pool ${pair} does not trade ${asset}`);
    }
    const existing = registeredBase.get(pair);
    if (existing !== undefined && existing !== asset) {
      throw new ConfigurationError(`Pool ${pair} is already priced for ${existing}`);
    }
    registeredBase.set(pair, asset);

    const baseIsToken0 = pool.token0 === asset;
    const quote = baseIsToken0 ? pool.token1 : pool.token0;
    twap.registerPair(pair, { pool, baseIsToken0 });
    return {
      pair,
      baseDecimals: ledger(asset).decimals,
      quoteDecimals: ledger(quote).decimals,
      quoteAsset: quote in deployment.assets ? quote : undefined,
    };
  }

  const validator = new PriceValidator(twap, parameters, clock, assetConfigs);

  const vault = new ReserveVault({
    account: accounts.vault,
    engine: accounts.engine,
    reserve: ledger(roles.reserve),
    backstop: ledger(roles.backstop),
    stable: ledger(roles.stable),
  });
  if (deployment.vaultBackstop > 0n) {
    ledger(roles.backstop).mint(accounts.vault, deployment.vaultBackstop);
  }

  const engine = new CollateralEngine({
    account: accounts.engine,
    admin: accounts.admin,
    assets: { reserve: roles.reserve, unitOfAccount: roles.unitOfAccount, bond: roles.bond, backstop: roles.backstop },
    ledgers: {
      reserve: ledger(roles.reserve),
      stable: ledger(roles.stable),
      bond: ledger(roles.bond),
      backstop: ledger(roles.backstop),
    },
    vault,
    prices: validator,
    parameters,
    logger: logger.child('engine'),
  });

  return {
    deployment,
    clock,
    ledgers,
    pools,
    manualFeeds,
    twap,
    parameters,
    unitOfAccount: indexFeed,
    validator,
    vault,
    engine,
    pythStream,
    indexUpdater: deployment.unitOfAccount.updaters[0] ?? accounts.admin,
  };
}

/**
 * Work done before each keeper round: simulated pools accrue at their current
 * price and the unit-of-account index follows its PCE feed. Push feeds are left
 * alone, so their staleness limits still apply.
 */
export function syncProtocol(protocol: Protocol, logger: Logger): IndexUpdate | null {
  protocol.pools.forEach((pool) => pool.sync());
  try {
    return protocol.unitOfAccount.update(protocol.indexUpdater);
  } catch (error) {
    if (!(error instanceof ProtocolError)) {
      throw error;
    }
    logger.warn(`Unit-of-account update skipped: ${error.message}`);
    return null;
  }
}
