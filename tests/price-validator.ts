import { expect } from 'chai';
import {
  ConfigurationError,
  ObservationNotReadyError,
  PriceDeviationError,
  PriceUnavailableError,
  StalePriceError,
} from '../app/src/types';
import { PERIOD, WAD } from '../app/src/config/constants';
import { ManualClock } from '../app/src/utils/clock';
import { ManualPriceFeed } from '../app/src/feeds/price-feed';
import { SimulatedPool } from '../app/src/feeds/simulated-pool';
import { TimeWeightedPriceOracle } from '../app/src/oracles/twap-oracle';
import { AssetPriceConfig, PriceValidator } from '../app/src/oracles/price-validator';
import { ParameterStore } from '../app/src/governance/parameter-store';
import { ADMIN, BTC, wad } from './helpers/fixtures';

const USDC = 10n ** 6n;
const WBTC_POOL = { pair: 'WBTC/USDC', baseDecimals: 8, quoteDecimals: 6 };

function setup() {
  const clock = new ManualClock();
  const twap = new TimeWeightedPriceOracle(clock);
  const btcPool = new SimulatedPool(clock, { token0: 'WBTC', token1: 'USDC', reserve0: 10n * BTC, reserve1: 900_000n * USDC });
  const bondPool = new SimulatedPool(clock, { token0: 'BOND', token1: 'STABLE', reserve0: wad(1_000), reserve1: wad(750) });
  twap.registerPair('WBTC/USDC', { pool: btcPool, baseIsToken0: true });
  twap.registerPair('BOND/STABLE', { pool: bondPool, baseIsToken0: true });
  twap.recordObservationIfDue('WBTC/USDC');
  twap.recordObservationIfDue('BOND/STABLE');
  clock.advance(PERIOD);

  const parameters = new ParameterStore(ADMIN);
  const btcFeed = new ManualPriceFeed('BTC/USD', { value: wad(90_000), asOf: clock.now() });
  const build = (configs: Record<string, AssetPriceConfig>) => new PriceValidator(twap, parameters, clock, configs);
  return { clock, twap, parameters, btcFeed, build };
}

describe('PriceValidator', () => {
  it('returns the pool TWAP when the feed agrees within tolerance', () => {
    const { clock, btcFeed, build } = setup();
    btcFeed.set(wad(90_500), clock.now());
    const validator = build({ WBTC: { feeds: [btcFeed], pool: WBTC_POOL } });

    expect(validator.getTrustedPrice('WBTC')).to.deep.equal({ asset: 'WBTC', value: wad(90_000), asOf: clock.now() });
  });

  it('rejects a pool price that deviates from the reference beyond tolerance', () => {
    const { clock, btcFeed, build } = setup();
    btcFeed.set(wad(92_000), clock.now());
    const validator = build({ WBTC: { feeds: [btcFeed], pool: WBTC_POOL } });

    expect(() => validator.getTrustedPrice('WBTC')).to.throw(PriceDeviationError, '(217 bps > 100 bps)');
  });

  it('accepts a deviation exactly at the tolerance', () => {
    const { clock, btcFeed, parameters, build } = setup();
    parameters.setParameter(ADMIN, 'deviationToleranceBps', 1000n);
    btcFeed.set(wad(100_000), clock.now());
    const validator = build({ WBTC: { feeds: [btcFeed], pool: WBTC_POOL } });

    expect(validator.getTrustedPrice('WBTC').value).to.equal(wad(90_000));
  });

  it('checks against the median of several feeds', () => {
    const { clock, build } = setup();
    const feeds = [
      new ManualPriceFeed('a', { value: wad(89_000), asOf: clock.now() }),
      new ManualPriceFeed('b', { value: wad(90_100), asOf: clock.now() }),
      new ManualPriceFeed('c', { value: wad(120_000), asOf: clock.now() }),
    ];
    const validator = build({ WBTC: { feeds, pool: WBTC_POOL }, BTC: { feeds } });

    expect(validator.getTrustedPrice('WBTC').value).to.equal(wad(90_000));
    expect(validator.getTrustedPrice('BTC').value).to.equal(wad(90_100));
  });

  it('fails on a missing or stale feed reading', () => {
    const { clock, btcFeed, build } = setup();
    const validator = build({ WBTC: { feeds: [btcFeed], pool: WBTC_POOL, maxFeedAgeSec: 60 } });

    clock.advance(61);
    expect(() => validator.getTrustedPrice('WBTC')).to.throw(StalePriceError, 'Feed BTC/USD is stale (61s > 60s)');

    btcFeed.clear();
    expect(() => validator.getTrustedPrice('WBTC')).to.throw(PriceUnavailableError);
  });

  it('propagates ObservationNotReady from an immature pair', () => {
    const { clock, twap, btcFeed, build } = setup();
    const pool = new SimulatedPool(clock, { token0: 'ETH', token1: 'USDC', reserve0: wad(10), reserve1: 30_000n * USDC });
    twap.registerPair('ETH/USDC', { pool, baseIsToken0: true });
    const validator = build({ ETH: { feeds: [btcFeed], pool: { pair: 'ETH/USDC', baseDecimals: 18, quoteDecimals: 6 } } });

    expect(() => validator.getTrustedPrice('ETH')).to.throw(ObservationNotReadyError);
  });

  it('requires corroboration for pool prices unless disabled', () => {
    const { build } = setup();
    const strict = build({ WBTC: { feeds: [], pool: WBTC_POOL } });
    const relaxed = build({ WBTC: { feeds: [], pool: WBTC_POOL, requireCorroboration: false } });

    expect(() => strict.getTrustedPrice('WBTC')).to.throw(PriceUnavailableError);
    expect(relaxed.getTrustedPrice('WBTC').value).to.equal(wad(90_000));
  });

  it('converts a pool quoted in another asset through that asset\'s price', () => {
    const { clock, build } = setup();
    const stableFeed = new ManualPriceFeed('STABLE/USD', { value: (WAD * 101n) / 100n, asOf: clock.now() });
    const validator = build({
      STABLE: { feeds: [stableFeed] },
      BOND: { feeds: [], pool: { pair: 'BOND/STABLE', baseDecimals: 18, quoteDecimals: 18, quoteAsset: 'STABLE' }, requireCorroboration: false },
    });

    // 0.75 STABLE per BOND at $1.01
    expect(validator.getTrustedPrice('BOND').value).to.equal(757_500_000_000_000_000n);
  });

  it('multiplies in the unit-of-account scalar', () => {
    const { clock, btcFeed, build } = setup();
    const index = new ManualPriceFeed('unit-of-account', { value: (WAD * 102n) / 100n, asOf: clock.now() });
    const validator = build({ WBTC: { feeds: [btcFeed], pool: WBTC_POOL, scaleBy: index } });

    expect(validator.getTrustedPrice('WBTC').value).to.equal(wad(91_800));
  });

  it('reports per-asset results without throwing', () => {
    const { clock, btcFeed, build } = setup();
    btcFeed.set(wad(80_000), clock.now());
    const stableFeed = new ManualPriceFeed('STABLE/USD', { value: WAD, asOf: clock.now() });
    const validator = build({ WBTC: { feeds: [btcFeed], pool: WBTC_POOL }, STABLE: { feeds: [stableFeed] } });

    const results = validator.getTrustedPrices();

    expect(results.STABLE).to.deep.equal({ ok: true, price: { asset: 'STABLE', value: WAD, asOf: clock.now() } });
    const wbtc = results.WBTC;
    expect(wbtc?.ok).to.equal(false);
    if (wbtc && !wbtc.ok) {
      expect(wbtc.reason.code).to.equal('PriceDeviation');
      expect(wbtc.reason.details.deviationBps).to.equal('1250');
    }
  });

  it('rejects unknown assets and invalid configurations', () => {
    const { btcFeed, build } = setup();
    expect(() => build({ WBTC: { feeds: [btcFeed], pool: WBTC_POOL } }).getTrustedPrice('ETH')).to.throw(PriceUnavailableError);
    expect(() => build({ WBTC: { feeds: [] } })).to.throw(ConfigurationError);
    expect(() =>
      build({ BOND: { feeds: [], pool: { pair: 'BOND/STABLE', baseDecimals: 18, quoteDecimals: 18, quoteAsset: 'STABLE' } } })
    ).to.throw(ConfigurationError, 'unknown asset STABLE');
    expect(() =>
      build({
        A: { feeds: [], pool: { pair: 'BOND/STABLE', baseDecimals: 18, quoteDecimals: 18, quoteAsset: 'B' } },
        B: { feeds: [], pool: { pair: 'WBTC/USDC', baseDecimals: 8, quoteDecimals: 6, quoteAsset: 'A' } },
      })
    ).to.throw(ConfigurationError, 'Quote cycle');
  });

  it('computes deviation in floored basis points', () => {
    expect(PriceValidator.deviationBps(wad(90_000), wad(100_000))).to.equal(1000n);
    expect(PriceValidator.deviationBps(wad(90_000), wad(92_000))).to.equal(217n);
  });
});
