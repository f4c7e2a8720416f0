/**
 * Price Validator
 *
 * Produces one trusted 18-decimal USD price per asset. A pool TWAP is only
 * accepted when it agrees with the median of the asset's independent feeds
 * within the governance deviation tolerance.
 */

import {
  AssetSymbol,
  ConfigurationError,
  FailureReason,
  FeedReading,
  PairId,
  PriceDeviationError,
  PriceUnavailableError,
  ProtocolError,
  StalePriceError,
  TrustedPrice,
} from '../types';
import { BPS } from '../config/constants';
import { Clock } from '../utils/clock';
import { absDiff, median, mulDiv, wadMul } from '../utils/fixed-point';
import { PushPriceFeed } from '../feeds/price-feed';
import { ParameterReader } from '../governance/parameter-store';
import { TimeWeightedPriceOracle } from './twap-oracle';

export interface PoolPriceSource {
  pair: PairId;
  baseDecimals: number;
  quoteDecimals: number;
  /** Pool quotes the asset in another tracked asset; its trusted price converts to USD */
  quoteAsset?: AssetSymbol;
}

export interface AssetPriceConfig {
  feeds: PushPriceFeed[];
  pool?: PoolPriceSource;
  /** Readings older than this are rejected; unset disables the check */
  maxFeedAgeSec?: number;
  /** Reject a pool price with no feed to check it against (default true) */
  requireCorroboration?: boolean;
  /** Unit-of-account factor multiplied into the final price */
  scaleBy?: PushPriceFeed;
}

export type PriceCheck = { ok: true; price: TrustedPrice } | { ok: false; reason: FailureReason };

export class PriceValidator {
  private configs: Map<AssetSymbol, AssetPriceConfig>;

  constructor(
    private readonly twap: TimeWeightedPriceOracle,
    private readonly parameters: ParameterReader,
    private readonly clock: Clock,
    configs: Record<AssetSymbol, AssetPriceConfig>
  ) {
    this.configs = new Map(Object.entries(configs));
    this.validateConfigs();
  }

  assets(): AssetSymbol[] {
    return Array.from(this.configs.keys());
  }

  /**
   * Trusted price for an asset; throws PriceDeviation, StalePrice,
   * PriceUnavailable or ObservationNotReady
   */
  getTrustedPrice(asset: AssetSymbol): TrustedPrice {
    const config = this.configs.get(asset);
    if (!config) {
      throw new PriceUnavailableError(asset, 'asset is not configured');
    }

    const now = this.clock.now();
    const readings = config.feeds.map((feed) => this.readFeed(feed, config.maxFeedAgeSec, now));
    const reference = readings.length > 0 ? median(readings.map((r) => r.value)) : null;

    let value: bigint;
    if (config.pool) {
      value = this.poolPrice(config.pool);
      if (reference !== null) {
        this.checkDeviation(asset, value, reference);
      } else if (config.requireCorroboration ?? true) {
        throw new PriceUnavailableError(asset, 'pool price has no independent feed to corroborate it');
      }
    } else if (reference !== null) {
      value = reference;
    } else {
      throw new PriceUnavailableError(asset, 'no sources configured');
    }

    if (config.scaleBy) {
      value = wadMul(value, this.readFeed(config.scaleBy, config.maxFeedAgeSec, now).value);
    }

    return { asset, value, asOf: now };
  }

  /**
   * Evaluate several assets, reporting failures instead of throwing
   */
  getTrustedPrices(assets: AssetSymbol[] = this.assets()): Record<AssetSymbol, PriceCheck> {
    const result: Record<AssetSymbol, PriceCheck> = {};
    for (const asset of assets) {
      try {
        result[asset] = { ok: true, price: this.getTrustedPrice(asset) };
      } catch (error) {
        if (!(error instanceof ProtocolError)) {
          throw error;
        }
        result[asset] = { ok: false, reason: error.toJSON() };
      }
    }
    return result;
  }

  /**
   * Relative deviation in basis points (floor)
   */
  static deviationBps(price: bigint, reference: bigint): bigint {
    return mulDiv(absDiff(price, reference), BPS, reference);
  }

  private poolPrice(source: PoolPriceSource): bigint {
    const price = this.twap.priceInUnits(source.pair, source.baseDecimals, source.quoteDecimals);
    if (source.quoteAsset === undefined) {
      return price;
    }
    return wadMul(price, this.getTrustedPrice(source.quoteAsset).value);
  }

  private checkDeviation(asset: AssetSymbol, poolPrice: bigint, reference: bigint): void {
    const tolerance = this.parameters.current().deviationToleranceBps;
    if (absDiff(poolPrice, reference) * BPS > tolerance * reference) {
      throw new PriceDeviationError(asset, poolPrice, reference, PriceValidator.deviationBps(poolPrice, reference), tolerance);
    }
  }

  private readFeed(feed: PushPriceFeed, maxAgeSec: number | undefined, now: number): FeedReading {
    const reading = feed.latestPrice();
    if (!reading) {
      throw new PriceUnavailableError(feed.name, 'feed has no reading');
    }
    if (reading.value <= 0n) {
      throw new PriceUnavailableError(feed.name, 'feed reported a non-positive price');
    }
    if (maxAgeSec !== undefined && now - reading.asOf > maxAgeSec) {
      throw new StalePriceError(feed.name, now - reading.asOf, maxAgeSec);
    }
    return reading;
  }

  /**
   * Every asset needs a source; quote assets must exist and must not form a cycle
   */
  private validateConfigs(): void {
    for (const [asset, config] of this.configs) {
      if (!config.pool && config.feeds.length === 0) {
        throw new ConfigurationError(`Asset ${asset} has neither a pool nor a feed`);
      }
      const quote = config.pool?.quoteAsset;
      if (quote !== undefined && !this.configs.has(quote)) {
        throw new ConfigurationError(`Asset ${asset} is quoted in unknown asset ${quote}`);
      }
    }

    for (const asset of this.configs.keys()) {
      const seen = new Set<AssetSymbol>([asset]);
      let next = this.configs.get(asset)?.pool?.quoteAsset;
      while (next !== undefined) {
        if (seen.has(next)) {
          throw new ConfigurationError(`Quote cycle through ${asset} -> ${next}`);
        }
        seen.add(next);
        next = this.configs.get(next)?.pool?.quoteAsset;
      }
    }
  }
}
