/**
 * Pyth Network push feeds over Hermes
 */

import { PriceServiceConnection } from '@pythnetwork/price-service-client';
import { EventEmitter } from 'events';
import { FeedReading } from '../types';
import { PYTH_HERMES_URL, PYTH_MAX_AGE_SEC } from '../config/constants';
import { Logger, getLogger } from '../utils/logger';
import { PushPriceFeed, exponentToWad } from './price-feed';

/**
 * Normalize feed ID (remove 0x prefix and convert to lowercase)
 */
export function normalizeFeedId(id: string): string {
  return id.toLowerCase().replace(/^0x/, '');
}

/**
 * Scale a Pyth price to 18 decimals; null for unparseable or non-positive prices
 */
export function scalePythPrice(price: { price: string; expo: number }): bigint | null {
  if (!/^-?\d+$/.test(price.price)) {
    return null;
  }
  const mantissa = BigInt(price.price);
  if (mantissa <= 0n) {
    return null;
  }
  return exponentToWad(mantissa, price.expo);
}

/**
 * Cached latest reading for a single feed id
 */
export class PythPriceFeed implements PushPriceFeed {
  private reading: FeedReading | null = null;

  constructor(
    public readonly name: string,
    public readonly feedId: string
  ) {}

  update(reading: FeedReading): void {
    if (this.reading && reading.asOf < this.reading.asOf) {
      return;
    }
    this.reading = reading;
  }

  latestPrice(): FeedReading | null {
    return this.reading;
  }
}

/**
 * One Hermes connection fanning updates out to registered feeds.
 * Emits 'price' (feed, reading) on each accepted update.
 */
export class PythPriceStream extends EventEmitter {
  private priceService: PriceServiceConnection;
  private feeds = new Map<string, PythPriceFeed>();
  private isSubscribed: boolean = false;
  private logger: Logger;

  constructor(endpoint: string = PYTH_HERMES_URL, logger?: Logger) {
    super();
    this.logger = logger ?? getLogger();
    this.priceService = new PriceServiceConnection(endpoint, {
      priceFeedRequestConfig: { binary: true },
    });
  }

  /**
   * Register a feed id and return the adapter that caches its readings
   */
  feed(name: string, feedId: string): PythPriceFeed {
    const id = normalizeFeedId(feedId);
    const existing = this.feeds.get(id);
    if (existing) {
      return existing;
    }
    const feed = new PythPriceFeed(name, id);
    this.feeds.set(id, feed);
    return feed;
  }

  /**
   * Subscribe to price feed updates for every registered feed
   */
  async subscribe(): Promise<void> {
    if (this.isSubscribed || this.feeds.size === 0) {
      return;
    }

    await this.priceService.subscribePriceFeedUpdates(Array.from(this.feeds.keys()), (priceFeed) => {
      const p = priceFeed.getPriceNoOlderThan(PYTH_MAX_AGE_SEC);
      if (!p) {
        return;
      }

      const feed = this.feeds.get(normalizeFeedId(priceFeed.id));
      const value = scalePythPrice(p);
      if (!feed || value === null) {
        this.logger.debug(`Dropped Pyth update for ${priceFeed.id}`);
        return;
      }

      const reading: FeedReading = { value, asOf: Number(p.publishTime) };
      feed.update(reading);
      this.emit('price', feed, reading);
    });

    this.isSubscribed = true;
  }

  /**
   * Close the price service connection
   */
  async close(): Promise<void> {
    if (this.isSubscribed) {
      this.priceService.closeWebSocket();
      this.isSubscribed = false;
    }
  }

  getFeeds(): PythPriceFeed[] {
    return Array.from(this.feeds.values());
  }
}
