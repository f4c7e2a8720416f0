import { expect } from 'chai';
import { ManualPriceFeed, ProductPriceFeed, answerToWad, exponentToWad } from '../app/src/feeds/price-feed';
import { PythPriceFeed, PythPriceStream, normalizeFeedId, scalePythPrice } from '../app/src/feeds/pyth-feed';
import { Logger } from '../app/src/utils/logger';
import { wad } from './helpers/fixtures';

const BTC_FEED_ID = '0xE62DF6C8B4A85FE1A67DB44DC12DE5DB330F7AC66B72DC658AFEDF0F4A415B43';

describe('push price feeds', () => {
  describe('ManualPriceFeed', () => {
    it('holds the last value set', () => {
      const feed = new ManualPriceFeed('BTC/USD');
      expect(feed.latestPrice()).to.equal(null);

      feed.set(wad(90_000), 1_700_000_000);
      expect(feed.latestPrice()).to.deep.equal({ value: wad(90_000), asOf: 1_700_000_000 });

      feed.clear();
      expect(feed.latestPrice()).to.equal(null);
    });

    it('rejects non-positive prices', () => {
      expect(() => new ManualPriceFeed('x').set(0n, 1)).to.throw(RangeError, 'x: price must be positive');
    });
  });

  describe('ProductPriceFeed', () => {
    it('multiplies two readings and keeps the older timestamp', () => {
      const btcUsd = new ManualPriceFeed('BTC/USD', { value: wad(90_000), asOf: 200 });
      const wbtcBtc = new ManualPriceFeed('WBTC/BTC', { value: 998_000_000_000_000_000n, asOf: 150 });
      const product = new ProductPriceFeed('WBTC/USD', btcUsd, wbtcBtc);

      expect(product.latestPrice()).to.deep.equal({ value: wad(89_820), asOf: 150 });

      wbtcBtc.clear();
      expect(product.latestPrice()).to.equal(null);
    });
  });

  describe('scaling', () => {
    it('converts mantissa and exponent to 18 decimals', () => {
      expect(exponentToWad(6_500_012_345_678n, -8)).to.equal(65_000_123_456_780_000_000_000n);
      expect(exponentToWad(5n, 0)).to.equal(wad(5));
      expect(exponentToWad(123n, -20)).to.equal(1n);
    });

    it('converts fixed-decimal answers', () => {
      expect(answerToWad(123_456n, 2)).to.equal(1_234_560_000_000_000_000_000n);
      expect(answerToWad(99_985_000n, 8)).to.equal(999_850_000_000_000_000n);
    });

    it('scales Pyth prices and drops unusable ones', () => {
      expect(scalePythPrice({ price: '6500012345678', expo: -8 })).to.equal(65_000_123_456_780_000_000_000n);
      expect(scalePythPrice({ price: '-5', expo: -8 })).to.equal(null);
      expect(scalePythPrice({ price: '0', expo: -8 })).to.equal(null);
      expect(scalePythPrice({ price: '12.5', expo: -8 })).to.equal(null);
    });
  });

  describe('Pyth feeds', () => {
    it('normalizes feed ids', () => {
      expect(normalizeFeedId(BTC_FEED_ID)).to.equal('e62df6c8b4a85fe1a67db44dc12de5db330f7ac66b72dc658afedf0f4a415b43');
    });

    it('keeps the newest reading', () => {
      const feed = new PythPriceFeed('BTC/USD', normalizeFeedId(BTC_FEED_ID));
      feed.update({ value: wad(90_000), asOf: 200 });
      feed.update({ value: wad(80_000), asOf: 100 });
      expect(feed.latestPrice()).to.deep.equal({ value: wad(90_000), asOf: 200 });

      feed.update({ value: wad(91_000), asOf: 201 });
      expect(feed.latestPrice()?.value).to.equal(wad(91_000));
    });

    it('registers one adapter per feed id without connecting', async () => {
      const stream = new PythPriceStream('http://localhost:0', new Logger());
      const a = stream.feed('BTC/USD', BTC_FEED_ID);
      const b = stream.feed('BTC', BTC_FEED_ID.toLowerCase());

      expect(a).to.equal(b);
      expect(stream.getFeeds()).to.have.length(1);
      expect(a.latestPrice()).to.equal(null);
      await stream.close();
    });
  });
});
