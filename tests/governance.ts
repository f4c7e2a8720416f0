import { expect } from 'chai';
import { InvalidParameterError, PriceUnavailableError, UnauthorizedError } from '../app/src/types';
import { WAD } from '../app/src/config/constants';
import { ManualClock } from '../app/src/utils/clock';
import { ManualPriceFeed } from '../app/src/feeds/price-feed';
import { OwnershipState, TwoStepOwnership, acceptTransfer, cancelTransfer, proposeTransfer } from '../app/src/governance/ownership';
import { DEFAULT_PARAMETERS, ParameterStore } from '../app/src/governance/parameter-store';
import { UnitOfAccountIndex } from '../app/src/governance/unit-of-account-index';
import { ADMIN, ALICE, BOB, wad } from './helpers/fixtures';

describe('TwoStepOwnership', () => {
  const initial: OwnershipState = { status: 'NoPendingTransfer', owner: ADMIN };

  it('moves through propose and accept', () => {
    const pending = proposeTransfer(initial, ADMIN, ALICE);
    expect(pending).to.deep.equal({ status: 'PendingTransfer', owner: ADMIN, candidate: ALICE });
    expect(acceptTransfer(pending, ALICE)).to.deep.equal({ status: 'NoPendingTransfer', owner: ALICE });
  });

  it('lets only the owner propose or cancel and only the candidate accept', () => {
    const pending = proposeTransfer(initial, ADMIN, ALICE);

    expect(() => proposeTransfer(initial, BOB, BOB)).to.throw(UnauthorizedError);
    expect(() => acceptTransfer(pending, BOB)).to.throw(UnauthorizedError);
    expect(() => acceptTransfer(initial, ALICE)).to.throw(UnauthorizedError, 'alice is not authorized to accept ownership');
    expect(() => cancelTransfer(pending, ALICE)).to.throw(UnauthorizedError);
    expect(cancelTransfer(pending, ADMIN)).to.deep.equal(initial);
  });

  it('keeps the owner until the candidate accepts', () => {
    const ownership = new TwoStepOwnership(ADMIN);
    ownership.transferOwnership(ADMIN, ALICE);

    expect(ownership.owner()).to.equal(ADMIN);
    expect(ownership.pendingOwner()).to.equal(ALICE);
    ownership.requireOwner(ADMIN, 'test');

    ownership.transferOwnership(ADMIN, BOB);
    expect(() => ownership.acceptOwnership(ALICE)).to.throw(UnauthorizedError);

    ownership.acceptOwnership(BOB);
    expect(ownership.owner()).to.equal(BOB);
    expect(ownership.pendingOwner()).to.equal(null);
    expect(() => ownership.requireOwner(ADMIN, 'test')).to.throw(UnauthorizedError);
  });

  it('cancels a pending transfer', () => {
    const ownership = new TwoStepOwnership(ADMIN);
    ownership.transferOwnership(ADMIN, ALICE);
    ownership.cancelOwnershipTransfer(ADMIN);

    expect(ownership.current()).to.deep.equal({ status: 'NoPendingTransfer', owner: ADMIN });
    expect(() => ownership.acceptOwnership(ALICE)).to.throw(UnauthorizedError);
  });
});

describe('ParameterStore', () => {
  it('starts from the defaults merged with the initial values', () => {
    const store = new ParameterStore(ADMIN, { mintFeeBps: 10n });
    expect(store.current()).to.deep.equal({ ...DEFAULT_PARAMETERS, mintFeeBps: 10n });
    expect(store.get('redeemFeeBps')).to.equal(50n);
  });

  it('validates initial values', () => {
    expect(() => new ParameterStore(ADMIN, { redeemFeeBps: 5000n })).to.throw(InvalidParameterError);
  });

  it('accepts owner writes within bounds', () => {
    const store = new ParameterStore(ADMIN);
    store.setParameter(ADMIN, 'bondFloorPrice', (WAD * 9n) / 10n);
    store.setParameter(ADMIN, 'deviationToleranceBps', 250n);

    expect(store.get('bondFloorPrice')).to.equal(900_000_000_000_000_000n);
    expect(store.get('deviationToleranceBps')).to.equal(250n);
  });

  it('rejects non-owners and out-of-range values', () => {
    const store = new ParameterStore(ADMIN);

    expect(() => store.setParameter(ALICE, 'mintFeeBps', 10n)).to.throw(UnauthorizedError);
    expect(() => store.setParameter(ADMIN, 'mintFeeBps', 1001n)).to.throw(InvalidParameterError, 'Invalid parameter mintFeeBps: 1001 outside [0, 1000]');
    expect(() => store.setParameter(ADMIN, 'deviationToleranceBps', 0n)).to.throw(InvalidParameterError);
    expect(() => store.setParameter(ADMIN, 'bondFloorPrice', WAD / 20n)).to.throw(InvalidParameterError);

    store.setParameter(ADMIN, 'bondFloorPrice', 0n);
    expect(store.get('bondFloorPrice')).to.equal(0n);
  });

  it('applies a batch all or nothing', () => {
    const store = new ParameterStore(ADMIN);
    const before = store.current();

    expect(() => store.setParameters(ADMIN, { mintFeeBps: 20n, redeemFeeBps: 20_000n })).to.throw(InvalidParameterError);
    expect(store.current()).to.equal(before);

    store.setParameters(ADMIN, { mintFeeBps: 20n, redeemFeeBps: 30n });
    expect(store.get('mintFeeBps')).to.equal(20n);
    expect(store.get('redeemFeeBps')).to.equal(30n);
    expect(Object.isFrozen(store.current())).to.equal(true);
  });

  it('follows an ownership transfer', () => {
    const store = new ParameterStore(ADMIN);
    store.ownership.transferOwnership(ADMIN, ALICE);
    store.ownership.acceptOwnership(ALICE);

    store.setParameter(ALICE, 'maxBondRate', 1000n);
    expect(store.get('maxBondRate')).to.equal(1000n);
    expect(() => store.setParameter(ADMIN, 'maxBondRate', 100n)).to.throw(UnauthorizedError);
  });
});

describe('UnitOfAccountIndex', () => {
  function setup(options: { basePce?: bigint } = {}) {
    const clock = new ManualClock();
    const pce = new ManualPriceFeed('PCE', { value: wad(120), asOf: clock.now() });
    const index = new UnitOfAccountIndex(ADMIN, pce, clock, options);
    return { clock, pce, index };
  }

  it('starts at one dollar', () => {
    const { clock, index } = setup();
    expect(index.latestPrice()).to.deep.equal({ value: WAD, asOf: clock.now() });
    expect(index.latestUpdate()).to.equal(null);
  });

  it('scales the initial value by PCE growth since the base reading', () => {
    const { clock, pce, index } = setup();

    expect(index.update(ADMIN)).to.deep.equal({ timestamp: clock.now(), value: WAD, pceIndex: wad(120) });

    clock.advance(86_400);
    pce.set(wad(123), clock.now());
    index.update(ADMIN);

    expect(index.latestPrice()).to.deep.equal({ value: 1_025_000_000_000_000_000n, asOf: clock.now() });
    expect(index.updateHistory()).to.have.length(2);
    expect(index.latestUpdate()?.pceIndex).to.equal(wad(123));
  });

  it('uses a configured base level', () => {
    const { index } = setup({ basePce: wad(100) });
    expect(index.update(ADMIN).value).to.equal(1_200_000_000_000_000_000n);
  });

  it('restricts updates to the owner and enabled whitelisted updaters', () => {
    const { index } = setup();

    expect(() => index.update(ALICE)).to.throw(UnauthorizedError);
    index.setUpdater(ADMIN, ALICE, true);
    expect(index.canUpdate(ALICE)).to.equal(false);

    index.setWhitelistEnabled(ADMIN, true);
    expect(index.update(ALICE).value).to.equal(WAD);

    index.setUpdater(ADMIN, ALICE, false);
    expect(() => index.update(ALICE)).to.throw(UnauthorizedError);
    expect(() => index.setWhitelistEnabled(ALICE, false)).to.throw(UnauthorizedError);
  });

  it('fails without a PCE reading', () => {
    const { pce, index } = setup();
    pce.clear();
    expect(() => index.update(ADMIN)).to.throw(PriceUnavailableError);
  });
});
