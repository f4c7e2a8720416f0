import { expect } from 'chai';
import { InsufficientAllowanceError, InsufficientFundsError, ReentrantCallError } from '../app/src/types';
import { InMemoryTokenLedger } from '../app/src/ledger/in-memory-token-ledger';
import { AtomicScope } from '../app/src/engine/atomic';
import { PositionStore } from '../app/src/engine/position-store';
import { ReentrancyGuard } from '../app/src/engine/reentrancy-guard';
import { ALICE, BOB, ENGINE, wad } from './helpers/fixtures';

describe('InMemoryTokenLedger', () => {
  it('checks allowance before balance on pulls', () => {
    const ledger = new InMemoryTokenLedger('STABLE', 18);
    expect(() => ledger.transferIn(ENGINE, ALICE, ENGINE, wad(1))).to.throw(InsufficientAllowanceError);

    ledger.approve(ALICE, ENGINE, wad(1));
    expect(() => ledger.transferIn(ENGINE, ALICE, ENGINE, wad(1))).to.throw(InsufficientFundsError);

    ledger.mint(ALICE, wad(3));
    ledger.transferIn(ENGINE, ALICE, BOB, wad(1));
    expect(ledger.balanceOf(BOB)).to.equal(wad(1));
    expect(ledger.allowance(ALICE, ENGINE)).to.equal(0n);
  });

  it('tracks supply across mint and burn', () => {
    const ledger = new InMemoryTokenLedger('BOND', 18);
    ledger.mint(ALICE, wad(5));
    ledger.burn(ALICE, wad(2));

    expect(ledger.totalSupply()).to.equal(wad(3));
    expect(() => ledger.burn(BOB, 1n)).to.throw(InsufficientFundsError);
    expect(() => ledger.mint(ALICE, -1n)).to.throw(RangeError);
  });

  it('calls the transfer hook after each move', () => {
    const ledger = new InMemoryTokenLedger('WBTC', 8);
    const moves: Array<[string | null, string | null, bigint]> = [];
    ledger.setTransferHook((from, to, amount) => moves.push([from, to, amount]));

    ledger.mint(ALICE, 10n);
    ledger.transferOut(ALICE, BOB, 4n);
    ledger.burn(BOB, 1n);

    expect(moves).to.deep.equal([
      [null, ALICE, 10n],
      [ALICE, BOB, 4n],
      [BOB, null, 1n],
    ]);
  });
});

describe('AtomicScope', () => {
  it('restores every participant when the request throws', () => {
    const ledger = new InMemoryTokenLedger('STABLE', 18);
    const store = new PositionStore();
    ledger.mint(ALICE, wad(10));
    const scope = new AtomicScope([store, ledger, { notCheckpointable: true }]);

    expect(() =>
      scope.run(() => {
        ledger.transferOut(ALICE, BOB, wad(4));
        store.apply({ reserveUnits: 5n, stableSupply: wad(4) });
        throw new Error('abort');
      })
    ).to.throw('abort');

    expect(ledger.balanceOf(ALICE)).to.equal(wad(10));
    expect(ledger.balanceOf(BOB)).to.equal(0n);
    expect(store.current()).to.deep.equal({ totalReserveUnits: 0n, totalStableSupplyTracked: 0n });
  });

  it('keeps the effects of a request that completes', () => {
    const store = new PositionStore();
    const result = new AtomicScope([store]).run(() => store.apply({ reserveUnits: 5n, stableSupply: 7n }));
    expect(result).to.deep.equal({ totalReserveUnits: 5n, totalStableSupplyTracked: 7n });
  });

  it('never lets the position go negative', () => {
    expect(() => new PositionStore().apply({ reserveUnits: -1n, stableSupply: 0n })).to.throw(RangeError);
  });
});

describe('ReentrancyGuard', () => {
  it('holds the lock only for the duration of the call', () => {
    const guard = new ReentrancyGuard();
    let inside = false;

    guard.enter('outer', () => {
      inside = guard.isEntered();
      expect(() => guard.enter('inner', () => 0)).to.throw(ReentrantCallError, 'Reentrant call into inner');
    });

    expect(inside).to.equal(true);
    expect(guard.isEntered()).to.equal(false);
    expect(() => guard.enter('failing', () => {
      throw new Error('boom');
    })).to.throw('boom');
    expect(guard.isEntered()).to.equal(false);
  });
});
