import { describe, expect, it } from 'vitest';

import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';

import type { LedgerStore } from '../src/ledger/store.js';
import { VotingEscrow } from '../src/ledger/voting-escrow.js';
import { ManualClock } from '../src/ledger/clock.js';
import { EscrowDB } from '../src/storage/db.js';
import { MemoryLedgerStore } from '../src/storage/memory-store.js';
import { ALICE, BOB, RecordingAssetMover, T0, silentLogger } from './helpers.js';

const GENESIS = { bias: 0n, slope: 0n, ts: T0, blk: 1n };

const stores: Array<[string, () => LedgerStore]> = [
  ['MemoryLedgerStore', () => new MemoryLedgerStore()],
  ['EscrowDB', () => new EscrowDB(':memory:')],
];

describe.each(stores)('%s', (_name, makeStore) => {
  it('starts empty', () => {
    const store = makeStore();

    expect(store.epoch()).toBe(0n);
    expect(store.pointHistory(0n)).toBeUndefined();
    expect(store.userPointEpoch(ALICE)).toBe(0n);
    expect(store.userPointHistory(ALICE, 0n)).toBeUndefined();
    expect(store.locked(ALICE)).toEqual({ amount: 0n, end: 0n });
    expect(store.slopeChange(T0)).toBe(0n);
    expect(store.supply()).toBe(0n);
  });

  it('applies a write set and reads it back', () => {
    const store = makeStore();
    const big = -(2n ** 200n);

    store.commit({ points: [{ epoch: 0n, point: GENESIS }], slopeChanges: [] });
    store.commit({
      points: [
        { epoch: 1n, point: { bias: 2n ** 190n, slope: 2n ** 120n, ts: T0 + 1n, blk: 2n } },
        { epoch: 2n, point: { bias: 5n, slope: 1n, ts: T0 + 2n, blk: 3n } },
      ],
      userPoint: { account: ALICE, userEpoch: 1n, point: { bias: 5n, slope: 1n, ts: T0 + 2n, blk: 3n } },
      slopeChanges: [{ ts: T0 + 604_800n, delta: big }],
      lock: { account: ALICE, locked: { amount: 2n ** 126n, end: T0 + 604_800n } },
      supply: 2n ** 126n,
    });

    expect(store.epoch()).toBe(2n);
    expect(store.pointHistory(0n)).toEqual(GENESIS);
    expect(store.pointHistory(1n)).toEqual({ bias: 2n ** 190n, slope: 2n ** 120n, ts: T0 + 1n, blk: 2n });
    expect(store.userPointEpoch(ALICE)).toBe(1n);
    expect(store.userPointEpoch(BOB)).toBe(0n);
    expect(store.userPointHistory(ALICE, 1n)).toEqual({ bias: 5n, slope: 1n, ts: T0 + 2n, blk: 3n });
    expect(store.slopeChange(T0 + 604_800n)).toBe(big);
    expect(store.locked(ALICE)).toEqual({ amount: 2n ** 126n, end: T0 + 604_800n });
    expect(store.supply()).toBe(2n ** 126n);

    store.commit({ points: [], slopeChanges: [{ ts: T0 + 604_800n, delta: 0n }], lock: { account: ALICE, locked: { amount: 0n, end: 0n } } });
    expect(store.slopeChange(T0 + 604_800n)).toBe(0n);
    expect(store.locked(ALICE)).toEqual({ amount: 0n, end: 0n });
  });

  it('rejects gaps in the histories and writes nothing', () => {
    const store = makeStore();
    store.commit({ points: [{ epoch: 0n, point: GENESIS }], slopeChanges: [] });

    expect(() =>
      store.commit({
        points: [{ epoch: 2n, point: GENESIS }],
        slopeChanges: [{ ts: T0, delta: -1n }],
        supply: 9n,
      }),
    ).toThrow('LedgerStore: expected point for epoch 1, got 2');

    expect(() =>
      store.commit({
        points: [{ epoch: 1n, point: GENESIS }],
        userPoint: { account: ALICE, userEpoch: 2n, point: GENESIS },
        slopeChanges: [],
      }),
    ).toThrow(`LedgerStore: expected user epoch 1 for ${ALICE}, got 2`);

    expect(store.epoch()).toBe(0n);
    expect(store.slopeChange(T0)).toBe(0n);
    expect(store.supply()).toBe(0n);
  });

  it('hands out copies', () => {
    const store = makeStore();
    store.commit({ points: [{ epoch: 0n, point: GENESIS }], slopeChanges: [] });

    const p = store.pointHistory(0n);
    if (p) p.bias = 99n;
    expect(store.pointHistory(0n)?.bias).toBe(0n);
  });
});

describe('EscrowDB on disk', () => {
  it('enables WAL and keeps the ledger across reopen', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'veledger-db-'));
    const clock = new ManualClock(T0, 1n);
    const end = T0 + 10n * 604_800n;

    const db = await EscrowDB.open(dir);
    expect(db.getJournalMode().toLowerCase()).toContain('wal');

    const escrow = await VotingEscrow.create({ store: db, clock, assets: new RecordingAssetMover(), logger: silentLogger() });
    await escrow.createLock({ sender: ALICE }, 1000n, end);
    db.setMeta('note', 'kept');
    db.close();

    clock.set(T0 + 604_800n, 2n);
    const reopened = await EscrowDB.open(dir);
    const again = await VotingEscrow.create({ store: reopened, clock, assets: new RecordingAssetMover(), logger: silentLogger() });

    expect(again.epoch()).toBe(1n);
    expect(again.pointHistory(0n)).toEqual({ bias: 0n, slope: 0n, ts: T0, blk: 1n });
    expect(again.locked(ALICE)).toEqual({ amount: 1000n, end });
    expect(again.supply()).toBe(1000n);
    expect(await again.powerOf(ALICE, T0)).toBe(1000n * 10n * 604_800n);
    expect(reopened.listAccounts()).toEqual([ALICE]);
    expect(reopened.getMeta('note')).toBe('kept');
    reopened.close();
  });
});
