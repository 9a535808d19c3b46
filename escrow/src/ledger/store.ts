import type { Address } from 'viem';

import type { LockedBalance, Point } from '@veledger/sdk';

/** Read side of the ledger state. Every method is synchronous and side-effect free. */
export interface LedgerReader {
  epoch(): bigint;
  pointHistory(epoch: bigint): Point | undefined;
  userPointEpoch(account: Address): bigint;
  userPointHistory(account: Address, userEpoch: bigint): Point | undefined;
  locked(account: Address): LockedBalance;
  slopeChange(ts: bigint): bigint;
  supply(): bigint;
}

export type PointWrite = { epoch: bigint; point: Point };
export type UserPointWrite = { account: Address; userEpoch: bigint; point: Point };
export type SlopeChangeWrite = { ts: bigint; delta: bigint };
export type LockWrite = { account: Address; locked: LockedBalance };

/** Everything one operation changes. Applied all-or-nothing by `LedgerStore.commit`. */
export type WriteSet = {
  points: PointWrite[];
  userPoint?: UserPointWrite;
  slopeChanges: SlopeChangeWrite[];
  lock?: LockWrite;
  supply?: bigint;
};

export interface LedgerStore extends LedgerReader {
  commit(writes: WriteSet): void;

  /**
   * Runs `fn` as the only writer of the underlying ledger, across every handle
   * open on it. Reads made inside `fn` cannot go stale before its `commit`.
   */
  withWriteLock<T>(fn: () => Promise<T>): Promise<T>;
}

// Histories are append-only: a write set may only extend them contiguously.
export function assertAppendOnly(reader: LedgerReader, writes: WriteSet): void {
  const hasGenesis = reader.pointHistory(0n) !== undefined;
  let expected = hasGenesis ? reader.epoch() + 1n : 0n;
  for (const { epoch } of writes.points) {
    if (epoch !== expected) throw new Error(`LedgerStore: expected point for epoch ${expected}, got ${epoch}`);
    expected += 1n;
  }

  if (writes.userPoint) {
    const { account, userEpoch } = writes.userPoint;
    const next = reader.userPointEpoch(account) + 1n;
    if (userEpoch !== next) {
      throw new Error(`LedgerStore: expected user epoch ${next} for ${account}, got ${userEpoch}`);
    }
  }
}
