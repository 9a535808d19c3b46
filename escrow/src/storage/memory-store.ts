import type { Address } from 'viem';

import type { LockedBalance, Point } from '@veledger/sdk';
import { EMPTY_LOCK } from '@veledger/sdk';

import { Mutex } from '../ledger/mutex.js';
import type { LedgerStore, WriteSet } from '../ledger/store.js';
import { assertAppendOnly } from '../ledger/store.js';

function copyPoint(p: Point): Point {
  return { bias: p.bias, slope: p.slope, ts: p.ts, blk: p.blk };
}

export class MemoryLedgerStore implements LedgerStore {
  private readonly points: Point[] = [];
  // Index 0 of each account history is the implicit zero point and is never stored.
  private readonly userPoints = new Map<Address, Point[]>();
  private readonly locks = new Map<Address, LockedBalance>();
  private readonly slopeChanges = new Map<bigint, bigint>();
  private _supply = 0n;
  private readonly writeMutex = new Mutex();

  epoch(): bigint {
    return this.points.length === 0 ? 0n : BigInt(this.points.length - 1);
  }

  pointHistory(epoch: bigint): Point | undefined {
    const p = this.points[Number(epoch)];
    return p ? copyPoint(p) : undefined;
  }

  userPointEpoch(account: Address): bigint {
    return BigInt(this.userPoints.get(account)?.length ?? 0);
  }

  userPointHistory(account: Address, userEpoch: bigint): Point | undefined {
    if (userEpoch <= 0n) return undefined;
    const p = this.userPoints.get(account)?.[Number(userEpoch) - 1];
    return p ? copyPoint(p) : undefined;
  }

  locked(account: Address): LockedBalance {
    const l = this.locks.get(account);
    return l ? { amount: l.amount, end: l.end } : { ...EMPTY_LOCK };
  }

  slopeChange(ts: bigint): bigint {
    return this.slopeChanges.get(ts) ?? 0n;
  }

  supply(): bigint {
    return this._supply;
  }

  withWriteLock<T>(fn: () => Promise<T>): Promise<T> {
    return this.writeMutex.runExclusive(fn);
  }

  commit(writes: WriteSet): void {
    assertAppendOnly(this, writes);

    for (const { point } of writes.points) this.points.push(copyPoint(point));

    if (writes.userPoint) {
      const { account, point } = writes.userPoint;
      const history = this.userPoints.get(account) ?? [];
      history.push(copyPoint(point));
      this.userPoints.set(account, history);
    }

    for (const { ts, delta } of writes.slopeChanges) this.slopeChanges.set(ts, delta);

    if (writes.lock) {
      const { account, locked } = writes.lock;
      this.locks.set(account, { amount: locked.amount, end: locked.end });
    }

    if (writes.supply !== undefined) this._supply = writes.supply;
  }
}
