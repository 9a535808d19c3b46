import type { Address } from 'viem';

import type { Curve, LockedBalance, Point } from '@veledger/sdk';
import {
  MULTIPLIER,
  WEEK,
  checkedAdd,
  checkedMul,
  checkedSub,
  clampPoint,
  floorToWeek,
  lockCurve,
  mulDiv,
} from '@veledger/sdk';

import { ClockRegression, SweepLimitExceeded, UnlockTimeInPast } from './errors.js';
import type { LedgerReader, PointWrite, SlopeChangeWrite, UserPointWrite, WriteSet } from './store.js';

// About fifty years of idle weeks; beyond that a checkpoint refuses instead of truncating history.
export const MAX_SWEEP_WEEKS = 2600;

export type Instant = { ts: bigint; blk: bigint };

export type LockChange = {
  account: Address;
  oldLocked: LockedBalance;
  newLocked: LockedBalance;
};

/** Number of week-sized steps needed to sweep a curve recorded at `fromTs` forward to `toTs`. */
export function sweepSteps(fromTs: bigint, toTs: bigint): bigint {
  const span = toTs - floorToWeek(fromTs);
  if (span <= 0n) return 1n;
  return (span + WEEK - 1n) / WEEK;
}

export function assertSweepable(fromTs: bigint, toTs: bigint): void {
  const steps = sweepSteps(fromTs, toTs);
  if (steps > BigInt(MAX_SWEEP_WEEKS)) throw new SweepLimitExceeded(steps, MAX_SWEEP_WEEKS);
}

export function latestPoint(reader: LedgerReader): { epoch: bigint; point: Point } {
  const epoch = reader.epoch();
  const point = reader.pointHistory(epoch);
  if (!point) throw new Error('Ledger store is not initialized (missing genesis point)');
  return { epoch, point };
}

/**
 * Brings the aggregate curve up to `now` and, when `change` is given, folds one
 * account's lock transition into it.
 *
 * Pure: the result is a write set for `LedgerStore.commit`; nothing is written here.
 * A global sync (no `change`) at the timestamp of the latest point returns an
 * empty write set.
 */
export function computeCheckpoint(reader: LedgerReader, now: Instant, change?: LockChange): WriteSet {
  let uOld: Curve = { slope: 0n, bias: 0n };
  let uNew: Curve = { slope: 0n, bias: 0n };
  let oldDslope = 0n;
  let newDslope = 0n;

  if (change) {
    const { oldLocked, newLocked } = change;
    if (newLocked.end !== 0n && newLocked.end < now.ts) throw new UnlockTimeInPast(newLocked.end, now.ts);

    uOld = lockCurve(oldLocked, now.ts);
    uNew = lockCurve(newLocked, now.ts);

    // Read before any schedule write below.
    oldDslope = reader.slopeChange(oldLocked.end);
    if (newLocked.end !== 0n) {
      newDslope = newLocked.end === oldLocked.end ? oldDslope : reader.slopeChange(newLocked.end);
    }
  }

  const latest = latestPoint(reader);
  const initial = latest.point;
  if (now.ts < initial.ts) throw new ClockRegression('ts', initial.ts, now.ts);
  if (now.blk < initial.blk) throw new ClockRegression('blk', initial.blk, now.blk);

  if (!change && now.ts === initial.ts) return { points: [], slopeChanges: [] };

  assertSweepable(initial.ts, now.ts);

  const blockSlope = now.ts > initial.ts ? mulDiv(MULTIPLIER, now.blk - initial.blk, now.ts - initial.ts) : 0n;

  const points: PointWrite[] = [];
  let epoch = latest.epoch;
  let last: Point = { ...initial };
  let lastCheckpoint = initial.ts;
  let t = floorToWeek(lastCheckpoint);

  for (;;) {
    t += WEEK;
    let dSlope = 0n;
    if (t > now.ts) {
      t = now.ts;
    } else {
      dSlope = reader.slopeChange(t);
    }

    last = clampPoint({
      bias: checkedSub(last.bias, checkedMul(last.slope, t - lastCheckpoint)),
      slope: checkedAdd(last.slope, dSlope),
      ts: t,
      blk: initial.blk + mulDiv(blockSlope, t - initial.ts, MULTIPLIER),
    });
    lastCheckpoint = t;
    epoch += 1n;

    if (t === now.ts) {
      last.blk = now.blk;
      break;
    }
    points.push({ epoch, point: { ...last } });
  }

  if (change) {
    last = clampPoint({
      bias: checkedAdd(last.bias, checkedSub(uNew.bias, uOld.bias)),
      slope: checkedAdd(last.slope, checkedSub(uNew.slope, uOld.slope)),
      ts: last.ts,
      blk: last.blk,
    });
  }

  points.push({ epoch, point: last });

  if (!change) return { points, slopeChanges: [] };

  const { account, oldLocked, newLocked } = change;
  const slopeChanges: SlopeChangeWrite[] = [];

  if (oldLocked.end > now.ts) {
    // Cancel the old lock's scheduled drop; with an unchanged end the new drop takes its place.
    oldDslope = checkedAdd(oldDslope, uOld.slope);
    if (newLocked.end === oldLocked.end) oldDslope = checkedSub(oldDslope, uNew.slope);
    slopeChanges.push({ ts: oldLocked.end, delta: oldDslope });
  }

  if (newLocked.end > now.ts && newLocked.end > oldLocked.end) {
    newDslope = checkedSub(newDslope, uNew.slope);
    slopeChanges.push({ ts: newLocked.end, delta: newDslope });
  }

  const userPoint: UserPointWrite = {
    account,
    userEpoch: reader.userPointEpoch(account) + 1n,
    point: { bias: uNew.bias, slope: uNew.slope, ts: now.ts, blk: now.blk },
  };

  return { points, userPoint, slopeChanges };
}
