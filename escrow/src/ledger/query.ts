import type { Address } from 'viem';

import type { Point } from '@veledger/sdk';
import { WEEK, biasAt, checkedAdd, checkedMul, checkedSub, clampPoint, clampZero, floorToWeek, mulDiv } from '@veledger/sdk';

import type { Instant } from './checkpoint.js';
import { assertSweepable, latestPoint } from './checkpoint.js';
import { FutureMarker } from './errors.js';
import type { LedgerReader } from './store.js';

// Powers are returned in CURVE_SCALE fixed point (`toPower` gives whole token
// units). Unrounded values add up: total power is exactly the sum of account powers.

// Enough halvings for any history addressable by a 128-bit counter.
export const MAX_SEARCH_STEPS = 128;

function requirePoint(p: Point | undefined, what: string): Point {
  if (!p) throw new Error(`Ledger history is missing ${what}`);
  return p;
}

/** Largest index in [0, max] whose point marker is <= `marker` (0 when none is). */
function searchByMarker(marker: bigint, max: bigint, pointAt: (i: bigint) => Point | undefined): bigint {
  let lo = 0n;
  let hi = max;
  for (let i = 0; i < MAX_SEARCH_STEPS; i++) {
    if (lo >= hi) break;
    const mid = (lo + hi + 1n) / 2n;
    const p = pointAt(mid);
    if (p && p.blk <= marker) {
      lo = mid;
    } else {
      hi = mid - 1n;
    }
  }
  return lo;
}

export function findEpochByMarker(reader: LedgerReader, marker: bigint, maxEpoch: bigint = reader.epoch()): bigint {
  return searchByMarker(marker, maxEpoch, (e) => reader.pointHistory(e));
}

export function findUserEpochByMarker(reader: LedgerReader, account: Address, marker: bigint): bigint {
  return searchByMarker(marker, reader.userPointEpoch(account), (e) => reader.userPointHistory(account, e));
}

/** Voting power of `account` at time `t`, from its latest recorded point. */
export function powerAt(reader: LedgerReader, account: Address, t: bigint): bigint {
  const userEpoch = reader.userPointEpoch(account);
  if (userEpoch === 0n) return 0n;
  const p = requirePoint(reader.userPointHistory(account, userEpoch), `user point ${userEpoch}`);
  return biasAt(p, t);
}

/**
 * Voting power of `account` as of sequence marker `marker`. The marker is
 * translated to a timestamp by interpolating over the global history around it.
 */
export function powerAtMarker(reader: LedgerReader, account: Address, marker: bigint, now: Instant): bigint {
  if (marker > now.blk) throw new FutureMarker(marker, now.blk);

  if (reader.userPointEpoch(account) === 0n) return 0n;
  const userEpoch = findUserEpochByMarker(reader, account, marker);
  if (userEpoch === 0n) return 0n;
  const upoint = requirePoint(reader.userPointHistory(account, userEpoch), `user point ${userEpoch}`);

  const maxEpoch = reader.epoch();
  const epoch = findEpochByMarker(reader, marker, maxEpoch);
  const p0 = requirePoint(reader.pointHistory(epoch), `point ${epoch}`);

  let dBlk: bigint;
  let dT: bigint;
  if (epoch < maxEpoch) {
    const p1 = requirePoint(reader.pointHistory(epoch + 1n), `point ${epoch + 1n}`);
    dBlk = p1.blk - p0.blk;
    dT = p1.ts - p0.ts;
  } else {
    dBlk = now.blk - p0.blk;
    dT = now.ts - p0.ts;
  }

  let markerTime = p0.ts;
  if (dBlk !== 0n) markerTime += mulDiv(dT, marker - p0.blk, dBlk);

  return biasAt(upoint, markerTime);
}

/**
 * Aggregate power at `t`, sweeping `point` forward week by week and applying
 * scheduled slope changes. Read-only.
 */
export function supplyAt(reader: LedgerReader, point: Point, t: bigint): bigint {
  assertSweepable(point.ts, t);

  let last: Point = { ...point };
  let ti = floorToWeek(last.ts);

  for (;;) {
    ti += WEEK;
    let dSlope = 0n;
    if (ti > t) {
      ti = t;
    } else {
      dSlope = reader.slopeChange(ti);
    }

    const bias = checkedSub(last.bias, checkedMul(last.slope, ti - last.ts));
    if (ti === t) {
      last.bias = bias;
      break;
    }
    last = clampPoint({ bias, slope: checkedAdd(last.slope, dSlope), ts: ti, blk: last.blk });
  }

  return clampZero(last.bias);
}

export function totalPowerAt(reader: LedgerReader, t: bigint): bigint {
  return supplyAt(reader, latestPoint(reader).point, t);
}

export function totalPowerAtMarker(reader: LedgerReader, marker: bigint, now: Instant): bigint {
  if (marker > now.blk) throw new FutureMarker(marker, now.blk);

  const epoch = reader.epoch();
  if (epoch === 0n) return 0n;

  const target = findEpochByMarker(reader, marker, epoch);
  const point = requirePoint(reader.pointHistory(target), `point ${target}`);

  let dt = 0n;
  if (target < epoch) {
    const next = requirePoint(reader.pointHistory(target + 1n), `point ${target + 1n}`);
    if (point.blk !== next.blk) dt = mulDiv(marker - point.blk, next.ts - point.ts, next.blk - point.blk);
  } else if (point.blk !== now.blk) {
    dt = mulDiv(marker - point.blk, now.ts - point.ts, now.blk - point.blk);
  }

  return supplyAt(reader, point, point.ts + dt);
}
