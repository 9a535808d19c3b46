import type { LockedBalance, Point } from '../types/structs.js';
import { checkedMul, checkedSub, clampZero } from './checked.js';
import { DAY } from './week.js';

// Longest lock, and the reference duration every lock is normalized to.
export const MAXTIME = 4n * 365n * DAY;

// Fixed-point denominator for bias and slope. With MAXTIME as the scale a
// lock's slope is exactly its amount and no per-second rounding happens.
export const CURVE_SCALE = MAXTIME;

// Fixed point for the marker-per-second estimate used when back-filling points.
export const MULTIPLIER = 10n ** 18n;

export type Curve = { slope: bigint; bias: bigint };

export function lockCurve(locked: LockedBalance, t: bigint): Curve {
  if (locked.amount <= 0n || locked.end <= t) return { slope: 0n, bias: 0n };
  const slope = locked.amount;
  return { slope, bias: checkedMul(slope, locked.end - t) };
}

/** Scaled value of the curve through `p` at time `t`, clamped at zero. */
export function biasAt(p: Point, t: bigint): bigint {
  return clampZero(checkedSub(p.bias, checkedMul(p.slope, t - p.ts)));
}

/** Whole token units of a fixed-point power, rounded down. */
export function toPower(scaledBias: bigint): bigint {
  return clampZero(scaledBias) / CURVE_SCALE;
}

export function clampPoint(p: Point): Point {
  return { bias: clampZero(p.bias), slope: clampZero(p.slope), ts: p.ts, blk: p.blk };
}
