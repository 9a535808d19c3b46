import type { Address } from 'viem';

import type { DepositKind } from './enums.js';

/**
 * One sample of a decay curve. `bias` and `slope` are fixed-point with
 * denominator `CURVE_SCALE`; `blk` is the external sequence marker.
 */
export interface Point {
  bias: bigint;
  slope: bigint;
  ts: bigint;
  blk: bigint;
}

export interface LockedBalance {
  amount: bigint;
  end: bigint;
}

export interface DepositEvent {
  provider: Address;
  value: bigint;
  locktime: bigint;
  kind: DepositKind;
  ts: bigint;
}

export interface WithdrawEvent {
  provider: Address;
  value: bigint;
  ts: bigint;
}

export interface SupplyEvent {
  prevSupply: bigint;
  supply: bigint;
}

export const ZERO_POINT: Readonly<Point> = Object.freeze({ bias: 0n, slope: 0n, ts: 0n, blk: 0n });

export const EMPTY_LOCK: Readonly<LockedBalance> = Object.freeze({ amount: 0n, end: 0n });
