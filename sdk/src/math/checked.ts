export const INT256_MAX = (1n << 255n) - 1n;
export const INT256_MIN = -(1n << 255n);
export const UINT256_MAX = (1n << 256n) - 1n;
export const UINT64_MAX = (1n << 64n) - 1n;

// Largest amount a single lock may hold (int128 max).
export const MAX_LOCK_AMOUNT = (1n << 127n) - 1n;

export class ArithmeticOverflow extends RangeError {
  constructor(op: string) {
    super(`Arithmetic overflow in ${op}`);
    this.name = 'ArithmeticOverflow';
  }
}

function checkInt256(v: bigint, op: string): bigint {
  if (v > INT256_MAX || v < INT256_MIN) throw new ArithmeticOverflow(op);
  return v;
}

export function checkedAdd(a: bigint, b: bigint): bigint {
  return checkInt256(a + b, 'add');
}

export function checkedSub(a: bigint, b: bigint): bigint {
  return checkInt256(a - b, 'sub');
}

export function checkedMul(a: bigint, b: bigint): bigint {
  return checkInt256(a * b, 'mul');
}

// Rounds toward negative infinity.
export function mulDiv(a: bigint, b: bigint, c: bigint): bigint {
  if (c === 0n) throw new Error('mulDiv: division by zero');
  const p = checkedMul(a, b);
  const q = p / c;
  return (p % c !== 0n) && ((p < 0n) !== (c < 0n)) ? q - 1n : q;
}

export function clampZero(v: bigint): bigint {
  return v < 0n ? 0n : v;
}

export function assertU64(v: bigint, field: string): bigint {
  if (v < 0n || v > UINT64_MAX) throw new ArithmeticOverflow(`${field} (u64)`);
  return v;
}

export function assertAmount(v: bigint, field: string): bigint {
  if (v < 0n || v > MAX_LOCK_AMOUNT) throw new ArithmeticOverflow(`${field} (amount)`);
  return v;
}

export function assertU256(v: bigint, field: string): bigint {
  if (v < 0n || v > UINT256_MAX) throw new ArithmeticOverflow(`${field} (u256)`);
  return v;
}

export function fixedToDecimal(value: bigint, scale: bigint, decimals: number): string {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new Error('fixedToDecimal: decimals must be a non-negative integer');
  }
  if (scale <= 0n) throw new Error('fixedToDecimal: scale must be > 0');

  const sign = value < 0n ? '-' : '';
  const abs = value < 0n ? -value : value;

  const integer = abs / scale;
  if (decimals === 0) return `${sign}${integer}`;

  const frac = abs % scale;
  const fracDec = (frac * 10n ** BigInt(decimals)) / scale;
  const fracStr = fracDec.toString().padStart(decimals, '0');

  return `${sign}${integer}.${fracStr}`;
}
