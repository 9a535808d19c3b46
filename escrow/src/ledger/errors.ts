import type { Address } from 'viem';

export class EscrowError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ZeroAmount extends EscrowError {
  constructor() {
    super('Must lock a non-zero amount');
  }
}

export class LockAlreadyExists extends EscrowError {
  constructor(account: Address) {
    super(`Withdraw old tokens first (${account} already has a lock)`);
  }
}

export class NoLockFound extends EscrowError {
  constructor(account: Address) {
    super(`No existing lock found for ${account}`);
  }
}

export class LockExpired extends EscrowError {
  constructor(account: Address) {
    super(`Lock of ${account} has expired; withdraw it first`);
  }
}

export class LockNotExpired extends EscrowError {
  constructor(account: Address, end: bigint) {
    super(`Lock of ${account} does not expire until ${end}`);
  }
}

export class UnlockTimeInPast extends EscrowError {
  constructor(unlockTime: bigint, now: bigint) {
    super(`Can only lock until a time in the future (unlock ${unlockTime} <= now ${now})`);
  }
}

export class UnlockTimeTooFar extends EscrowError {
  constructor(unlockTime: bigint, limit: bigint) {
    super(`Unlock time ${unlockTime} exceeds the maximum lock duration (limit ${limit})`);
  }
}

export class UnlockTimeNotExtended extends EscrowError {
  constructor(unlockTime: bigint, end: bigint) {
    super(`Can only increase lock duration (unlock ${unlockTime} <= current end ${end})`);
  }
}

export class ContractCallerNotAllowed extends EscrowError {
  constructor(account: Address) {
    super(`Smart contract depositors not allowed: ${account}`);
  }
}

export class FutureMarker extends EscrowError {
  constructor(marker: bigint, current: bigint) {
    super(`Must pass a marker in the past (${marker} > current ${current})`);
  }
}

export class ClockRegression extends EscrowError {
  constructor(field: 'ts' | 'blk', last: bigint, now: bigint) {
    super(`Clock went backwards: ${field} ${now} < last recorded ${last}`);
  }
}

export class SweepLimitExceeded extends EscrowError {
  constructor(weeks: bigint, limit: number) {
    super(`Checkpoint sweep would cross ${weeks} weeks (limit ${limit})`);
  }
}

export class ValueOutOfRange extends EscrowError {
  constructor(field: string, value: bigint) {
    super(`${field} out of range: ${value}`);
  }
}

export class LedgerBusy extends EscrowError {
  constructor(where: string) {
    super(`Ledger is locked by another writer (${where}); retry once it finishes`);
  }
}

export class AssetMoveFailed extends EscrowError {
  constructor(direction: 'in' | 'out', account: Address, amount: bigint, cause: unknown) {
    const msg = cause instanceof Error ? cause.message : String(cause);
    super(`Asset move ${direction} for ${account} (${amount}) failed: ${msg}`, { cause });
  }
}

export class LedgerCommitFailed extends EscrowError {
  public readonly reversed: boolean;

  constructor(reversed: boolean, cause: unknown) {
    const msg = cause instanceof Error ? cause.message : String(cause);
    super(`Ledger commit failed after moving tokens (${reversed ? 'transfer reversed' : 'transfer NOT reversed'}): ${msg}`, {
      cause,
    });
    this.reversed = reversed;
  }
}
