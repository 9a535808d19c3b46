import { EventEmitter } from 'node:events';

import pino from 'pino';
import type { Logger } from 'pino';

import type { Address } from 'viem';
import { getAddress } from 'viem';

import type {
  DepositEvent,
  EscrowTokenMetadata,
  LockedBalance,
  Point,
  SupplyEvent,
  WithdrawEvent,
} from '@veledger/sdk';
import {
  ArithmeticOverflow,
  DepositKind,
  EMPTY_LOCK,
  LockState,
  MAXTIME,
  ZERO_POINT,
  assertAmount,
  assertU256,
  assertU64,
  floorToWeek,
} from '@veledger/sdk';

import type { AssetMover } from '../collaborators/asset-mover.js';
import type { ContractOriginChecker } from '../collaborators/wallet-checker.js';
import { Metrics } from '../telemetry/metrics.js';
import type { Instant } from './checkpoint.js';
import { computeCheckpoint } from './checkpoint.js';
import type { LedgerClock } from './clock.js';
import {
  AssetMoveFailed,
  ContractCallerNotAllowed,
  EscrowError,
  LedgerCommitFailed,
  LockAlreadyExists,
  LockExpired,
  LockNotExpired,
  NoLockFound,
  UnlockTimeInPast,
  UnlockTimeNotExtended,
  UnlockTimeTooFar,
  ValueOutOfRange,
  ZeroAmount,
} from './errors.js';
import { Mutex } from './mutex.js';
import { powerAt, powerAtMarker, totalPowerAt, totalPowerAtMarker } from './query.js';
import type { LedgerStore, WriteSet } from './store.js';

/**
 * Who is calling. `origin` is the externally owned account that started the
 * call; when it differs from `sender`, the sender is a contract.
 */
export type OperationContext = { sender: Address; origin?: Address };

export type VotingEscrowEventMap = {
  Deposit: DepositEvent;
  Withdraw: WithdrawEvent;
  Supply: SupplyEvent;
};

export type VotingEscrowOptions = {
  store: LedgerStore;
  clock: LedgerClock;
  assets: AssetMover;
  walletChecker?: ContractOriginChecker;
  metadata?: Partial<EscrowTokenMetadata>;
  logger?: Logger;
  metrics?: Metrics;
};

const DEFAULT_METADATA: EscrowTokenMetadata = {
  name: 'Vote-escrowed token',
  symbol: 'veTOKEN',
  decimals: 18,
  version: 've-1.0.0',
};

type AssetMove = { direction: 'in' | 'out'; account: Address; amount: bigint };

// Out-of-range caller input is a rejection like any other, not an arithmetic fault.
function requireInRange(check: (v: bigint, field: string) => bigint, value: bigint, field: string): bigint {
  try {
    return check(value, field);
  } catch (err) {
    if (err instanceof ArithmeticOverflow) throw new ValueOutOfRange(field, value);
    throw err;
  }
}

type PendingDeposit = {
  account: Address;
  payer: Address;
  value: bigint;
  unlockTime: bigint;
  locked: LockedBalance;
  kind: DepositKind;
  now: Instant;
};

export class VotingEscrow {
  public readonly metadata: EscrowTokenMetadata;
  public readonly metrics: Metrics;

  private readonly store: LedgerStore;
  private readonly clock: LedgerClock;
  private readonly assets: AssetMover;
  private readonly walletChecker?: ContractOriginChecker;
  private readonly logger: Logger;

  private readonly mutex = new Mutex();
  private readonly emitter = new EventEmitter();

  private constructor(opts: VotingEscrowOptions) {
    this.store = opts.store;
    this.clock = opts.clock;
    this.assets = opts.assets;
    this.walletChecker = opts.walletChecker;
    this.metadata = { ...DEFAULT_METADATA, ...opts.metadata };
    this.logger = opts.logger ?? pino({ level: 'info' });
    this.metrics = opts.metrics ?? new Metrics();
  }

  /** Opens a ledger over `store`, seeding epoch 0 at the current instant if the store is empty. */
  static async create(opts: VotingEscrowOptions): Promise<VotingEscrow> {
    const escrow = new VotingEscrow(opts);
    await escrow.seed();
    return escrow;
  }

  on<K extends keyof VotingEscrowEventMap>(event: K, handler: (e: VotingEscrowEventMap[K]) => void): () => void {
    this.emitter.on(event, handler);
    return () => this.emitter.off(event, handler);
  }

  // ─── Lifecycle operations ───────────────────────────────────────────────

  async createLock(ctx: OperationContext, value: bigint, unlockTime: bigint): Promise<void> {
    await this.exclusive('create_lock', async () => {
      const sender = getAddress(ctx.sender);
      await this.assertNotContract(ctx);
      const now = await this.now();

      requireInRange(assertAmount, value, 'value');
      const rounded = floorToWeek(requireInRange(assertU64, unlockTime, 'unlockTime'));
      const locked = this.store.locked(sender);

      if (value === 0n) throw new ZeroAmount();
      if (locked.amount !== 0n) throw new LockAlreadyExists(sender);
      if (rounded <= now.ts) throw new UnlockTimeInPast(rounded, now.ts);
      if (rounded > now.ts + MAXTIME) throw new UnlockTimeTooFar(rounded, now.ts + MAXTIME);

      await this.deposit({
        account: sender,
        payer: sender,
        value,
        unlockTime: rounded,
        locked,
        kind: DepositKind.CREATE_LOCK,
        now,
      });
    });
  }

  async increaseAmount(ctx: OperationContext, value: bigint): Promise<void> {
    await this.exclusive('increase_amount', async () => {
      const sender = getAddress(ctx.sender);
      await this.assertNotContract(ctx);
      const now = await this.now();

      requireInRange(assertAmount, value, 'value');
      const locked = this.store.locked(sender);

      if (value === 0n) throw new ZeroAmount();
      if (locked.amount === 0n) throw new NoLockFound(sender);
      if (locked.end <= now.ts) throw new LockExpired(sender);

      await this.deposit({
        account: sender,
        payer: sender,
        value,
        unlockTime: 0n,
        locked,
        kind: DepositKind.INCREASE_LOCK_AMOUNT,
        now,
      });
    });
  }

  async increaseUnlockTime(ctx: OperationContext, unlockTime: bigint): Promise<void> {
    await this.exclusive('increase_unlock_time', async () => {
      const sender = getAddress(ctx.sender);
      await this.assertNotContract(ctx);
      const now = await this.now();

      const rounded = floorToWeek(requireInRange(assertU64, unlockTime, 'unlockTime'));
      const locked = this.store.locked(sender);

      if (locked.amount === 0n) throw new NoLockFound(sender);
      if (locked.end <= now.ts) throw new LockExpired(sender);
      if (rounded <= locked.end) throw new UnlockTimeNotExtended(rounded, locked.end);
      if (rounded > now.ts + MAXTIME) throw new UnlockTimeTooFar(rounded, now.ts + MAXTIME);

      await this.deposit({
        account: sender,
        payer: sender,
        value: 0n,
        unlockTime: rounded,
        locked,
        kind: DepositKind.INCREASE_UNLOCK_TIME,
        now,
      });
    });
  }

  /** Tops up someone else's active lock. Open to any caller; the sender pays. */
  async depositFor(ctx: OperationContext, account: Address, value: bigint): Promise<void> {
    await this.exclusive('deposit_for', async () => {
      const payer = getAddress(ctx.sender);
      const target = getAddress(account);
      const now = await this.now();

      requireInRange(assertAmount, value, 'value');
      const locked = this.store.locked(target);

      if (value === 0n) throw new ZeroAmount();
      if (locked.amount === 0n) throw new NoLockFound(target);
      if (locked.end <= now.ts) throw new LockExpired(target);

      await this.deposit({
        account: target,
        payer,
        value,
        unlockTime: 0n,
        locked,
        kind: DepositKind.DEPOSIT_FOR,
        now,
      });
    });
  }

  async withdraw(ctx: OperationContext): Promise<bigint> {
    return this.exclusive('withdraw', async () => {
      const sender = getAddress(ctx.sender);
      const now = await this.now();
      const locked = this.store.locked(sender);

      if (locked.amount === 0n) throw new NoLockFound(sender);
      if (now.ts < locked.end) throw new LockNotExpired(sender, locked.end);

      const value = locked.amount;
      const newLocked: LockedBalance = { ...EMPTY_LOCK };
      const supplyBefore = this.store.supply();
      const supplyAfter = assertU256(supplyBefore - value, 'supply');

      const writes = computeCheckpoint(this.store, now, { account: sender, oldLocked: locked, newLocked });
      writes.lock = { account: sender, locked: newLocked };
      writes.supply = supplyAfter;

      await this.settle(writes, { direction: 'out', account: sender, amount: value });

      this.logger.info({ account: sender, value: value.toString(), epoch: this.store.epoch().toString() }, 'Lock withdrawn');
      this.emit('Withdraw', { provider: sender, value, ts: now.ts });
      this.emit('Supply', { prevSupply: supplyBefore, supply: supplyAfter });
      return value;
    });
  }

  /** Records global history up to now. Returns the resulting global epoch. */
  async checkpoint(): Promise<bigint> {
    return this.exclusive('checkpoint', async () => {
      const now = await this.now();
      const writes = computeCheckpoint(this.store, now);
      if (writes.points.length > 0) {
        await this.settle(writes);
        this.logger.debug({ points: writes.points.length, ts: now.ts.toString() }, 'Global checkpoint');
      }
      return this.store.epoch();
    });
  }

  // ─── Queries ────────────────────────────────────────────────────────────
  // Powers are CURVE_SCALE fixed point; `toPower` rounds to whole token units.

  async powerOf(account: Address, t?: bigint): Promise<bigint> {
    const at = t ?? (await this.now()).ts;
    return powerAt(this.store, getAddress(account), at);
  }

  async powerOfAt(account: Address, marker: bigint): Promise<bigint> {
    const now = await this.now();
    return powerAtMarker(this.store, getAddress(account), marker, now);
  }

  async totalPower(t?: bigint): Promise<bigint> {
    const at = t ?? (await this.now()).ts;
    return totalPowerAt(this.store, at);
  }

  async totalPowerAt(marker: bigint): Promise<bigint> {
    const now = await this.now();
    return totalPowerAtMarker(this.store, marker, now);
  }

  async lockState(account: Address, t?: bigint): Promise<LockState> {
    const locked = this.locked(account);
    if (locked.amount === 0n) return LockState.NO_LOCK;
    const at = t ?? (await this.now()).ts;
    return locked.end > at ? LockState.ACTIVE : LockState.EXPIRED;
  }

  locked(account: Address): LockedBalance {
    return this.store.locked(getAddress(account));
  }

  lockedEnd(account: Address): bigint {
    return this.locked(account).end;
  }

  supply(): bigint {
    return this.store.supply();
  }

  epoch(): bigint {
    return this.store.epoch();
  }

  pointHistory(epoch: bigint): Point | undefined {
    return this.store.pointHistory(epoch);
  }

  userPointEpoch(account: Address): bigint {
    return this.store.userPointEpoch(getAddress(account));
  }

  userPointHistory(account: Address, userEpoch: bigint): Point | undefined {
    return this.store.userPointHistory(getAddress(account), userEpoch);
  }

  userPointHistoryTs(account: Address, userEpoch: bigint): bigint {
    return this.userPointHistory(account, userEpoch)?.ts ?? 0n;
  }

  /** Slope of the account's latest point, in `CURVE_SCALE` units (equal to its locked amount while active). */
  lastUserSlope(account: Address): bigint {
    const a = getAddress(account);
    return this.store.userPointHistory(a, this.store.userPointEpoch(a))?.slope ?? 0n;
  }

  slopeChange(ts: bigint): bigint {
    return this.store.slopeChange(ts);
  }

  // ─── Internals ──────────────────────────────────────────────────────────

  private async seed(): Promise<void> {
    await this.mutex.runExclusive(() =>
      this.store.withWriteLock(async () => {
        if (this.store.pointHistory(0n) !== undefined) return;
        const now = await this.now();
        this.store.commit({ points: [{ epoch: 0n, point: { ...ZERO_POINT, ts: now.ts, blk: now.blk } }], slopeChanges: [] });
        this.logger.info({ ts: now.ts.toString(), blk: now.blk.toString() }, 'Seeded escrow ledger');
      }),
    );
  }

  private async exclusive<T>(op: string, fn: () => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(async () => {
      try {
        const result = await this.store.withWriteLock(fn);
        this.metrics.inc(`ops.${op}`);
        return result;
      } catch (err) {
        this.metrics.inc('ops.rejected');
        const msg = err instanceof Error ? err.message : String(err);
        if (err instanceof EscrowError && !(err instanceof AssetMoveFailed) && !(err instanceof LedgerCommitFailed)) {
          this.logger.warn({ op, err: msg }, 'Escrow operation rejected');
        } else {
          this.logger.error({ op, err: msg }, 'Escrow operation failed');
        }
        throw err;
      }
    });
  }

  private async now(): Promise<Instant> {
    const now = await this.clock.now();
    assertU64(now.ts, 'clock.ts');
    assertU64(now.blk, 'clock.blk');
    return now;
  }

  private async assertNotContract(ctx: OperationContext): Promise<void> {
    const sender = getAddress(ctx.sender);
    if (ctx.origin === undefined || getAddress(ctx.origin) === sender) return;
    if (this.walletChecker && (await this.walletChecker.isAllowed(sender))) return;
    throw new ContractCallerNotAllowed(sender);
  }

  private async deposit(d: PendingDeposit): Promise<void> {
    const supplyBefore = this.store.supply();
    const supplyAfter = requireInRange(assertU256, supplyBefore + d.value, 'supply');

    const newLocked: LockedBalance = {
      amount: requireInRange(assertAmount, d.locked.amount + d.value, 'locked amount'),
      end: d.unlockTime !== 0n ? d.unlockTime : d.locked.end,
    };

    const writes = computeCheckpoint(this.store, d.now, { account: d.account, oldLocked: d.locked, newLocked });
    writes.lock = { account: d.account, locked: newLocked };
    writes.supply = supplyAfter;

    await this.settle(writes, d.value !== 0n ? { direction: 'in', account: d.payer, amount: d.value } : undefined);

    this.logger.info(
      {
        account: d.account,
        payer: d.payer,
        kind: DepositKind[d.kind],
        value: d.value.toString(),
        end: newLocked.end.toString(),
        epoch: this.store.epoch().toString(),
      },
      'Lock deposit',
    );
    this.emit('Deposit', { provider: d.account, value: d.value, locktime: newLocked.end, kind: d.kind, ts: d.now.ts });
    this.emit('Supply', { prevSupply: supplyBefore, supply: supplyAfter });
  }

  /** Moves tokens, then commits. Runs under the store's write lock, so `writes` is still current. */
  private async settle(writes: WriteSet, move?: AssetMove): Promise<void> {
    if (move) await this.move(move);
    try {
      this.commit(writes);
    } catch (err) {
      if (!move) throw err;
      throw new LedgerCommitFailed(await this.reverse(move, err), err);
    }
  }

  private async move(m: AssetMove): Promise<void> {
    try {
      if (m.direction === 'in') {
        await this.assets.moveIn(m.account, m.amount);
      } else {
        await this.assets.moveOut(m.account, m.amount);
      }
    } catch (err) {
      throw new AssetMoveFailed(m.direction, m.account, m.amount, err);
    }
  }

  private async reverse(m: AssetMove, commitErr: unknown): Promise<boolean> {
    const back: AssetMove = { ...m, direction: m.direction === 'in' ? 'out' : 'in' };
    const fields = {
      account: m.account,
      amount: m.amount.toString(),
      direction: back.direction,
      commitErr: commitErr instanceof Error ? commitErr.message : String(commitErr),
    };
    try {
      await this.move(back);
      this.logger.warn(fields, 'Reversed transfer after failed ledger commit');
      return true;
    } catch (err) {
      this.logger.error({ ...fields, err: err instanceof Error ? err.message : String(err) }, 'Transfer could not be reversed');
      return false;
    }
  }

  private commit(writes: WriteSet): void {
    this.store.commit(writes);
    this.metrics.setGauge('ledger.epoch', this.store.epoch());
    this.metrics.setGauge('ledger.supply', this.store.supply());
  }

  private emit<K extends keyof VotingEscrowEventMap>(event: K, payload: VotingEscrowEventMap[K]): void {
    // State is already committed; a failing watcher must not turn the operation into an error.
    try {
      this.emitter.emit(event, payload);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      this.logger.error({ event, err: msg }, 'Escrow event handler threw');
    }
  }
}
