import path from 'node:path';
import { promises as fs } from 'node:fs';

import Database from 'better-sqlite3';
import type { Address } from 'viem';

import type { LockedBalance, Point } from '@veledger/sdk';
import { EMPTY_LOCK } from '@veledger/sdk';

import { LedgerBusy } from '../ledger/errors.js';
import { Mutex } from '../ledger/mutex.js';
import type { LedgerStore, WriteSet } from '../ledger/store.js';
import { assertAppendOnly } from '../ledger/store.js';

// Integers come back as bigint (defaultSafeIntegers); fixed-point values exceed int64 and live in TEXT.
type PointRow = { bias: string; slope: string; ts: bigint; blk: bigint };
type LockRow = { amount: string; end_ts: bigint };

function rowToPoint(row: PointRow): Point {
  return { bias: BigInt(row.bias), slope: BigInt(row.slope), ts: row.ts, blk: row.blk };
}

function isBusy(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'SQLITE_BUSY';
}

export type EscrowDBOptions = {
  /** How long a writer waits for another process's write lock before giving up. */
  busyTimeoutMs?: number;
};

export class EscrowDB implements LedgerStore {
  public readonly filePath: string;
  private readonly db: Database.Database;
  private readonly commitTx: Database.Transaction<(writes: WriteSet) => void>;
  private readonly writeMutex = new Mutex();

  constructor(filePath: string, opts: EscrowDBOptions = {}) {
    const busyTimeoutMs = opts.busyTimeoutMs ?? 5000;
    if (!Number.isInteger(busyTimeoutMs) || busyTimeoutMs < 0) {
      throw new Error('EscrowDB: busyTimeoutMs must be a non-negative integer');
    }

    this.filePath = filePath;
    this.db = new Database(filePath);
    this.db.defaultSafeIntegers(true);

    this.applyPragmas(busyTimeoutMs);
    this.migrate();

    this.commitTx = this.db.transaction((writes: WriteSet) => this.applyWrites(writes));
  }

  static async open(dataDir: string, opts: EscrowDBOptions = {}): Promise<EscrowDB> {
    await fs.mkdir(dataDir, { recursive: true });
    return new EscrowDB(path.join(dataDir, 'escrow.db'), opts);
  }

  close(): void {
    this.db.close();
  }

  getJournalMode(): string {
    return String(this.db.pragma('journal_mode', { simple: true }));
  }

  private applyPragmas(busyTimeoutMs: number): void {
    // Crash safety + concurrent readers.
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma(`busy_timeout = ${busyTimeoutMs}`);
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS escrow_meta (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS point_history (
        epoch INTEGER PRIMARY KEY,
        bias TEXT NOT NULL,
        slope TEXT NOT NULL,
        ts INTEGER NOT NULL,
        blk INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS user_point_history (
        account TEXT NOT NULL,
        user_epoch INTEGER NOT NULL,
        bias TEXT NOT NULL,
        slope TEXT NOT NULL,
        ts INTEGER NOT NULL,
        blk INTEGER NOT NULL,
        PRIMARY KEY (account, user_epoch)
      );

      CREATE TABLE IF NOT EXISTS locks (
        account TEXT PRIMARY KEY,
        amount TEXT NOT NULL,
        end_ts INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS slope_changes (
        ts INTEGER PRIMARY KEY,
        delta TEXT NOT NULL
      );
    `);
  }

  // ─── escrow_meta ────────────────────────────────────────────────────────

  getMeta(key: string): string | undefined {
    const row = this.db.prepare('SELECT value FROM escrow_meta WHERE key = ?').get(key) as { value: string } | undefined;
    return row?.value;
  }

  setMeta(key: string, value: string): void {
    this.db
      .prepare('INSERT INTO escrow_meta(key, value) VALUES(?, ?) ON CONFLICT(key) DO UPDATE SET value=excluded.value')
      .run(key, value);
  }

  // ─── LedgerReader ───────────────────────────────────────────────────────

  epoch(): bigint {
    const row = this.db.prepare('SELECT MAX(epoch) AS epoch FROM point_history').get() as { epoch: bigint | null };
    return row.epoch ?? 0n;
  }

  pointHistory(epoch: bigint): Point | undefined {
    const row = this.db
      .prepare('SELECT bias, slope, ts, blk FROM point_history WHERE epoch = ?')
      .get(epoch) as PointRow | undefined;
    return row ? rowToPoint(row) : undefined;
  }

  userPointEpoch(account: Address): bigint {
    const row = this.db
      .prepare('SELECT MAX(user_epoch) AS user_epoch FROM user_point_history WHERE account = ?')
      .get(account) as { user_epoch: bigint | null };
    return row.user_epoch ?? 0n;
  }

  userPointHistory(account: Address, userEpoch: bigint): Point | undefined {
    const row = this.db
      .prepare('SELECT bias, slope, ts, blk FROM user_point_history WHERE account = ? AND user_epoch = ?')
      .get(account, userEpoch) as PointRow | undefined;
    return row ? rowToPoint(row) : undefined;
  }

  locked(account: Address): LockedBalance {
    const row = this.db.prepare('SELECT amount, end_ts FROM locks WHERE account = ?').get(account) as LockRow | undefined;
    return row ? { amount: BigInt(row.amount), end: row.end_ts } : { ...EMPTY_LOCK };
  }

  slopeChange(ts: bigint): bigint {
    const row = this.db.prepare('SELECT delta FROM slope_changes WHERE ts = ?').get(ts) as { delta: string } | undefined;
    return row ? BigInt(row.delta) : 0n;
  }

  supply(): bigint {
    const v = this.getMeta('supply');
    return v != null ? BigInt(v) : 0n;
  }

  /** Every account that has ever locked, in first-lock order. */
  listAccounts(): Address[] {
    const rows = this.db.prepare('SELECT account FROM locks ORDER BY rowid ASC').all() as Array<{ account: Address }>;
    return rows.map((r) => r.account);
  }

  // ─── LedgerStore ────────────────────────────────────────────────────────

  /**
   * Holds SQLite's write lock (`BEGIN IMMEDIATE`) while `fn` runs, so a keeper
   * and a CLI command on the same file never interleave. `commit` inside `fn`
   * ends the transaction; anything left open afterwards is rolled back.
   */
  async withWriteLock<T>(fn: () => Promise<T>): Promise<T> {
    return this.writeMutex.runExclusive(async () => {
      try {
        this.db.exec('BEGIN IMMEDIATE');
      } catch (err) {
        if (isBusy(err)) throw new LedgerBusy(this.filePath);
        throw err;
      }
      try {
        return await fn();
      } finally {
        if (this.db.inTransaction) this.db.exec('ROLLBACK');
      }
    });
  }

  commit(writes: WriteSet): void {
    // Nested under withWriteLock this is a savepoint; COMMIT then makes it durable.
    this.commitTx(writes);
    if (this.db.inTransaction) this.db.exec('COMMIT');
  }

  private applyWrites(writes: WriteSet): void {
    assertAppendOnly(this, writes);

    const insertPoint = this.db.prepare('INSERT INTO point_history(epoch, bias, slope, ts, blk) VALUES(?, ?, ?, ?, ?)');
    for (const { epoch, point } of writes.points) {
      insertPoint.run(epoch, point.bias.toString(), point.slope.toString(), point.ts, point.blk);
    }

    if (writes.userPoint) {
      const { account, userEpoch, point } = writes.userPoint;
      this.db
        .prepare('INSERT INTO user_point_history(account, user_epoch, bias, slope, ts, blk) VALUES(?, ?, ?, ?, ?, ?)')
        .run(account, userEpoch, point.bias.toString(), point.slope.toString(), point.ts, point.blk);
    }

    const upsertSlope = this.db.prepare(
      'INSERT INTO slope_changes(ts, delta) VALUES(?, ?) ON CONFLICT(ts) DO UPDATE SET delta = excluded.delta',
    );
    for (const { ts, delta } of writes.slopeChanges) upsertSlope.run(ts, delta.toString());

    if (writes.lock) {
      const { account, locked } = writes.lock;
      this.db
        .prepare(
          `INSERT INTO locks(account, amount, end_ts) VALUES(?, ?, ?)
           ON CONFLICT(account) DO UPDATE SET amount = excluded.amount, end_ts = excluded.end_ts`,
        )
        .run(account, locked.amount.toString(), locked.end);
    }

    if (writes.supply !== undefined) this.setMeta('supply', writes.supply.toString());
  }
}
