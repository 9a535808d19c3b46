import pino from 'pino';
import type { Logger } from 'pino';
import type { Address } from 'viem';

import { WEEK } from '@veledger/sdk';

import type { AssetMover } from '../src/collaborators/asset-mover.js';
import type { ContractOriginChecker } from '../src/collaborators/wallet-checker.js';
import { ManualClock } from '../src/ledger/clock.js';
import type { LedgerStore } from '../src/ledger/store.js';
import { VotingEscrow } from '../src/ledger/voting-escrow.js';
import { MemoryLedgerStore } from '../src/storage/memory-store.js';
import { Metrics } from '../src/telemetry/metrics.js';

export const ALICE: Address = '0x1111111111111111111111111111111111111111';
export const BOB: Address = '0x2222222222222222222222222222222222222222';
export const CAROL: Address = '0x3333333333333333333333333333333333333333';
export const CONTRACT: Address = '0x4444444444444444444444444444444444444444';

// A week boundary in 2023.
export const T0 = 2800n * WEEK;
export const GENESIS_MARKER = 100n;

export function silentLogger() {
  return pino({ level: 'silent' });
}

export type Move = { direction: 'in' | 'out'; account: Address; amount: bigint };

/** Records every move; optionally fails or waits on a gate the test opens. */
export class RecordingAssetMover implements AssetMover {
  readonly moves: Move[] = [];
  failWith?: Error;
  gated = false;
  private readonly gates: Array<() => void> = [];

  async moveIn(from: Address, amount: bigint): Promise<void> {
    await this.record({ direction: 'in', account: from, amount });
  }

  async moveOut(to: Address, amount: bigint): Promise<void> {
    await this.record({ direction: 'out', account: to, amount });
  }

  get pending(): number {
    return this.gates.length;
  }

  release(): void {
    const open = this.gates.shift();
    if (!open) throw new Error('RecordingAssetMover: nothing to release');
    open();
  }

  private async record(move: Move): Promise<void> {
    this.moves.push(move);
    if (this.gated) await new Promise<void>((resolve) => this.gates.push(resolve));
    if (this.failWith) throw this.failWith;
  }
}

export async function makeEscrow(
  opts: { store?: LedgerStore; clock?: ManualClock; walletChecker?: ContractOriginChecker; logger?: Logger } = {},
) {
  const store = opts.store ?? new MemoryLedgerStore();
  const clock = opts.clock ?? new ManualClock(T0, GENESIS_MARKER);
  const assets = new RecordingAssetMover();
  const metrics = new Metrics();
  const escrow = await VotingEscrow.create({
    store,
    clock,
    assets,
    walletChecker: opts.walletChecker,
    logger: opts.logger ?? silentLogger(),
    metrics,
  });
  return { escrow, store, clock, assets, metrics };
}

/** Lets pending promise callbacks run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
