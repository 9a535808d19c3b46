import type { Logger } from 'pino';

import { WeekClock } from '@veledger/sdk';

import type { LedgerClock } from '../ledger/clock.js';
import type { VotingEscrow } from '../ledger/voting-escrow.js';
import type { Metrics } from '../telemetry/metrics.js';

const MIN_DELAY_MS = 250;

export type CheckpointKeeperArgs = {
  escrow: Pick<VotingEscrow, 'checkpoint'>;
  clock: LedgerClock;
  logger: Logger;
  metrics?: Metrics;
  /** Extra wait after each week boundary before checkpointing. */
  delayMs?: number;
  weekClock?: WeekClock;
};

/**
 * Touches the ledger once per week so the global history never falls far
 * behind. Only global checkpoints; it never moves tokens.
 */
export class CheckpointKeeper {
  private readonly escrow: Pick<VotingEscrow, 'checkpoint'>;
  private readonly clock: LedgerClock;
  private readonly logger: Logger;
  private readonly metrics?: Metrics;
  private readonly delayMs: number;
  private readonly weekClock: WeekClock;

  private timer?: NodeJS.Timeout;
  private running = false;

  constructor(args: CheckpointKeeperArgs) {
    this.escrow = args.escrow;
    this.clock = args.clock;
    this.logger = args.logger;
    this.metrics = args.metrics;
    this.delayMs = args.delayMs ?? 1_000;
    this.weekClock = args.weekClock ?? new WeekClock();

    if (!Number.isInteger(this.delayMs) || this.delayMs < 0) {
      throw new Error('CheckpointKeeper: delayMs must be a non-negative integer');
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    await this.scheduleNext();
    this.logger.info({ delayMs: this.delayMs }, 'Checkpoint keeper started');
  }

  stop(): void {
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = undefined;
  }

  /** One global checkpoint. Returns the resulting epoch. */
  async runOnce(): Promise<bigint> {
    const epoch = await this.escrow.checkpoint();
    this.metrics?.inc('keeper.checkpoints');
    this.logger.info({ epoch: epoch.toString() }, 'Keeper checkpoint');
    return epoch;
  }

  private async scheduleNext(): Promise<void> {
    const now = await this.clock.now();
    const remainingSec = this.weekClock.secondsUntilNextWeek(now.ts);

    // Fire shortly after the boundary.
    const ms = Math.max(MIN_DELAY_MS, Number(remainingSec) * 1000 + this.delayMs);
    if (!this.running) return;
    this.timer = setTimeout(() => void this.tick(), ms);
  }

  private async tick(): Promise<void> {
    if (!this.running) return;

    try {
      await this.runOnce();
    } catch (err) {
      this.metrics?.inc('keeper.failures');
      const msg = err instanceof Error ? err.message : String(err);
      this.logger.error({ err: msg }, 'Keeper checkpoint failed');
    }

    try {
      await this.scheduleNext();
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      this.logger.error({ err: msg }, 'Keeper could not read the clock; stopping');
      this.stop();
    }
  }
}
