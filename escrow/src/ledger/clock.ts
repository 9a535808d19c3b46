import type { PublicClient } from 'viem';

import type { Instant } from './checkpoint.js';

export interface LedgerClock {
  now(): Instant | Promise<Instant>;
}

/** Clock driven by the caller. Used by tests and offline replays. */
export class ManualClock implements LedgerClock {
  private ts: bigint;
  private blk: bigint;

  constructor(ts: bigint, blk: bigint = 0n) {
    this.ts = ts;
    this.blk = blk;
  }

  now(): Instant {
    return { ts: this.ts, blk: this.blk };
  }

  set(ts: bigint, blk: bigint = this.blk): void {
    this.ts = ts;
    this.blk = blk;
  }

  advance(seconds: bigint, blocks: bigint = 1n): Instant {
    this.ts += seconds;
    this.blk += blocks;
    return this.now();
  }
}

/** Wall clock; the sequence marker is unix milliseconds. */
export class SystemClock implements LedgerClock {
  now(): Instant {
    const ms = Date.now();
    return { ts: BigInt(Math.floor(ms / 1000)), blk: BigInt(ms) };
  }
}

/** Latest block of a chain: timestamp as time, block number as marker. */
export class ChainClock implements LedgerClock {
  private readonly client: PublicClient;

  constructor(client: PublicClient) {
    this.client = client;
  }

  async now(): Promise<Instant> {
    const block = await this.client.getBlock({ blockTag: 'latest' });
    return { ts: block.timestamp, blk: block.number };
  }
}
