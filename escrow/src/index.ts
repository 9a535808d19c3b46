#!/usr/bin/env node
import { Command } from 'commander';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import type { Address } from 'viem';
import { formatUnits, getAddress, isAddress, parseUnits } from 'viem';

import { CURVE_SCALE, fixedToDecimal, toPower } from '@veledger/sdk';

import { DEFAULT_CONFIG_PATH, STARTER_CONFIG, expandHome, loadEscrowConfig } from './config/config.js';
import type { EscrowRuntime } from './runtime.js';
import { createEscrowRuntime } from './runtime.js';

type ConfigOpts = { config: string };

function parseAccount(v: string): Address {
  if (!isAddress(v, { strict: false })) throw new Error(`Invalid address: ${v}`);
  return getAddress(v);
}

function parseInteger(v: string, what: string): bigint {
  if (!/^\d+$/.test(v)) throw new Error(`Invalid ${what}: ${v}`);
  return BigInt(v);
}

async function withRuntime<T>(opts: ConfigOpts, fn: (rt: EscrowRuntime) => Promise<T>): Promise<T> {
  const cfg = await loadEscrowConfig(opts.config);
  const rt = await createEscrowRuntime(cfg);
  try {
    return await fn(rt);
  } finally {
    rt.close();
  }
}

function requireAssets(rt: EscrowRuntime, cmd: string): void {
  if (!rt.canMoveAssets) {
    throw new Error(`${cmd}: token movement not configured (set [chain].rpcUrl, [token].address and ${rt.config.chain.operatorKeyEnv})`);
  }
}

function out(line: string): void {
  process.stdout.write(`${line}\n`);
}

const program = new Command();
program.name('veledger').description('Vote-escrow voting-power ledger').version('0.1.0');

program
  .command('init')
  .description('Create a starter escrow.toml config')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (opts: ConfigOpts) => {
    const configPath = expandHome(opts.config);

    await fs.mkdir(path.dirname(configPath), { recursive: true });
    try {
      await fs.writeFile(configPath, STARTER_CONFIG, { flag: 'wx' });
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new Error(`init: failed to write ${configPath}: ${msg}`);
    }

    out(`Wrote starter config: ${configPath}`);
  });

program
  .command('status')
  .description('Show ledger status (epoch, supply, total power)')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (opts: ConfigOpts) => {
    await withRuntime(opts, async ({ escrow, db }) => {
      const { decimals, symbol, name } = escrow.metadata;
      const epoch = escrow.epoch();
      const latest = escrow.pointHistory(epoch);

      out(`token:       ${name} (${symbol})`);
      out(`epoch:       ${epoch}`);
      out(`last point:  ts=${latest?.ts ?? 0n} marker=${latest?.blk ?? 0n}`);
      out(`supply:      ${formatUnits(escrow.supply(), decimals)}`);
      out(`total power: ${formatUnits(toPower(await escrow.totalPower()), decimals)}`);
      out(`accounts:    ${db.listAccounts().length}`);
      out(`journal:     ${db.getJournalMode()}`);
    });
  });

program
  .command('power')
  .description('Voting power of an account now, at a timestamp, or at a marker')
  .argument('<account>', 'Account address')
  .option('--at <ts>', 'Unix timestamp (seconds)')
  .option('--marker <n>', 'Sequence marker (block number)')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (account: string, opts: ConfigOpts & { at?: string; marker?: string }) => {
    const who = parseAccount(account);
    await withRuntime(opts, async ({ escrow }) => {
      const power =
        opts.marker != null
          ? await escrow.powerOfAt(who, parseInteger(opts.marker, 'marker'))
          : await escrow.powerOf(who, opts.at != null ? parseInteger(opts.at, 'timestamp') : undefined);
      out(formatUnits(toPower(power), escrow.metadata.decimals));
    });
  });

program
  .command('supply')
  .description('Total voting power now, at a timestamp, or at a marker')
  .option('--at <ts>', 'Unix timestamp (seconds)')
  .option('--marker <n>', 'Sequence marker (block number)')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (opts: ConfigOpts & { at?: string; marker?: string }) => {
    await withRuntime(opts, async ({ escrow }) => {
      const power =
        opts.marker != null
          ? await escrow.totalPowerAt(parseInteger(opts.marker, 'marker'))
          : await escrow.totalPower(opts.at != null ? parseInteger(opts.at, 'timestamp') : undefined);
      out(formatUnits(toPower(power), escrow.metadata.decimals));
    });
  });

program
  .command('history')
  .description('Lock and recorded points of an account')
  .argument('<account>', 'Account address')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (account: string, opts: ConfigOpts) => {
    const who = parseAccount(account);
    await withRuntime(opts, async ({ escrow }) => {
      const locked = escrow.locked(who);
      out(`state:  ${await escrow.lockState(who)}`);
      out(`amount: ${formatUnits(locked.amount, escrow.metadata.decimals)}`);
      out(`end:    ${locked.end}`);

      const last = escrow.userPointEpoch(who);
      for (let i = 1n; i <= last; i++) {
        const p = escrow.userPointHistory(who, i);
        if (!p) continue;
        // Raw units at the time of the point.
        out(`#${i} ts=${p.ts} marker=${p.blk} power=${fixedToDecimal(p.bias, CURVE_SCALE, 4)} slope=${p.slope}`);
      }
    });
  });

program
  .command('checkpoint')
  .description('Record global history up to now')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (opts: ConfigOpts) => {
    await withRuntime(opts, async ({ escrow }) => {
      out(`epoch: ${await escrow.checkpoint()}`);
    });
  });

program
  .command('lock')
  .description('Create a lock for an account (the operator pulls tokens via transferFrom)')
  .requiredOption('--account <address>', 'Lock owner')
  .requiredOption('--amount <amount>', 'Amount in token units (decimal)')
  .requiredOption('--unlock <ts>', 'Unlock timestamp (rounded down to a week)')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (opts: ConfigOpts & { account: string; amount: string; unlock: string }) => {
    const sender = parseAccount(opts.account);
    await withRuntime(opts, async (rt) => {
      requireAssets(rt, 'lock');
      const value = parseUnits(opts.amount, rt.escrow.metadata.decimals);
      await rt.escrow.createLock({ sender }, value, parseInteger(opts.unlock, 'unlock time'));
      out(`Locked until ${rt.escrow.lockedEnd(sender)}`);
    });
  });

program
  .command('increase-amount')
  .description('Add tokens to an active lock; with --for, the operator account pays for someone else')
  .requiredOption('--account <address>', 'Payer (and lock owner unless --for is given)')
  .requiredOption('--amount <amount>', 'Amount in token units (decimal)')
  .option('--for <address>', 'Lock owner to deposit for')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (opts: ConfigOpts & { account: string; amount: string; for?: string }) => {
    const sender = parseAccount(opts.account);
    await withRuntime(opts, async (rt) => {
      requireAssets(rt, 'increase-amount');
      const value = parseUnits(opts.amount, rt.escrow.metadata.decimals);
      if (opts.for != null) {
        const target = parseAccount(opts.for);
        await rt.escrow.depositFor({ sender }, target, value);
        out(`Locked amount of ${target}: ${formatUnits(rt.escrow.locked(target).amount, rt.escrow.metadata.decimals)}`);
      } else {
        await rt.escrow.increaseAmount({ sender }, value);
        out(`Locked amount: ${formatUnits(rt.escrow.locked(sender).amount, rt.escrow.metadata.decimals)}`);
      }
    });
  });

program
  .command('extend')
  .description('Move the unlock time of an active lock later')
  .requiredOption('--account <address>', 'Lock owner')
  .requiredOption('--unlock <ts>', 'New unlock timestamp (rounded down to a week)')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (opts: ConfigOpts & { account: string; unlock: string }) => {
    const sender = parseAccount(opts.account);
    await withRuntime(opts, async ({ escrow }) => {
      await escrow.increaseUnlockTime({ sender }, parseInteger(opts.unlock, 'unlock time'));
      out(`Locked until ${escrow.lockedEnd(sender)}`);
    });
  });

program
  .command('withdraw')
  .description('Release an expired lock back to its owner')
  .requiredOption('--account <address>', 'Lock owner')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (opts: ConfigOpts & { account: string }) => {
    const sender = parseAccount(opts.account);
    await withRuntime(opts, async (rt) => {
      requireAssets(rt, 'withdraw');
      const value = await rt.escrow.withdraw({ sender });
      out(`Withdrew ${formatUnits(value, rt.escrow.metadata.decimals)}`);
    });
  });

program
  .command('keeper')
  .description('Run the weekly checkpoint keeper (foreground)')
  .option('-c, --config <path>', 'Config path', DEFAULT_CONFIG_PATH)
  .action(async (opts: ConfigOpts) => {
    const cfg = await loadEscrowConfig(opts.config);
    if (!cfg.keeper.enabled) throw new Error('keeper: disabled in config (set [keeper].enabled = true)');
    const rt = await createEscrowRuntime(cfg);

    await rt.keeper.runOnce();
    await rt.keeper.start();

    const shutdown = (signal: string) => {
      process.stdout.write(`\nReceived ${signal}, shutting down...\n`);
      rt.logger.info({ signal, metrics: rt.metrics.snapshot() }, 'Keeper stopped');
      try {
        rt.close();
      } finally {
        process.exit(0);
      }
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    // Keep process alive.
    await new Promise(() => undefined);
  });

await program.parseAsync(process.argv);
