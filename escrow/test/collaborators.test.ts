import { afterEach, describe, expect, it, vi } from 'vitest';

import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';

import type { Account, Address, PublicClient, WalletClient } from 'viem';
import { erc20Abi } from 'viem';

import { WEEK } from '@veledger/sdk';

import { Erc20AssetMover, ReadOnlyAssetMover } from '../src/collaborators/asset-mover.js';
import { AllowListChecker, SmartWalletChecker } from '../src/collaborators/wallet-checker.js';
import { parseConfigText } from '../src/config/config.js';
import { ChainClock, SystemClock } from '../src/ledger/clock.js';
import { AssetMoveFailed } from '../src/ledger/errors.js';
import { createEscrowRuntime } from '../src/runtime.js';
import { ALICE, CONTRACT, T0, silentLogger } from './helpers.js';

const TOKEN: Address = '0x5555555555555555555555555555555555555555';
const VAULT: Address = '0x6666666666666666666666666666666666666666';
const CHECKER: Address = '0x7777777777777777777777777777777777777777';
const TX_HASH = `0x${'aa'.repeat(32)}` as const;
const TEST_KEY = `0x${'11'.repeat(32)}`;

const vaultAccount: Account = { address: VAULT, type: 'json-rpc' };

function fakeClients(status: 'success' | 'reverted' = 'success') {
  const publicClient = {
    getBlock: vi.fn(async () => ({ timestamp: T0, number: 100n })),
    readContract: vi.fn(async () => true),
    waitForTransactionReceipt: vi.fn(async () => ({ status, transactionHash: TX_HASH })),
  };
  const walletClient = {
    chain: undefined,
    writeContract: vi.fn(async () => TX_HASH),
  };
  return {
    publicClient,
    walletClient,
    asPublic: publicClient as unknown as PublicClient,
    asWallet: walletClient as unknown as WalletClient,
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('Erc20AssetMover', () => {
  it('pulls with transferFrom into the vault and waits for the receipt', async () => {
    const { publicClient, walletClient, asPublic, asWallet } = fakeClients();
    const mover = new Erc20AssetMover({ publicClient: asPublic, walletClient: asWallet, account: vaultAccount, token: TOKEN, confirmations: 2 });

    await mover.moveIn(ALICE, 5n);

    expect(walletClient.writeContract).toHaveBeenCalledWith({
      address: TOKEN,
      abi: erc20Abi,
      functionName: 'transferFrom',
      args: [ALICE, VAULT, 5n],
      account: vaultAccount,
      chain: null,
    });
    expect(publicClient.waitForTransactionReceipt).toHaveBeenCalledWith({ hash: TX_HASH, confirmations: 2 });
  });

  it('pays out with transfer and fails on a reverted receipt', async () => {
    const { walletClient, asPublic, asWallet } = fakeClients('reverted');
    const mover = new Erc20AssetMover({ publicClient: asPublic, walletClient: asWallet, account: vaultAccount, token: TOKEN });

    await expect(mover.moveOut(ALICE, 9n)).rejects.toThrow(`Erc20AssetMover: transfer reverted (${TX_HASH})`);
    expect(walletClient.writeContract).toHaveBeenCalledWith(
      expect.objectContaining({ functionName: 'transfer', args: [ALICE, 9n] }),
    );
  });

  it('read-only mover refuses to move tokens', async () => {
    const mover = new ReadOnlyAssetMover();
    await expect(mover.moveIn(ALICE, 1n)).rejects.toThrow(
      'Asset mover not configured (set [chain].rpcUrl and [token].address)',
    );
    await expect(mover.moveOut(ALICE, 1n)).rejects.toThrow(
      'Asset mover not configured (set [chain].rpcUrl and [token].address)',
    );
  });
});

describe('contract-origin checkers', () => {
  it('SmartWalletChecker asks the checker contract', async () => {
    const { publicClient, asPublic } = fakeClients();
    const checker = new SmartWalletChecker(asPublic, CHECKER);

    expect(await checker.isAllowed(CONTRACT)).toBe(true);
    expect(publicClient.readContract).toHaveBeenCalledWith(
      expect.objectContaining({ address: CHECKER, functionName: 'check', args: [CONTRACT] }),
    );
  });

  it('AllowListChecker compares checksummed addresses', async () => {
    const checker = new AllowListChecker(['0xabcdefabcdefabcdefabcdefabcdefabcdefabcd']);

    expect(await checker.isAllowed('0xABCDEFABCDEFABCDEFABCDEFABCDEFABCDEFABCD')).toBe(true);
    expect(await checker.isAllowed(CONTRACT)).toBe(false);
  });
});

describe('clocks', () => {
  it('ChainClock reads the latest block', async () => {
    const { publicClient, asPublic } = fakeClients();
    expect(await new ChainClock(asPublic).now()).toEqual({ ts: T0, blk: 100n });
    expect(publicClient.getBlock).toHaveBeenCalledWith({ blockTag: 'latest' });
  });

  it('SystemClock uses unix seconds and milliseconds', () => {
    vi.spyOn(Date, 'now').mockReturnValue(1_700_000_000_123);
    expect(new SystemClock().now()).toEqual({ ts: 1_700_000_000n, blk: 1_700_000_000_123n });
  });
});

describe('createEscrowRuntime', () => {
  async function tmpConfig(extra: string) {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'veledger-runtime-'));
    return parseConfigText(`dataDir = "${dir}"\n${extra}`, '.toml');
  }

  it('runs read-only on the system clock without a chain', async () => {
    const cfg = await tmpConfig('');
    const rt = await createEscrowRuntime(cfg, { logger: silentLogger() });

    expect(rt.canMoveAssets).toBe(false);
    expect(rt.clock).toBeInstanceOf(SystemClock);
    expect(rt.escrow.epoch()).toBe(0n);

    const unlock = BigInt(Math.floor(Date.now() / 1000)) + 10n * WEEK;
    const err = await rt.escrow.createLock({ sender: ALICE }, 1n, unlock).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AssetMoveFailed);
    rt.close();
  });

  it('wires the chain clock, ERC-20 mover and wallet checker from config', async () => {
    const cfg = await tmpConfig(`
[token]
address = "${TOKEN}"

[chain]
rpcUrl = "https://example.invalid"
operatorKeyEnv = "TEST_OPERATOR_KEY"

[access]
walletChecker = "${CHECKER}"
`);
    const { publicClient, walletClient, asPublic, asWallet } = fakeClients();
    const readEnv = vi.fn((name: string) => (name === 'TEST_OPERATOR_KEY' ? TEST_KEY : undefined));

    const rt = await createEscrowRuntime(cfg, {
      logger: silentLogger(),
      createPublicClient: () => asPublic,
      createWalletClient: () => asWallet,
      readEnv,
    });

    expect(rt.canMoveAssets).toBe(true);
    expect(rt.clock).toBeInstanceOf(ChainClock);
    expect(rt.escrow.pointHistory(0n)).toEqual({ bias: 0n, slope: 0n, ts: T0, blk: 100n });

    await rt.escrow.createLock({ sender: CONTRACT, origin: ALICE }, 5n, T0 + 52n * WEEK);

    expect(publicClient.readContract).toHaveBeenCalledTimes(1);
    expect(walletClient.writeContract).toHaveBeenCalledWith(
      expect.objectContaining({ address: TOKEN, functionName: 'transferFrom' }),
    );
    expect(rt.escrow.locked(CONTRACT)).toEqual({ amount: 5n, end: T0 + 52n * WEEK });
    rt.close();
  });

  it('rejects a malformed operator key', async () => {
    const cfg = await tmpConfig('[chain]\nrpcUrl = "https://example.invalid"\noperatorKeyEnv = "TEST_OPERATOR_KEY"\n');
    const { asPublic } = fakeClients();

    await expect(
      createEscrowRuntime(cfg, {
        logger: silentLogger(),
        createPublicClient: () => asPublic,
        readEnv: () => 'test-secret',
      }),
    ).rejects.toThrow('Runtime: TEST_OPERATOR_KEY is not a 32-byte hex private key');
  });

  it('requires a chain for an on-chain wallet checker', async () => {
    const cfg = await tmpConfig(`[access]\nwalletChecker = "${CHECKER}"\n`);
    await expect(createEscrowRuntime(cfg, { logger: silentLogger() })).rejects.toThrow(
      'Runtime: access.walletChecker requires chain.rpcUrl',
    );
  });
});
