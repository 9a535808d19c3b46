import pino from 'pino';
import type { Logger } from 'pino';

import type { Account, Hex, PublicClient, WalletClient } from 'viem';
import { createPublicClient, createWalletClient, http, isHex } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';

import type { AssetMover } from './collaborators/asset-mover.js';
import { Erc20AssetMover, ReadOnlyAssetMover } from './collaborators/asset-mover.js';
import type { ContractOriginChecker } from './collaborators/wallet-checker.js';
import { AllowListChecker, SmartWalletChecker } from './collaborators/wallet-checker.js';
import type { EscrowConfig } from './config/config.js';
import { CheckpointKeeper } from './keeper/checkpoint-keeper.js';
import type { LedgerClock } from './ledger/clock.js';
import { ChainClock, SystemClock } from './ledger/clock.js';
import { VotingEscrow } from './ledger/voting-escrow.js';
import { EscrowDB } from './storage/db.js';
import { Metrics } from './telemetry/metrics.js';

export type EscrowRuntimeDeps = {
  openDb?: (dataDir: string) => Promise<EscrowDB>;
  createPublicClient?: (rpcUrl: string) => PublicClient;
  createWalletClient?: (rpcUrl: string, account: Account) => WalletClient;
  readEnv?: (name: string) => string | undefined;
  clock?: LedgerClock;
  assets?: AssetMover;
  walletChecker?: ContractOriginChecker;
  logger?: Logger;
};

export type EscrowRuntime = {
  config: EscrowConfig;
  logger: Logger;
  metrics: Metrics;
  db: EscrowDB;
  clock: LedgerClock;
  escrow: VotingEscrow;
  keeper: CheckpointKeeper;
  /** True when tokens can actually be moved (chain, token and operator key all configured). */
  canMoveAssets: boolean;
  close(): void;
};

function loadOperatorAccount(envName: string, readEnv: (name: string) => string | undefined): Account | undefined {
  const key = readEnv(envName);
  if (!key) return undefined;
  if (!isHex(key) || key.length !== 66) throw new Error(`Runtime: ${envName} is not a 32-byte hex private key`);
  const hex: Hex = key;
  return privateKeyToAccount(hex);
}

/** Wires a ledger from config: storage, clock, collaborators, logger and the optional keeper. */
export async function createEscrowRuntime(config: EscrowConfig, deps: EscrowRuntimeDeps = {}): Promise<EscrowRuntime> {
  const logger = deps.logger ?? pino({ level: config.telemetry.logLevel });
  const metrics = new Metrics();
  const readEnv = deps.readEnv ?? ((name: string) => process.env[name]);

  const { rpcUrl } = config.chain;
  const publicClient = rpcUrl
    ? (deps.createPublicClient ?? ((url) => createPublicClient({ transport: http(url) })))(rpcUrl)
    : undefined;

  const clock = deps.clock ?? (publicClient ? new ChainClock(publicClient) : new SystemClock());

  let assets = deps.assets;
  if (!assets) {
    const account = publicClient ? loadOperatorAccount(config.chain.operatorKeyEnv, readEnv) : undefined;
    if (rpcUrl && publicClient && account && config.token.address) {
      const walletClient = (deps.createWalletClient ??
        ((url) => createWalletClient({ transport: http(url) })))(rpcUrl, account);
      assets = new Erc20AssetMover({
        publicClient,
        walletClient,
        account,
        token: config.token.address,
        confirmations: config.chain.confirmations,
      });
    } else {
      assets = new ReadOnlyAssetMover();
    }
  }

  let walletChecker = deps.walletChecker;
  if (!walletChecker && config.access.walletChecker) {
    if (!publicClient) throw new Error('Runtime: access.walletChecker requires chain.rpcUrl');
    walletChecker = new SmartWalletChecker(publicClient, config.access.walletChecker);
  } else if (!walletChecker && config.access.allowList.length > 0) {
    walletChecker = new AllowListChecker(config.access.allowList);
  }

  const db = await (deps.openDb ?? EscrowDB.open)(config.dataDir);

  let escrow: VotingEscrow;
  try {
    escrow = await VotingEscrow.create({
      store: db,
      clock,
      assets,
      walletChecker,
      metadata: config.token,
      logger,
      metrics,
    });
  } catch (err) {
    db.close();
    throw err;
  }

  const keeper = new CheckpointKeeper({ escrow, clock, logger, metrics, delayMs: config.keeper.delayMs });

  logger.debug(
    { dataDir: config.dataDir, chain: rpcUrl ? 'rpc' : 'none', assets: assets.constructor.name },
    'Escrow runtime ready',
  );

  return {
    config,
    logger,
    metrics,
    db,
    clock,
    escrow,
    keeper,
    canMoveAssets: !(assets instanceof ReadOnlyAssetMover),
    close: () => {
      keeper.stop();
      db.close();
    },
  };
}
