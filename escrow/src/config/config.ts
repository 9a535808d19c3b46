import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';

import type { Address } from 'viem';
import { getAddress, isAddress } from 'viem';
import type { EscrowTokenMetadata } from '@veledger/sdk';

import { parse as parseToml } from 'smol-toml';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type EscrowConfig = {
  // Storage
  dataDir: string;

  token: EscrowTokenMetadata;

  // Chain (optional; without it the ledger runs on the system clock and cannot move tokens)
  chain: {
    rpcUrl?: string;
    operatorKeyEnv: string;
    confirmations: number;
  };

  access: {
    walletChecker?: Address;
    allowList: Address[];
  };

  keeper: {
    enabled: boolean;
    delayMs: number;
  };

  telemetry: {
    logLevel: LogLevel;
  };
};

type Table = Record<string, unknown>;

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), '.veledger', 'escrow.toml');

export function defaultDataDir(): string {
  return path.join(os.homedir(), '.veledger', 'escrow');
}

export function expandHome(p: string): string {
  if (!p) return p;
  if (p === '~') return os.homedir();
  if (p.startsWith('~/') || p.startsWith('~\\')) return path.join(os.homedir(), p.slice(2));
  return p;
}

function isTable(v: unknown): v is Table {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function asTable(v: unknown, field: string): Table {
  if (v == null) return {};
  if (!isTable(v)) throw new Error(`Config: invalid ${field} (expected table)`);
  return v;
}

function asString(v: unknown, field: string, defaultValue?: string): string {
  if (v == null && defaultValue != null) return defaultValue;
  if (typeof v !== 'string' || !v) throw new Error(`Config: missing/invalid ${field}`);
  return v;
}

function asOptionalString(v: unknown, field: string): string | undefined {
  if (v == null) return undefined;
  return asString(v, field);
}

function asBoolean(v: unknown, field: string, defaultValue: boolean): boolean {
  if (v == null) return defaultValue;
  if (typeof v !== 'boolean') throw new Error(`Config: invalid ${field} (expected boolean)`);
  return v;
}

function asNumber(v: unknown, field: string, defaultValue?: number): number {
  if (v == null) {
    if (defaultValue == null) throw new Error(`Config: missing ${field}`);
    return defaultValue;
  }
  if (typeof v === 'bigint') return asNumber(Number(v), field);
  if (typeof v !== 'number' || !Number.isFinite(v)) throw new Error(`Config: invalid ${field} (expected number)`);
  return v;
}

function asNonNegativeInt(v: unknown, field: string, defaultValue: number): number {
  const n = asNumber(v, field, defaultValue);
  if (!Number.isInteger(n) || n < 0) throw new Error(`Config: invalid ${field} (expected non-negative integer)`);
  return n;
}

function asAddress(v: unknown, field: string): Address {
  const s = asString(v, field);
  if (!isAddress(s, { strict: false })) throw new Error(`Config: invalid ${field} (not an address)`);
  return getAddress(s);
}

function asOptionalAddress(v: unknown, field: string): Address | undefined {
  if (v == null) return undefined;
  return asAddress(v, field);
}

function asArray(v: unknown, field: string): unknown[] {
  if (v == null) return [];
  if (!Array.isArray(v)) throw new Error(`Config: invalid ${field} (expected array)`);
  return v;
}

function asLogLevel(v: unknown): LogLevel {
  if (v == null) return 'info';
  if (v === 'debug' || v === 'info' || v === 'warn' || v === 'error') return v;
  throw new Error('Config: invalid telemetry.logLevel');
}

export function normalizeConfig(raw: unknown): EscrowConfig {
  const root = asTable(raw, 'config');
  const dataDir = expandHome(asOptionalString(root.dataDir ?? root.data_dir, 'dataDir') ?? defaultDataDir());

  const tokenRaw = asTable(root.token, 'token');
  const decimals = asNonNegativeInt(tokenRaw.decimals, 'token.decimals', 18);
  if (decimals > 77) throw new Error('Config: invalid token.decimals (at most 77)');

  const token: EscrowTokenMetadata = {
    name: asString(tokenRaw.name, 'token.name', 'Vote-escrowed token'),
    symbol: asString(tokenRaw.symbol, 'token.symbol', 'veTOKEN'),
    decimals,
    version: asString(tokenRaw.version, 'token.version', 've-1.0.0'),
    address: asOptionalAddress(tokenRaw.address, 'token.address'),
  };

  const chainRaw = asTable(root.chain, 'chain');
  const chain: EscrowConfig['chain'] = {
    rpcUrl: asOptionalString(chainRaw.rpcUrl ?? chainRaw.rpc_url, 'chain.rpcUrl'),
    operatorKeyEnv: asString(chainRaw.operatorKeyEnv ?? chainRaw.operator_key_env, 'chain.operatorKeyEnv', 'VELEDGER_OPERATOR_KEY'),
    confirmations: asNonNegativeInt(chainRaw.confirmations, 'chain.confirmations', 1),
  };

  const accessRaw = asTable(root.access, 'access');
  const access: EscrowConfig['access'] = {
    walletChecker: asOptionalAddress(accessRaw.walletChecker ?? accessRaw.wallet_checker, 'access.walletChecker'),
    allowList: asArray(accessRaw.allowList ?? accessRaw.allow_list, 'access.allowList').map((x) =>
      asAddress(x, 'access.allowList'),
    ),
  };
  if (access.walletChecker && access.allowList.length > 0) {
    throw new Error('Config: set either access.walletChecker or access.allowList, not both');
  }

  const keeperRaw = asTable(root.keeper, 'keeper');
  const keeper: EscrowConfig['keeper'] = {
    enabled: asBoolean(keeperRaw.enabled, 'keeper.enabled', false),
    delayMs: asNonNegativeInt(keeperRaw.delayMs ?? keeperRaw.delay_ms, 'keeper.delayMs', 1_000),
  };

  const telemetryRaw = asTable(root.telemetry, 'telemetry');
  const telemetry: EscrowConfig['telemetry'] = {
    logLevel: asLogLevel(telemetryRaw.logLevel ?? telemetryRaw.log_level),
  };

  return { dataDir, token, chain, access, keeper, telemetry };
}

export function parseConfigText(rawText: string, ext: string): EscrowConfig {
  let raw: unknown;

  if (ext === '.json') {
    raw = JSON.parse(rawText);
  } else {
    // Try TOML first; if it fails, try JSON as a fallback.
    try {
      raw = parseToml(rawText);
    } catch (errToml) {
      try {
        raw = JSON.parse(rawText);
      } catch (errJson) {
        const msg = errToml instanceof Error ? errToml.message : String(errToml);
        throw new Error(`Config: failed to parse TOML (and JSON fallback failed): ${msg}`, { cause: errJson });
      }
    }
  }

  return normalizeConfig(raw);
}

export async function loadEscrowConfig(configPath: string = DEFAULT_CONFIG_PATH): Promise<EscrowConfig> {
  const p = expandHome(configPath);
  const rawText = await fs.readFile(p, 'utf8');
  return parseConfigText(rawText, path.extname(p).toLowerCase());
}

export const STARTER_CONFIG = `# ~/.veledger/escrow.toml

dataDir = "~/.veledger/escrow"

[token]
name = "Vote-escrowed token"
symbol = "veTOKEN"
decimals = 18
version = "ve-1.0.0"
# address = "0x..." # ERC-20 being locked

[chain]
# rpcUrl = "https://..."
operatorKeyEnv = "VELEDGER_OPERATOR_KEY"
confirmations = 1

[access]
# walletChecker = "0x..."
# allowList = ["0x..."]

[keeper]
enabled = false
delayMs = 1000

[telemetry]
logLevel = "info"
`;
