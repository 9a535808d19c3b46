import type { Address } from 'viem';

export interface EscrowTokenMetadata {
  name: string;
  symbol: string;
  decimals: number;
  version: string;
  address?: Address;
}
