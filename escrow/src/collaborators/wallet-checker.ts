import type { Address, PublicClient } from 'viem';
import { getAddress, parseAbi } from 'viem';

export interface ContractOriginChecker {
  isAllowed(account: Address): Promise<boolean>;
}

const SMART_WALLET_CHECKER_ABI = parseAbi(['function check(address addr) view returns (bool)']);

/** Asks an on-chain allow-list contract (`check(address) -> bool`). */
export class SmartWalletChecker implements ContractOriginChecker {
  private readonly client: PublicClient;
  public readonly address: Address;

  constructor(client: PublicClient, address: Address) {
    this.client = client;
    this.address = address;
  }

  async isAllowed(account: Address): Promise<boolean> {
    return this.client.readContract({
      address: this.address,
      abi: SMART_WALLET_CHECKER_ABI,
      functionName: 'check',
      args: [account],
    });
  }
}

export class AllowListChecker implements ContractOriginChecker {
  private readonly allowed: Set<Address>;

  constructor(accounts: Iterable<Address>) {
    this.allowed = new Set([...accounts].map((a) => getAddress(a)));
  }

  async isAllowed(account: Address): Promise<boolean> {
    return this.allowed.has(getAddress(account));
  }
}
