import type { Account, Address, Chain, Hash, PublicClient, WalletClient } from 'viem';
import { erc20Abi } from 'viem';

export interface AssetMover {
  moveIn(from: Address, amount: bigint): Promise<void>;
  moveOut(to: Address, amount: bigint): Promise<void>;
}

/** Mover for ledgers that only checkpoint and answer queries. */
export class ReadOnlyAssetMover implements AssetMover {
  async moveIn(_from: Address, _amount: bigint): Promise<void> {
    throw new Error('Asset mover not configured (set [chain].rpcUrl and [token].address)');
  }

  async moveOut(_to: Address, _amount: bigint): Promise<void> {
    throw new Error('Asset mover not configured (set [chain].rpcUrl and [token].address)');
  }
}

/**
 * Moves an ERC-20 between holders and the escrow vault. `moveIn` pulls with
 * `transferFrom` (holders approve the vault first); `moveOut` pays with `transfer`.
 */
export class Erc20AssetMover implements AssetMover {
  private readonly publicClient: PublicClient;
  private readonly walletClient: WalletClient;
  private readonly account: Account;
  private readonly token: Address;
  private readonly confirmations: number;

  constructor(args: {
    publicClient: PublicClient;
    walletClient: WalletClient;
    account: Account;
    token: Address;
    confirmations?: number;
  }) {
    this.publicClient = args.publicClient;
    this.walletClient = args.walletClient;
    this.account = args.account;
    this.token = args.token;
    this.confirmations = args.confirmations ?? 1;
  }

  get vault(): Address {
    return this.account.address;
  }

  async moveIn(from: Address, amount: bigint): Promise<void> {
    const hash = await this.walletClient.writeContract({
      address: this.token,
      abi: erc20Abi,
      functionName: 'transferFrom',
      args: [from, this.vault, amount],
      account: this.account,
      chain: this.chain(),
    });
    await this.confirm(hash, 'transferFrom');
  }

  async moveOut(to: Address, amount: bigint): Promise<void> {
    const hash = await this.walletClient.writeContract({
      address: this.token,
      abi: erc20Abi,
      functionName: 'transfer',
      args: [to, amount],
      account: this.account,
      chain: this.chain(),
    });
    await this.confirm(hash, 'transfer');
  }

  private chain(): Chain | null {
    return this.walletClient.chain ?? null;
  }

  private async confirm(hash: Hash, what: string): Promise<void> {
    const receipt = await this.publicClient.waitForTransactionReceipt({ hash, confirmations: this.confirmations });
    if (receipt.status !== 'success') throw new Error(`Erc20AssetMover: ${what} reverted (${hash})`);
  }
}
