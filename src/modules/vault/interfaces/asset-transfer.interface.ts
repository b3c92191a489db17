export const ASSET_TRANSFER = Symbol("ASSET_TRANSFER");

/**
 * Deposit-asset movement between the vault and an account. Each call
 * either moves the full amount or throws.
 */
export interface AssetTransfer {
  pull(from: string, amount: bigint): Promise<void>;
  push(to: string, amount: bigint): Promise<void>;
}
