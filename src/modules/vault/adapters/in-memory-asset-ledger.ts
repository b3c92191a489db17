import { Injectable, Logger, UnprocessableEntityException } from "@nestjs/common";
import { AssetTransfer } from "../interfaces";

export class InsufficientBalanceError extends UnprocessableEntityException {
  constructor(account: string, balance: bigint, amount: bigint) {
    super(`Insufficient balance for ${account}: has ${balance}, needs ${amount}`);
    this.name = "InsufficientBalanceError";
  }
}

/** Deposit-asset balances held in process. Used in development and tests. */
@Injectable()
export class InMemoryAssetLedger implements AssetTransfer {
  private readonly logger = new Logger(InMemoryAssetLedger.name);
  private readonly balances = new Map<string, bigint>();
  private vaultBalance = 0n;

  balanceOf(account: string): bigint {
    return this.balances.get(account.toLowerCase()) ?? 0n;
  }

  get vaultHoldings(): bigint {
    return this.vaultBalance;
  }

  /** Faucet. */
  credit(account: string, amount: bigint): void {
    this.balances.set(account.toLowerCase(), this.balanceOf(account) + amount);
  }

  /** Platform-side payments into the vault (repayments). */
  creditVault(amount: bigint): void {
    this.vaultBalance += amount;
  }

  async pull(from: string, amount: bigint): Promise<void> {
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new InsufficientBalanceError(from, balance, amount);
    }
    this.balances.set(from.toLowerCase(), balance - amount);
    this.vaultBalance += amount;
    this.logger.debug(`[asset_pull] from=${from} amount=${amount}`);
  }

  async push(to: string, amount: bigint): Promise<void> {
    if (this.vaultBalance < amount) {
      throw new InsufficientBalanceError("vault", this.vaultBalance, amount);
    }
    this.vaultBalance -= amount;
    this.credit(to, amount);
    this.logger.debug(`[asset_push] to=${to} amount=${amount}`);
  }
}
