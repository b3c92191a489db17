import { Inject, Injectable, Logger } from "@nestjs/common";
import { VaultException } from "../../common/errors";
import { normalizeAddress } from "../../common/validation";
import {
  LedgerService,
  Tranche,
  assertNotPaused,
  depositInto,
  distributableCash,
  redemptionAvailable,
  redemptionSharePrice,
  requestRedemption,
  shareBalance,
  sharePrice,
  trancheName,
  utilization,
  withdrawRedemption,
} from "../ledger";
import { ASSET_TRANSFER, AssetTransfer } from "./interfaces";
import { RedemptionView, TrancheView, VaultBalances } from "./vault.types";

/** Depositor-facing operations: deposit, redeem, withdraw, and the read views. */
@Injectable()
export class VaultService {
  private readonly logger = new Logger(VaultService.name);

  constructor(
    private readonly ledger: LedgerService,
    @Inject(ASSET_TRANSFER) private readonly assets: AssetTransfer,
  ) {}

  // ── Depositor operations ─────────────────────────────────────────────────

  async deposit(tranche: Tranche, account: string, amount: bigint): Promise<bigint> {
    const depositor = normalizeAddress(account);
    const shares = await this.ledger.execute("deposit", (tx) => {
      assertNotPaused(tx.draft);
      const minted = depositInto(tx.draft, tranche, depositor, amount, tx.now);
      tx.interact("pull-deposit", () => this.assets.pull(depositor, amount));
      return minted;
    });

    this.logger.log(
      `[vault_deposit] tranche=${trancheName(tranche)} account=${depositor} amount=${amount} shares=${shares}`,
    );
    return shares;
  }

  /** Burns `shares` and queues their realized value. Returns the amount owed. */
  async redeem(tranche: Tranche, account: string, shares: bigint): Promise<bigint> {
    const depositor = normalizeAddress(account);
    const amount = await this.ledger.execute("redeem", (tx) => {
      assertNotPaused(tx.draft);
      return requestRedemption(tx.draft, tranche, depositor, shares);
    });

    this.logger.log(
      `[vault_redeem] tranche=${trancheName(tranche)} account=${depositor} shares=${shares} amount=${amount}`,
    );
    return amount;
  }

  async withdraw(tranche: Tranche, account: string, amount: bigint): Promise<bigint> {
    const depositor = normalizeAddress(account);
    await this.ledger.execute("withdraw", (tx) => {
      assertNotPaused(tx.draft);
      withdrawRedemption(tx.draft, tranche, depositor, amount);
      tx.interact("push-withdrawal", () => this.assets.push(depositor, amount));
    });

    this.logger.log(
      `[vault_withdraw] tranche=${trancheName(tranche)} account=${depositor} amount=${amount}`,
    );
    return amount;
  }

  /** Withdraws everything currently processed for the account. */
  async withdrawMax(tranche: Tranche, account: string): Promise<bigint> {
    const depositor = normalizeAddress(account);
    const amount = await this.ledger.execute("withdraw-max", (tx) => {
      assertNotPaused(tx.draft);
      const available = redemptionAvailable(tx.draft, tranche, depositor);
      if (available === 0n) {
        throw new VaultException("InvalidAmount", "Nothing available to withdraw");
      }
      withdrawRedemption(tx.draft, tranche, depositor, available);
      tx.interact("push-withdrawal", () => this.assets.push(depositor, available));
      return available;
    });

    this.logger.log(
      `[vault_withdraw] tranche=${trancheName(tranche)} account=${depositor} amount=${amount} max=true`,
    );
    return amount;
  }

  // ── Views ────────────────────────────────────────────────────────────────

  trancheState(tranche: Tranche): TrancheView {
    const now = this.ledger.now();
    return this.ledger.read((state) => {
      const t = state.tranches[tranche];
      return {
        tranche: trancheName(tranche),
        depositValue: t.depositValue,
        pendingRedemptions: t.pendingRedemptions,
        redemptionQueueTotal: t.redemptionQueueTotal,
        redemptionQueueProcessed: t.redemptionQueueProcessed,
        totalShares: t.totalShares,
        sharePrice: sharePrice(state, tranche, now),
        redemptionSharePrice: redemptionSharePrice(state, tranche),
        pendingReturns: [...t.pendingReturns.entries()]
          .sort(([a], [b]) => a - b)
          .map(([bucket, amount]) => ({ bucket, amount })),
      };
    });
  }

  sharePrice(tranche: Tranche): bigint {
    const now = this.ledger.now();
    return this.ledger.read((state) => sharePrice(state, tranche, now));
  }

  redemptionSharePrice(tranche: Tranche): bigint {
    return this.ledger.read((state) => redemptionSharePrice(state, tranche));
  }

  redemptionAvailable(tranche: Tranche, account: string): bigint {
    const depositor = normalizeAddress(account);
    return this.ledger.read((state) => redemptionAvailable(state, tranche, depositor));
  }

  redemptionState(tranche: Tranche, account: string): RedemptionView | null {
    const depositor = normalizeAddress(account);
    return this.ledger.read((state) => {
      const redemption = state.tranches[tranche].redemptions.get(depositor);
      if (!redemption) return null;
      return {
        pendingAmount: redemption.pendingAmount,
        withdrawnAmount: redemption.withdrawnAmount,
        queueTargetPosition: redemption.queueTargetPosition,
        available: redemptionAvailable(state, tranche, depositor),
      };
    });
  }

  shareBalance(tranche: Tranche, account: string): bigint {
    const depositor = normalizeAddress(account);
    return this.ledger.read((state) => shareBalance(state.tranches[tranche], depositor));
  }

  balances(): VaultBalances {
    return this.ledger.read((state) => ({
      totalCashBalance: state.totalCashBalance,
      totalLoanBalance: state.totalLoanBalance,
      totalReservesBalance: state.totalReservesBalance,
      totalWithdrawalBalance: state.totalWithdrawalBalance,
      distributableCash: distributableCash(state),
      utilization: utilization(state),
    }));
  }

  utilization(): bigint {
    return this.ledger.read(utilization);
  }
}
