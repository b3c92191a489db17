import { min, mul } from "../../common/fixed-point";
import { VaultException } from "../../common/errors";
import { DepositorRedemption, Tranche, TrancheState, VaultLedgerState, trancheName } from "./ledger.types";
import { burnShares, processRedemptions, redemptionSharePrice, shareBalance } from "./tranche-accounting";

/**
 * Queues a redemption of `shares` at the realized share price, burns the
 * shares and drains what current cash allows. Returns the amount owed.
 */
export function requestRedemption(
  state: VaultLedgerState,
  tranche: Tranche,
  account: string,
  shares: bigint,
): bigint {
  const t = state.tranches[tranche];
  if (shares <= 0n) {
    throw new VaultException("InvalidAmount", "Share amount must be positive");
  }
  if (shareBalance(t, account) < shares) {
    throw new VaultException("InsufficientShares", `Share balance below ${shares}`);
  }
  if (t.redemptions.has(account)) {
    throw new VaultException(
      "RedemptionInProgress",
      `Redemption already pending in ${trancheName(tranche)} tranche`,
    );
  }
  const price = redemptionSharePrice(state, tranche);
  if (price === 0n) {
    throw new VaultException("TrancheInsolvent", `${trancheName(tranche)} tranche is insolvent`);
  }

  const amount = mul(shares, price);
  if (amount === 0n) {
    throw new VaultException("InvalidAmount", "Redemption rounds to zero");
  }
  burnShares(t, account, shares);
  t.pendingRedemptions += amount;
  t.redemptionQueueTotal += amount;
  t.redemptions.set(account, {
    pendingAmount: amount,
    withdrawnAmount: 0n,
    queueTargetPosition: t.redemptionQueueTotal,
  });

  processRedemptions(state);
  return amount;
}

/**
 * Overlap of the processed counter with this depositor's queue window
 * [target − pending, target], less what was already withdrawn.
 */
export function claimableAmount(t: TrancheState, redemption: DepositorRedemption): bigint {
  const windowStart = redemption.queueTargetPosition - redemption.pendingAmount;
  if (t.redemptionQueueProcessed <= windowStart) return 0n;
  const processed = min(t.redemptionQueueProcessed, redemption.queueTargetPosition) - windowStart;
  return processed - redemption.withdrawnAmount;
}

export function redemptionAvailable(state: VaultLedgerState, tranche: Tranche, account: string): bigint {
  const t = state.tranches[tranche];
  const redemption = t.redemptions.get(account);
  return redemption ? claimableAmount(t, redemption) : 0n;
}

/** Releases processed redemption cash. The record is cleared once fully withdrawn. */
export function withdrawRedemption(
  state: VaultLedgerState,
  tranche: Tranche,
  account: string,
  amount: bigint,
): void {
  const t = state.tranches[tranche];
  const redemption = t.redemptions.get(account);
  const available = redemption ? claimableAmount(t, redemption) : 0n;

  if (!redemption || available === 0n || amount <= 0n || amount > available) {
    throw new VaultException(
      "InvalidAmount",
      `Requested ${amount}, available ${available}`,
    );
  }

  redemption.withdrawnAmount += amount;
  if (redemption.withdrawnAmount === redemption.pendingAmount) {
    t.redemptions.delete(account);
  }
  state.totalWithdrawalBalance -= amount;
  state.totalCashBalance -= amount;
}
