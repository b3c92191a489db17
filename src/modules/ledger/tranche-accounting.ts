import { FIXED_POINT_SCALE, div, max, min, mul } from "../../common/fixed-point";
import { VaultException } from "../../common/errors";
import { TRANCHES, Tranche, TrancheState, VaultLedgerState, trancheName } from "./ledger.types";
import { proratedReturns } from "./time-buckets";

// ── Pool-level ─────────────────────────────────────────────────────────────

/** Cash not earmarked for processed redemptions. */
export function freeCash(state: VaultLedgerState): bigint {
  return state.totalCashBalance - state.totalWithdrawalBalance;
}

/** Cash a purchase or a redemption drain may use. */
export function distributableCash(state: VaultLedgerState): bigint {
  return max(freeCash(state) - state.totalReservesBalance, 0n);
}

export function utilization(state: VaultLedgerState): bigint {
  const denominator = freeCash(state) + state.totalLoanBalance;
  return denominator === 0n ? 0n : div(state.totalLoanBalance, denominator);
}

export function updateReserves(state: VaultLedgerState): void {
  state.totalReservesBalance = mul(freeCash(state), state.parameters.reserveRatio);
}

// ── Share price ────────────────────────────────────────────────────────────

/** Deposit value not already owed to queued redemptions. */
export function realizedValue(tranche: TrancheState): bigint {
  return max(tranche.depositValue - tranche.pendingRedemptions, 0n);
}

export function estimatedValue(state: VaultLedgerState, tranche: Tranche, now: number): bigint {
  const t = state.tranches[tranche];
  const { timeBucketWidth, prorationBuckets } = state.parameters;
  return realizedValue(t) + proratedReturns(t, now, timeBucketWidth, prorationBuckets);
}

export function sharePrice(state: VaultLedgerState, tranche: Tranche, now: number): bigint {
  const t = state.tranches[tranche];
  if (t.totalShares === 0n) return FIXED_POINT_SCALE;
  return div(estimatedValue(state, tranche, now), t.totalShares);
}

/** Priced on realized value only; no proration. */
export function redemptionSharePrice(state: VaultLedgerState, tranche: Tranche): bigint {
  const t = state.tranches[tranche];
  if (t.totalShares === 0n) return FIXED_POINT_SCALE;
  return div(realizedValue(t), t.totalShares);
}

export function shareBalance(t: TrancheState, account: string): bigint {
  return t.shareBalances.get(account) ?? 0n;
}

function mintShares(t: TrancheState, account: string, shares: bigint): void {
  t.shareBalances.set(account, shareBalance(t, account) + shares);
  t.totalShares += shares;
}

export function burnShares(t: TrancheState, account: string, shares: bigint): void {
  const remaining = shareBalance(t, account) - shares;
  if (remaining === 0n) {
    t.shareBalances.delete(account);
  } else {
    t.shareBalances.set(account, remaining);
  }
  t.totalShares -= shares;
}

// ── Deposits and the redemption drain ──────────────────────────────────────

/**
 * Credits a deposit, mints shares at the prorated share price and drains
 * queued redemptions with the new cash. Returns the shares minted.
 */
export function depositInto(
  state: VaultLedgerState,
  tranche: Tranche,
  account: string,
  amount: bigint,
  now: number,
): bigint {
  if (amount <= 0n) {
    throw new VaultException("InvalidAmount", "Deposit amount must be positive");
  }
  const t = state.tranches[tranche];
  if (t.totalShares > 0n && realizedValue(t) === 0n) {
    throw new VaultException("TrancheInsolvent", `${trancheName(tranche)} tranche is insolvent`);
  }

  const shares = div(amount, sharePrice(state, tranche, now));
  t.depositValue += amount;
  mintShares(t, account, shares);
  state.totalCashBalance += amount;

  updateReserves(state);
  processRedemptions(state);
  return shares;
}

/**
 * Moves distributable cash into the withdrawal balance against queued
 * redemptions, senior first. Returns the amount processed per tranche.
 */
export function processRedemptions(state: VaultLedgerState): [bigint, bigint] {
  let budget = distributableCash(state);
  const processed: [bigint, bigint] = [0n, 0n];

  for (const tranche of TRANCHES) {
    const t = state.tranches[tranche];
    const amount = min(min(t.pendingRedemptions, t.depositValue), budget);
    if (amount === 0n) continue;

    t.pendingRedemptions -= amount;
    t.depositValue -= amount;
    t.redemptionQueueProcessed += amount;
    state.totalWithdrawalBalance += amount;
    budget -= amount;
    processed[tranche] = amount;
  }
  return processed;
}

/**
 * Forfeits every share of a tranche whose realized value is gone, so the
 * tranche prices at 1.0 again. Returns the number of shares forfeited.
 */
export function resetInsolventTranche(state: VaultLedgerState, tranche: Tranche): bigint {
  const t = state.tranches[tranche];
  if (t.totalShares === 0n || redemptionSharePrice(state, tranche) !== 0n) {
    throw new VaultException(
      "InvalidTrancheState",
      `${trancheName(tranche)} tranche is not insolvent`,
    );
  }
  const forfeited = t.totalShares;
  t.shareBalances.clear();
  t.totalShares = 0n;
  return forfeited;
}
