import { min, mul } from "../../common/fixed-point";
import { VaultException } from "../../common/errors";
import { LoanRecord, Tranche, VaultLedgerState } from "./ledger.types";
import { distributableCash, processRedemptions, updateReserves } from "./tranche-accounting";
import { scheduleReturn, timeBucket, unscheduleReturn } from "./time-buckets";
import { loanKey } from "./vault-ledger";

export interface PurchaseTerms {
  noteToken: string;
  loanId: string;
  collateralToken: string;
  collateralTokenId: string;
  purchasePrice: bigint;
  repayment: bigint;
  maturity: number;
}

// ── Lookup ─────────────────────────────────────────────────────────────────

export function findLoan(state: VaultLedgerState, noteToken: string, loanId: string): LoanRecord | undefined {
  return state.loans.get(loanKey(noteToken, loanId));
}

/** A held loan that has been neither repaid nor defaulted. */
export function getActiveLoan(state: VaultLedgerState, noteToken: string, loanId: string): LoanRecord {
  const loan = findLoan(state, noteToken, loanId);
  if (!loan || !loan.active || loan.liquidated) {
    throw new VaultException("UnknownLoan", `No active loan ${loanId} for ${noteToken}`);
  }
  return loan;
}

/** A defaulted loan still awaiting liquidation proceeds. */
export function getLiquidatedLoan(state: VaultLedgerState, noteToken: string, loanId: string): LoanRecord {
  const loan = findLoan(state, noteToken, loanId);
  if (!loan || !loan.liquidated) {
    throw new VaultException("UnknownLoan", `No liquidated loan ${loanId} for ${noteToken}`);
  }
  return loan;
}

// ── Pending-loan index ─────────────────────────────────────────────────────

function indexPendingLoan(state: VaultLedgerState, loan: LoanRecord): void {
  const bucket = timeBucket(loan.maturity, state.parameters.timeBucketWidth);
  const keys = state.pendingLoans.get(bucket) ?? [];
  keys.push(loanKey(loan.noteToken, loan.loanId));
  state.pendingLoans.set(bucket, keys);
}

function unindexPendingLoan(state: VaultLedgerState, loan: LoanRecord): void {
  const bucket = timeBucket(loan.maturity, state.parameters.timeBucketWidth);
  const key = loanKey(loan.noteToken, loan.loanId);
  const keys = (state.pendingLoans.get(bucket) ?? []).filter((k) => k !== key);
  if (keys.length === 0) {
    state.pendingLoans.delete(bucket);
  } else {
    state.pendingLoans.set(bucket, keys);
  }
}

function unscheduleLoanReturns(state: VaultLedgerState, loan: LoanRecord): void {
  const bucket = timeBucket(loan.maturity, state.parameters.timeBucketWidth);
  unscheduleReturn(state.tranches[Tranche.Senior], bucket, loan.trancheReturns[Tranche.Senior]);
  unscheduleReturn(state.tranches[Tranche.Junior], bucket, loan.trancheReturns[Tranche.Junior]);
  unindexPendingLoan(state, loan);
}

// ── Transitions ────────────────────────────────────────────────────────────

/**
 * Books a purchase at an already-verified price: splits the return between
 * tranches, schedules it in the maturity bucket and moves cash into loans.
 */
export function recordPurchase(state: VaultLedgerState, terms: PurchaseTerms, now: number): LoanRecord {
  const { purchasePrice, repayment } = terms;

  if (repayment <= purchasePrice) {
    throw new VaultException(
      "RepaymentTooLow",
      `Repayment ${repayment} does not exceed purchase price ${purchasePrice}`,
    );
  }
  const senior = state.tranches[Tranche.Senior];
  const junior = state.tranches[Tranche.Junior];
  const totalDepositValue = senior.depositValue + junior.depositValue;
  if (purchasePrice > distributableCash(state) || totalDepositValue === 0n) {
    throw new VaultException(
      "InsufficientLiquidity",
      `Purchase price ${purchasePrice} exceeds available cash ${distributableCash(state)}`,
    );
  }

  const timeRemaining = BigInt(terms.maturity - now);
  const seniorContribution = (purchasePrice * senior.depositValue) / totalDepositValue;
  const seniorReturn = mul(seniorContribution, state.parameters.seniorTrancheRate * timeRemaining);
  const spread = repayment - purchasePrice;
  if (seniorReturn >= spread) {
    throw new VaultException(
      "SeniorReturnExceedsSpread",
      `Senior return ${seniorReturn} leaves no junior spread out of ${spread}`,
    );
  }
  const juniorReturn = spread - seniorReturn;

  const loan: LoanRecord = {
    noteToken: terms.noteToken,
    loanId: terms.loanId,
    collateralToken: terms.collateralToken,
    collateralTokenId: terms.collateralTokenId,
    purchasePrice,
    repayment,
    maturity: terms.maturity,
    trancheReturns: [seniorReturn, juniorReturn],
    active: true,
    liquidated: false,
    collateralLiquidator: null,
  };

  const bucket = timeBucket(terms.maturity, state.parameters.timeBucketWidth);
  scheduleReturn(senior, bucket, seniorReturn);
  scheduleReturn(junior, bucket, juniorReturn);
  indexPendingLoan(state, loan);

  state.totalCashBalance -= purchasePrice;
  state.totalLoanBalance += purchasePrice;
  state.loans.set(loanKey(terms.noteToken, terms.loanId), loan);
  return loan;
}

/** Realizes scheduled returns and releases the repayment to the queue. */
export function settleRepayment(state: VaultLedgerState, loan: LoanRecord): void {
  unscheduleLoanReturns(state, loan);
  state.tranches[Tranche.Senior].depositValue += loan.trancheReturns[Tranche.Senior];
  state.tranches[Tranche.Junior].depositValue += loan.trancheReturns[Tranche.Junior];

  state.totalCashBalance += loan.repayment;
  state.totalLoanBalance -= loan.purchasePrice;
  state.loans.delete(loanKey(loan.noteToken, loan.loanId));

  updateReserves(state);
  processRedemptions(state);
}

/**
 * Writes off the purchase price junior-first. The loan's tranche returns
 * become the loss each tranche took, i.e. what recovery pays back.
 * Returns [seniorLoss, juniorLoss].
 */
export function applyDefault(state: VaultLedgerState, loan: LoanRecord): [bigint, bigint] {
  unscheduleLoanReturns(state, loan);

  const senior = state.tranches[Tranche.Senior];
  const junior = state.tranches[Tranche.Junior];
  const juniorLoss = min(loan.purchasePrice, junior.depositValue);
  const seniorLoss = loan.purchasePrice - juniorLoss;

  junior.depositValue -= juniorLoss;
  senior.depositValue -= seniorLoss;
  state.totalLoanBalance -= loan.purchasePrice;

  loan.trancheReturns = [seniorLoss, juniorLoss];
  loan.liquidated = true;
  return [seniorLoss, juniorLoss];
}

/**
 * Distributes liquidation proceeds senior-first up to the senior loss,
 * junior takes the rest. Returns [seniorRecovery, juniorRecovery].
 */
export function applyRecovery(state: VaultLedgerState, loan: LoanRecord, proceeds: bigint): [bigint, bigint] {
  const seniorEntitlement = loan.trancheReturns[Tranche.Senior];
  const seniorRecovery = min(proceeds, seniorEntitlement);
  const juniorRecovery = proceeds - seniorRecovery;

  state.tranches[Tranche.Senior].depositValue += seniorRecovery;
  state.tranches[Tranche.Junior].depositValue += juniorRecovery;
  state.totalCashBalance += proceeds;

  loan.active = false;
  state.loans.delete(loanKey(loan.noteToken, loan.loanId));

  updateReserves(state);
  processRedemptions(state);
  return [seniorRecovery, juniorRecovery];
}
