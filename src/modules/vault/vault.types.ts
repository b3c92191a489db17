import { LoanQuote } from "../pricing";
import { TrancheName } from "../ledger";

export interface PendingReturnView {
  bucket: number;
  amount: bigint;
}

export interface TrancheView {
  tranche: TrancheName;
  depositValue: bigint;
  pendingRedemptions: bigint;
  redemptionQueueTotal: bigint;
  redemptionQueueProcessed: bigint;
  totalShares: bigint;
  sharePrice: bigint;
  redemptionSharePrice: bigint;
  pendingReturns: PendingReturnView[];
}

export interface RedemptionView {
  pendingAmount: bigint;
  withdrawnAmount: bigint;
  queueTargetPosition: bigint;
  available: bigint;
}

export interface VaultBalances {
  totalCashBalance: bigint;
  totalLoanBalance: bigint;
  totalReservesBalance: bigint;
  totalWithdrawalBalance: bigint;
  distributableCash: bigint;
  utilization: bigint;
}

export interface NoteQuote extends LoanQuote {
  noteToken: string;
  loanId: string;
  principal: bigint;
  repayment: bigint;
  maturity: number;
  durationRemaining: number;
}

/** Fixed-point [senior, junior] fractions summing to 1.0. */
export type DepositAllocation = [bigint, bigint];
