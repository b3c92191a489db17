export enum Tranche {
  Senior = 0,
  Junior = 1,
}

/** Drain and recovery order. */
export const TRANCHES: readonly Tranche[] = [Tranche.Senior, Tranche.Junior];

export type TrancheName = "senior" | "junior";

export function trancheName(tranche: Tranche): TrancheName {
  return tranche === Tranche.Senior ? "senior" : "junior";
}

export function parseTranche(name: TrancheName): Tranche {
  return name === "senior" ? Tranche.Senior : Tranche.Junior;
}

export interface DepositorRedemption {
  pendingAmount: bigint;
  withdrawnAmount: bigint;
  /** Value of redemptionQueueTotal right after this request was queued. */
  queueTargetPosition: bigint;
}

export interface TrancheState {
  depositValue: bigint;
  pendingRedemptions: bigint;
  redemptionQueueTotal: bigint;
  redemptionQueueProcessed: bigint;
  /** Scheduled returns keyed by time bucket index. Zero entries are evicted. */
  pendingReturns: Map<number, bigint>;
  totalShares: bigint;
  shareBalances: Map<string, bigint>;
  redemptions: Map<string, DepositorRedemption>;
}

export interface LoanRecord {
  noteToken: string;
  loanId: string;
  collateralToken: string;
  collateralTokenId: string;
  purchasePrice: bigint;
  repayment: bigint;
  /** Unix seconds. */
  maturity: number;
  /**
   * [senior, junior]. Scheduled returns while active; recovery entitlement
   * once liquidated.
   */
  trancheReturns: [bigint, bigint];
  active: boolean;
  liquidated: boolean;
  collateralLiquidator: string | null;
}

export interface VaultParameters {
  /** Per-second fixed-point simple interest owed to senior. */
  seniorTrancheRate: bigint;
  /** Fraction of free cash held back from redemptions, fixed point. */
  reserveRatio: bigint;
  paused: boolean;
  timeBucketWidth: number;
  prorationBuckets: number;
}

/** Aggregate root. Mutated only through the transaction runner. */
export interface VaultLedgerState {
  tranches: [TrancheState, TrancheState];
  totalLoanBalance: bigint;
  totalCashBalance: bigint;
  totalReservesBalance: bigint;
  totalWithdrawalBalance: bigint;
  loans: Map<string, LoanRecord>;
  /** Loan keys by maturity bucket, for upkeep scans. */
  pendingLoans: Map<number, string[]>;
  parameters: VaultParameters;
}
