import { BadRequestException } from "@nestjs/common";
import { LoanRecord, Tranche, parseTranche } from "../ledger";
import { NoteQuote, RedemptionView, TrancheView, VaultBalances } from "./vault.types";

export function requireHeader(value: string | undefined, header: string): string {
  if (!value?.trim()) {
    throw new BadRequestException(`${header} header is required`);
  }
  return value.trim();
}

export function parseTrancheParam(value: string): Tranche {
  if (value !== "senior" && value !== "junior") {
    throw new BadRequestException("Invalid tranche. Valid values: senior, junior");
  }
  return parseTranche(value);
}

// ── Response shapes (bigints as decimal strings) ───────────────────────────

export function serializeTranche(view: TrancheView) {
  return {
    tranche: view.tranche,
    depositValue: view.depositValue.toString(),
    pendingRedemptions: view.pendingRedemptions.toString(),
    redemptionQueueTotal: view.redemptionQueueTotal.toString(),
    redemptionQueueProcessed: view.redemptionQueueProcessed.toString(),
    totalShares: view.totalShares.toString(),
    sharePrice: view.sharePrice.toString(),
    redemptionSharePrice: view.redemptionSharePrice.toString(),
    pendingReturns: view.pendingReturns.map((r) => ({
      bucket: r.bucket,
      amount: r.amount.toString(),
    })),
  };
}

export function serializeRedemption(view: RedemptionView | null) {
  if (!view) return null;
  return {
    pendingAmount: view.pendingAmount.toString(),
    withdrawnAmount: view.withdrawnAmount.toString(),
    queueTargetPosition: view.queueTargetPosition.toString(),
    available: view.available.toString(),
  };
}

export function serializeBalances(b: VaultBalances) {
  return {
    totalCashBalance: b.totalCashBalance.toString(),
    totalLoanBalance: b.totalLoanBalance.toString(),
    totalReservesBalance: b.totalReservesBalance.toString(),
    totalWithdrawalBalance: b.totalWithdrawalBalance.toString(),
    distributableCash: b.distributableCash.toString(),
    utilization: b.utilization.toString(),
  };
}

export function serializeLoan(loan: LoanRecord) {
  return {
    noteToken: loan.noteToken,
    loanId: loan.loanId,
    collateralToken: loan.collateralToken,
    collateralTokenId: loan.collateralTokenId,
    purchasePrice: loan.purchasePrice.toString(),
    repayment: loan.repayment.toString(),
    maturity: loan.maturity,
    trancheReturns: {
      senior: loan.trancheReturns[Tranche.Senior].toString(),
      junior: loan.trancheReturns[Tranche.Junior].toString(),
    },
    active: loan.active,
    liquidated: loan.liquidated,
    collateralLiquidator: loan.collateralLiquidator,
  };
}

export function serializeQuote(quote: NoteQuote) {
  return {
    noteToken: quote.noteToken,
    loanId: quote.loanId,
    principal: quote.principal.toString(),
    repayment: quote.repayment.toString(),
    maturity: quote.maturity,
    durationRemaining: quote.durationRemaining,
    purchasePrice: quote.purchasePrice.toString(),
    discountRate: quote.discountRate.toString(),
    loanToValue: quote.loanToValue.toString(),
    components: {
      utilization: quote.components.utilization.toString(),
      loanToValue: quote.components.loanToValue.toString(),
      duration: quote.components.duration.toString(),
    },
  };
}

export function serializeSplit([senior, junior]: [bigint, bigint]) {
  return { senior: senior.toString(), junior: junior.toString() };
}
