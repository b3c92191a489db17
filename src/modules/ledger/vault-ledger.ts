import { VaultException } from "../../common/errors";
import { TrancheState, VaultLedgerState, VaultParameters } from "./ledger.types";

function emptyTranche(): TrancheState {
  return {
    depositValue: 0n,
    pendingRedemptions: 0n,
    redemptionQueueTotal: 0n,
    redemptionQueueProcessed: 0n,
    pendingReturns: new Map(),
    totalShares: 0n,
    shareBalances: new Map(),
    redemptions: new Map(),
  };
}

export function createLedgerState(parameters: VaultParameters): VaultLedgerState {
  return {
    tranches: [emptyTranche(), emptyTranche()],
    totalLoanBalance: 0n,
    totalCashBalance: 0n,
    totalReservesBalance: 0n,
    totalWithdrawalBalance: 0n,
    loans: new Map(),
    pendingLoans: new Map(),
    parameters: { ...parameters },
  };
}

export function cloneLedgerState(state: VaultLedgerState): VaultLedgerState {
  return structuredClone(state);
}

export function loanKey(noteToken: string, loanId: string): string {
  return `${noteToken}:${loanId}`;
}

/** Gate for depositor-facing and purchase operations. */
export function assertNotPaused(state: VaultLedgerState): void {
  if (state.parameters.paused) {
    throw new VaultException("Paused", "Vault is paused");
  }
}
